import { Injectable } from '@nestjs/common';
import { SqliteService } from '../sqlite/sqlite.service';
import { SourceRow } from '../types/movie.types';

/**
 * One row per movie. Actors are collapsed into two parallel comma-joined
 * lists, both ordered by junction row so ids and names line up. A movie
 * stored with the single-writer shorthand (empty `writers`, id in `writer`)
 * gets a one-element JSON list built from that id.
 */
export const MOVIE_ROWS_SQL = `
  WITH movie_cast AS (
    SELECT m.id,
           group_concat(a.id, ',' ORDER BY ma.rowid) AS actors_ids,
           group_concat(a.name, ',' ORDER BY ma.rowid) AS actors_names
    FROM movies m
    LEFT JOIN movie_actors ma ON m.id = ma.movie_id
    LEFT JOIN actors a ON ma.actor_id = a.id
    GROUP BY m.id
  )
  SELECT m.id, m.title, m.genre, m.director, m.plot, m.imdb_rating,
         mc.actors_ids, mc.actors_names,
         CASE
           WHEN m.writers IS NULL OR m.writers = ''
             THEN json_array(json_object('id', m.writer))
           ELSE m.writers
         END AS writers
  FROM movies m
  LEFT JOIN movie_cast mc ON m.id = mc.id
  ORDER BY m.id
`;

@Injectable()
export class MovieSourceRepository {
  constructor(private readonly sqlite: SqliteService) {}

  streamRows(): IterableIterator<SourceRow> {
    return this.sqlite.connection.prepare<[], SourceRow>(MOVIE_ROWS_SQL).iterate();
  }
}
