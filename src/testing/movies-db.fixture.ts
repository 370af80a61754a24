import Database from 'better-sqlite3';

const SCHEMA = `
  CREATE TABLE movies (
    id TEXT PRIMARY KEY,
    genre TEXT,
    director TEXT,
    writer TEXT,
    title TEXT,
    plot TEXT,
    ratings TEXT,
    imdb_rating TEXT,
    writers TEXT
  );
  CREATE TABLE actors (id TEXT PRIMARY KEY, name TEXT);
  CREATE TABLE writers (id TEXT, name TEXT);
  CREATE TABLE movie_actors (movie_id TEXT, actor_id TEXT);
`;

export interface MovieFixture {
  id: string;
  title: string;
  genre?: string;
  director?: string;
  writer?: string;
  /** stored JSON text; null leaves the column NULL */
  writers?: string | null;
  plot?: string;
  imdb_rating?: string;
  actorIds?: string[];
}

/**
 * Creates the legacy movie schema on `db` and fills it.
 */
export function seedMoviesDb(
  db: Database.Database,
  fixture: {
    movies: MovieFixture[];
    actors?: Array<[string, string]>;
    writers?: Array<[string, string]>;
  },
): void {
  db.exec(SCHEMA);

  const insertMovie = db.prepare(
    `INSERT INTO movies (id, genre, director, writer, title, plot, ratings, imdb_rating, writers)
     VALUES (@id, @genre, @director, @writer, @title, @plot, '', @imdb_rating, @writers)`,
  );
  const insertActor = db.prepare('INSERT INTO actors (id, name) VALUES (?, ?)');
  const insertWriter = db.prepare('INSERT INTO writers (id, name) VALUES (?, ?)');
  const insertCast = db.prepare('INSERT INTO movie_actors (movie_id, actor_id) VALUES (?, ?)');

  db.transaction(() => {
    for (const [id, name] of fixture.actors ?? []) insertActor.run(id, name);
    for (const [id, name] of fixture.writers ?? []) insertWriter.run(id, name);

    for (const movie of fixture.movies) {
      insertMovie.run({
        id: movie.id,
        title: movie.title,
        genre: movie.genre ?? 'Drama',
        director: movie.director ?? 'N/A',
        writer: movie.writer ?? '',
        writers: movie.writers === undefined ? '' : movie.writers,
        plot: movie.plot ?? 'N/A',
        imdb_rating: movie.imdb_rating ?? 'N/A',
      });
      for (const actorId of movie.actorIds ?? []) insertCast.run(movie.id, actorId);
    }
  })();
}
