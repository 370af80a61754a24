/**
 * One movie as returned by the extraction query. Actor ids and names are
 * parallel comma-joined lists, null when the movie has no linked actors.
 */
export interface SourceRow {
  id: string;
  title: string;
  genre: string;
  director: string;
  plot: string;
  imdb_rating: string | number;
  /** JSON array of `{ "id": ... }` objects, never empty after the query */
  writers: string;
  actors_ids: string | null;
  actors_names: string | null;
}

export interface WriterRecord {
  id: string;
  name: string;
}

export type WriterDirectory = ReadonlyMap<string, WriterRecord>;

export interface ActorRef {
  id: string;
  name: string;
}

export interface MovieDocument {
  id: string;
  genre: string[];
  writers: WriterRecord[];
  writers_names: string[];
  actors: ActorRef[];
  actors_names: string[];
  imdb_rating: number | null;
  title: string;
  director: string[] | null;
  description: string | null;
}
