import { RowParseError, WriterMappingError } from '../common/migration.errors';
import {
  ActorRef,
  MovieDocument,
  SourceRow,
  WriterDirectory,
  WriterRecord,
} from '../types/movie.types';
import { decodeOptional, decodeOptionalFloat, isAvailable } from './sentinel';

/**
 * Reshapes one extracted row into the document stored in the search index.
 *
 * Throws WriterMappingError when the row points at a writer the directory
 * does not know, and RowParseError for a malformed writers list or rating.
 */
export function toMovieDocument(row: SourceRow, writers: WriterDirectory): MovieDocument {
  const movieWriters = resolveWriters(row, writers);
  const actors = zipActors(row.actors_ids, row.actors_names);

  return {
    id: row.id,
    genre: row.genre.replace(/\s/g, '').split(','),
    writers: movieWriters,
    writers_names: movieWriters.map(writer => writer.name),
    actors,
    actors_names: actors.map(actor => actor.name),
    imdb_rating: parseRating(row),
    title: row.title,
    director: isAvailable(row.director)
      ? row.director.split(',').map(name => name.trim())
      : null,
    description: decodeOptional(row.plot),
  };
}

export function parseWriterIds(row: SourceRow): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(row.writers);
  } catch (error) {
    throw new RowParseError(row.id, 'writers', row.writers, describeError(error));
  }

  if (!Array.isArray(parsed)) {
    throw new RowParseError(row.id, 'writers', row.writers, 'expected a JSON array');
  }

  return parsed.map((entry: unknown) => {
    if (typeof entry !== 'object' || entry === null || !('id' in entry)) {
      throw new RowParseError(row.id, 'writers', row.writers, 'entry without an id');
    }
    const { id } = entry;
    if (typeof id !== 'string' && typeof id !== 'number') {
      throw new RowParseError(row.id, 'writers', row.writers, 'writer id is not a string');
    }
    return String(id);
  });
}

function resolveWriters(row: SourceRow, writers: WriterDirectory): WriterRecord[] {
  const seen = new Set<string>();
  const resolved: WriterRecord[] = [];

  for (const writerId of parseWriterIds(row)) {
    const writer = writers.get(writerId);
    if (!writer) {
      throw new WriterMappingError(row.id, writerId);
    }
    if (!isAvailable(writer.name) || seen.has(writerId)) continue;

    seen.add(writerId);
    resolved.push({ id: writer.id, name: writer.name });
  }

  return resolved;
}

// Pairs are formed before filtering so a dropped name never shifts the ids.
function zipActors(ids: string | null, names: string | null): ActorRef[] {
  if (ids === null || names === null) return [];

  const idList = ids.split(',');
  const nameList = names.split(',');
  const length = Math.min(idList.length, nameList.length);

  const actors: ActorRef[] = [];
  for (let i = 0; i < length; i++) {
    if (isAvailable(nameList[i])) {
      actors.push({ id: idList[i], name: nameList[i] });
    }
  }
  return actors;
}

function parseRating(row: SourceRow): number | null {
  try {
    return decodeOptionalFloat(row.imdb_rating);
  } catch (error) {
    throw new RowParseError(row.id, 'imdb_rating', row.imdb_rating, describeError(error));
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
