export class MigrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A movie references a writer that is missing from the writers table. */
export class WriterMappingError extends MigrationError {
  constructor(
    readonly movieId: string,
    readonly writerId: string,
  ) {
    super(`Movie ${movieId} references unknown writer ${writerId}`);
  }
}

export class RowParseError extends MigrationError {
  constructor(
    readonly movieId: string,
    readonly field: string,
    readonly value: unknown,
    reason: string,
  ) {
    super(`Movie ${movieId}: cannot parse ${field} (${reason})`);
  }
}

/** The bulk endpoint answered with something other than a bulk response. */
export class BulkResponseError extends MigrationError {}
