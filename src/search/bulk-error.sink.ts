import { Logger } from '@nestjs/common';

export interface BulkItemFailure {
  /** 1-based position of the document in the submitted batch */
  position: number;
  id: string;
  status?: number;
  reason: string;
}

export interface BulkErrorSink {
  report(failure: BulkItemFailure): void;
}

export class LoggerBulkErrorSink implements BulkErrorSink {
  constructor(private readonly logger = new Logger('BulkIndexer')) {}

  report(failure: BulkItemFailure): void {
    this.logger.error(
      `Failed to index document ${failure.id} (item ${failure.position}): ${failure.reason}`,
    );
  }
}

export class CollectingBulkErrorSink implements BulkErrorSink {
  readonly failures: BulkItemFailure[] = [];

  report(failure: BulkItemFailure): void {
    this.failures.push(failure);
  }
}
