import { Injectable, Logger } from '@nestjs/common';
import { BulkResponseError } from '../common/migration.errors';
import { OpenSearchService } from '../opensearch/opensearch.service';
import { MovieDocument } from '../types/movie.types';
import { BulkErrorSink, BulkItemFailure, LoggerBulkErrorSink } from './bulk-error.sink';

export interface BulkIndexReport {
  total: number;
  indexed: number;
  failures: BulkItemFailure[];
}

/**
 * Action line followed by the document, each newline-terminated. The `_id`
 * is the document id so re-running a migration overwrites instead of duplicating.
 */
export function buildBulkPayload(documents: MovieDocument[], index: string): string {
  return documents
    .map(
      document =>
        `${JSON.stringify({ index: { _index: index, _id: document.id } })}\n` +
        `${JSON.stringify(document)}\n`,
    )
    .join('');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeItemError(error: unknown): string {
  if (typeof error === 'string') return error;
  if (isRecord(error) && typeof error.reason === 'string') {
    return typeof error.type === 'string' ? `${error.type}: ${error.reason}` : error.reason;
  }
  return JSON.stringify(error);
}

/**
 * Collects the per-document failures from a bulk response, in submission order.
 */
export function collectBulkFailures(body: unknown, documents: MovieDocument[]): BulkItemFailure[] {
  if (!isRecord(body) || !Array.isArray(body.items)) {
    throw new BulkResponseError('Bulk response has no items array');
  }

  const failures: BulkItemFailure[] = [];
  body.items.forEach((item: unknown, i: number) => {
    const result = isRecord(item) ? item.index : undefined;
    if (!isRecord(result) || result.error === undefined || result.error === null) return;

    failures.push({
      position: i + 1,
      id: typeof result._id === 'string' ? result._id : documents[i]?.id ?? 'unknown',
      status: typeof result.status === 'number' ? result.status : undefined,
      reason: describeItemError(result.error),
    });
  });
  return failures;
}

@Injectable()
export class BulkIndexerService {
  private readonly logger = new Logger(BulkIndexerService.name);
  private readonly defaultSink: BulkErrorSink = new LoggerBulkErrorSink(this.logger);

  constructor(private readonly openSearch: OpenSearchService) {}

  /**
   * Submits the whole batch as one bulk request. Failed documents are
   * reported to `sink` and do not stop the rest of the batch; transport
   * errors propagate.
   */
  async index(
    documents: MovieDocument[],
    index: string,
    sink: BulkErrorSink = this.defaultSink,
  ): Promise<BulkIndexReport> {
    if (documents.length === 0) {
      this.logger.debug(`Nothing to index into ${index}`);
      return { total: 0, indexed: 0, failures: [] };
    }

    const body = await this.openSearch.bulk(buildBulkPayload(documents, index));
    const failures = collectBulkFailures(body, documents);
    failures.forEach(failure => sink.report(failure));

    return {
      total: documents.length,
      indexed: documents.length - failures.length,
      failures,
    };
  }
}
