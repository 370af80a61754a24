import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { toMovieDocument } from '../movies/movie-document.transformer';
import { MovieSourceRepository } from '../movies/movie-source.repository';
import { WriterDirectoryService } from '../movies/writer-directory.service';
import { MOVIES_INDEX_BODY } from '../opensearch/movies.mapping';
import { OpenSearchService } from '../opensearch/opensearch.service';
import { BulkIndexerService, BulkIndexReport } from '../search/bulk-indexer.service';
import { MovieDocument } from '../types/movie.types';

@Injectable()
export class MoviesMigrationService {
  private readonly logger = new Logger(MoviesMigrationService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly writerDirectory: WriterDirectoryService,
    private readonly movieSource: MovieSourceRepository,
    private readonly bulkIndexer: BulkIndexerService,
    private readonly openSearch: OpenSearchService,
  ) {}

  /**
   * Full migration into `index`: writers first, then every movie row,
   * then a single bulk request with all documents.
   */
  async run(index: string): Promise<BulkIndexReport> {
    if (this.configService.get<string>('OPENSEARCH_CREATE_INDEX') === 'true') {
      await this.openSearch.createIndexIfNotExists(index, MOVIES_INDEX_BODY);
    }

    const writers = this.writerDirectory.load();

    const documents: MovieDocument[] = [];
    for (const row of this.movieSource.streamRows()) {
      documents.push(toMovieDocument(row, writers));
    }
    this.logger.debug(`Transformed ${documents.length} movies`);

    const report = await this.bulkIndexer.index(documents, index);
    this.logger.debug(`Indexed ${report.indexed}/${report.total} movies into ${index}`);

    return report;
  }
}
