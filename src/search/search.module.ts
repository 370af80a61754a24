import { Module } from '@nestjs/common';
import { OpenSearchModule } from '../opensearch/opensearch.module';
import { BulkIndexerService } from './bulk-indexer.service';

@Module({
  imports: [OpenSearchModule],
  providers: [BulkIndexerService],
  exports: [BulkIndexerService, OpenSearchModule],
})
export class SearchModule {}
