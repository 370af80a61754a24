import { Module } from '@nestjs/common';
import { MoviesModule } from '../movies/movies.module';
import { SearchModule } from '../search/search.module';
import { MoviesMigrationService } from './movies-migration.service';

@Module({
  imports: [MoviesModule, SearchModule],
  providers: [MoviesMigrationService],
  exports: [MoviesMigrationService],
})
export class SyncModule {}
