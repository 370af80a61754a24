import { Module } from '@nestjs/common';
import { SqliteModule } from '../sqlite/sqlite.module';
import { MovieSourceRepository } from './movie-source.repository';
import { WriterDirectoryService } from './writer-directory.service';

@Module({
  imports: [SqliteModule],
  providers: [MovieSourceRepository, WriterDirectoryService],
  exports: [MovieSourceRepository, WriterDirectoryService],
})
export class MoviesModule {}
