import { Injectable, Logger } from '@nestjs/common';
import { SqliteService } from '../sqlite/sqlite.service';
import { WriterDirectory, WriterRecord } from '../types/movie.types';

interface WriterRow {
  id: string | number;
  name: string;
}

@Injectable()
export class WriterDirectoryService {
  private readonly logger = new Logger(WriterDirectoryService.name);

  constructor(private readonly sqlite: SqliteService) {}

  /**
   * Every writer keyed by id. Repeated ids keep the last row read.
   */
  load(): WriterDirectory {
    const rows = this.sqlite.connection
      .prepare<[], WriterRow>('SELECT DISTINCT id, name FROM writers')
      .all();

    const writers = new Map<string, WriterRecord>();
    for (const row of rows) {
      const id = String(row.id);
      writers.set(id, { id, name: row.name });
    }

    this.logger.debug(`Loaded ${writers.size} writers`);
    return writers;
  }
}
