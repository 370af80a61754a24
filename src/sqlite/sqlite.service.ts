import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';

const IN_MEMORY = ':memory:';

@Injectable()
export class SqliteService implements OnModuleDestroy {
  private readonly logger = new Logger(SqliteService.name);
  readonly connection: Database.Database;

  constructor(configService: ConfigService) {
    const path = configService.get<string>('SQLITE_PATH', 'db.sqlite');

    // in-memory databases cannot be opened read-only
    this.connection =
      path === IN_MEMORY
        ? new Database(path)
        : new Database(path, { readonly: true, fileMustExist: true });

    this.logger.debug(`Opened source database ${path}`);
  }

  onModuleDestroy() {
    if (this.connection.open) {
      this.connection.close();
      this.logger.debug('Closed source database');
    }
  }
}
