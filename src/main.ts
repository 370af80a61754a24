#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { MoviesMigrationService } from './sync/movies-migration.service';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule.forRoot(), {
    logger: ['error', 'warn'],
    abortOnError: false,
  });

  // closing the context releases the source database
  try {
    const index = process.argv[2] ?? app.get(ConfigService).get<string>('OPENSEARCH_INDEX', 'movies');
    await app.get(MoviesMigrationService).run(index);
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('MoviesMigration').error(
    error instanceof Error ? (error.stack ?? error.message) : String(error),
  );
  process.exitCode = 1;
});
