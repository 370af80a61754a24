import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validate } from './config/env.validation';
import { SyncModule } from './sync/sync.module';

@Module({})
export class AppModule {
  /**
   * Reads and validates the environment when called, so a bad `.env`
   * surfaces inside the caller's error handling.
   */
  static forRoot(): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          envFilePath: '.env',
          cache: true,
          validate,
        }),
        SyncModule,
      ],
    };
  }
}
