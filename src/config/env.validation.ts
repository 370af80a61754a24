import 'reflect-metadata';
import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  validateSync,
} from 'class-validator';

export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  SQLITE_PATH: string = 'db.sqlite';

  @IsUrl({ require_tld: false, protocols: ['http', 'https'] })
  OPENSEARCH_URL: string = 'http://127.0.0.1:9200';

  @IsString()
  @IsNotEmpty()
  OPENSEARCH_INDEX: string = 'movies';

  @IsOptional()
  @IsString()
  OPENSEARCH_USERNAME?: string;

  @IsOptional()
  @IsString()
  OPENSEARCH_PASSWORD?: string;

  @IsBooleanString()
  OPENSEARCH_CREATE_INDEX: string = 'false';
}

/**
 * Used by ConfigModule.forRoot to reject a bad environment before anything connects.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors
      .map(error => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }

  return validated;
}
