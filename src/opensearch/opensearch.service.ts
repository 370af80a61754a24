import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Client } from '@opensearch-project/opensearch';

@Injectable()
export class OpenSearchService {
  private readonly logger = new Logger(OpenSearchService.name);
  readonly client: Client;

  constructor(configService: ConfigService) {
    const node = configService.get<string>('OPENSEARCH_URL', 'http://127.0.0.1:9200');
    const username = configService.get<string>('OPENSEARCH_USERNAME');
    const password = configService.get<string>('OPENSEARCH_PASSWORD');

    const auth = username && password ? { username, password } : undefined;

    this.client = new Client({ node, auth });
  }

  /**
   * Sends an NDJSON body to `_bulk` and returns the raw response body.
   */
  async bulk(payload: string): Promise<unknown> {
    const response = await this.client.bulk({ body: payload });
    return response.body;
  }

  async createIndexIfNotExists(index: string, body: Record<string, unknown>): Promise<boolean> {
    const exists = await this.client.indices.exists({ index });
    if (exists.body) return false;

    await this.client.indices.create({ index, body });
    this.logger.log(`Created index ${index}`);
    return true;
  }
}
