import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { Pool, PoolClient, QueryResultRow } from 'pg';
import { promises as fs } from 'fs';
import * as path from 'path';
import { describeError } from '../common/errors';
import { OrchestratorConfigService } from '../config/orchestrator-config.service';

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool?: Pool;

  constructor(private readonly config: OrchestratorConfigService) {}

  async onModuleInit() {
    if (this.config.persistenceDriver === 'postgres') {
      await this.connect();
    }
  }

  async onModuleDestroy() {
    await this.disconnect();
  }

  private async connect() {
    try {
      this.pool = new Pool({
        connectionString: this.config.databaseUrl,
        max: this.config.databasePoolSize,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
      });

      // Test connection and make sure the schema exists
      const client = await this.pool.connect();
      try {
        await client.query('SELECT NOW()');
        await client.query(await this.readSchema());
      } finally {
        client.release();
      }

      this.logger.log(
        `✅ PostgreSQL connected: ${this.config.databaseUrl.replace(/\/\/[^@]*@/, '//***@')}`,
      );
    } catch (error) {
      this.logger.error(
        `❌ Failed to connect to PostgreSQL: ${describeError(error)}`,
      );
      throw error;
    }
  }

  private async disconnect() {
    if (this.pool) {
      await this.pool.end();
      this.pool = undefined;
      this.logger.log('📤 PostgreSQL disconnected');
    }
  }

  private readSchema(): Promise<string> {
    return fs.readFile(
      path.resolve(__dirname, '../../db/schema.sql'),
      'utf8',
    );
  }

  async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<T[]> {
    const client = await this.getClient();
    try {
      const result = await client.query<T>(text, params);
      return result.rows;
    } finally {
      client.release();
    }
  }

  async transaction<T>(
    callback: (client: PoolClient) => Promise<T>,
  ): Promise<T> {
    const client = await this.getClient();
    try {
      await client.query('BEGIN');
      const result = await callback(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async getClient(): Promise<PoolClient> {
    if (!this.pool) {
      throw new Error('PostgreSQL pool is not connected');
    }
    return this.pool.connect();
  }
}
