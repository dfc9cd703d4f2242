import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolClient, PoolConfig, QueryResult, QueryResultRow } from 'pg';
import { errorMessage } from '../common/index.js';
import type { AppConfig, DatabaseConfig } from '../config/index.js';
import { ClientSqlExecutor, type SqlExecutor } from './sql-executor.js';

@Injectable()
export class DatabaseService implements SqlExecutor, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool: Pool | null = null;
  private readonly configService: ConfigService<AppConfig>;

  constructor(configService: ConfigService<AppConfig>) {
    this.configService = configService;
    // the pool is created on first use so the memory store never needs a database
  }

  private ensurePool(): Pool {
    if (this.pool) {
      return this.pool;
    }

    const database = this.configService.get<DatabaseConfig>('database');
    if (!database?.url) {
      throw new Error('DATABASE_URL is not configured');
    }

    const config: PoolConfig = {
      connectionString: database.url,
      connectionTimeoutMillis: 10000,
      idleTimeoutMillis: 30000,
      max: 20,
    };

    if (database.ssl) {
      config.ssl = {
        rejectUnauthorized: false,
      };
    }

    this.pool = new Pool(config);

    this.pool.on('error', (err) => {
      this.logger.error('Unexpected database pool error', err.stack);
    });

    return this.pool;
  }

  async getClient(): Promise<PoolClient> {
    const pool = this.ensurePool();
    try {
      return await pool.connect();
    } catch (error) {
      this.logger.warn(
        `Database connection failed, recreating pool: ${errorMessage(error)}`,
      );
      if (this.pool) {
        const stale = this.pool;
        this.pool = null;
        await stale.end().catch((endError: unknown) => {
          this.logger.warn(`Closing stale pool failed: ${errorMessage(endError)}`);
        });
      }
      return this.ensurePool().connect();
    }
  }

  /**
   * Runs `work` inside BEGIN/COMMIT on a dedicated client, rolling back when
   * it throws.
   */
  async withTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.getClient();
    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>> {
    return this.ensurePool().query<R>(text, values);
  }

  transaction<T>(work: (sql: SqlExecutor) => Promise<T>): Promise<T> {
    return this.withTransaction((client) => work(new ClientSqlExecutor(client)));
  }

  async onModuleDestroy() {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
