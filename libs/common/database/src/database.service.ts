/**
 * Tollgate Database Service
 * PostgreSQL connection pooling and query utilities
 */

import { Injectable, Logger, OnModuleInit, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import retry from 'async-retry';
import { describeError } from '@tollgate/common/errors';
import { withTransaction } from './with-transaction';

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool?: Pool;

  constructor(private configService: ConfigService) {}

  async onModuleInit() {
    const dsn = this.configService.get<string>('databaseDsn');
    if (!dsn) {
      throw new Error('databaseDsn is required');
    }

    // Every call is bounded; a stalled database fails the request instead of hanging it
    const pool = new Pool({
      connectionString: dsn,
      max: 20,
      connectionTimeoutMillis: this.configService.get<number>('dbConnectTimeoutMs') ?? 5000,
      query_timeout: this.configService.get<number>('dbQueryTimeoutMs') ?? 5000,
      idleTimeoutMillis: 30000,
    });
    pool.on('error', (error) => {
      this.logger.error(`Idle client error: ${error.message}`);
    });
    this.pool = pool;

    // Startup only: wait for the database to come up before serving
    await retry(
      async () => {
        await pool.query('SELECT 1');
      },
      {
        retries: 5,
        minTimeout: 1000, // 1 second
        maxTimeout: 10000, // 10 seconds
        onRetry: (error, attempt) => {
          this.logger.warn(
            `Database connectivity retry attempt ${attempt}/5: ${describeError(error)}`,
          );
        },
      },
    );

    this.logger.log('Database pool initialized');
  }

  async onModuleDestroy() {
    await this.pool?.end();
  }

  getPool(): Pool {
    if (!this.pool) {
      throw new Error('Database pool used before module initialization');
    }
    return this.pool;
  }

  /**
   * Execute a single statement
   */
  async query<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params?: unknown[],
  ): Promise<QueryResult<T>> {
    return this.getPool().query<T>(sql, params);
  }

  /**
   * Execute query and return the first row, or null
   */
  async queryOne<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params?: unknown[],
  ): Promise<T | null> {
    const result = await this.query<T>(sql, params);
    return result.rows[0] ?? null;
  }

  /**
   * Run a callback inside a transaction on a dedicated client
   */
  async transaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    return withTransaction(this.getPool(), fn);
  }
}
