import { DispatchConfigService } from '@app/common/config/config.service';
import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { SqlExecutor } from './sql-executor.interface';

export const DEFAULT_MIGRATIONS_DIR = path.resolve(process.cwd(), 'libs/database/migrations');

@Injectable()
export class PostgresService implements SqlExecutor, OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(PostgresService.name);
  private readonly pool: Pool;

  constructor(private readonly config: DispatchConfigService) {
    // Pool connects lazily on the first query
    this.pool = new Pool({
      connectionString: this.config.databaseUrl,
      ssl: this.config.databaseSsl ? { rejectUnauthorized: false } : undefined,
      max: this.config.databasePoolMax,
      idleTimeoutMillis: 60000,
      connectionTimeoutMillis: 20000,
    });

    this.pool.on('error', error => {
      this.logger.error(`Idle PostgreSQL client error: ${error.message}`);
    });
  }

  async onModuleInit(): Promise<void> {
    if (this.config.autoMigrate) {
      const applied = await this.migrate();
      this.logger.log(applied.length === 0 ? 'No pending migrations' : `Applied migrations: ${applied.join(', ')}`);
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
    this.logger.log('PostgreSQL pool closed');
  }

  async query<R extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []): Promise<QueryResult<R>> {
    try {
      return await this.pool.query<R>(text, params);
    } catch (error) {
      this.logger.error(`Query failed: ${text.substring(0, 100)}`, error instanceof Error ? error.stack : undefined);
      throw error;
    }
  }

  /**
   * Runs `callback` inside BEGIN/COMMIT on a dedicated client; any error rolls
   * the whole unit back and is rethrown.
   */
  async transaction<T>(callback: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await callback(this.bind(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.warn(`PostgreSQL health check failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
      return false;
    }
  }

  /**
   * Applies every `*.sql` file in `directory` not yet recorded in
   * schema_migrations, in file-name order, each in its own transaction.
   */
  async migrate(directory: string = DEFAULT_MIGRATIONS_DIR): Promise<string[]> {
    await this.pool.query(
      'CREATE TABLE IF NOT EXISTS schema_migrations (migration_id TEXT PRIMARY KEY, applied_at TIMESTAMPTZ NOT NULL)',
    );

    const appliedRows = await this.pool.query<{ migration_id: string }>('SELECT migration_id FROM schema_migrations');
    const applied = new Set(appliedRows.rows.map(row => row.migration_id));

    const files = (await fs.readdir(directory)).filter(file => file.endsWith('.sql')).sort();
    const ran: string[] = [];

    for (const file of files) {
      if (applied.has(file)) {
        continue;
      }
      const sql = await fs.readFile(path.join(directory, file), 'utf8');
      await this.transaction(async tx => {
        await tx.query(sql);
        await tx.query('INSERT INTO schema_migrations (migration_id, applied_at) VALUES ($1, NOW())', [file]);
      });
      ran.push(file);
    }

    return ran;
  }

  private bind(client: PoolClient): SqlExecutor {
    return {
      query: <R extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []) =>
        client.query<R>(text, params),
    };
  }
}
