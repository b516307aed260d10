/**
 *  Database Layer
 */

import pkg from 'pg';
const { Pool } = pkg;
import type { QueryResultRow } from 'pg';
import type { DatabaseConfig } from './types.js';
import { DatabaseError, type Logger } from './utils.js';

export interface SqlResult<R> {
  rows: R[];
  rowCount: number | null;
}

export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<SqlResult<R>>;
}

export interface SqlSession extends SqlClient {
  release(): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlSession>;
  end(): Promise<void>;
}

export function createPgPool(config: DatabaseConfig): SqlPool {
  const pool = new Pool({
    ...(config.connectionString
      ? { connectionString: config.connectionString }
      : {
          host: config.host,
          port: config.port,
          database: config.database,
          user: config.user,
          password: config.password,
        }),
    max: 1,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
    statement_timeout: 60000,
    query_timeout: 60000,
  });

  return {
    query: <R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) =>
      pool.query<R>(text, params),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: <R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) =>
          client.query<R>(text, params),
        release: () => client.release(),
      };
    },
    end: () => pool.end(),
  };
}

/**
 * The one store connection of a run. Everything that touches the database is
 * handed this object rather than opening its own.
 */
export class Database implements SqlClient {
  constructor(private pool: SqlPool, private logger: Logger) {}

  async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
    client?: SqlClient
  ): Promise<SqlResult<R>> {
    this.logger.debug(`Executing: ${text.replace(/\s+/g, ' ').trim()}`);
    try {
      if (client) {
        return await client.query<R>(text, params);
      }
      return await this.pool.query<R>(text, params);
    } catch (error: unknown) {
      throw new DatabaseError('Statement failed', { originalError: error, statement: text });
    }
  }

  async withTransaction<T>(fn: (client: SqlClient) => Promise<T>): Promise<T> {
    let session: SqlSession;
    try {
      session = await this.pool.connect();
    } catch (error: unknown) {
      throw new DatabaseError('Failed to connect to database', { originalError: error });
    }

    try {
      await session.query('BEGIN');
      const result = await fn(session);
      await session.query('COMMIT');
      return result;
    } catch (error: unknown) {
      this.logger.warn('Rolling back transaction');
      try {
        await session.query('ROLLBACK');
      } catch (rollbackError: unknown) {
        this.logger.error('Rollback failed', rollbackError);
      }
      throw error;
    } finally {
      session.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
