/**
 * Database connection configuration and utilities
 */

import { Pool, PoolClient, PoolConfig, QueryResult, QueryResultRow } from 'pg';
import { createLogger } from '../utils/logger';
import { AppError, RepositoryError } from '../utils/errors';
import { SCHEMA_STATEMENTS } from './schema';

const logger = createLogger('Database');

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  max?: number; // Maximum number of clients in pool
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

export type QueryFn = <T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
) => Promise<QueryResult<T>>;

export interface DatabaseStatus {
  connected: boolean;
  totalCount?: number;
  idleCount?: number;
  waitingCount?: number;
}

export class DatabaseConnection {
  private pool: Pool | null = null;
  private config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  /**
   * Initialize database connection pool
   */
  async connect(): Promise<void> {
    try {
      const poolConfig: PoolConfig = {
        host: this.config.host,
        port: this.config.port,
        database: this.config.database,
        user: this.config.user,
        password: this.config.password,
        ssl: this.config.ssl,
        max: this.config.max || 10,
        idleTimeoutMillis: this.config.idleTimeoutMillis || 30000,
        connectionTimeoutMillis: this.config.connectionTimeoutMillis || 2000,
      };

      this.pool = new Pool(poolConfig);
      this.pool.on('error', (error) => {
        logger.error('Idle client error', { error: error.message });
      });

      // Test connection
      const client = await this.pool.connect();
      await client.query('SELECT NOW()');
      client.release();

      logger.info('Database connected successfully');
    } catch (error) {
      logger.error('Failed to connect to database:', error);
      throw new RepositoryError('Database connection failed', error);
    }
  }

  /**
   * Creates tables and indexes when missing
   */
  async migrate(): Promise<void> {
    await this.transaction(async (query) => {
      for (const statement of SCHEMA_STATEMENTS) {
        await query(statement);
      }
    });
    logger.info('Database schema is up to date');
  }

  /**
   * Execute a query
   */
  async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<QueryResult<T>> {
    const pool = this.requirePool();

    try {
      const start = Date.now();
      const result = await pool.query<T>(text, params);
      const duration = Date.now() - start;

      logger.debug(`Query executed in ${duration}ms`, {
        query: text,
        rowCount: result.rowCount,
      });

      return result;
    } catch (error) {
      logger.error('Query execution failed:', {
        query: text,
        error: error instanceof Error ? error.message : error,
      });
      throw new RepositoryError('Database query failed', error);
    }
  }

  /**
   * Execute a transaction
   */
  async transaction<T>(callback: (query: QueryFn) => Promise<T>): Promise<T> {
    const pool = this.requirePool();

    const client: PoolClient = await pool.connect().catch((error: unknown) => {
      throw new RepositoryError('Database connection failed', error);
    });

    try {
      await client.query('BEGIN');

      const queryWrapper: QueryFn = <R extends QueryResultRow>(
        text: string,
        params?: unknown[],
      ) => client.query<R>(text, params);
      const result = await callback(queryWrapper);

      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        logger.error('Rollback failed', { error: rollbackError });
      });
      if (error instanceof AppError) {
        throw error;
      }
      throw new RepositoryError('Database transaction failed', error);
    } finally {
      client.release();
    }
  }

  /**
   * Close database connection
   */
  async disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      logger.info('Database connection closed');
    }
  }

  /**
   * Get pool status
   */
  getStatus(): DatabaseStatus {
    if (!this.pool) {
      return { connected: false };
    }

    return {
      connected: true,
      totalCount: this.pool.totalCount,
      idleCount: this.pool.idleCount,
      waitingCount: this.pool.waitingCount,
    };
  }

  private requirePool(): Pool {
    if (!this.pool) {
      throw new RepositoryError('Database not connected. Call connect() first.');
    }
    return this.pool;
  }
}

export default DatabaseConnection;
