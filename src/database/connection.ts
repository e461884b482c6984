/**
 * Database connection configuration and utilities
 */

import { Pool, PoolConfig, QueryResult } from 'pg';
import { DatabaseSettings, loadConfig } from '../config';
import { createLogger } from '../utils/logger';

const logger = createLogger('Database');

/**
 * Minimal result shape the DAOs read. Satisfied by pg's QueryResult and by
 * test doubles.
 */
export interface QueryOutcome {
  rows: unknown[];
  rowCount: number | null;
}

/**
 * Anything that can run a parameterised statement: the pool wrapper, a
 * transaction client, or a stub.
 */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<QueryOutcome>;
}

export interface PoolStatus {
  connected: boolean;
  totalCount?: number;
  idleCount?: number;
  waitingCount?: number;
}

class DatabaseConnection implements Queryable {
  private pool: Pool | null = null;
  private config: DatabaseSettings;

  constructor(config: DatabaseSettings) {
    this.config = config;
  }

  /**
   * Initialize database connection pool
   */
  async connect(): Promise<void> {
    if (this.pool) {
      return;
    }

    try {
      const poolConfig: PoolConfig = {
        host: this.config.host,
        port: this.config.port,
        database: this.config.database,
        user: this.config.user,
        password: this.config.password,
        ssl: this.config.ssl,
        max: this.config.max,
        idleTimeoutMillis: this.config.idleTimeoutMillis,
        connectionTimeoutMillis: this.config.connectionTimeoutMillis,
      };

      const pool = new Pool(poolConfig);
      pool.on('error', (error) => {
        logger.error('Idle database client error', { error: error.message });
      });

      // Test connection
      const client = await pool.connect();
      try {
        await client.query('SELECT NOW()');
      } finally {
        client.release();
      }

      this.pool = pool;
      logger.info('Database connected successfully', {
        host: this.config.host,
        database: this.config.database,
      });
    } catch (error) {
      logger.error('Failed to connect to database', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private requirePool(): Pool {
    if (!this.pool) {
      throw new Error('Database not connected. Call connect() first.');
    }
    return this.pool;
  }

  /**
   * Execute a query
   */
  async query(text: string, params?: unknown[]): Promise<QueryResult> {
    const pool = this.requirePool();

    try {
      const start = Date.now();
      const result = await pool.query(text, params);
      const duration = Date.now() - start;

      logger.debug(`Query executed in ${duration}ms`, {
        query: text,
        rowCount: result.rowCount,
      });

      return result;
    } catch (error) {
      logger.error('Query execution failed', {
        query: text,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * Execute a transaction
   */
  async transaction<T>(callback: (tx: Queryable) => Promise<T>): Promise<T> {
    const client = await this.requirePool().connect();

    try {
      await client.query('BEGIN');

      const tx: Queryable = {
        query: (text, params) => client.query(text, params),
      };
      const result = await callback(tx);

      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
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
  getStatus(): PoolStatus {
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
}

// Default database configuration from environment variables
const getDefaultConfig = (): DatabaseSettings => loadConfig().database;

// Export singleton instance
export const db = new DatabaseConnection(getDefaultConfig());

export default DatabaseConnection;
