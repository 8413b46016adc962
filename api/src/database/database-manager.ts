import { Pool, PoolClient } from 'pg';
import { config } from '../config';
import { dbLogger } from '../utils/logger';
import { Queryable, QueryOutcome, SpatialDatabase } from '../types';
import { columnsOf } from '../services/reconciliation/schema-introspector';

const clientQueryable = (client: PoolClient): Queryable => ({
  query: async (text, params) => {
    const result = await client.query(text, params);
    return { rows: result.rows, rowCount: result.rowCount };
  },
});

export interface DatabaseHealth {
  healthy: boolean;
  details: Record<string, unknown>;
}

export class DatabaseManager implements SpatialDatabase {
  private _pool?: Pool;
  private isConnected: boolean = false;

  /**
   * Initialize database connection and verify PostGIS
   */
  async initialize(): Promise<void> {
    try {
      dbLogger.info('Initializing database connection...');

      this._pool = new Pool({
        connectionString: config.postgres.connectionString,
        max: config.postgres.max,
        idleTimeoutMillis: config.postgres.idleTimeoutMillis,
        connectionTimeoutMillis: config.postgres.connectionTimeoutMillis,
      });

      this._pool.on('error', (error) => {
        dbLogger.error({ err: error }, 'Idle database client error');
      });

      const client = await this._pool.connect();

      try {
        try {
          const postgisCheck = await client.query('SELECT PostGIS_Version() AS version');
          dbLogger.info(`PostGIS version: ${postgisCheck.rows[0]?.version}`);
        } catch (postgisError) {
          dbLogger.warn({ err: postgisError }, 'PostGIS not available, geometry columns cannot be imported');
        }

        this.isConnected = true;
      } finally {
        client.release();
      }

      const targetColumns = await columnsOf(this, config.relations.target);
      if (targetColumns.length === 0) {
        dbLogger.warn(`Target relation ${config.relations.target} does not exist or has no columns`);
      } else {
        dbLogger.info({ columns: targetColumns }, `Target relation ${config.relations.target} found`);
      }

      dbLogger.info('Database connection initialized successfully');
    } catch (error) {
      dbLogger.error({ err: error }, 'Failed to initialize database connection');
      throw error;
    }
  }

  get pool(): Pool {
    if (!this._pool) {
      throw new Error('Database not initialized');
    }
    return this._pool;
  }

  /**
   * Execute a query
   */
  async query(text: string, params?: unknown[]): Promise<QueryOutcome> {
    const start = Date.now();
    try {
      const result = await this.pool.query(text, params);
      const duration = Date.now() - start;

      dbLogger.debug({
        query: text.substring(0, 100),
        params: params?.length || 0,
        rows: result.rowCount,
        duration,
      }, 'Query executed');

      return { rows: result.rows, rowCount: result.rowCount };
    } catch (error) {
      dbLogger.error({ err: error, query: text }, 'Query failed');
      throw error;
    }
  }

  /**
   * Execute a transaction
   */
  async transaction<T>(callback: (client: Queryable) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      const result = await callback(clientQueryable(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async healthCheck(): Promise<DatabaseHealth> {
    try {
      const result = await this.query('SELECT 1 AS check');

      return {
        healthy: this.isConnected && result.rows.length > 0,
        details: {
          connected: this.isConnected,
          poolSize: this.pool.totalCount,
          idleCount: this.pool.idleCount,
          waitingCount: this.pool.waitingCount,
        },
      };
    } catch (error) {
      return {
        healthy: false,
        details: {
          error: error instanceof Error ? error.message : String(error),
        },
      };
    }
  }

  async close(): Promise<void> {
    if (!this._pool) {
      return;
    }
    dbLogger.info('Closing database connection pool...');
    await this._pool.end();
    this.isConnected = false;
    dbLogger.info('Database connection pool closed');
  }
}

// Export singleton instance
export const databaseManager = new DatabaseManager();
