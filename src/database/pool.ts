import { Pool, QueryResultRow } from 'pg';
import { appConfig, databaseConfig, isProduction } from '@/config';
import { logger } from '@/utils/logger';

class DatabasePool {
  private pool: Pool;
  private static instance: DatabasePool;

  private constructor() {
    this.pool = new Pool({
      host: databaseConfig.host,
      port: databaseConfig.port,
      database: databaseConfig.database,
      user: databaseConfig.username,
      password: databaseConfig.password,
      max: databaseConfig.maxConnections,
      idleTimeoutMillis: databaseConfig.idleTimeout,
      connectionTimeoutMillis: databaseConfig.connectionTimeout,
      ssl: isProduction ? { rejectUnauthorized: false } : false,
      options: '-c timezone=UTC',
    });

    this.pool.on('connect', () => {
      logger.debug('Database pool connected');
    });

    this.pool.on('error', (err) => {
      logger.error('Database pool error:', err);
    });
  }

  public static getInstance(): DatabasePool {
    if (!DatabasePool.instance) {
      DatabasePool.instance = new DatabasePool();
    }
    return DatabasePool.instance;
  }

  public async query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<T[]> {
    return (await this.run<T>(text, params)).rows;
  }

  /** Runs a statement and returns the affected row count. */
  public async execute(text: string, params?: unknown[]): Promise<number> {
    return (await this.run(text, params)).rowCount ?? 0;
  }

  private async run<T extends QueryResultRow>(text: string, params?: unknown[]) {
    const start = Date.now();

    try {
      if (appConfig.logging.logDatabaseQueries) {
        logger.debug('Executing query:', { text, params });
      }
      const result = await this.pool.query<T>(text, params);

      logger.debug('Query completed:', {
        duration: Date.now() - start,
        rows: result.rowCount,
        text: text.substring(0, 100) + (text.length > 100 ? '...' : '')
      });

      return result;
    } catch (error) {
      logger.error('Query failed:', { text, params, duration: Date.now() - start, error });
      throw error;
    }
  }

  public async testConnection(): Promise<boolean> {
    try {
      await this.query('SELECT NOW() as current_time');
      return true;
    } catch (error) {
      logger.error('Database connection test failed:', error);
      return false;
    }
  }

  public async close(): Promise<void> {
    await this.pool.end();
    logger.info('Database pool closed');
  }

  public getPoolStats(): { total: number; idle: number; waiting: number } {
    return {
      total: this.pool.totalCount,
      idle: this.pool.idleCount,
      waiting: this.pool.waitingCount
    };
  }
}

export const db = DatabasePool.getInstance();
