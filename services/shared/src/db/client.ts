import { Pool, PoolClient, PoolConfig } from 'pg';
import { getDatabaseUrl, getPoolSettings } from '../config';
import { logger } from '../utils/logger';

const config: PoolConfig = {
     connectionString: getDatabaseUrl(),
     ...getPoolSettings(),
};
export const pool = new Pool(config);

// Log pool errors
pool.on('error', (err) => {
     logger.error({ err }, 'Unexpected PostgreSQL pool error');
});

// Connection health check
export async function checkConnection(): Promise<boolean> {
     try {
          const client = await pool.connect();
          try {
               await client.query('SELECT 1');
          } finally {
               client.release();
          }
          return true;
     } catch (error) {
          logger.error({ error }, 'Database connection check failed');
          return false;
     }
}

// Connection helper for non-transactional queries
export async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
     const client = await pool.connect();
     try {
          return await fn(client);
     } finally {
          client.release();
     }
}

// Graceful shutdown
export async function closePool(): Promise<void> {
     await pool.end();
     logger.info('Database pool closed');
}
