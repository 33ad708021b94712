import { promises as fs } from 'fs';
import { join } from 'path';
import 'dotenv/config';
import type { Pool } from 'pg';
import { pool } from './client';
import { logger } from '../utils/logger';

/** Tables the write model, the event journal and the allocations view live in. */
export const REQUIRED_TABLES = [
     'products',
     'batches',
     'allocations',
     'domain_event',
     'allocations_view',
     'allocations_view_order',
] as const;

export function tablesCreatedBy(sql: string): string[] {
     return [...sql.matchAll(/CREATE TABLE IF NOT EXISTS (\w+)/gi)].map((match) => match[1]);
}

/**
 * Applies every migration in name order, then checks that each required table
 * exists. Returns the tables the migration files declare.
 */
async function runMigrations(
     db: Pick<Pool, 'query'> = pool,
     migrationsDir: string = join(__dirname, 'migrations')
): Promise<string[]> {
     const files = await fs.readdir(migrationsDir);
     const sqlFiles = files.filter((f) => f.endsWith('.sql')).sort();
     const declared: string[] = [];

     logger.info({ count: sqlFiles.length }, 'Running database migrations');

     for (const file of sqlFiles) {
          const sql = await fs.readFile(join(migrationsDir, file), 'utf-8');
          const tables = tablesCreatedBy(sql);

          logger.info({ file, tables }, 'Executing migration');
          await db.query(sql);
          declared.push(...tables);
     }

     const { rows } = await db.query<{ table_name: string }>(
          `
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = current_schema() AND table_name = ANY($1)
    `,
          [REQUIRED_TABLES]
     );
     const present = new Set(rows.map((row) => row.table_name));
     const missing = REQUIRED_TABLES.filter((table) => !present.has(table));
     if (missing.length > 0) {
          throw new Error(`Schema is missing tables after migration: ${missing.join(', ')}`);
     }

     logger.info({ tables: declared }, 'All migrations completed successfully');
     return declared;
}

// Run if executed directly
if (require.main === module) {
     runMigrations()
          .finally(() => pool.end())
          .catch((err) => {
               logger.error({ err }, 'Migration failed');
               process.exitCode = 1;
          });
}

export { runMigrations };
