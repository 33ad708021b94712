import { types } from 'pg';
import { logger } from '../utils/logger';

// Postgres type OIDs
const INT8_OID = 20;
const DATE_OID = 1082;

let started = false;

/**
 * Installs the row-value parsers the repositories rely on. Process-wide and
 * idempotent: calls after the first are a logged no-op.
 */
export function startMappers(): void {
     if (started) {
          logger.debug('Persistence mappers already started');
          return;
     }

     // BIGSERIAL ids arrive as strings by default
     types.setTypeParser(INT8_OID, (value: string) => parseInt(value, 10));
     // Keep batch etas as YYYY-MM-DD instead of local-midnight Date objects
     types.setTypeParser(DATE_OID, (value: string) => value);

     started = true;
     logger.info('Persistence mappers started');
}

export function mappersStarted(): boolean {
     return started;
}
