import 'dotenv/config';
import { bootstrap } from '../bootstrap';
import { eventFromJournal, Event } from '../messages';
import { rebuildAllocationsView } from '../views/projection';
import { logger } from '../utils/logger';
import { closePool, withConnection } from './client';

/** Reads the full event journal, oldest first. Unreadable rows are skipped and logged. */
export async function loadEventHistory(): Promise<Event[]> {
     const { rows } = await withConnection((client) =>
          client.query<{ id: number; type: string; payload: unknown }>(
               `
      SELECT id, type, payload
      FROM domain_event
      ORDER BY id
    `
          )
     );

     const history: Event[] = [];
     for (const row of rows) {
          const event = eventFromJournal(row.type, row.payload);
          if (event) {
               history.push(event);
          } else {
               logger.warn({ eventId: row.id, type: row.type }, 'Skipping unreadable journal row');
          }
     }
     return history;
}

async function rebuildViews() {
     try {
          const bus = bootstrap();
          const history = await loadEventHistory();
          logger.info({ events: history.length }, 'Rebuilding allocations view from journal');
          await rebuildAllocationsView(bus.uow, history);
     } finally {
          await closePool();
     }
}

// Run if executed directly
if (require.main === module) {
     rebuildViews().catch((err) => {
          logger.error({ err }, 'Rebuild failed');
          process.exit(1);
     });
}
