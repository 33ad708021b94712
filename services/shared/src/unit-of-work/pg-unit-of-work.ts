import { Pool, PoolClient } from 'pg';
import { PgProductRepository } from '../db/product-repository';
import { toJournalPayload, Event } from '../messages';
import { PgAllocationsView } from '../views/allocations-view';
import { AbstractUnitOfWork, UnitOfWorkSession } from './unit-of-work';

class PgSession implements UnitOfWorkSession {
     readonly products: PgProductRepository;
     readonly allocationsView: PgAllocationsView;

     constructor(private readonly client: PoolClient) {
          this.products = new PgProductRepository(client);
          this.allocationsView = new PgAllocationsView(client);
     }

     async commit(events: readonly Event[]): Promise<void> {
          for (const product of this.products.seen) {
               await this.products.save(product);
          }

          // Journal the events with the state change that produced them
          for (const event of events) {
               await this.client.query(
                    `
        INSERT INTO domain_event (type, payload)
        VALUES ($1, $2::jsonb)
      `,
                    [event.type, JSON.stringify(toJournalPayload(event))]
               );
          }

          await this.client.query('COMMIT');
     }

     async rollback(): Promise<void> {
          await this.client.query('ROLLBACK');
     }

     release(): void {
          this.client.release();
     }
}

/** Unit of work over one pooled Postgres connection per transaction. */
export class PgUnitOfWork extends AbstractUnitOfWork {
     constructor(private readonly pool: Pool) {
          super();
     }

     protected async openSession(): Promise<UnitOfWorkSession> {
          const client = await this.pool.connect();
          try {
               await client.query('BEGIN');
          } catch (err) {
               client.release();
               throw err;
          }
          return new PgSession(client);
     }
}
