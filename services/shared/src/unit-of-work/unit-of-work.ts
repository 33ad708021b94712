import { AsyncLocalStorage } from 'async_hooks';
import type { Product } from '../domain/model';
import type { Event } from '../messages';
import type { AllocationRecord, AllocationSummary } from '../types/allocation.types';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger({ component: 'unit-of-work' });

export interface ProductRepository {
     /** Aggregates loaded or added through this repository, in first-seen order. */
     readonly seen: readonly Product[];
     add(product: Product): Promise<void>;
     get(sku: string): Promise<Product | undefined>;
     getByBatchReference(reference: string): Promise<Product | undefined>;
}

/** The denormalized allocations projection. Never joins the write-side schema. */
export interface AllocationsViewStore {
     /** Inserts a row; a row already present for (orderId, sku) is left untouched. */
     insert(record: AllocationRecord): Promise<void>;
     /** Deletes the row for (orderId, sku) if there is one. */
     remove(orderId: string, sku: string): Promise<void>;
     findByOrder(orderId: string): Promise<AllocationSummary[]>;
     hasOrder(orderId: string): Promise<boolean>;
     clear(): Promise<void>;
}

export interface UnitOfWorkScope {
     readonly products: ProductRepository;
     readonly allocationsView: AllocationsViewStore;
}

export interface UnitOfWork {
     /**
      * Runs `work` against one persistence session. Writes are committed together
      * when `work` resolves and rolled back when it throws.
      */
     withTransaction<T>(work: (scope: UnitOfWorkScope) => Promise<T>): Promise<T>;
     /** Drains events raised by committed work since the previous drain, oldest first. */
     collectNewEvents(): Event[];
     /** Gives `fn` and everything it awaits a private pending-event buffer. */
     isolate<T>(fn: () => Promise<T>): Promise<T>;
}

export interface UnitOfWorkSession extends UnitOfWorkScope {
     commit(events: readonly Event[]): Promise<void>;
     rollback(): Promise<void>;
     release(): void;
}

export abstract class AbstractUnitOfWork implements UnitOfWork {
     private readonly isolated = new AsyncLocalStorage<Event[]>();
     private readonly shared: Event[] = [];

     protected abstract openSession(): Promise<UnitOfWorkSession>;

     async withTransaction<T>(work: (scope: UnitOfWorkScope) => Promise<T>): Promise<T> {
          const session = await this.openSession();
          try {
               const result = await work(session);
               const events = session.products.seen.flatMap((product) => product.pullEvents());
               await session.commit(events);
               this.pending().push(...events);
               return result;
          } catch (err) {
               for (const product of session.products.seen) {
                    product.pullEvents();
               }
               try {
                    await session.rollback();
               } catch (rollbackError) {
                    log.error({ err: rollbackError }, 'Rollback failed');
               }
               throw err;
          } finally {
               session.release();
          }
     }

     collectNewEvents(): Event[] {
          const pending = this.pending();
          return pending.splice(0, pending.length);
     }

     isolate<T>(fn: () => Promise<T>): Promise<T> {
          return this.isolated.run([], fn);
     }

     private pending(): Event[] {
          return this.isolated.getStore() ?? this.shared;
     }
}
