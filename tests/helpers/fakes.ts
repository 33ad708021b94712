import { bootstrap } from '@allocation/shared/src/bootstrap';
import { Batch, Product } from '@allocation/shared/src/domain/model';
import type { Event } from '@allocation/shared/src/messages';
import type { MessageBus } from '@allocation/shared/src/services/message-bus';
import type {
     AllocationRecord,
     AllocationSummary,
     Publish,
     SendMail,
} from '@allocation/shared/src/types/allocation.types';
import {
     AbstractUnitOfWork,
     AllocationsViewStore,
     ProductRepository,
     UnitOfWorkSession,
} from '@allocation/shared/src/unit-of-work/unit-of-work';

/**
 * In-memory stand-ins for the persistence, mail and publish adapters
 */

/** A detached copy, so work that rolls back never reaches the store. */
export function copyProduct(product: Product): Product {
     return new Product(
          product.sku,
          product.batches.map(
               (b) => new Batch(b.reference, b.sku, b.purchasedQuantity, b.eta, [...b.orderLines])
          ),
          product.versionNumber
     );
}

export class FakeProductRepository implements ProductRepository {
     private readonly tracked: Product[] = [];

     constructor(private readonly store: Map<string, Product>) {}

     get seen(): readonly Product[] {
          return this.tracked;
     }

     async add(product: Product): Promise<void> {
          this.track(product);
     }

     async get(sku: string): Promise<Product | undefined> {
          const existing = this.tracked.find((p) => p.sku === sku);
          if (existing) {
               return existing;
          }
          const stored = this.store.get(sku);
          if (!stored) {
               return undefined;
          }
          const product = copyProduct(stored);
          this.track(product);
          return product;
     }

     async getByBatchReference(reference: string): Promise<Product | undefined> {
          const existing = this.tracked.find((p) => p.findBatch(reference));
          if (existing) {
               return existing;
          }
          for (const stored of this.store.values()) {
               if (stored.findBatch(reference)) {
                    return this.get(stored.sku);
               }
          }
          return undefined;
     }

     private track(product: Product): void {
          if (!this.tracked.includes(product)) {
               this.tracked.push(product);
          }
     }
}

export class FakeAllocationsView implements AllocationsViewStore {
     readonly rows: AllocationRecord[] = [];
     readonly orders = new Set<string>();

     async insert(record: AllocationRecord): Promise<void> {
          this.orders.add(record.orderId);
          if (this.rows.some((r) => r.orderId === record.orderId && r.sku === record.sku)) {
               return;
          }
          this.rows.push({ ...record });
     }

     async remove(orderId: string, sku: string): Promise<void> {
          const index = this.rows.findIndex((r) => r.orderId === orderId && r.sku === sku);
          if (index >= 0) {
               this.rows.splice(index, 1);
          }
     }

     async findByOrder(orderId: string): Promise<AllocationSummary[]> {
          return this.rows
               .filter((r) => r.orderId === orderId)
               .sort((a, b) => a.sku.localeCompare(b.sku))
               .map((r) => ({ sku: r.sku, batchReference: r.batchReference }));
     }

     async hasOrder(orderId: string): Promise<boolean> {
          return this.orders.has(orderId);
     }

     async clear(): Promise<void> {
          this.rows.splice(0, this.rows.length);
          this.orders.clear();
     }
}

export class FakeUnitOfWork extends AbstractUnitOfWork {
     readonly productStore = new Map<string, Product>();
     readonly allocationsView = new FakeAllocationsView();
     /** Every event committed, in order; what the Postgres journal would hold. */
     readonly journal: Event[] = [];
     commits = 0;
     rollbacks = 0;

     protected async openSession(): Promise<UnitOfWorkSession> {
          const products = new FakeProductRepository(this.productStore);
          return {
               products,
               allocationsView: this.allocationsView,
               commit: async (events) => {
                    for (const product of products.seen) {
                         this.productStore.set(product.sku, product);
                    }
                    this.journal.push(...events);
                    this.commits += 1;
               },
               // Copies handed out by the session are dropped with it
               rollback: async () => {
                    this.rollbacks += 1;
               },
               release: () => undefined,
          };
     }
}

export function recordingPublish() {
     const published: Array<{ topic: string; event: Event }> = [];
     const publish: Publish = async (topic, event) => {
          published.push({ topic, event });
     };
     return { publish, published };
}

export function recordingSendMail() {
     const sent: Array<{ destination: string; message: string }> = [];
     const sendMail: SendMail = async (destination, message) => {
          sent.push({ destination, message });
     };
     return { sendMail, sent };
}

export interface TestBus {
     bus: MessageBus;
     uow: FakeUnitOfWork;
     published: Array<{ topic: string; event: Event }>;
     sent: Array<{ destination: string; message: string }>;
}

/** A fully wired bus over in-memory fakes. */
export function bootstrapTestBus(
     overrides: { publish?: Publish; sendMail?: SendMail } = {}
): TestBus {
     const uow = new FakeUnitOfWork();
     const recordedPublish = recordingPublish();
     const recordedMail = recordingSendMail();
     const bus = bootstrap({
          startMappers: false,
          uow,
          publish: overrides.publish ?? recordedPublish.publish,
          sendMail: overrides.sendMail ?? recordedMail.sendMail,
     });
     return { bus, uow, published: recordedPublish.published, sent: recordedMail.sent };
}
