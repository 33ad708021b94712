import { allocated, deallocated, outOfStock, Event } from '../messages';
import {
     AllocationNotFoundError,
     DuplicateAllocationError,
     DuplicateBatchError,
     InvalidQuantityError,
     OutOfStockError,
     BatchNotFoundError,
} from '../utils/errors';
import type { OrderLine } from '../types/allocation.types';

export class Batch {
     private readonly allocations: OrderLine[];

     constructor(
          public readonly reference: string,
          public readonly sku: string,
          public purchasedQuantity: number,
          public readonly eta: string | null = null,
          allocations: OrderLine[] = []
     ) {
          if (purchasedQuantity < 0) {
               throw new InvalidQuantityError(
                    `Batch ${reference} quantity must not be negative`
               );
          }
          this.allocations = [...allocations];
     }

     get allocatedQuantity(): number {
          return this.allocations.reduce((sum, line) => sum + line.quantity, 0);
     }

     get availableQuantity(): number {
          return this.purchasedQuantity - this.allocatedQuantity;
     }

     get orderLines(): readonly OrderLine[] {
          return this.allocations;
     }

     canAllocate(line: OrderLine): boolean {
          return this.sku === line.sku && this.availableQuantity >= line.quantity;
     }

     findLine(orderId: string, sku: string): OrderLine | undefined {
          return this.allocations.find((l) => l.orderId === orderId && l.sku === sku);
     }

     allocate(line: OrderLine): void {
          this.allocations.push(line);
     }

     removeLine(line: OrderLine): void {
          const index = this.allocations.indexOf(line);
          if (index >= 0) {
               this.allocations.splice(index, 1);
          }
     }

     /** Removes the most recently allocated line. */
     deallocateOne(): OrderLine | undefined {
          return this.allocations.pop();
     }
}

// Batches without an eta are already in the warehouse and are preferred
function byEta(a: Batch, b: Batch): number {
     if (a.eta === b.eta) return 0;
     if (a.eta === null) return -1;
     if (b.eta === null) return 1;
     return a.eta < b.eta ? -1 : 1;
}

/**
 * Product aggregate: the consistency boundary for every batch of one sku.
 * Mutations raise events, collected by the unit of work on commit.
 */
export class Product {
     private readonly raised: Event[] = [];

     constructor(
          public readonly sku: string,
          public readonly batches: Batch[] = [],
          public versionNumber: number = 0
     ) {}

     get events(): readonly Event[] {
          return this.raised;
     }

     /** Returns and clears the events raised since the last call. */
     pullEvents(): Event[] {
          return this.raised.splice(0, this.raised.length);
     }

     addBatch(batch: Batch): void {
          if (this.findBatch(batch.reference)) {
               throw new DuplicateBatchError(batch.reference);
          }
          this.batches.push(batch);
          this.versionNumber += 1;
     }

     findBatch(reference: string): Batch | undefined {
          return this.batches.find((b) => b.reference === reference);
     }

     allocate(line: OrderLine): string {
          if (line.quantity <= 0) {
               throw new InvalidQuantityError(
                    `Quantity must be positive for order ${line.orderId}`
               );
          }
          if (this.batches.some((b) => b.findLine(line.orderId, line.sku) !== undefined)) {
               throw new DuplicateAllocationError(line.orderId, line.sku);
          }

          const batch = this.place(line);
          if (!batch) {
               throw new OutOfStockError(line.sku, line.quantity);
          }
          return batch.reference;
     }

     deallocate(line: OrderLine): void {
          for (const batch of this.batches) {
               const existing = batch.findLine(line.orderId, line.sku);
               if (existing) {
                    batch.removeLine(existing);
                    this.versionNumber += 1;
                    this.raised.push(
                         deallocated({
                              orderId: existing.orderId,
                              sku: existing.sku,
                              quantity: existing.quantity,
                         })
                    );
                    return;
               }
          }
          throw new AllocationNotFoundError(line.orderId, line.sku);
     }

     /**
      * Sets a batch's purchased quantity. Lines that no longer fit are moved to
      * another batch where possible (Deallocated then Allocated), otherwise the
      * product reports OutOfStock for them.
      */
     changeBatchQuantity(reference: string, quantity: number): void {
          const batch = this.findBatch(reference);
          if (!batch) {
               throw new BatchNotFoundError(reference);
          }
          if (quantity < 0) {
               throw new InvalidQuantityError(`Batch ${reference} quantity must not be negative`);
          }

          batch.purchasedQuantity = quantity;
          this.versionNumber += 1;

          const displaced: OrderLine[] = [];
          while (batch.availableQuantity < 0) {
               const line = batch.deallocateOne();
               if (!line) break;
               displaced.push(line);
               this.raised.push(
                    deallocated({ orderId: line.orderId, sku: line.sku, quantity: line.quantity })
               );
          }

          for (const line of displaced) {
               if (!this.place(line, batch)) {
                    this.raised.push(outOfStock({ sku: line.sku }));
               }
          }
     }

     private place(line: OrderLine, exclude?: Batch): Batch | undefined {
          const batch = [...this.batches]
               .sort(byEta)
               .find((b) => b !== exclude && b.canAllocate(line));
          if (!batch) {
               return undefined;
          }

          batch.allocate(line);
          this.versionNumber += 1;
          this.raised.push(
               allocated({
                    orderId: line.orderId,
                    sku: line.sku,
                    quantity: line.quantity,
                    batchReference: batch.reference,
               })
          );
          return batch;
     }
}
