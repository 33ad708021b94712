import { Batch, Product } from '@allocation/shared/src/domain/model';
import { allocated } from '@allocation/shared/src/messages';
import { OutOfStockError } from '@allocation/shared/src/utils/errors';
import { FakeUnitOfWork } from '../helpers/fakes';

function stockedUow(quantity = 10): FakeUnitOfWork {
     const uow = new FakeUnitOfWork();
     uow.productStore.set('CHAIR', new Product('CHAIR', [new Batch('b1', 'CHAIR', quantity)]));
     return uow;
}

describe('AbstractUnitOfWork', () => {
     it('should commit and queue the events raised by seen products', async () => {
          const uow = stockedUow();

          const reference = await uow.withTransaction(async ({ products }) => {
               const product = await products.get('CHAIR');
               return product?.allocate({ orderId: 'o1', sku: 'CHAIR', quantity: 2 });
          });

          const expected = allocated({
               orderId: 'o1',
               sku: 'CHAIR',
               quantity: 2,
               batchReference: 'b1',
          });
          expect(reference).toBe('b1');
          expect(uow.commits).toBe(1);
          expect(uow.journal).toEqual([expected]);
          expect(uow.collectNewEvents()).toEqual([expected]);
          expect(uow.collectNewEvents()).toEqual([]);
     });

     it('should roll back and discard events when the work throws', async () => {
          const uow = stockedUow(1);

          await expect(
               uow.withTransaction(async ({ products }) => {
                    const product = await products.get('CHAIR');
                    product?.allocate({ orderId: 'o1', sku: 'CHAIR', quantity: 1 });
                    product?.allocate({ orderId: 'o2', sku: 'CHAIR', quantity: 1 });
               })
          ).rejects.toThrow(OutOfStockError);

          expect(uow.rollbacks).toBe(1);
          expect(uow.commits).toBe(0);
          expect(uow.journal).toEqual([]);
          expect(uow.collectNewEvents()).toEqual([]);
          expect(uow.productStore.get('CHAIR')?.events).toEqual([]);
          expect(uow.productStore.get('CHAIR')?.findBatch('b1')?.allocatedQuantity).toBe(0);
          expect(uow.productStore.get('CHAIR')?.versionNumber).toBe(0);
     });

     it('should keep pending events apart across isolated scopes', async () => {
          const uow = new FakeUnitOfWork();
          uow.productStore.set('CHAIR', new Product('CHAIR', [new Batch('b1', 'CHAIR', 10)]));
          uow.productStore.set('LAMP', new Product('LAMP', [new Batch('b2', 'LAMP', 10)]));

          const run = (sku: string, orderId: string) =>
               uow.isolate(async () => {
                    await uow.withTransaction(async ({ products }) => {
                         const product = await products.get(sku);
                         product?.allocate({ orderId, sku, quantity: 1 });
                    });
                    // Let the other scope commit before draining
                    await new Promise((resolve) => setImmediate(resolve));
                    return uow.collectNewEvents().map((event) => event.type + ':' + event.sku);
               });

          const [chair, lamp] = await Promise.all([run('CHAIR', 'o1'), run('LAMP', 'o2')]);

          expect(chair).toEqual(['Allocated:CHAIR']);
          expect(lamp).toEqual(['Allocated:LAMP']);
          expect(uow.collectNewEvents()).toEqual([]);
     });

     it('should release the session when rollback itself fails', async () => {
          const release = jest.fn();
          const failing = new (class extends FakeUnitOfWork {
               protected async openSession() {
                    const session = await super.openSession();
                    return {
                         ...session,
                         rollback: async () => {
                              throw new Error('connection lost');
                         },
                         release,
                    };
               }
          })();

          await expect(
               failing.withTransaction(async () => {
                    throw new Error('work failed');
               })
          ).rejects.toThrow('work failed');
          expect(release).toHaveBeenCalledTimes(1);
     });
});
