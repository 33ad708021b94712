import { PoolClient } from 'pg';
import { PgProductRepository } from '@allocation/shared/src/db/product-repository';
import { Batch, Product } from '@allocation/shared/src/domain/model';
import { ConcurrencyError } from '@allocation/shared/src/utils/errors';

function sqlOf(text: unknown): string {
     return typeof text === 'string' ? text.replace(/\s+/g, ' ').trim() : '';
}

describe('PgProductRepository (Unit)', () => {
     let mockClient: jest.Mocked<PoolClient>;
     let repository: PgProductRepository;

     beforeEach(() => {
          mockClient = {
               query: jest.fn(),
          } as unknown as jest.Mocked<PoolClient>;
          repository = new PgProductRepository(mockClient);
     });

     function mockStoredChair() {
          mockClient.query.mockResolvedValueOnce({
               rows: [{ sku: 'CHAIR', version_number: 3 }],
          } as never);
          mockClient.query.mockResolvedValueOnce({
               rows: [
                    { id: 1, reference: 'b1', purchased_quantity: 10, eta: null },
                    { id: 2, reference: 'b2', purchased_quantity: 5, eta: '2026-11-01' },
               ],
          } as never);
          mockClient.query.mockResolvedValueOnce({
               rows: [{ batch_id: 1, order_id: 'o1', sku: 'CHAIR', quantity: 2 }],
          } as never);
     }

     describe('get', () => {
          it('should return undefined for an unknown sku', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);

               expect(await repository.get('GHOST')).toBeUndefined();
               expect(repository.seen).toEqual([]);
          });

          it('should lock the product row and rebuild its batches', async () => {
               mockStoredChair();

               const product = await repository.get('CHAIR');

               expect(sqlOf(mockClient.query.mock.calls[0][0])).toBe(
                    'SELECT sku, version_number FROM products WHERE sku = $1 FOR UPDATE'
               );
               expect(product?.versionNumber).toBe(3);
               expect(product?.findBatch('b1')?.availableQuantity).toBe(8);
               expect(product?.findBatch('b1')?.orderLines).toEqual([
                    { orderId: 'o1', sku: 'CHAIR', quantity: 2 },
               ]);
               expect(product?.findBatch('b2')?.eta).toBe('2026-11-01');
               expect(repository.seen).toEqual([product]);
          });

          it('should hand back the tracked instance on a second read', async () => {
               mockStoredChair();

               const first = await repository.get('CHAIR');
               const second = await repository.get('CHAIR');

               expect(second).toBe(first);
               expect(mockClient.query).toHaveBeenCalledTimes(3);
          });
     });

     describe('getByBatchReference', () => {
          it('should resolve the owning product', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [{ sku: 'CHAIR' }] } as never);
               mockStoredChair();

               const product = await repository.getByBatchReference('b2');

               expect(product?.sku).toBe('CHAIR');
               expect(mockClient.query.mock.calls[0][1]).toEqual(['b2']);
          });

          it('should return undefined for an unknown reference', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);

               expect(await repository.getByBatchReference('ghost')).toBeUndefined();
          });
     });

     describe('save', () => {
          it('should insert a new product with its batches', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [], rowCount: 1 } as never);
               mockClient.query.mockResolvedValueOnce({ rows: [{ id: 7 }], rowCount: 1 } as never);
               mockClient.query.mockResolvedValueOnce({ rows: [], rowCount: 0 } as never);
               const product = new Product('CHAIR', [new Batch('b1', 'CHAIR', 10)], 1);
               await repository.add(product);

               await repository.save(product);

               expect(mockClient.query).toHaveBeenCalledTimes(3);
               expect(mockClient.query.mock.calls[0][1]).toEqual(['CHAIR', 1]);
               expect(mockClient.query.mock.calls[1][1]).toEqual(['b1', 'CHAIR', 10, null]);
               expect(mockClient.query.mock.calls[2][1]).toEqual([[7]]);
          });

          it('should fail when another transaction created the product first', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [], rowCount: 0 } as never);
               const product = new Product('CHAIR', [], 1);
               await repository.add(product);

               await expect(repository.save(product)).rejects.toThrow(ConcurrencyError);
          });

          it('should skip products that did not change', async () => {
               mockStoredChair();
               const product = await repository.get('CHAIR');
               if (!product) throw new Error('product not loaded');

               await repository.save(product);

               expect(mockClient.query).toHaveBeenCalledTimes(3);
          });

          it('should rewrite batches and lines under a version check', async () => {
               mockStoredChair();
               const product = await repository.get('CHAIR');
               if (!product) throw new Error('product not loaded');
               product.allocate({ orderId: 'o2', sku: 'CHAIR', quantity: 1 });
               mockClient.query.mockResolvedValue({ rows: [{ id: 1 }], rowCount: 1 } as never);

               await repository.save(product);

               const writes = mockClient.query.mock.calls.slice(3);
               expect(sqlOf(writes[0][0])).toBe(
                    'UPDATE products SET version_number = $2 WHERE sku = $1 AND version_number = $3'
               );
               expect(writes[0][1]).toEqual(['CHAIR', 4, 3]);
               expect(sqlOf(writes[3][0])).toBe(
                    'DELETE FROM allocations WHERE batch_id = ANY($1::bigint[])'
               );
               expect(writes.slice(4).map((call) => call[1])).toEqual([
                    [1, 'o1', 'CHAIR', 2],
                    [1, 'o2', 'CHAIR', 1],
               ]);
          });

          it('should fail when the stored version moved on', async () => {
               mockStoredChair();
               const product = await repository.get('CHAIR');
               if (!product) throw new Error('product not loaded');
               product.changeBatchQuantity('b2', 6);
               mockClient.query.mockResolvedValueOnce({ rows: [], rowCount: 0 } as never);

               await expect(repository.save(product)).rejects.toThrow(ConcurrencyError);
          });
     });
});
