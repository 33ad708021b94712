import { PoolClient } from 'pg';
import { Batch, Product } from '../domain/model';
import type { ProductRepository } from '../unit-of-work/unit-of-work';
import { ConcurrencyError } from '../utils/errors';
import { logger } from '../utils/logger';

export class PgProductRepository implements ProductRepository {
     private readonly tracked: Product[] = [];
     // Version each product had when loaded; absent for products added in this session
     private readonly loadedVersions = new Map<Product, number>();

     constructor(private readonly client: PoolClient) {}

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

          const { rows: products } = await this.client.query<{
               sku: string;
               version_number: number;
          }>(
               `
      SELECT sku, version_number
      FROM products
      WHERE sku = $1
      FOR UPDATE
    `,
               [sku]
          );

          if (products.length === 0) {
               return undefined;
          }

          const { rows: batchRows } = await this.client.query<{
               id: number;
               reference: string;
               purchased_quantity: number;
               eta: string | null;
          }>(
               `
      SELECT id, reference, purchased_quantity, eta
      FROM batches
      WHERE sku = $1
      ORDER BY id
    `,
               [sku]
          );

          const { rows: allocationRows } = await this.client.query<{
               batch_id: number;
               order_id: string;
               sku: string;
               quantity: number;
          }>(
               `
      SELECT a.batch_id, a.order_id, a.sku, a.quantity
      FROM allocations a
      JOIN batches b ON b.id = a.batch_id
      WHERE b.sku = $1
      ORDER BY a.id
    `,
               [sku]
          );

          const batches = batchRows.map(
               (row) =>
                    new Batch(
                         row.reference,
                         sku,
                         row.purchased_quantity,
                         row.eta,
                         allocationRows
                              .filter((a) => a.batch_id === row.id)
                              .map((a) => ({
                                   orderId: a.order_id,
                                   sku: a.sku,
                                   quantity: a.quantity,
                              }))
                    )
          );

          const product = new Product(sku, batches, products[0].version_number);
          this.loadedVersions.set(product, product.versionNumber);
          this.track(product);
          return product;
     }

     async getByBatchReference(reference: string): Promise<Product | undefined> {
          const { rows } = await this.client.query<{ sku: string }>(
               `SELECT sku FROM batches WHERE reference = $1`,
               [reference]
          );
          if (rows.length === 0) {
               return undefined;
          }
          return this.get(rows[0].sku);
     }

     /**
      * Writes a tracked product back. The version check fails with
      * ConcurrencyError when another transaction saved the product first.
      */
     async save(product: Product): Promise<void> {
          const loadedVersion = this.loadedVersions.get(product);

          if (loadedVersion === undefined) {
               const { rowCount } = await this.client.query(
                    `
        INSERT INTO products (sku, version_number)
        VALUES ($1, $2)
        ON CONFLICT (sku) DO NOTHING
      `,
                    [product.sku, product.versionNumber]
               );
               if (rowCount === 0) {
                    throw new ConcurrencyError(product.sku);
               }
          } else if (loadedVersion !== product.versionNumber) {
               const { rowCount } = await this.client.query(
                    `
        UPDATE products
        SET version_number = $2
        WHERE sku = $1 AND version_number = $3
      `,
                    [product.sku, product.versionNumber, loadedVersion]
               );
               if (rowCount === 0) {
                    throw new ConcurrencyError(product.sku);
               }
          } else {
               return;
          }

          const batchIds = new Map<Batch, number>();
          for (const batch of product.batches) {
               const { rows } = await this.client.query<{ id: number }>(
                    `
        INSERT INTO batches (reference, sku, purchased_quantity, eta)
        VALUES ($1, $2, $3, $4)
        ON CONFLICT (reference) DO UPDATE
        SET purchased_quantity = EXCLUDED.purchased_quantity
        RETURNING id
      `,
                    [batch.reference, product.sku, batch.purchasedQuantity, batch.eta]
               );
               batchIds.set(batch, rows[0].id);
          }

          // Lines can move between batches, so clear every batch before re-inserting
          await this.client.query(`DELETE FROM allocations WHERE batch_id = ANY($1::bigint[])`, [
               [...batchIds.values()],
          ]);

          for (const [batch, batchId] of batchIds) {
               for (const line of batch.orderLines) {
                    await this.client.query(
                         `
          INSERT INTO allocations (batch_id, order_id, sku, quantity)
          VALUES ($1, $2, $3, $4)
        `,
                         [batchId, line.orderId, line.sku, line.quantity]
                    );
               }
          }

          this.loadedVersions.set(product, product.versionNumber);
          logger.debug(
               { sku: product.sku, versionNumber: product.versionNumber },
               'Product saved'
          );
     }

     private track(product: Product): void {
          if (!this.tracked.includes(product)) {
               this.tracked.push(product);
          }
     }
}
