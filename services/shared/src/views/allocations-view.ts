import { PoolClient } from 'pg';
import type { AllocationsViewStore } from '../unit-of-work/unit-of-work';
import type { AllocationRecord, AllocationSummary } from '../types/allocation.types';

export class PgAllocationsView implements AllocationsViewStore {
     constructor(private readonly client: PoolClient) {}

     async insert(record: AllocationRecord): Promise<void> {
          // (order_id, sku) is the primary key; a redelivered Allocated is ignored
          await this.client.query(
               `
      INSERT INTO allocations_view (order_id, sku, batch_reference)
      VALUES ($1, $2, $3)
      ON CONFLICT (order_id, sku) DO NOTHING
    `,
               [record.orderId, record.sku, record.batchReference]
          );

          await this.client.query(
               `
      INSERT INTO allocations_view_order (order_id)
      VALUES ($1)
      ON CONFLICT (order_id) DO NOTHING
    `,
               [record.orderId]
          );
     }

     async remove(orderId: string, sku: string): Promise<void> {
          await this.client.query(`DELETE FROM allocations_view WHERE order_id = $1 AND sku = $2`, [
               orderId,
               sku,
          ]);
     }

     async findByOrder(orderId: string): Promise<AllocationSummary[]> {
          const { rows } = await this.client.query<{ sku: string; batch_reference: string }>(
               `
      SELECT sku, batch_reference
      FROM allocations_view
      WHERE order_id = $1
      ORDER BY sku
    `,
               [orderId]
          );

          return rows.map((row) => ({ sku: row.sku, batchReference: row.batch_reference }));
     }

     async hasOrder(orderId: string): Promise<boolean> {
          const { rows } = await this.client.query(
               `SELECT 1 FROM allocations_view_order WHERE order_id = $1`,
               [orderId]
          );
          return rows.length > 0;
     }

     async clear(): Promise<void> {
          await this.client.query('DELETE FROM allocations_view');
          await this.client.query('DELETE FROM allocations_view_order');
     }
}
