import type { SqliteDatabase } from './database';
import type { DeliveryRecord, DeliveryState } from '../models/dispatch.dto';

interface DeliveryRow {
  order_id: string;
  item_id: string;
  printer_id: string;
  job_id: string;
  state: DeliveryState;
  updated_at: string;
}

export interface CommittedDelivery {
  itemId: string;
  printerId: string;
  jobId: string;
}

function toRecord(row: DeliveryRow): DeliveryRecord {
  return {
    orderId: row.order_id,
    itemId: row.item_id,
    printerId: row.printer_id,
    jobId: row.job_id,
    state: row.state,
    updatedAt: new Date(row.updated_at),
  };
}

/**
 * Per (item, printer) delivery state. `committed` is the logical intent written
 * alongside `sentToKitchen`; `delivered` / `failed` is what the printer side did.
 */
export class DeliveryLedgerRepository {
  constructor(private readonly db: SqliteDatabase) {}

  commit(orderId: string, deliveries: CommittedDelivery[], at: Date): void {
    const stmt = this.db.prepare<[string, string, string, string, string]>(`
      INSERT OR REPLACE INTO dispatch_deliveries (order_id, item_id, printer_id, job_id, state, updated_at)
      VALUES (?, ?, ?, ?, 'committed', ?)
    `);

    for (const delivery of deliveries) {
      stmt.run(orderId, delivery.itemId, delivery.printerId, delivery.jobId, at.toISOString());
    }
  }

  /**
   * A delivered record never moves back to `failed`: a late failure report
   * for a job the printer already confirmed is ignored.
   */
  markJob(jobId: string, state: Exclude<DeliveryState, 'committed'>, at: Date): number {
    const result = this.db
      .prepare<[string, string, string]>(`
        UPDATE dispatch_deliveries
        SET state = ?, updated_at = ?
        WHERE job_id = ? AND state != 'delivered'
      `)
      .run(state, at.toISOString(), jobId);

    return result.changes;
  }

  findByOrder(orderId: string): DeliveryRecord[] {
    return this.db
      .prepare<[string], DeliveryRow>(`
        SELECT * FROM dispatch_deliveries
        WHERE order_id = ?
        ORDER BY printer_id ASC, item_id ASC
      `)
      .all(orderId)
      .map(toRecord);
  }

  findByJob(jobId: string): DeliveryRecord[] {
    return this.db
      .prepare<[string], DeliveryRow>('SELECT * FROM dispatch_deliveries WHERE job_id = ? ORDER BY item_id ASC')
      .all(jobId)
      .map(toRecord);
  }
}
