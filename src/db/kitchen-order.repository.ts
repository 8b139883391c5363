import { z } from 'zod';
import type { SqliteDatabase } from './database';
import type { CommittedDelivery, DeliveryLedgerRepository } from './delivery-ledger.repository';
import type { KitchenOrder, KitchenOrderItem } from '../models/kitchen-order.dto';

interface OrderRow {
  id: string;
  order_number: string;
  table_label: string | null;
  customer_name: string | null;
  server_name: string | null;
  is_urgent: number;
  priority: number;
  created_at: string;
}

interface OrderItemRow {
  id: string;
  menu_item_id: string;
  menu_item_name: string;
  category_id: string | null;
  quantity: number;
  variant: string | null;
  modifiers: string;
  special_instructions: string | null;
  notes: string | null;
  sent_to_kitchen: number;
}

const ModifiersSchema = z.array(z.string());

function parseModifiers(raw: string): string[] {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return [];
  }
  const parsed = ModifiersSchema.safeParse(value);
  return parsed.success ? parsed.data : [];
}

function toOrderItem(row: OrderItemRow): KitchenOrderItem {
  return {
    id: row.id,
    menuItemId: row.menu_item_id,
    menuItemName: row.menu_item_name,
    categoryId: row.category_id,
    quantity: row.quantity,
    variant: row.variant,
    modifiers: parseModifiers(row.modifiers),
    specialInstructions: row.special_instructions,
    notes: row.notes,
    sentToKitchen: row.sent_to_kitchen === 1,
  };
}

/**
 * Read access to orders plus the single write this service owns:
 * flipping `sent_to_kitchen` from 0 to 1.
 */
export class KitchenOrderRepository {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly ledger: DeliveryLedgerRepository,
  ) {}

  findById(orderId: string): KitchenOrder | null {
    const order = this.db
      .prepare<[string], OrderRow>('SELECT * FROM orders WHERE id = ?')
      .get(orderId);

    if (!order) {
      return null;
    }

    const items = this.db
      .prepare<[string], OrderItemRow>(`
        SELECT * FROM order_items
        WHERE order_id = ?
        ORDER BY position ASC, id ASC
      `)
      .all(orderId)
      .map(toOrderItem);

    return {
      id: order.id,
      orderNumber: order.order_number,
      tableLabel: order.table_label,
      customerName: order.customer_name,
      serverName: order.server_name,
      isUrgent: order.is_urgent === 1,
      priority: order.priority,
      createdAt: new Date(order.created_at),
      items,
    };
  }

  /**
   * Marks items sent and records the committed deliveries in one transaction.
   * Returns the number of items that actually flipped.
   */
  markItemsSent(
    orderId: string,
    itemIds: string[],
    deliveries: CommittedDelivery[],
    actorId: string,
    at: Date,
  ): number {
    const markItem = this.db.prepare<[string, string, string, string]>(`
      UPDATE order_items
      SET sent_to_kitchen = 1, sent_by = ?, sent_at = ?
      WHERE id = ? AND order_id = ? AND sent_to_kitchen = 0
    `);
    const touchOrder = this.db.prepare<[string, string]>('UPDATE orders SET updated_at = ? WHERE id = ?');

    return this.db.transaction(() => {
      let changed = 0;
      for (const itemId of itemIds) {
        changed += markItem.run(actorId, at.toISOString(), itemId, orderId).changes;
      }
      this.ledger.commit(orderId, deliveries, at);
      touchOrder.run(at.toISOString(), orderId);
      return changed;
    })();
  }
}
