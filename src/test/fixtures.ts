import { openDatabase, type SqliteDatabase } from '../db/database';
import { createLogger } from '../utils/logger';
import type { AssignmentLevel, PrinterConnection } from '../models/printer.dto';

/**
 * Shared test fixture data and seeding helpers for an in-memory database.
 */

export const TEST_NOW = new Date('2026-03-14T18:30:00.000Z');

export const silentLogger = createLogger({ silent: true });

export const ACTOR = { id: 'server-7', name: 'Dana' };

export function createTestDatabase(): SqliteDatabase {
  return openDatabase(':memory:');
}

export interface SeedPrinter {
  id: string;
  name: string;
  host?: string;
  port?: number;
  isActive?: boolean;
  priority?: number;
  connection?: PrinterConnection;
}

export function seedPrinter(db: SqliteDatabase, printer: SeedPrinter): void {
  db.prepare(`
    INSERT INTO printer_targets (id, name, host, port, is_active, priority, connection, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    printer.id,
    printer.name,
    printer.host ?? '10.0.0.10',
    printer.port ?? 9100,
    printer.isActive === false ? 0 : 1,
    printer.priority ?? 0,
    printer.connection ?? 'network',
    TEST_NOW.toISOString(),
  );
}

export interface SeedAssignment {
  id: string;
  printerId: string;
  level: AssignmentLevel;
  targetId: string;
  targetName?: string;
  priority?: number;
  isActive?: boolean;
  createdAt?: Date;
}

export function seedAssignment(db: SqliteDatabase, assignment: SeedAssignment): void {
  db.prepare(`
    INSERT INTO printer_assignments (id, printer_id, level, target_id, target_name, priority, is_active, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    assignment.id,
    assignment.printerId,
    assignment.level,
    assignment.targetId,
    assignment.targetName ?? assignment.targetId,
    assignment.priority ?? 0,
    assignment.isActive === false ? 0 : 1,
    (assignment.createdAt ?? TEST_NOW).toISOString(),
  );
}

export interface SeedOrder {
  id: string;
  orderNumber: string;
  tableLabel?: string | null;
  customerName?: string | null;
  serverName?: string | null;
  isUrgent?: boolean;
  priority?: number;
}

export interface SeedItem {
  id: string;
  menuItemId: string;
  menuItemName: string;
  categoryId?: string | null;
  quantity?: number;
  variant?: string | null;
  modifiers?: string[];
  specialInstructions?: string | null;
  notes?: string | null;
  sentToKitchen?: boolean;
}

export function seedOrder(db: SqliteDatabase, order: SeedOrder, items: SeedItem[]): void {
  db.prepare(`
    INSERT INTO orders (id, order_number, table_label, customer_name, server_name, is_urgent, priority, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    order.id,
    order.orderNumber,
    order.tableLabel ?? null,
    order.customerName ?? null,
    order.serverName ?? null,
    order.isUrgent ? 1 : 0,
    order.priority ?? 0,
    TEST_NOW.toISOString(),
    TEST_NOW.toISOString(),
  );

  const insertItem = db.prepare(`
    INSERT INTO order_items (
      id, order_id, position, menu_item_id, menu_item_name, category_id, quantity,
      variant, modifiers, special_instructions, notes, sent_to_kitchen
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  items.forEach((item, position) => {
    insertItem.run(
      item.id,
      order.id,
      position,
      item.menuItemId,
      item.menuItemName,
      item.categoryId ?? null,
      item.quantity ?? 1,
      item.variant ?? null,
      JSON.stringify(item.modifiers ?? []),
      item.specialInstructions ?? null,
      item.notes ?? null,
      item.sentToKitchen ? 1 : 0,
    );
  });
}

export const PRINTERS = {
  kitchen: { id: 'printer-kitchen', name: 'Kitchen', host: '10.0.0.21', priority: 2 },
  bar: { id: 'printer-bar', name: 'Bar', host: '10.0.0.22', priority: 1 },
} as const;

/**
 * Order #42: A goes to Kitchen (priority 2) and Bar (priority 1), B to
 * Kitchen only, C has no assignment until `assignItemC` is called.
 */
export function seedOrder42(db: SqliteDatabase): void {
  seedPrinter(db, PRINTERS.kitchen);
  seedPrinter(db, PRINTERS.bar);

  seedAssignment(db, { id: 'assign-a-kitchen', printerId: PRINTERS.kitchen.id, level: 'item', targetId: 'menu-a', priority: 2 });
  seedAssignment(db, { id: 'assign-a-bar', printerId: PRINTERS.bar.id, level: 'item', targetId: 'menu-a', priority: 1 });
  seedAssignment(db, { id: 'assign-b-kitchen', printerId: PRINTERS.kitchen.id, level: 'item', targetId: 'menu-b', priority: 2 });

  seedOrder(
    db,
    { id: 'order-42', orderNumber: '42', tableLabel: 'T4', customerName: null, serverName: 'Dana' },
    [
      { id: 'item-a', menuItemId: 'menu-a', menuItemName: 'A', quantity: 2 },
      { id: 'item-b', menuItemId: 'menu-b', menuItemName: 'B' },
      { id: 'item-c', menuItemId: 'menu-c', menuItemName: 'C' },
    ],
  );
}

export function assignItemC(db: SqliteDatabase): void {
  seedAssignment(db, { id: 'assign-c-kitchen', printerId: PRINTERS.kitchen.id, level: 'item', targetId: 'menu-c', priority: 2 });
}
