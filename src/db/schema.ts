import type { SqliteDatabase } from './database';

/**
 * Tables this service reads or writes. `orders`, `order_items`,
 * `printer_targets` and `printer_assignments` are owned by the POS
 * configuration and ordering modules; they are declared here so a fresh
 * database (and every test) starts with the same shape.
 */

export const CREATE_ORDERS_TABLE = `
  CREATE TABLE IF NOT EXISTS orders (
    id TEXT PRIMARY KEY,
    order_number TEXT NOT NULL,
    table_label TEXT,
    customer_name TEXT,
    server_name TEXT,
    is_urgent INTEGER NOT NULL DEFAULT 0,
    priority INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )
`;

export const CREATE_ORDER_ITEMS_TABLE = `
  CREATE TABLE IF NOT EXISTS order_items (
    id TEXT PRIMARY KEY,
    order_id TEXT NOT NULL,
    position INTEGER NOT NULL DEFAULT 0,
    menu_item_id TEXT NOT NULL,
    menu_item_name TEXT NOT NULL,
    category_id TEXT,
    quantity INTEGER NOT NULL DEFAULT 1,
    variant TEXT,
    modifiers TEXT NOT NULL DEFAULT '[]',
    special_instructions TEXT,
    notes TEXT,
    sent_to_kitchen INTEGER NOT NULL DEFAULT 0,
    sent_by TEXT,
    sent_at TEXT,
    FOREIGN KEY (order_id) REFERENCES orders(id) ON DELETE CASCADE
  )
`;

export const CREATE_PRINTER_TARGETS_TABLE = `
  CREATE TABLE IF NOT EXISTS printer_targets (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    host TEXT NOT NULL,
    port INTEGER NOT NULL DEFAULT 9100,
    is_active INTEGER NOT NULL DEFAULT 1,
    priority INTEGER NOT NULL DEFAULT 0,
    connection TEXT NOT NULL DEFAULT 'network' CHECK (connection IN ('network', 'relay')),
    last_connected_at TEXT,
    created_at TEXT NOT NULL
  )
`;

export const CREATE_PRINTER_ASSIGNMENTS_TABLE = `
  CREATE TABLE IF NOT EXISTS printer_assignments (
    id TEXT PRIMARY KEY,
    printer_id TEXT NOT NULL,
    level TEXT NOT NULL CHECK (level IN ('item', 'category')),
    target_id TEXT NOT NULL,
    target_name TEXT NOT NULL,
    priority INTEGER NOT NULL DEFAULT 0,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    UNIQUE (printer_id, level, target_id),
    FOREIGN KEY (printer_id) REFERENCES printer_targets(id) ON DELETE CASCADE
  )
`;

export const CREATE_DISPATCH_DELIVERIES_TABLE = `
  CREATE TABLE IF NOT EXISTS dispatch_deliveries (
    order_id TEXT NOT NULL,
    item_id TEXT NOT NULL,
    printer_id TEXT NOT NULL,
    job_id TEXT NOT NULL,
    state TEXT NOT NULL CHECK (state IN ('committed', 'delivered', 'failed')),
    updated_at TEXT NOT NULL,
    PRIMARY KEY (order_id, item_id, printer_id)
  )
`;

export const CREATE_PENDING_DISPATCH_JOBS_TABLE = `
  CREATE TABLE IF NOT EXISTS pending_dispatch_jobs (
    id TEXT PRIMARY KEY,
    job_id TEXT NOT NULL UNIQUE,
    order_id TEXT NOT NULL,
    printer_id TEXT NOT NULL,
    payload TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'dead_letter')),
    attempts INTEGER NOT NULL DEFAULT 0,
    last_error TEXT,
    last_failure_kind TEXT,
    enqueued_at TEXT NOT NULL,
    next_attempt_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )
`;

export const CREATE_INDEXES = `
  CREATE INDEX IF NOT EXISTS idx_order_items_order_id ON order_items(order_id, position);
  CREATE INDEX IF NOT EXISTS idx_printer_assignments_target ON printer_assignments(level, target_id);
  CREATE INDEX IF NOT EXISTS idx_dispatch_deliveries_job_id ON dispatch_deliveries(job_id);
  CREATE INDEX IF NOT EXISTS idx_pending_dispatch_jobs_due ON pending_dispatch_jobs(status, next_attempt_at);
`;

export const ALL_SCHEMA = [
  CREATE_ORDERS_TABLE,
  CREATE_ORDER_ITEMS_TABLE,
  CREATE_PRINTER_TARGETS_TABLE,
  CREATE_PRINTER_ASSIGNMENTS_TABLE,
  CREATE_DISPATCH_DELIVERIES_TABLE,
  CREATE_PENDING_DISPATCH_JOBS_TABLE,
  CREATE_INDEXES,
];

export function applySchema(db: SqliteDatabase): void {
  db.transaction(() => {
    for (const statement of ALL_SCHEMA) {
      db.exec(statement);
    }
  })();
}
