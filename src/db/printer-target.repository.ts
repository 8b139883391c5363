import type { SqliteDatabase } from './database';
import { parseDate } from './database';
import type { PrinterConnection, PrinterTarget } from '../models/printer.dto';

interface PrinterTargetRow {
  id: string;
  name: string;
  host: string;
  port: number;
  is_active: number;
  priority: number;
  connection: PrinterConnection;
  last_connected_at: string | null;
}

function toPrinterTarget(row: PrinterTargetRow): PrinterTarget {
  return {
    id: row.id,
    name: row.name,
    host: row.host,
    port: row.port,
    isActive: row.is_active === 1,
    priority: row.priority,
    connection: row.connection,
    lastConnectedAt: parseDate(row.last_connected_at),
  };
}

export class PrinterTargetRepository {
  constructor(private readonly db: SqliteDatabase) {}

  findById(printerId: string): PrinterTarget | null {
    const row = this.db
      .prepare<[string], PrinterTargetRow>('SELECT * FROM printer_targets WHERE id = ?')
      .get(printerId);
    return row ? toPrinterTarget(row) : null;
  }

  findActive(): PrinterTarget[] {
    return this.db
      .prepare<[], PrinterTargetRow>(`
        SELECT * FROM printer_targets
        WHERE is_active = 1
        ORDER BY priority DESC, name ASC
      `)
      .all()
      .map(toPrinterTarget);
  }

  findAll(): PrinterTarget[] {
    return this.db
      .prepare<[], PrinterTargetRow>('SELECT * FROM printer_targets ORDER BY priority DESC, name ASC')
      .all()
      .map(toPrinterTarget);
  }

  touchLastConnected(printerId: string, at: Date): void {
    this.db
      .prepare<[string, string]>('UPDATE printer_targets SET last_connected_at = ? WHERE id = ?')
      .run(at.toISOString(), printerId);
  }
}
