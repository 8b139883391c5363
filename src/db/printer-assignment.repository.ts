import crypto from 'node:crypto';
import type { SqliteDatabase } from './database';
import { toSqliteBoolean } from './database';
import type { AssignmentLevel, CreateAssignmentDto, PrinterAssignment } from '../models/printer.dto';

interface PrinterAssignmentRow {
  id: string;
  printer_id: string;
  level: AssignmentLevel;
  target_id: string;
  target_name: string;
  priority: number;
  is_active: number;
  created_at: string;
}

function toAssignment(row: PrinterAssignmentRow): PrinterAssignment {
  return {
    id: row.id,
    printerId: row.printer_id,
    level: row.level,
    targetId: row.target_id,
    targetName: row.target_name,
    priority: row.priority,
    isActive: row.is_active === 1,
    createdAt: new Date(row.created_at),
  };
}

export class PrinterAssignmentRepository {
  constructor(private readonly db: SqliteDatabase) {}

  findAll(): PrinterAssignment[] {
    return this.db
      .prepare<[], PrinterAssignmentRow>(`
        SELECT * FROM printer_assignments
        ORDER BY priority DESC, created_at ASC, id ASC
      `)
      .all()
      .map(toAssignment);
  }

  /**
   * Inserts an assignment unless the same (printer, level, target) already exists.
   * Returns null for the duplicate case.
   */
  create(data: CreateAssignmentDto, at: Date): PrinterAssignment | null {
    const assignment: PrinterAssignment = {
      id: crypto.randomUUID(),
      printerId: data.printerId,
      level: data.level,
      targetId: data.targetId,
      targetName: data.targetName,
      priority: data.priority ?? 0,
      isActive: true,
      createdAt: at,
    };

    const result = this.db
      .prepare<[string, string, string, string, string, number, number, string]>(`
        INSERT OR IGNORE INTO printer_assignments (
          id, printer_id, level, target_id, target_name, priority, is_active, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        assignment.id,
        assignment.printerId,
        assignment.level,
        assignment.targetId,
        assignment.targetName,
        assignment.priority,
        toSqliteBoolean(assignment.isActive),
        at.toISOString(),
      );

    return result.changes > 0 ? assignment : null;
  }
}
