export type PrinterConnection = 'network' | 'relay';
export type AssignmentLevel = 'item' | 'category';

export interface PrinterTarget {
  id: string;
  name: string;
  host: string;
  port: number;
  isActive: boolean;
  priority: number;
  connection: PrinterConnection;
  lastConnectedAt: Date | null;
}

export interface PrinterAddress {
  host: string;
  port: number;
}

/**
 * The subset of a printer a dispatch job carries with it, so a replay
 * does not depend on the printer still being configured.
 */
export interface PrinterSnapshot extends PrinterAddress {
  id: string;
  name: string;
  connection: PrinterConnection;
}

export interface PrinterAssignment {
  id: string;
  printerId: string;
  level: AssignmentLevel;
  targetId: string;
  targetName: string;
  priority: number;
  isActive: boolean;
  createdAt: Date;
}

export interface CreateAssignmentDto {
  printerId: string;
  level: AssignmentLevel;
  targetId: string;
  targetName: string;
  priority?: number;
}

export interface CategoryRef {
  id: string;
  name: string;
}
