import type { PrinterSnapshot } from './printer.dto';

export type ValidationFailureKind =
  | 'no_items'
  | 'all_items_sent'
  | 'missing_assignments'
  | 'printers_offline'
  | 'no_printers_found'
  | 'no_printers_configured'
  | 'configuration_issues'
  | 'service_not_ready'
  | 'system_error';

export type TransmissionFailureKind = 'timeout' | 'network_error' | 'non_success_status';

export type DispatchFailureKind = ValidationFailureKind | 'already_in_flight' | 'order_not_found';

export type DispatchPhase =
  | 'idle'
  | 'detecting'
  | 'validating'
  | 'segregating'
  | 'marking_sent'
  | 'dispatching'
  | 'aggregating'
  | 'complete';

export interface ValidationSummary {
  totalItems: number;
  newItems: number;
  requiredPrinters: number;
  orderNumber: string;
  validatedAt: string;
}

export interface ValidationFailureDetails {
  unassignedItems?: string[];
  offlinePrinters?: string[];
  onlinePrinters?: string[];
  issues?: string[];
  totalItems?: number;
}

export type ValidationResult =
  | { isValid: true; message: string; details: ValidationSummary }
  | { isValid: false; message: string; kind: ValidationFailureKind; details?: ValidationFailureDetails };

export type TransmissionResult =
  | { ok: true }
  | { ok: false; kind: TransmissionFailureKind; error: string };

export interface TicketItem {
  itemId: string;
  name: string;
  quantity: number;
  variant: string | null;
  modifiers: string[];
  specialInstructions: string | null;
  notes: string | null;
}

export interface DispatchJob {
  id: string;
  orderId: string;
  orderNumber: string;
  printer: PrinterSnapshot;
  items: TicketItem[];
  content: string;
  priority: number;
  attempt: number;
  createdAt: Date;
}

export type PendingEntryStatus = 'pending' | 'dead_letter';

export interface PendingQueueEntry {
  id: string;
  job: DispatchJob;
  status: PendingEntryStatus;
  attempts: number;
  lastError: string | null;
  lastFailureKind: TransmissionFailureKind | null;
  enqueuedAt: Date;
  nextAttemptAt: Date;
  updatedAt: Date;
}

export type DeliveryState = 'committed' | 'delivered' | 'failed';

export interface DeliveryRecord {
  orderId: string;
  itemId: string;
  printerId: string;
  jobId: string;
  state: DeliveryState;
  updatedAt: Date;
}

export type DispatchOutcome = 'delivered' | 'partial' | 'queued' | 'rejected';

export interface DispatchResult {
  success: boolean;
  outcome: DispatchOutcome;
  message: string;
  itemsSent: number;
  printerCount: number;
  perTargetResults: Record<string, boolean>;
  queuedEntryIds: string[];
  failureKind?: DispatchFailureKind;
  details?: ValidationFailureDetails;
}

export interface DispatchStatistics {
  totalItemsSent: number;
  totalOrdersSent: number;
  lastSuccessfulSendAt: string | null;
  printerSuccessCount: Record<string, number>;
  printerFailureCount: Record<string, number>;
  inFlightOrders: string[];
}

export interface DrainSummary {
  skipped: boolean;
  scanned: number;
  delivered: number;
  rescheduled: number;
  deadLettered: number;
}
