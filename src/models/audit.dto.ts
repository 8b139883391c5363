export type KitchenAuditOutcome = 'delivered' | 'queued' | 'failed';

export interface KitchenAuditEntry {
  orderId: string;
  orderNumber: string;
  itemId: string;
  itemName: string;
  printerId: string;
  printerName: string;
  outcome: KitchenAuditOutcome;
  actorId: string;
  actorName: string;
  at: Date;
}
