import type { Logger } from 'winston';
import type { KitchenAuditEntry } from '../models/audit.dto';

/**
 * Write-only record of who sent which item to which printer
 */
export interface KitchenAuditSink {
  record(entry: KitchenAuditEntry): void;
}

export class LoggerKitchenAuditSink implements KitchenAuditSink {
  constructor(private readonly logger: Logger) {}

  record(entry: KitchenAuditEntry): void {
    this.logger.info('Kitchen dispatch audit', {
      ...entry,
      at: entry.at.toISOString(),
    });
  }
}
