import type { Logger } from 'winston';
import type { DeliveryLedgerRepository } from '../db/delivery-ledger.repository';
import type { RelayClient } from './relay-client.service';
import type { RelaySession } from './relay-session.service';
import type { RelayFailure, RelayStatusUpdate } from '../validators/relay.validator';
import { errorMessage } from '../utils/logger';
import { RELAY_POLL_INTERVAL_MS } from '../utils/constants';

/**
 * What the reachability check needs to know about relay-connected printers.
 */
export interface RelayPrinterStatusSource {
  isRelayConnected(): boolean;
  /** null when the relay has never reported on this printer */
  isPrinterOnline(printerId: string): boolean | null;
}

export interface RelayPrinterState {
  isOnline: boolean;
  lastActivity: string | null;
}

export interface RelayPollSummary {
  confirmed: number;
  failed: number;
  printersReported: number;
}

export interface RelayMonitorStatistics {
  confirmedJobs: number;
  failedJobs: number;
  lastPollAt: string | null;
  recentFailures: RelayFailure[];
}

const MAX_RECENT_FAILURES = 50;

/**
 * Polls the relay for printer status and delivery confirmations, and settles
 * the delivery ledger for relay jobs.
 */
export class RelayStatusMonitor implements RelayPrinterStatusSource {
  private readonly printers = new Map<string, RelayPrinterState>();
  private readonly recentFailures: RelayFailure[] = [];
  private timer: NodeJS.Timeout | null = null;
  private polling = false;
  private confirmedJobs = 0;
  private failedJobs = 0;
  private lastPollAt: Date | null = null;

  constructor(
    private readonly client: RelayClient,
    private readonly session: RelaySession,
    private readonly ledger: DeliveryLedgerRepository,
    private readonly logger: Logger,
    private readonly pollIntervalMs: number = RELAY_POLL_INTERVAL_MS,
    private readonly now: () => Date = () => new Date(),
  ) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.pollOnce();
    }, this.pollIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRelayConnected(): boolean {
    return this.session.isConnected();
  }

  isPrinterOnline(printerId: string): boolean | null {
    return this.printers.get(printerId)?.isOnline ?? null;
  }

  getPrinterStates(): Record<string, RelayPrinterState> {
    return Object.fromEntries(this.printers);
  }

  getStatistics(): RelayMonitorStatistics {
    return {
      confirmedJobs: this.confirmedJobs,
      failedJobs: this.failedJobs,
      lastPollAt: this.lastPollAt ? this.lastPollAt.toISOString() : null,
      recentFailures: [...this.recentFailures],
    };
  }

  /**
   * One poll. Resolves null when skipped (not connected, or a poll is already running) or when the poll failed.
   */
  async pollOnce(): Promise<RelayPollSummary | null> {
    if (!this.session.isConnected() || this.polling) return null;

    this.polling = true;
    try {
      const update = await this.client.pollStatus();
      this.lastPollAt = this.now();
      if (!update) return { confirmed: 0, failed: 0, printersReported: 0 };
      return this.apply(update);
    } catch (error) {
      this.logger.warn('Relay status poll failed', { error: errorMessage(error) });
      return null;
    } finally {
      this.polling = false;
    }
  }

  private apply(update: RelayStatusUpdate): RelayPollSummary {
    const at = this.now();
    const summary: RelayPollSummary = { confirmed: 0, failed: 0, printersReported: 0 };

    for (const [printerId, status] of Object.entries(update.printerStatus ?? {})) {
      this.printers.set(printerId, { isOnline: status.isOnline, lastActivity: status.lastActivity ?? null });
      summary.printersReported += 1;
    }

    for (const confirmation of update.orderConfirmations ?? []) {
      if (confirmation.success) {
        if (confirmation.jobId) {
          this.ledger.markJob(confirmation.jobId, 'delivered', at);
        }
        this.confirmedJobs += 1;
        summary.confirmed += 1;
        this.logger.info('Relay confirmed print', {
          orderId: confirmation.orderId,
          printerId: confirmation.printerId,
          jobId: confirmation.jobId,
        });
      } else {
        this.recordFailure({ jobId: confirmation.jobId, orderId: confirmation.orderId, printerId: confirmation.printerId }, at);
        summary.failed += 1;
      }
    }

    for (const failure of update.failedOrders ?? []) {
      this.recordFailure(failure, at);
      summary.failed += 1;
    }

    return summary;
  }

  private recordFailure(failure: RelayFailure, at: Date): void {
    if (failure.jobId) {
      this.ledger.markJob(failure.jobId, 'failed', at);
    }
    this.failedJobs += 1;
    this.recentFailures.push(failure);
    if (this.recentFailures.length > MAX_RECENT_FAILURES) {
      this.recentFailures.shift();
    }
    this.logger.error('Relay reported failed print', {
      orderId: failure.orderId,
      printerId: failure.printerId,
      jobId: failure.jobId,
      error: failure.error,
    });
  }
}
