import crypto from 'node:crypto';
import type { Logger } from 'winston';
import type { PendingJobRepository } from '../db/pending-job.repository';
import type { DeliveryLedgerRepository } from '../db/delivery-ledger.repository';
import type { PrinterTargetRepository } from '../db/printer-target.repository';
import type {
  DispatchJob,
  DrainSummary,
  PendingQueueEntry,
  TransmissionResult,
} from '../models/dispatch.dto';
import type { KitchenAuditOutcome } from '../models/audit.dto';
import type { KitchenAuditSink } from './kitchen-audit.service';
import { channelConfirmsDelivery, deliverJob, type DispatchChannels } from './dispatch-channel.service';
import { exponentialBackoffMs } from '../utils/backoff';
import { errorMessage } from '../utils/logger';
import {
  DISPATCH_TIMEOUT_MS,
  RETRY_BASE_DELAY_MS,
  RETRY_DRAIN_INTERVAL_MS,
  RETRY_MAX_ATTEMPTS,
  RETRY_MAX_DELAY_MS,
} from '../utils/constants';

export type TransmissionFailure = Extract<TransmissionResult, { ok: false }>;

export interface RetryQueueDeps {
  repository: PendingJobRepository;
  ledger: DeliveryLedgerRepository;
  printers: PrinterTargetRepository;
  channels: DispatchChannels;
  audit: KitchenAuditSink;
  logger: Logger;
}

export interface RetryQueueOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Backoff never exceeds this, so every drain replays each entry it finds */
  drainIntervalMs?: number;
  timeoutMs?: number;
  now?: () => Date;
  random?: () => number;
}

export interface RetryQueueStatistics {
  pending: number;
  deadLetter: number;
  totalReplayed: number;
  totalDeadLettered: number;
  lastDrainAt: string | null;
}

const REPLAY_ACTOR = { id: 'retry-queue', name: 'Retry Queue' };

/**
 * Durable store of dispatch jobs whose delivery failed after their items were
 * committed. Entries are replayed with exponential backoff until they print
 * or run out of attempts.
 *
 * Delays are capped at the drain interval and measured from the start of the
 * drain that scheduled them, so an entry that keeps failing is replayed once
 * per drain cycle.
 */
export class RetryQueueService {
  private draining = false;
  private totalReplayed = 0;
  private totalDeadLettered = 0;
  private lastDrainAt: Date | null = null;

  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly timeoutMs: number;
  private readonly now: () => Date;
  private readonly random: () => number;

  constructor(
    private readonly deps: RetryQueueDeps,
    options: RetryQueueOptions = {},
  ) {
    this.maxAttempts = options.maxAttempts ?? RETRY_MAX_ATTEMPTS;
    this.baseDelayMs = options.baseDelayMs ?? RETRY_BASE_DELAY_MS;
    this.maxDelayMs = Math.min(
      options.maxDelayMs ?? RETRY_MAX_DELAY_MS,
      options.drainIntervalMs ?? RETRY_DRAIN_INTERVAL_MS,
    );
    this.timeoutMs = options.timeoutMs ?? DISPATCH_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
    this.random = options.random ?? Math.random;
  }

  /**
   * Persist a job after its first failed attempt
   */
  enqueue(job: DispatchJob, failure: TransmissionFailure): PendingQueueEntry {
    const now = this.now();
    const entry: PendingQueueEntry = {
      id: crypto.randomUUID(),
      job,
      status: 'pending',
      attempts: 1,
      lastError: failure.error,
      lastFailureKind: failure.kind,
      enqueuedAt: now,
      nextAttemptAt: this.nextAttemptAfter(1, now),
      updatedAt: now,
    };

    this.deps.repository.insert(entry);
    this.deps.logger.warn('Print job queued for retry', {
      entryId: entry.id,
      jobId: job.id,
      orderId: job.orderId,
      printerId: job.printer.id,
      kind: failure.kind,
      nextAttemptAt: entry.nextAttemptAt.toISOString(),
    });
    return entry;
  }

  /**
   * Re-attempt every due entry once. A call made while another drain is
   * running returns immediately with `skipped: true`.
   */
  async drain(): Promise<DrainSummary> {
    const summary: DrainSummary = { skipped: false, scanned: 0, delivered: 0, rescheduled: 0, deadLettered: 0 };
    if (this.draining) {
      return { ...summary, skipped: true };
    }

    this.draining = true;
    try {
      const startedAt = this.now();
      const due = this.deps.repository.findDue(startedAt);
      summary.scanned = due.length;

      for (const entry of due) {
        const outcome = await this.replay(entry, startedAt);
        summary[outcome] += 1;
      }

      this.lastDrainAt = this.now();
      if (summary.scanned > 0) {
        this.deps.logger.info('Retry queue drained', { ...summary });
      }
      return summary;
    } finally {
      this.draining = false;
    }
  }

  listPending(): PendingQueueEntry[] {
    return this.deps.repository.findByStatus('pending');
  }

  listDeadLetter(): PendingQueueEntry[] {
    return this.deps.repository.findByStatus('dead_letter');
  }

  /** Number of entries still waiting to be replayed */
  size(): number {
    return this.deps.repository.count('pending');
  }

  /**
   * Put an entry (usually a dead letter) back in line for an immediate attempt
   * with a fresh attempt budget.
   */
  requeue(entryId: string): PendingQueueEntry | null {
    const entry = this.deps.repository.findById(entryId);
    if (!entry) return null;

    const now = this.now();
    const requeued: PendingQueueEntry = {
      ...entry,
      status: 'pending',
      attempts: 0,
      nextAttemptAt: now,
      updatedAt: now,
    };
    this.deps.repository.update(requeued);
    this.deps.logger.info('Retry queue entry requeued', { entryId, jobId: entry.job.id });
    return requeued;
  }

  discard(entryId: string): boolean {
    const entry = this.deps.repository.findById(entryId);
    if (!entry) return false;

    this.deps.repository.delete(entryId);
    this.deps.ledger.markJob(entry.job.id, 'failed', this.now());
    this.deps.logger.warn('Retry queue entry discarded', { entryId, jobId: entry.job.id });
    return true;
  }

  getStatistics(): RetryQueueStatistics {
    return {
      pending: this.deps.repository.count('pending'),
      deadLetter: this.deps.repository.count('dead_letter'),
      totalReplayed: this.totalReplayed,
      totalDeadLettered: this.totalDeadLettered,
      lastDrainAt: this.lastDrainAt ? this.lastDrainAt.toISOString() : null,
    };
  }

  private async replay(
    entry: PendingQueueEntry,
    drainStartedAt: Date,
  ): Promise<'delivered' | 'rescheduled' | 'deadLettered'> {
    const job: DispatchJob = { ...this.refreshAddress(entry.job), attempt: entry.attempts + 1 };

    let result: TransmissionResult;
    try {
      result = await deliverJob(this.deps.channels, job, this.timeoutMs, this.deps.logger);
    } catch (error) {
      result = { ok: false, kind: 'network_error', error: errorMessage(error) };
    }

    const now = this.now();

    if (result.ok) {
      this.deps.repository.delete(entry.id);
      if (channelConfirmsDelivery(this.deps.channels, job.printer.connection)) {
        this.deps.ledger.markJob(job.id, 'delivered', now);
      }
      this.totalReplayed += 1;
      this.recordAudit(job, 'delivered', now);
      this.deps.logger.info('Queued print job delivered', { entryId: entry.id, jobId: job.id, attempt: job.attempt });
      return 'delivered';
    }

    const attempts = entry.attempts + 1;
    const exhausted = attempts >= this.maxAttempts;
    this.deps.repository.update({
      ...entry,
      job,
      status: exhausted ? 'dead_letter' : 'pending',
      attempts,
      lastError: result.error,
      lastFailureKind: result.kind,
      nextAttemptAt: exhausted ? now : this.nextAttemptAfter(attempts, drainStartedAt),
      updatedAt: now,
    });

    if (exhausted) {
      this.deps.ledger.markJob(job.id, 'failed', now);
      this.totalDeadLettered += 1;
      this.recordAudit(job, 'failed', now);
      this.deps.logger.error('Print job moved to dead letter', {
        entryId: entry.id,
        jobId: job.id,
        printerId: job.printer.id,
        attempts,
        error: result.error,
      });
      return 'deadLettered';
    }

    return 'rescheduled';
  }

  /** Replays go to the printer's current address when it is still configured */
  private refreshAddress(job: DispatchJob): DispatchJob {
    const printer = this.deps.printers.findById(job.printer.id);
    if (!printer) return job;
    return {
      ...job,
      printer: {
        id: printer.id,
        name: printer.name,
        host: printer.host,
        port: printer.port,
        connection: printer.connection,
      },
    };
  }

  private nextAttemptAfter(attempts: number, from: Date): Date {
    const delayMs = exponentialBackoffMs(
      attempts,
      { baseDelayMs: this.baseDelayMs, maxDelayMs: this.maxDelayMs },
      this.random,
    );
    return new Date(from.getTime() + delayMs);
  }

  private recordAudit(job: DispatchJob, outcome: KitchenAuditOutcome, at: Date): void {
    for (const item of job.items) {
      this.deps.audit.record({
        orderId: job.orderId,
        orderNumber: job.orderNumber,
        itemId: item.itemId,
        itemName: item.name,
        printerId: job.printer.id,
        printerName: job.printer.name,
        outcome,
        actorId: REPLAY_ACTOR.id,
        actorName: REPLAY_ACTOR.name,
        at,
      });
    }
  }
}
