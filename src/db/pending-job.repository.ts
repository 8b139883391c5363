import type { Logger } from 'winston';
import type { SqliteDatabase } from './database';
import type {
  DispatchJob,
  PendingEntryStatus,
  PendingQueueEntry,
  TransmissionFailureKind,
} from '../models/dispatch.dto';
import { DispatchJobSchema } from '../validators/dispatch.validator';

interface PendingJobRow {
  id: string;
  job_id: string;
  order_id: string;
  printer_id: string;
  payload: string;
  status: PendingEntryStatus;
  attempts: number;
  last_error: string | null;
  last_failure_kind: TransmissionFailureKind | null;
  enqueued_at: string;
  next_attempt_at: string;
  updated_at: string;
}

interface PendingJobParams {
  id: string;
  job_id: string;
  order_id: string;
  printer_id: string;
  payload: string;
  status: PendingEntryStatus;
  attempts: number;
  last_error: string | null;
  last_failure_kind: TransmissionFailureKind | null;
  enqueued_at: string;
  next_attempt_at: string;
  updated_at: string;
}

function serializeJob(job: DispatchJob): string {
  return JSON.stringify({ ...job, createdAt: job.createdAt.toISOString() });
}

function parsePayload(payload: string): unknown {
  try {
    return JSON.parse(payload);
  } catch {
    return null;
  }
}

function toParams(entry: PendingQueueEntry): PendingJobParams {
  return {
    id: entry.id,
    job_id: entry.job.id,
    order_id: entry.job.orderId,
    printer_id: entry.job.printer.id,
    payload: serializeJob(entry.job),
    status: entry.status,
    attempts: entry.attempts,
    last_error: entry.lastError,
    last_failure_kind: entry.lastFailureKind,
    enqueued_at: entry.enqueuedAt.toISOString(),
    next_attempt_at: entry.nextAttemptAt.toISOString(),
    updated_at: entry.updatedAt.toISOString(),
  };
}

/**
 * SQLite persistence for the retry queue, so queued tickets survive a restart.
 */
export class PendingJobRepository {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly logger: Logger,
  ) {}

  insert(entry: PendingQueueEntry): void {
    this.db
      .prepare<PendingJobParams>(`
        INSERT INTO pending_dispatch_jobs (
          id, job_id, order_id, printer_id, payload, status, attempts,
          last_error, last_failure_kind, enqueued_at, next_attempt_at, updated_at
        ) VALUES (
          @id, @job_id, @order_id, @printer_id, @payload, @status, @attempts,
          @last_error, @last_failure_kind, @enqueued_at, @next_attempt_at, @updated_at
        )
      `)
      .run(toParams(entry));
  }

  update(entry: PendingQueueEntry): void {
    this.db
      .prepare<[string, PendingEntryStatus, number, string | null, string | null, string, string, string]>(`
        UPDATE pending_dispatch_jobs
        SET payload = ?,
            status = ?,
            attempts = ?,
            last_error = ?,
            last_failure_kind = ?,
            next_attempt_at = ?,
            updated_at = ?
        WHERE id = ?
      `)
      .run(
        serializeJob(entry.job),
        entry.status,
        entry.attempts,
        entry.lastError,
        entry.lastFailureKind,
        entry.nextAttemptAt.toISOString(),
        entry.updatedAt.toISOString(),
        entry.id,
      );
  }

  delete(entryId: string): boolean {
    return this.db.prepare<[string]>('DELETE FROM pending_dispatch_jobs WHERE id = ?').run(entryId).changes > 0;
  }

  findById(entryId: string): PendingQueueEntry | null {
    const row = this.db
      .prepare<[string], PendingJobRow>('SELECT * FROM pending_dispatch_jobs WHERE id = ?')
      .get(entryId);
    return row ? this.toEntry(row) : null;
  }

  findDue(now: Date): PendingQueueEntry[] {
    return this.toEntries(
      this.db
        .prepare<[string], PendingJobRow>(`
          SELECT * FROM pending_dispatch_jobs
          WHERE status = 'pending' AND next_attempt_at <= ?
          ORDER BY next_attempt_at ASC, enqueued_at ASC
        `)
        .all(now.toISOString()),
    );
  }

  findByStatus(status: PendingEntryStatus): PendingQueueEntry[] {
    return this.toEntries(
      this.db
        .prepare<[string], PendingJobRow>(`
          SELECT * FROM pending_dispatch_jobs
          WHERE status = ?
          ORDER BY enqueued_at ASC
        `)
        .all(status),
    );
  }

  count(status: PendingEntryStatus): number {
    const row = this.db
      .prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM pending_dispatch_jobs WHERE status = ?')
      .get(status);
    return row?.total ?? 0;
  }

  private toEntries(rows: PendingJobRow[]): PendingQueueEntry[] {
    const entries: PendingQueueEntry[] = [];
    for (const row of rows) {
      const entry = this.toEntry(row);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  // Rows whose payload no longer parses are left in place and reported, not dropped
  private toEntry(row: PendingJobRow): PendingQueueEntry | null {
    const parsed = DispatchJobSchema.safeParse(parsePayload(row.payload));
    if (!parsed.success) {
      this.logger.error('Unreadable pending dispatch job payload', {
        entryId: row.id,
        jobId: row.job_id,
        error: parsed.error.message,
      });
      return null;
    }

    return {
      id: row.id,
      job: parsed.data,
      status: row.status,
      attempts: row.attempts,
      lastError: row.last_error,
      lastFailureKind: row.last_failure_kind,
      enqueuedAt: new Date(row.enqueued_at),
      nextAttemptAt: new Date(row.next_attempt_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
