import { RetryQueueService, type RetryQueueOptions } from './retry-queue.service';
import { PendingJobRepository } from '../db/pending-job.repository';
import { DeliveryLedgerRepository } from '../db/delivery-ledger.repository';
import { PrinterTargetRepository } from '../db/printer-target.repository';
import type { SqliteDatabase } from '../db/database';
import type { DispatchJob } from '../models/dispatch.dto';
import { FakePrintChannel, MemoryAuditSink } from '../test/fakes';
import { TEST_NOW, createTestDatabase, seedPrinter, silentLogger } from '../test/fixtures';
import {
  RETRY_BASE_DELAY_MS,
  RETRY_DRAIN_INTERVAL_MS,
  RETRY_MAX_ATTEMPTS,
  RETRY_MAX_DELAY_MS,
} from '../utils/constants';

function makeJob(id: string): DispatchJob {
  return {
    id,
    orderId: 'order-9',
    orderNumber: '9',
    printer: { id: 'bar', name: 'Bar', host: '10.0.0.22', port: 9100, connection: 'network' },
    items: [
      {
        itemId: 'item-1',
        name: 'Lemonade',
        quantity: 1,
        variant: null,
        modifiers: [],
        specialInstructions: null,
        notes: null,
      },
    ],
    content: 'ticket',
    priority: 5,
    attempt: 1,
    createdAt: TEST_NOW,
  };
}

const FAILURE = { ok: false, kind: 'network_error', error: 'connect ECONNREFUSED' } as const;

describe('RetryQueueService', () => {
  let db: SqliteDatabase;
  let channel: FakePrintChannel;
  let audit: MemoryAuditSink;
  let ledger: DeliveryLedgerRepository;
  let clock: Date;

  function buildQueue(options: RetryQueueOptions = {}): RetryQueueService {
    return new RetryQueueService(
      {
        repository: new PendingJobRepository(db, silentLogger),
        ledger,
        printers: new PrinterTargetRepository(db),
        channels: { network: channel },
        audit,
        logger: silentLogger,
      },
      { baseDelayMs: 1_000, maxDelayMs: 8_000, maxAttempts: 5, timeoutMs: 1_000, now: () => clock, random: () => 0, ...options },
    );
  }

  function advance(ms: number): void {
    clock = new Date(clock.getTime() + ms);
  }

  beforeEach(() => {
    db = createTestDatabase();
    seedPrinter(db, { id: 'bar', name: 'Bar', host: '10.0.0.22' });
    channel = new FakePrintChannel();
    audit = new MemoryAuditSink();
    ledger = new DeliveryLedgerRepository(db);
    clock = TEST_NOW;
    ledger.commit('order-9', [{ itemId: 'item-1', printerId: 'bar', jobId: 'job-1' }], TEST_NOW);
  });

  afterEach(() => {
    db.close();
  });

  it('persists the job with one attempt and a backed-off next attempt', () => {
    const queue = buildQueue();

    const entry = queue.enqueue(makeJob('job-1'), FAILURE);

    expect(entry).toMatchObject({
      status: 'pending',
      attempts: 1,
      lastError: 'connect ECONNREFUSED',
      lastFailureKind: 'network_error',
    });
    expect(entry.nextAttemptAt.getTime() - TEST_NOW.getTime()).toBe(500);
    expect(queue.size()).toBe(1);
    expect(queue.listPending()[0]?.job).toEqual(makeJob('job-1'));
  });

  it('survives a restart', () => {
    buildQueue().enqueue(makeJob('job-1'), FAILURE);

    expect(buildQueue().listPending().map((e) => e.job.id)).toEqual(['job-1']);
  });

  it('converges once the printer comes back', async () => {
    const queue = buildQueue();
    channel.set('bar', 'fail');
    queue.enqueue(makeJob('job-1'), FAILURE);

    expect(await queue.drain()).toEqual({ skipped: false, scanned: 0, delivered: 0, rescheduled: 0, deadLettered: 0 });

    advance(500);
    expect(await queue.drain()).toMatchObject({ scanned: 1, rescheduled: 1 });
    const rescheduled = queue.listPending()[0];
    expect(rescheduled?.attempts).toBe(2);
    expect(rescheduled?.nextAttemptAt.getTime()).toBe(clock.getTime() + 1_000);

    channel.set('bar', 'ok');
    advance(1_000);
    expect(await queue.drain()).toMatchObject({ scanned: 1, delivered: 1 });

    expect(queue.size()).toBe(0);
    expect(channel.delivered.map((job) => job.attempt)).toEqual([3]);
    expect(ledger.findByJob('job-1').map((r) => r.state)).toEqual(['delivered']);
    expect(audit.entries.map((e) => [e.itemName, e.outcome, e.actorId])).toEqual([['Lemonade', 'delivered', 'retry-queue']]);
  });

  it('caps the backoff at the maximum delay', async () => {
    const queue = buildQueue({ maxAttempts: 10, random: () => 1 });
    channel.set('bar', 'fail');
    queue.enqueue(makeJob('job-1'), FAILURE);

    for (let i = 0; i < 5; i += 1) {
      advance(60_000);
      await queue.drain();
    }

    const entry = queue.listPending()[0];
    expect(entry?.attempts).toBe(6);
    expect(entry?.nextAttemptAt.getTime()).toBe(clock.getTime() + 8_000);
  });

  it('replays a failing entry on every drain cycle with the default timings', async () => {
    const queue = buildQueue({
      baseDelayMs: RETRY_BASE_DELAY_MS,
      maxDelayMs: RETRY_MAX_DELAY_MS,
      maxAttempts: RETRY_MAX_ATTEMPTS,
      drainIntervalMs: RETRY_DRAIN_INTERVAL_MS,
      random: () => 1,
    });
    channel.set('bar', 'fail');
    queue.enqueue(makeJob('job-1'), FAILURE);

    const sizes: number[] = [];
    for (let cycle = 1; cycle <= 7; cycle += 1) {
      if (cycle === 7) channel.set('bar', 'ok');
      advance(RETRY_DRAIN_INTERVAL_MS);
      await queue.drain();
      sizes.push(queue.size());
    }

    expect(sizes).toEqual([1, 1, 1, 1, 1, 1, 0]);
    expect(channel.attempts).toHaveLength(7);
    expect(channel.delivered.map((job) => job.attempt)).toEqual([8]);
  });

  it('never schedules past the drain interval', () => {
    const queue = buildQueue({ baseDelayMs: 10_000, maxDelayMs: 60_000, drainIntervalMs: 5_000, random: () => 1 });

    const entry = queue.enqueue(makeJob('job-1'), FAILURE);

    expect(entry.nextAttemptAt.getTime() - TEST_NOW.getTime()).toBe(5_000);
  });

  it('moves an entry to dead letter when attempts run out', async () => {
    const queue = buildQueue({ maxAttempts: 3 });
    channel.set('bar', 'fail');
    queue.enqueue(makeJob('job-1'), FAILURE);

    advance(60_000);
    await queue.drain();
    advance(60_000);
    const summary = await queue.drain();

    expect(summary).toMatchObject({ scanned: 1, deadLettered: 1 });
    expect(queue.size()).toBe(0);
    expect(queue.listDeadLetter()).toHaveLength(1);
    expect(queue.listDeadLetter()[0]?.attempts).toBe(3);
    expect(ledger.findByJob('job-1')[0]?.state).toBe('failed');
    expect(audit.entries.map((e) => e.outcome)).toEqual(['failed']);

    advance(60_000);
    expect((await queue.drain()).scanned).toBe(0);
  });

  it('runs only one drain at a time', async () => {
    const queue = buildQueue({ timeoutMs: 50 });
    channel.set('bar', 'hang');
    queue.enqueue(makeJob('job-1'), FAILURE);
    advance(500);

    const first = queue.drain();
    const second = await queue.drain();

    expect(second.skipped).toBe(true);
    expect((await first).rescheduled).toBe(1);
    expect(channel.aborted).toBe(1);
  });

  it('replays to the printer address currently configured', async () => {
    const queue = buildQueue();
    queue.enqueue(makeJob('job-1'), FAILURE);
    db.prepare('UPDATE printer_targets SET host = ? WHERE id = ?').run('10.0.0.99', 'bar');

    advance(500);
    await queue.drain();

    expect(channel.delivered[0]?.printer.host).toBe('10.0.0.99');
  });

  it('requeues a dead letter with a fresh budget', async () => {
    const queue = buildQueue({ maxAttempts: 2 });
    channel.set('bar', 'fail');
    const entry = queue.enqueue(makeJob('job-1'), FAILURE);
    advance(500);
    await queue.drain();
    expect(queue.listDeadLetter()).toHaveLength(1);

    const requeued = queue.requeue(entry.id);
    expect(requeued).toMatchObject({ status: 'pending', attempts: 0 });
    expect(requeued?.nextAttemptAt).toEqual(clock);

    channel.set('bar', 'ok');
    expect(await queue.drain()).toMatchObject({ delivered: 1 });
    expect(queue.requeue('missing')).toBeNull();
  });

  it('discards an entry and marks its deliveries failed', () => {
    const queue = buildQueue();
    const entry = queue.enqueue(makeJob('job-1'), FAILURE);

    expect(queue.discard(entry.id)).toBe(true);
    expect(queue.discard(entry.id)).toBe(false);
    expect(queue.size()).toBe(0);
    expect(ledger.findByJob('job-1')[0]?.state).toBe('failed');
  });

  it('reports counts in its statistics', async () => {
    const queue = buildQueue({ maxAttempts: 2 });
    channel.set('bar', 'fail');
    queue.enqueue(makeJob('job-1'), FAILURE);
    advance(500);
    await queue.drain();

    expect(queue.getStatistics()).toEqual({
      pending: 0,
      deadLetter: 1,
      totalReplayed: 0,
      totalDeadLettered: 1,
      lastDrainAt: clock.toISOString(),
    });
  });
});
