import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import supertest from 'supertest';
import { createTestApp, type TestApp } from '../test/request-helper';
import { ACTOR, PRINTERS, TEST_NOW, assignItemC, seedOrder42 } from '../test/fixtures';
import { jsonReply, stubFetch } from '../test/stub-fetch';

const DISPATCH_URL = '/api/orders/order-42/kitchen/dispatch';
const BODY = { actorId: ACTOR.id, actorName: ACTOR.name };

let ctx: TestApp;

afterEach(() => {
  ctx.db.close();
});

// ============ POST /api/orders/:orderId/kitchen/validate ============

describe('POST /orders/:orderId/kitchen/validate', () => {
  beforeEach(() => {
    ctx = createTestApp(seedOrder42);
  });

  it('returns 422 listing the unassigned items', async () => {
    const res = await supertest(ctx.app).post('/api/orders/order-42/kitchen/validate');

    expect(res.status).toBe(422);
    expect(res.body.kind).toBe('missing_assignments');
    expect(res.body.details).toEqual({ unassignedItems: ['C'], totalItems: 3 });
  });

  it('returns 200 once every item has a printer', async () => {
    assignItemC(ctx.db);
    ctx.services.resolver.reload();

    const res = await supertest(ctx.app).post('/api/orders/order-42/kitchen/validate');

    expect(res.status).toBe(200);
    expect(res.body.isValid).toBe(true);
    expect(res.body.details.requiredPrinters).toBe(2);
  });

  it('returns 404 for an unknown order', async () => {
    const res = await supertest(ctx.app).post('/api/orders/order-404/kitchen/validate');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Order not found' });
  });
});

// ============ POST /api/orders/:orderId/kitchen/dispatch ============

describe('POST /orders/:orderId/kitchen/dispatch', () => {
  beforeEach(() => {
    ctx = createTestApp((db) => {
      seedOrder42(db);
      assignItemC(db);
    });
  });

  it('returns 400 without an actor', async () => {
    const res = await supertest(ctx.app).post(DISPATCH_URL).send({ actorId: '', actorName: 'Dana' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'actorId: actorId is required' });
  });

  it('returns 200 when every printer takes its ticket', async () => {
    const res = await supertest(ctx.app).post(DISPATCH_URL).send(BODY);

    expect(res.status).toBe(200);
    expect(res.body.outcome).toBe('delivered');
    expect(res.body.message).toBe('3 items sent to kitchen successfully! Printed to 2 printer(s).');
    expect(res.body.perTargetResults).toEqual({ [PRINTERS.kitchen.id]: true, [PRINTERS.bar.id]: true });
  });

  it('returns 200 with a partial outcome and queues the failed ticket', async () => {
    ctx.channel.set(PRINTERS.bar.id, 'fail');

    const res = await supertest(ctx.app).post(DISPATCH_URL).send(BODY);

    expect(res.status).toBe(200);
    expect(res.body.outcome).toBe('partial');
    expect(res.body.message).toBe('3 items sent to kitchen! Printed to 1 of 2 printers (some prints failed).');
    expect(res.body.queuedEntryIds).toHaveLength(1);

    const deliveries = await supertest(ctx.app).get('/api/orders/order-42/kitchen/deliveries');
    expect(deliveries.status).toBe(200);
    expect(deliveries.body.map((d: { printerId: string; itemId: string; state: string }) => `${d.printerId}/${d.itemId}/${d.state}`)).toEqual([
      'printer-bar/item-a/committed',
      'printer-kitchen/item-a/delivered',
      'printer-kitchen/item-b/delivered',
      'printer-kitchen/item-c/delivered',
    ]);
  });

  it('returns 502 when every print is queued', async () => {
    ctx.channel.set(PRINTERS.bar.id, 'fail').set(PRINTERS.kitchen.id, 'fail');

    const res = await supertest(ctx.app).post(DISPATCH_URL).send(BODY);

    expect(res.status).toBe(502);
    expect(res.body.outcome).toBe('queued');
    expect(res.body.success).toBe(false);
  });

  it('returns 422 the second time, when nothing is left to send', async () => {
    await supertest(ctx.app).post(DISPATCH_URL).send(BODY);

    const res = await supertest(ctx.app).post(DISPATCH_URL).send(BODY);

    expect(res.status).toBe(422);
    expect(res.body.failureKind).toBe('all_items_sent');
    expect(ctx.channel.attempts).toHaveLength(2);
  });

  it('returns 200 for order #42 when Bar is offline, queueing its ticket', async () => {
    ctx.reachability.offline.add(PRINTERS.bar.id);
    ctx.channel.set(PRINTERS.bar.id, 'fail');

    const res = await supertest(ctx.app).post(DISPATCH_URL).send(BODY);

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ success: true, outcome: 'partial', itemsSent: 3, printerCount: 1 });

    const queue = await supertest(ctx.app).get('/api/kitchen/queue');
    expect(queue.body).toHaveLength(1);
    expect(queue.body[0].job.printer.id).toBe(PRINTERS.bar.id);
    expect(queue.body[0].job.items.map((item: { itemId: string }) => item.itemId)).toEqual(['item-a']);
  });

  it('still reports an offline printer through the validate endpoint', async () => {
    ctx.reachability.offline.add(PRINTERS.bar.id);

    const res = await supertest(ctx.app).post('/api/orders/order-42/kitchen/validate');

    expect(res.status).toBe(422);
    expect(res.body.kind).toBe('printers_offline');
    expect(ctx.services.orders.findById('order-42')?.items.some((item) => item.sentToKitchen)).toBe(false);
  });

  it('returns 404 for an unknown order', async () => {
    const res = await supertest(ctx.app).post('/api/orders/order-404/kitchen/dispatch').send(BODY);

    expect(res.status).toBe(404);
    expect(res.body.failureKind).toBe('order_not_found');
  });
});

// ============ Retry queue ============

describe('retry queue routes', () => {
  beforeEach(async () => {
    ctx = createTestApp((db) => {
      seedOrder42(db);
      assignItemC(db);
    });
    ctx.channel.set(PRINTERS.bar.id, 'fail');
    await supertest(ctx.app).post(DISPATCH_URL).send(BODY);
  });

  it('lists the queued ticket', async () => {
    const res = await supertest(ctx.app).get('/api/kitchen/queue');

    expect(res.status).toBe(200);
    expect(res.body).toHaveLength(1);
    expect(res.body[0].job.printer.id).toBe(PRINTERS.bar.id);
    expect(res.body[0].attempts).toBe(1);
    expect(res.body[0].lastFailureKind).toBe('network_error');
  });

  it('reports dispatch and queue statistics', async () => {
    const res = await supertest(ctx.app).get('/api/kitchen/stats');

    expect(res.status).toBe(200);
    expect(res.body.dispatch.totalOrdersSent).toBe(1);
    expect(res.body.dispatch.totalItemsSent).toBe(3);
    expect(res.body.dispatch.printerSuccessCount).toEqual({ [PRINTERS.kitchen.id]: 1 });
    expect(res.body.dispatch.printerFailureCount).toEqual({ [PRINTERS.bar.id]: 1 });
    expect(res.body.queue.pending).toBe(1);
    expect(res.body.relay).toBeNull();
  });

  it('drains nothing before the entry is due', async () => {
    const res = await supertest(ctx.app).post('/api/kitchen/queue/drain');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ skipped: false, scanned: 0, delivered: 0, rescheduled: 0, deadLettered: 0 });
  });

  it('replays a requeued entry on the next drain', async () => {
    ctx.channel.set(PRINTERS.bar.id, 'ok');
    const [entry] = ctx.services.retryQueue.listPending();

    const requeued = await supertest(ctx.app).post(`/api/kitchen/queue/${entry?.id}/requeue`);
    expect(requeued.status).toBe(200);
    expect(requeued.body.attempts).toBe(0);

    const drained = await supertest(ctx.app).post('/api/kitchen/queue/drain');
    expect(drained.body).toEqual({ skipped: false, scanned: 1, delivered: 1, rescheduled: 0, deadLettered: 0 });
    expect(ctx.services.ledger.findByOrder('order-42').every((d) => d.state === 'delivered')).toBe(true);
  });

  it('discards an entry and fails its deliveries', async () => {
    const [entry] = ctx.services.retryQueue.listPending();

    const res = await supertest(ctx.app).delete(`/api/kitchen/queue/${entry?.id}`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ success: true });
    expect(ctx.services.ledger.findByOrder('order-42')[0]?.state).toBe('failed');

    const again = await supertest(ctx.app).delete(`/api/kitchen/queue/${entry?.id}`);
    expect(again.status).toBe(404);
  });

  it('returns 404 when requeueing an unknown entry', async () => {
    const res = await supertest(ctx.app).post('/api/kitchen/queue/missing/requeue');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Queue entry not found' });
  });

  it('lists no dead letters yet', async () => {
    const res = await supertest(ctx.app).get('/api/kitchen/queue/dead-letter');

    expect(res.status).toBe(200);
    expect(res.body).toEqual([]);
  });
});

// ============ Relay statistics ============

describe('GET /kitchen/stats with the relay enabled', () => {
  beforeEach(() => {
    const { fetchImpl } = stubFetch(
      jsonReply({ sessionId: 'session-1' }),
      jsonReply({
        printerStatus: { patio: { isOnline: true } },
        orderConfirmations: [{ jobId: 'job-9', orderId: 'order-9', printerId: 'patio', success: true }],
        failedOrders: [{ jobId: 'job-10', orderId: 'order-10', printerId: 'patio', error: 'paper out' }],
      }),
    );
    ctx = createTestApp(undefined, {
      env: {
        RELAY_ENABLED: 'true',
        RELAY_BASE_URL: 'https://relay.test',
        RELAY_API_KEY: 'test-secret',
        RELAY_RESTAURANT_ID: 'restaurant-1',
      },
      fetchImpl,
    });
  });

  afterEach(() => {
    ctx.services.relay?.session.stop();
  });

  it('reports relay confirmations, failures and printer states', async () => {
    await ctx.services.relay?.session.start();
    await ctx.services.relay?.monitor.pollOnce();

    const res = await supertest(ctx.app).get('/api/kitchen/stats');

    expect(res.status).toBe(200);
    expect(res.body.relay).toEqual({
      confirmedJobs: 1,
      failedJobs: 1,
      lastPollAt: TEST_NOW.toISOString(),
      recentFailures: [{ jobId: 'job-10', orderId: 'order-10', printerId: 'patio', error: 'paper out' }],
      printers: { patio: { isOnline: true, lastActivity: null } },
    });
  });
});

// ============ App shell ============

describe('app shell', () => {
  beforeEach(() => {
    ctx = createTestApp();
  });

  it('reports health', async () => {
    const res = await supertest(ctx.app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'OK', assignmentsLoaded: true, pendingJobs: 0, relay: null });
  });

  it('returns 400 for a malformed JSON body', async () => {
    const res = await supertest(ctx.app)
      .post(DISPATCH_URL)
      .set('Content-Type', 'application/json')
      .send('{"actorId":');

    expect(res.status).toBe(400);
  });

  it('returns 404 for unknown routes', async () => {
    const res = await supertest(ctx.app).get('/api/nothing-here');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Not found' });
  });
});
