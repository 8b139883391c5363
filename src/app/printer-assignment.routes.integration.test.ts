import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import supertest from 'supertest';
import { createTestApp, type TestApp } from '../test/request-helper';
import { PRINTERS, seedOrder42 } from '../test/fixtures';

const BASE_URL = '/api/printer-assignments';

let ctx: TestApp;

beforeEach(() => {
  ctx = createTestApp(seedOrder42);
});

afterEach(() => {
  ctx.db.close();
});

describe('GET /printer-assignments/resolve', () => {
  it('returns the printers for an item in priority order', async () => {
    const res = await supertest(ctx.app).get(`${BASE_URL}/resolve`).query({ menuItemId: 'menu-a' });

    expect(res.status).toBe(200);
    expect(res.body.categoryId).toBeNull();
    expect(res.body.printerIds).toEqual([PRINTERS.kitchen.id, PRINTERS.bar.id]);
    expect(res.body.assignments).toHaveLength(2);
  });

  it('returns an empty list for an unassigned item', async () => {
    const res = await supertest(ctx.app).get(`${BASE_URL}/resolve`).query({ menuItemId: 'menu-c' });

    expect(res.status).toBe(200);
    expect(res.body.printerIds).toEqual([]);
  });

  it('returns 400 without a menu item', async () => {
    const res = await supertest(ctx.app).get(`${BASE_URL}/resolve`);

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'menuItemId: Required' });
  });
});

describe('POST /printer-assignments/auto-assign', () => {
  const categories = [
    { id: 'cat-drinks', name: 'Drinks' },
    { id: 'cat-mains', name: 'Mains' },
  ];

  it('spreads categories round-robin and returns 201', async () => {
    const res = await supertest(ctx.app).post(`${BASE_URL}/auto-assign`).send({ categories });

    expect(res.status).toBe(201);
    expect(res.body.created.map((a: { targetId: string; printerId: string }) => `${a.targetId}->${a.printerId}`)).toEqual([
      `cat-drinks->${PRINTERS.kitchen.id}`,
      `cat-mains->${PRINTERS.bar.id}`,
    ]);

    const resolved = await supertest(ctx.app)
      .get(`${BASE_URL}/resolve`)
      .query({ menuItemId: 'menu-z', categoryId: 'cat-mains' });
    expect(resolved.body.printerIds).toEqual([PRINTERS.bar.id]);
  });

  it('returns 200 when every category is already covered', async () => {
    await supertest(ctx.app).post(`${BASE_URL}/auto-assign`).send({ categories });

    const res = await supertest(ctx.app).post(`${BASE_URL}/auto-assign`).send({ categories });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ created: [] });
  });

  it('returns 400 for a category without a name', async () => {
    const res = await supertest(ctx.app)
      .post(`${BASE_URL}/auto-assign`)
      .send({ categories: [{ id: 'cat-x', name: '' }] });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'categories.0.name: Category name is required' });
  });
});

describe('POST /printer-assignments/reload', () => {
  it('returns how many assignments were loaded', async () => {
    const res = await supertest(ctx.app).post(`${BASE_URL}/reload`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ count: 3 });
  });
});
