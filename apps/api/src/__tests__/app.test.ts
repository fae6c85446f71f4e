import fs from 'fs';
import os from 'os';
import path from 'path';
import request from 'supertest';
import { afterAll, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../app';
import { loadConfig } from '../config';
import { InMemoryMappingStore } from '../map/cache';
import { testRegistry } from './helpers';

const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'order-canon-app-'));

const ORDERS_CSV = 'Order Number,Date,Client ID,Total\n1001,2024-01-05,C1,50\n1002,2024-01-06,C2,30\n';
const ITEMS_CSV =
  'Order ID,Order Date,Customer ID,Product ID,Quantity,Item Price\n' +
  'O1,2024-01-01,C1,P1,2,10\n' +
  'O1,2024-01-01,C1,P2,1,15\n' +
  'O2,2024-01-02,C2,P3,1,20\n';

const buildApp = () =>
  createApp({
    config: loadConfig({ DATA_DIR: dataDir }),
    registry: testRegistry(),
    store: new InMemoryMappingStore()
  });

beforeEach(() => {
  vi.spyOn(console, 'info').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

afterAll(() => {
  fs.rmSync(dataDir, { recursive: true, force: true });
});

describe('registry routes', () => {
  it('reports health', async () => {
    const res = await request(buildApp()).get('/api/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });

  it('lists platforms with their required fields', async () => {
    const res = await request(buildApp()).get('/api/platforms');
    expect(res.status).toBe(200);
    expect(res.body.defaultPlatform).toBe('salla');
    expect(res.body.platforms.map((p: { name: string }) => p.name)).toEqual(['salla', 'shopify', 'woocommerce']);
    expect(res.body.platforms[1].required).toEqual(['order_id', 'order_date', 'customer_id', 'order_total']);
  });

  it('registers custom fields and rejects bad ones', async () => {
    const app = buildApp();
    const created = await request(app).post('/api/platforms/fields').send({ name: 'gift_wrap', type: 'boolean' });
    expect(created.status).toBe(201);
    expect(created.body.field).toMatchObject({ name: 'gift_wrap', type: 'boolean', custom: true });

    const badName = await request(app).post('/api/platforms/fields').send({ name: 'Gift Wrap' });
    expect(badName.status).toBe(422);
    expect(badName.body.code).toBe('schema_error');

    const noName = await request(app).post('/api/platforms/fields').send({ type: 'string' });
    expect(noName.status).toBe(400);
    expect(noName.body.error).toBe('name: Required');
  });
});

describe('POST /api/ingest/orders', () => {
  it('requires a supported file', async () => {
    const app = buildApp();
    const missing = await request(app).post('/api/ingest/orders');
    expect(missing.status).toBe(400);

    const wrongType = await request(app).post('/api/ingest/orders').attach('file', Buffer.from('{}'), 'orders.json');
    expect(wrongType.status).toBe(400);
    expect(wrongType.body.error).toBe('Only .csv, .xlsx and .xls files are supported.');
  });

  it('processes an order export and caches its mapping', async () => {
    const app = buildApp();
    const first = await request(app).post('/api/ingest/orders').attach('file', Buffer.from(ORDERS_CSV), 'orders.csv');

    expect(first.status).toBe(200);
    expect(first.body.status).toBe('complete');
    expect(first.body.platform).toBe('salla');
    expect(first.body.fromCache).toBe(false);
    expect(first.body.rowCount).toBe(2);
    expect(first.body.preview.map((r: { order_total: number }) => r.order_total)).toEqual([50, 30]);
    expect(fs.existsSync(path.join(dataDir, 'uploads', first.body.fileId))).toBe(true);

    const second = await request(app).post('/api/ingest/orders').attach('file', Buffer.from(ORDERS_CSV), 'orders.csv');
    expect(second.body.fromCache).toBe(true);
  });

  it('returns 422 with suggestions when required fields are missing', async () => {
    const csv = 'Order Number,Date,Total\n1,2024-01-01,5\n';
    const res = await request(buildApp()).post('/api/ingest/orders').attach('file', Buffer.from(csv), 'partial.csv');
    expect(res.status).toBe(422);
    expect(res.body.code).toBe('schema_error');
    expect(res.body.missing).toEqual(['customer_id']);
    expect(res.body.error).toBe('Required fields could not be mapped: customer_id');
  });

  it('accepts a manual mapping as a JSON form field', async () => {
    const csv = 'Ref,When,Who,Amount\n1,2024-01-01,C1,5\n';
    const res = await request(buildApp())
      .post('/api/ingest/orders?platform=salla')
      .field('mapping', JSON.stringify({ order_id: 'Ref', order_date: 'When', customer_id: 'Who', order_total: 'Amount' }))
      .attach('file', Buffer.from(csv), 'manual.csv');
    expect(res.status).toBe(200);
    expect(res.body.mapping.columns).toEqual({ order_id: 'Ref', order_date: 'When', customer_id: 'Who', order_total: 'Amount' });
  });

  it('rejects a mapping field that is not JSON', async () => {
    const res = await request(buildApp())
      .post('/api/ingest/orders')
      .field('mapping', 'order_id=Ref')
      .attach('file', Buffer.from(ORDERS_CSV), 'orders.csv');
    expect(res.status).toBe(400);
  });
});

describe('line-item confirmation flow', () => {
  it('waits for confirmation and then aggregates', async () => {
    const app = buildApp();
    const upload = await request(app).post('/api/ingest/orders').attach('file', Buffer.from(ITEMS_CSV), 'items.csv');
    expect(upload.status).toBe(200);
    expect(upload.body.status).toBe('awaiting_confirmation');
    expect(upload.body.level.strategy).toBe('by_order_id');

    const confirmed = await request(app)
      .post('/api/ingest/orders/confirm')
      .send({ fileId: upload.body.fileId, fileName: 'items.csv' });
    expect(confirmed.status).toBe(200);
    expect(confirmed.body.status).toBe('complete');
    expect(confirmed.body.rowCount).toBe(2);
    expect(confirmed.body.preview.map((r: { order_total: number }) => r.order_total)).toEqual([25, 20]);
    expect(confirmed.body.aggregation.originalRows).toBe(3);
  });

  it('downloads the canonical orders as CSV', async () => {
    const app = buildApp();
    const upload = await request(app).post('/api/ingest/orders').attach('file', Buffer.from(ITEMS_CSV), 'items.csv');
    const res = await request(app)
      .post('/api/ingest/orders/confirm?format=csv')
      .send({ fileId: upload.body.fileId, fileName: 'items.csv' });

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(res.headers['content-disposition']).toBe('attachment; filename="items-orders.csv"');
    const lines = res.text.split('\r\n');
    expect(lines[0]).toBe('order_id,order_date,customer_id,order_total,product_id,quantity,item_price,item_count');
    expect(lines).toHaveLength(3);
  });

  it('rejects unknown formats and missing uploads', async () => {
    const app = buildApp();
    const upload = await request(app).post('/api/ingest/orders').attach('file', Buffer.from(ITEMS_CSV), 'items.csv');

    const pdf = await request(app)
      .post('/api/ingest/orders/confirm?format=pdf')
      .send({ fileId: upload.body.fileId, fileName: 'items.csv' });
    expect(pdf.status).toBe(400);

    const gone = await request(app).post('/api/ingest/orders/confirm').send({ fileId: 'nope.csv', fileName: 'nope.csv' });
    expect(gone.status).toBe(404);
  });
});
