import fc from 'fast-check';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { aggregateOrders } from '../aggregate/aggregator';
import { matchColumns } from '../map/matcher';
import type { AggregationStrategy, OrderRecord } from '../types/schema';
import { cleanOrders } from '../validate/cleaner';
import { makeTable, testRegistry } from './helpers';

beforeEach(() => {
  vi.spyOn(console, 'info').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

const HEADER_POOL = [
  'Order ID',
  'Order Number',
  'Order No',
  'Date',
  'Order Date',
  'Created At',
  'Customer ID',
  'Client ID',
  'Total',
  'Order Total',
  'Grand Total',
  'Email',
  'Phone',
  'Qty',
  'Price',
  'Item Price',
  'Product',
  'Notes'
];

const lineItem = fc.record({
  order_id: fc.constantFrom('O1', 'O2', 'O3', 'O4'),
  customer_id: fc.constantFrom('C1', 'C2', 'C3'),
  order_date: fc.constantFrom('2024-01-01', '2024-01-02', '2024-01-03'),
  order_item_id: fc.integer({ min: 1, max: 50 }).map(String),
  item_price: fc.integer({ min: 0, max: 10_000 }).map(String)
});

const toRecords = (items: Array<Record<string, string>>): OrderRecord[] => items.map(item => ({ ...item }));

describe('invariants', () => {
  it('never maps one column to two fields', () => {
    const salla = testRegistry().getPlatform('salla');
    fc.assert(
      fc.property(fc.uniqueArray(fc.constantFrom(...HEADER_POOL), { minLength: 1, maxLength: 10 }), columns => {
        const { mapping } = matchColumns(makeTable(columns, []), salla);
        const used = Object.values(mapping.columns);
        expect(new Set(used).size).toBe(used.length);
        used.forEach(column => expect(columns).toContain(column));
      })
    );
  });

  it('conserves revenue and rows across every strategy', () => {
    const strategies: AggregationStrategy[] = ['by_order_id', 'by_customer_date', 'by_sequential_boundary'];
    const fields = ['order_id', 'customer_id', 'order_date', 'order_item_id', 'item_price'];
    fc.assert(
      fc.property(fc.array(lineItem, { minLength: 1, maxLength: 40 }), fc.constantFrom(...strategies), (items, strategy) => {
        const rows = toRecords(items);
        const { rows: orders } = aggregateOrders(rows, fields, strategy);

        const revenueIn = items.reduce((acc, item) => acc + Number(item.item_price), 0);
        const revenueOut = orders.reduce((acc, order) => acc + Number(order.order_total), 0);
        const itemsOut = orders.reduce((acc, order) => acc + Number(order.item_count), 0);
        expect(revenueOut).toBe(revenueIn);
        expect(itemsOut).toBe(items.length);
      })
    );
  });

  it('builds one sequential order per customer and day', () => {
    const fields = ['customer_id', 'order_date', 'order_item_id', 'item_price'];
    fc.assert(
      fc.property(fc.array(lineItem, { minLength: 1, maxLength: 40 }), items => {
        const { rows: orders } = aggregateOrders(toRecords(items), fields, 'by_sequential_boundary');
        const pairs = new Set(items.map(item => `${item.customer_id}|${item.order_date}`));
        expect(orders).toHaveLength(pairs.size);
      })
    );
  });

  it('cleaning is idempotent', () => {
    const row = fc.record({
      order_id: fc.option(fc.constantFrom('1', '2', '3', ''), { nil: null }),
      customer_id: fc.option(fc.constantFrom('C1', 'C2', ' '), { nil: null }),
      order_total: fc.option(fc.integer({ min: -50, max: 50 }), { nil: null })
    });
    fc.assert(
      fc.property(fc.array(row, { maxLength: 30 }), items => {
        const once = cleanOrders(items);
        const twice = cleanOrders(once.rows);
        expect(twice.rows).toEqual(once.rows);
        expect(twice.summary.removedRows).toBe(0);
      })
    );
  });
});
