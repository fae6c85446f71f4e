import { afterEach, describe, expect, it, vi } from 'vitest';
import * as XLSX from 'xlsx';
import { buildOrdersCsv, buildOrdersWorkbook, exportColumns } from '../output';
import type { OrderRecord } from '../types/schema';
import { formatAmount } from '../utils/currency';
import { validateOrders } from '../validate/validator';
import { NOW } from './helpers';

afterEach(() => {
  vi.restoreAllMocks();
});

const rows: OrderRecord[] = [
  { order_id: '1', order_date: new Date('2024-01-05T00:00:00.000Z'), order_total: 50, currency: 'SAR' },
  { order_id: '2', order_date: null, order_total: 12.5, currency: 'SAR' }
];

describe('exportColumns', () => {
  it('orders registry fields first and appends the rest', () => {
    const columns = exportColumns(['order_id', 'order_date', 'customer_id'], [{ order_total: 1, order_id: '1' }, { item_count: 2 }]);
    expect(columns).toEqual(['order_id', 'order_total', 'item_count']);
  });
});

describe('buildOrdersCsv', () => {
  it('writes ISO dates and empty cells for missing values', () => {
    expect(buildOrdersCsv(['order_id', 'order_date', 'order_total'], rows)).toBe(
      'order_id,order_date,order_total\r\n1,2024-01-05T00:00:00.000Z,50\r\n2,,12.5'
    );
  });
});

describe('buildOrdersWorkbook', () => {
  it('writes orders, summary, issues, mapping and field statistics sheets', () => {
    const { report } = validateOrders(rows, ['order_id', 'order_total'], {
      requiredFields: ['order_id'],
      fieldTypes: { order_total: 'float' },
      now: NOW
    });
    const buffer = buildOrdersWorkbook({
      columns: ['order_id', 'order_total'],
      rows,
      mapping: {
        platform: 'salla',
        columns: { order_id: 'Order Number', order_total: 'Total', customer_phone: 'Phone' },
        confidence: { order_id: 1, order_total: 0.85, customer_phone: 1 },
        derived: { customer_id: 'customer_phone' }
      },
      report,
      cleaning: { originalRows: 3, removedRows: 1, steps: ['Removed 1 duplicate orders'], finalRows: 2 }
    });

    const workbook = XLSX.read(buffer, { type: 'buffer' });
    expect(workbook.SheetNames).toEqual(['Orders', 'Summary', 'Issues', 'Mapping', 'Field Stats']);

    const orders = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets.Orders);
    expect(orders).toEqual([
      { order_id: '1', order_total: 50 },
      { order_id: '2', order_total: 12.5 }
    ]);

    const issues = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets.Issues);
    expect(issues.map(i => i.code)).toEqual(['missing_currency', 'removed']);

    const mapping = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets.Mapping);
    expect(mapping.at(-1)).toEqual({ field: 'customer_id', column: 'Phone', confidence: 1, derivedFrom: 'customer_phone' });
  });
});

describe('formatAmount', () => {
  it('uses the currency when it is an ISO code', () => {
    expect(formatAmount(1234.5, 'usd')).toBe('$1,234.50');
    expect(formatAmount(1234.5, null)).toBe('1,234.50');
    expect(formatAmount(3, 'riyal')).toBe('3.00');
  });
});
