import { AggregationError } from '../errors';
import type { AggregationStrategy, CellValue, OrderRecord } from '../types/schema';
import { dayKey, toDate } from '../utils/dates';
import { parseNumber } from '../validate/coerce';
import { PRICE_FIELDS } from './levelDetector';

export const SUMMED_FIELDS = [
  'order_total',
  'item_total',
  'item_price',
  'quantity',
  'discounts',
  'shipping',
  'taxes',
  'refund_amount'
];

export type AggregationResult = {
  strategy: AggregationStrategy;
  priceField: string;
  rows: OrderRecord[];
};

export type AggregationSummary = {
  originalRows: number;
  aggregatedRows: number;
  reductionRatio: number;
  avgItemsPerOrder: number;
  minItemsPerOrder: number;
  maxItemsPerOrder: number;
  medianItemsPerOrder: number;
  totalRevenue: number;
  avgOrderValue: number;
};

const IDENTITY_REQUIREMENTS: Record<AggregationStrategy, string[]> = {
  by_order_id: ['order_id'],
  by_customer_date: ['customer_id', 'order_date'],
  by_sequential_boundary: ['customer_id', 'order_date']
};

const textKey = (value: CellValue | undefined) => {
  if (value === null || value === undefined) return null;
  const text = value instanceof Date ? value.toISOString() : String(value).trim();
  return text || null;
};

const compareKeys = (a: string | number | null, b: string | number | null) => {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a) < String(b) ? -1 : 1;
};

const sortableDate = (value: CellValue | undefined) => {
  const date = toDate(value);
  return date ? date.getTime() : textKey(value ?? null);
};

const sortableSequence = (value: CellValue | undefined) => parseNumber(value) ?? textKey(value ?? null);

const sumValues = (values: CellValue[]) => {
  let total: number | null = null;
  for (const value of values) {
    const num = parseNumber(value);
    if (num === null) continue;
    total = (total ?? 0) + num;
  }
  return total;
};

const firstPresent = (values: CellValue[]) => values.find(v => v !== null && v !== undefined && v !== '') ?? null;

/** Rows ordered by (customer, date, item sequence); ties keep input order. */
export const sequentialOrder = (rows: OrderRecord[]) =>
  rows
    .map((row, index) => ({
      row,
      index,
      customer: textKey(row.customer_id),
      date: sortableDate(row.order_date),
      sequence: sortableSequence(row.order_item_id)
    }))
    .sort(
      (a, b) =>
        compareKeys(a.customer, b.customer) ||
        compareKeys(a.date, b.date) ||
        compareKeys(a.sequence, b.sequence) ||
        a.index - b.index
    )
    .map(entry => entry.row);

type Group = { key: string; rows: OrderRecord[] };

const groupBy = (rows: OrderRecord[], keyFor: (row: OrderRecord, index: number) => string) => {
  const groups = new Map<string, Group>();
  rows.forEach((row, index) => {
    const key = keyFor(row, index);
    const group = groups.get(key);
    if (group) group.rows.push(row);
    else groups.set(key, { key, rows: [row] });
  });
  return Array.from(groups.values());
};

// Rows without a usable key stay on their own; the Cleaner decides what to drop.
const ungroupedKey = (index: number) => `\u0000row_${index}`;

const groupRows = (rows: OrderRecord[], strategy: AggregationStrategy): Group[] => {
  if (strategy === 'by_order_id') {
    return groupBy(rows, (row, index) => textKey(row.order_id) ?? ungroupedKey(index));
  }

  if (strategy === 'by_customer_date') {
    return groupBy(rows, (row, index) => {
      const customer = textKey(row.customer_id);
      const day = dayKey(row.order_date, 'yyyyMMdd');
      return customer && day ? `${customer}_${day}` : ungroupedKey(index);
    });
  }

  const sorted = sequentialOrder(rows);
  let boundaries = 0;
  let previous: { customer: string | null; day: string | null } | null = null;
  return groupBy(sorted, row => {
    const current = { customer: textKey(row.customer_id), day: dayKey(row.order_date) };
    if (!previous || previous.customer !== current.customer || previous.day !== current.day) boundaries++;
    previous = current;
    return `ORD_${boundaries}`;
  });
};

const collapse = (group: Group, fields: string[], strategy: AggregationStrategy, priceField: string): OrderRecord => {
  const order: OrderRecord = {};
  for (const field of fields) {
    const values = group.rows.map(row => row[field] ?? null);
    order[field] = SUMMED_FIELDS.includes(field) ? sumValues(values) : firstPresent(values);
  }
  if (strategy !== 'by_order_id') {
    order.order_id = group.key.startsWith('\u0000') ? null : group.key;
  }
  if (priceField !== 'order_total') {
    order.order_total = sumValues(group.rows.map(row => row[priceField] ?? null));
  }
  order.item_count = group.rows.length;
  return order;
};

/**
 * Collapse line-item rows into one row per order. Nothing is dropped: summed
 * order_total over the result equals the summed price column of the input.
 */
export const aggregateOrders = (
  rows: OrderRecord[],
  fields: string[],
  strategy: AggregationStrategy
): AggregationResult => {
  const missingIdentity = IDENTITY_REQUIREMENTS[strategy].filter(name => !fields.includes(name));
  if (missingIdentity.length) {
    throw new AggregationError(
      `Strategy ${strategy} needs ${missingIdentity.join(', ')} but they are not mapped`,
      missingIdentity
    );
  }
  const priceField = PRICE_FIELDS.find(name => fields.includes(name));
  if (!priceField) {
    throw new AggregationError(`No price column for aggregation: map one of ${PRICE_FIELDS.join(', ')}`, [
      PRICE_FIELDS.join('|')
    ]);
  }

  const groups = groupRows(rows, strategy);
  const aggregated = groups.map(group => collapse(group, fields, strategy, priceField));
  console.info(
    `Aggregated ${rows.length} line items into ${aggregated.length} orders (${strategy}, price from ${priceField})`
  );
  return { strategy, priceField, rows: aggregated };
};

const median = (values: number[]) => {
  if (!values.length) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
};

export const summarizeAggregation = (original: OrderRecord[], aggregated: OrderRecord[]): AggregationSummary => {
  const counts = aggregated.map(row => parseNumber(row.item_count) ?? 0);
  const totals = aggregated.map(row => parseNumber(row.order_total) ?? 0);
  const revenue = totals.reduce((acc, value) => acc + value, 0);
  const n = aggregated.length;
  return {
    originalRows: original.length,
    aggregatedRows: n,
    reductionRatio: n ? original.length / n : 0,
    avgItemsPerOrder: n ? original.length / n : 0,
    minItemsPerOrder: n ? counts.reduce((a, b) => Math.min(a, b)) : 0,
    maxItemsPerOrder: n ? counts.reduce((a, b) => Math.max(a, b)) : 0,
    medianItemsPerOrder: median(counts),
    totalRevenue: revenue,
    avgOrderValue: n ? revenue / n : 0
  };
};
