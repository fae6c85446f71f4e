import type { AggregationStrategy, DataLevel, OrderRecord } from '../types/schema';
import { dayKey } from '../utils/dates';

export const PRODUCT_FIELDS = ['product_id', 'product_name', 'sku'];
export const LINE_ITEM_FIELDS = ['quantity', 'line_item_id', 'order_item_id', 'item_price'];
export const PRICE_FIELDS = ['order_total', 'item_total', 'item_price'];

const ROWS_PER_CUSTOMER_DAY = 1.5;
const MIN_INDICATORS = 2;
const ORDER_LEVEL_CONFIDENCE = 0.8;

export type LevelDecision = {
  level: DataLevel;
  confidence: number;
  requiresAggregation: boolean;
  indicators: string[];
  rowsPerCustomerDay: number | null;
  strategy: AggregationStrategy | null;
  preconditions: string[];
};

const present = (value: unknown) => value !== null && value !== undefined && String(value).trim() !== '';

export const averageRowsPerCustomerDay = (rows: OrderRecord[]) => {
  const counts = new Map<string, number>();
  for (const row of rows) {
    const day = dayKey(row.order_date);
    if (!present(row.customer_id) || !day) continue;
    const key = `${String(row.customer_id).trim()}\u0000${day}`;
    counts.set(key, (counts.get(key) || 0) + 1);
  }
  if (!counts.size) return null;
  let total = 0;
  counts.forEach(count => {
    total += count;
  });
  return total / counts.size;
};

export const selectStrategy = (fields: string[]): AggregationStrategy | null => {
  const has = (name: string) => fields.includes(name);
  if (has('order_id')) return 'by_order_id';
  if (has('customer_id') && has('order_date')) {
    return has('order_item_id') ? 'by_sequential_boundary' : 'by_customer_date';
  }
  return null;
};

export const strategyPreconditions = (strategy: AggregationStrategy | null, fields: string[]) => {
  const price = PRICE_FIELDS.find(name => fields.includes(name));
  const priceLine = price ? `price column: ${price}` : `price column: one of ${PRICE_FIELDS.join(', ')} (missing)`;
  switch (strategy) {
    case 'by_order_id':
      return ['order_id mapped: rows sharing an order_id form one order', priceLine];
    case 'by_sequential_boundary':
      return [
        'customer_id and order_date mapped, no order_id',
        'rows sorted by customer_id, order_date, order_item_id',
        'a new order starts whenever customer_id or order date changes',
        priceLine
      ];
    case 'by_customer_date':
      return ['customer_id and order_date mapped, no order_id', 'one order per customer per calendar day', priceLine];
    default:
      return ['no strategy applies: needs order_id, or customer_id with order_date', priceLine];
  }
};

/**
 * Decide whether rows are orders or line items from four indicators; two or more
 * satisfied means line items.
 */
export const detectLevel = (rows: OrderRecord[], fields: string[]): LevelDecision => {
  const has = (name: string) => fields.includes(name);
  const indicators: string[] = [];

  const productFields = PRODUCT_FIELDS.filter(has);
  if (productFields.length) indicators.push(`product columns present: ${productFields.join(', ')}`);

  const lineFields = LINE_ITEM_FIELDS.filter(has);
  if (lineFields.length) indicators.push(`line-item columns present: ${lineFields.join(', ')}`);

  let rowsPerCustomerDay: number | null = null;
  if (has('customer_id') && has('order_date')) {
    rowsPerCustomerDay = averageRowsPerCustomerDay(rows);
    if (rowsPerCustomerDay !== null && rowsPerCustomerDay > ROWS_PER_CUSTOMER_DAY) {
      indicators.push(`${rowsPerCustomerDay.toFixed(2)} rows per customer per day`);
    }
  }

  if (has('order_item_id') && !has('order_id')) indicators.push('order_item_id present without order_id');

  if (indicators.length < MIN_INDICATORS) {
    return {
      level: 'order',
      confidence: ORDER_LEVEL_CONFIDENCE,
      requiresAggregation: false,
      indicators,
      rowsPerCustomerDay,
      strategy: null,
      preconditions: []
    };
  }

  const strategy = selectStrategy(fields);
  return {
    level: 'line_item',
    confidence: Math.min(0.95, indicators.length * 0.25),
    requiresAggregation: true,
    indicators,
    rowsPerCustomerDay,
    strategy,
    preconditions: strategyPreconditions(strategy, fields)
  };
};
