import type { CleaningSummary, OrderRecord } from '../types/schema';
import { isBlank } from '../utils/profile';
import { parseNumber } from './coerce';

const ID_FIELDS = ['order_id', 'customer_id'];

type Step = {
  describe: (count: number) => string;
  keep: (rows: OrderRecord[]) => OrderRecord[];
};

const dropDuplicateOrders = (rows: OrderRecord[]) => {
  const seen = new Set<string>();
  return rows.filter(row => {
    if (isBlank(row.order_id)) return true;
    const key = String(row.order_id).trim();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
};

const STEPS: Step[] = [
  { describe: n => `Removed ${n} duplicate orders`, keep: dropDuplicateOrders },
  {
    describe: n => `Removed ${n} orders with negative totals`,
    keep: rows =>
      rows.filter(row => {
        const total = parseNumber(row.order_total);
        return total === null || total >= 0;
      })
  },
  {
    describe: n => `Removed ${n} orders without a valid total`,
    keep: rows => rows.filter(row => !('order_total' in row) || parseNumber(row.order_total) !== null)
  },
  {
    describe: n => `Removed ${n} orders with empty IDs`,
    keep: rows => rows.filter(row => ID_FIELDS.every(field => !(field in row) || !isBlank(row[field])))
  }
];

/**
 * Opt-in removal pass run after validation. Rows are only removed, never edited,
 * and cleaning its own output removes nothing more. Every kept row that carries
 * `order_total` has a non-negative numeric total.
 */
export const cleanOrders = (rows: OrderRecord[]): { rows: OrderRecord[]; summary: CleaningSummary } => {
  const steps: string[] = [];
  let current = rows;
  for (const step of STEPS) {
    const next = step.keep(current);
    const removed = current.length - next.length;
    if (removed > 0) {
      const line = step.describe(removed);
      steps.push(line);
      console.info(line);
    }
    current = next;
  }
  return {
    rows: current,
    summary: {
      originalRows: rows.length,
      removedRows: rows.length - current.length,
      steps,
      finalRows: current.length
    }
  };
};
