import { loadRegistry } from '../registry/schemaRegistry';
import type { CellValue, RawTable } from '../types/schema';

export const testRegistry = () => loadRegistry();

/** Build a RawTable from a header row and positional rows. */
export const makeTable = (columns: string[], rows: CellValue[][], name = 'orders'): RawTable => ({
  name,
  columns,
  rows: rows.map(values => {
    const row: Record<string, CellValue> = {};
    columns.forEach((column, i) => {
      row[column] = values[i] ?? null;
    });
    return row;
  })
});

export const NOW = new Date('2024-06-01T00:00:00Z');
