import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import type { CellValue, RawTable } from '../types/schema';

export type TableSource = 'csv' | 'excel';

export type ReadResult = {
  table: RawTable;
  source: TableSource;
  sheetNames: string[];
};

const PREFERRED_SHEETS = ['orders', 'order', 'الطلبات'];

const stripExt = (name: string) => name.replace(/\.(csv|xlsx|xls)$/i, '');

export const isSpreadsheet = (filename: string) => /\.(xlsx|xls)$/i.test(filename);
export const isSupportedFile = (filename: string) => /\.(csv|xlsx|xls)$/i.test(filename);

/** Arabic-Indic and Persian digits to ASCII, Arabic decimal and thousands marks to '.' and ','. */
export const normalizeDigits = (text: string) =>
  text
    .replace(/[٠-٩]/g, d => String(d.charCodeAt(0) - 0x0660))
    .replace(/[۰-۹]/g, d => String(d.charCodeAt(0) - 0x06f0))
    .replace(/٫/g, '.')
    .replace(/٬/g, ',');

const normalizeCell = (value: unknown): CellValue => {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  const text = normalizeDigits(String(value)).trim();
  return text === '' ? null : text;
};

const buildTable = (name: string, headers: string[], records: Record<string, unknown>[]): RawTable => {
  const columns = headers.map(h => normalizeDigits(String(h)).trim());
  const rows = records.map(record => {
    const row: Record<string, CellValue> = {};
    headers.forEach((header, i) => {
      row[columns[i]] = normalizeCell(record[header]);
    });
    return row;
  });
  return { name, columns, rows };
};

const readCsv = (buffer: Buffer, name: string): RawTable => {
  const text = buffer.toString('utf-8').replace(/^\uFEFF/, '');
  const parsed = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false
  });

  // Ragged rows and single-column files still parse.
  const fatal = parsed.errors.find(err => err.type !== 'FieldMismatch' && err.type !== 'Delimiter');
  if (fatal) {
    throw new Error(`CSV parse error at row ${fatal.row ?? '?'}: ${fatal.message}`);
  }

  return buildTable(name, parsed.meta.fields || [], parsed.data || []);
};

const pickSheet = (sheetNames: string[], requested?: string) => {
  if (requested) {
    if (!sheetNames.includes(requested)) throw new Error(`Sheet '${requested}' not found in workbook`);
    return requested;
  }
  return sheetNames.find(name => PREFERRED_SHEETS.includes(name.trim().toLowerCase())) || sheetNames[0];
};

const readWorkbook = (buffer: Buffer, name: string, sheet?: string) => {
  const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
  const sheetName = pickSheet(workbook.SheetNames, sheet);
  const worksheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!worksheet) throw new Error('Workbook has no sheets');

  const [headerRow = []] = XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, range: 0, blankrows: false });
  // Missing header cells come back as holes.
  const headers = Array.from(headerRow, (h, i) => (h === null || h === undefined || String(h).trim() === '' ? `column_${i + 1}` : String(h)));
  const records = XLSX.utils.sheet_to_json<Record<string, unknown>>(worksheet, {
    header: headers,
    range: 1,
    defval: null,
    blankrows: false
  });
  return { table: buildTable(name, headers, records), sheetNames: workbook.SheetNames };
};

/** Decode an uploaded CSV or XLSX file into a fully materialized table. */
export const readTableBuffer = (buffer: Buffer, filename: string, sheet?: string): ReadResult => {
  const name = stripExt(filename);
  if (isSpreadsheet(filename)) {
    const { table, sheetNames } = readWorkbook(buffer, name, sheet);
    return { table, source: 'excel', sheetNames };
  }
  return { table: readCsv(buffer, name), source: 'csv', sheetNames: [] };
};
