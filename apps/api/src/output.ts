import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import type { CellValue, CleaningSummary, ColumnMapping, OrderRecord, ValidationReport } from './types/schema';
import { formatAmount } from './utils/currency';

export type OrdersExport = {
  columns: string[];
  rows: OrderRecord[];
  mapping: ColumnMapping;
  report: ValidationReport;
  cleaning: CleaningSummary | null;
};

const exportCell = (value: CellValue | undefined) => {
  if (value === undefined || value === null) return '';
  if (value instanceof Date) return value.toISOString();
  return value;
};

const exportRows = (columns: string[], rows: OrderRecord[]) =>
  rows.map(row => {
    const out: Record<string, string | number | boolean> = {};
    columns.forEach(column => {
      out[column] = exportCell(row[column]);
    });
    return out;
  });

/** Column order for export: registry order for mapped fields, then anything the pipeline added. */
export const exportColumns = (fieldOrder: string[], rows: OrderRecord[]) => {
  const present = new Set<string>();
  rows.forEach(row => Object.keys(row).forEach(key => present.add(key)));
  const ordered = fieldOrder.filter(field => present.has(field));
  const extra = Array.from(present).filter(field => !fieldOrder.includes(field));
  return [...ordered, ...extra];
};

export const buildOrdersCsv = (columns: string[], rows: OrderRecord[]) =>
  Papa.unparse({ fields: columns, data: exportRows(columns, rows).map(row => columns.map(c => row[c])) });

export const buildOrdersWorkbook = (payload: OrdersExport) => {
  const workbook = XLSX.utils.book_new();
  const { report, mapping, cleaning } = payload;

  const orders = XLSX.utils.json_to_sheet(exportRows(payload.columns, payload.rows), { header: payload.columns });
  XLSX.utils.book_append_sheet(workbook, orders, 'Orders');

  const revenue = payload.rows.reduce((acc, row) => acc + (typeof row.order_total === 'number' ? row.order_total : 0), 0);
  const summary = [
    ['Rows', report.totalRows],
    ['Valid', report.isValid ? 'yes' : 'no'],
    ['Quality score', Number(report.qualityScore.toFixed(3))],
    ['Errors', report.errors.length],
    ['Warnings', report.warnings.length],
    ['Duplicates', report.duplicates.total],
    ['Revenue', formatAmount(revenue, report.currency.defaultCurrency)]
  ];
  if (cleaning) summary.push(['Rows removed by cleaning', cleaning.removedRows]);
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['Metric', 'Value'], ...summary]), 'Summary');

  const issues: Array<{ severity: string; code: string; field: string; message: string }> = [
    ...report.errors.map(issue => ({ severity: 'error', code: issue.code, field: issue.field || '', message: issue.message })),
    ...report.warnings.map(issue => ({ severity: 'warning', code: issue.code, field: issue.field || '', message: issue.message }))
  ];
  if (cleaning) {
    cleaning.steps.forEach(step => issues.push({ severity: 'cleaning', code: 'removed', field: '', message: step }));
  }
  const issueSheet = issues.length
    ? XLSX.utils.json_to_sheet(issues, { header: ['severity', 'code', 'field', 'message'] })
    : XLSX.utils.aoa_to_sheet([['No issues found']]);
  XLSX.utils.book_append_sheet(workbook, issueSheet, 'Issues');

  const mappingRows = Object.entries(mapping.columns).map(([field, column]) => ({
    field,
    column,
    confidence: Number((mapping.confidence[field] ?? 0).toFixed(3)),
    derivedFrom: ''
  }));
  Object.entries(mapping.derived).forEach(([field, source]) => {
    mappingRows.push({ field, column: mapping.columns[source] || '', confidence: mapping.confidence[field] ?? 0, derivedFrom: source });
  });
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.json_to_sheet(mappingRows, { header: ['field', 'column', 'confidence', 'derivedFrom'] }),
    'Mapping'
  );

  const statsRows = Object.entries(report.fieldStats).map(([field, stats]) => ({
    field,
    type: stats.inferredType,
    nullPct: Number(stats.nullPercentage.toFixed(1)),
    uniquePct: Number(stats.uniquePercentage.toFixed(1)),
    quality: Number(stats.qualityScore.toFixed(3))
  }));
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(statsRows), 'Field Stats');

  return XLSX.write(workbook, { bookType: 'xlsx', type: 'buffer' });
};
