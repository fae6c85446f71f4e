import { differenceInDays, format } from 'date-fns';
import { ValidationError } from '../errors';
import type {
  CellValue,
  CurrencySummary,
  DateRangeSummary,
  DuplicateCheck,
  FieldStats,
  FieldType,
  Issue,
  OrderRecord,
  ValidationReport
} from '../types/schema';
import { IDENTIFIER_FIELDS, isBlank, profileField } from '../utils/profile';
import { coerceBoolean, coerceDates, coerceNumeric, parseNumber, type CoercionOutcome } from './coerce';
import { toDate } from '../utils/dates';

export const DEFAULT_MAX_ERRORS = 20;
export const DEFAULT_MIN_DATE = new Date('2000-01-01T00:00:00Z');

const NULL_ERROR_PCT = 50;
const NULL_WARNING_PCT = 20;
const SPARSE_PCT = 95;
const POOR_QUALITY_SCORE = 0.3;
const MAX_SPAN_DAYS = 5 * 365;

// Categorical and location fields are never parsed as numbers, however numeric they look.
const TEXT_ONLY_FIELDS = new Set([
  'country',
  'city',
  'state',
  'province',
  'region',
  'customer_name',
  'customer_email',
  'customer_phone',
  'product_name',
  'product_sku',
  'product_category',
  'order_status',
  'payment_method',
  'shipping_method'
]);
const TEXT_KEYWORDS = ['country', 'city', 'state', 'province', 'region', 'name', 'email', 'phone'];

export const isTextField = (name: string) =>
  TEXT_ONLY_FIELDS.has(name) || name.split('_').some(token => TEXT_KEYWORDS.includes(token));

export type ValidateOptions = {
  requiredFields: string[];
  fieldTypes: Record<string, FieldType>;
  maxErrors?: number;
  minDate?: Date;
  now?: Date;
};

export type ValidationOutcome = {
  report: ValidationReport;
  rows: OrderRecord[];
};

const pct = (count: number, total: number) => (total ? (count / total) * 100 : 0);
const fmtPct = (value: number) => `${value.toFixed(1)}%`;

const column = (rows: OrderRecord[], field: string): CellValue[] => rows.map(row => row[field] ?? null);

const countDuplicates = (keys: Array<string | null>) => {
  const seen = new Set<string>();
  let duplicates = 0;
  for (const key of keys) {
    if (key === null) continue;
    if (seen.has(key)) duplicates++;
    else seen.add(key);
  }
  return duplicates;
};

const keyText = (value: CellValue | undefined) => (isBlank(value) ? null : String(value).trim());

const emptyCurrency = (): CurrencySummary => ({
  present: false,
  currencies: [],
  distribution: {},
  missingCount: 0,
  mixed: false,
  defaultCurrency: null
});

/**
 * Validate a canonical order table. Returns the report and the rows with coerced
 * values; throws ValidationError carrying the partial report once errors pass the ceiling.
 */
export const validateOrders = (input: OrderRecord[], fields: string[], options: ValidateOptions): ValidationOutcome => {
  const maxErrors = options.maxErrors ?? DEFAULT_MAX_ERRORS;
  const minDate = options.minDate ?? DEFAULT_MIN_DATE;
  const now = options.now ?? new Date();
  const total = input.length;
  const rows = input.map(row => ({ ...row }));

  const report: ValidationReport = {
    isValid: false,
    totalRows: total,
    errors: [],
    warnings: [],
    fieldStats: {},
    qualityScore: 0,
    duplicates: { total: 0, checks: [] },
    invalidRows: 0,
    currency: emptyCurrency(),
    dateRange: null,
    conversions: []
  };

  const addError = (issue: Issue) => {
    report.errors.push(issue);
    if (report.errors.length > maxErrors) {
      throw new ValidationError(`Validation stopped after ${report.errors.length} errors (limit ${maxErrors})`, {
        ...report,
        isValid: false
      });
    }
  };
  const addWarning = (issue: Issue) => {
    report.warnings.push(issue);
  };

  // Required coverage and sparsity
  for (const field of options.requiredFields) {
    if (!fields.includes(field)) {
      addError({ code: 'unmapped_required', field, message: `Required field '${field}' is not mapped` });
    }
  }
  const nullPct: Record<string, number> = {};
  for (const field of fields) {
    const nulls = column(rows, field).filter(isBlank).length;
    nullPct[field] = pct(nulls, total);
    const required = options.requiredFields.includes(field);
    if (required && nullPct[field] > NULL_ERROR_PCT) {
      addError({ code: 'missing_values', field, message: `${field} has ${fmtPct(nullPct[field])} missing values` });
    } else if (required && nullPct[field] > NULL_WARNING_PCT) {
      addWarning({ code: 'missing_values', field, message: `${field} has ${fmtPct(nullPct[field])} missing values` });
    } else if (!required && nullPct[field] > SPARSE_PCT) {
      addWarning({ code: 'sparse_field', field, message: `${field} is ${fmtPct(nullPct[field])} empty` });
    }
  }

  // Type coercion
  const mismatched = new Set<string>();
  for (const field of fields) {
    const type = options.fieldTypes[field];
    if (!type || type === 'string') continue;
    if (type === 'float' && isTextField(field)) continue;

    const values = column(rows, field);
    let outcome: CoercionOutcome<number | Date | boolean>;
    if (type === 'float') outcome = coerceNumeric(values);
    else if (type === 'datetime') outcome = coerceDates(values);
    else outcome = coerceBoolean(values);

    const best = outcome.best;
    if (outcome.severity === 'empty' || !best) continue;
    const rate = fmtPct(best.successRate * 100);
    if (best.successRate < 0.8) mismatched.add(field);

    if (outcome.severity === 'error') {
      addError({
        code: 'coercion_failed',
        field,
        message: `${field} could not be converted to ${type}: best candidate parsed ${rate} of values`
      });
      continue;
    }
    if (outcome.severity === 'warning') {
      addWarning({
        code: 'coercion_partial',
        field,
        message: `${field} converted to ${type} with ${rate} success; unparsed values set to empty`
      });
    }
    best.values.forEach((value, index) => {
      rows[index][field] = value;
    });
    const via = best.candidate === 'numeric' || best.candidate === 'boolean' ? '' : ` (${best.candidate})`;
    report.conversions.push(`${field} -> ${type}${via}: ${rate}`);
  }

  // Field profiles
  for (const field of fields) {
    const stats: FieldStats = profileField(
      column(rows, field),
      mismatched.has(field),
      isTextField(field) ? 'string' : undefined,
      IDENTIFIER_FIELDS.has(field)
    );
    report.fieldStats[field] = stats;
    if (stats.qualityScore < POOR_QUALITY_SCORE) {
      addWarning({
        code: 'poor_quality',
        field,
        message: `${field} has poor data quality (score ${stats.qualityScore.toFixed(2)})`
      });
    }
  }

  // Duplicates
  if (fields.includes('order_id')) {
    const count = countDuplicates(column(rows, 'order_id').map(keyText));
    report.duplicates.checks.push({ type: 'order_id', count, percentage: pct(count, total), columns: ['order_id'] });
    if (count) {
      addWarning({
        code: 'duplicates',
        field: 'order_id',
        message: `${count} duplicate order IDs (${fmtPct(pct(count, total))})`
      });
    }
  }
  const composite = ['order_id', 'product_id', 'line_item_id'].filter(name => fields.includes(name));
  if (composite.length >= 2) {
    const keys = rows.map(row => JSON.stringify(composite.map(name => keyText(row[name]))));
    const count = countDuplicates(keys);
    const check: DuplicateCheck = { type: 'line_item', count, percentage: pct(count, total), columns: composite };
    report.duplicates.checks.push(check);
    if (count) {
      addWarning({
        code: 'duplicates',
        message: `${count} duplicate line items on (${composite.join(', ')}) (${fmtPct(check.percentage)})`
      });
    }
  }
  report.duplicates.total = report.duplicates.checks.reduce((acc, check) => acc + check.count, 0);

  // Business rules
  const invalid = new Set<number>();
  const ruleViolations = (field: string, test: (value: CellValue) => boolean) => {
    if (!fields.includes(field)) return 0;
    let count = 0;
    rows.forEach((row, index) => {
      if (test(row[field] ?? null)) {
        count++;
        invalid.add(index);
      }
    });
    return count;
  };
  const numberBelow = (limit: number, inclusive: boolean) => (value: CellValue) => {
    const num = parseNumber(value);
    return num !== null && (inclusive ? num <= limit : num < limit);
  };

  const negativeTotals = ruleViolations('order_total', numberBelow(0, false));
  if (negativeTotals) {
    addWarning({ code: 'negative_total', field: 'order_total', message: `${negativeTotals} orders have a negative order_total` });
  }
  const badQuantities = ruleViolations('quantity', numberBelow(0, true));
  if (badQuantities) {
    addWarning({ code: 'non_positive_quantity', field: 'quantity', message: `${badQuantities} rows have quantity <= 0` });
  }
  const futureDates = ruleViolations('order_date', value => {
    const date = value instanceof Date ? value : null;
    return date !== null && date > now;
  });
  if (futureDates) {
    addWarning({ code: 'future_date', field: 'order_date', message: `${futureDates} orders are dated in the future` });
  }
  const ancientDates = ruleViolations('order_date', value => value instanceof Date && value < minDate);
  if (ancientDates) {
    addWarning({
      code: 'ancient_date',
      field: 'order_date',
      message: `${ancientDates} orders are dated before ${format(minDate, 'yyyy-MM-dd')}`
    });
  }
  for (const field of ['order_id', 'customer_id']) {
    const empty = ruleViolations(field, isBlank);
    if (empty) addError({ code: 'empty_id', field, message: `${empty} rows have an empty ${field}` });
  }
  report.invalidRows = invalid.size;

  // Currency
  if (fields.includes('currency')) {
    const distribution: Record<string, number> = {};
    let missingCount = 0;
    for (const value of column(rows, 'currency')) {
      const code = keyText(value);
      if (code === null) missingCount++;
      else distribution[code] = (distribution[code] || 0) + 1;
    }
    const currencies = Object.keys(distribution);
    let defaultCurrency: string | null = null;
    for (const code of currencies) {
      if (defaultCurrency === null || distribution[code] > distribution[defaultCurrency]) defaultCurrency = code;
    }
    report.currency = { present: true, currencies, distribution, missingCount, mixed: currencies.length > 1, defaultCurrency };
    if (currencies.length > 1) {
      addWarning({
        code: 'mixed_currency',
        field: 'currency',
        message: `Multiple currencies detected: ${currencies.join(', ')}. Amounts are not converted`
      });
    }
  } else {
    addWarning({ code: 'missing_currency', message: 'No currency column; amounts are shown without a currency' });
  }

  // Date range
  if (fields.includes('order_date')) {
    const dates = column(rows, 'order_date')
      .map(value => (value instanceof Date ? value : toDate(value)))
      .filter((value): value is Date => value !== null);
    if (dates.length) {
      const minDateSeen = dates.reduce((a, b) => (b < a ? b : a));
      const maxDateSeen = dates.reduce((a, b) => (b > a ? b : a));
      const spanDays = differenceInDays(maxDateSeen, minDateSeen);
      const range: DateRangeSummary = {
        minDate: minDateSeen.toISOString(),
        maxDate: maxDateSeen.toISOString(),
        spanDays,
        totalOrders: total,
        ordersPerDay: total / Math.max(spanDays, 1)
      };
      report.dateRange = range;
      if (spanDays < 1) {
        addWarning({ code: 'date_span', field: 'order_date', message: 'All orders are from the same day' });
      } else if (spanDays > MAX_SPAN_DAYS) {
        addWarning({ code: 'date_span', field: 'order_date', message: `Orders span ${spanDays} days (more than 5 years)` });
      }
    }
  }

  const scores = Object.values(report.fieldStats).map(stats => stats.qualityScore);
  report.qualityScore = scores.length ? scores.reduce((acc, score) => acc + score, 0) / scores.length : 0;
  report.isValid = report.errors.length === 0;
  return { report, rows };
};
