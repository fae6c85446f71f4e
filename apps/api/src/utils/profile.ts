import type { CellValue, FieldStats, FieldType } from '../types/schema';
import { parseBoolean, parseNumber, parseDateAuto } from '../validate/coerce';

const SAMPLE_LIMIT = 5;
const TYPE_RATIO = 0.8;

export const isBlank = (v: unknown) => v === null || v === undefined || String(v).trim() === '';

const displayValue = (v: CellValue) => (v instanceof Date ? v.toISOString() : String(v).trim());

export const inferFieldType = (values: CellValue[]): FieldType => {
  const cleaned = values.filter(v => !isBlank(v));
  if (!cleaned.length) return 'string';

  let numberCount = 0;
  let booleanCount = 0;
  let dateCount = 0;
  for (const v of cleaned) {
    if (typeof v === 'boolean' || (typeof v === 'string' && parseBoolean(v) !== null && parseNumber(v) === null)) {
      booleanCount++;
    }
    if (typeof v === 'number' || parseNumber(v) !== null) numberCount++;
    if (v instanceof Date || parseDateAuto(v) !== null) dateCount++;
  }

  const ratio = (n: number) => n / cleaned.length;
  if (ratio(numberCount) >= TYPE_RATIO) return 'float';
  if (ratio(booleanCount) >= TYPE_RATIO) return 'boolean';
  if (ratio(dateCount) >= TYPE_RATIO) return 'datetime';
  return 'string';
};

export const IDENTIFIER_FIELDS = new Set(['order_id', 'customer_id', 'product_id']);
const ID_UNIQUE_RATIO = 0.8;

/**
 * Null/unique profile of one canonical field. Quality starts at 1 and is multiplied
 * down for nulls (x0.5 over 50%, x0.8 over 20%), for a type mismatch (x0.7) and,
 * on identifier fields, for fewer than 80% distinct non-empty values (x0.8).
 */
export const profileField = (
  values: CellValue[],
  typeMismatch = false,
  inferredType?: FieldType,
  identifier = false
): FieldStats => {
  const cleaned = values.filter(v => !isBlank(v));
  const total = values.length;
  const nulls = total - cleaned.length;
  const unique = new Set(cleaned.map(displayValue));

  const nullPercentage = total ? (nulls / total) * 100 : 0;
  let qualityScore = 1;
  if (nullPercentage > 50) qualityScore *= 0.5;
  else if (nullPercentage > 20) qualityScore *= 0.8;
  if (typeMismatch) qualityScore *= 0.7;
  if (identifier && unique.size / Math.max(cleaned.length, 1) < ID_UNIQUE_RATIO) qualityScore *= 0.8;

  return {
    totalRows: total,
    nullCount: nulls,
    nullPercentage,
    uniqueCount: unique.size,
    uniquePercentage: total ? (unique.size / total) * 100 : 0,
    inferredType: inferredType ?? inferFieldType(values),
    qualityScore: Math.max(0, qualityScore),
    sampleValues: Array.from(unique).slice(0, SAMPLE_LIMIT)
  };
};
