import { isValid, parse, parseISO } from 'date-fns';
import type { CellValue } from '../types/schema';

export type CoercionKind = 'float' | 'datetime' | 'boolean';

export type CandidateResult<T> = {
  candidate: string;
  successRate: number; // 0..1 over non-null source values
  values: Array<T | null>;
};

export type CoercionOutcome<T> = {
  kind: CoercionKind;
  nonNull: number;
  best: CandidateResult<T> | null;
  tried: Array<{ candidate: string; successRate: number }>;
  severity: 'ok' | 'warning' | 'error' | 'empty';
};

export const ERROR_BELOW = 0.5;
export const WARN_BELOW = 0.8;
export const EARLY_STOP_ABOVE = 0.95;

// Order matters: earlier candidates win ties.
export const DATE_CANDIDATES = [
  'auto',
  'yyyy-M-d',
  'yyyy-M-d H:mm:ss',
  'd/M/yyyy',
  'M/d/yyyy',
  'yyyy/M/d',
  'd.M.yyyy',
  'd-M-yyyy',
  'yyyy.M.d',
  'd/M/yyyy H:mm'
] as const;

const REFERENCE_DATE = new Date(2000, 0, 1);
const THOUSANDS = /^-?\d{1,3}(,\d{3})+(\.\d+)?$/;
const PLAIN_NUMBER = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;
const CURRENCY_MARKS = /[$€£¥﷼\s]/g;
const TRUE_VALUES = new Set(['true', 'yes', 'y', '1', 't']);
const FALSE_VALUES = new Set(['false', 'no', 'n', '0', 'f']);

export const isMissing = (value: unknown) => value === null || value === undefined || value === '';

export const parseNumber = (value: unknown): number | null => {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  let text = value.replace(CURRENCY_MARKS, '');
  if (!text) return null;
  if (THOUSANDS.test(text)) text = text.replace(/,/g, '');
  if (!PLAIN_NUMBER.test(text)) return null;
  const num = Number(text);
  return Number.isFinite(num) ? num : null;
};

export const parseBoolean = (value: unknown): boolean | null => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value === 1 ? true : value === 0 ? false : null;
  if (typeof value !== 'string') return null;
  const text = value.trim().toLowerCase();
  if (TRUE_VALUES.has(text)) return true;
  if (FALSE_VALUES.has(text)) return false;
  return null;
};

/** ISO strings, Date cells, and written-out dates such as "Jan 5, 2024". */
export const parseDateAuto = (value: unknown): Date | null => {
  if (value instanceof Date) return isValid(value) ? value : null;
  if (typeof value !== 'string') return null;
  const text = value.trim();
  if (!text) return null;
  const iso = parseISO(text);
  if (isValid(iso)) return iso;
  if (/[a-z]/i.test(text) && /\b\d{4}\b/.test(text)) {
    const loose = new Date(text);
    if (isValid(loose)) return loose;
  }
  return null;
};

export const parseDateWith = (value: unknown, candidate: string): Date | null => {
  if (candidate === 'auto') return parseDateAuto(value);
  if (value instanceof Date) return isValid(value) ? value : null;
  if (typeof value !== 'string') return null;
  const text = value.trim();
  if (!text) return null;
  const parsed = parse(text, candidate, REFERENCE_DATE);
  return isValid(parsed) ? parsed : null;
};

const runCandidate = <T>(
  values: CellValue[],
  candidate: string,
  convert: (value: CellValue) => T | null
): CandidateResult<T> => {
  let nonNull = 0;
  let parsed = 0;
  const out = values.map(value => {
    if (isMissing(value)) return null;
    nonNull++;
    const converted = convert(value);
    if (converted !== null) parsed++;
    return converted;
  });
  return { candidate, successRate: nonNull ? parsed / nonNull : 0, values: out };
};

const severityOf = (rate: number): CoercionOutcome<unknown>['severity'] => {
  if (rate < ERROR_BELOW) return 'error';
  if (rate < WARN_BELOW) return 'warning';
  return 'ok';
};

const countNonNull = (values: CellValue[]) => values.filter(v => !isMissing(v)).length;

/**
 * Evaluate ranked candidates and keep the one with the highest success rate.
 * Stops early once a candidate clears 95%.
 */
export const rankCandidates = <T>(
  kind: CoercionKind,
  values: CellValue[],
  candidates: readonly string[],
  convert: (value: CellValue, candidate: string) => T | null
): CoercionOutcome<T> => {
  const nonNull = countNonNull(values);
  if (!nonNull) return { kind, nonNull, best: null, tried: [], severity: 'empty' };

  let best: CandidateResult<T> | null = null;
  const tried: CoercionOutcome<T>['tried'] = [];
  for (const candidate of candidates) {
    const result = runCandidate(values, candidate, value => convert(value, candidate));
    tried.push({ candidate, successRate: result.successRate });
    if (!best || result.successRate > best.successRate) best = result;
    if (result.successRate > EARLY_STOP_ABOVE) break;
  }
  return { kind, nonNull, best, tried, severity: best ? severityOf(best.successRate) : 'error' };
};

export const coerceNumeric = (values: CellValue[]) => rankCandidates('float', values, ['numeric'], value => parseNumber(value));

export const coerceBoolean = (values: CellValue[]) => rankCandidates('boolean', values, ['boolean'], value => parseBoolean(value));

export const coerceDates = (values: CellValue[], candidates: readonly string[] = DATE_CANDIDATES) =>
  rankCandidates('datetime', values, candidates, (value, candidate) => parseDateWith(value, candidate));
