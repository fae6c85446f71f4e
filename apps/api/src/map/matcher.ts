import { SchemaError, type Suggestion } from '../errors';
import type { ColumnMapping, Issue, OrderRecord, PlatformSchema, RawTable } from '../types/schema';
import { matchScore } from '../utils/similarity';

export const DEFAULT_THRESHOLD = 0.8;
const SUGGESTION_FLOOR = 0.3;
const SUGGESTION_LIMIT = 3;
// Mapped fields under this score are reported for review.
const REVIEW_BELOW = 0.9;

// Preferred first.
const IDENTITY_FALLBACKS = ['customer_phone', 'customer_email'];

export type MatchOptions = {
  threshold?: number;
};

export type FieldCandidate = Suggestion;

export type MatchResult = {
  mapping: ColumnMapping;
  /** Every column scored per field, best first; kept for diagnostics even when unmapped. */
  candidates: Record<string, FieldCandidate[]>;
  suggestions: Record<string, Suggestion[]>;
  unmappedRequired: string[];
  warnings: Issue[];
};

const rankColumns = (columns: string[], synonyms: string[]): FieldCandidate[] => {
  const ranked = columns.map(column => {
    let best = 0;
    for (const synonym of synonyms) {
      const score = matchScore(column, synonym);
      if (score > best) best = score;
      if (best === 1) break;
    }
    return { column, score: best };
  });
  // Array#sort is stable, so equal scores keep column order.
  return ranked.sort((a, b) => b.score - a.score);
};

const fieldSynonyms = (platform: PlatformSchema, name: string) => {
  const field = platform.fields.find(f => f.name === name);
  return field ? [...Object.values(field.synonyms).flat(), field.name] : [name];
};

const topSuggestions = (candidates: FieldCandidate[] = []) =>
  candidates.filter(c => c.score > SUGGESTION_FLOOR).slice(0, SUGGESTION_LIMIT);

const keyOf = (value: unknown) => (value === null || value === undefined ? '' : String(value).trim());

/** Phone values that appear with more than one distinct email. */
export const countSharedPhones = (rows: OrderRecord[], phoneColumn: string, emailColumn: string) => {
  const emailsByPhone = new Map<string, Set<string>>();
  for (const row of rows) {
    const phone = keyOf(row[phoneColumn]);
    const email = keyOf(row[emailColumn]).toLowerCase();
    if (!phone || !email) continue;
    const emails = emailsByPhone.get(phone) || new Set<string>();
    emails.add(email);
    emailsByPhone.set(phone, emails);
  }
  let shared = 0;
  emailsByPhone.forEach(emails => {
    if (emails.size > 1) shared++;
  });
  return shared;
};

/**
 * Map raw headers onto the platform's canonical fields.
 *
 * Each field keeps its best (column, score) pair. A field is mapped only at or above the
 * threshold, and a column claimed by several fields goes to the strictly highest score,
 * the earlier field in platform order winning ties.
 */
export const matchColumns = (table: RawTable, platform: PlatformSchema, options: MatchOptions = {}): MatchResult => {
  const threshold = options.threshold ?? DEFAULT_THRESHOLD;
  const candidates: Record<string, FieldCandidate[]> = {};
  const claims = new Map<string, { field: string; score: number }>();

  for (const field of platform.fields) {
    const ranked = rankColumns(table.columns, fieldSynonyms(platform, field.name));
    candidates[field.name] = ranked;
    const best = ranked[0];
    if (!best || best.score < threshold) continue;

    const holder = claims.get(best.column);
    if (!holder || best.score > holder.score) {
      claims.set(best.column, { field: field.name, score: best.score });
    }
  }

  const mapping: ColumnMapping = { platform: platform.name, columns: {}, confidence: {}, derived: {} };
  claims.forEach(({ field, score }, column) => {
    mapping.columns[field] = column;
    mapping.confidence[field] = score;
  });

  const warnings: Issue[] = [];
  const required = platform.fields.filter(f => f.required).map(f => f.name);

  if (required.includes('customer_id') && !mapping.columns.customer_id) {
    const source = IDENTITY_FALLBACKS.find(name => mapping.columns[name]);
    if (source) {
      mapping.derived.customer_id = source;
      mapping.confidence.customer_id = mapping.confidence[source];
      warnings.push({
        code: 'identity_substitution',
        field: 'customer_id',
        message: `customer_id not found; using '${mapping.columns[source]}' (${source}) as the customer identifier`
      });
      const emailColumn = mapping.columns.customer_email;
      if (source === 'customer_phone' && emailColumn) {
        const shared = countSharedPhones(table.rows, mapping.columns.customer_phone, emailColumn);
        if (shared > 0) {
          warnings.push({
            code: 'identity_substitution',
            field: 'customer_id',
            message: `${shared} phone number(s) are shared by customers with different emails; they will be treated as one customer`
          });
        }
      }
    }
  }

  for (const field of platform.fields) {
    const confidence = mapping.confidence[field.name];
    if (mapping.columns[field.name] && confidence < REVIEW_BELOW) {
      warnings.push({
        code: 'low_confidence_mapping',
        field: field.name,
        message: `'${mapping.columns[field.name]}' mapped to ${field.name} with ${(confidence * 100).toFixed(0)}% confidence`
      });
    }
  }

  const suggestions: Record<string, Suggestion[]> = {};
  for (const field of platform.fields) {
    if (mapping.columns[field.name] || mapping.derived[field.name]) continue;
    suggestions[field.name] = topSuggestions(candidates[field.name]);
  }

  const unmappedRequired = required.filter(name => !mapping.columns[name] && !mapping.derived[name]);
  return { mapping, candidates, suggestions, unmappedRequired, warnings };
};

/** Operator overrides win with full confidence and evict any other field holding the same column. */
export const applyManualMapping = (
  mapping: ColumnMapping,
  overrides: Record<string, string>,
  columns?: string[]
): ColumnMapping => {
  const next: ColumnMapping = {
    platform: mapping.platform,
    columns: { ...mapping.columns },
    confidence: { ...mapping.confidence },
    derived: { ...mapping.derived }
  };

  for (const [field, column] of Object.entries(overrides)) {
    if (columns && !columns.includes(column)) {
      throw new SchemaError(`Manual mapping for ${field} names unknown column '${column}'`, [field]);
    }
    for (const [other, claimed] of Object.entries(next.columns)) {
      if (other !== field && claimed === column) {
        delete next.columns[other];
        delete next.confidence[other];
      }
    }
    next.columns[field] = column;
    next.confidence[field] = 1;
    delete next.derived[field];
  }

  // A substitution whose source was evicted no longer holds.
  for (const [field, source] of Object.entries(next.derived)) {
    if (!next.columns[source]) {
      delete next.derived[field];
      delete next.confidence[field];
    }
  }
  return next;
};

export const mappedFields = (mapping: ColumnMapping) => [
  ...Object.keys(mapping.columns),
  ...Object.keys(mapping.derived).filter(field => !mapping.columns[field])
];

/** Canonical rows keyed by field name; derived fields copy their source field's column. */
export const projectRows = (table: RawTable, mapping: ColumnMapping): OrderRecord[] => {
  const sources: Array<[string, string]> = Object.entries(mapping.columns);
  for (const [field, source] of Object.entries(mapping.derived)) {
    const column = mapping.columns[source];
    if (column && !mapping.columns[field]) sources.push([field, column]);
  }
  return table.rows.map(row => {
    const record: OrderRecord = {};
    for (const [field, column] of sources) {
      record[field] = row[column] ?? null;
    }
    return record;
  });
};
