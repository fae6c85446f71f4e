export type FieldType = 'string' | 'float' | 'datetime' | 'boolean';

export const FIELD_TYPES: readonly FieldType[] = ['string', 'float', 'datetime', 'boolean'];

export type CellValue = string | number | boolean | Date | null;

export type CanonicalField = {
  name: string;
  required: boolean;
  type: FieldType;
  description: string;
  synonyms: Record<string, string[]>; // language tag -> header strings
  category?: string;
  custom?: boolean;
};

export type PlatformSchema = {
  name: string;
  displayName: string;
  languages: string[];
  fields: CanonicalField[];
};

export type ColumnMapping = {
  platform: string;
  columns: Record<string, string>; // canonical field -> source column
  confidence: Record<string, number>; // 0..1
  derived: Record<string, string>; // canonical field -> canonical field it is copied from
};

export type RawTable = {
  name: string;
  columns: string[];
  rows: Record<string, CellValue>[];
};

export type OrderRecord = Record<string, CellValue>;

export type AggregationStrategy = 'by_order_id' | 'by_customer_date' | 'by_sequential_boundary';

export type DataLevel = 'order' | 'line_item';

export type IssueCode =
  | 'unmapped_required'
  | 'missing_values'
  | 'sparse_field'
  | 'coercion_failed'
  | 'coercion_partial'
  | 'duplicates'
  | 'negative_total'
  | 'non_positive_quantity'
  | 'future_date'
  | 'ancient_date'
  | 'empty_id'
  | 'mixed_currency'
  | 'missing_currency'
  | 'date_span'
  | 'identity_substitution'
  | 'low_confidence_mapping'
  | 'unknown_platform'
  | 'poor_quality';

export type Issue = {
  code: IssueCode;
  message: string;
  field?: string;
};

export type FieldStats = {
  totalRows: number;
  nullCount: number;
  nullPercentage: number; // 0..100
  uniqueCount: number;
  uniquePercentage: number; // 0..100
  inferredType: FieldType;
  qualityScore: number; // 0..1
  sampleValues: string[];
};

export type DuplicateCheck = {
  type: 'order_id' | 'line_item';
  count: number;
  percentage: number;
  columns: string[];
};

export type CurrencySummary = {
  present: boolean;
  currencies: string[];
  distribution: Record<string, number>;
  missingCount: number;
  mixed: boolean;
  defaultCurrency: string | null;
};

export type DateRangeSummary = {
  minDate: string;
  maxDate: string;
  spanDays: number;
  totalOrders: number;
  ordersPerDay: number;
};

export type ValidationReport = {
  isValid: boolean;
  totalRows: number;
  errors: Issue[];
  warnings: Issue[];
  fieldStats: Record<string, FieldStats>;
  qualityScore: number; // 0..1
  duplicates: { total: number; checks: DuplicateCheck[] };
  invalidRows: number;
  currency: CurrencySummary;
  dateRange: DateRangeSummary | null;
  conversions: string[];
};

export type CleaningSummary = {
  originalRows: number;
  removedRows: number;
  steps: string[];
  finalRows: number;
};
