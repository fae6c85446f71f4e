import { aggregateOrders, summarizeAggregation, type AggregationSummary } from '../aggregate/aggregator';
import { detectLevel, type LevelDecision } from '../aggregate/levelDetector';
import { AggregationError, SchemaError, type Suggestion } from '../errors';
import type { MappingStore } from '../map/cache';
import { applyManualMapping, mappedFields, matchColumns, projectRows } from '../map/matcher';
import { CUSTOM_PLATFORM, type SchemaRegistry } from '../registry/schemaRegistry';
import type {
  AggregationStrategy,
  CleaningSummary,
  ColumnMapping,
  FieldType,
  Issue,
  OrderRecord,
  RawTable,
  ValidationReport
} from '../types/schema';
import { cleanOrders } from '../validate/cleaner';
import { validateOrders } from '../validate/validator';

const PREVIEW_ROWS = 10;

export type PipelineOptions = {
  platform?: string;
  threshold?: number;
  /** canonical field -> source column */
  mapping?: Record<string, string>;
  confirmAggregation?: boolean;
  strategy?: AggregationStrategy;
  clean?: boolean;
  cacheKey?: string;
  maxErrors?: number;
  minDate?: Date;
  now?: Date;
};

export type PipelineDeps = {
  registry: SchemaRegistry;
  store?: MappingStore;
};

type MappingStage = {
  platform: string;
  detectedPlatform: string | null;
  mapping: ColumnMapping;
  suggestions: Record<string, Suggestion[]>;
  warnings: Issue[];
  fromCache: boolean;
};

export type AwaitingConfirmation = MappingStage & {
  status: 'awaiting_confirmation';
  level: LevelDecision;
  preview: OrderRecord[];
};

export type PipelineComplete = MappingStage & {
  status: 'complete';
  level: LevelDecision;
  strategy: AggregationStrategy | null;
  aggregation: AggregationSummary | null;
  rows: OrderRecord[];
  report: ValidationReport;
  cleaning: CleaningSummary | null;
};

export type PipelineResult = AwaitingConfirmation | PipelineComplete;

const resolveMapping = (table: RawTable, deps: PipelineDeps, options: PipelineOptions): MappingStage => {
  const { registry, store } = deps;
  const cached = store && options.cacheKey ? store.get(options.cacheKey) : null;
  const warnings: Issue[] = [];

  if (cached) {
    console.info(`Using cached mapping for ${options.cacheKey}`);
    return {
      platform: cached.platform,
      detectedPlatform: null,
      mapping: cached,
      suggestions: {},
      warnings,
      fromCache: true
    };
  }

  let platformName = options.platform;
  let detectedPlatform: string | null = null;
  if (!platformName) {
    const detection = registry.detectPlatform(table.columns);
    detectedPlatform = detection.platform;
    console.info(`Detected platform '${detection.platform}'`, detection.scores);
    if (detection.platform === CUSTOM_PLATFORM) {
      warnings.push({
        code: 'unknown_platform',
        message: `Columns do not match a known platform; matching against '${registry.defaultPlatform}' synonyms`
      });
      platformName = registry.defaultPlatform;
    } else {
      platformName = detection.platform;
    }
  }

  const platform = registry.getPlatform(platformName);
  const match = matchColumns(table, platform, { threshold: options.threshold });
  return {
    platform: platform.name,
    detectedPlatform,
    mapping: match.mapping,
    suggestions: match.suggestions,
    warnings: [...warnings, ...match.warnings],
    fromCache: false
  };
};

const fieldTypes = (registry: SchemaRegistry, platform: string) => {
  const types: Record<string, FieldType> = {};
  for (const field of registry.fields(platform)) types[field.name] = field.type;
  return types;
};

/**
 * Raw table in, canonical order table out: match, detect level, aggregate behind the
 * confirmation gate, validate, optionally clean.
 */
export const runPipeline = (table: RawTable, deps: PipelineDeps, options: PipelineOptions = {}): PipelineResult => {
  const { registry, store } = deps;
  const stage = resolveMapping(table, deps, options);
  if (options.mapping && Object.keys(options.mapping).length) {
    stage.mapping = applyManualMapping(stage.mapping, options.mapping, table.columns);
    for (const field of Object.keys(options.mapping)) delete stage.suggestions[field];
  }

  const required = registry.requiredFields(stage.platform);
  const mapped = mappedFields(stage.mapping);
  if (!mapped.length) {
    throw new SchemaError(
      `None of the ${table.columns.length} columns in ${table.name} matched a canonical field`,
      required,
      stage.suggestions
    );
  }

  const projected = projectRows(table, stage.mapping);
  const level = detectLevel(projected, mapped);
  console.info(
    `Data level: ${level.level} (${(level.confidence * 100).toFixed(0)}% confidence, ${level.indicators.length} indicators)`
  );

  let rows = projected;
  let fields = mapped;
  let strategy: AggregationStrategy | null = null;
  let aggregation: AggregationSummary | null = null;

  if (level.requiresAggregation) {
    if (!options.confirmAggregation) {
      return { ...stage, status: 'awaiting_confirmation', level, preview: projected.slice(0, PREVIEW_ROWS) };
    }
    strategy = options.strategy ?? level.strategy;
    if (!strategy) {
      throw new AggregationError('Line-item data needs order_id, or customer_id with order_date, to build orders', [
        'order_id',
        'customer_id',
        'order_date'
      ]);
    }
    console.info(`Aggregating with ${strategy}: ${level.preconditions.join('; ')}`);
    const result = aggregateOrders(projected, mapped, strategy);
    rows = result.rows;
    fields = Array.from(new Set([...mapped, 'order_id', 'order_total', 'item_count']));
    aggregation = summarizeAggregation(projected, rows);
  }

  const missing = required.filter(name => !fields.includes(name));
  if (missing.length) {
    const suggestions: Record<string, Suggestion[]> = {};
    for (const name of missing) suggestions[name] = stage.suggestions[name] || [];
    throw new SchemaError(`Required fields could not be mapped: ${missing.join(', ')}`, missing, suggestions);
  }

  const validated = validateOrders(rows, fields, {
    requiredFields: required,
    fieldTypes: fieldTypes(registry, stage.platform),
    maxErrors: options.maxErrors,
    minDate: options.minDate,
    now: options.now
  });
  const report: ValidationReport = {
    ...validated.report,
    warnings: [...stage.warnings, ...validated.report.warnings]
  };

  let finalRows = validated.rows;
  let cleaning: CleaningSummary | null = null;
  if (options.clean) {
    const cleaned = cleanOrders(finalRows);
    finalRows = cleaned.rows;
    cleaning = cleaned.summary;
  }

  if (store && options.cacheKey) store.put(options.cacheKey, stage.mapping);

  return {
    ...stage,
    status: 'complete',
    level,
    strategy,
    aggregation,
    rows: finalRows,
    report,
    cleaning
  };
};
