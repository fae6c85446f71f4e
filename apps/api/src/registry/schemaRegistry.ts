import fs from 'fs';
import { z } from 'zod';
import { DEFAULT_REGISTRY_PATH } from '../config';
import { SchemaError } from '../errors';
import { FIELD_TYPES, type CanonicalField, type FieldType, type PlatformSchema } from '../types/schema';
import { rawSimilarity } from '../utils/similarity';
import { parseBoolean, parseNumber, parseDateAuto } from '../validate/coerce';

export const CUSTOM_PLATFORM = 'custom';

const PLATFORM_MATCH_SIMILARITY = 0.8;
const PLATFORM_MIN_FRACTION = 0.3;

const FieldSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/),
  type: z.enum(['string', 'float', 'datetime', 'boolean']),
  required: z.boolean().default(false),
  description: z.string().default(''),
  category: z.string().optional(),
  synonyms: z.record(z.array(z.string().min(1))).default({})
});

const PlatformDocSchema = z.object({
  displayName: z.string().min(1),
  languages: z.array(z.string()).default([]),
  fields: z.array(FieldSchema).min(1)
});

export const RegistryDocumentSchema = z
  .object({
    version: z.string().min(1),
    defaultPlatform: z.string().min(1),
    platforms: z.record(PlatformDocSchema)
  })
  .refine(doc => doc.defaultPlatform in doc.platforms, {
    message: 'defaultPlatform must name one of the declared platforms',
    path: ['defaultPlatform']
  });

export type RegistryDocument = z.infer<typeof RegistryDocumentSchema>;

export type CustomFieldInput = {
  name: string;
  type?: string;
  required?: boolean;
  synonyms?: string[];
  description?: string;
  category?: string;
};

export type FieldTypeSuggestion = { type: FieldType; confidence: number };

const DATE_NAME_PATTERNS = [/date/, /time/, /created/, /updated/, /تاريخ/, /وقت/];
const NUMERIC_NAME_PATTERNS = [/total/, /amount/, /price/, /cost/, /quantity/, /qty/, /count/, /إجمالي/, /مبلغ/, /كمية/];
const BOOLEAN_NAME_PATTERNS = [/^is_/, /^has_/, /enabled/, /active/];

const isMissing = (value: unknown) => value === null || value === undefined || String(value).trim() === '';

const ratio = (values: unknown[], test: (value: unknown) => boolean) =>
  values.length ? values.filter(test).length / values.length : 0;

const freezeField = (field: CanonicalField): CanonicalField =>
  Object.freeze({ ...field, synonyms: Object.freeze({ ...field.synonyms }) });

export class SchemaRegistry {
  readonly defaultPlatform: string;
  private readonly doc: RegistryDocument;
  private readonly platformMap: Map<string, PlatformSchema>;
  private readonly customFields = new Map<string, CanonicalField>();

  constructor(doc: RegistryDocument, defaultPlatform?: string) {
    this.doc = doc;
    this.platformMap = new Map(
      Object.entries(doc.platforms).map(([name, platform]) => [
        name,
        Object.freeze({
          name,
          displayName: platform.displayName,
          languages: [...platform.languages],
          fields: platform.fields.map(field => freezeField({ ...field }))
        })
      ])
    );
    if (defaultPlatform && this.platformMap.has(defaultPlatform)) {
      this.defaultPlatform = defaultPlatform;
    } else {
      if (defaultPlatform) console.warn(`Platform '${defaultPlatform}' not found in registry. Using '${doc.defaultPlatform}'.`);
      this.defaultPlatform = doc.defaultPlatform;
    }
  }

  version() {
    return this.doc.version;
  }

  platformNames() {
    return Array.from(this.platformMap.keys());
  }

  /** Platform schema with custom fields appended; unknown names fall back to the default platform. */
  getPlatform(name?: string): PlatformSchema {
    const key = (name || this.defaultPlatform).toLowerCase();
    let platform = this.platformMap.get(key);
    if (!platform) {
      if (key !== CUSTOM_PLATFORM) console.warn(`Platform '${name}' not found. Using '${this.defaultPlatform}' schema.`);
      platform = this.platformMap.get(this.defaultPlatform);
    }
    if (!platform) throw new SchemaError(`Default platform '${this.defaultPlatform}' is missing from the registry`);

    const registered = new Set(platform.fields.map(f => f.name));
    const extra = Array.from(this.customFields.values()).filter(f => !registered.has(f.name));
    return { ...platform, fields: [...platform.fields, ...extra] };
  }

  fields(platform?: string) {
    return this.getPlatform(platform).fields;
  }

  getField(name: string, platform?: string) {
    return this.fields(platform).find(f => f.name === name);
  }

  requiredFields(platform?: string) {
    return this.fields(platform)
      .filter(f => f.required)
      .map(f => f.name);
  }

  optionalFields(platform?: string) {
    return this.fields(platform)
      .filter(f => !f.required)
      .map(f => f.name);
  }

  allFields(platform?: string) {
    return this.fields(platform).map(f => f.name);
  }

  fieldSynonyms(name: string, platform?: string) {
    const field = this.getField(name, platform);
    return field ? Object.values(field.synonyms).flat() : [];
  }

  addCustomField(input: CustomFieldInput): CanonicalField {
    const name = input.name.trim();
    if (!/^[a-z][a-z0-9_]*$/.test(name)) {
      throw new SchemaError(`Custom field name '${input.name}' must be lower snake_case`);
    }
    let type: FieldType = 'string';
    const requested = FIELD_TYPES.find(t => t === input.type);
    if (requested) type = requested;
    else if (input.type) console.warn(`Invalid field type '${input.type}' for '${name}'. Using 'string'.`);

    const field = freezeField({
      name,
      type,
      required: input.required ?? false,
      description: input.description ?? '',
      category: input.category ?? 'custom',
      synonyms: { custom: input.synonyms?.length ? [...input.synonyms] : [name] },
      custom: true
    });
    this.customFields.set(name, field);
    return field;
  }

  getCustomFields() {
    return Array.from(this.customFields.values());
  }

  /**
   * Guess the source platform from raw headers: the share of each platform's required
   * fields with a synonym close to some column. Below 0.3 the file is 'custom'.
   */
  detectPlatform(columns: string[]): { platform: string; scores: Record<string, number> } {
    const scores: Record<string, number> = {};
    if (!columns.length) return { platform: this.defaultPlatform, scores };

    for (const [name, platform] of this.platformMap) {
      const required = platform.fields.filter(f => f.required);
      if (!required.length) continue;
      const matched = required.filter(field =>
        Object.values(field.synonyms)
          .flat()
          .some(synonym => columns.some(column => rawSimilarity(synonym, column) >= PLATFORM_MATCH_SIMILARITY))
      ).length;
      scores[name] = matched / required.length;
    }

    let best: string | null = null;
    for (const [name, score] of Object.entries(scores)) {
      if (best === null || score > scores[best]) best = name;
    }
    if (best === null) return { platform: this.defaultPlatform, scores };
    return { platform: scores[best] >= PLATFORM_MIN_FRACTION ? best : CUSTOM_PLATFORM, scores };
  }

  suggestFieldType(columnName: string, samples: unknown[]): FieldTypeSuggestion {
    const values = samples.filter(v => !isMissing(v));
    if (!values.length) return { type: 'string', confidence: 0.5 };

    const name = columnName.toLowerCase();
    const head = values.slice(0, 5);

    if (DATE_NAME_PATTERNS.some(p => p.test(name)) && head.every(v => parseDateAuto(v) !== null)) {
      return { type: 'datetime', confidence: 0.9 };
    }
    if (NUMERIC_NAME_PATTERNS.some(p => p.test(name)) && head.every(v => parseNumber(v) !== null)) {
      return { type: 'float', confidence: 0.85 };
    }
    if (BOOLEAN_NAME_PATTERNS.some(p => p.test(name)) && values.every(v => parseBoolean(v) !== null)) {
      return { type: 'boolean', confidence: 0.9 };
    }

    const numericRatio = ratio(values, v => parseNumber(v) !== null);
    if (numericRatio > 0.8) return { type: 'float', confidence: numericRatio };

    const dateRatio = ratio(values, v => parseDateAuto(v) !== null);
    if (dateRatio > 0.8) return { type: 'datetime', confidence: dateRatio };

    return { type: 'string', confidence: 0.6 };
  }
}

export const parseRegistryDocument = (raw: unknown, source = 'registry'): RegistryDocument => {
  const parsed = RegistryDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SchemaError(`Invalid schema registry (${source}) at '${issue.path.join('.')}': ${issue.message}`);
  }
  return parsed.data;
};

export const loadRegistry = (filePath = DEFAULT_REGISTRY_PATH, defaultPlatform?: string) => {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SchemaError(`Schema registry could not be read from ${filePath}: ${reason}`);
  }
  return new SchemaRegistry(parseRegistryDocument(raw, filePath), defaultPlatform);
};
