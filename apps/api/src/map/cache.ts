import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { ColumnMapping } from '../types/schema';

const ColumnMappingSchema = z.object({
  platform: z.string(),
  columns: z.record(z.string()),
  confidence: z.record(z.number().min(0).max(1)),
  derived: z.record(z.string()).default({})
});

const CacheDocumentSchema = z.record(z.unknown());

/**
 * Key -> ColumnMapping store, read at pipeline start and overwritten at the end.
 *
 * Single writer: one pipeline run per uploaded file. Nothing here guards concurrent
 * writers to the same key; a multi-writer store would add its locking behind this interface.
 */
export interface MappingStore {
  get(key: string): ColumnMapping | null;
  put(key: string, mapping: ColumnMapping): void;
}

/** `{stem}_{size}_{extension}`, extension with its dot. */
export const fileKey = (filename: string, size: number) => {
  const { name, ext } = path.parse(filename);
  return `${name}_${size}_${ext}`;
};

const copyMapping = (mapping: ColumnMapping): ColumnMapping => ({
  platform: mapping.platform,
  columns: { ...mapping.columns },
  confidence: { ...mapping.confidence },
  derived: { ...mapping.derived }
});

export class InMemoryMappingStore implements MappingStore {
  private readonly entries = new Map<string, ColumnMapping>();

  get(key: string) {
    const entry = this.entries.get(key);
    return entry ? copyMapping(entry) : null;
  }

  put(key: string, mapping: ColumnMapping) {
    this.entries.set(key, copyMapping(mapping));
  }
}

/**
 * All mappings in one JSON document, `{ [key]: ColumnMapping }`, rewritten in full on
 * every put through a temp file and a rename.
 */
export class JsonFileMappingStore implements MappingStore {
  constructor(private readonly file: string) {}

  private readDocument(): Record<string, unknown> {
    if (!fs.existsSync(this.file)) return {};
    try {
      const parsed = CacheDocumentSchema.safeParse(JSON.parse(fs.readFileSync(this.file, 'utf8')));
      if (parsed.success) return parsed.data;
      console.warn(`Mapping cache ${this.file} is not a JSON object; starting empty`);
    } catch (err) {
      console.warn(`Mapping cache ${this.file} is unreadable; starting empty:`, err);
    }
    return {};
  }

  get(key: string): ColumnMapping | null {
    const doc = this.readDocument();
    if (!(key in doc)) return null;
    const parsed = ColumnMappingSchema.safeParse(doc[key]);
    if (!parsed.success) {
      console.warn(`Ignoring invalid cached mapping for ${key}: ${parsed.error.issues[0].message}`);
      return null;
    }
    return parsed.data;
  }

  put(key: string, mapping: ColumnMapping) {
    const doc = this.readDocument();
    doc[key] = mapping;
    fs.mkdirSync(path.dirname(this.file), { recursive: true });
    const tmp = `${this.file}.${process.pid}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(doc, null, 2), 'utf8');
    fs.renameSync(tmp, this.file);
  }
}
