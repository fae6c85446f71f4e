import express from 'express';
import type { Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';

import { loadConfig, type AppConfig } from './config';
import { isPipelineError } from './errors';
import { readTableBuffer, isSupportedFile } from './ingest/csv';
import { pruneUploads, saveUpload } from './ingest/uploads';
import { fileKey, JsonFileMappingStore, type MappingStore } from './map/cache';
import { buildOrdersCsv, buildOrdersWorkbook, exportColumns } from './output';
import { runPipeline, type PipelineOptions, type PipelineResult } from './pipeline/pipeline';
import { loadRegistry, type SchemaRegistry } from './registry/schemaRegistry';

const RESPONSE_PREVIEW_ROWS = 20;

export type AppDeps = {
  config?: AppConfig;
  registry?: SchemaRegistry;
  store?: MappingStore;
};

const flag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform(v => v === 'true' || v === '1');

const strategySchema = z.enum(['by_order_id', 'by_customer_date', 'by_sequential_boundary']);
const mappingSchema = z.record(z.string().min(1));

const IngestQuery = z.object({
  platform: z.string().min(1).optional(),
  clean: flag,
  confirm: flag,
  threshold: z.coerce.number().min(0).max(1).optional(),
  strategy: strategySchema.optional()
});

const ConfirmBody = z.object({
  fileId: z.string().min(1),
  fileName: z.string().min(1),
  platform: z.string().min(1).optional(),
  mapping: mappingSchema.optional(),
  strategy: strategySchema.optional(),
  clean: z.boolean().optional(),
  threshold: z.number().min(0).max(1).optional()
});

const CustomFieldBody = z.object({
  name: z.string().min(1),
  type: z.string().optional(),
  required: z.boolean().optional(),
  synonyms: z.array(z.string().min(1)).optional(),
  description: z.string().optional(),
  category: z.string().optional()
});

const isMissingFile = (err: unknown) =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT';

const sendError = (res: Response, err: unknown, fallback: string) => {
  if (isPipelineError(err)) {
    return res.status(422).json({ error: err.message, code: err.code, ...err.details });
  }
  if (err instanceof z.ZodError) {
    const issue = err.issues[0];
    return res.status(400).json({ error: `${issue.path.join('.') || 'request'}: ${issue.message}` });
  }
  if (isMissingFile(err)) {
    return res.status(404).json({ error: 'Stored file not found. Re-upload the source file.' });
  }
  const message = err instanceof Error ? err.message : '';
  return res.status(500).json({ error: message || fallback });
};

const mappingJson = z.string().transform((text, ctx): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a JSON object of field -> column' });
    return z.NEVER;
  }
});

// Multipart forms carry the manual mapping as a JSON string.
const parseMappingField = (raw: unknown) => {
  if (raw === undefined || raw === '') return undefined;
  return typeof raw === 'string' ? mappingJson.pipe(mappingSchema).parse(raw) : mappingSchema.parse(raw);
};

const describeResult = (result: PipelineResult, fileId: string, fileName: string) => {
  const base = {
    status: result.status,
    fileId,
    fileName,
    platform: result.platform,
    detectedPlatform: result.detectedPlatform,
    mapping: result.mapping,
    suggestions: result.suggestions,
    fromCache: result.fromCache,
    level: result.level
  };
  if (result.status === 'awaiting_confirmation') {
    return { ...base, warnings: result.warnings, preview: result.preview };
  }
  return {
    ...base,
    strategy: result.strategy,
    aggregation: result.aggregation,
    report: result.report,
    cleaning: result.cleaning,
    rowCount: result.rows.length,
    preview: result.rows.slice(0, RESPONSE_PREVIEW_ROWS)
  };
};

export const createApp = (deps: AppDeps = {}) => {
  const config = deps.config ?? loadConfig();
  const registry = deps.registry ?? loadRegistry(config.registryPath, config.defaultPlatform);
  const store = deps.store ?? new JsonFileMappingStore(path.join(config.dataDir, 'mapping_cache.json'));
  const uploadsDir = config.uploadsDir;

  const app = express();
  const upload = multer();

  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  const pipelineOptions = (overrides: PipelineOptions): PipelineOptions => ({
    maxErrors: config.maxValidationErrors,
    minDate: config.minOrderDate,
    ...overrides
  });

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/api/platforms', (_req, res) => {
    res.json({
      version: registry.version(),
      defaultPlatform: registry.defaultPlatform,
      platforms: registry.platformNames().map(name => {
        const platform = registry.getPlatform(name);
        return {
          name,
          displayName: platform.displayName,
          languages: platform.languages,
          required: registry.requiredFields(name),
          optional: registry.optionalFields(name)
        };
      })
    });
  });

  app.post('/api/platforms/fields', (req, res) => {
    try {
      const body = CustomFieldBody.parse(req.body || {});
      const field = registry.addCustomField(body);
      res.status(201).json({ field });
    } catch (err) {
      sendError(res, err, 'Failed to register field');
    }
  });

  app.post('/api/ingest/orders', upload.single('file'), async (req, res) => {
    try {
      const file = req.file;
      if (!file) return res.status(400).json({ error: 'An order export file is required.' });
      if (!isSupportedFile(file.originalname)) {
        return res.status(400).json({ error: 'Only .csv, .xlsx and .xls files are supported.' });
      }
      const query = IngestQuery.parse(req.query);
      const mapping = parseMappingField(req.body?.mapping);

      await pruneUploads(uploadsDir, config.uploadRetentionMs);
      const fileId = await saveUpload(uploadsDir, file.originalname, file.buffer);

      const { table } = readTableBuffer(file.buffer, file.originalname);
      const result = runPipeline(
        table,
        { registry, store },
        pipelineOptions({
          platform: query.platform,
          threshold: query.threshold ?? config.confidenceThreshold,
          mapping,
          confirmAggregation: query.confirm,
          strategy: query.strategy,
          clean: query.clean,
          cacheKey: fileKey(file.originalname, file.size)
        })
      );
      res.json(describeResult(result, fileId, file.originalname));
    } catch (err) {
      sendError(res, err, 'Order ingest failed');
    }
  });

  app.post('/api/ingest/orders/confirm', async (req, res) => {
    try {
      const body = ConfirmBody.parse(req.body || {});
      const format = String(req.query.format || 'json').toLowerCase();
      const fileId = path.basename(body.fileId);
      const buffer = await fs.readFile(path.join(uploadsDir, fileId));

      const { table } = readTableBuffer(buffer, body.fileName);
      const result = runPipeline(
        table,
        { registry, store },
        pipelineOptions({
          platform: body.platform,
          threshold: body.threshold ?? config.confidenceThreshold,
          mapping: body.mapping,
          confirmAggregation: true,
          strategy: body.strategy,
          clean: body.clean ?? false,
          cacheKey: fileKey(body.fileName, buffer.length)
        })
      );
      if (result.status !== 'complete' || format === 'json') {
        return res.json(describeResult(result, fileId, body.fileName));
      }

      const columns = exportColumns(registry.allFields(result.platform), result.rows);
      const stem = path.parse(body.fileName).name.replace(/\s+/g, '_') || 'orders';
      if (format === 'csv') {
        res.setHeader('Content-Disposition', `attachment; filename="${stem}-orders.csv"`);
        res.setHeader('Content-Type', 'text/csv; charset=utf-8');
        res.send(buildOrdersCsv(columns, result.rows));
        return;
      }
      if (format === 'xlsx') {
        const workbook = buildOrdersWorkbook({
          columns,
          rows: result.rows,
          mapping: result.mapping,
          report: result.report,
          cleaning: result.cleaning
        });
        res.setHeader('Content-Disposition', `attachment; filename="${stem}-orders.xlsx"`);
        res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
        res.send(workbook);
        return;
      }
      res.status(400).json({ error: `Unsupported format '${format}'. Use json, csv or xlsx.` });
    } catch (err) {
      sendError(res, err, 'Order confirmation failed');
    }
  });

  return app;
};
