import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_REGISTRY_PATH = path.join(__dirname, '../schemas/schema_registry.json');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  DATA_DIR: z.string().min(1).optional(),
  SCHEMA_REGISTRY_PATH: z.string().min(1).optional(),
  DEFAULT_PLATFORM: z.string().min(1).optional(),
  MAPPING_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  MAX_VALIDATION_ERRORS: z.coerce.number().int().positive().default(20),
  MIN_ORDER_DATE: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .default('2000-01-01'),
  UPLOAD_RETENTION_HOURS: z.coerce.number().positive().default(24)
});

export type AppConfig = {
  port: number;
  dataDir: string;
  uploadsDir: string;
  registryPath: string;
  defaultPlatform?: string;
  confidenceThreshold: number;
  maxValidationErrors: number;
  minOrderDate: Date;
  uploadRetentionMs: number;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid configuration for ${issue.path.join('.')}: ${issue.message}`);
  }
  const vars = parsed.data;
  const dataDir = vars.DATA_DIR || path.join(process.cwd(), 'data');

  return {
    port: vars.PORT,
    dataDir,
    uploadsDir: path.join(dataDir, 'uploads'),
    registryPath: vars.SCHEMA_REGISTRY_PATH || DEFAULT_REGISTRY_PATH,
    defaultPlatform: vars.DEFAULT_PLATFORM,
    confidenceThreshold: vars.MAPPING_CONFIDENCE_THRESHOLD,
    maxValidationErrors: vars.MAX_VALIDATION_ERRORS,
    minOrderDate: new Date(`${vars.MIN_ORDER_DATE}T00:00:00Z`),
    uploadRetentionMs: vars.UPLOAD_RETENTION_HOURS * 60 * 60 * 1000
  };
};
