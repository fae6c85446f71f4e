import type { Issue, ValidationReport } from './types/schema';

export type Suggestion = { column: string; score: number };

export class PipelineError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;

  constructor(code: string, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** A required canonical field could not be mapped, or nothing in the file was usable. */
export class SchemaError extends PipelineError {
  readonly missing: string[];
  readonly suggestions: Record<string, Suggestion[]>;

  constructor(message: string, missing: string[] = [], suggestions: Record<string, Suggestion[]> = {}) {
    super('schema_error', message, { missing, suggestions });
    this.missing = missing;
    this.suggestions = suggestions;
  }
}

/** Line-item data was detected but no strategy has the identity + price columns it needs. */
export class AggregationError extends PipelineError {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super('aggregation_error', message, { missing });
    this.missing = missing;
  }
}

/** Raised once accumulated validation errors cross the configured ceiling. */
export class ValidationError extends PipelineError {
  readonly errors: Issue[];
  readonly report: ValidationReport;

  constructor(message: string, report: ValidationReport) {
    super('validation_error', message, { errors: report.errors, report });
    this.errors = report.errors;
    this.report = report;
  }
}

export const isPipelineError = (err: unknown): err is PipelineError => err instanceof PipelineError;
