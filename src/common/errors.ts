/**
 * COMMON: Error taxonomy
 *
 * Every error the service raises on purpose extends AppError, so the
 * Fastify error handler can map it to { ok: false, error: code, message }.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

/**
 * An indicator cannot be computed from the series it was given.
 * Recoverable: the factor is excluded from scoring.
 */
export class InsufficientDataError extends AppError {
  readonly required: number;
  readonly actual: number;

  constructor(indicator: string, required: number, actual: number) {
    super('INSUFFICIENT_DATA', `${indicator} needs ${required} points`, 422);
    this.name = 'InsufficientDataError';
    this.required = required;
    this.actual = actual;
  }
}

/**
 * Malformed series (non-monotonic timestamps, NaN/inf values).
 * Fatal for the asset in the current cycle only.
 */
export class InvalidInputError extends AppError {
  readonly assetId?: string;

  constructor(message: string, assetId?: string) {
    super('INVALID_INPUT', assetId ? `${assetId}: ${message}` : message, 400);
    this.name = 'InvalidInputError';
    this.assetId = assetId;
  }
}

export type SentimentField = 'fearGreed' | 'btcDominance' | 'ethBtcRatio';

export class MissingSentimentError extends AppError {
  readonly fields: SentimentField[];

  constructor(fields: SentimentField[]) {
    super('MISSING_SENTIMENT', `Sentiment fields missing: ${fields.join(', ')}`, 422);
    this.name = 'MissingSentimentError';
    this.fields = fields;
  }
}

/**
 * No price data for any asset: the cycle cannot produce a report.
 */
export class CycleFailureError extends AppError {
  constructor(message: string) {
    super('CYCLE_FAILED', message, 503);
    this.name = 'CycleFailureError';
  }
}

export class ConfigValidationError extends AppError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super('CONFIG_INVALID', `${source} is invalid: ${issues.join('; ')}`, 500);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
