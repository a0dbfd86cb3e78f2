/**
 * Error taxonomy for the import pipeline.
 *
 * Statement-level errors (unsupported source, malformed statement, normalization)
 * are recoverable per file. Store and config errors abort the run.
 */

export type LedgerErrorCode =
  | 'UNSUPPORTED_SOURCE'
  | 'MALFORMED_STATEMENT'
  | 'NORMALIZATION_FAILED'
  | 'STORE_FAILURE'
  | 'CONFIG_INVALID';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnsupportedSourceError extends LedgerError {
  readonly sourceId: string | null;

  constructor(sourceId: string | null, message?: string) {
    super(
      'UNSUPPORTED_SOURCE',
      message ?? (sourceId === null ? 'Unable to detect statement source' : `No parser registered for source: ${sourceId}`)
    );
    this.sourceId = sourceId;
  }
}

export class MalformedStatementError extends LedgerError {
  readonly sourceId: string;
  readonly lineNumber: number | null;

  constructor(sourceId: string, message: string, lineNumber: number | null = null) {
    super('MALFORMED_STATEMENT', lineNumber === null ? `[${sourceId}] ${message}` : `[${sourceId}] line ${lineNumber}: ${message}`);
    this.sourceId = sourceId;
    this.lineNumber = lineNumber;
  }
}

export type NormalizationField = 'date' | 'amount' | 'description' | 'type';

export class NormalizationError extends LedgerError {
  readonly sourceId: string;
  readonly lineNumber: number;
  readonly field: NormalizationField;
  readonly value: string;

  constructor(params: {
    sourceId: string;
    lineNumber: number;
    field: NormalizationField;
    value: string;
    reason: string;
  }) {
    super(
      'NORMALIZATION_FAILED',
      `[${params.sourceId}] line ${params.lineNumber}: invalid ${params.field} "${params.value}" (${params.reason})`
    );
    this.sourceId = params.sourceId;
    this.lineNumber = params.lineNumber;
    this.field = params.field;
    this.value = params.value;
  }
}

export class StoreError extends LedgerError {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super('STORE_FAILURE', `${operation} failed: ${message}`, options);
    this.operation = operation;
  }
}

export class ConfigError extends LedgerError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
