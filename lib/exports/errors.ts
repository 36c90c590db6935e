export type ExportErrorCode =
  | 'INVALID_FORMAT'
  | 'INVALID_ASSET_MODE'
  | 'INVALID_OPTIONS'
  | 'INVALID_PROJECT'
  | 'NOT_IMPLEMENTED'
  | 'VALIDATION_FAILED'
  | 'LEGACY_CONDITION'
  | 'UNKNOWN_ENGINE';

export class ExportError extends Error {
  readonly code: ExportErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ExportErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'ExportError';
    this.code = code;
    this.details = details;
  }
}

export function isExportError(error: unknown): error is ExportError {
  return error instanceof ExportError;
}

export function notImplemented(operation: string): ExportError {
  return new ExportError('NOT_IMPLEMENTED', `${operation} is not implemented`, { operation });
}
