import type { ErrorCode } from '../types/common.js';

/**
 * Error raised by an operation that cannot produce a partial result
 * (unusable input file, failed export, invalid request)
 */
export class ContactFinderError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;
  readonly source?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options: { retryable?: boolean; source?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ContactFinderError';
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.source = options.source;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
