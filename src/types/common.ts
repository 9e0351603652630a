import { z } from 'zod';

// Error codes surfaced to MCP clients
export const ErrorCodeSchema = z.enum([
  'NOT_FOUND',
  'RATE_LIMITED',
  'TIMEOUT',
  'VALIDATION_ERROR',
  'SOURCE_UNAVAILABLE',
  'MALFORMED_RECORD',
  'VALIDATION_FAILURE',
  'INPUT_FILE_ERROR',
  'EXPORT_FAILURE',
]);
export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

// Log levels (RFC 5424)
export const LogLevel = z.enum([
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency',
]);
export type LogLevel = z.infer<typeof LogLevel>;

// Structured log entry
export interface LogEntry {
  level: LogLevel;
  logger: string;
  data: Record<string, unknown>;
  timestamp?: string;
  trace_id?: string;
  span_id?: string;
}
