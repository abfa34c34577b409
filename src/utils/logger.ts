import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

const LOG_FILE_ENV = 'FAMILY_INTAKE_LOG_FILE';

function logFile(): string {
  const override = process.env[LOG_FILE_ENV]?.trim();
  if (override) return override;
  return path.join(os.tmpdir(), 'family-intake.log');
}

function sanitizeLogValue(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      code: 'code' in value ? value.code : undefined,
    };
  }
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'symbol') return String(value);
  return value;
}

function stringifyLogData(data: unknown): string {
  if (typeof data === 'undefined') return '';
  const seen = new WeakSet<object>();
  try {
    return JSON.stringify(data, (_key, value: unknown) => {
      const sanitized = sanitizeLogValue(value);
      if (sanitized && typeof sanitized === 'object') {
        if (seen.has(sanitized)) return '[circular]';
        seen.add(sanitized);
      }
      return sanitized;
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return JSON.stringify({
      logger_error: 'log_serialize_failed',
      message,
    });
  }
}

export function formatLogLine(message: string, data?: unknown, at = new Date()): string {
  const payload = stringifyLogData(data);
  return `[${at.toISOString()}] ${message}${payload ? ` ${payload}` : ''}\n`;
}

export function log(message: string, data?: unknown): void {
  try {
    fs.appendFileSync(logFile(), formatLogLine(message, data));
  } catch {
    // A full disk or missing tmp dir never fails a run.
  }
}

export type LogContext = Record<string, unknown>;

/** Writes `[scope] message` lines with its context merged into every payload. */
export interface Logger {
  readonly scope: string;
  log(message: string, data?: LogContext): void;
  child(context: LogContext): Logger;
}

function mergeContext(context: LogContext, data: LogContext | undefined): LogContext | undefined {
  const merged = { ...context, ...data };
  return Object.keys(merged).length > 0 ? merged : undefined;
}

export function createLogger(scope: string, context: LogContext = {}): Logger {
  return {
    scope,
    log: (message, data) => log(`[${scope}] ${message}`, mergeContext(context, data)),
    child: (extra) => createLogger(scope, { ...context, ...extra }),
  };
}
