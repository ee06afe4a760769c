/**
 * GCP Cloud Logging Optimized Logger
 *
 * Pino-based structured logging for Google Cloud Run.
 * - GCP severity mapping
 * - insertId for log ordering within same timestamp
 * - stack_trace extraction for Error Reporting integration
 * - 'message' key for GCP structured logging compatibility
 *
 * @see https://cloud.google.com/logging/docs/structured-logging
 */

import pino from 'pino';
import { APP_VERSION, SERVICE_NAME } from './app-info';

/**
 * GCP Severity Level Mapping
 * @see https://cloud.google.com/logging/docs/reference/v2/rest/v2/LogEntry#LogSeverity
 */
const GCP_SEVERITY: Record<string, string> = {
  trace: 'DEBUG',
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARNING',
  error: 'ERROR',
  fatal: 'CRITICAL',
};

/** Monotonic counter for insertId */
let insertIdCounter = 0;

/** pino formatters producing Cloud Logging structured JSON */
export const gcpFormatters = {
  level(label: string) {
    return {
      severity: GCP_SEVERITY[label] || 'DEFAULT',
      level: label,
    };
  },
  log(obj: Record<string, unknown>) {
    const result: Record<string, unknown> = {
      ...obj,
      'logging.googleapis.com/insertId': `${Date.now()}-${insertIdCounter++}`,
    };

    const err = obj.err;
    if (err instanceof Error && err.stack) {
      result['stack_trace'] = err.stack;
    }

    return result;
  },
};

function createLogger(): pino.Logger {
  const isDev = process.env.NODE_ENV === 'development';
  const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';
  const logLevel = process.env.LOG_LEVEL || (isDev ? 'debug' : isTest ? 'silent' : 'info');

  if (!isDev) {
    // Production: GCP-compatible structured JSON to stdout
    return pino({
      level: logLevel,
      messageKey: 'message',
      base: {
        service: SERVICE_NAME,
        version: APP_VERSION,
      },
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
      formatters: gcpFormatters,
    });
  }

  return pino({
    level: logLevel,
    base: {
      service: SERVICE_NAME,
      version: APP_VERSION,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: {
      target: 'pino/file',
      options: { destination: 1 },
    },
  });
}

const pinoLogger = createLogger();

type LogMethod = (objOrMsg: Record<string, unknown> | string, msg?: string) => void;

export type Logger = {
  warn: LogMethod;
  error: LogMethod;
  info: LogMethod;
  debug: LogMethod;
  fatal: LogMethod;
  child: (bindings: Record<string, unknown>) => Logger;
};

/**
 * Narrow view over pino: `(obj, msg)` or `(msg)`, plus child loggers.
 */
export function wrapPino(base: pino.Logger): Logger {
  function wrapMethod(method: 'warn' | 'error' | 'info' | 'debug' | 'fatal'): LogMethod {
    return (objOrMsg, msg) => {
      if (typeof objOrMsg === 'string' || msg === undefined) {
        base[method](objOrMsg);
        return;
      }
      base[method](objOrMsg, msg);
    };
  }

  return {
    warn: wrapMethod('warn'),
    error: wrapMethod('error'),
    info: wrapMethod('info'),
    debug: wrapMethod('debug'),
    fatal: wrapMethod('fatal'),
    child: (bindings) => wrapPino(base.child(bindings)),
  };
}

export const logger: Logger = wrapPino(pinoLogger);

/**
 * Alert-scoped logger: every line of one webhook invocation shares `alertId`.
 */
export function createAlertLogger(alertId: string): Logger {
  return wrapPino(pinoLogger.child({ alertId }));
}
