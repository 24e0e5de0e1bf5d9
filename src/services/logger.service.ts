/**
 * Centralized Logging Service
 *
 * Provides structured logging with:
 * - Console output for the pipeline log
 * - Optional file output (LOG_FILE)
 * - Secret masking applied before any transport writes
 * - Azure Pipelines logging commands when running on a build agent
 */

import winston from 'winston';
import { config } from '../config';

const MASK = '***';
const MAX_LOG_FILE_SIZE = 10 * 1024 * 1024; // 10MB per log file
const MAX_LOG_FILES = 3;

export type LogCategory =
  | 'auth'
  | 'dataverse'
  | 'provisioning'
  | 'bootstrap'
  | 'test-execution'
  | 'artifacts'
  | 'orchestrator'
  | 'system';

const secrets = new Set<string>();

function isPipelineAgent(): boolean {
  return Boolean(process.env.TF_BUILD);
}

export function maskSecrets(text: string): string {
  let masked = text;
  for (const secret of secrets) {
    masked = masked.split(secret).join(MASK);
  }
  return masked;
}

/** Masks secrets in nested values; a reference back to an enclosing object becomes '[Circular]'. */
export function maskValue(value: unknown, ancestors = new WeakSet<object>()): unknown {
  if (typeof value === 'string') return maskSecrets(value);
  if (!value || typeof value !== 'object') return value;
  if (ancestors.has(value)) return '[Circular]';
  ancestors.add(value);
  let result: unknown;
  if (Array.isArray(value)) {
    result = value.map((entry) => maskValue(entry, ancestors));
  } else {
    const record: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      record[key] = maskValue(entry, ancestors);
    }
    result = record;
  }
  ancestors.delete(value);
  return result;
}

/**
 * Record a value that must never reach a log line. Short values are ignored
 * since masking them would shred unrelated text.
 */
export function registerSecret(value: string | undefined): void {
  if (!value || value.length < 4 || secrets.has(value)) return;
  secrets.add(value);
  if (isPipelineAgent()) {
    process.stdout.write(`##vso[task.setsecret]${value}\n`);
  }
}

export function clearSecrets(): void {
  secrets.clear();
}

const maskFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    info[key] = maskValue(info[key]);
  }
  return info;
});

const lineFormat = winston.format.printf(({ level, message, timestamp, category, ...metadata }) => {
  const meta = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
  return `${timestamp} [${level}] [${category ?? 'system'}] ${message}${meta}`;
});

const winstonLogger = winston.createLogger({
  level: config.logLevel,
  format: winston.format.combine(
    maskFormat(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true }),
  ),
  transports: [
    new winston.transports.Console({
      format: lineFormat,
    }),
  ],
});

if (process.env.LOG_FILE) {
  winstonLogger.add(new winston.transports.File({
    filename: process.env.LOG_FILE,
    maxsize: MAX_LOG_FILE_SIZE,
    maxFiles: MAX_LOG_FILES,
    format: winston.format.json(),
  }));
}

function emitIssue(type: 'warning' | 'error', message: string): void {
  if (isPipelineAgent()) {
    process.stdout.write(`##vso[task.logissue type=${type}]${maskSecrets(message)}\n`);
  }
}

export class Logger {
  private category: LogCategory;
  private runId?: string;

  constructor(category: LogCategory = 'system', runId?: string) {
    this.category = category;
    this.runId = runId;
  }

  child(options: { runId?: string; category?: LogCategory }): Logger {
    return new Logger(options.category || this.category, options.runId || this.runId);
  }

  private log(
    level: 'error' | 'warn' | 'info' | 'debug',
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    winstonLogger.log({
      level,
      message,
      category: this.category,
      ...(this.runId && { runId: this.runId }),
      ...metadata,
      ...(error && { error: error.message }),
    });
  }

  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    const err = error instanceof Error ? error : undefined;
    const meta = error instanceof Error || error === undefined ? metadata : { detail: error, ...metadata };
    this.log('error', message, meta, err);
    emitIssue('error', err ? `${message}: ${err.message}` : message);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, metadata);
    emitIssue('warning', message);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, metadata);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, metadata);
  }

  /** Multi-line blocks (diagnostics, summaries) go out line by line so masking covers each. */
  block(level: 'info' | 'warn' | 'error', text: string): void {
    for (const line of text.split('\n')) {
      this.log(level, line);
    }
  }

  apiRequest(method: string, path: string, statusCode: number, durationMs: number): void {
    const level = statusCode >= 400 ? 'warn' : 'debug';
    this.log(level, `${method} ${path} ${statusCode} ${durationMs}ms`, {
      method,
      path,
      statusCode,
      durationMs,
    });
  }
}

export const logger = {
  auth: new Logger('auth'),
  dataverse: new Logger('dataverse'),
  provisioning: new Logger('provisioning'),
  bootstrap: new Logger('bootstrap'),
  testExecution: new Logger('test-execution'),
  artifacts: new Logger('artifacts'),
  orchestrator: new Logger('orchestrator'),
  system: new Logger('system'),
};
