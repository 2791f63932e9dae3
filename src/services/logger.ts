import { config } from '../config/index.js';
import type {
  LoggingConfig,
  LogLevel,
  LogMetadata,
} from '../config/types.js';

function formatMetadata(meta?: LogMetadata): string {
  if (!meta || Object.keys(meta).length === 0) return '';
  return ` ${JSON.stringify(meta)}`;
}

function createTimestamp(): string {
  return new Date().toISOString();
}

export function formatLogEntry(
  level: LogLevel,
  message: string,
  meta?: LogMetadata
): string {
  return `[${createTimestamp()}] ${level.toUpperCase()}: ${message}${formatMetadata(meta)}`;
}

export function isLogLevelEnabled(
  level: LogLevel,
  settings: LoggingConfig = config.logging
): boolean {
  if (!settings.enabled) return false;
  if (level === 'debug') return settings.level === 'debug';
  return true;
}

function write(level: LogLevel, message: string, meta?: LogMetadata): void {
  if (isLogLevelEnabled(level)) {
    process.stderr.write(`${formatLogEntry(level, message, meta)}\n`);
  }
}

export function logInfo(message: string, meta?: LogMetadata): void {
  write('info', message, meta);
}

export function logDebug(message: string, meta?: LogMetadata): void {
  write('debug', message, meta);
}

export function logWarn(message: string, meta?: LogMetadata): void {
  write('warn', message, meta);
}

export function logError(message: string, error?: Error | LogMetadata): void {
  if (!isLogLevelEnabled('error')) return;

  const errorMeta: LogMetadata =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : (error ?? {});

  process.stderr.write(`${formatLogEntry('error', message, errorMeta)}\n`);
}
