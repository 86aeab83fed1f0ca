/**
 * Common logging layer
 *
 * Every call takes a record of key/value pairs; use `event` to name what
 * happened and `msg` for free text. The default sink writes one
 * `key=value` line to the matching console method.
 */

import { isError } from './errors.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export type LogSink = (level: LogLevel, fields: LogFields) => void;

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return /\s|=|"/.test(value) ? JSON.stringify(value) : value;
  if (isError(value)) return JSON.stringify(value.message);
  if (value === undefined) return 'undefined';
  return JSON.stringify(value) ?? String(value);
}

export function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(' ');
}

const consoleSink: LogSink = (level, fields) => {
  const line = `[cfgscript] ${level.toUpperCase()} ${formatFields(fields)}`;
  switch (level) {
    case 'trace':
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

const envLevel = process.env.CFGSCRIPT_LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'warn';
let sink: LogSink = consoleSink;

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/**
 * Replace the backend; returns the previous sink
 */
export function setLogSink(next: LogSink): LogSink {
  const previous = sink;
  sink = next;
  return previous;
}

export function resetLogSink(): void {
  sink = consoleSink;
}

function emit(level: LogLevel, fields: LogFields): void {
  if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(threshold)) return;
  sink(level, fields);
}

export const log = {
  trace: (fields: LogFields) => emit('trace', fields),
  debug: (fields: LogFields) => emit('debug', fields),
  info: (fields: LogFields) => emit('info', fields),
  warn: (fields: LogFields) => emit('warn', fields),
  error: (fields: LogFields) => emit('error', fields),
};
