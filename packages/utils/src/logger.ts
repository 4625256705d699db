/**
 * Lightweight component logger for zklink
 *
 * - JSON output for easy parsing with jq
 * - Configurable via environment variables
 * - Debug-only packet dumps
 * - No external dependencies
 */

import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface LogEntry {
  ts: string;
  level: LogLevel;
  component: string;
  msg: string;
  [key: string]: unknown;
}

export interface Logger {
  debug: (msg: string, extra?: Record<string, unknown>) => void;
  info: (msg: string, extra?: Record<string, unknown>) => void;
  warn: (msg: string, extra?: Record<string, unknown>) => void;
  error: (msg: string, extra?: Record<string, unknown>) => void;
}

// Read env at call time so the CLI can set ZKLINK_LOG_LEVEL after imports
function getLogFile(): string | undefined {
  return process.env.ZKLINK_LOG_FILE;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function getLogLevel(): LogLevel {
  const raw = (process.env.ZKLINK_LOG_LEVEL ?? 'INFO').toUpperCase();
  return isLogLevel(raw) ? raw : 'INFO';
}

function isLogJson(): boolean {
  return process.env.ZKLINK_LOG_JSON === '1';
}

const createdLogDirs = new Set<string>();

function ensureLogDir(logFile: string): void {
  const logDir = path.dirname(logFile);
  if (!createdLogDirs.has(logDir) && !fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
    createdLogDirs.add(logDir);
  }
}

export function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getLogLevel()];
}

const HEX_PREVIEW_BYTES = 32;

/**
 * Render bytes as a spaced hex string, truncated to the first 32 bytes.
 */
export function hexPreview(data: Uint8Array, limit: number = HEX_PREVIEW_BYTES): string {
  const shown = Array.from(data.subarray(0, limit), (b) => b.toString(16).padStart(2, '0').toUpperCase());
  const suffix = data.length > limit ? ` …(+${data.length - limit})` : '';
  return shown.join(' ') + suffix;
}

function renderValue(value: unknown): unknown {
  return value instanceof Uint8Array ? hexPreview(value) : value;
}

export function formatMessage(entry: LogEntry): string {
  const { ts, level, component, msg, ...extra } = entry;
  const fields = Object.fromEntries(Object.entries(extra).map(([k, v]) => [k, renderValue(v)]));

  if (isLogJson()) {
    return JSON.stringify({ ts, level, component, msg, ...fields });
  }
  const extraStr = Object.keys(fields).length > 0
    ? ' ' + Object.entries(fields).map(([k, v]) => `${k}=${String(v)}`).join(' ')
    : '';
  return `${ts} [${level}] [${component}] ${msg}${extraStr}`;
}

function log(level: LogLevel, component: string, msg: string, extra?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    ts: new Date().toISOString(),
    level,
    component,
    msg,
    ...extra,
  };

  const formatted = formatMessage(entry);

  const logFile = getLogFile();
  if (logFile) {
    ensureLogDir(logFile);
    fs.appendFileSync(logFile, formatted + '\n');
    return;
  }

  if (level === 'ERROR' || level === 'WARN') {
    console.error(formatted);
  } else {
    console.log(formatted);
  }
}

/**
 * Create a logger for a specific component.
 * @param component - Component name (e.g., 'protocol', 'transport', 'client')
 */
export function createLogger(component: string): Logger {
  return {
    debug: (msg, extra) => log('DEBUG', component, msg, extra),
    info: (msg, extra) => log('INFO', component, msg, extra),
    warn: (msg, extra) => log('WARN', component, msg, extra),
    error: (msg, extra) => log('ERROR', component, msg, extra),
  };
}

export const protocolLog = createLogger('protocol');
export const transportLog = createLogger('transport');
export const clientLog = createLogger('client');

export default createLogger;
