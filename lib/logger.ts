// lib/logger.ts
import type { LogFn, LogLevel } from '@/types/experiment';

export type LogThreshold = LogLevel | 'silent';

const RANK: Record<LogThreshold, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export interface LogSink {
  debug(line: string): void;
  info(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

function formatExtra(extra?: Record<string, unknown>): string {
  if (!extra || Object.keys(extra).length === 0) return '';
  try {
    return ' ' + JSON.stringify(extra, (_k, v: unknown) => (v instanceof Error ? { name: v.name, message: v.message } : v));
  } catch {
    return ' [unserializable extra]';
  }
}

export function parseLogThreshold(raw: string | undefined, fallback: LogThreshold = 'info'): LogThreshold {
  const v = (raw ?? '').trim().toLowerCase();
  return v === 'debug' || v === 'info' || v === 'warn' || v === 'error' || v === 'silent' ? v : fallback;
}

/** Console-backed levelled logger; lines look like `2026-01-01T00:00:00.000Z INFO message {"k":1}` */
export function createLogger(threshold: LogThreshold = parseLogThreshold(process.env.LOG_LEVEL), sink: LogSink = console): LogFn {
  return (lvl, msg, extra) => {
    if (RANK[lvl] < RANK[threshold]) return;
    sink[lvl](`${new Date().toISOString()} ${lvl.toUpperCase()} ${msg}${formatExtra(extra)}`);
  };
}
