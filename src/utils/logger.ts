import { createWriteStream, type WriteStream } from 'fs';
import path from 'path';
import { format } from 'util';

/**
 * Simple logger utility wrapping console.error for structured logging,
 * with a minimum level and an optional append-only log file
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let minLevel: LogLevel = process.env.DEBUG ? 'debug' : 'info';
let fileSink: WriteStream | null = null;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

/**
 * Open `drive-sync_<timestamp>.log` under the directory and mirror every emitted line into it
 */
export function attachLogFile(directory: string, now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  const filePath = path.join(directory, `drive-sync_${stamp}.log`);
  fileSink?.end();
  const sink = createWriteStream(filePath, { flags: 'a' });
  sink.on('error', error => {
    console.error(`[WARN] Log file ${filePath} disabled: ${error.message}`);
    if (fileSink === sink) {
      fileSink = null;
    }
  });
  fileSink = sink;
  return filePath;
}

export function closeLogFile(): Promise<void> {
  const sink = fileSink;
  fileSink = null;
  if (!sink) {
    return Promise.resolve();
  }
  return new Promise(resolve => sink.end(resolve));
}

function emit(level: LogLevel, message: string, args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
    return;
  }
  const tag = `[${level.toUpperCase()}]`;
  console.error(`${tag} ${message}`, ...args);
  if (fileSink) {
    fileSink.write(`${new Date().toISOString()} ${tag} ${format(message, ...args)}\n`);
  }
}

export const log = {
  debug: (message: string, ...args: unknown[]) => emit('debug', message, args),
  info: (message: string, ...args: unknown[]) => emit('info', message, args),
  warn: (message: string, ...args: unknown[]) => emit('warn', message, args),
  error: (message: string, ...args: unknown[]) => emit('error', message, args)
};
