import { type LogLevel } from './config.js';

const LEVEL_ORDER: Record<LogLevel, number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 };

let threshold: LogLevel = 'INFO';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function log(level: LogLevel, context: string, message: string, data?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  const timestamp = new Date().toISOString();
  const dataStr = data ? ` | ${JSON.stringify(data)}` : '';
  const write = level === 'ERROR' ? console.error : level === 'WARN' ? console.warn : console.log;
  write(`[${timestamp}] [${level}] [${context}] ${message}${dataStr}`);
}
