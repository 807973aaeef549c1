/**
 * Structured logging utility
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export const LOG_LEVELS: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

let currentLogLevel: LogLevel = 'INFO';
let serviceName: string | undefined;

export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

/**
 * Tag every subsequent line with the service name
 */
export function setServiceName(name: string | undefined): void {
  serviceName = name;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLogLevel];
}

function formatData(data: unknown): string {
  if (data === null || data === undefined) return '';

  try {
    const masked = maskSensitiveData(data);
    const str = JSON.stringify(masked);
    return str.length > 500 ? str.slice(0, 500) + '...' : str;
  } catch {
    return String(data);
  }
}

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'authorization', 'passphrase'];

export function maskSensitiveData(data: unknown): unknown {
  if (Array.isArray(data)) return data.map(maskSensitiveData);
  if (typeof data !== 'object' || data === null) return data;

  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (SENSITIVE_KEYS.some(k => key.toLowerCase().includes(k))) {
      result[key] = '[MASKED]';
    } else if (typeof value === 'object' && value !== null) {
      result[key] = maskSensitiveData(value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

export function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const timestamp = new Date().toISOString();
  const service = serviceName ? ` [${serviceName}]` : '';
  const dataStr = data ? ` ${formatData(data)}` : '';
  const line = `[${timestamp}] [${level}]${service} ${message}${dataStr}`;

  // Diagnostics go to stderr so they survive stdout redirection
  if (LOG_LEVELS[level] >= LOG_LEVELS.WARN) {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function debug(message: string, data?: Record<string, unknown>): void {
  log('DEBUG', message, data);
}

export function info(message: string, data?: Record<string, unknown>): void {
  log('INFO', message, data);
}

export function warn(message: string, data?: Record<string, unknown>): void {
  log('WARN', message, data);
}

export function error(message: string, data?: Record<string, unknown>): void {
  log('ERROR', message, data);
}

export const logger = {
  debug,
  info,
  warn,
  error,
  setLogLevel,
  getLogLevel,
  setServiceName,
};

export default logger;
