import type { LogLevel } from './types.js';

// ============================================================================
// Logger Utility
// ============================================================================

// Log level priority (higher = more severe, always shown)
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

// Global log level - set via LOG_LEVEL env var (default: info, skips debug)
const getMinLogLevel = (): LogLevel => {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
};

export class Logger {
  private context: string;
  private static minLevel: LogLevel = getMinLogLevel();

  constructor(context: string) {
    this.context = context;
  }

  static setLevel(level: LogLevel): void {
    Logger.minLevel = level;
  }

  static getLevel(): LogLevel {
    return Logger.minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[Logger.minLevel];
  }

  private formatMeta(meta?: Record<string, unknown>): string {
    if (!meta || Object.keys(meta).length === 0) return '';

    // Compact format: key=value pairs, truncate long values
    const parts: string[] = [];
    for (const [key, value] of Object.entries(meta)) {
      let strVal: string;
      if (typeof value === 'string') {
        strVal = value.length > 60 ? value.slice(0, 57) + '...' : value;
      } else if (typeof value === 'number') {
        strVal = Number.isInteger(value) ? String(value) : value.toFixed(2);
      } else if (typeof value === 'boolean') {
        strVal = value ? 'Y' : 'N';
      } else if (value === null || value === undefined) {
        strVal = '-';
      } else if (value instanceof Error) {
        strVal = `${value.name}: ${value.message}`;
        if (strVal.length > 100) strVal = strVal.slice(0, 97) + '...';
      } else if (typeof value === 'object' && 'x' in value && 'y' in value && 'z' in value) {
        // Coordinates print as (x, y, z)
        strVal = `(${String(value.x)}, ${String(value.y)}, ${String(value.z)})`;
      } else {
        strVal = JSON.stringify(value);
        if (strVal.length > 60) strVal = strVal.slice(0, 57) + '...';
      }
      parts.push(`${key}=${strVal}`);
    }
    return parts.join(' ');
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (!this.shouldLog(level)) return;

    // Compact timestamp: HH:MM:SS only
    const now = new Date();
    const time = now.toTimeString().slice(0, 8);

    // Compact format: [TIME] [LEVEL] [CONTEXT] message key=value
    const metaStr = this.formatMeta(meta);
    const logMessage = `[${time}] [${level.toUpperCase().charAt(0)}] [${this.context}] ${message}${metaStr ? ' ' + metaStr : ''}`;

    switch (level) {
      case 'debug':
        console.debug(logMessage);
        break;
      case 'info':
        console.info(logMessage);
        break;
      case 'warn':
        console.warn(logMessage);
        break;
      case 'error':
        console.error(logMessage);
        break;
    }
  }

  debug(message: string, meta?: Record<string, unknown>) {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>) {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>) {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>) {
    this.log('error', message, meta);
  }
}

// ============================================================================
// Format Utilities
// ============================================================================

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.round(seconds % 60)}s`;
}
