/**
 * Structured JSON logging with masking of sensitive values
 */

import { randomUUID } from 'crypto';
import { LogLevel, LogEvent } from '../types/index.js';

const LEVEL_ORDER: LogLevel[] = [
  LogLevel.TRACE,
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
  LogLevel.CRITICAL,
];

export interface LoggerConfig {
  maskSensitiveData?: boolean;
  minLevel?: LogLevel;
}

export class Logger {
  private maskSensitiveData: boolean;
  private minLevel: LogLevel;
  private runId?: string;

  // Institutional datasets routinely carry contact details and identifiers
  private static readonly maskPatterns = [
    { pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, replacement: '[EMAIL]' },
    { pattern: /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/g, replacement: '[CARD]' },
    { pattern: /\b\d{3}-\d{2}-\d{4}\b/g, replacement: '[SSN]' },
    { pattern: /\b[a-zA-Z0-9]{32,}\b/g, replacement: '[REDACTED_KEY]' },
  ];

  private static readonly sensitiveKeyPatterns = [
    /api[_-]?key/i,
    /auth/i,
    /token/i,
    /secret/i,
    /password/i,
    /credential/i,
  ];

  constructor(config?: LoggerConfig) {
    this.maskSensitiveData = config?.maskSensitiveData ?? Logger.defaultMasking;
    this.minLevel = config?.minLevel ?? Logger.defaultLevel;
  }

  /**
   * Level applied to loggers constructed without an explicit one.
   * Set once at startup from the environment.
   */
  static defaultLevel: LogLevel = LogLevel.INFO;
  static defaultMasking = true;

  setRunId(id: string | undefined): void {
    this.runId = id;
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  setMaskSensitiveData(enabled: boolean): void {
    this.maskSensitiveData = enabled;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.minLevel);
  }

  private maskData(data: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
    if (!this.maskSensitiveData) return data;

    if (typeof data === 'string') {
      return this.maskString(data);
    }

    if (Array.isArray(data)) {
      if (seen.has(data)) {
        return '[Circular]';
      }
      seen.add(data);
      return data.map((item) => this.maskData(item, seen));
    }

    if (data && typeof data === 'object') {
      if (seen.has(data)) {
        return '[Circular]';
      }
      seen.add(data);

      const masked: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(data)) {
        masked[key] = this.isSensitiveKey(key) ? '[REDACTED]' : this.maskData(value, seen);
      }
      return masked;
    }

    return data;
  }

  private isSensitiveKey(key: string): boolean {
    return Logger.sensitiveKeyPatterns.some((pattern) => pattern.test(key));
  }

  private maskString(str: string): string {
    let masked = str;
    for (const { pattern, replacement } of Logger.maskPatterns) {
      masked = masked.replace(pattern, replacement);
    }
    return masked;
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const masked = this.maskData(data);
    const event: LogEvent = {
      id: randomUUID(),
      timestamp: Date.now(),
      level,
      type: 'log',
      message,
      runId: this.runId ?? 'none',
      data: isRecord(masked) ? masked : undefined,
    };

    const output = JSON.stringify(event);

    switch (level) {
      case LogLevel.CRITICAL:
      case LogLevel.ERROR:
        console.error(output);
        break;
      case LogLevel.WARN:
        console.warn(output);
        break;
      default:
        console.log(output);
    }
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, {
      ...data,
      error: error ? serializeError(error) : undefined,
    });
  }

  critical(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log(LogLevel.CRITICAL, message, {
      ...data,
      error: error ? serializeError(error) : undefined,
    });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function serializeError(error: Error): Record<string, unknown> {
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  return LEVEL_ORDER.find((level) => level === normalized) ?? fallback;
}

// Global logger instance
export const logger = new Logger();
