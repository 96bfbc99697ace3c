/**
 * Core type definitions shared across the anomaly engine
 */

// ============================================================================
// Logging Types
// ============================================================================

export enum LogLevel {
  TRACE = 'trace',
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  CRITICAL = 'critical',
}

export interface LogEvent {
  id: string;
  timestamp: number;
  level: LogLevel;
  type: string;
  message: string;
  runId: string;
  data?: Record<string, unknown>;
}

// ============================================================================
// Metrics Types
// ============================================================================

export interface MetricEvent {
  name: string;
  value: number;
  type: 'counter' | 'gauge' | 'histogram';
  timestamp: number;
  tags?: Record<string, string>;
}

// ============================================================================
// Error Types
// ============================================================================

export class EngineError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EngineError';
  }
}
