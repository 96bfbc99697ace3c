/**
 * Environment Configuration
 * Reads process settings with defaults; unparsable values fall back to the default.
 */

import { availableParallelism } from 'os';
import { LogLevel } from '../types/index.js';
import { logger, parseLogLevel } from '../utils/logger.js';

export interface EnvConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  maskSensitiveLogs: boolean;
  runTimeBudgetMs: number;
  maxConcurrency: number;
  enableApiAuth: boolean;
  apiKey?: string;
  corsOrigins: string[];
}

type Env = Record<string, string | undefined>;

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

function parsePositiveInteger(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 1 ? defaultValue : parsed;
}

function parseArray(value: string | undefined, defaultValue: string[]): string[] {
  if (value === undefined || value.trim() === '') return defaultValue;
  return value.split(',').map((v) => v.trim()).filter((v) => v.length > 0);
}

export function loadEnvConfig(env: Env = process.env): EnvConfig {
  const config: EnvConfig = {
    port: parsePositiveInteger(env.PORT, 8787),
    host: env.HOST || '0.0.0.0',
    logLevel: parseLogLevel(env.LOG_LEVEL, LogLevel.INFO),
    maskSensitiveLogs: parseBoolean(env.MASK_SENSITIVE_LOGS, true),
    runTimeBudgetMs: parsePositiveInteger(env.RUN_TIME_BUDGET_MS, 30000),
    maxConcurrency: parsePositiveInteger(env.MAX_CONCURRENCY, availableParallelism()),
    enableApiAuth: parseBoolean(env.ENABLE_API_AUTH, false),
    apiKey: env.API_KEY || undefined,
    corsOrigins: parseArray(env.CORS_ORIGINS, ['*']),
  };

  if (config.port > 65535) {
    logger.warn('PORT out of range, using default', { port: config.port });
    config.port = 8787;
  }

  if (config.enableApiAuth && !config.apiKey) {
    throw new Error('API_KEY is required when ENABLE_API_AUTH=true');
  }

  return config;
}
