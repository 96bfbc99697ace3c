/**
 * Node entry point: serves the detection API with @hono/node-server.
 */

import { serve } from '@hono/node-server';
import { DetectionAPI } from './api/detection-api.js';
import { loadEnvConfig } from './config/env-config.js';
import { AnomalyDetectionEngine } from './engine/detection-engine.js';
import { Logger, logger } from './utils/logger.js';
import { metrics } from './utils/metrics.js';

const config = loadEnvConfig();

Logger.defaultLevel = config.logLevel;
Logger.defaultMasking = config.maskSensitiveLogs;
logger.setMinLevel(config.logLevel);
logger.setMaskSensitiveData(config.maskSensitiveLogs);

const engine = new AnomalyDetectionEngine({
  concurrency: config.maxConcurrency,
  timeBudgetMs: config.runTimeBudgetMs,
});

const api = new DetectionAPI(engine, metrics, {
  enableAuth: config.enableApiAuth,
  apiKey: config.apiKey,
  corsOrigins: config.corsOrigins,
  defaultTimeBudgetMs: config.runTimeBudgetMs,
});

const server = serve({ fetch: api.getApp().fetch, port: config.port, hostname: config.host }, (info) => {
  logger.info('Detection API listening', { address: info.address, port: info.port });
});

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    logger.info(`Received ${signal} signal, closing server`);
    server.close((error) => {
      if (error) {
        logger.error('Server close failed', error);
        process.exit(1);
      }
      process.exit(0);
    });
  });
}
