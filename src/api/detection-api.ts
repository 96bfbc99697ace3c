/**
 * Detection API
 *
 * HTTP surface over the detection engine: run detection on a posted dataset,
 * validate parameters, read defaults and the recorded run metrics.
 */

import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { InvalidDatasetError, InvalidParameterError, ParameterValidationError } from '../anomaly/errors.js';
import {
  DEFAULT_DETECTION_PARAMETERS,
  DEFAULT_TEXT_DRIFT_OPTIONS,
  resolveParameters,
  resolveTextDriftOptions,
  validateParameters,
  validateTextDriftOptions,
} from '../config/detection-parameters.js';
import { AnomalyDetectionEngine } from '../engine/detection-engine.js';
import { Logger } from '../utils/logger.js';
import { MetricsCollector } from '../utils/metrics.js';
import { isRecord, parseDetectRequest, parseParameters, parseTextDrift } from './request-parser.js';

export interface DetectionAPIConfig {
  enableAuth?: boolean;
  apiKey?: string;
  corsOrigins?: string[];
  // Applied when a request does not set its own budget
  defaultTimeBudgetMs?: number;
}

const DETECTION_METRICS = [
  'detection.run.duration',
  'detection.column.duration',
  'detection.anomalies',
  'detection.columns.skipped',
];

export class DetectionAPI {
  private app: Hono;
  private logger: Logger;
  private config: Required<Omit<DetectionAPIConfig, 'apiKey' | 'defaultTimeBudgetMs'>> &
    Pick<DetectionAPIConfig, 'apiKey' | 'defaultTimeBudgetMs'>;

  constructor(
    private engine: AnomalyDetectionEngine,
    private metricsCollector: MetricsCollector,
    config: DetectionAPIConfig = {}
  ) {
    this.app = new Hono();
    this.logger = new Logger();
    this.config = {
      enableAuth: config.enableAuth ?? false,
      apiKey: config.apiKey,
      corsOrigins: config.corsOrigins ?? ['*'],
      defaultTimeBudgetMs: config.defaultTimeBudgetMs,
    };

    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(
      '/*',
      cors({
        origin: this.config.corsOrigins,
        allowMethods: ['GET', 'POST'],
        allowHeaders: ['Content-Type', 'Authorization', 'X-API-Key'],
      })
    );

    if (this.config.enableAuth) {
      this.app.use('/api/*', async (c, next) => {
        const apiKey = c.req.header('X-API-Key') || c.req.header('Authorization')?.replace('Bearer ', '');

        if (!apiKey || apiKey !== this.config.apiKey) {
          return c.json({ success: false, error: 'Unauthorized' }, 401);
        }

        await next();
      });
    }

    this.app.use('/*', async (c, next) => {
      const start = Date.now();
      await next();

      this.logger.info('Detection API request', {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration: Date.now() - start,
      });
    });
  }

  private setupRoutes(): void {
    this.app.get('/health', (c) => {
      return c.json({ status: 'healthy', timestamp: Date.now() });
    });

    this.app.post('/api/detect', async (c) => this.detect(c));

    this.app.post('/api/parameters/validate', async (c) => this.validate(c));
    this.app.get('/api/parameters/defaults', (c) =>
      c.json({
        success: true,
        data: { parameters: DEFAULT_DETECTION_PARAMETERS, textDrift: DEFAULT_TEXT_DRIFT_OPTIONS },
      })
    );

    this.app.get('/api/metrics/summary', (c) => this.metricsSummary(c));
  }

  private async readJson(c: Context): Promise<{ ok: true; body: unknown } | { ok: false }> {
    try {
      const body: unknown = await c.req.json();
      return { ok: true, body };
    } catch (error) {
      this.logger.debug('Request body is not valid JSON', {
        path: c.req.path,
        message: error instanceof Error ? error.message : String(error),
      });
      return { ok: false };
    }
  }

  private async detect(c: Context) {
    const body = await this.readJson(c);
    if (!body.ok) {
      return c.json({ success: false, error: 'Request body must be valid JSON' }, 400);
    }

    const parsed = parseDetectRequest(body.body);
    if (!parsed.ok) {
      this.logger.warn('Invalid detection request', { errors: parsed.errors });
      return c.json({ success: false, error: 'Invalid detection request', errors: parsed.errors }, 400);
    }

    const request = parsed.value;
    try {
      const result = await this.engine.run(
        { timeSeries: request.timeSeries, text: request.text },
        {
          parameters: request.parameters,
          textDrift: request.textDrift,
          timeBudgetMs: request.timeBudgetMs ?? this.config.defaultTimeBudgetMs,
          signal: c.req.raw.signal,
        }
      );
      return c.json({ success: true, data: result });
    } catch (error) {
      if (error instanceof InvalidParameterError || error instanceof InvalidDatasetError) {
        return c.json({ success: false, error: error.message, errors: error.errors }, 400);
      }
      this.logger.error('Detection run failed', error instanceof Error ? error : undefined);
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      return c.json({ success: false, error: errorMessage }, 500);
    }
  }

  private async validate(c: Context) {
    const body = await this.readJson(c);
    if (!body.ok) {
      return c.json({ success: false, error: 'Request body must be valid JSON' }, 400);
    }

    const raw: Record<string, unknown> = isRecord(body.body) ? body.body : {};
    const errors: ParameterValidationError[] = [];
    const parameters = parseParameters(raw.parameters, errors);
    const textDrift = parseTextDrift(raw.textDrift, errors);
    errors.push(...validateParameters(parameters), ...validateTextDriftOptions(textDrift));

    const valid = errors.length === 0;
    return c.json({
      success: true,
      data: {
        valid,
        errors,
        parameters: valid ? resolveParameters(parameters) : null,
        textDrift: valid ? resolveTextDriftOptions(textDrift) : null,
      },
    });
  }

  private metricsSummary(c: Context) {
    const summary: Record<string, unknown> = {};
    for (const name of DETECTION_METRICS) {
      summary[name] = this.metricsCollector.getStats(name);
    }
    return c.json({ success: true, data: summary });
  }

  getApp(): Hono {
    return this.app;
  }
}
