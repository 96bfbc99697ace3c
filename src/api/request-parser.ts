/**
 * Shape checks for JSON request bodies. Range checks stay with the
 * parameter resolvers; this only turns `unknown` into typed input.
 */

import { TextBucket, TextDocument, TextSource, TimeSeries } from '../anomaly/anomaly-types.js';
import { InvalidSeriesError, ParameterValidationError } from '../anomaly/errors.js';
import { DetectionParametersInput, TextBaseline, TextDriftOptionsInput } from '../config/detection-parameters.js';
import { validateDataset } from '../engine/detection-engine.js';
import { RawPoint, createTimeSeries } from '../timeseries/time-series.js';

export interface DetectRequest {
  timeSeries: TimeSeries[];
  text: TextSource[];
  parameters?: DetectionParametersInput;
  textDrift?: TextDriftOptionsInput;
  timeBudgetMs?: number;
}

export type ParseResult<T> = { ok: true; value: T } | { ok: false; errors: ParameterValidationError[] };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Epoch milliseconds or an ISO-8601 string
function toTimestamp(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string') {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
}

function optionalNumber(
  source: Record<string, unknown>,
  key: string,
  path: string,
  errors: ParameterValidationError[]
): number | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') {
    errors.push({ path, message: 'Must be a number', value });
    return undefined;
  }
  return value;
}

export function parseParameters(raw: unknown, errors: ParameterValidationError[]): DetectionParametersInput {
  if (raw === undefined) return {};
  if (!isRecord(raw)) {
    errors.push({ path: 'parameters', message: 'Must be an object', value: raw });
    return {};
  }

  const input: DetectionParametersInput = {
    zScoreThreshold: optionalNumber(raw, 'zScoreThreshold', 'zScoreThreshold', errors),
    movingAverageWindow: optionalNumber(raw, 'movingAverageWindow', 'movingAverageWindow', errors),
    textSimilarityThreshold: optionalNumber(raw, 'textSimilarityThreshold', 'textSimilarityThreshold', errors),
    minimumAnomalyDuration: optionalNumber(raw, 'minimumAnomalyDuration', 'minimumAnomalyDuration', errors),
  };

  const percentiles = raw.percentileThresholds;
  if (percentiles !== undefined) {
    if (Array.isArray(percentiles) && percentiles.every((p): p is number => typeof p === 'number')) {
      input.percentileThresholds = percentiles;
    } else {
      errors.push({ path: 'percentileThresholds', message: 'Must be an array of numbers', value: percentiles });
    }
  }

  return input;
}

export function parseTextDrift(raw: unknown, errors: ParameterValidationError[]): TextDriftOptionsInput {
  if (raw === undefined) return {};
  if (!isRecord(raw)) {
    errors.push({ path: 'textDrift', message: 'Must be an object', value: raw });
    return {};
  }

  const input: TextDriftOptionsInput = {
    proportionDelta: optionalNumber(raw, 'proportionDelta', 'textDrift.proportionDelta', errors),
    maxDrivingKeywords: optionalNumber(raw, 'maxDrivingKeywords', 'textDrift.maxDrivingKeywords', errors),
    minTermCount: optionalNumber(raw, 'minTermCount', 'textDrift.minTermCount', errors),
  };

  const baseline = raw.baseline;
  if (baseline !== undefined) {
    const parsed = parseBaseline(baseline);
    if (parsed) {
      input.baseline = parsed;
    } else {
      errors.push({
        path: 'textDrift.baseline',
        message: "Must be {mode: 'trailing', buckets} or {mode: 'fixed', referenceBuckets}",
        value: baseline,
      });
    }
  }

  return input;
}

function parseBaseline(raw: unknown): TextBaseline | undefined {
  if (!isRecord(raw)) return undefined;
  if (raw.mode === 'trailing' && typeof raw.buckets === 'number') {
    return { mode: 'trailing', buckets: raw.buckets };
  }
  const refs = raw.referenceBuckets;
  if (raw.mode === 'fixed' && Array.isArray(refs) && refs.every((r): r is number => typeof r === 'number')) {
    return { mode: 'fixed', referenceBuckets: refs };
  }
  return undefined;
}

function parseSeries(raw: unknown, index: number, errors: ParameterValidationError[]): TimeSeries | undefined {
  const path = `timeSeries[${index}]`;
  if (!isRecord(raw) || typeof raw.column !== 'string' || !Array.isArray(raw.points)) {
    errors.push({ path, message: 'Must be {column: string, points: array}' });
    return undefined;
  }

  const points: RawPoint[] = [];
  for (const [i, point] of raw.points.entries()) {
    const timestamp = isRecord(point) ? toTimestamp(point.timestamp) : undefined;
    const value = isRecord(point) ? point.value : undefined;
    if (timestamp === undefined || typeof value !== 'number') {
      errors.push({ path: `${path}.points[${i}]`, message: 'Must be {timestamp, value: number}', value: point });
      return undefined;
    }
    points.push({ timestamp, value });
  }

  try {
    return createTimeSeries(raw.column, points);
  } catch (error) {
    if (!(error instanceof InvalidSeriesError)) throw error;
    errors.push({ path, message: error.message });
    return undefined;
  }
}

function parseDocument(raw: unknown): TextDocument | undefined {
  if (!isRecord(raw) || typeof raw.id !== 'string' || typeof raw.content !== 'string') return undefined;

  const timestamp = toTimestamp(raw.timestamp);
  if (timestamp === undefined) return undefined;

  const keywords = raw.keywords ?? [];
  if (!Array.isArray(keywords) || !keywords.every((k): k is string => typeof k === 'string')) return undefined;

  const category = raw.category;
  if (category !== undefined && category !== null && typeof category !== 'string') return undefined;

  return {
    id: raw.id,
    content: raw.content,
    timestamp,
    category: typeof category === 'string' ? category : undefined,
    keywords,
  };
}

function parseTextSource(raw: unknown, index: number, errors: ParameterValidationError[]): TextSource | undefined {
  const path = `text[${index}]`;
  if (!isRecord(raw) || typeof raw.source !== 'string' || !Array.isArray(raw.buckets)) {
    errors.push({ path, message: 'Must be {source: string, buckets: array}' });
    return undefined;
  }

  const buckets: TextBucket[] = [];
  for (const [b, bucket] of raw.buckets.entries()) {
    const bucketPath = `${path}.buckets[${b}]`;
    const start = isRecord(bucket) ? toTimestamp(bucket.start) : undefined;
    const end = isRecord(bucket) ? toTimestamp(bucket.end) : undefined;
    const docs = isRecord(bucket) ? bucket.documents : undefined;
    if (start === undefined || end === undefined || !Array.isArray(docs)) {
      errors.push({ path: bucketPath, message: 'Must be {start, end, documents: array}' });
      return undefined;
    }

    const documents: TextDocument[] = [];
    for (const [d, rawDoc] of docs.entries()) {
      const doc = parseDocument(rawDoc);
      if (!doc) {
        errors.push({
          path: `${bucketPath}.documents[${d}]`,
          message: 'Must be {id: string, content: string, timestamp, category?, keywords?}',
        });
        return undefined;
      }
      documents.push(doc);
    }
    buckets.push({ start, end, documents });
  }

  return { source: raw.source, buckets };
}

export function parseDetectRequest(body: unknown): ParseResult<DetectRequest> {
  const errors: ParameterValidationError[] = [];
  if (!isRecord(body)) {
    return { ok: false, errors: [{ path: '', message: 'Body must be a JSON object' }] };
  }

  const rawSeries = body.timeSeries ?? [];
  const rawText = body.text ?? [];
  if (!Array.isArray(rawSeries)) errors.push({ path: 'timeSeries', message: 'Must be an array' });
  if (!Array.isArray(rawText)) errors.push({ path: 'text', message: 'Must be an array' });

  const timeSeries: TimeSeries[] = [];
  if (Array.isArray(rawSeries)) {
    rawSeries.forEach((raw, i) => {
      const series = parseSeries(raw, i, errors);
      if (series) timeSeries.push(series);
    });
  }

  const text: TextSource[] = [];
  if (Array.isArray(rawText)) {
    rawText.forEach((raw, i) => {
      const source = parseTextSource(raw, i, errors);
      if (source) text.push(source);
    });
  }

  errors.push(...validateDataset({ timeSeries, text }));

  const parameters = parseParameters(body.parameters, errors);
  const textDrift = parseTextDrift(body.textDrift, errors);

  const timeBudgetMs = body.timeBudgetMs;
  if (timeBudgetMs !== undefined && (typeof timeBudgetMs !== 'number' || !(timeBudgetMs >= 0))) {
    errors.push({ path: 'timeBudgetMs', message: 'Must be a non-negative number', value: timeBudgetMs });
  }

  if (errors.length > 0) return { ok: false, errors };

  return {
    ok: true,
    value: {
      timeSeries,
      text,
      parameters,
      textDrift,
      timeBudgetMs: typeof timeBudgetMs === 'number' ? timeBudgetMs : undefined,
    },
  };
}
