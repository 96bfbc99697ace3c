/**
 * Anomaly Detection Engine
 *
 * Runs every column of a dataset through its detector on an async task pool,
 * feeds finished columns through a merge queue (serialized per data source)
 * into the scorer, and returns the prioritized anomalies with a report per column.
 *
 * Cancellation is cooperative: each column checks the abort signal and the run
 * deadline before every sub-method. A column that observes cancellation drops
 * its candidates and is reported as skipped; finished columns are kept.
 */

import { availableParallelism } from 'os';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { v4 as uuidv4 } from 'uuid';
import {
  Anomaly,
  AnomalyCandidate,
  MethodOutcome,
  MethodSkip,
  TEXT_METHODS,
  TIME_SERIES_METHODS,
  TextFeatures,
  TextSource,
  TimeSeries,
} from '../anomaly/anomaly-types.js';
import {
  CancellationReason,
  InvalidDatasetError,
  InvalidParameterError,
  ParameterValidationError,
  RunCancelledError,
} from '../anomaly/errors.js';
import {
  AnomalyDetectionParameters,
  DetectionParametersInput,
  TextDriftOptions,
  TextDriftOptionsInput,
  resolveParameters,
  resolveTextDriftOptions,
} from '../config/detection-parameters.js';
import { AnomalyScorer } from '../scoring/anomaly-scorer.js';
import { prioritize } from '../scoring/prioritizer.js';
import { TextDriftDetector } from '../text/text-drift-detector.js';
import { TextFeatureExtractor } from '../text/text-feature-extractor.js';
import { markAnomalies } from '../timeseries/time-series.js';
import { TimeSeriesDetector } from '../timeseries/time-series-detector.js';
import { Logger, logger } from '../utils/logger.js';
import { metrics } from '../utils/metrics.js';

export interface DetectionDataset {
  timeSeries: readonly TimeSeries[];
  text: readonly TextSource[];
}

export type ColumnKind = 'time-series' | 'text';
export type ColumnSkipReason = CancellationReason | 'error';

export interface ColumnReport {
  source: string;
  kind: ColumnKind;
  status: 'analyzed' | 'skipped';
  reason?: ColumnSkipReason;
  skippedMethods: MethodSkip[];
  candidateCount: number;
  anomalyCount: number;
}

export interface DetectionRunOptions {
  parameters?: DetectionParametersInput;
  textDrift?: TextDriftOptionsInput;
  signal?: AbortSignal;
  timeBudgetMs?: number;
  concurrency?: number;
  // Called once per finished column, after its candidates are merged
  onColumnComplete?: (report: ColumnReport) => void;
}

export interface DetectionRunResult {
  runId: string;
  anomalies: Anomaly[];
  columns: ColumnReport[];
  partial: boolean;
  startedAt: number;
  durationMs: number;
  parameters: AnomalyDetectionParameters;
  textDrift: TextDriftOptions;
  markedSeries: TimeSeries[];
}

export interface DetectionEngineConfig {
  concurrency?: number;
  timeBudgetMs?: number;
}

function duplicateNames(names: readonly string[], path: (index: number) => string): ParameterValidationError[] {
  const seen = new Set<string>();
  const errors: ParameterValidationError[] = [];
  names.forEach((name, index) => {
    if (seen.has(name)) {
      errors.push({ path: path(index), message: `Duplicate name "${name}"`, value: name });
    }
    seen.add(name);
  });
  return errors;
}

/**
 * Series columns and text sources each need distinct names: merging and
 * magnitude baselines are keyed by them.
 */
export function validateDataset(dataset: DetectionDataset): ParameterValidationError[] {
  return [
    ...duplicateNames(
      dataset.timeSeries.map((s) => s.column),
      (i) => `timeSeries[${i}].column`
    ),
    ...duplicateNames(
      dataset.text.map((t) => t.source),
      (i) => `text[${i}].source`
    ),
  ];
}

class CancellationToken {
  constructor(
    private deadline: number,
    private signal?: AbortSignal
  ) {}

  get reason(): CancellationReason | null {
    if (this.signal?.aborted) return 'cancelled';
    if (Date.now() >= this.deadline) return 'timeout';
    return null;
  }

  throwIfCancelled(): void {
    const reason = this.reason;
    if (reason) throw new RunCancelledError(reason);
  }
}

/**
 * Serializes merges per data-source key. Each merge rescores every candidate
 * seen so far for that source, so columns sharing a source resolve together.
 */
class MergeQueue {
  private tails = new Map<string, Promise<void>>();
  private candidates = new Map<string, AnomalyCandidate[]>();
  private resolved = new Map<string, Anomaly[]>();

  constructor(private scorer: AnomalyScorer) {}

  merge(key: string, incoming: readonly AnomalyCandidate[]): Promise<void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const next = previous.then(() => {
      const all = [...(this.candidates.get(key) ?? []), ...incoming];
      this.candidates.set(key, all);
      this.resolved.set(key, this.scorer.score(all));
    });
    this.tails.set(key, next);
    return next;
  }

  anomalies(): Anomaly[] {
    return [...this.resolved.values()].flat();
  }
}

async function runPool<T>(tasks: readonly (() => Promise<T>)[], size: number): Promise<T[]> {
  const results: T[] = [];
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < tasks.length) {
      const index = next++;
      results[index] = await tasks[index]();
    }
  };

  const workers = Math.max(1, Math.min(size, tasks.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}

export class AnomalyDetectionEngine {
  private config: Required<DetectionEngineConfig>;

  constructor(config: DetectionEngineConfig = {}) {
    this.config = {
      concurrency: config.concurrency ?? availableParallelism(),
      timeBudgetMs: config.timeBudgetMs ?? Number.POSITIVE_INFINITY,
    };
  }

  /**
   * @throws InvalidParameterError or InvalidDatasetError before any column starts
   */
  async run(dataset: DetectionDataset, options: DetectionRunOptions = {}): Promise<DetectionRunResult> {
    let parameters: AnomalyDetectionParameters;
    let textDrift: TextDriftOptions;
    try {
      parameters = resolveParameters(options.parameters);
      textDrift = resolveTextDriftOptions(options.textDrift);
    } catch (error) {
      if (error instanceof InvalidParameterError) {
        logger.warn('Invalid detection parameters', { errors: error.errors });
      }
      throw error;
    }

    const datasetErrors = validateDataset(dataset);
    if (datasetErrors.length > 0) {
      logger.warn('Invalid dataset', { errors: datasetErrors });
      throw new InvalidDatasetError(datasetErrors);
    }

    const runId = uuidv4();
    const startedAt = Date.now();
    const log = new Logger();
    log.setRunId(runId);

    const token = new CancellationToken(startedAt + (options.timeBudgetMs ?? this.config.timeBudgetMs), options.signal);
    const seriesByColumn = new Map(dataset.timeSeries.map((s): [string, TimeSeries] => [s.column, s]));
    const queue = new MergeQueue(new AnomalyScorer({ series: seriesByColumn }));

    log.info('Starting detection run', {
      seriesCount: dataset.timeSeries.length,
      textSourceCount: dataset.text.length,
      parameters,
    });

    const tasks: (() => Promise<ColumnReport>)[] = [
      ...dataset.timeSeries.map((series) => () =>
        this.runColumn('time-series', series.column, token, queue, log, options, () =>
          this.analyzeSeries(series, parameters, token)
        )
      ),
      ...dataset.text.map((source) => () =>
        this.runColumn('text', source.source, token, queue, log, options, () =>
          this.analyzeText(source, parameters, textDrift, token)
        )
      ),
    ];

    const columns = await runPool(tasks, options.concurrency ?? this.config.concurrency);
    const anomalies = prioritize(queue.anomalies());

    for (const report of columns) {
      report.anomalyCount = anomalies.filter(
        (a) => a.dataSource === report.source && a.affectedRegion.kind === report.kind
      ).length;
    }

    const analyzedSeries = new Set(
      columns.filter((c) => c.kind === 'time-series' && c.status === 'analyzed').map((c) => c.source)
    );
    const markedSeries = dataset.timeSeries
      .filter((s) => analyzedSeries.has(s.column))
      .map((s) => markAnomalies(s, anomalies));

    const durationMs = Date.now() - startedAt;
    const partial = columns.some((c) => c.status === 'skipped');

    metrics.histogram('detection.run.duration', durationMs);
    for (const anomaly of anomalies) {
      metrics.increment('detection.anomalies', { severity: anomaly.severity });
    }

    log.info('Detection run completed', {
      anomalyCount: anomalies.length,
      analyzed: columns.filter((c) => c.status === 'analyzed').length,
      skipped: columns.filter((c) => c.status === 'skipped').length,
      partial,
      durationMs,
    });

    return {
      runId,
      anomalies,
      columns,
      partial,
      startedAt,
      durationMs,
      parameters,
      textDrift,
      markedSeries,
    };
  }

  private async runColumn(
    kind: ColumnKind,
    source: string,
    token: CancellationToken,
    queue: MergeQueue,
    log: Logger,
    options: DetectionRunOptions,
    analyze: () => Promise<MethodOutcome>
  ): Promise<ColumnReport> {
    const started = Date.now();
    const report: ColumnReport = {
      source,
      kind,
      status: 'skipped',
      skippedMethods: [],
      candidateCount: 0,
      anomalyCount: 0,
    };

    try {
      const outcome = await analyze();
      await queue.merge(`${kind}:${source}`, outcome.candidates);

      report.status = 'analyzed';
      report.skippedMethods = outcome.skipped;
      report.candidateCount = outcome.candidates.length;
      metrics.histogram('detection.column.duration', Date.now() - started, { kind });
      log.debug('Column analyzed', { source, kind, candidates: outcome.candidates.length });
    } catch (error) {
      const reason: ColumnSkipReason = error instanceof RunCancelledError ? error.reason : 'error';
      if (reason === 'error') {
        log.error('Column analysis failed', error instanceof Error ? error : new Error(String(error)), {
          source,
          kind,
        });
      } else {
        log.warn('Column not analyzed', { source, kind, reason });
      }
      report.reason = reason;
      metrics.increment('detection.columns.skipped', { reason });
    }

    if (options.onColumnComplete) {
      try {
        options.onColumnComplete(report);
      } catch (error) {
        log.error('onColumnComplete callback failed', error instanceof Error ? error : new Error(String(error)), {
          source,
        });
      }
    }

    return report;
  }

  private async analyzeSeries(
    series: TimeSeries,
    parameters: AnomalyDetectionParameters,
    token: CancellationToken
  ): Promise<MethodOutcome> {
    const detector = new TimeSeriesDetector(parameters);
    const outcome: MethodOutcome = { candidates: [], skipped: [] };

    for (const method of TIME_SERIES_METHODS) {
      token.throwIfCancelled();
      await yieldToEventLoop();
      token.throwIfCancelled();

      const result = detector.runMethod(series, method);
      outcome.candidates.push(...result.candidates);
      outcome.skipped.push(...result.skipped);
    }
    return outcome;
  }

  private async analyzeText(
    source: TextSource,
    parameters: AnomalyDetectionParameters,
    textDrift: TextDriftOptions,
    token: CancellationToken
  ): Promise<MethodOutcome> {
    token.throwIfCancelled();
    await yieldToEventLoop();
    token.throwIfCancelled();

    const extractor = TextFeatureExtractor.forBuckets(source.buckets);
    const features: TextFeatures[] = source.buckets.map((bucket) => extractor.extract(bucket));
    const detector = new TextDriftDetector(parameters, textDrift, extractor.vocabulary());

    if (features.length < 2) {
      return detector.detect(source.source, features);
    }

    const outcome: MethodOutcome = { candidates: [], skipped: [] };
    for (const method of TEXT_METHODS) {
      token.throwIfCancelled();
      await yieldToEventLoop();
      token.throwIfCancelled();

      const result = detector.runMethod(source.source, method, features);
      outcome.candidates.push(...result.candidates);
      outcome.skipped.push(...result.skipped);
    }
    return outcome;
  }
}
