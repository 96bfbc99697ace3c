/**
 * Anomaly Scorer & Window Resolver
 *
 * The only place severity is assigned. Candidates from the same source, method
 * and anomaly type are merged when their windows overlap or their sequence
 * numbers are adjacent; the merged anomaly spans earliest to latest window and
 * keeps the highest score.
 *
 * Ids are derived from the merged group, so scoring the same candidates twice
 * yields the same anomalies.
 */

import { v5 as uuidv5 } from 'uuid';
import {
  AffectedRegion,
  Anomaly,
  AnomalyCandidate,
  AnomalySeverity,
  TextCandidate,
  TimeSeries,
  TimeSeriesCandidate,
  TimeWindow,
} from '../anomaly/anomaly-types.js';

// Policy constants: score < 0.4 LOW, < 0.7 MEDIUM, otherwise HIGH
export const SEVERITY_THRESHOLDS = Object.freeze({ medium: 0.4, high: 0.7 });

const ANOMALY_ID_NAMESPACE = '6f1c2a3e-8d4b-5e7f-9a10-2b3c4d5e6f70';

const SEVERITY_RANK: Record<AnomalySeverity, number> = {
  [AnomalySeverity.LOW]: 0,
  [AnomalySeverity.MEDIUM]: 1,
  [AnomalySeverity.HIGH]: 2,
};

export function severityForScore(score: number): AnomalySeverity {
  if (score >= SEVERITY_THRESHOLDS.high) return AnomalySeverity.HIGH;
  if (score >= SEVERITY_THRESHOLDS.medium) return AnomalySeverity.MEDIUM;
  return AnomalySeverity.LOW;
}

export function severityRank(severity: AnomalySeverity): number {
  return SEVERITY_RANK[severity];
}

export interface ScoringContext {
  // Series by column, for the pre-anomaly baseline of time-series magnitudes
  series?: ReadonlyMap<string, TimeSeries>;
}

interface CandidateGroup {
  members: AnomalyCandidate[];
  window: { start: number; end: number };
  lastSequence: number;
}

function groupKey(candidate: AnomalyCandidate): string {
  return `${candidate.source}\u0000${candidate.method}\u0000${candidate.type}`;
}

export class AnomalyScorer {
  constructor(private context: ScoringContext = {}) {}

  /**
   * Resolve candidates into anomalies. Output order is by group key, then window start.
   */
  score(candidates: readonly AnomalyCandidate[]): Anomaly[] {
    const byKey = new Map<string, AnomalyCandidate[]>();
    for (const candidate of candidates) {
      const key = groupKey(candidate);
      const list = byKey.get(key);
      if (list) {
        list.push(candidate);
      } else {
        byKey.set(key, [candidate]);
      }
    }

    const anomalies: Anomaly[] = [];
    for (const key of [...byKey.keys()].sort()) {
      const list = byKey.get(key) ?? [];
      for (const group of this.mergeGroups(list)) {
        anomalies.push(this.resolve(group));
      }
    }
    return anomalies;
  }

  private mergeGroups(candidates: AnomalyCandidate[]): CandidateGroup[] {
    const sorted = [...candidates].sort(
      (a, b) => a.window.start - b.window.start || a.sequence - b.sequence
    );

    const groups: CandidateGroup[] = [];
    let current: CandidateGroup | undefined;

    for (const candidate of sorted) {
      const overlaps = current !== undefined && candidate.window.start <= current.window.end;
      const adjacent = current !== undefined && Math.abs(candidate.sequence - current.lastSequence) <= 1;

      if (current && (overlaps || adjacent)) {
        current.members.push(candidate);
        current.window.end = Math.max(current.window.end, candidate.window.end);
        current.lastSequence = Math.max(current.lastSequence, candidate.sequence);
      } else {
        current = {
          members: [candidate],
          window: { start: candidate.window.start, end: candidate.window.end },
          lastSequence: candidate.sequence,
        };
        groups.push(current);
      }
    }
    return groups;
  }

  private resolve(group: CandidateGroup): Anomaly {
    // First member with the highest score represents the group
    const representative = group.members.reduce((best, c) => (c.score > best.score ? c : best));
    const score = representative.score;
    const window: TimeWindow = Object.freeze({ start: group.window.start, end: group.window.end });

    const { magnitude, baseline, observed, details } =
      representative.kind === 'time-series'
        ? this.timeSeriesMetrics(representative, group, window)
        : this.textMetrics(representative, group);

    return Object.freeze({
      id: uuidv5(
        [representative.source, representative.method, representative.type, window.start, window.end].join('|'),
        ANOMALY_ID_NAMESPACE
      ),
      type: representative.type,
      severity: severityForScore(score),
      dataSource: representative.source,
      timeWindow: window,
      affectedRegion: this.affectedRegion(representative, group),
      score,
      metadata: Object.freeze({
        method: representative.method,
        candidateCount: group.members.length,
        magnitude,
        baseline,
        observed,
        details: Object.freeze(details),
      }),
    });
  }

  /**
   * Percent change of the peak against the mean of the points before the window
   * (or, when the window opens the series, the points outside it).
   */
  private timeSeriesMetrics(representative: TimeSeriesCandidate, group: CandidateGroup, window: TimeWindow) {
    const series = this.context.series?.get(representative.source);
    let baseline: number | null = null;

    if (series) {
      const before = series.points.filter((p) => p.timestamp < window.start);
      const reference =
        before.length > 0 ? before : series.points.filter((p) => p.timestamp < window.start || p.timestamp > window.end);
      if (reference.length > 0) {
        baseline = reference.reduce((acc, p) => acc + p.value, 0) / reference.length;
      }
    }

    // Peak: the merged value furthest from the baseline
    let observed = representative.value;
    if (baseline !== null) {
      for (const member of group.members) {
        if (member.kind === 'time-series' && Math.abs(member.value - baseline) > Math.abs(observed - baseline)) {
          observed = member.value;
        }
      }
    }
    const magnitude =
      baseline === null || baseline === 0 ? null : ((observed - baseline) / Math.abs(baseline)) * 100;

    return {
      magnitude,
      baseline,
      observed,
      details: {
        expected: representative.expected,
        deviation: representative.deviation,
        flaggedPoints: group.members.length,
      },
    };
  }

  private textMetrics(representative: TextCandidate, group: CandidateGroup) {
    const { observed, baseline } = representative;
    let magnitude: number | null;
    if (representative.magnitudeKind === 'relative') {
      magnitude = baseline > 0 ? ((observed - baseline) / baseline) * 100 : null;
    } else {
      magnitude = (observed - baseline) * 100;
    }

    return {
      magnitude,
      baseline,
      observed,
      details: {
        ...representative.details,
        buckets: group.members.map((m) => m.sequence),
      },
    };
  }

  private affectedRegion(representative: AnomalyCandidate, group: CandidateGroup): AffectedRegion {
    const keywords = new Set<string>();
    const categories = new Set<string>();

    // Representative first so the strongest drivers lead
    for (const member of [representative, ...group.members]) {
      if (member.kind !== 'text') continue;
      member.keywords.forEach((k) => keywords.add(k));
      member.categories.forEach((c) => categories.add(c));
    }

    return Object.freeze({
      source: representative.source,
      kind: representative.kind,
      keywords: Object.freeze([...keywords]),
      categories: Object.freeze([...categories]),
    });
  }
}
