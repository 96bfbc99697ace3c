/**
 * Orders anomalies by severity, then score, then most recent window start.
 * Exact ties keep their input order.
 */

import { Anomaly } from '../anomaly/anomaly-types.js';
import { severityRank } from './anomaly-scorer.js';

export function compareAnomalies(a: Anomaly, b: Anomaly): number {
  return (
    severityRank(b.severity) - severityRank(a.severity) ||
    b.score - a.score ||
    b.timeWindow.start - a.timeWindow.start
  );
}

export function prioritize(anomalies: readonly Anomaly[]): Anomaly[] {
  // Array.prototype.sort is stable
  return [...anomalies].sort(compareAnomalies);
}
