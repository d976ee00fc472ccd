// sle-score.ts - Reads per-metric scores out of the nested SLE document
import { Thresholds } from '../config/config';
import { KnownSleType, SleIssue, SleMetricsDocument, SleType } from '../types';
import { classifySeverity } from './severity-classifier';

export const SLE_SCORE_PATHS: Record<KnownSleType, readonly string[]> = {
  'throughput': ['client', 'throughput', 'score'],
  'successful-connects': ['client', 'successful-connects', 'score'],
  'gateway-availability': ['infrastructure', 'gateway-availability', 'score'],
  'dhcp-performance': ['infrastructure', 'dhcp-performance', 'score'],
  'dns-performance': ['infrastructure', 'dns-performance', 'score']
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isKnownSleType(sleType: SleType): sleType is KnownSleType {
  return Object.prototype.hasOwnProperty.call(SLE_SCORE_PATHS, sleType);
}

/**
 * Score for `sleType`, or null when the type has no path, the path is
 * missing, or the leaf is not a finite number. Null means "unknown", never 0.
 */
export function extractSleScore(metrics: SleMetricsDocument, sleType: SleType): number | null {
  if (!isKnownSleType(sleType)) {
    return null;
  }

  let value: unknown = metrics;
  for (const key of SLE_SCORE_PATHS[sleType]) {
    if (!isRecord(value)) {
      return null;
    }
    value = value[key];
  }

  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Every known metric in the document scoring below `threshold`, most severe first.
 * Metrics the document does not report are not issues.
 */
export function detectSleIssues(
  metrics: SleMetricsDocument,
  threshold: number,
  thresholds: Thresholds
): SleIssue[] {
  const issues: SleIssue[] = [];

  for (const metric of Object.keys(SLE_SCORE_PATHS)) {
    const score = extractSleScore(metrics, metric);
    if (score !== null && score < threshold) {
      issues.push({ metric, score, severity: classifySeverity(score, thresholds) });
    }
  }

  return issues.sort((a, b) => a.score - b.score);
}
