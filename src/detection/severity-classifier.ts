// severity-classifier.ts - Score to severity tier, and the remediate/leave-alone decision
import { Thresholds, TicketPriority, SleRules } from '../config/config';
import { Severity, SleType } from '../types';

/** Higher rank is more severe. */
export const SEVERITY_RANK: Record<Severity, number> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3
};

export function classifySeverity(score: number, thresholds: Thresholds): Severity {
  if (score < thresholds.critical) {
    return 'critical';
  } else if (score < thresholds.high) {
    return 'high';
  } else if (score < thresholds.medium) {
    return 'medium';
  }
  return 'low';
}

export interface RemediationDecision {
  remediate: boolean;
  reason: string;
}

/**
 * A score at or above `threshold` is healthy. The validation loop uses the
 * same inclusive bound for "restored", so the two never disagree on a score.
 */
export function shouldRemediate(score: number, threshold: number): RemediationDecision {
  if (score >= threshold) {
    return {
      remediate: false,
      reason: `SLE score ${score} is at or above threshold ${threshold}`
    };
  }
  return {
    remediate: true,
    reason: `SLE score ${score} is below threshold ${threshold}, remediation recommended`
  };
}

// Outages of these affect every client on the AP, so tickets never go below high.
const INFRASTRUCTURE_SLES: ReadonlySet<string> = new Set(['gateway-availability', 'dhcp-performance']);

export function ticketPriority(
  sleType: SleType,
  severity: Severity,
  priorityMap: SleRules['ticketing']['priority_map']
): TicketPriority {
  const priority = priorityMap[severity] ?? 'normal';

  if (INFRASTRUCTURE_SLES.has(sleType) && priority !== 'urgent') {
    return 'high';
  }
  return priority;
}
