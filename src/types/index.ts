// Type definitions

export const KNOWN_SLE_TYPES = [
  'throughput',
  'successful-connects',
  'gateway-availability',
  'dhcp-performance',
  'dns-performance'
] as const;

export type KnownSleType = typeof KNOWN_SLE_TYPES[number];

// Any other metric name is accepted; it simply has no score path.
export type SleType = KnownSleType | (string & {});

export type Severity = 'critical' | 'high' | 'medium' | 'low';

export type RemediationAction = 'reboot' | 'wlan_reset' | 'rrm_adjustment';

// ============================================
// DEVICE API SHAPES
// ============================================

export interface ApStats {
  status: string;
  uptime: number;
  num_clients: number;
  cpu_util?: number;
  mem_util?: number;
  ip?: string;
  version?: string;
  [key: string]: unknown;
}

export interface ApDetails {
  model?: string;
  name?: string;
  [key: string]: unknown;
}

export interface RebootResponse {
  status: 'reboot_issued';
  ap_id: string;
}

/** Nested score document, e.g. `{ client: { throughput: { score: 95.5 } } }`. */
export type SleMetricsDocument = Record<string, unknown>;

// ============================================
// GUARDRAILS
// ============================================

export type GuardrailCheck = 'business_hours' | 'client_count' | 'reboot_interval' | 'live_state' | 'all';

export interface GuardrailResult {
  passed: boolean;
  reason: string;
  check: GuardrailCheck;
}

// ============================================
// REMEDIATION
// ============================================

export type RemediationStatus = 'pending' | 'success' | 'blocked' | 'error' | 'not_implemented';

interface RemediationAttemptBase {
  ap_id: string;
  action: string;
  timestamp: string;
  forced: boolean;
}

export type RemediationAttempt = RemediationAttemptBase & (
  | { status: 'success'; response: RebootResponse; reason: string }
  | { status: 'blocked'; reason: string; guardrail: GuardrailCheck }
  | { status: 'error'; reason: string }
  | { status: 'not_implemented'; reason: string }
);

// ============================================
// VALIDATION
// ============================================

export interface ValidationAttempt {
  attempt: number;
  timestamp: string;
  score: number;
  /** False when the score could not be read and 0 stood in for it. */
  score_known: boolean;
  restored: boolean;
  error?: string;
}

export interface ValidationResult {
  status: 'restored' | 'failed';
  reason: string;
  ap_online: boolean;
  ap_status: string;
  threshold: number;
  attempts: ValidationAttempt[];
  final_score: number | null;
  duration_seconds: number;
}

// ============================================
// DIAGNOSTICS
// ============================================

export interface KeyMetrics {
  status: string;
  uptime: number;
  clients: number;
  cpu_util: number;
  mem_util: number;
  ip: string;
  model: string;
  version: string;
}

export type ApDiagnostics =
  | {
      status: 'success';
      timestamp: string;
      ap_id: string;
      ap_stats: ApStats;
      ap_details: ApDetails;
      client_count: number;
      key_metrics: KeyMetrics;
    }
  | {
      status: 'error';
      timestamp: string;
      ap_id: string;
      error: string;
    };

export interface SleIssue {
  metric: string;
  score: number;
  severity: Severity;
}

export type SleDiagnostics =
  | {
      status: 'success';
      timestamp: string;
      sle_type: string;
      /** Score of the requested metric; null when the document has none. */
      score: number | null;
      issues: SleIssue[];
      sle_metrics: SleMetricsDocument;
    }
  | {
      status: 'error';
      timestamp: string;
      sle_type: string;
      error: string;
    };

export interface DiagnosticReport {
  report_timestamp: string;
  ap_id: string;
  sle_type: string;
  ap_diagnostics: ApDiagnostics;
  sle_diagnostics: SleDiagnostics;
  remediation_needed: boolean;
  recommendations: string[];
}

// ============================================
// WORKFLOW
// ============================================

export type WorkflowStatus = 'success' | 'blocked' | 'error' | 'not_implemented' | 'validation_failed';

export interface WorkflowOutcome {
  status: WorkflowStatus;
  ap_id: string;
  sle_type: string;
  severity: Severity | null;
  sle_score: number | null;
  action: string;
  diagnostics: {
    ap: ApDiagnostics;
    sle: SleDiagnostics;
  };
  remediation: RemediationAttempt;
  validation: ValidationResult | null;
  recommendations: string[];
  remediation_needed: boolean;
  started_at: string;
  /** Wall time of the whole run; reported as MTTR to the audit sink. */
  duration_seconds: number;
}
