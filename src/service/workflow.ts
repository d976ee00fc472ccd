// workflow.ts - End-to-end run: diagnose, classify, remediate under guardrails, validate
import { toErrorMessage } from '../common/errors';
import { ComponentLogger } from '../common/logger';
import { Sleeper, createDeadline } from '../common/timers';
import { SleRules, validationBudgetSeconds, validationWorstCaseSeconds } from '../config/config';
import { DEFAULT_ACTION, selectAction } from '../detection/action-selector';
import { classifySeverity, shouldRemediate } from '../detection/severity-classifier';
import { RemediationExecutor } from '../execution/remediation-executor';
import { DeviceApi } from '../server/collaborators';
import {
  ApDiagnostics,
  DiagnosticReport,
  RemediationAttempt,
  Severity,
  SleDiagnostics,
  SleType,
  ValidationResult,
  WorkflowOutcome,
  WorkflowStatus
} from '../types';
import { DiagnosticsCollector } from './diagnostics-collector';
import { GuardrailEvaluator } from './guardrail-evaluator';
import { CANCELLED_REASON, ValidationLoop } from './validation-loop';

export interface WorkflowDependencies {
  device: DeviceApi;
  rules: Readonly<SleRules>;
  logger: ComponentLogger;
  sleep?: Sleeper;
  now?: () => Date;
}

export interface RunOptions {
  /** Bypass guardrails. */
  force?: boolean;
  /** Use this action instead of the configured strategy. */
  action?: string;
  /** Restored threshold; defaults to `validation.threshold_score`. */
  threshold?: number;
  /** Caller-side cancellation, honoured alongside the validation budget. */
  signal?: AbortSignal;
}

export interface RemediateOptions {
  /** Picks the configured strategy when no explicit action is given. */
  sleType?: SleType;
  action?: string;
  force?: boolean;
  signal?: AbortSignal;
}

export class RemediationWorkflow {
  private rules: Readonly<SleRules>;
  private logger: ComponentLogger;
  private now: () => Date;
  private diagnostics: DiagnosticsCollector;
  private executor: RemediationExecutor;
  private validation: ValidationLoop;

  constructor(deps: WorkflowDependencies) {
    this.rules = deps.rules;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());

    const guardrails = new GuardrailEvaluator(deps.device, deps.logger, this.now);
    this.diagnostics = new DiagnosticsCollector(deps.device, deps.rules, deps.logger, this.now);
    this.executor = new RemediationExecutor(deps.device, guardrails, deps.rules.guardrails, deps.logger, this.now);
    this.validation = new ValidationLoop(deps.device, deps.logger, { sleep: deps.sleep, now: this.now });
  }

  /**
   * Never rejects: collaborator failures surface as `error`, `blocked` or
   * `validation_failed` outcomes with a reason.
   */
  async run(apId: string, sleType: SleType, options: RunOptions = {}): Promise<WorkflowOutcome> {
    const started = this.now();
    this.logger.info(`Starting remediation workflow for AP ${apId}, SLE: ${sleType}`, {
      force: options.force ?? false,
      action: options.action
    });

    const apDiagnostics = await this.diagnostics.collectApDiagnostics(apId, options.signal);
    const sleDiagnostics = await this.diagnostics.collectSleDiagnostics(sleType, options.signal);

    const score = sleDiagnostics.status === 'success' ? sleDiagnostics.score : null;
    const severity: Severity | null = score !== null ? classifySeverity(score, this.rules.thresholds) : null;
    this.logger.info(`Severity for ${sleType}: ${severity ?? 'unknown'}`, { score });
    const threshold = options.threshold ?? this.rules.validation.threshold_score;
    if (score !== null) {
      this.logger.info(shouldRemediate(score, threshold).reason);
    }

    const action = this.chooseAction(sleType, options.action);

    let remediation: RemediationAttempt;
    let validation: ValidationResult | null = null;
    try {
      remediation = await this.executor.execute(apId, action, { force: options.force, signal: options.signal });
      if (remediation.status === 'success') {
        validation = await this.validate(apId, sleType, options);
      }
    } catch (error) {
      // Components fold their own failures into results; this only guards the contract
      this.logger.error('Unexpected failure in remediation workflow', error);
      remediation = {
        ap_id: apId,
        action,
        timestamp: this.now().toISOString(),
        forced: options.force ?? false,
        status: 'error',
        reason: toErrorMessage(error)
      };
    }

    const outcome: WorkflowOutcome = {
      status: this.overallStatus(remediation, validation),
      ap_id: apId,
      sle_type: sleType,
      severity,
      sle_score: score,
      action,
      diagnostics: { ap: apDiagnostics, sle: sleDiagnostics },
      remediation,
      validation,
      recommendations: this.recommendations(apDiagnostics, sleDiagnostics, threshold, remediation, validation),
      remediation_needed: isRemediationNeeded(apDiagnostics, sleDiagnostics),
      started_at: started.toISOString(),
      duration_seconds: (this.now().getTime() - started.getTime()) / 1000
    };

    this.logger.info(`Workflow finished for AP ${apId}: ${outcome.status}`, {
      duration_seconds: outcome.duration_seconds,
      remediation_needed: outcome.remediation_needed
    });
    return outcome;
  }

  /** Diagnostics stage alone. Read-only: nothing is changed on the device. */
  async diagnose(apId: string, sleType: SleType, signal?: AbortSignal): Promise<DiagnosticReport> {
    const apDiagnostics = await this.diagnostics.collectApDiagnostics(apId, signal);
    const sleDiagnostics = await this.diagnostics.collectSleDiagnostics(sleType, signal);

    return {
      report_timestamp: this.now().toISOString(),
      ap_id: apId,
      sle_type: sleType,
      ap_diagnostics: apDiagnostics,
      sle_diagnostics: sleDiagnostics,
      remediation_needed: isRemediationNeeded(apDiagnostics, sleDiagnostics),
      recommendations: this.diagnosticNotes(apDiagnostics, sleDiagnostics, this.rules.validation.threshold_score)
    };
  }

  /** Remediation stage alone; falls back to reboot when neither an action nor an SLE type is given. */
  async remediate(apId: string, options: RemediateOptions = {}): Promise<RemediationAttempt> {
    let action: string;
    if (options.sleType !== undefined) {
      action = this.chooseAction(options.sleType, options.action);
    } else {
      action = options.action || DEFAULT_ACTION;
      this.logger.info(`Using remediation action '${action}'`);
    }
    return this.executor.execute(apId, action, { force: options.force, signal: options.signal });
  }

  /** Validation stage alone, under the same budget the full run uses. */
  async validate(apId: string, sleType: SleType, options: Pick<RunOptions, 'threshold' | 'signal'> = {}): Promise<ValidationResult> {
    const config = this.rules.validation;
    const budgetSeconds = validationBudgetSeconds(config);
    this.logger.info('Validation budget', {
      worst_case_wait_seconds: validationWorstCaseSeconds(config),
      budget_seconds: budgetSeconds
    });

    const deadline = createDeadline(budgetSeconds * 1000, options.signal);
    try {
      return await this.validation.validate(apId, sleType, {
        threshold: options.threshold ?? config.threshold_score,
        pollIntervalSeconds: config.poll_interval,
        maxAttempts: config.max_attempts,
        stabilizationDelaySeconds: config.stabilization_delay,
        signal: deadline.signal
      });
    } finally {
      deadline.dispose();
    }
  }

  private chooseAction(sleType: SleType, override?: string): string {
    if (override) {
      this.logger.info(`Using requested remediation action '${override}'`);
      return override;
    }
    const selection = selectAction(sleType, this.rules.remediation_strategies);
    if (selection.note) {
      this.logger.warn(selection.note);
    }
    this.logger.info(`Selected remediation action '${selection.action}' for SLE type '${sleType}'`);
    return selection.action;
  }

  private overallStatus(remediation: RemediationAttempt, validation: ValidationResult | null): WorkflowStatus {
    if (remediation.status !== 'success') {
      return remediation.status;
    }
    return validation?.status === 'restored' ? 'success' : 'validation_failed';
  }

  private diagnosticNotes(ap: ApDiagnostics, sle: SleDiagnostics, threshold: number): string[] {
    const guardrails = this.rules.guardrails;
    const notes: string[] = [];

    if (ap.status === 'success') {
      if (ap.client_count < guardrails.min_clients) {
        notes.push('Low client count - remediation may have limited impact');
      }
      if (ap.key_metrics.uptime < guardrails.min_reboot_interval) {
        notes.push('AP recently rebooted - allow stabilization time');
      }
    } else {
      notes.push(`AP diagnostics unavailable (${ap.error}) - verify AP reachability`);
    }

    if (sle.status === 'success') {
      if (sle.score === null) {
        notes.push(`No ${sle.sle_type} score reported - severity could not be determined`);
      } else {
        const decision = shouldRemediate(sle.score, threshold);
        if (!decision.remediate) {
          notes.push(`${decision.reason} - remediation not required`);
        }
      }
    }

    return notes;
  }

  private recommendations(
    ap: ApDiagnostics,
    sle: SleDiagnostics,
    threshold: number,
    remediation: RemediationAttempt,
    validation: ValidationResult | null
  ): string[] {
    const notes = this.diagnosticNotes(ap, sle, threshold);

    switch (remediation.status) {
      case 'blocked':
        notes.push(`Remediation blocked: ${remediation.reason} - retry later or review manually before forcing`);
        break;
      case 'not_implemented':
        notes.push(`Action '${remediation.action}' is not automated - perform it manually or configure another action`);
        break;
      case 'error':
        if (remediation.reason === CANCELLED_REASON) {
          notes.push('Run cancelled before remediation - no change was made to the AP');
        } else {
          notes.push(`Remediation failed: ${remediation.reason} - escalate to network operations`);
        }
        break;
      case 'success':
        if (validation && validation.status === 'failed') {
          notes.push(`SLE not restored (${validation.reason}) - escalate for manual investigation`);
        }
        break;
    }

    return notes;
  }
}

/** Informational only; guardrails, not this flag, decide whether to act. */
export function isRemediationNeeded(ap: ApDiagnostics, sle: SleDiagnostics): boolean {
  return ap.status === 'success' && sle.status === 'success' && sle.issues.length > 0;
}
