// remediation-executor.ts - Runs one remediation action behind the guardrail gate
import { toErrorMessage } from '../common/errors';
import { ComponentLogger } from '../common/logger';
import { GuardrailsConfig } from '../config/config';
import { normalizeAction } from '../detection/action-selector';
import { DeviceApi } from '../server/collaborators';
import { GuardrailEvaluator } from '../service/guardrail-evaluator';
import { CANCELLED_REASON } from '../service/validation-loop';
import { RemediationAttempt, RemediationStatus } from '../types';

type RemediationAttemptBase = Pick<RemediationAttempt, 'ap_id' | 'action' | 'timestamp' | 'forced'>;

export interface ExecuteOptions {
  /** Skip the guardrail gate entirely. Logged as a warning on every use. */
  force?: boolean;
  /** Once aborted, no device call is made. */
  signal?: AbortSignal;
}

/**
 * Runs one remediation action against an AP. Each call starts `pending` and
 * ends in exactly one terminal state; the device sees at most one mutating
 * request and nothing is retried here, since a reboot is not safe to repeat.
 */
export class RemediationExecutor {
  private device: Pick<DeviceApi, 'rebootAp'>;
  private guardrails: GuardrailEvaluator;
  private config: GuardrailsConfig;
  private logger: ComponentLogger;
  private now: () => Date;

  constructor(
    device: Pick<DeviceApi, 'rebootAp'>,
    guardrails: GuardrailEvaluator,
    config: GuardrailsConfig,
    logger: ComponentLogger,
    now: () => Date = () => new Date()
  ) {
    this.device = device;
    this.guardrails = guardrails;
    this.config = config;
    this.logger = logger;
    this.now = now;
  }

  async execute(apId: string, action: string, options: ExecuteOptions = {}): Promise<RemediationAttempt> {
    const forced = options.force ?? false;
    const base = { ap_id: apId, action, timestamp: this.now().toISOString(), forced };
    this.transition(apId, action, 'pending');

    const resolved = normalizeAction(action);
    if (!resolved) {
      this.transition(apId, action, 'error');
      return { ...base, status: 'error', reason: `Unknown remediation action: ${action}` };
    }

    if (options.signal?.aborted) {
      return this.cancelled(apId, base);
    }

    if (forced) {
      this.logger.warn(`Guardrails skipped for AP ${apId} (force mode)`, { action });
    } else {
      const gate = await this.guardrails.evaluate(apId, this.config, options.signal);
      // A gate torn down by the abort says nothing about the AP
      if (options.signal?.aborted) {
        return this.cancelled(apId, base);
      }
      if (!gate.passed) {
        this.logger.warn(`Remediation blocked by guardrails: ${gate.reason}`, { ap_id: apId, action });
        this.transition(apId, action, 'blocked');
        return { ...base, status: 'blocked', reason: gate.reason, guardrail: gate.check };
      }
    }

    switch (resolved) {
      case 'reboot':
        return this.reboot(apId, base);

      // Recognised but not wired to the device API; the AP is left untouched
      case 'wlan_reset':
      case 'rrm_adjustment':
        this.logger.warn(`${resolved} requested for AP ${apId} but is not implemented`);
        this.transition(apId, action, 'not_implemented');
        return {
          ...base,
          status: 'not_implemented',
          reason: `${resolved} is not implemented; no change was made to AP ${apId}`
        };
    }
  }

  private async reboot(
    apId: string,
    base: RemediationAttemptBase
  ): Promise<RemediationAttempt> {
    this.logger.warn(`Executing reboot for AP ${apId}`);
    try {
      const response = await this.device.rebootAp(apId);
      this.transition(apId, base.action, 'success');
      return {
        ...base,
        status: 'success',
        response,
        reason: `Reboot command issued successfully for AP ${apId}`
      };
    } catch (error) {
      this.logger.error(`Reboot failed for AP ${apId}`, error);
      this.transition(apId, base.action, 'error');
      return { ...base, status: 'error', reason: toErrorMessage(error) };
    }
  }

  private cancelled(apId: string, base: RemediationAttemptBase): RemediationAttempt {
    this.logger.warn(`Remediation cancelled for AP ${apId}; no change was made`, { action: base.action });
    this.transition(apId, base.action, 'error');
    return { ...base, status: 'error', reason: CANCELLED_REASON };
  }

  private transition(apId: string, action: string, status: RemediationStatus): void {
    this.logger.debug(`Remediation [${apId}] - ${action}: ${status}`);
  }
}
