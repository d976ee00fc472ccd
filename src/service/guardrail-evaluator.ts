// guardrail-evaluator.ts - Decides whether a disruptive action is currently safe
import { toErrorMessage } from '../common/errors';
import { ComponentLogger } from '../common/logger';
import { GuardrailsConfig } from '../config/config';
import { DeviceApi } from '../server/collaborators';
import { GuardrailResult } from '../types';
import { isWithinBusinessHours } from './business-hours';

export class GuardrailEvaluator {
  private device: Pick<DeviceApi, 'getApStats'>;
  private logger: ComponentLogger;
  private now: () => Date;

  constructor(device: Pick<DeviceApi, 'getApStats'>, logger: ComponentLogger, now: () => Date = () => new Date()) {
    this.device = device;
    this.logger = logger;
    this.now = now;
  }

  /**
   * Checks run in a fixed order and the first failure is reported:
   * business hours, then client count, then time since boot. Live state is
   * fetched once; if it cannot be fetched the guardrails fail.
   */
  async evaluate(apId: string, guardrails: GuardrailsConfig, signal?: AbortSignal): Promise<GuardrailResult> {
    this.logger.info(`Checking guardrails for AP ${apId}`);

    if (guardrails.business_hours_only) {
      const hours = guardrails.business_hours;
      const check = isWithinBusinessHours(this.now(), hours);
      this.logger.info('Business hours check', {
        within: check.within,
        local_time: check.localTime,
        window: `${hours.start}-${hours.end} ${hours.timezone}`
      });
      if (!check.within) {
        return this.fail({ passed: false, check: 'business_hours', reason: 'outside business hours' });
      }
    }

    let clients: number;
    let uptime: number;
    try {
      const stats = await this.device.getApStats(apId, signal);
      clients = stats.num_clients;
      uptime = stats.uptime;
    } catch (error) {
      this.logger.error('Error checking guardrails', error);
      return this.fail({ passed: false, check: 'live_state', reason: `error: ${toErrorMessage(error)}` });
    }

    if (clients < guardrails.min_clients) {
      return this.fail({
        passed: false,
        check: 'client_count',
        reason: `Client count (${clients}) below minimum threshold (${guardrails.min_clients})`
      });
    }

    // Uptime stands in for "time since the last disruptive action"
    if (uptime < guardrails.min_reboot_interval) {
      return this.fail({
        passed: false,
        check: 'reboot_interval',
        reason: `AP uptime (${uptime}s) below minimum reboot interval (${guardrails.min_reboot_interval}s)`
      });
    }

    this.logger.info('All guardrails passed');
    return { passed: true, check: 'all', reason: 'All checks passed' };
  }

  private fail(result: GuardrailResult): GuardrailResult {
    this.logger.warn(`Guardrail check failed: ${result.reason}`);
    return result;
  }
}
