// validation-loop.ts - Polls SLE metrics after remediation until restored or out of attempts
import { toErrorMessage } from '../common/errors';
import { ComponentLogger } from '../common/logger';
import { CancelledError, Sleeper, sleep } from '../common/timers';
import { extractSleScore } from '../detection/sle-score';
import { DeviceApi } from '../server/collaborators';
import { SleType, ValidationAttempt, ValidationResult } from '../types';

export interface ValidationOptions {
  /** Scores at or above this count as restored. */
  threshold: number;
  pollIntervalSeconds: number;
  maxAttempts: number;
  stabilizationDelaySeconds: number;
  siteId?: string;
  signal?: AbortSignal;
}

export interface OnlineCheck {
  online: boolean;
  status: string;
}

interface ScoreReading {
  score: number;
  score_known: boolean;
  error?: string;
}

export const CANCELLED_REASON = 'cancelled';

export class ValidationLoop {
  private device: Pick<DeviceApi, 'getApStats' | 'getSleMetrics'>;
  private logger: ComponentLogger;
  private sleep: Sleeper;
  private now: () => Date;

  constructor(
    device: Pick<DeviceApi, 'getApStats' | 'getSleMetrics'>,
    logger: ComponentLogger,
    deps: { sleep?: Sleeper; now?: () => Date } = {}
  ) {
    this.device = device;
    this.logger = logger;
    this.sleep = deps.sleep ?? sleep;
    this.now = deps.now ?? (() => new Date());
  }

  async validate(apId: string, sleType: SleType, options: ValidationOptions): Promise<ValidationResult> {
    const startedAt = this.now().getTime();
    const attempts: ValidationAttempt[] = [];
    const { threshold, maxAttempts, signal } = options;

    const finish = (
      status: ValidationResult['status'],
      reason: string,
      online: OnlineCheck
    ): ValidationResult => {
      const last = attempts[attempts.length - 1];
      return {
        status,
        reason,
        ap_online: online.online,
        ap_status: online.status,
        threshold,
        attempts,
        final_score: last ? last.score : null,
        duration_seconds: (this.now().getTime() - startedAt) / 1000
      };
    };

    this.logger.info(`Starting validation for AP ${apId}, SLE: ${sleType}`, { threshold, max_attempts: maxAttempts });

    const notChecked: OnlineCheck = { online: false, status: 'unknown' };

    this.logger.info(`Waiting ${options.stabilizationDelaySeconds}s for AP stabilization...`);
    if (!(await this.wait(options.stabilizationDelaySeconds, signal))) {
      return this.cancelled(finish, notChecked);
    }

    const online = await this.checkOnline(apId, signal);
    if (signal?.aborted) {
      return this.cancelled(finish, online);
    }
    if (!online.online) {
      const reason = `device not online (status: ${online.status})`;
      this.logger.error(`Validation failed for AP ${apId}: ${reason}`);
      return finish('failed', reason, online);
    }

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) {
        return this.cancelled(finish, online);
      }

      this.logger.info(`Validation attempt ${attempt}/${maxAttempts}`);
      const reading = await this.readScore(sleType, options.siteId, signal);
      if (signal?.aborted && reading.error !== undefined) {
        // The poll was torn down by the cancellation itself; it is not a reading
        return this.cancelled(finish, online);
      }

      const restored = reading.score >= threshold;
      attempts.push({
        attempt,
        timestamp: this.now().toISOString(),
        score: reading.score,
        score_known: reading.score_known,
        restored,
        ...(reading.error !== undefined ? { error: reading.error } : {})
      });

      if (restored) {
        const result = finish('restored', `SLE ${sleType} restored to ${reading.score} after ${attempt} attempt(s)`, online);
        this.logger.info(`SLE restored after ${attempt} attempts (${result.duration_seconds.toFixed(1)}s)`);
        return result;
      }

      if (attempt < maxAttempts) {
        this.logger.info(`SLE not restored yet (score: ${reading.score}). Waiting ${options.pollIntervalSeconds}s...`);
        if (!(await this.wait(options.pollIntervalSeconds, signal))) {
          return this.cancelled(finish, online);
        }
      }
    }

    const last = attempts[attempts.length - 1];
    const result = finish(
      'failed',
      `SLE ${sleType} not restored after ${maxAttempts} attempts (final score: ${last ? last.score : 0})`,
      online
    );
    this.logger.warn(`SLE validation failed after ${maxAttempts} attempts (${result.duration_seconds.toFixed(1)}s)`);
    return result;
  }

  async checkOnline(apId: string, signal?: AbortSignal): Promise<OnlineCheck> {
    this.logger.info(`Checking if AP ${apId} is online`);
    try {
      const stats = await this.device.getApStats(apId, signal);
      const online = stats.status === 'connected';
      this.logger.info(`AP ${apId} status: ${stats.status} - ${online ? 'ONLINE' : 'OFFLINE'}`);
      return { online, status: stats.status };
    } catch (error) {
      this.logger.error('Error checking AP status', error);
      return { online: false, status: 'error' };
    }
  }

  private async readScore(sleType: SleType, siteId: string | undefined, signal?: AbortSignal): Promise<ScoreReading> {
    try {
      const metrics = await this.device.getSleMetrics(siteId, signal);
      const score = extractSleScore(metrics, sleType);
      if (score === null) {
        // Scored as 0 for the decision, but flagged so it is not read as a real 0
        this.logger.warn(`Could not determine SLE score for ${sleType}; treating as unknown`);
        return { score: 0, score_known: false };
      }
      this.logger.info(`SLE ${sleType} score: ${score.toFixed(2)}`);
      return { score, score_known: true };
    } catch (error) {
      this.logger.error('Error checking SLE status', error);
      return { score: 0, score_known: false, error: toErrorMessage(error) };
    }
  }

  /** False when the wait was cut short by cancellation. */
  private async wait(seconds: number, signal?: AbortSignal): Promise<boolean> {
    try {
      await this.sleep(seconds * 1000, signal);
      return true;
    } catch (error) {
      if (error instanceof CancelledError) {
        return false;
      }
      throw error;
    }
  }

  private cancelled(
    finish: (status: ValidationResult['status'], reason: string, online: OnlineCheck) => ValidationResult,
    online: OnlineCheck
  ): ValidationResult {
    const result = finish('failed', CANCELLED_REASON, online);
    this.logger.warn(`Validation cancelled after ${result.attempts.length} attempt(s)`);
    return result;
  }
}
