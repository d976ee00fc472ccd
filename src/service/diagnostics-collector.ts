// diagnostics-collector.ts - AP and SLE snapshots taken before any remediation
import { toErrorMessage } from '../common/errors';
import { ComponentLogger } from '../common/logger';
import { SleRules } from '../config/config';
import { detectSleIssues, extractSleScore } from '../detection/sle-score';
import { DeviceApi } from '../server/collaborators';
import { ApDiagnostics, SleDiagnostics, SleType } from '../types';

export class DiagnosticsCollector {
  private device: Pick<DeviceApi, 'getApStats' | 'getApDetails' | 'getSleMetrics'>;
  private rules: Readonly<SleRules>;
  private logger: ComponentLogger;
  private now: () => Date;

  constructor(
    device: Pick<DeviceApi, 'getApStats' | 'getApDetails' | 'getSleMetrics'>,
    rules: Readonly<SleRules>,
    logger: ComponentLogger,
    now: () => Date = () => new Date()
  ) {
    this.device = device;
    this.rules = rules;
    this.logger = logger;
    this.now = now;
  }

  async collectApDiagnostics(apId: string, signal?: AbortSignal): Promise<ApDiagnostics> {
    const timestamp = this.now().toISOString();
    this.logger.info(`Starting diagnostics collection for AP ${apId}`);

    try {
      const apStats = await this.device.getApStats(apId, signal);
      const apDetails = await this.device.getApDetails(apId, signal);

      const diagnostics: ApDiagnostics = {
        status: 'success',
        timestamp,
        ap_id: apId,
        ap_stats: apStats,
        ap_details: apDetails,
        client_count: apStats.num_clients,
        key_metrics: {
          status: apStats.status,
          uptime: apStats.uptime,
          clients: apStats.num_clients,
          cpu_util: apStats.cpu_util ?? 0,
          mem_util: apStats.mem_util ?? 0,
          ip: apStats.ip ?? 'N/A',
          model: apDetails.model ?? 'N/A',
          version: apStats.version ?? 'N/A'
        }
      };

      this.logger.info(`Diagnostics collection complete for AP ${apId}`);
      return diagnostics;
    } catch (error) {
      this.logger.error('Error collecting diagnostics', error);
      return { status: 'error', timestamp, ap_id: apId, error: toErrorMessage(error) };
    }
  }

  async collectSleDiagnostics(sleType: SleType, signal?: AbortSignal): Promise<SleDiagnostics> {
    const timestamp = this.now().toISOString();
    this.logger.info('Collecting SLE diagnostics', { sle_type: sleType });

    try {
      const metrics = await this.device.getSleMetrics(undefined, signal);
      const issues = detectSleIssues(metrics, this.rules.validation.threshold_score, this.rules.thresholds);
      const score = extractSleScore(metrics, sleType);

      if (score === null) {
        this.logger.warn(`No score reported for SLE ${sleType}; severity is unknown`);
      }
      this.logger.info(`SLE diagnostics complete. Found ${issues.length} issues`);

      return { status: 'success', timestamp, sle_type: sleType, score, issues, sle_metrics: metrics };
    } catch (error) {
      this.logger.error('Error collecting SLE diagnostics', error);
      return { status: 'error', timestamp, sle_type: sleType, error: toErrorMessage(error) };
    }
  }
}
