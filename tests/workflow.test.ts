import { TransportError } from '../src/common/errors';
import { CancelledError } from '../src/common/timers';
import { parseRules } from '../src/config/config';
import { RemediationWorkflow, isRemediationNeeded } from '../src/service/workflow';
import { BASE_TIME, apStats, createDevice, createMockLogger, fakeClock, throughputDoc } from './helpers';

const rules = parseRules({
  remediation_strategies: {
    throughput: [
      { action: 'reboot', priority: 1 },
      { action: 'rrm_adjustment', priority: 2 },
    ],
    'successful-connects': [{ action: 'wlan_reset', priority: 1 }],
  },
});

function setup() {
  const device = createDevice();
  const logger = createMockLogger();
  const clock = fakeClock();
  const workflow = new RemediationWorkflow({ device, rules, logger, sleep: clock.sleep, now: clock.now });
  return { device, logger, workflow };
}

// ============================================
// FULL RUN
// ============================================

describe('RemediationWorkflow.run', () => {
  it('remediates a degraded SLE and confirms the recovery', async () => {
    const { device, workflow } = setup();
    device.getSleMetrics.mockResolvedValueOnce(throughputDoc(40)).mockResolvedValueOnce(throughputDoc(95));

    const outcome = await workflow.run('ap-1', 'throughput');

    expect(outcome).toMatchObject({
      status: 'success',
      ap_id: 'ap-1',
      sle_type: 'throughput',
      severity: 'critical',
      sle_score: 40,
      action: 'reboot',
      remediation_needed: true,
      recommendations: [],
      started_at: '2026-03-02T12:00:00.000Z',
      duration_seconds: 60,
    });
    expect(outcome.remediation.status).toBe('success');
    expect(outcome.validation?.status).toBe('restored');
    expect(device.rebootAp).toHaveBeenCalledTimes(1);
  });

  it('stops at the guardrails and explains why', async () => {
    const { device, workflow } = setup();
    device.getApStats.mockResolvedValue(apStats({ num_clients: 1 }));
    device.getSleMetrics.mockResolvedValue(throughputDoc(40));

    const outcome = await workflow.run('ap-1', 'throughput');

    expect(outcome.status).toBe('blocked');
    expect(outcome.validation).toBeNull();
    expect(outcome.recommendations).toEqual([
      'Low client count - remediation may have limited impact',
      'Remediation blocked: Client count (1) below minimum threshold (3) - retry later or review manually before forcing',
    ]);
    expect(device.rebootAp).not.toHaveBeenCalled();
  });

  it('reports an unautomated strategy without touching the AP', async () => {
    const { device, workflow } = setup();
    device.getSleMetrics.mockResolvedValue({ client: { 'successful-connects': { score: 50 } } });

    const outcome = await workflow.run('ap-1', 'successful-connects');

    expect(outcome.status).toBe('not_implemented');
    expect(outcome.action).toBe('wlan_reset');
    expect(outcome.recommendations).toEqual([
      "Action 'wlan_reset' is not automated - perform it manually or configure another action",
    ]);
    expect(device.rebootAp).not.toHaveBeenCalled();
  });

  it('marks the run as validation_failed when the SLE stays low', async () => {
    const { workflow, device } = setup();
    device.getSleMetrics.mockResolvedValue(throughputDoc(40));

    const outcome = await workflow.run('ap-1', 'throughput');

    expect(outcome.status).toBe('validation_failed');
    expect(outcome.validation?.attempts).toHaveLength(5);
    expect(outcome.recommendations).toEqual([
      'SLE not restored (SLE throughput not restored after 5 attempts (final score: 40)) - escalate for manual investigation',
    ]);
  });

  it('surfaces a failed reboot as an error outcome', async () => {
    const { device, workflow } = setup();
    device.getSleMetrics.mockResolvedValue(throughputDoc(40));
    device.rebootAp.mockRejectedValueOnce(
      new TransportError('reboot AP', 'reboot AP failed: HTTP 500 Internal Server Error', 500)
    );

    const outcome = await workflow.run('ap-1', 'throughput');

    expect(outcome.status).toBe('error');
    expect(outcome.validation).toBeNull();
    expect(outcome.recommendations).toEqual([
      'Remediation failed: reboot AP failed: HTTP 500 Internal Server Error - escalate to network operations',
    ]);
  });

  it('uses a requested action over the configured strategy', async () => {
    const { device, workflow } = setup();
    device.getSleMetrics.mockResolvedValue(throughputDoc(40));

    const outcome = await workflow.run('ap-1', 'throughput', { action: 'rrm' });

    expect(outcome.action).toBe('rrm');
    expect(outcome.status).toBe('not_implemented');
  });

  it('keeps severity unknown when the SLE has no score', async () => {
    const { device, workflow } = setup();
    device.getSleMetrics.mockResolvedValueOnce({}).mockResolvedValueOnce(throughputDoc(95));

    const outcome = await workflow.run('ap-1', 'throughput');

    expect(outcome.severity).toBeNull();
    expect(outcome.sle_score).toBeNull();
    expect(outcome.recommendations).toContain('No throughput score reported - severity could not be determined');
  });

  it('falls back to reboot for an SLE type without a strategy', async () => {
    const { logger, workflow } = setup();

    const outcome = await workflow.run('ap-1', 'dns-performance');

    expect(outcome.action).toBe('reboot');
    expect(logger.warn).toHaveBeenCalledWith('No remediation strategy for SLE type: dns-performance, defaulting to reboot');
  });

  it('advises waiting on an AP that rebooted recently', async () => {
    const { device, workflow } = setup();
    device.getApStats.mockResolvedValue(apStats({ uptime: 120 }));
    device.getSleMetrics.mockResolvedValueOnce(throughputDoc(40));

    const outcome = await workflow.run('ap-1', 'throughput', { force: true });

    expect(outcome.status).toBe('success');
    expect(outcome.remediation.forced).toBe(true);
    expect(outcome.recommendations).toEqual(['AP recently rebooted - allow stabilization time']);
  });
});

// ============================================
// CANCELLATION AND BUDGET
// ============================================

describe('RemediationWorkflow cancellation', () => {
  it('never reboots once the run has been cancelled', async () => {
    const { device, workflow } = setup();
    device.getSleMetrics.mockResolvedValue(throughputDoc(40));
    const controller = new AbortController();
    controller.abort();

    const outcome = await workflow.run('ap-1', 'throughput', { signal: controller.signal });

    expect(outcome.status).toBe('error');
    expect(outcome.remediation).toMatchObject({ status: 'error', reason: 'cancelled' });
    expect(outcome.validation).toBeNull();
    expect(outcome.recommendations).toEqual(['Run cancelled before remediation - no change was made to the AP']);
    expect(device.rebootAp).not.toHaveBeenCalled();
  });

  it('stops before the guardrails when cancelled during diagnostics', async () => {
    const { device, workflow } = setup();
    const controller = new AbortController();
    device.getSleMetrics.mockImplementationOnce(async () => {
      controller.abort();
      return throughputDoc(40);
    });

    const outcome = await workflow.run('ap-1', 'throughput', { signal: controller.signal });

    expect(outcome.remediation.reason).toBe('cancelled');
    // only the diagnostics read; the guardrails never fetched live state
    expect(device.getApStats).toHaveBeenCalledTimes(1);
    expect(device.rebootAp).not.toHaveBeenCalled();
  });

  it('passes the signal to a single remediation stage', async () => {
    const { device, workflow } = setup();
    const controller = new AbortController();
    controller.abort();

    const result = await workflow.remediate('ap-1', { signal: controller.signal });

    expect(result.status).toBe('error');
    expect(device.rebootAp).not.toHaveBeenCalled();
  });
});

describe('RemediationWorkflow validation budget', () => {
  // stabilization 60s + min(timeout 150s, 10 x 60s) = 210s
  const budgetRules = parseRules({ validation: { poll_interval: 60, max_attempts: 10, timeout: 150 } });

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(BASE_TIME);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('cancels polling when the budget runs out and keeps the attempts so far', async () => {
    const device = createDevice();
    device.getSleMetrics.mockResolvedValue(throughputDoc(50));
    const sleep = jest.fn(async (ms: number, signal?: AbortSignal): Promise<void> => {
      jest.advanceTimersByTime(ms);
      if (signal?.aborted) {
        throw new CancelledError();
      }
    });
    const workflow = new RemediationWorkflow({ device, rules: budgetRules, logger: createMockLogger(), sleep });

    const result = await workflow.validate('ap-1', 'throughput');

    expect(result.status).toBe('failed');
    expect(result.reason).toBe('cancelled');
    // polls at 60s, 120s and 180s; the wait after the third crosses 210s
    expect(result.attempts.map(attempt => attempt.score)).toEqual([50, 50, 50]);
    expect(device.getSleMetrics).toHaveBeenCalledTimes(3);
    expect(jest.getTimerCount()).toBe(0);
  });
});

// ============================================
// SINGLE STAGES
// ============================================

describe('RemediationWorkflow stages', () => {
  it('diagnoses without changing the AP', async () => {
    const { device, workflow } = setup();
    device.getSleMetrics.mockResolvedValue(throughputDoc(40));

    const report = await workflow.diagnose('ap-1', 'throughput');

    expect(report.remediation_needed).toBe(true);
    expect(report.recommendations).toEqual([]);
    expect(report.ap_diagnostics).toMatchObject({
      status: 'success',
      client_count: 10,
      key_metrics: { status: 'connected', uptime: 7200, model: 'AP43', ip: '10.0.0.21' },
    });
    expect(report.sle_diagnostics).toMatchObject({
      status: 'success',
      score: 40,
      issues: [{ metric: 'throughput', score: 40, severity: 'critical' }],
    });
    expect(device.rebootAp).not.toHaveBeenCalled();
  });

  it('reports an unreachable AP in the diagnostics', async () => {
    const { device, workflow } = setup();
    device.getApStats.mockRejectedValue(new Error('get AP stats failed: ETIMEDOUT'));

    const report = await workflow.diagnose('ap-1', 'throughput');

    expect(report.ap_diagnostics.status).toBe('error');
    expect(report.remediation_needed).toBe(false);
    expect(report.recommendations).toEqual([
      'AP diagnostics unavailable (get AP stats failed: ETIMEDOUT) - verify AP reachability',
      'SLE score 95 is at or above threshold 90 - remediation not required',
    ]);
  });

  it('remediates with reboot when no SLE or action is given', async () => {
    const { workflow } = setup();

    const result = await workflow.remediate('ap-1');

    expect(result.action).toBe('reboot');
    expect(result.status).toBe('success');
  });

  it('remediates with the configured strategy for the SLE', async () => {
    const { workflow } = setup();

    const result = await workflow.remediate('ap-1', { sleType: 'successful-connects' });

    expect(result.action).toBe('wlan_reset');
    expect(result.status).toBe('not_implemented');
  });

  it('notes when the SLE is already at or above the threshold', async () => {
    const { workflow } = setup();

    const report = await workflow.diagnose('ap-1', 'throughput');

    expect(report.recommendations).toEqual(['SLE score 95 is at or above threshold 90 - remediation not required']);
  });

  it('judges the note against a requested threshold', async () => {
    const { device, workflow } = setup();
    device.getSleMetrics.mockResolvedValue(throughputDoc(80));

    const outcome = await workflow.run('ap-1', 'throughput', { threshold: 75 });

    expect(outcome.recommendations).toEqual(['SLE score 80 is at or above threshold 75 - remediation not required']);
  });

  it('validates on its own with a custom threshold', async () => {
    const { device, workflow } = setup();
    device.getSleMetrics.mockResolvedValue(throughputDoc(75));

    const result = await workflow.validate('ap-1', 'throughput', { threshold: 70 });

    expect(result.status).toBe('restored');
    expect(result.threshold).toBe(70);
  });
});

describe('isRemediationNeeded', () => {
  it('needs both diagnostics to succeed', async () => {
    const { device, workflow } = setup();
    device.getSleMetrics.mockRejectedValue(new Error('HTTP 502'));

    const report = await workflow.diagnose('ap-1', 'throughput');

    expect(isRemediationNeeded(report.ap_diagnostics, report.sle_diagnostics)).toBe(false);
  });
});
