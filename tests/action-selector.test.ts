import { RemediationStrategies } from '../src/config/config';
import { normalizeAction, selectAction } from '../src/detection/action-selector';

describe('selectAction', () => {
  it('defaults to reboot for an SLE type without a strategy', () => {
    expect(selectAction('roaming', {})).toEqual({
      action: 'reboot',
      configured: false,
      note: 'No remediation strategy for SLE type: roaming, defaulting to reboot',
    });
  });

  it('defaults to reboot for an empty strategy list', () => {
    expect(selectAction('throughput', { throughput: [] }).action).toBe('reboot');
  });

  it('picks the lowest priority number regardless of list order', () => {
    const strategies: RemediationStrategies = {
      throughput: [
        { action: 'rrm_adjustment', priority: 2 },
        { action: 'reboot', priority: 1 },
      ],
    };
    expect(selectAction('throughput', strategies)).toEqual({ action: 'reboot', configured: true });
  });

  it('keeps listed order between equal priorities', () => {
    const strategies: RemediationStrategies = {
      'successful-connects': [
        { action: 'wlan_reset', priority: 1 },
        { action: 'reboot', priority: 1 },
      ],
    };
    expect(selectAction('successful-connects', strategies).action).toBe('wlan_reset');
  });

  it('ranks entries without a priority last', () => {
    const strategies: RemediationStrategies = {
      throughput: [{ action: 'wlan_reset' }, { action: 'reboot', priority: 5 }],
    };
    expect(selectAction('throughput', strategies).action).toBe('reboot');
  });

  it('returns the same answer on repeated calls and leaves the input untouched', () => {
    const strategies: RemediationStrategies = {
      throughput: [
        { action: 'rrm_adjustment', priority: 2 },
        { action: 'reboot', priority: 1 },
      ],
    };
    const first = selectAction('throughput', strategies);
    const second = selectAction('throughput', strategies);

    expect(second).toEqual(first);
    expect(strategies.throughput[0].action).toBe('rrm_adjustment');
  });

  it('ignores inherited object keys', () => {
    expect(selectAction('constructor', {}).configured).toBe(false);
  });
});

describe('normalizeAction', () => {
  it('maps aliases onto canonical actions', () => {
    expect(normalizeAction('rrm')).toBe('rrm_adjustment');
    expect(normalizeAction(' Restart ')).toBe('reboot');
    expect(normalizeAction('wlan_reset')).toBe('wlan_reset');
  });

  it('returns null for an unknown action', () => {
    expect(normalizeAction('factory_reset')).toBeNull();
  });
});
