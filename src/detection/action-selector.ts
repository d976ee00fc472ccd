// action-selector.ts - Picks the remediation action configured for an SLE type
import { RemediationStrategies } from '../config/config';
import { RemediationAction, SleType } from '../types';

export const DEFAULT_ACTION: RemediationAction = 'reboot';

const UNSPECIFIED_PRIORITY = 99;

const ACTION_ALIASES: Record<string, RemediationAction> = {
  reboot: 'reboot',
  restart: 'reboot',
  wlan_reset: 'wlan_reset',
  rrm: 'rrm_adjustment',
  rrm_adjustment: 'rrm_adjustment'
};

export interface ActionSelection {
  action: string;
  /** False when no strategy exists for the SLE type and the default was used. */
  configured: boolean;
  note?: string;
}

export function selectAction(sleType: SleType, strategies: RemediationStrategies): ActionSelection {
  const strategy = Object.prototype.hasOwnProperty.call(strategies, sleType) ? strategies[sleType] : undefined;

  if (!strategy || strategy.length === 0) {
    return {
      action: DEFAULT_ACTION,
      configured: false,
      note: `No remediation strategy for SLE type: ${sleType}, defaulting to ${DEFAULT_ACTION}`
    };
  }

  // Array.prototype.sort is stable, so equal priorities keep their listed order
  const ranked = [...strategy].sort(
    (a, b) => (a.priority ?? UNSPECIFIED_PRIORITY) - (b.priority ?? UNSPECIFIED_PRIORITY)
  );

  return { action: ranked[0].action, configured: true };
}

/** Canonical action for a configured or user-supplied identifier, or null if unknown. */
export function normalizeAction(action: string): RemediationAction | null {
  return ACTION_ALIASES[action.trim().toLowerCase()] ?? null;
}
