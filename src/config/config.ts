// config.ts - SLE rules: thresholds, guardrails, validation and remediation strategies
import * as fs from 'fs';
import { z } from 'zod';
import { ConfigError, toErrorMessage } from '../common/errors';
import { ComponentLogger } from '../common/logger';

const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:MM (24h)');

const timeZone = z.string().refine(isValidTimeZone, { message: 'Unknown IANA timezone' });

const severityLevel = z.enum(['critical', 'high', 'medium', 'low']);

const ticketPriority = z.enum(['urgent', 'high', 'normal', 'low']);

export const ThresholdsSchema = z
  .object({
    critical: z.number(),
    high: z.number(),
    medium: z.number(),
    low: z.number()
  })
  .refine(t => t.critical < t.high && t.high < t.medium && t.medium < t.low, {
    message: 'Thresholds must be strictly ordered: critical < high < medium < low'
  });

export const BusinessHoursSchema = z
  .object({
    start: clockTime,
    end: clockTime,
    timezone: timeZone
  })
  .refine(h => h.start !== h.end, { message: 'Business hours start and end must differ' });

export const GuardrailsSchema = z.object({
  min_clients: z.number().int().min(0),
  min_reboot_interval: z.number().min(0),
  max_daily_reboots: z.number().int().min(0),
  business_hours_only: z.boolean(),
  business_hours: BusinessHoursSchema
});

export const ValidationSchema = z.object({
  poll_interval: z.number().min(0),
  max_attempts: z.number().int().min(1),
  timeout: z.number().min(0),
  threshold_score: z.number().min(0).max(100),
  stabilization_delay: z.number().min(0)
});

export const StrategyEntrySchema = z.object({
  action: z.string().min(1),
  priority: z.number().optional()
});

export const SleRulesSchema = z.object({
  thresholds: ThresholdsSchema,
  guardrails: GuardrailsSchema,
  validation: ValidationSchema,
  remediation_strategies: z.record(z.array(StrategyEntrySchema)),
  ticketing: z.object({
    priority_map: z.record(severityLevel, ticketPriority)
  })
});

export type Thresholds = z.infer<typeof ThresholdsSchema>;
export type BusinessHours = z.infer<typeof BusinessHoursSchema>;
export type GuardrailsConfig = z.infer<typeof GuardrailsSchema>;
export type ValidationConfig = z.infer<typeof ValidationSchema>;
export type StrategyEntry = z.infer<typeof StrategyEntrySchema>;
export type RemediationStrategies = z.infer<typeof SleRulesSchema>['remediation_strategies'];
export type TicketPriority = z.infer<typeof ticketPriority>;
export type SleRules = z.infer<typeof SleRulesSchema>;

// Every section of a rules file is optional; whatever is given overrides the defaults key by key.
const RulesFileSchema = z
  .object({
    thresholds: z.record(z.number()),
    guardrails: z
      .object({
        min_clients: z.unknown(),
        min_reboot_interval: z.unknown(),
        max_daily_reboots: z.unknown(),
        business_hours_only: z.unknown(),
        business_hours: z.record(z.unknown())
      })
      .partial(),
    validation: z.record(z.unknown()),
    remediation_strategies: z.unknown(),
    ticketing: z.object({ priority_map: z.record(z.unknown()) }).partial()
  })
  .partial();

export const DEFAULT_RULES: SleRules = {
  thresholds: {
    critical: 60,
    high: 70,
    medium: 80,
    low: 90
  },
  guardrails: {
    min_clients: 3,
    min_reboot_interval: 1800,   // 30 minutes
    max_daily_reboots: 3,
    business_hours_only: false,
    business_hours: {
      start: '08:00',
      end: '18:00',
      timezone: 'UTC'
    }
  },
  validation: {
    poll_interval: 60,
    max_attempts: 5,
    timeout: 300,
    threshold_score: 90,
    stabilization_delay: 60
  },
  remediation_strategies: {},
  ticketing: {
    priority_map: {
      critical: 'urgent',
      high: 'high',
      medium: 'normal',
      low: 'normal'
    }
  }
};

/**
 * Validates raw rules (already JSON-decoded) and merges them over
 * {@link DEFAULT_RULES}. Throws {@link ConfigError} naming the first bad field.
 */
export function parseRules(raw: unknown): Readonly<SleRules> {
  const file = RulesFileSchema.safeParse(raw);
  if (!file.success) {
    throw new ConfigError(`Invalid rules file: ${formatIssues(file.error)}`);
  }

  const input = file.data;
  const merged = {
    thresholds: { ...DEFAULT_RULES.thresholds, ...input.thresholds },
    guardrails: {
      ...DEFAULT_RULES.guardrails,
      ...input.guardrails,
      business_hours: { ...DEFAULT_RULES.guardrails.business_hours, ...input.guardrails?.business_hours }
    },
    validation: { ...DEFAULT_RULES.validation, ...input.validation },
    remediation_strategies: input.remediation_strategies ?? DEFAULT_RULES.remediation_strategies,
    ticketing: {
      priority_map: { ...DEFAULT_RULES.ticketing.priority_map, ...input.ticketing?.priority_map }
    }
  };

  const rules = SleRulesSchema.safeParse(merged);
  if (!rules.success) {
    throw new ConfigError(`Invalid rules: ${formatIssues(rules.error)}`);
  }

  return deepFreeze(rules.data);
}

/**
 * Loads the rules file once per run. A missing file falls back to the
 * built-in defaults; an unreadable or invalid one is a {@link ConfigError}.
 */
export function loadRules(filePath: string, logger: ComponentLogger): Readonly<SleRules> {
  if (!fs.existsSync(filePath)) {
    logger.warn(`Rules file not found: ${filePath}, using defaults`);
    return deepFreeze(structuredClone(DEFAULT_RULES));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read rules file ${filePath}: ${toErrorMessage(error)}`);
  }

  const rules = parseRules(raw);
  logger.info(`Loaded SLE rules from ${filePath}`);
  return rules;
}

/** Per-request timeout of the collaborator clients, in seconds. */
export const REQUEST_TIMEOUT_SECONDS = 30;

/** Seconds the validation stage spends in waits when every attempt fails. */
export function validationWorstCaseSeconds(validation: ValidationConfig): number {
  return validation.stabilization_delay + Math.max(0, validation.max_attempts - 1) * validation.poll_interval;
}

/**
 * Hard budget for the validation stage: the stabilization delay plus one poll
 * interval per attempt, capped by `timeout` when it is non-zero. Never less
 * than one request timeout past stabilization, so a single poll can finish.
 */
export function validationBudgetSeconds(validation: ValidationConfig): number {
  const polling = validation.max_attempts * validation.poll_interval;
  const capped = validation.timeout > 0 ? Math.min(validation.timeout, polling) : polling;
  return validation.stabilization_delay + Math.max(capped, REQUEST_TIMEOUT_SECONDS);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
