#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import Logger, { parseLogLevel } from './common/logger';
import { AuthError, ConfigError, toErrorMessage } from './common/errors';
import { Sleeper } from './common/timers';
import { SleRules, loadRules } from './config/config';
import { EnvironmentSettings, loadEnvironment, requireMist, requireZendesk } from './server/config';
import { AuditSink, DeviceApi, TicketingApi } from './server/collaborators';
import { MistClient } from './server/mist-client';
import { SplunkAuditSink } from './server/audit-client';
import { TicketManager } from './tickets/ticket-manager';
import { RemediationWorkflow } from './service/workflow';
import { IncidentReporter } from './service/incident-reporter';
import { Severity } from './types';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG = 2;

export type Flags = Record<string, string | true>;

export interface CliArgs {
  command: string;
  flags: Flags;
}

/** `--ap-id X`, `--ap_id=X` and bare `--force` all land in `flags` under snake_case keys. */
export function parseArgs(argv: string[]): CliArgs {
  const [command = 'help', ...rest] = argv;
  const flags: Flags = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith('--')) {
      throw new ConfigError(`Unexpected argument: ${arg}`);
    }

    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq >= 0) {
      flags[body.slice(0, eq).replace(/-/g, '_')] = body.slice(eq + 1);
      continue;
    }

    const key = body.replace(/-/g, '_');
    const next = rest[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      flags[key] = next;
      i++;
    } else {
      flags[key] = true;
    }
  }

  return { command, flags };
}

function stringFlag(flags: Flags, key: string): string | undefined {
  const value = flags[key];
  return typeof value === 'string' ? value : undefined;
}

function requiredFlag(flags: Flags, key: string): string {
  const value = stringFlag(flags, key);
  if (!value) {
    throw new ConfigError(`Missing required argument --${key}`);
  }
  return value;
}

function numberFlag(flags: Flags, key: string): number | undefined {
  const value = stringFlag(flags, key);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`--${key} must be a number, got '${value}'`);
  }
  return parsed;
}

const SEVERITIES: readonly Severity[] = ['critical', 'high', 'medium', 'low'];

function severityFlag(flags: Flags): Severity {
  const value = stringFlag(flags, 'severity') ?? 'high';
  const match = SEVERITIES.find(s => s === value);
  if (!match) {
    throw new ConfigError(`--severity must be one of: ${SEVERITIES.join(', ')}`);
  }
  return match;
}

export const USAGE = [
  'Usage: sle-autopilot <command> [options]',
  '',
  'Commands:',
  '  diagnose   --ap_id ID --sle TYPE [--output FILE]',
  '  remediate  --ap_id ID [--sle TYPE] [--action ACTION] [--force] [--output FILE]',
  '  validate   --ap_id ID --sle TYPE [--threshold N] [--output FILE]',
  '  run        --ap_id ID --sle TYPE [--action ACTION] [--force] [--threshold N] [--ticket ID] [--output FILE]',
  '  ticket     --action create|update|close [--ticket ID] [--ap_id ID] [--sle TYPE] [--severity S] [--comment TEXT]',
  '  audit      --ap_id ID --sle TYPE [--status STATUS]'
].join('\n');

export interface CliOverrides {
  device?: DeviceApi;
  ticketing?: TicketingApi;
  sleep?: Sleeper;
  now?: () => Date;
  stdout?: (line: string) => void;
  signal?: AbortSignal;
}

/**
 * Wires the collaborators for one process run. Configuration and
 * credentials are read once here and handed down; nothing below this class
 * looks at the environment.
 */
class SleAutopilot {
  private logger: Logger;
  private env: EnvironmentSettings;
  private rules: Readonly<SleRules>;
  private overrides: CliOverrides;
  private stdout: (line: string) => void;

  constructor(env: EnvironmentSettings, overrides: CliOverrides) {
    this.env = env;
    this.overrides = overrides;
    this.logger = new Logger('sle-autopilot', { logDir: env.logDir, minLevel: parseLogLevel(env.logLevel) });
    this.rules = loadRules(env.rulesFile, this.logger.child('config'));
    this.stdout = overrides.stdout ?? (line => console.log(line));
  }

  async execute(args: CliArgs): Promise<number> {
    const { command, flags } = args;

    switch (command) {
      case 'diagnose':
        return this.diagnose(flags);
      case 'remediate':
        return this.remediate(flags);
      case 'validate':
        return this.validate(flags);
      case 'run':
        return this.runWorkflow(flags);
      case 'ticket':
        return this.ticket(flags);
      case 'audit':
        return this.audit(flags);
      case 'help':
        this.stdout(USAGE);
        return EXIT_SUCCESS;
      default:
        throw new ConfigError(`Unknown command: ${command}\n${USAGE}`);
    }
  }

  private async diagnose(flags: Flags): Promise<number> {
    const apId = requiredFlag(flags, 'ap_id');
    const sleType = requiredFlag(flags, 'sle');
    const workflow = await this.workflow();
    const report = await workflow.diagnose(apId, sleType, this.overrides.signal);

    this.writeOutput(flags, 'diagnostics.json', report);
    this.stdout(JSON.stringify({
      ap_id: apId,
      sle: sleType,
      status: report.ap_diagnostics.status,
      remediation_needed: report.remediation_needed,
      client_count: report.ap_diagnostics.status === 'success' ? report.ap_diagnostics.client_count : 0
    }, null, 2));

    return report.ap_diagnostics.status === 'success' ? EXIT_SUCCESS : EXIT_FAILURE;
  }

  private async remediate(flags: Flags): Promise<number> {
    const apId = requiredFlag(flags, 'ap_id');
    const workflow = await this.workflow();
    const result = await workflow.remediate(apId, {
      sleType: stringFlag(flags, 'sle'),
      action: stringFlag(flags, 'action'),
      force: flags.force === true,
      signal: this.overrides.signal
    });

    this.writeOutput(flags, 'remediation.json', result);
    this.stdout(JSON.stringify({ ap_id: apId, action: result.action, status: result.status, reason: result.reason }, null, 2));

    return result.status === 'success' ? EXIT_SUCCESS : EXIT_FAILURE;
  }

  private async validate(flags: Flags): Promise<number> {
    const apId = requiredFlag(flags, 'ap_id');
    const sleType = requiredFlag(flags, 'sle');
    const workflow = await this.workflow();
    const result = await workflow.validate(apId, sleType, {
      threshold: numberFlag(flags, 'threshold'),
      signal: this.overrides.signal
    });

    this.writeOutput(flags, 'validation.json', result);
    this.stdout(JSON.stringify({ ap_id: apId, sle: sleType, status: result.status, reason: result.reason }, null, 2));

    return result.status === 'restored' ? EXIT_SUCCESS : EXIT_FAILURE;
  }

  private async runWorkflow(flags: Flags): Promise<number> {
    const apId = requiredFlag(flags, 'ap_id');
    const sleType = requiredFlag(flags, 'sle');
    const workflow = await this.workflow();

    const outcome = await workflow.run(apId, sleType, {
      action: stringFlag(flags, 'action'),
      force: flags.force === true,
      threshold: numberFlag(flags, 'threshold'),
      signal: this.overrides.signal
    });

    const reporter = new IncidentReporter(this.ticketingOrNull(), this.auditSink(), this.logger.child('reporting'));
    const incident = await reporter.report(outcome, stringFlag(flags, 'ticket'));

    this.writeOutput(flags, 'workflow.json', { ...outcome, incident });
    this.stdout(JSON.stringify({
      ap_id: apId,
      sle: sleType,
      status: outcome.status,
      action: outcome.action,
      ticket_id: incident.ticket_id,
      recommendations: outcome.recommendations
    }, null, 2));

    return outcome.status === 'success' ? EXIT_SUCCESS : EXIT_FAILURE;
  }

  private async ticket(flags: Flags): Promise<number> {
    const ticketing = this.overrides.ticketing
      ?? new TicketManager(requireZendesk(this.env), this.rules, this.logger.child('tickets'));
    const action = stringFlag(flags, 'action') ?? 'update';
    const comment = stringFlag(flags, 'comment');

    switch (action) {
      case 'create': {
        const ticket = await ticketing.createTicket(
          requiredFlag(flags, 'ap_id'),
          requiredFlag(flags, 'sle'),
          severityFlag(flags),
          comment
        );
        this.stdout(`TICKET_ID=${ticket.id}`);
        this.stdout(JSON.stringify(ticket, null, 2));
        return EXIT_SUCCESS;
      }
      case 'update': {
        const sle = stringFlag(flags, 'sle') ?? 'SLE';
        const ticket = await ticketing.updateTicket(
          requiredFlag(flags, 'ticket'),
          comment ?? `Remediation in progress for ${sle}`,
          { status: 'pending' }
        );
        this.stdout(JSON.stringify(ticket, null, 2));
        return EXIT_SUCCESS;
      }
      case 'close': {
        const ticket = await ticketing.closeTicket(
          requiredFlag(flags, 'ticket'),
          comment ?? 'SLE metrics restored. Issue resolved via automation.'
        );
        this.stdout(JSON.stringify(ticket, null, 2));
        return EXIT_SUCCESS;
      }
      default:
        throw new ConfigError(`Unknown ticket action: ${action}`);
    }
  }

  private async audit(flags: Flags): Promise<number> {
    const status = stringFlag(flags, 'status') ?? 'unknown';
    const now = this.overrides.now ?? (() => new Date());
    const delivery = await this.auditSink().send({
      event_type: 'workflow_complete',
      timestamp: now().toISOString(),
      ap_id: requiredFlag(flags, 'ap_id'),
      sle: requiredFlag(flags, 'sle'),
      status,
      metrics: { automation_success: status === 'success' }
    });
    this.stdout(JSON.stringify(delivery, null, 2));
    return delivery.status === 'error' ? EXIT_FAILURE : EXIT_SUCCESS;
  }

  /** Validates device credentials before the first call that touches an AP. */
  private async workflow(): Promise<RemediationWorkflow> {
    const device = this.overrides.device
      ?? new MistClient(requireMist(this.env), this.logger.child('mist'));
    await device.validateCredentials();
    return new RemediationWorkflow({
      device,
      rules: this.rules,
      logger: this.logger.child('workflow'),
      sleep: this.overrides.sleep,
      now: this.overrides.now
    });
  }

  private ticketingOrNull(): TicketingApi | null {
    if (this.overrides.ticketing) return this.overrides.ticketing;
    return this.env.zendesk ? new TicketManager(this.env.zendesk, this.rules, this.logger.child('tickets')) : null;
  }

  private auditSink(): AuditSink {
    return new SplunkAuditSink(this.env.splunk, this.logger.child('audit'), { now: this.overrides.now });
  }

  private writeOutput(flags: Flags, defaultName: string, data: unknown): void {
    const target = path.resolve(stringFlag(flags, 'output') ?? defaultName);
    fs.writeFileSync(target, JSON.stringify(data, null, 2));
    this.logger.info(`Result saved to ${target}`);
  }
}

export async function main(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
  overrides: CliOverrides = {}
): Promise<number> {
  try {
    const args = parseArgs(argv);
    const app = new SleAutopilot(loadEnvironment(env), overrides);
    return await app.execute(args);
  } catch (error) {
    if (error instanceof ConfigError || error instanceof AuthError) {
      console.error(`${error.name}: ${error.message}`);
      return EXIT_CONFIG;
    }
    console.error(`Fatal error: ${toErrorMessage(error)}`);
    return EXIT_FAILURE;
  }
}

if (require.main === module) {
  const controller = new AbortController();
  const cancel = (): void => controller.abort();
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  main(process.argv.slice(2), process.env, { signal: controller.signal })
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('Fatal error:', error);
      process.exitCode = EXIT_FAILURE;
    })
    .finally(() => {
      process.removeListener('SIGINT', cancel);
      process.removeListener('SIGTERM', cancel);
    });
}
