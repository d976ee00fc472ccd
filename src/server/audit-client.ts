// audit-client.ts - Ships pipeline events to a Splunk HTTP Event Collector
import { AxiosAdapter, AxiosInstance } from 'axios';
import { toErrorMessage } from '../common/errors';
import { ComponentLogger } from '../common/logger';
import {
  RemediationAttempt,
  Severity,
  ValidationResult,
  WorkflowOutcome
} from '../types';
import { AuditDelivery, AuditEvent, AuditEventType, AuditSink } from './collaborators';
import { SplunkSettings } from './config';
import { createHttpClient, toTransportError } from './http-client';

const SOURCE = 'sle_autopilot';

const SOURCETYPES: Record<AuditEventType, string> = {
  sle_detection: 'sle:automation:detection',
  diagnostics: 'sle:automation:diagnostics',
  remediation: 'sle:automation:remediation',
  validation: 'sle:automation:validation',
  ticket_action: 'sle:automation:ticketing',
  workflow_complete: 'sle:automation:workflow'
};

/**
 * Audit delivery never throws: a missing or failing collector must not
 * change the outcome of a remediation run.
 */
export class SplunkAuditSink implements AuditSink {
  private logger: ComponentLogger;
  private settings: SplunkSettings | null;
  private client: AxiosInstance | null = null;
  private now: () => Date;

  constructor(
    settings: SplunkSettings | null,
    logger: ComponentLogger,
    options: { adapter?: AxiosAdapter; now?: () => Date } = {}
  ) {
    this.settings = settings;
    this.logger = logger;
    this.now = options.now ?? (() => new Date());

    if (settings) {
      this.client = createHttpClient({
        timeoutMs: settings.timeoutMs,
        adapter: options.adapter,
        headers: { Authorization: `Splunk ${settings.token}` }
      });
    }
  }

  async send(event: AuditEvent): Promise<AuditDelivery> {
    if (!this.settings || !this.client) {
      this.logger.warn('Audit collector not configured - skipping audit', { event_type: event.event_type });
      return { status: 'skipped', reason: 'HEC not configured' };
    }

    const payload = {
      time: Math.floor(this.now().getTime() / 1000),
      host: this.settings.host,
      source: SOURCE,
      sourcetype: SOURCETYPES[event.event_type],
      event
    };

    try {
      const response = await this.client.post<unknown>(this.settings.endpoint, payload);
      this.logger.debug('Audit event delivered', { event_type: event.event_type });
      return { status: 'success', response: response.data };
    } catch (error) {
      const transportError = toTransportError('send audit event', error);
      this.logger.error('Failed to send audit event', transportError, { event_type: event.event_type });
      return { status: 'error', error: toErrorMessage(transportError) };
    }
  }

  auditDetection(apId: string, sleType: string, severity: Severity | null, source: string = 'monitor'): Promise<AuditDelivery> {
    return this.send({ event_type: 'sle_detection', timestamp: this.timestamp(), ap_id: apId, sle: sleType, severity, source });
  }

  auditDiagnostics(apId: string, diagnostics: WorkflowOutcome['diagnostics']): Promise<AuditDelivery> {
    return this.send({ event_type: 'diagnostics', timestamp: this.timestamp(), ap_id: apId, diagnostics });
  }

  auditRemediation(remediation: RemediationAttempt): Promise<AuditDelivery> {
    return this.send({
      event_type: 'remediation',
      timestamp: this.timestamp(),
      ap_id: remediation.ap_id,
      action: remediation.action,
      result: remediation
    });
  }

  auditValidation(apId: string, sleType: string, validation: ValidationResult): Promise<AuditDelivery> {
    return this.send({ event_type: 'validation', timestamp: this.timestamp(), ap_id: apId, sle: sleType, result: validation });
  }

  auditTicketAction(ticketId: number | string, action: string, apId: string, sleType: string): Promise<AuditDelivery> {
    return this.send({
      event_type: 'ticket_action',
      timestamp: this.timestamp(),
      ticket_id: ticketId,
      action,
      ap_id: apId,
      sle: sleType
    });
  }

  auditWorkflowComplete(outcome: WorkflowOutcome): Promise<AuditDelivery> {
    return this.send({
      event_type: 'workflow_complete',
      timestamp: this.timestamp(),
      ap_id: outcome.ap_id,
      sle: outcome.sle_type,
      status: outcome.status,
      metrics: {
        mttr_seconds: outcome.duration_seconds,
        automation_success: outcome.status === 'success',
        validation_attempts: outcome.validation?.attempts.length ?? 0
      }
    });
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
