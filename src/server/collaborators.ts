// collaborators.ts - Contracts the workflow holds against external systems
import {
  ApDetails,
  ApStats,
  RebootResponse,
  RemediationAttempt,
  SleMetricsDocument,
  Severity,
  SleType,
  ValidationResult,
  WorkflowOutcome
} from '../types';
import { TicketPriority } from '../config/config';

/**
 * Device-control and metrics API. Every method rejects with
 * `TransportError` when the call fails on the wire or with a non-2xx status.
 */
export interface DeviceApi {
  getApStats(apId: string, signal?: AbortSignal): Promise<ApStats>;
  getApDetails(apId: string, signal?: AbortSignal): Promise<ApDetails>;
  rebootAp(apId: string): Promise<RebootResponse>;
  getSleMetrics(siteId?: string, signal?: AbortSignal): Promise<SleMetricsDocument>;
  /** Rejects with `AuthError` when the remote refuses the token. */
  validateCredentials(): Promise<true>;
}

export type TicketStatus = 'new' | 'open' | 'pending' | 'hold' | 'solved' | 'closed';

export interface TicketRecord {
  id: number;
  subject?: string;
  status?: string;
  priority?: string;
  tags?: string[];
  [key: string]: unknown;
}

export interface TicketUpdate {
  status?: TicketStatus;
  priority?: TicketPriority;
  tags?: string[];
}

export interface TicketingApi {
  createTicket(apId: string, sleType: SleType, severity: Severity, description?: string): Promise<TicketRecord>;
  updateTicket(ticketId: number | string, comment: string, update?: TicketUpdate): Promise<TicketRecord>;
  closeTicket(ticketId: number | string, resolution: string): Promise<TicketRecord>;
  getTicket(ticketId: number | string): Promise<TicketRecord>;
}

export type AuditEventType =
  | 'sle_detection'
  | 'diagnostics'
  | 'remediation'
  | 'validation'
  | 'ticket_action'
  | 'workflow_complete';

export interface AuditEvent {
  event_type: AuditEventType;
  timestamp: string;
  [key: string]: unknown;
}

export type AuditDelivery =
  | { status: 'success'; response: unknown }
  | { status: 'skipped'; reason: string }
  | { status: 'error'; error: string };

/** Every method resolves with the delivery result; none rejects. */
export interface AuditSink {
  send(event: AuditEvent): Promise<AuditDelivery>;
  auditDetection(apId: string, sleType: string, severity: Severity | null, source?: string): Promise<AuditDelivery>;
  auditDiagnostics(apId: string, diagnostics: WorkflowOutcome['diagnostics']): Promise<AuditDelivery>;
  auditRemediation(remediation: RemediationAttempt): Promise<AuditDelivery>;
  auditValidation(apId: string, sleType: string, validation: ValidationResult): Promise<AuditDelivery>;
  auditTicketAction(ticketId: number | string, action: string, apId: string, sleType: string): Promise<AuditDelivery>;
  auditWorkflowComplete(outcome: WorkflowOutcome): Promise<AuditDelivery>;
}
