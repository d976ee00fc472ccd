// incident-reporter.ts - Pushes a finished workflow outcome to the helpdesk and the audit trail
import { toErrorMessage } from '../common/errors';
import { ComponentLogger } from '../common/logger';
import { AuditDelivery, AuditSink, TicketingApi } from '../server/collaborators';
import { WorkflowOutcome } from '../types';

export type TicketAction = 'created' | 'updated' | 'closed' | 'failed' | 'skipped';

export interface IncidentReport {
  ticket_id: number | string | null;
  ticket_actions: TicketAction[];
  ticket_error?: string;
  audit: AuditDelivery[];
}

export class IncidentReporter {
  private ticketing: TicketingApi | null;
  private audit: AuditSink;
  private logger: ComponentLogger;

  constructor(ticketing: TicketingApi | null, audit: AuditSink, logger: ComponentLogger) {
    this.ticketing = ticketing;
    this.audit = audit;
    this.logger = logger;
  }

  /**
   * Opens a ticket (unless `existingTicketId` is given), then closes it when
   * the SLE was restored or records the failure on it otherwise. Helpdesk and
   * audit failures are reported in the result, never thrown.
   */
  async report(outcome: WorkflowOutcome, existingTicketId?: number | string): Promise<IncidentReport> {
    const audit: AuditDelivery[] = [];
    audit.push(await this.audit.auditDetection(outcome.ap_id, outcome.sle_type, outcome.severity));
    audit.push(await this.audit.auditDiagnostics(outcome.ap_id, outcome.diagnostics));
    audit.push(await this.audit.auditRemediation(outcome.remediation));
    if (outcome.validation) {
      audit.push(await this.audit.auditValidation(outcome.ap_id, outcome.sle_type, outcome.validation));
    }

    const report: IncidentReport = { ticket_id: existingTicketId ?? null, ticket_actions: [], audit };

    if (!this.ticketing) {
      this.logger.info('Ticketing not configured - skipping ticket updates');
      report.ticket_actions.push('skipped');
    } else {
      await this.updateTicket(this.ticketing, outcome, report);
    }

    audit.push(await this.audit.auditWorkflowComplete(outcome));
    return report;
  }

  private async updateTicket(ticketing: TicketingApi, outcome: WorkflowOutcome, report: IncidentReport): Promise<void> {
    try {
      if (report.ticket_id === null) {
        const ticket = await ticketing.createTicket(
          outcome.ap_id,
          outcome.sle_type,
          outcome.severity ?? 'high',
          describeDetection(outcome)
        );
        report.ticket_id = ticket.id;
        report.ticket_actions.push('created');
        report.audit.push(await this.audit.auditTicketAction(ticket.id, 'create', outcome.ap_id, outcome.sle_type));
      }

      const ticketId = report.ticket_id;
      if (ticketId === null) {
        return;
      }

      if (outcome.status === 'success') {
        await ticketing.closeTicket(ticketId, describeResolution(outcome));
        report.ticket_actions.push('closed');
        report.audit.push(await this.audit.auditTicketAction(ticketId, 'close', outcome.ap_id, outcome.sle_type));
      } else {
        await ticketing.updateTicket(ticketId, describeFailure(outcome), {
          status: 'open',
          tags: ['automation-failed', `outcome-${outcome.status}`]
        });
        report.ticket_actions.push('updated');
        report.audit.push(await this.audit.auditTicketAction(ticketId, 'update', outcome.ap_id, outcome.sle_type));
      }
    } catch (error) {
      this.logger.error('Ticket update failed', error, { ticket_id: report.ticket_id });
      report.ticket_actions.push('failed');
      report.ticket_error = toErrorMessage(error);
    }
  }
}

function describeDetection(outcome: WorkflowOutcome): string {
  const score = outcome.sle_score !== null ? String(outcome.sle_score) : 'unknown';
  return `Current ${outcome.sle_type} score: ${score}. Selected action: ${outcome.action}.`;
}

export function describeResolution(outcome: WorkflowOutcome): string {
  const finalScore = outcome.validation?.final_score;
  const attempts = outcome.validation?.attempts.length ?? 0;
  return [
    `Action '${outcome.action}' on AP ${outcome.ap_id} restored ${outcome.sle_type}` +
      (finalScore !== undefined && finalScore !== null ? ` to ${finalScore}` : '') +
      ` after ${attempts} validation attempt(s).`,
    `Time to recovery: ${outcome.duration_seconds.toFixed(0)}s.`
  ].join('\n');
}

export function describeFailure(outcome: WorkflowOutcome): string {
  const reason = outcome.validation?.status === 'failed'
    ? outcome.validation.reason
    : outcome.remediation.reason;
  const lines = [
    `Automated remediation for AP ${outcome.ap_id} ended with status '${outcome.status}': ${reason}`
  ];
  if (outcome.recommendations.length > 0) {
    lines.push('', 'Recommendations:', ...outcome.recommendations.map(r => `- ${r}`));
  }
  return lines.join('\n');
}
