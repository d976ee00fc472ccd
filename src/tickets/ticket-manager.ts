import { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import { TransportError } from '../common/errors';
import { ComponentLogger } from '../common/logger';
import { SleRules } from '../config/config';
import { ticketPriority } from '../detection/severity-classifier';
import { TicketingApi, TicketRecord, TicketUpdate } from '../server/collaborators';
import { ZendeskSettings } from '../server/config';
import { createHttpClient, toTransportError } from '../server/http-client';
import { Severity, SleType } from '../types';

const TicketEnvelopeSchema = z.object({
  ticket: z
    .object({
      id: z.number(),
      subject: z.string().optional(),
      status: z.string().optional(),
      priority: z.string().optional(),
      tags: z.array(z.string()).optional()
    })
    .passthrough()
});

interface TicketPayload {
  ticket: {
    subject?: string;
    comment: { body: string };
    priority?: string;
    status?: string;
    type?: 'incident';
    tags?: string[];
    additional_tags?: string[];
    group_id?: string;
  };
}

/**
 * Opens, progresses and resolves incident tickets for degraded SLEs on the
 * helpdesk. Tickets are tagged with the SLE and AP so repeat failures group.
 */
export class TicketManager implements TicketingApi {
  private client: AxiosInstance;
  private logger: ComponentLogger;
  private settings: ZendeskSettings;
  private priorityMap: SleRules['ticketing']['priority_map'];
  private now: () => Date;

  constructor(
    settings: ZendeskSettings,
    rules: Readonly<SleRules>,
    logger: ComponentLogger,
    options: { adapter?: AxiosAdapter; now?: () => Date } = {}
  ) {
    this.settings = settings;
    this.logger = logger;
    this.priorityMap = rules.ticketing.priority_map;
    this.now = options.now ?? (() => new Date());
    this.client = createHttpClient({
      baseURL: `https://${settings.subdomain}.zendesk.com/api/v2`,
      timeoutMs: settings.timeoutMs,
      adapter: options.adapter,
      auth: { username: `${settings.email}/token`, password: settings.apiToken }
    });
  }

  async createTicket(apId: string, sleType: SleType, severity: Severity, description: string = ''): Promise<TicketRecord> {
    const priority = ticketPriority(sleType, severity, this.priorityMap);

    const body = [
      '**Automated SLE Detection Alert**',
      '',
      `- **Access Point**: ${apId}`,
      `- **SLE Metric**: ${sleType}`,
      `- **Severity**: ${severity}`,
      `- **Detection Time**: ${this.now().toISOString()}`,
      '',
      ...(description ? [description, ''] : []),
      'Automated remediation workflow has been initiated.'
    ].join('\n');

    const payload: TicketPayload = {
      ticket: {
        subject: `SLE Failure: ${sleType} on AP ${apId}`,
        comment: { body },
        priority,
        type: 'incident',
        tags: ['wireless', 'sle', 'automation', sleType, apId]
      }
    };
    if (this.settings.groupId) {
      payload.ticket.group_id = this.settings.groupId;
    }

    this.logger.info(`Creating ticket for AP ${apId}, SLE: ${sleType}`, { priority });
    const ticket = await this.send('create ticket', () => this.client.post<unknown>('/tickets.json', payload));
    this.logger.info(`Created ticket #${ticket.id}`);
    return ticket;
  }

  async updateTicket(ticketId: number | string, comment: string, update: TicketUpdate = {}): Promise<TicketRecord> {
    const payload: TicketPayload = { ticket: { comment: { body: comment } } };
    if (update.status) payload.ticket.status = update.status;
    if (update.priority) payload.ticket.priority = update.priority;
    if (update.tags && update.tags.length > 0) payload.ticket.additional_tags = update.tags;

    this.logger.info(`Updating ticket #${ticketId}`);
    return this.send('update ticket', () => this.client.put<unknown>(`/tickets/${ticketId}.json`, payload));
  }

  async closeTicket(ticketId: number | string, resolution: string): Promise<TicketRecord> {
    const body = [
      '**Automated Resolution**',
      '',
      resolution,
      '',
      `- **Resolution Time**: ${this.now().toISOString()}`,
      '- **Status**: SLE restored to acceptable levels',
      '',
      'This ticket was resolved by the SLE automation pipeline.'
    ].join('\n');

    const payload: TicketPayload = { ticket: { status: 'solved', comment: { body } } };

    this.logger.info(`Closing ticket #${ticketId}`);
    return this.send('close ticket', () => this.client.put<unknown>(`/tickets/${ticketId}.json`, payload));
  }

  async getTicket(ticketId: number | string): Promise<TicketRecord> {
    return this.send('get ticket', () => this.client.get<unknown>(`/tickets/${ticketId}.json`));
  }

  private async send(operation: string, call: () => Promise<{ data: unknown }>): Promise<TicketRecord> {
    let data: unknown;
    try {
      data = (await call()).data;
    } catch (error) {
      const transportError = toTransportError(operation, error);
      this.logger.error(`Failed to ${operation}`, transportError);
      throw transportError;
    }

    const parsed = TicketEnvelopeSchema.safeParse(data);
    if (!parsed.success) {
      throw new TransportError(operation, `${operation} failed: unexpected response body`);
    }
    return parsed.data.ticket;
  }
}
