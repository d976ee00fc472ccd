// mist-client.ts - Device API client: AP stats, reboot, SLE metrics and WLANs
import { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import { TransportError } from '../common/errors';
import { ComponentLogger } from '../common/logger';
import { ApDetails, ApStats, RebootResponse, SleMetricsDocument } from '../types';
import { DeviceApi } from './collaborators';
import { MistSettings } from './config';
import { createHttpClient, isAuthRejection, toAuthError, toTransportError } from './http-client';

const ApStatsSchema = z
  .object({
    status: z.string().default('unknown'),
    uptime: z.number().default(0),
    num_clients: z.number().default(0),
    cpu_util: z.number().optional(),
    mem_util: z.number().optional(),
    ip: z.string().optional(),
    version: z.string().optional()
  })
  .passthrough();

const ApDetailsSchema = z
  .object({
    model: z.string().optional(),
    name: z.string().optional()
  })
  .passthrough();

const JsonObjectSchema = z.record(z.unknown());

export interface SleHistoryQuery {
  start?: number;
  end?: number;
  siteId?: string;
}

export class MistClient implements DeviceApi {
  private logger: ComponentLogger;
  private settings: MistSettings;
  private client: AxiosInstance;

  constructor(settings: MistSettings, logger: ComponentLogger, adapter?: AxiosAdapter) {
    this.settings = settings;
    this.logger = logger;
    this.client = createHttpClient({
      baseURL: settings.apiBase,
      timeoutMs: settings.timeoutMs,
      adapter,
      headers: {
        Authorization: `Token ${settings.apiToken}`
      }
    });
  }

  async getApStats(apId: string, signal?: AbortSignal): Promise<ApStats> {
    this.logger.info(`Fetching AP stats for ${apId}`);
    const data = await this.get('get AP stats', `/sites/${this.settings.siteId}/stats/aps/${apId}`, signal);
    const stats = this.decode('get AP stats', ApStatsSchema, data);
    this.logger.debug(`Retrieved stats for AP ${apId}`, { status: stats.status, uptime: stats.uptime });
    return stats;
  }

  async getApDetails(apId: string, signal?: AbortSignal): Promise<ApDetails> {
    this.logger.info(`Fetching AP details for ${apId}`);
    const data = await this.get('get AP details', `/sites/${this.settings.siteId}/devices/${apId}`, signal);
    return this.decode('get AP details', ApDetailsSchema, data);
  }

  async getClientCount(apId: string, signal?: AbortSignal): Promise<number> {
    const stats = await this.getApStats(apId, signal);
    this.logger.info(`AP ${apId} has ${stats.num_clients} clients`);
    return stats.num_clients;
  }

  /** Not idempotent: every call restarts the device. */
  async rebootAp(apId: string): Promise<RebootResponse> {
    this.logger.warn(`Issuing reboot command to AP ${apId}`);
    try {
      await this.client.post(`/sites/${this.settings.siteId}/devices/${apId}/restart`);
    } catch (error) {
      const transportError = toTransportError('reboot AP', error);
      this.logger.error('Failed to reboot AP', transportError, { ap_id: apId });
      throw transportError;
    }
    this.logger.info(`Reboot command successfully issued to AP ${apId}`);
    return { status: 'reboot_issued', ap_id: apId };
  }

  async getSleMetrics(siteId?: string, signal?: AbortSignal): Promise<SleMetricsDocument> {
    const site = siteId ?? this.settings.siteId;
    this.logger.info(`Fetching SLE metrics for site ${site}`);
    const data = await this.get('get SLE metrics', `/sites/${site}/sle`, signal);
    return this.decode('get SLE metrics', JsonObjectSchema, data);
  }

  async getSleHistory(metric: string, query: SleHistoryQuery = {}): Promise<SleMetricsDocument> {
    const site = query.siteId ?? this.settings.siteId;
    const params: Record<string, number> = {};
    if (query.start !== undefined) params.start = query.start;
    if (query.end !== undefined) params.end = query.end;

    this.logger.info(`Fetching SLE history for ${metric}`);
    try {
      const response = await this.client.get<unknown>(`/sites/${site}/sle/${metric}/metrics`, { params });
      return this.decode('get SLE history', JsonObjectSchema, response.data);
    } catch (error) {
      throw this.fail('get SLE history', error);
    }
  }

  async listWlans(siteId?: string): Promise<Array<Record<string, unknown>>> {
    const site = siteId ?? this.settings.siteId;
    this.logger.info(`Fetching WLAN list for site ${site}`);
    const data = await this.get('list WLANs', `/sites/${site}/wlans`);
    return this.decode('list WLANs', z.array(JsonObjectSchema), data);
  }

  async updateWlan(wlanId: string, changes: Record<string, unknown>, siteId?: string): Promise<Record<string, unknown>> {
    const site = siteId ?? this.settings.siteId;
    this.logger.info(`Updating WLAN ${wlanId}`);
    try {
      const response = await this.client.put<unknown>(`/sites/${site}/wlans/${wlanId}`, changes);
      this.logger.info(`Successfully updated WLAN ${wlanId}`);
      return this.decode('update WLAN', JsonObjectSchema, response.data);
    } catch (error) {
      throw this.fail('update WLAN', error);
    }
  }

  async validateCredentials(): Promise<true> {
    try {
      await this.client.get('/self', { timeout: 10000 });
    } catch (error) {
      const transportError = toTransportError('validate credentials', error);
      this.logger.error('Credential validation failed', transportError);
      if (isAuthRejection(transportError)) {
        throw toAuthError('device API', transportError);
      }
      throw transportError;
    }
    this.logger.info('Device API credentials validated successfully');
    return true;
  }

  private async get(operation: string, url: string, signal?: AbortSignal): Promise<unknown> {
    try {
      const response = await this.client.get<unknown>(url, { signal });
      return response.data;
    } catch (error) {
      throw this.fail(operation, error);
    }
  }

  private decode<T>(operation: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new TransportError(operation, `${operation} failed: unexpected response body`);
    }
    return parsed.data;
  }

  private fail(operation: string, error: unknown): TransportError {
    const transportError = toTransportError(operation, error);
    this.logger.error(`Failed to ${operation}`, transportError);
    return transportError;
  }
}
