import { AxiosAdapter, AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { ComponentLogger } from '../src/common/logger';
import { CancelledError } from '../src/common/timers';
import { DeviceApi } from '../src/server/collaborators';
import { ApStats, RebootResponse, SleMetricsDocument } from '../src/types';

export const BASE_TIME = new Date('2026-03-02T12:00:00.000Z');

export function createMockLogger(): jest.Mocked<ComponentLogger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

export function apStats(overrides: Partial<ApStats> = {}): ApStats {
  return {
    status: 'connected',
    uptime: 7200,
    num_clients: 10,
    cpu_util: 12,
    mem_util: 40,
    ip: '10.0.0.21',
    version: '0.14.29',
    ...overrides,
  };
}

export function throughputDoc(score: number): SleMetricsDocument {
  return { client: { throughput: { score } } };
}

/** Healthy, connected AP whose throughput is reported at 95. */
export function createDevice(): jest.Mocked<DeviceApi> {
  return {
    getApStats: jest.fn().mockResolvedValue(apStats()),
    getApDetails: jest.fn().mockResolvedValue({ model: 'AP43', name: 'lobby-ap' }),
    rebootAp: jest.fn<Promise<RebootResponse>, [string]>(async apId => ({ status: 'reboot_issued', ap_id: apId })),
    getSleMetrics: jest.fn().mockResolvedValue(throughputDoc(95)),
    validateCredentials: jest.fn().mockResolvedValue(true),
  };
}

/**
 * Clock and sleeper that move together: every sleep advances `now()` by the
 * requested time without waiting.
 */
export function fakeClock(start: Date = BASE_TIME) {
  let elapsed = 0;
  const now = (): Date => new Date(start.getTime() + elapsed);
  const sleep = jest.fn(async (ms: number, signal?: AbortSignal): Promise<void> => {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    elapsed += ms;
  });
  return { now, sleep };
}

export interface StubReply {
  status: number;
  statusText?: string;
  data?: unknown;
}

/**
 * In-process axios adapter. Non-2xx replies reject the way axios does on the
 * wire; a handler that throws simulates a network failure.
 */
export function stubAdapter(handler: (config: InternalAxiosRequestConfig) => StubReply) {
  const requests: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async config => {
    requests.push(config);
    const reply = handler(config);
    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: reply.statusText ?? '',
      headers: {},
      config,
    };
    if (reply.status >= 200 && reply.status < 300) {
      return response;
    }
    throw new AxiosError(
      `Request failed with status code ${reply.status}`,
      AxiosError.ERR_BAD_RESPONSE,
      config,
      null,
      response
    );
  };

  return { adapter, requests };
}

/** JSON body axios serialized for a request. */
export function requestBody(config: InternalAxiosRequestConfig): unknown {
  return typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
}
