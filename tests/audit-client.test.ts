import { AxiosError } from 'axios';
import { SplunkAuditSink } from '../src/server/audit-client';
import { SplunkSettings } from '../src/server/config';
import { BASE_TIME, createMockLogger, requestBody, stubAdapter } from './helpers';

const SETTINGS: SplunkSettings = {
  endpoint: 'https://hec.example.test:8088/services/collector',
  token: 'test-hec-token',
  host: 'sle-autopilot',
  timeoutMs: 10000,
};

describe('SplunkAuditSink', () => {
  it('skips delivery when no collector is configured', async () => {
    const sink = new SplunkAuditSink(null, createMockLogger());

    expect(await sink.auditDetection('ap-1', 'throughput', 'critical')).toEqual({
      status: 'skipped',
      reason: 'HEC not configured',
    });
  });

  it('wraps the event in a collector envelope', async () => {
    const { adapter, requests } = stubAdapter(() => ({ status: 200, data: { text: 'Success', code: 0 } }));
    const sink = new SplunkAuditSink(SETTINGS, createMockLogger(), { adapter, now: () => BASE_TIME });

    const delivery = await sink.auditDetection('ap-1', 'throughput', 'critical');

    expect(delivery).toEqual({ status: 'success', response: { text: 'Success', code: 0 } });
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe(SETTINGS.endpoint);
    expect(requests[0].headers.Authorization).toBe('Splunk test-hec-token');
    expect(requestBody(requests[0])).toEqual({
      time: Math.floor(BASE_TIME.getTime() / 1000),
      host: 'sle-autopilot',
      source: 'sle_autopilot',
      sourcetype: 'sle:automation:detection',
      event: {
        event_type: 'sle_detection',
        timestamp: '2026-03-02T12:00:00.000Z',
        ap_id: 'ap-1',
        sle: 'throughput',
        severity: 'critical',
        source: 'monitor',
      },
    });
  });

  it('uses the ticketing sourcetype for ticket actions', async () => {
    const { adapter, requests } = stubAdapter(() => ({ status: 200, data: {} }));
    const sink = new SplunkAuditSink(SETTINGS, createMockLogger(), { adapter, now: () => BASE_TIME });

    await sink.auditTicketAction(101, 'close', 'ap-1', 'throughput');

    expect(requestBody(requests[0])).toMatchObject({
      sourcetype: 'sle:automation:ticketing',
      event: { event_type: 'ticket_action', ticket_id: 101, action: 'close' },
    });
  });

  it('returns an error result instead of throwing when the collector refuses', async () => {
    const { adapter } = stubAdapter(() => ({ status: 503, statusText: 'Service Unavailable' }));
    const sink = new SplunkAuditSink(SETTINGS, createMockLogger(), { adapter });

    expect(await sink.auditDetection('ap-1', 'throughput', null)).toEqual({
      status: 'error',
      error: 'send audit event failed: HTTP 503 Service Unavailable',
    });
  });

  it('reports a network failure by its error code', async () => {
    const { adapter } = stubAdapter(config => {
      throw new AxiosError('connect ECONNREFUSED 127.0.0.1:8088', 'ECONNREFUSED', config);
    });
    const sink = new SplunkAuditSink(SETTINGS, createMockLogger(), { adapter });

    expect(await sink.auditDetection('ap-1', 'throughput', 'high')).toEqual({
      status: 'error',
      error: 'send audit event failed: ECONNREFUSED',
    });
  });
});
