// config.ts - Collaborator endpoints and credentials, read once from the environment
import { ConfigError } from '../common/errors';
import { REQUEST_TIMEOUT_SECONDS } from '../config/config';

export interface MistSettings {
  apiBase: string;
  apiToken: string;
  siteId: string;
  timeoutMs: number;
}

export interface ZendeskSettings {
  subdomain: string;
  email: string;
  apiToken: string;
  groupId?: string;
  timeoutMs: number;
}

export interface SplunkSettings {
  endpoint: string;
  token: string;
  host: string;
  timeoutMs: number;
}

export interface EnvironmentSettings {
  /** Absent when MIST_API_TOKEN or SITE_ID is unset; see {@link requireMist}. */
  mist: MistSettings | null;
  missingMist: string[];
  zendesk: ZendeskSettings | null;
  splunk: SplunkSettings | null;
  rulesFile: string;
  logDir?: string;
  logLevel?: string;
}

export const DEFAULT_MIST_API_BASE = 'https://api.mist.com/api/v1';
export const DEFAULT_RULES_FILE = 'rules/sle_rules.json';

type Env = Record<string, string | undefined>;

function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function loadEnvironment(env: Env = process.env): EnvironmentSettings {
  const apiToken = read(env, 'MIST_API_TOKEN');
  const siteId = read(env, 'SITE_ID');
  const missingMist: string[] = [];
  if (!apiToken) missingMist.push('MIST_API_TOKEN');
  if (!siteId) missingMist.push('SITE_ID');

  const mist: MistSettings | null = apiToken && siteId
    ? {
        apiBase: read(env, 'MIST_API_BASE') ?? DEFAULT_MIST_API_BASE,
        apiToken,
        siteId,
        timeoutMs: REQUEST_TIMEOUT_SECONDS * 1000
      }
    : null;

  const subdomain = read(env, 'ZENDESK_SUBDOMAIN');
  const email = read(env, 'ZENDESK_EMAIL');
  const zendeskToken = read(env, 'ZENDESK_API_TOKEN');
  const zendesk: ZendeskSettings | null = subdomain && email && zendeskToken
    ? {
        subdomain,
        email,
        apiToken: zendeskToken,
        groupId: read(env, 'ZENDESK_GROUP_ID'),
        timeoutMs: REQUEST_TIMEOUT_SECONDS * 1000
      }
    : null;

  const endpoint = read(env, 'SPLUNK_HEC_ENDPOINT');
  const hecToken = read(env, 'SPLUNK_HEC_TOKEN');
  const splunk: SplunkSettings | null = endpoint && hecToken
    ? {
        endpoint,
        token: hecToken,
        host: read(env, 'SPLUNK_HOST') ?? 'sle-autopilot',
        timeoutMs: 10000
      }
    : null;

  return {
    mist,
    missingMist,
    zendesk,
    splunk,
    rulesFile: read(env, 'SLE_RULES_FILE') ?? DEFAULT_RULES_FILE,
    logDir: read(env, 'LOG_DIR'),
    logLevel: read(env, 'LOG_LEVEL')
  };
}

export function requireMist(settings: EnvironmentSettings): MistSettings {
  if (!settings.mist) {
    throw new ConfigError(`Missing required environment variables: ${settings.missingMist.join(', ')}`);
  }
  return settings.mist;
}

export function requireZendesk(settings: EnvironmentSettings): ZendeskSettings {
  if (!settings.zendesk) {
    throw new ConfigError('Ticketing requires ZENDESK_SUBDOMAIN, ZENDESK_EMAIL and ZENDESK_API_TOKEN');
  }
  return settings.zendesk;
}
