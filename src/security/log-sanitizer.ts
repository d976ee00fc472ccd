// log-sanitizer.ts - Redacts credentials before anything is written to a log

const SENSITIVE_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  // Authorization header schemes used by the device API, ticketing and the HEC sink
  { pattern: /\b(Bearer|Token|Splunk|Basic)\s+(?=[A-Za-z0-9\-_.=+/]*\d)[A-Za-z0-9\-_.=+/]{8,}/g, replacement: '$1 [REDACTED]' },
  { pattern: /api[_-]?(?:key|token)["']?\s*[:=]\s*["']?[A-Za-z0-9\-_.]+/gi, replacement: 'api_token: [REDACTED]' },

  { pattern: /password["']?\s*[:=]\s*["']?[^"'\s,}]+/gi, replacement: 'password: [REDACTED]' },
  { pattern: /secret["']?\s*[:=]\s*["']?[^"'\s,}]+/gi, replacement: 'secret: [REDACTED]' },

  { pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, replacement: '[EMAIL_REDACTED]' },
];

const SENSITIVE_KEYS = new Set([
  'apikey',
  'api_key',
  'api_token',
  'token',
  'password',
  'secret',
  'authorization',
  'auth',
]);

export function sanitizeLogData(data: unknown): unknown {
  if (typeof data === 'string') {
    let sanitized = data;
    for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
      sanitized = sanitized.replace(pattern, replacement);
    }
    return sanitized;
  }

  if (Array.isArray(data)) {
    return data.map(item => sanitizeLogData(item));
  }

  if (typeof data === 'object' && data !== null) {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (SENSITIVE_KEYS.has(key.toLowerCase())) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = sanitizeLogData(value);
      }
    }
    return sanitized;
  }

  return data;
}

export function sanitizeMessage(message: string): string {
  const sanitized = sanitizeLogData(message);
  return typeof sanitized === 'string' ? sanitized : message;
}
