import { truncate } from '../utils/text.js';

const SENSITIVE_KEY = /token|password|passwd|secret|api_key|apikey|authorization/i;

// Order matters: specific token shapes before the generic ones
const SECRET_PATTERNS: Array<{ pattern: RegExp; replace: (match: string) => string }> = [
  {
    pattern: /-----BEGIN [A-Z0-9 ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z0-9 ]*PRIVATE KEY-----/g,
    replace: () => '<REDACTED_PRIVATE_KEY_BLOCK>',
  },
  { pattern: /eyJ[0-9A-Za-z_-]+\.[0-9A-Za-z_-]+\.[0-9A-Za-z_-]+/g, replace: () => '<REDACTED_JWT>' },
  { pattern: /sk-ant-[A-Za-z0-9_-]{10,}/g, replace: () => 'sk-ant-***REDACTED***' },
  { pattern: /sk-[A-Za-z0-9_-]{20,}/g, replace: () => 'sk-***REDACTED***' },
  { pattern: /github_pat_[A-Za-z0-9_]{20,}/g, replace: () => 'github_pat_***REDACTED***' },
  { pattern: /gh[posru]_[A-Za-z0-9]{20,}/g, replace: (m) => `${m.slice(0, 4)}***REDACTED***` },
  { pattern: /A[SK]IA[0-9A-Z]{16}/g, replace: (m) => `${m.slice(0, 4)}***REDACTED***` },
  { pattern: /\bBearer\s+[A-Za-z0-9_.\-/+=]{20,}/g, replace: () => 'Bearer <REDACTED>' },
  {
    pattern: /\b([A-Z_]*(?:PASSWORD|PASSWD|SECRET|TOKEN|API_KEY|ACCESS_KEY)[A-Z_]*)=["']?([^"'\s]{6,})["']?/g,
    replace: (m) => (m.includes('REDACTED') ? m : `${m.slice(0, m.indexOf('='))}=<REDACTED>`),
  },
];

/** Replaces secret-looking substrings (keys, JWTs, bearer tokens, KEY=value pairs). */
export function redact(input: string): string {
  let result = input;
  for (const { pattern, replace } of SECRET_PATTERNS) {
    result = result.replace(new RegExp(pattern.source, pattern.flags), replace);
  }
  return result;
}

/**
 * Prepares an event payload for the log: sensitive keys are masked, strings
 * are redacted then cut to `maxLength`. Nested objects and arrays are walked.
 */
export function sanitizeRecord(record: Record<string, unknown>, maxLength: number): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] = SENSITIVE_KEY.test(key) ? '***' : sanitizeValue(value, maxLength);
  }
  return out;
}

function sanitizeValue(value: unknown, maxLength: number): unknown {
  if (typeof value === 'string') return truncate(redact(value), maxLength);
  if (Array.isArray(value)) return value.map(item => sanitizeValue(item, maxLength));
  if (isPlainRecord(value)) return sanitizeRecord(value, maxLength);
  return value;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
