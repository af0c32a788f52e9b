// 로그에 남기면 안 되는 키 (소문자 비교)
const SENSITIVE_KEYS = new Set([
  'key',
  'apikey',
  'api_key',
  'token',
  'authorization',
  'secret',
  'password',
  'cookie',
]);

const MAX_LOGGED_STRING = 180;

export function maskSensitive(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined) return value;
  if (depth > 4) return '[truncated]';
  if (Array.isArray(value)) return value.map((v) => maskSensitive(v, depth + 1));
  if (typeof value === 'string' && value.length > MAX_LOGGED_STRING) {
    return `${value.slice(0, MAX_LOGGED_STRING - 3)}...`;
  }
  if (typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = SENSITIVE_KEYS.has(k.toLowerCase())
        ? '[masked]'
        : maskSensitive(v, depth + 1);
    }
    return out;
  }
  return value;
}
