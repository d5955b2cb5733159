const REDACT_PATTERNS = [/api[_-]?key/i, /authorization/i, /token/i, /password/i, /secret/i];

const MAX_STRING_LENGTH = 2000;
const MAX_DEPTH = 6;

function sanitize(value: unknown, depth: number): unknown {
  if (typeof value === 'string') {
    return value.length <= MAX_STRING_LENGTH
      ? value
      : `${value.slice(0, MAX_STRING_LENGTH)}...[truncated ${value.length - MAX_STRING_LENGTH} chars]`;
  }
  if (value === null || typeof value !== 'object') return value;
  if (depth >= MAX_DEPTH) return '[MaxDepth]';
  if (Array.isArray(value)) return value.map((item) => sanitize(item, depth + 1));

  const output: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    output[key] = REDACT_PATTERNS.some((p) => p.test(key)) ? '[REDACTED]' : sanitize(inner, depth + 1);
  }
  return output;
}

/** JSON for trace columns: secrets masked, long prompts cut. */
export function safeJsonStringify(value: unknown): string {
  try {
    return JSON.stringify(sanitize(value, 0)) ?? 'null';
  } catch {
    return JSON.stringify({ error: 'failed-to-stringify' });
  }
}
