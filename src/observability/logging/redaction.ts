// ═══════════════════════════════════════════════════════════════════════════════
// LOG REDACTION — Mask Secrets Before They Reach Output
// ═══════════════════════════════════════════════════════════════════════════════

export interface RedactionOptions {
  /** Field names (case-insensitive substrings) whose values are replaced */
  sensitiveKeys?: string[];
  /** Replacement text */
  placeholder?: string;
  /** Nesting depth past which values are elided */
  maxDepth?: number;
}

const DEFAULT_SENSITIVE_KEYS = ['password', 'secret', 'token', 'apikey', 'api_key', 'authorization'];

export function redact(
  entry: Record<string, unknown>,
  options: RedactionOptions = {}
): Record<string, unknown> {
  const keys = (options.sensitiveKeys ?? DEFAULT_SENSITIVE_KEYS).map(k => k.toLowerCase());
  const placeholder = options.placeholder ?? '[REDACTED]';
  const maxDepth = options.maxDepth ?? 5;

  const visit = (value: unknown, depth: number): unknown => {
    if (depth > maxDepth) return '[MAX_DEPTH]';
    if (Array.isArray(value)) {
      return value.map(item => visit(item, depth + 1));
    }
    if (value && typeof value === 'object' && !(value instanceof Date)) {
      const result: Record<string, unknown> = {};
      for (const [key, child] of Object.entries(value)) {
        const lower = key.toLowerCase();
        result[key] = keys.some(k => lower.includes(k)) ? placeholder : visit(child, depth + 1);
      }
      return result;
    }
    return value;
  };

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    const lower = key.toLowerCase();
    result[key] = keys.some(k => lower.includes(k)) ? placeholder : visit(value, 1);
  }
  return result;
}
