/**
 * Utilities for masking sensitive data before it reaches the logs
 */

const DEFAULT_MASK = '*** FILTERED ***';

/**
 * Returns true when masking is enabled via BRIDGE_HIDE_SENSITIVE.
 */
export function isSensitiveMaskEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.BRIDGE_HIDE_SENSITIVE || '';
  return value === 'true' || value === '1' || value === 'yes' || value === 'on';
}

/**
 * Returns the mask string to use. Can be overridden via BRIDGE_SENSITIVE_MASK.
 */
export function getMaskString(env: NodeJS.ProcessEnv = process.env): string {
  return env.BRIDGE_SENSITIVE_MASK || DEFAULT_MASK;
}

/**
 * Key patterns that imply the value is sensitive and should be fully masked.
 */
export const sensitiveKeyRegexes: RegExp[] = [
  /(?:password|passwd|pwd)/i,
  /(?:^|[_-])(?:secret|token)$/i,
  /[a-z0-9](?:Secret|Token)$/,
  /api[_-]?(?:key|token|secret|password)/i,
  /auth[_-]?(?:token|secret)/i,
  /authorization/i,
  /credential(?:s)?/i,
];

/**
 * Value patterns for secret-like strings
 */
export const sensitiveValueRegexes: RegExp[] = [
  /eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g, // JWT
  /\bsk-[A-Za-z0-9_-]{16,}\b/g, // bearer API keys
  /\bBearer\s+[A-Za-z0-9._-]{16,}/g,
  /\b(?:api[_-]?key|token|secret)\s*[:=]\s*['"]?[A-Za-z0-9+/=_-]{16,}['"]?/gi,
];

export function maskTextForSensitiveValues(text: string, mask: string = getMaskString()): string {
  let output = text;
  for (const regex of sensitiveValueRegexes) {
    regex.lastIndex = 0;
    output = output.replace(regex, mask);
  }
  return output;
}

/**
 * Recursively mask values in an object based on key names and string values.
 * Returns a new value; the input is not modified.
 */
export function maskObjectDeep(input: unknown, mask: string = getMaskString()): unknown {
  if (typeof input === 'string') {
    return maskTextForSensitiveValues(input, mask);
  }

  if (Array.isArray(input)) {
    return input.map((item: unknown) => maskObjectDeep(item, mask));
  }

  if (typeof input === 'object' && input !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      const isScalar = value === null || typeof value !== 'object';
      if (isScalar && sensitiveKeyRegexes.some((r) => r.test(key))) {
        result[key] = mask;
      } else {
        result[key] = maskObjectDeep(value, mask);
      }
    }
    return result;
  }

  return input;
}

/**
 * Mask a value for logging when masking is enabled, otherwise return it unchanged.
 */
export function forLog(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  return isSensitiveMaskEnabled(env) ? maskObjectDeep(value, getMaskString(env)) : value;
}
