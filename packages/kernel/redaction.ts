/**
 * Sensitive Data Redaction
 *
 * Field-name and value-pattern redaction applied to log metadata.
 * Export logs carry database errors and filesystem paths, so connection
 * strings and credentials are scrubbed before anything reaches a handler.
 */

const SENSITIVE_FIELD_PATTERNS: readonly RegExp[] = [
  /^password$/i,
  /^passwd$/i,
  /^secret$/i,
  /^token$/i,
  /^api[_-]?key$/i,
  /^authorization$/i,
  /^cookie$/i,
  /^connection[_-]?string$/i,
  /_key$/i,
  /_secret$/i,
  /_token$/i,
  /_password$/i,
];

const CONNECTION_STRING_PATTERN = /(postgres(?:ql)?|mysql):\/\/[^:@/]+:[^@]+@/gi;

/**
 * Check if a field name indicates sensitive data
 */
export function isSensitiveField(fieldName: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some(pattern => pattern.test(fieldName));
}

/** Type for sanitized output */
export type SanitizedData =
  | string
  | number
  | boolean
  | null
  | undefined
  | SanitizedData[]
  | { [key: string]: SanitizedData };

/**
 * Recursively sanitize a value for logging.
 */
export function sanitizeForLogging(data: unknown, depth = 0, maxDepth = 8): SanitizedData {
  if (depth > maxDepth) {
    return '[Max Depth Exceeded]';
  }

  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === 'string') {
    return data.replace(CONNECTION_STRING_PATTERN, '$1://***:***@');
  }

  if (typeof data === 'number' || typeof data === 'boolean') {
    return data;
  }

  if (typeof data === 'bigint') {
    return data.toString();
  }

  if (typeof data === 'function' || typeof data === 'symbol') {
    return `[${typeof data}]`;
  }

  if (data instanceof Date) {
    return data.toISOString();
  }

  if (data instanceof Error) {
    return { name: data.name, message: sanitizeErrorMessage(data) };
  }

  if (Array.isArray(data)) {
    return data.map(item => sanitizeForLogging(item, depth + 1, maxDepth));
  }

  if (data instanceof Set) {
    return [...data].map(item => sanitizeForLogging(item, depth + 1, maxDepth));
  }

  const sanitized: Record<string, SanitizedData> = {};
  for (const [key, value] of Object.entries(data)) {
    sanitized[key] = isSensitiveField(key)
      ? '[REDACTED]'
      : sanitizeForLogging(value, depth + 1, maxDepth);
  }
  return sanitized;
}

/**
 * Strip credentials from an error message.
 */
export function sanitizeErrorMessage(error: unknown): string {
  if (error === null || error === undefined) {
    return 'Unknown error';
  }
  const message = error instanceof Error ? error.message : String(error);
  return message.replace(CONNECTION_STRING_PATTERN, '$1://***:***@');
}
