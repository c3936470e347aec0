/**
* Document encoding and row value normalization
*/

const INDENT = 4;

/**
* Encode a document as pretty-printed UTF-8 JSON with a trailing newline.
* Slashes and non-ASCII characters are written as-is.
*/
export function encodeDocument(document: unknown): string {
  return `${JSON.stringify(document, null, INDENT)}\n`;
}

// ============================================================================
// Row values
// ============================================================================

/**
* Render a timestamp column. Repositories select these as text so the
* stored wall-clock value passes through unchanged; a Date (timestamptz
* read through the driver's parser) becomes ISO-8601 UTC.
*/
export function toTimestamp(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  return String(value);
}

/** null/undefined stay null, anything else is stringified */
export function toNullableString(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return toTimestamp(value);
  return String(value);
}

/** null/undefined become '', anything else is stringified */
export function toText(value: unknown): string {
  return toNullableString(value) ?? '';
}

/**
* Coerce an integer column. Values outside the safe integer range give
* `fallback` rather than a rounded number.
*/
export function toInteger(value: unknown, fallback = 0): number {
  if (value === null || value === undefined || value === '') return fallback;
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(n)) return fallback;
  const truncated = Math.trunc(n);
  return Number.isSafeInteger(truncated) ? truncated : fallback;
}

const INTEGER_TEXT = /^-?\d+$/;

/**
* Coerce a row id. Postgres bigint arrives as a string; ids past 2^53 keep
* their digits as a string instead of losing precision.
*/
export function toIdentifier(value: unknown, fallback = 0): number | string {
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (typeof value === 'string') {
    const text = value.trim();
    if (INTEGER_TEXT.test(text) && !Number.isSafeInteger(Number(text))) {
      return text;
    }
  }
  return toInteger(value, fallback);
}

/**
* Decode a list-shaped value. JSON text holding an array is decoded;
* anything else that is not an array becomes [].
*/
export function toList(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  if (typeof value === 'string') {
    try {
      const decoded: unknown = JSON.parse(value);
      return Array.isArray(decoded) ? decoded : [];
    } catch {
      return [];
    }
  }
  return [];
}
