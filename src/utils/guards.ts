/**
 * Runtime type guards for untyped data (model output, parsed JSON)
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse JSON into a plain object, or null when it is not one
 */
export function parseJsonObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    // Malformed JSON is reported as null to the caller
    return null;
  }
}
