/**
 * Returns the substring from the first '{' to the last '}' of `text`,
 * or null when no such span exists.
 */
export function findJsonObjectSpan(text: string): string | null {
  const firstBrace = text.indexOf('{');
  const lastBrace = text.lastIndexOf('}');

  if (firstBrace === -1 || lastBrace === -1 || lastBrace <= firstBrace) {
    return null;
  }
  return text.slice(firstBrace, lastBrace + 1);
}

/**
 * Extracts a JSON object from free-form model output.
 * The whole span between the first '{' and the last '}' must parse; there is
 * no partial recovery.
 *
 * @param context - Optional label for error messages (e.g. 'ollama')
 * @throws Error if no span is found, the span does not parse, or it is not an object
 */
export function extractJsonObject(text: string, context?: string): Record<string, unknown> {
  const span = findJsonObjectSpan(text);
  if (span === null) {
    const contextStr = context ? ` in ${context} response` : '';
    throw new Error(`No JSON object found${contextStr}.`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(span);
  } catch (e) {
    const contextStr = context ? ` from ${context} response` : '';
    throw new Error(
      `Failed to parse JSON${contextStr}: ${e instanceof Error ? e.message : String(e)}`,
    );
  }

  if (!isRecord(parsed)) {
    throw new Error('Extracted JSON is not an object.');
  }
  return parsed;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
