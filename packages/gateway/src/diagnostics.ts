/**
 * Toolgate Gateway: Diagnostic helpers
 */

export const DEFAULT_MAX_PAYLOAD_CHARS = 2000;

/**
 * Serialize a payload for an operational log line, cut to `max` characters.
 * Truncated output ends with a marker giving the full length.
 */
export function truncatePayload(value: unknown, max: number = DEFAULT_MAX_PAYLOAD_CHARS): string {
  let text: string;
  try {
    text = JSON.stringify(value) ?? String(value);
  } catch (err: unknown) {
    text = `[unserializable: ${err instanceof Error ? err.message : String(err)}]`;
  }
  if (text.length <= max) {
    return text;
  }
  return `${text.slice(0, max)}... (${text.length} chars)`;
}
