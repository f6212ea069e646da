// Shared utilities for the Voice Assistant.

const ELLIPSIS = "...";

/** Session ids are client-generated; keep them to a URL- and log-safe alphabet. */
const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

/**
 * Truncate text to at most `maxChars` characters for a synthesis provider.
 *
 * Text within the bound is returned unchanged. Longer text is cut and ends with
 * "...", and the result is exactly `maxChars` long. Bounds below the ellipsis
 * length are raised to it.
 */
export function truncateForSynthesis(text: string, maxChars: number): string {
  const limit = Math.max(ELLIPSIS.length + 1, Math.floor(maxChars));
  if (text.length <= limit) return text;
  return text.slice(0, limit - ELLIPSIS.length) + ELLIPSIS;
}

export function isValidSessionId(sessionId: string): boolean {
  return SESSION_ID_PATTERN.test(sessionId);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** First `max` characters of a string for log lines, with a marker when cut. */
export function preview(text: string, max = 100): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
