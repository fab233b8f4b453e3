/**
 * Structured logging for the book generator.
 *
 * Every log line is a single JSON object with an `operation` and an ISO
 * `timestamp`. Lines go to stderr so that stdout carries only the book.
 */

/**
 * Check if debug logging is enabled via DEBUG_ASSEMBLY environment variable.
 */
export function isDebugEnabled(): boolean {
  return process.env.DEBUG_ASSEMBLY === 'true';
}

/**
 * Writes one structured log line.
 */
export function logLine(fields: { operation: string } & Record<string, unknown>): void {
  // eslint-disable-next-line no-console
  console.error(
    JSON.stringify({
      ...fields,
      timestamp: new Date().toISOString(),
    })
  );
}

/**
 * Writes a debug line when DEBUG_ASSEMBLY=true.
 */
export function logDebug(debug: string, fields: Record<string, unknown> = {}): void {
  if (!isDebugEnabled()) {
    return;
  }
  // eslint-disable-next-line no-console
  console.error(
    JSON.stringify({
      debug,
      ...fields,
      timestamp: new Date().toISOString(),
    })
  );
}
