/**
 * Timing diagnostics for --verbose runs
 */

const SANITIZE_NEWLINES = /[\r\n]+/g;

export interface Telemetry {
  verbose: boolean;
  write: (text: string) => void;
}

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a timing line to stderr if verbose mode is enabled
 */
export function emitMetric(telemetry: Telemetry, key: string, fields: Record<string, unknown>): void {
  if (!telemetry.verbose) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  telemetry.write(parts.join(" ") + "\n");
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(
  telemetry: Telemetry,
  label: string,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    emitMetric(telemetry, label, {
      duration_ms: Date.now() - start,
      success,
    });
  }
}
