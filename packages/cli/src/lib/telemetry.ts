/**
 * Command timing metrics
 */

import { isVerbose } from "./env.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Render a metric line: `metric <key> k=v ...`
 */
export function formatMetric(key: string, fields: Record<string, unknown>): string {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }
  return parts.join(" ");
}

/**
 * Emit a metric to stderr if DOCPATH_CLI_DEBUG=1
 */
export function emitMetric(key: string, fields: Record<string, unknown>): void {
  if (!isVerbose()) {
    return;
  }
  process.stderr.write(formatMetric(key, fields) + "\n");
}

/**
 * Wrap a command action with timing metrics
 */
export async function withTiming<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    emitMetric(label, {
      duration_ms: Date.now() - start,
      success,
    });
  }
}
