/**
 * Trace ID generation.
 * Each pipeline run gets its own trace ID; log lines and spans carry it.
 */

import { randomBytes, randomUUID } from "node:crypto";

/**
 * Generate a trace ID for one pipeline run (UUID v4).
 */
export function generateTraceId(): string {
  return randomUUID();
}

/**
 * Generate a short span ID (8 random bytes, hex).
 */
export function generateSpanId(): string {
  return randomBytes(8).toString("hex");
}
