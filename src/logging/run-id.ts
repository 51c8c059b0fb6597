/**
 * Run ID generation.
 * Every pipeline run is addressed by its run ID (store key, log prefix).
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: UTC date prefix + random suffix (e.g., "20240115-a1b2c3d4")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(4).toString("hex");
  return `${datePart}-${randomPart}`;
}

