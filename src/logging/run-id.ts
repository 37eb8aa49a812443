/**
 * Run IDs tie together the log lines of one compiler or generator invocation.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short run ID: UTC date plus a random suffix ("20240115-a1b2c3").
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Set the run ID for this process. A caller-supplied ID (for example one
 * handed down by a batch system) is used as is.
 */
export function initRunId(runId?: string): string {
  currentRunId = runId && runId.length > 0 ? runId : generateRunId();
  return currentRunId;
}

/**
 * The current run ID, or null before `initRunId()`.
 */
export function getRunId(): string | null {
  return currentRunId;
}
