/**
 * Execution context for a single orchestration run.
 *
 * @module
 */

import { randomUUID } from "node:crypto";

export type RunKind = "deploy" | "destroy" | "render" | "validate";

/**
 * Identifiers enriched into every log entry of one run.
 */
export interface ExecutionContext {
  readonly correlationId: string;
  readonly kind: RunKind;
  readonly startedAt: Date;
}

export function createExecutionContext(
  kind: RunKind,
  options: { correlationId?: string; startedAt?: Date } = {},
): ExecutionContext {
  return {
    correlationId: options.correlationId ?? randomUUID(),
    kind,
    startedAt: options.startedAt ?? new Date(),
  };
}
