/**
 * Per-stage summary table printed at the end of a destroy pass.
 *
 * ```
 * STAGE                     STATUS
 * 03-kubernetes-initialize  success
 * 02-infrastructure         failure  terraform destroy failed (exit code 1)
 * 01-terraform-state        success
 * ```
 *
 * Rows keep the order stages finished tearing down.
 *
 * @module
 */

import pc from "picocolors";
import type { DestroyOutcome } from "../../core/errors/errors.js";

export interface DestroySummaryOptions {
  readonly useColors?: boolean;
}

const HEADER = { stage: "STAGE", status: "STATUS" } as const;

export function formatDestroySummary(
  outcomes: readonly DestroyOutcome[],
  options: DestroySummaryOptions = {},
): string[] {
  if (outcomes.length === 0) {
    return ["No stages were torn down."];
  }

  const width = Math.max(HEADER.stage.length, ...outcomes.map((outcome) => outcome.stage.length));
  const statusWidth = "failure".length;
  const paint = (color: (text: string) => string, text: string) => (options.useColors ? color(text) : text);

  const lines = [`${HEADER.stage.padEnd(width)}  ${HEADER.status}`];
  for (const outcome of outcomes) {
    const status = outcome.success ? "success" : "failure";
    const colored = paint(outcome.success ? pc.green : pc.red, status.padEnd(statusWidth));
    const reason = outcome.error ? `  ${outcome.error.split("\n")[0]}` : "";
    lines.push(`${outcome.stage.padEnd(width)}  ${colored}${reason}`.trimEnd());
  }
  return lines;
}
