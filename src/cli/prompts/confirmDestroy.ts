/**
 * Interactive confirmation before a destroy pass.
 *
 * @module
 */

import * as clack from "@clack/prompts";
import { ForgeError } from "../../core/errors/errors.js";
import { ErrorCode } from "../../core/errors/ErrorCode.js";

export type ConfirmFn = (options: { message: string; initialValue: boolean }) => Promise<boolean | symbol>;

/**
 * Asks whether to tear down `stages`, given in priority order. Cancelling
 * the prompt (Ctrl+C) aborts like a "no".
 *
 * @throws ForgeError (DESTROY_ABORTED) when the prompt is cancelled
 */
export async function confirmDestroy(
  project: string,
  stages: readonly string[],
  confirm: ConfirmFn = clack.confirm,
): Promise<boolean> {
  const result = await confirm({
    message: `Destroy ${stages.length} stage${stages.length === 1 ? "" : "s"} of '${project}' (${[...stages].reverse().join(", ")})?`,
    initialValue: false,
  });

  if (clack.isCancel(result) || typeof result !== "boolean") {
    throw new ForgeError("Destroy cancelled", ErrorCode.DESTROY_ABORTED, { stages: [...stages] });
  }
  return result;
}
