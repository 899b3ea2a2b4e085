/**
 * Pieces every command shares: the `--config` option, output setup from
 * the global flags and failure reporting.
 *
 * @module
 */

import type { Command } from "commander";
import { DEFAULT_CONFIG_FILENAME } from "../../core/config/ConfigLoader.js";
import { ErrorPresenter, failingStage } from "../errors/ErrorPresenter.js";
import { createCliUx, parseUxLevel, setDefaultCliUx, type CliUx } from "../ux/CliUx.js";

export const CONFIG_FLAGS = "-c, --config <path>";
export const CONFIG_DESCRIPTION = `Configuration file (default: ./${DEFAULT_CONFIG_FILENAME})`;

export interface GlobalFlags {
  readonly verbose?: boolean;
  readonly debug?: boolean;
  readonly silent?: boolean;
}

/**
 * Builds the CliUx for a command from the program-wide flags.
 */
export function uxFor(command: Command): CliUx {
  const flags: GlobalFlags = command.optsWithGlobals();
  const ux = createCliUx({ level: parseUxLevel(flags) });
  setDefaultCliUx(ux);
  return ux;
}

export function configPathOf(value: string | undefined): string {
  return value ?? DEFAULT_CONFIG_FILENAME;
}

/**
 * Prints why the command failed and sets the process exit code.
 */
export function reportFailure(error: unknown, ux: CliUx): void {
  const stage = failingStage(error);
  if (stage) {
    ux.error(`Stage '${stage}' failed`);
  }

  const presenter = new ErrorPresenter({
    output: (line) => process.stderr.write(line + "\n"),
    debug: ux.currentLevel === "debug",
  });
  process.exitCode = presenter.present(error);
}
