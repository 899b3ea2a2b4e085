/**
 * `validate` CLI command.
 *
 * Usage:
 *   clusterforge validate [--config <path>]
 *
 * Runs the configuration checks every pass starts with and touches nothing.
 *
 * @module
 */

import { Command } from "commander";
import { createDefaultDependencies, type DependencyFactory } from "../handlers/dependencies.js";
import { formatValidateOutput, handleValidate } from "../handlers/validateHandler.js";
import { CONFIG_DESCRIPTION, CONFIG_FLAGS, configPathOf, reportFailure, uxFor } from "./shared.js";

interface ValidateFlags {
  readonly config?: string;
}

export function buildValidateCommand(
  createDependencies: DependencyFactory = createDefaultDependencies,
): Command {
  return new Command("validate")
    .description("Validate the configuration file")
    .option(CONFIG_FLAGS, CONFIG_DESCRIPTION)
    .action(async (flags: ValidateFlags, command: Command) => {
      const ux = uxFor(command);

      try {
        const deps = await createDependencies(ux.currentLevel);
        const [first, ...rest] = formatValidateOutput(await handleValidate({ configPath: configPathOf(flags.config) }, deps));
        ux.success(first);
        for (const line of rest) {
          ux.line(line);
        }
      } catch (error) {
        reportFailure(error, ux);
      }
    });
}
