/**
 * `deploy` CLI command.
 *
 * Usage:
 *   clusterforge deploy [--config <path>] [--resume] [--dry-run] [--disable-render]
 *
 * Examples:
 *   clusterforge deploy
 *   clusterforge deploy -c envs/staging/clusterforge-config.yaml --resume
 *   clusterforge deploy --dry-run
 *
 * @module
 */

import { Command } from "commander";
import { createDefaultDependencies, type DependencyFactory } from "../handlers/dependencies.js";
import { formatDeploySummary, handleDeploy } from "../handlers/deployHandler.js";
import { formatRenderPreview } from "../printers/RenderPreviewPrinter.js";
import { createCliSpinner } from "../ux/CliSpinner.js";
import { CONFIG_DESCRIPTION, CONFIG_FLAGS, configPathOf, reportFailure, uxFor } from "./shared.js";

interface DeployFlags {
  readonly config?: string;
  readonly resume: boolean;
  readonly dryRun: boolean;
  readonly disableRender: boolean;
}

export function buildDeployCommand(
  createDependencies: DependencyFactory = createDefaultDependencies,
): Command {
  return new Command("deploy")
    .description("Provision every stage in priority order")
    .option(CONFIG_FLAGS, CONFIG_DESCRIPTION)
    .option("--resume", "Skip stages an earlier run completed", false)
    .option("--dry-run", "Render the stage files without provisioning anything", false)
    .option("--disable-render", "Deploy without rewriting the rendered files in the project", false)
    .action(async (flags: DeployFlags, command: Command) => {
      const ux = uxFor(command);
      const spinner = createCliSpinner({ ux });

      try {
        const deps = await createDependencies(ux.currentLevel);
        const input = {
          configPath: configPathOf(flags.config),
          resume: flags.resume,
          dryRun: flags.dryRun,
          skipRender: flags.disableRender,
        };

        const outcome = flags.dryRun
          ? await handleDeploy(input, deps)
          : await spinner.wrap("Deploying stages", () => handleDeploy(input, deps), "Deployment complete");

        if (outcome.kind === "rendered") {
          for (const line of formatRenderPreview(outcome.result.files, outcome.rootDir, { dryRun: true })) {
            ux.line(line);
          }
          return;
        }

        for (const line of formatDeploySummary(outcome.result)) {
          ux.verbose(line);
        }
        ux.success(`Deployed ${outcome.result.outputs.size} stage(s)`, {
          project: outcome.rootDir,
          run: outcome.result.context.correlationId,
        });
      } catch (error) {
        reportFailure(error, ux);
      }
    });
}
