#!/usr/bin/env node
import { Command } from "commander";
import { ORCHESTRATOR_VERSION } from "../core/version.js";
import { buildDeployCommand } from "./commands/deploy.js";
import { buildDestroyCommand } from "./commands/destroy.js";
import { buildRenderCommand } from "./commands/render.js";
import { reportFailure } from "./commands/shared.js";
import { buildValidateCommand } from "./commands/validate.js";
import { getCliUx } from "./ux/CliUx.js";

function buildProgram(): Command {
  return new Command()
    .name("clusterforge")
    .description("clusterforge - provision Kubernetes environments stage by stage")
    .version(ORCHESTRATOR_VERSION)
    .option("--verbose", "Show stage states and structured info logs", false)
    .option("--debug", "Show debug logs, stack traces and causes", false)
    .option("--silent", "Suppress all output except errors", false)
    .addCommand(buildDeployCommand())
    .addCommand(buildDestroyCommand())
    .addCommand(buildRenderCommand())
    .addCommand(buildValidateCommand());
}

async function main(): Promise<void> {
  try {
    await buildProgram().parseAsync(process.argv);
  } catch (error) {
    reportFailure(error, getCliUx());
  }
}

void main();
