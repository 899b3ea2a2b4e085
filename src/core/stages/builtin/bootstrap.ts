/**
 * `bootstrap` - project files that belong next to the configuration.
 *
 * Provisions nothing; renders the project's `.gitignore` so local state,
 * scratch directories and generated variable files stay out of version
 * control.
 *
 * @module
 */

import { METADATA_DIR } from "../../outputs/OutputStore.js";
import { TFVARS_FILENAME } from "../../provisioning/TerraformAdapter.js";
import type { RenderedFiles } from "../../render/TemplateRenderer.js";
import { STATE_DIR } from "../../utils/paths.js";
import { Stage, type StageDefinition } from "../Stage.js";
import { everyVariant } from "../variants.js";

export const BOOTSTRAP_STAGE = "bootstrap";

const GITIGNORE_ENTRIES = [
  "# clusterforge",
  `${METADATA_DIR}/`,
  `${STATE_DIR}/`,
  "**/.terraform/",
  "**/.terraform.lock.hcl",
  `**/${TFVARS_FILENAME}`,
];

class BootstrapStage extends Stage {
  override async render(): Promise<RenderedFiles> {
    return { ".gitignore": GITIGNORE_ENTRIES.join("\n") + "\n" };
  }
}

export const bootstrapStage: StageDefinition = {
  name: BOOTSTRAP_STAGE,
  priority: 0,
  inputShape: {},
  outputShape: {},
  requires: [],
  rules: [],
  sensitiveOutputs: [],
  variants: everyVariant({}),
  create: (init) => new BootstrapStage(bootstrapStage, init),
};
