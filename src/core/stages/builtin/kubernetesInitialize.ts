/**
 * `03-kubernetes-initialize` - cluster-wide bootstrap inside the new cluster.
 *
 * Runs against the cluster `02-infrastructure` produced, reaching it through
 * the `KUBE_*` variables that stage put in scope, and pins cluster services
 * to the general node group it published.
 *
 * @module
 */

import { z } from "zod";
import { requireSection, SectionFields, type ForgeConfig } from "../../config/ConfigSchema.js";
import type { StageOutputs } from "../../outputs/StageOutputs.js";
import { requiredWhen } from "../../schema/constraints.js";
import type { StageDefinition } from "../Stage.js";
import { TerraformStage, type TerraformVariant } from "../TerraformStage.js";
import type { VariantTable } from "../variants.js";
import { INFRASTRUCTURE_STAGE } from "./infrastructure.js";

export const KUBERNETES_INITIALIZE_STAGE = "03-kubernetes-initialize";

const GeneralSelectorSchema = z.object({
  general: z.object({ key: z.string(), value: z.string() }),
});

function baseInputVars(config: ForgeConfig, outputs: StageOutputs): Record<string, unknown> {
  const selectors = GeneralSelectorSchema.parse(outputs.require(INFRASTRUCTURE_STAGE, "node_selectors"));
  const registry = config.external_container_reg;

  return {
    name: config.project_name,
    environment: config.namespace,
    cloud_provider: config.provider,
    general_node_selector: selectors.general,
    external_container_reg: registry.enabled ? { enabled: true, url: registry.url ?? null } : { enabled: false },
  };
}

const shared: TerraformVariant = { inputVars: baseInputVars };

const aws: TerraformVariant = {
  inputVars: (config, outputs) => {
    const section = requireSection(config.amazon_web_services, "aws");
    return {
      ...baseInputVars(config, outputs),
      aws_region: section.region,
      gpu_node_group_names: Object.entries(section.node_groups)
        .filter(([, group]) => group.gpu)
        .map(([name]) => name),
    };
  },
};

const VARIANTS: VariantTable<TerraformVariant> = {
  local: shared,
  existing: shared,
  do: shared,
  aws,
  gcp: shared,
  azure: shared,
};

class KubernetesInitializeStage extends TerraformStage {}

export const kubernetesInitializeStage: StageDefinition = {
  name: KUBERNETES_INITIALIZE_STAGE,
  priority: 30,
  inputShape: { external_container_reg: SectionFields.external_container_reg },
  outputShape: {},
  requires: [{ stage: INFRASTRUCTURE_STAGE, field: "node_selectors" }],
  rules: [requiredWhen("external_container_reg.url", { field: "external_container_reg.enabled", equals: true })],
  sensitiveOutputs: [],
  variants: VARIANTS,
  create: (init) => new KubernetesInitializeStage(kubernetesInitializeStage, init, VARIANTS),
};
