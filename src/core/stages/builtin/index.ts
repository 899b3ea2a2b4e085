import type { StageDefinition } from "../Stage.js";
import { bootstrapStage } from "./bootstrap.js";
import { infrastructureStage } from "./infrastructure.js";
import { kubernetesInitializeStage } from "./kubernetesInitialize.js";
import { terraformStateStage } from "./terraformState.js";

/** Stages every run starts from, in registration order. */
export const BUILTIN_STAGES: readonly StageDefinition[] = [
  bootstrapStage,
  terraformStateStage,
  infrastructureStage,
  kubernetesInitializeStage,
];

export { BOOTSTRAP_STAGE } from "./bootstrap.js";
export { TERRAFORM_STATE_STAGE } from "./terraformState.js";
export { INFRASTRUCTURE_STAGE } from "./infrastructure.js";
export { KUBERNETES_INITIALIZE_STAGE } from "./kubernetesInitialize.js";
