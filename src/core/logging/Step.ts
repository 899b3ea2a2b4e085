/**
 * Orchestration step identifiers for structured logging.
 *
 * Steps follow a dotted naming convention: `<domain>.<action>`.
 *
 * @module
 */

export const Step = {
  /** Union schema, field rules, version marker and dependency graph */
  CONFIG_VALIDATE: "config.validate",

  STAGE_RENDER: "stage.render",

  STAGE_DEPLOY: "stage.deploy",
  STAGE_CHECK: "stage.check",

  /** Re-fetching outputs of a stage completed by an earlier run */
  STAGE_RESUME: "stage.resume",

  STAGE_DESTROY: "stage.destroy",

  /** Persisting a stage's outputs */
  OUTPUTS_WRITE: "outputs.write",

  DONE: "done",
} as const;

export type Step = (typeof Step)[keyof typeof Step];
