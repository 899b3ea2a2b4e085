/**
 * In-process stand-ins for the provisioning tool and the cluster.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import type { ClusterProbe, ClusterTarget } from "../../src/core/cluster/ClusterProbe.js";
import { createSilentLogger } from "../../src/core/logging/ContextualLogger.js";
import type {
  AdapterInvocation,
  AdapterVarsInvocation,
  OutputVariables,
  ProvisioningAdapter,
  StateImportRecord,
} from "../../src/core/provisioning/ProvisioningAdapter.js";
import { StageRegistry } from "../../src/core/registry/StageRegistry.js";
import { Stage, type StageDefinition, type OutputReference } from "../../src/core/stages/Stage.js";
import { everyVariant } from "../../src/core/stages/variants.js";
import type { CommandDependencies } from "../../src/cli/handlers/dependencies.js";

// =============================================================================
// Adapter
// =============================================================================

export type AdapterMethod = "init" | "validate" | "importState" | "apply" | "output" | "destroy";

export interface AdapterCall {
  readonly method: AdapterMethod;
  readonly stage: string;
  readonly env: Readonly<Record<string, string>>;
  readonly inputVars?: Readonly<Record<string, unknown>>;
  readonly records?: readonly StateImportRecord[];
}

/**
 * Records every call; `apply` and `output` answer with the outputs configured
 * for the stage. A failure registered for `method:stage` is thrown instead.
 */
export class RecordingAdapter implements ProvisioningAdapter {
  readonly calls: AdapterCall[] = [];
  private readonly failures = new Map<string, Error>();

  constructor(private readonly outputs: Readonly<Record<string, OutputVariables>> = {}) {}

  failOn(method: AdapterMethod, stage: string, error: Error = new Error(`${method} failed for ${stage}`)): this {
    this.failures.set(`${method}:${stage}`, error);
    return this;
  }

  /** `method:stage` for every call, in order. */
  trace(): string[] {
    return this.calls.map((call) => `${call.method}:${call.stage}`);
  }

  callsOf(method: AdapterMethod): AdapterCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  async init(invocation: AdapterInvocation): Promise<void> {
    this.record({ method: "init", stage: invocation.stage, env: invocation.env });
  }

  async validate(invocation: AdapterInvocation): Promise<void> {
    this.record({ method: "validate", stage: invocation.stage, env: invocation.env });
  }

  async importState(
    invocation: AdapterVarsInvocation & { readonly records: readonly StateImportRecord[] },
  ): Promise<string[]> {
    this.record({
      method: "importState",
      stage: invocation.stage,
      env: invocation.env,
      inputVars: invocation.inputVars,
      records: invocation.records,
    });
    return invocation.records.map((record) => record.address);
  }

  async apply(invocation: AdapterVarsInvocation): Promise<OutputVariables> {
    this.record({ method: "apply", stage: invocation.stage, env: invocation.env, inputVars: invocation.inputVars });
    return { ...(this.outputs[invocation.stage] ?? {}) };
  }

  async output(invocation: AdapterInvocation): Promise<OutputVariables> {
    this.record({ method: "output", stage: invocation.stage, env: invocation.env });
    return { ...(this.outputs[invocation.stage] ?? {}) };
  }

  async destroy(invocation: AdapterVarsInvocation): Promise<void> {
    this.record({ method: "destroy", stage: invocation.stage, env: invocation.env, inputVars: invocation.inputVars });
  }

  private record(call: AdapterCall): void {
    this.calls.push(call);
    const failure = this.failures.get(`${call.method}:${call.stage}`);
    if (failure) {
      throw failure;
    }
  }
}

// =============================================================================
// Probe
// =============================================================================

export class StubProbe implements ClusterProbe {
  readonly targets: ClusterTarget[] = [];

  constructor(private readonly answer: string[] | Error = ["default", "kube-system"]) {}

  async listNamespaces(target: ClusterTarget): Promise<string[]> {
    this.targets.push(target);
    if (this.answer instanceof Error) {
      throw this.answer;
    }
    return [...this.answer];
  }
}

// =============================================================================
// Outputs
// =============================================================================

export const KUBECONFIG = "/tmp/clusterforge-test/kubeconfig";

/** What the local cluster templates report after an apply. */
export const LOCAL_CLUSTER_OUTPUTS: OutputVariables = {
  kubernetes_credentials: { config_path: KUBECONFIG, config_context: "kind-demo" },
  kubeconfig_filename: KUBECONFIG,
};

/** What a managed cluster's templates report after an apply. */
export const MANAGED_CLUSTER_OUTPUTS: OutputVariables = {
  kubernetes_credentials: {
    host: "https://cluster.example.test",
    cluster_ca_certificate: "test-ca",
    token: "test-token",
  },
  kubeconfig_filename: KUBECONFIG,
};

// =============================================================================
// Plain stages
// =============================================================================

class PlainStage extends Stage {}

export interface PlainStageOptions {
  readonly outputShape?: StageDefinition["outputShape"];
  readonly requires?: readonly OutputReference[];
  readonly inputShape?: StageDefinition["inputShape"];
  readonly variants?: StageDefinition["variants"];
}

/**
 * A stage with no provisioning, for registry and ordering tests.
 */
export function plainStage(name: string, priority: number, options: PlainStageOptions = {}): StageDefinition {
  const definition: StageDefinition = {
    name,
    priority,
    inputShape: options.inputShape ?? {},
    outputShape: options.outputShape ?? {},
    requires: options.requires ?? [],
    rules: [],
    sensitiveOutputs: [],
    variants: options.variants ?? everyVariant({}),
    create: (init) => new PlainStage(definition, init),
  };
  return definition;
}

export const StringOutput = z.string();

// =============================================================================
// Workspace
// =============================================================================

export async function createTempDir(prefix = "clusterforge-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export function testDependencies(
  adapter: ProvisioningAdapter,
  probe: ClusterProbe = new StubProbe(),
  env: Record<string, string> = {},
): CommandDependencies {
  return {
    registry: StageRegistry.create(),
    adapter,
    probe,
    logger: createSilentLogger(),
    env,
  };
}
