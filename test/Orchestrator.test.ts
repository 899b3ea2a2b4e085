/**
 * Orchestrator passes against the built-in stages, with an in-process
 * adapter and cluster probe.
 *
 * @module
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";

import { DEFAULT_NODE_SELECTORS } from "../src/core/config/ConfigSchema.js";
import {
  CheckFailure,
  ConfigurationError,
  DependencyOrderError,
  PartialDestroyFailure,
  ProvisioningError,
} from "../src/core/errors/errors.js";
import { ErrorCode } from "../src/core/errors/ErrorCode.js";
import { Orchestrator, type DestroyConfirmation } from "../src/core/orchestrator/Orchestrator.js";
import { OutputStore } from "../src/core/outputs/OutputStore.js";
import { StageRegistry } from "../src/core/registry/StageRegistry.js";
import { everyVariant, UNSUPPORTED } from "../src/core/stages/variants.js";
import {
  KUBECONFIG,
  LOCAL_CLUSTER_OUTPUTS,
  MANAGED_CLUSTER_OUTPUTS,
  RecordingAdapter,
  StringOutput,
  StubProbe,
  createTempDir,
  pathExists,
  plainStage,
  removeTempDir,
} from "./helpers/stubs.js";
import { DO_CREDENTIALS, digitalOceanConfig, localConfig } from "./helpers/configs.js";

// =============================================================================
// Helpers
// =============================================================================

const INFRA = "02-infrastructure";
const KUBE_INIT = "03-kubernetes-initialize";

function localAdapter(): RecordingAdapter {
  return new RecordingAdapter({ [INFRA]: LOCAL_CLUSTER_OUTPUTS });
}

function orchestrator(
  adapter: RecordingAdapter,
  probe: StubProbe = new StubProbe(),
  env: Record<string, string> = {},
): Orchestrator {
  return new Orchestrator({ registry: StageRegistry.create(), adapter, probe, env });
}

async function listStored(rootDir: string): Promise<string[]> {
  return (await new OutputStore(rootDir).list()).sort();
}

async function destroyFailure(promise: Promise<unknown>): Promise<PartialDestroyFailure> {
  const error = await promise.then(
    () => undefined,
    (err: unknown) => err,
  );
  if (!(error instanceof PartialDestroyFailure)) {
    throw new Error(`expected PartialDestroyFailure, got ${String(error)}`);
  }
  return error;
}

// =============================================================================
// Tests
// =============================================================================

describe("Orchestrator", () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await createTempDir("clusterforge-orchestrator-");
  });

  afterEach(async () => {
    await removeTempDir(rootDir);
  });

  describe("deploy", () => {
    it("runs enabled stages in priority order and skips the state stage for local clusters", async () => {
      const adapter = localAdapter();
      const result = await orchestrator(adapter).deploy(localConfig(), { rootDir });

      expect(adapter.trace()).toEqual([
        `init:${INFRA}`,
        `validate:${INFRA}`,
        `apply:${INFRA}`,
        `init:${KUBE_INIT}`,
        `validate:${KUBE_INIT}`,
        `apply:${KUBE_INIT}`,
      ]);
      expect(result.stages.map((s) => [s.stage, s.state, s.resumed])).toEqual([
        ["bootstrap", "checked", false],
        ["01-terraform-state", "skipped", false],
        [INFRA, "checked", false],
        [KUBE_INIT, "checked", false],
      ]);
      expect(result.outputs.stages()).toEqual(["bootstrap", INFRA, KUBE_INIT]);
      expect(result.context.kind).toBe("deploy");
    });

    it("gives later stages the cluster credentials through their environment", async () => {
      const adapter = localAdapter();
      await orchestrator(adapter).deploy(localConfig(), { rootDir });

      const [infraApply] = adapter.callsOf("apply").filter((call) => call.stage === INFRA);
      const [initApply] = adapter.callsOf("apply").filter((call) => call.stage === KUBE_INIT);

      expect(infraApply.env).toEqual({});
      expect(initApply.env).toEqual({ KUBE_CONFIG_PATH: KUBECONFIG, KUBE_CTX: "kind-demo" });
      expect(initApply.inputVars).toEqual({
        name: "demo",
        environment: "dev",
        cloud_provider: "local",
        general_node_selector: { key: "kubernetes.io/os", value: "linux" },
        external_container_reg: { enabled: false },
      });
    });

    it("checks the cluster with the published kubeconfig", async () => {
      const probe = new StubProbe();
      await orchestrator(localAdapter(), probe).deploy(localConfig(), { rootDir });

      expect(probe.targets).toHaveLength(1);
      expect(probe.targets[0].kubeconfig).toBe(KUBECONFIG);
      expect(probe.targets[0].context).toBe("kind-demo");
    });

    it("persists outputs without sensitive fields", async () => {
      await orchestrator(localAdapter()).deploy(localConfig(), { rootDir });

      const stored = await new OutputStore(rootDir).read(INFRA);
      expect(stored?.provider).toBe("local");
      expect(stored?.omitted).toEqual(["kubernetes_credentials"]);
      expect(stored?.outputs).toEqual({
        kubeconfig_filename: KUBECONFIG,
        node_selectors: DEFAULT_NODE_SELECTORS,
      });
      expect(await listStored(rootDir)).toEqual(["bootstrap", INFRA, KUBE_INIT]);
    });

    it("writes rendered files into the project root", async () => {
      await orchestrator(localAdapter()).deploy(localConfig(), { rootDir });

      expect(await pathExists(path.join(rootDir, ".gitignore"))).toBe(true);
      expect(await pathExists(path.join(rootDir, "stages", INFRA, "local", "main.tf"))).toBe(true);
      expect(await pathExists(path.join(rootDir, "stages", "01-terraform-state"))).toBe(false);
    });

    it("leaves the project files alone when rendering is skipped", async () => {
      const adapter = localAdapter();
      await orchestrator(adapter).deploy(localConfig(), { rootDir, skipRender: true });

      expect(await pathExists(path.join(rootDir, ".gitignore"))).toBe(false);
      expect(await pathExists(path.join(rootDir, "stages"))).toBe(false);
      expect(adapter.callsOf("apply")).toHaveLength(2);
    });

    it("imports the state bucket and exposes Spaces keys under the AWS names", async () => {
      const adapter = new RecordingAdapter({ [INFRA]: MANAGED_CLUSTER_OUTPUTS });
      await orchestrator(adapter, new StubProbe(), DO_CREDENTIALS).deploy(digitalOceanConfig(), { rootDir });

      expect(adapter.trace()).toEqual([
        "init:01-terraform-state",
        "validate:01-terraform-state",
        "importState:01-terraform-state",
        "apply:01-terraform-state",
        `init:${INFRA}`,
        `validate:${INFRA}`,
        `apply:${INFRA}`,
        `init:${KUBE_INIT}`,
        `validate:${KUBE_INIT}`,
        `apply:${KUBE_INIT}`,
      ]);

      const [imports] = adapter.callsOf("importState");
      expect(imports.records).toEqual([
        {
          address: "module.terraform-state.module.spaces.digitalocean_spaces_bucket.main",
          id: "nyc3,demo-dev-terraform-state",
        },
      ]);

      const [infraApply] = adapter.callsOf("apply").filter((call) => call.stage === INFRA);
      expect(infraApply.env.AWS_ACCESS_KEY_ID).toBe("test-spaces-key");
      expect(infraApply.env.AWS_SECRET_ACCESS_KEY).toBe("test-spaces-secret");

      const [initApply] = adapter.callsOf("apply").filter((call) => call.stage === KUBE_INIT);
      expect(initApply.env.KUBE_HOST).toBe("https://cluster.example.test");
      expect(initApply.env.KUBE_TOKEN).toBe("test-token");
      expect(initApply.inputVars?.general_node_selector).toEqual({
        key: "doks.digitalocean.com/node-pool",
        value: "general",
      });
    });

    it("never writes cluster tokens to disk", async () => {
      const adapter = new RecordingAdapter({ [INFRA]: MANAGED_CLUSTER_OUTPUTS });
      await orchestrator(adapter, new StubProbe(), DO_CREDENTIALS).deploy(digitalOceanConfig(), { rootDir });

      const raw = await fs.readFile(new OutputStore(rootDir).getPath(INFRA), "utf-8");
      expect(raw).not.toContain("test-token");
    });

    it("halts at the first failing stage and keeps only completed stages", async () => {
      const failure = new ProvisioningError(`terraform apply failed for stage '${INFRA}'`, INFRA);
      const adapter = localAdapter().failOn("apply", INFRA, failure);

      await expect(orchestrator(adapter).deploy(localConfig(), { rootDir })).rejects.toBe(failure);

      expect(adapter.trace()).toEqual([`init:${INFRA}`, `validate:${INFRA}`, `apply:${INFRA}`]);
      expect(await listStored(rootDir)).toEqual(["bootstrap"]);
    });

    it("does not record a stage whose check failed", async () => {
      const adapter = localAdapter();
      const probe = new StubProbe(new Error("connection refused"));

      const error = await orchestrator(adapter, probe)
        .deploy(localConfig(), { rootDir })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(CheckFailure);
      expect(error).toMatchObject({
        code: ErrorCode.CHECK_FAILED,
        stage: INFRA,
        message: `Unable to connect to the Kubernetes cluster after stage '${INFRA}'`,
      });
      expect(await listStored(rootDir)).toEqual(["bootstrap"]);
      expect(adapter.callsOf("apply").map((call) => call.stage)).toEqual([INFRA]);
    });

    it("fails the check when the cluster lists no namespaces", async () => {
      await expect(
        orchestrator(localAdapter(), new StubProbe([])).deploy(localConfig(), { rootDir }),
      ).rejects.toThrow(`The Kubernetes cluster listed no namespaces after stage '${INFRA}'`);
    });

    it("removes staging directories after each stage", async () => {
      await orchestrator(localAdapter()).deploy(localConfig(), { rootDir });

      const staging = path.join(rootDir, ".clusterforge", ".staging");
      expect(await fs.readdir(staging)).toEqual([]);
    });
  });

  describe("resume", () => {
    it("re-reads outputs instead of applying completed stages, and checks again", async () => {
      await orchestrator(localAdapter()).deploy(localConfig(), { rootDir });

      const adapter = localAdapter();
      const probe = new StubProbe();
      const result = await orchestrator(adapter, probe).deploy(localConfig(), { rootDir, resume: true });

      expect(adapter.trace()).toEqual([
        `init:${INFRA}`,
        `output:${INFRA}`,
        `init:${KUBE_INIT}`,
        `output:${KUBE_INIT}`,
      ]);
      expect(probe.targets).toHaveLength(1);
      expect(result.stages.map((s) => [s.stage, s.state, s.resumed])).toEqual([
        ["bootstrap", "checked", true],
        ["01-terraform-state", "skipped", false],
        [INFRA, "checked", true],
        [KUBE_INIT, "checked", true],
      ]);
    });

    it("deploys stages an earlier run did not complete", async () => {
      const failing = localAdapter().failOn("apply", KUBE_INIT);
      await expect(orchestrator(failing).deploy(localConfig(), { rootDir })).rejects.toThrow();

      const adapter = localAdapter();
      await orchestrator(adapter).deploy(localConfig(), { rootDir, resume: true });

      expect(adapter.callsOf("apply").map((call) => call.stage)).toEqual([KUBE_INIT]);
      expect(adapter.callsOf("output").map((call) => call.stage)).toEqual([INFRA]);
    });

    it("deploys again when the recorded outputs belong to another provider", async () => {
      await new OutputStore(rootDir).write({ stage: INFRA, provider: "existing", outputs: {} });

      const adapter = localAdapter();
      await orchestrator(adapter).deploy(localConfig(), { rootDir, resume: true });

      expect(adapter.callsOf("apply").map((call) => call.stage)).toEqual([INFRA, KUBE_INIT]);
    });
  });

  describe("fail-fast validation", () => {
    it("rejects an invalid document before any stage runs", async () => {
      const adapter = localAdapter();

      await expect(
        orchestrator(adapter).deploy({ project_name: "demo", provider: "aws" }, { rootDir }),
      ).rejects.toBeInstanceOf(ConfigurationError);

      expect(adapter.calls).toEqual([]);
      expect(await fs.readdir(rootDir)).toEqual([]);
    });

    it("refuses to deploy when prevent_deploy is set", async () => {
      const adapter = localAdapter();

      await expect(
        orchestrator(adapter).deploy(localConfig({ prevent_deploy: true }), { rootDir }),
      ).rejects.toMatchObject({ code: ErrorCode.DEPLOY_PREVENTED });

      expect(adapter.calls).toEqual([]);
      expect(await fs.readdir(rootDir)).toEqual([]);
    });

    it("lists every missing credential", async () => {
      const adapter = localAdapter();

      await expect(orchestrator(adapter).deploy(digitalOceanConfig(), { rootDir })).rejects.toMatchObject({
        code: ErrorCode.CREDENTIALS_MISSING,
        details: {
          provider: "do",
          missing: ["DIGITALOCEAN_TOKEN", "SPACES_ACCESS_KEY_ID", "SPACES_SECRET_ACCESS_KEY"],
        },
      });
      expect(adapter.calls).toEqual([]);
    });

    it("rejects stages that read outputs of a later stage", async () => {
      const registry = StageRegistry.create({
        builtins: [
          plainStage("consumer", 10, { requires: [{ stage: "producer", field: "value" }] }),
          plainStage("producer", 20, { outputShape: { value: StringOutput } }),
        ],
      });
      const adapter = new RecordingAdapter();
      const runner = new Orchestrator({ registry, adapter, probe: new StubProbe() });

      await expect(runner.deploy({ project_name: "demo" }, { rootDir })).rejects.toBeInstanceOf(
        DependencyOrderError,
      );
      expect(adapter.calls).toEqual([]);
    });
  });

  describe("provider support", () => {
    const cloudOnly = plainStage("90-cloud-only", 90, { variants: { ...everyVariant({}), local: UNSUPPORTED } });

    function cloudOnlyOrchestrator(adapter: RecordingAdapter): Orchestrator {
      const registry = StageRegistry.create({ extensions: [cloudOnly] });
      return new Orchestrator({ registry, adapter, probe: new StubProbe() });
    }

    it("rejects the configuration when an enabled stage does not serve the provider", async () => {
      await expect(cloudOnlyOrchestrator(localAdapter()).validate(localConfig())).rejects.toMatchObject({
        code: ErrorCode.PROVIDER_UNSUPPORTED,
        message: "Stage '90-cloud-only' does not support provider 'local'",
      });
    });

    it("refuses to deploy before any stage is provisioned", async () => {
      const adapter = localAdapter();

      await expect(cloudOnlyOrchestrator(adapter).deploy(localConfig(), { rootDir })).rejects.toBeInstanceOf(
        ConfigurationError,
      );
      expect(adapter.calls).toEqual([]);
      expect(await listStored(rootDir)).toEqual([]);
    });

    it("ignores disabled stages that do not serve the provider", async () => {
      const result = await orchestrator(localAdapter()).validate(localConfig());

      expect(result.stages).toEqual(["bootstrap", INFRA, KUBE_INIT]);
    });
  });

  describe("destroy", () => {
    it("tears stages down in reverse order and reports each outcome", async () => {
      await orchestrator(localAdapter()).deploy(localConfig(), { rootDir });

      const adapter = localAdapter().failOn("destroy", INFRA, new Error("terraform destroy failed"));
      const failure = await destroyFailure(
        orchestrator(adapter).destroy(localConfig(), { rootDir, disablePrompt: true }),
      );

      expect(adapter.callsOf("destroy").map((call) => call.stage)).toEqual([KUBE_INIT, INFRA]);
      expect(failure.outcomes).toEqual([
        { stage: KUBE_INIT, success: true },
        { stage: INFRA, success: false, error: "terraform destroy failed" },
        { stage: "bootstrap", success: true },
      ]);
      expect(failure.message).toBe(`Failed to destroy 1 stage: ${INFRA}`);
      expect(await listStored(rootDir)).toEqual([INFRA]);
    });

    it("still destroys earlier provisioned stages when a middle stage fails", async () => {
      const adapter = new RecordingAdapter({ [INFRA]: MANAGED_CLUSTER_OUTPUTS }).failOn(
        "destroy",
        INFRA,
        new Error("terraform destroy failed"),
      );
      const failure = await destroyFailure(
        orchestrator(adapter, new StubProbe(), DO_CREDENTIALS).destroy(digitalOceanConfig(), {
          rootDir,
          disablePrompt: true,
        }),
      );

      expect(adapter.callsOf("destroy").map((call) => call.stage)).toEqual([
        KUBE_INIT,
        INFRA,
        "01-terraform-state",
      ]);
      expect(failure.outcomes).toEqual([
        { stage: KUBE_INIT, success: true },
        { stage: INFRA, success: false, error: "terraform destroy failed" },
        { stage: "01-terraform-state", success: true },
        { stage: "bootstrap", success: true },
      ]);
    });

    it("keeps tearing down when recorded outputs cannot be removed", async () => {
      const blocked = new OutputStore(rootDir).getPath(KUBE_INIT);
      await fs.mkdir(blocked, { recursive: true });
      await fs.writeFile(path.join(blocked, "keep"), "", "utf-8");

      const adapter = localAdapter();
      const result = await orchestrator(adapter).destroy(localConfig(), { rootDir, disablePrompt: true });

      expect(adapter.callsOf("destroy").map((call) => call.stage)).toEqual([KUBE_INIT, INFRA]);
      expect(result.status).toEqual({
        [KUBE_INIT]: "success",
        [INFRA]: "success",
        bootstrap: "success",
      });
    });

    it("tears later stages down with the credentials of earlier ones", async () => {
      const adapter = localAdapter();
      await orchestrator(adapter).destroy(localConfig(), { rootDir, disablePrompt: true });

      expect(adapter.trace()).toEqual([
        `init:${INFRA}`,
        `output:${INFRA}`,
        `init:${KUBE_INIT}`,
        `output:${KUBE_INIT}`,
        `destroy:${KUBE_INIT}`,
        `destroy:${INFRA}`,
      ]);
      const [initDestroy] = adapter.callsOf("destroy");
      expect(initDestroy.env).toEqual({ KUBE_CONFIG_PATH: KUBECONFIG, KUBE_CTX: "kind-demo" });
    });

    it("returns every stage's status and forgets their outputs", async () => {
      await orchestrator(localAdapter()).deploy(localConfig(), { rootDir });

      const result = await orchestrator(localAdapter()).destroy(localConfig(), { rootDir, disablePrompt: true });

      expect(result.status).toEqual({
        [KUBE_INIT]: "success",
        [INFRA]: "success",
        bootstrap: "success",
      });
      expect(result.stages.map((s) => [s.stage, s.state])).toEqual([
        ["bootstrap", "destroyed"],
        ["01-terraform-state", "skipped"],
        [INFRA, "destroyed"],
        [KUBE_INIT, "destroyed"],
      ]);
      expect(await listStored(rootDir)).toEqual([]);
    });

    it("asks for confirmation and aborts when declined", async () => {
      const adapter = localAdapter();
      const requests: DestroyConfirmation[] = [];

      await expect(
        orchestrator(adapter).destroy(localConfig(), {
          rootDir,
          confirm: async (request) => {
            requests.push(request);
            return false;
          },
        }),
      ).rejects.toMatchObject({ code: ErrorCode.DESTROY_ABORTED });

      expect(requests).toEqual([{ project: "demo", stages: ["bootstrap", INFRA, KUBE_INIT] }]);
      expect(adapter.calls).toEqual([]);
    });

    it("skips the confirmation when prompts are disabled", async () => {
      let asked = false;
      await orchestrator(localAdapter()).destroy(localConfig(), {
        rootDir,
        disablePrompt: true,
        confirm: async () => {
          asked = true;
          return false;
        },
      });

      expect(asked).toBe(false);
    });
  });

  describe("render", () => {
    it("writes every enabled stage's files without provisioning", async () => {
      const adapter = localAdapter();
      const outputDir = path.join(rootDir, "out");

      const result = await orchestrator(adapter).render(localConfig(), { rootDir, outputDir });

      expect(result.files).toEqual([
        ".gitignore",
        `stages/${INFRA}/local/labels.tf`,
        `stages/${INFRA}/local/main.tf`,
        `stages/${INFRA}/local/_clusterforge.tf.json`,
        `stages/${KUBE_INIT}/local/main.tf`,
        `stages/${KUBE_INIT}/local/variables.tf`,
        `stages/${KUBE_INIT}/local/_clusterforge.tf.json`,
      ]);
      expect(adapter.calls).toEqual([]);
    });

    it("fills templates with the project's values", async () => {
      await orchestrator(localAdapter()).render(localConfig(), { rootDir });

      const labels = await fs.readFile(path.join(rootDir, "stages", INFRA, "local", "labels.tf"), "utf-8");
      expect(labels.split("\n")).toContain('    project    = "demo"');
      expect(labels.split("\n")).toContain(`    stage      = "${INFRA}"`);
    });

    it("points local stages at state files under the project root", async () => {
      await orchestrator(localAdapter()).render(localConfig(), { rootDir });

      const settings = await fs.readFile(
        path.join(rootDir, "stages", INFRA, "local", "_clusterforge.tf.json"),
        "utf-8",
      );
      expect(JSON.parse(settings)).toEqual({
        terraform: {
          backend: { local: { path: path.join(rootDir, "state", INFRA, "terraform.tfstate") } },
        },
      });
    });
  });

  describe("validate", () => {
    it("lists the stages that would run", async () => {
      const result = await orchestrator(localAdapter()).validate(localConfig());

      expect(result.stages).toEqual(["bootstrap", INFRA, KUBE_INIT]);
      expect(result.config.namespace).toBe("dev");
      expect(result.context.kind).toBe("validate");
    });

    it("includes the state stage for cloud providers", async () => {
      const result = await orchestrator(localAdapter()).validate(digitalOceanConfig());

      expect(result.stages).toEqual(["bootstrap", "01-terraform-state", INFRA, KUBE_INIT]);
    });
  });
});

