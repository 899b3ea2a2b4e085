/**
 * Cluster Probe - minimal reachability checks against a Kubernetes cluster.
 *
 * Used by post-deploy checks. The kubectl implementation shells out through
 * execa with the run's explicit environment; tests substitute a stub.
 *
 * @module
 */

import { execa } from "execa";
import { z } from "zod";

export interface ClusterTarget {
  /** Path to a kubeconfig file */
  readonly kubeconfig?: string;

  /** Context inside the kubeconfig */
  readonly context?: string;

  /** Complete environment for the child process */
  readonly env: Readonly<Record<string, string>>;
}

export interface ClusterProbe {
  /**
   * Names of the cluster's namespaces.
   *
   * @throws Error when the cluster cannot be reached
   */
  listNamespaces(target: ClusterTarget): Promise<string[]>;
}

const NamespaceListSchema = z.object({
  items: z.array(
    z.object({
      metadata: z.object({ name: z.string() }),
    }),
  ),
});

export class KubectlProbe implements ClusterProbe {
  constructor(
    private readonly binary = "kubectl",
    private readonly timeoutMs = 60_000,
  ) {}

  async listNamespaces(target: ClusterTarget): Promise<string[]> {
    const args = ["get", "namespaces", "-o", "json"];
    if (target.kubeconfig) args.push("--kubeconfig", target.kubeconfig);
    if (target.context) args.push("--context", target.context);

    const result = await execa(this.binary, args, {
      env: { ...target.env },
      extendEnv: false,
      reject: false,
      timeout: this.timeoutMs,
    });

    if (result.failed) {
      const reason = result.stderr.trim() || (result.message ?? "");
      throw new Error(`kubectl could not list namespaces: ${reason}`);
    }

    const parsed = NamespaceListSchema.safeParse(JSON.parse(result.stdout));
    if (!parsed.success) {
      throw new Error("kubectl returned an unexpected namespace list");
    }
    return parsed.data.items.map((item) => item.metadata.name);
  }
}
