/**
 * `02-infrastructure` - the Kubernetes cluster.
 *
 * Cloud variants provision a managed cluster; `local` and `existing` point
 * at a cluster that is already running. Every variant publishes:
 *
 * - `kubernetes_credentials`: enough to reach the API server (sensitive,
 *   never persisted)
 * - `kubeconfig_filename`: a kubeconfig for the cluster
 * - `node_selectors`: how workloads target the general/user/worker groups
 *
 * Later stages run with the credentials exposed as `KUBE_*` variables.
 *
 * @module
 */

import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import {
  DEFAULT_NODE_SELECTORS,
  NODE_GROUP_NAMES,
  NodeSelectorsSchema,
  ProviderSectionsShape,
  requireSection,
  type ForgeConfig,
  type NodeSelectors,
} from "../../config/ConfigSchema.js";
import { requireCredential } from "../../config/credentials.js";
import type { EnvironmentScope } from "../../env/EnvironmentScope.js";
import { CheckFailure } from "../../errors/errors.js";
import type { StageOutputs } from "../../outputs/StageOutputs.js";
import {
  AZURE_NODE_RESOURCE_GROUP_SUFFIX,
  azureResourceGroup,
} from "../../provisioning/terraformSettings.js";
import type { StageDefinition, StageYield } from "../Stage.js";
import { TerraformStage, type TerraformVariant } from "../TerraformStage.js";
import type { VariantTable } from "../variants.js";

export const INFRASTRUCTURE_STAGE = "02-infrastructure";

// =============================================================================
// Outputs
// =============================================================================

export const KubernetesCredentialsSchema = z.object({
  host: z.string().optional(),
  cluster_ca_certificate: z.string().optional(),
  token: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  client_certificate: z.string().optional(),
  client_key: z.string().optional(),
  config_path: z.string().optional(),
  config_context: z.string().optional(),
});

export type KubernetesCredentials = z.infer<typeof KubernetesCredentialsSchema>;

/**
 * Exposes credentials the way the Kubernetes and Helm Terraform providers
 * read them.
 */
export function kubernetesEnvironment(credentials: KubernetesCredentials): Record<string, string | undefined> {
  return {
    KUBE_CONFIG_PATH: credentials.config_path,
    KUBE_CTX: credentials.config_context,
    KUBE_USER: credentials.username,
    KUBE_PASSWORD: credentials.password,
    KUBE_CLIENT_CERT_DATA: credentials.client_certificate,
    KUBE_CLIENT_KEY_DATA: credentials.client_key,
    KUBE_CLUSTER_CA_CERT_DATA: credentials.cluster_ca_certificate,
    KUBE_HOST: credentials.host,
    KUBE_TOKEN: credentials.token,
  };
}

// =============================================================================
// Node selectors
// =============================================================================

const NODE_POOL_LABELS = {
  do: "doks.digitalocean.com/node-pool",
  aws: "eks.amazonaws.com/nodegroup",
  gcp: "cloud.google.com/gke-nodepool",
  azure: "azure-node-pool",
} as const;

/**
 * Selectors for the node groups, known only from configuration: cloud
 * clusters label nodes with their pool name, while local and existing
 * clusters use what the user configured.
 */
export function nodeSelectors(config: ForgeConfig): NodeSelectors {
  switch (config.provider) {
    case "local":
      return config.local?.node_selectors ?? DEFAULT_NODE_SELECTORS;
    case "existing":
      return requireSection(config.existing, "existing").node_selectors;
    case "do":
    case "aws":
    case "gcp":
    case "azure": {
      const key = NODE_POOL_LABELS[config.provider];
      return Object.fromEntries(NODE_GROUP_NAMES.map((group) => [group, { key, value: group }]));
    }
  }
}

// =============================================================================
// Variants
// =============================================================================

export function kubeconfigFilename(): string {
  return path.join(os.tmpdir(), "CLUSTERFORGE_KUBECONFIG");
}

/** Azure resource names may not contain dashes. */
function escapedProjectName(config: ForgeConfig): string {
  return config.provider === "azure" ? config.project_name.replace(/-/g, "") : config.project_name;
}

const local: TerraformVariant = {
  inputVars: (config) => ({
    kubeconfig_filename: kubeconfigFilename(),
    kube_context: config.local?.kube_context ?? null,
  }),
};

const existing: TerraformVariant = {
  inputVars: (config) => ({
    kube_context: requireSection(config.existing, "existing").kube_context,
  }),
};

const digitalOcean: TerraformVariant = {
  inputVars: (config) => {
    const section = requireSection(config.digital_ocean, "do");
    return {
      name: escapedProjectName(config),
      environment: config.namespace,
      region: section.region,
      tags: section.tags,
      kubernetes_version: section.kubernetes_version,
      node_groups: section.node_groups,
      kubeconfig_filename: kubeconfigFilename(),
    };
  },
};

const aws: TerraformVariant = {
  inputVars: (config) => {
    const section = requireSection(config.amazon_web_services, "aws");
    return {
      name: escapedProjectName(config),
      environment: config.namespace,
      existing_subnet_ids: section.existing_subnet_ids ?? null,
      existing_security_group_id: section.existing_security_group_id ?? null,
      region: section.region,
      kubernetes_version: section.kubernetes_version,
      node_groups: Object.entries(section.node_groups).map(([name, group]) => ({
        name,
        instance_type: group.instance,
        gpu: group.gpu,
        min_size: group.min_nodes,
        desired_size: group.min_nodes,
        max_size: group.max_nodes,
        single_subnet: group.single_subnet,
        permissions_boundary: group.permissions_boundary ?? null,
      })),
      availability_zones: section.availability_zones,
      vpc_cidr_block: section.vpc_cidr_block,
      permissions_boundary: section.permissions_boundary ?? null,
      kubeconfig_filename: kubeconfigFilename(),
      tags: section.tags,
    };
  },
  providers: (config) => ({ aws: { region: requireSection(config.amazon_web_services, "aws").region } }),
};

const gcp: TerraformVariant = {
  inputVars: (config) => {
    const section = requireSection(config.google_cloud_platform, "gcp");
    return {
      name: escapedProjectName(config),
      environment: config.namespace,
      region: section.region,
      project_id: section.project,
      availability_zones: section.availability_zones,
      node_groups: Object.entries(section.node_groups).map(([name, group]) => ({
        name,
        instance_type: group.instance,
        min_size: group.min_nodes,
        max_size: group.max_nodes,
        labels: group.labels,
        preemptible: group.preemptible,
      })),
      kubeconfig_filename: kubeconfigFilename(),
      tags: section.tags,
      kubernetes_version: section.kubernetes_version,
      release_channel: section.release_channel,
      networking_mode: section.networking_mode,
      network: section.network,
      subnetwork: section.subnetwork ?? null,
    };
  },
  providers: (config) => {
    const section = requireSection(config.google_cloud_platform, "gcp");
    return { google: { project: section.project, region: section.region } };
  },
};

const azure: TerraformVariant = {
  inputVars: (config) => {
    const section = requireSection(config.azure, "azure");
    return {
      name: escapedProjectName(config),
      environment: config.namespace,
      region: section.region,
      kubeconfig_filename: kubeconfigFilename(),
      kubernetes_version: section.kubernetes_version,
      node_groups: Object.fromEntries(
        Object.entries(section.node_groups).map(([name, group]) => [
          name,
          { instance: group.instance, min_nodes: group.min_nodes, max_nodes: group.max_nodes },
        ]),
      ),
      resource_group_name: azureResourceGroup(config, section.resource_group_name),
      node_resource_group_name: azureResourceGroup(config, section.resource_group_name, AZURE_NODE_RESOURCE_GROUP_SUFFIX),
      vnet_subnet_id: section.vnet_subnet_id ?? null,
      private_cluster_enabled: section.private_cluster_enabled,
      tags: section.tags,
      max_pods: section.max_pods ?? null,
    };
  },
  stateImports: (config, scope) => {
    const section = requireSection(config.azure, "azure");
    if (section.resource_group_name === undefined) {
      return [];
    }
    const subscriptionId = requireCredential(scope.variables(), "ARM_SUBSCRIPTION_ID", "azure");
    return [
      {
        address: "azurerm_resource_group.resource_group",
        id: `/subscriptions/${subscriptionId}/resourceGroups/${azureResourceGroup(config, section.resource_group_name)}`,
      },
    ];
  },
};

const VARIANTS: VariantTable<TerraformVariant> = {
  local,
  existing,
  do: digitalOcean,
  aws,
  gcp,
  azure,
};

// =============================================================================
// Stage
// =============================================================================

const OUTPUT_SHAPE = {
  node_selectors: NodeSelectorsSchema,
  kubernetes_credentials: KubernetesCredentialsSchema,
  kubeconfig_filename: z.string(),
};

const OutputSchema = z.object(OUTPUT_SHAPE);

class InfrastructureStage extends TerraformStage {
  protected override completeOutputs(values: Record<string, unknown>): Record<string, unknown> {
    return { ...values, node_selectors: nodeSelectors(this.config) };
  }

  override extendScope(outputs: StageOutputs, scope: EnvironmentScope): EnvironmentScope {
    const { kubernetes_credentials } = this.published(outputs);
    return scope.extend(this.name, kubernetesEnvironment(kubernetes_credentials));
  }

  /**
   * The cluster must answer and list at least one namespace.
   */
  override async check(run: StageYield): Promise<void> {
    const published = this.published(run.outputs);
    const credentials = published.kubernetes_credentials;

    let namespaces: string[];
    try {
      namespaces = await this.init.probe.listNamespaces({
        kubeconfig: credentials.config_path ?? published.kubeconfig_filename,
        context: credentials.config_context,
        env: run.scope.variables(),
      });
    } catch (error) {
      throw new CheckFailure(`Unable to connect to the Kubernetes cluster after stage '${this.name}'`, this.name, {
        cause: error,
        hint: "Check that the cluster is running and the kubeconfig points at it.",
      });
    }

    if (namespaces.length === 0) {
      throw new CheckFailure(`The Kubernetes cluster listed no namespaces after stage '${this.name}'`, this.name);
    }
    this.logger.info("Kubernetes cluster reachable", { namespaces: namespaces.length });
  }

  private published(outputs: StageOutputs): z.infer<typeof OutputSchema> {
    return OutputSchema.parse(outputs.get(this.name) ?? {});
  }
}

export const infrastructureStage: StageDefinition = {
  name: INFRASTRUCTURE_STAGE,
  priority: 20,
  inputShape: ProviderSectionsShape,
  outputShape: OUTPUT_SHAPE,
  requires: [],
  rules: [],
  sensitiveOutputs: ["kubernetes_credentials"],
  variants: VARIANTS,
  create: (init) => new InfrastructureStage(infrastructureStage, init, VARIANTS),
};

