/**
 * Configuration document schema.
 *
 * The document is a flat set of top-level sections. The global fields below
 * belong to the orchestrator itself; every other section is owned by one or
 * more stages, which expose it through their input schema. The registry
 * assembles the strict union that validates a whole document.
 *
 * @module
 */

import { z } from "zod";
import { ConfigurationError } from "../errors/errors.js";
import { forbiddenUnless, oneOf, pattern, range, requiredWhen, type FieldRule } from "../schema/constraints.js";
import { ORCHESTRATOR_VERSION } from "../version.js";

// =============================================================================
// Provider Variants
// =============================================================================

export const PROVIDER_VARIANTS = ["local", "existing", "do", "aws", "gcp", "azure"] as const;

export const ProviderVariantSchema = oneOf(PROVIDER_VARIANTS);

export type ProviderVariant = z.infer<typeof ProviderVariantSchema>;

/** Cloud providers, i.e. the variants that provision their own cluster. */
export const CLOUD_PROVIDERS = ["do", "aws", "gcp", "azure"] as const satisfies readonly ProviderVariant[];

export type CloudProvider = (typeof CLOUD_PROVIDERS)[number];

export function isCloudProvider(provider: ProviderVariant): provider is CloudProvider {
  return CLOUD_PROVIDERS.some((p) => p === provider);
}

// =============================================================================
// Global Fields
// =============================================================================

export const PROJECT_NAME_REGEX = /^[A-Za-z][A-Za-z0-9\-_]{1,14}[A-Za-z0-9]$/;
export const NAMESPACE_REGEX = /^[A-Za-z][A-Za-z\-_]*[A-Za-z]$/;

export const GlobalConfigSchema = z.strictObject({
  project_name: pattern(
    PROJECT_NAME_REGEX,
    "must start with a letter, be 3-16 characters long and contain only letters, digits, '-' and '_'",
  ),
  namespace: pattern(NAMESPACE_REGEX, "must contain only letters, '-' and '_' and start and end with a letter").default(
    "dev",
  ),
  provider: ProviderVariantSchema.default("local"),
  clusterforge_version: z.string().default(ORCHESTRATOR_VERSION),
  prevent_deploy: z.boolean().default(false),
});

// =============================================================================
// Shared Records
// =============================================================================

export const NodeSelectorSchema = z.strictObject({
  key: z.string().min(1),
  value: z.string().min(1),
});

export const NodeSelectorsSchema = z.record(z.string(), NodeSelectorSchema);

export type NodeSelectors = z.infer<typeof NodeSelectorsSchema>;

/** Node groups every cluster is expected to expose. */
export const NODE_GROUP_NAMES = ["general", "user", "worker"] as const;

export const DEFAULT_NODE_SELECTORS: NodeSelectors = Object.fromEntries(
  NODE_GROUP_NAMES.map((group) => [group, { key: "kubernetes.io/os", value: "linux" }]),
);

const NODE_GROUP_SHAPE = {
  instance: z.string().min(1),
  min_nodes: range(0, 100).default(0),
  max_nodes: range(1, 100).default(1),
};

function nodeGroupBounds(group: { min_nodes: number; max_nodes: number }): boolean {
  return group.min_nodes <= group.max_nodes;
}

const NODE_GROUP_BOUNDS_MESSAGE = { message: "min_nodes must not exceed max_nodes" };

export const NodeGroupSchema = z.strictObject(NODE_GROUP_SHAPE).refine(nodeGroupBounds, NODE_GROUP_BOUNDS_MESSAGE);

// =============================================================================
// Stage Sections
// =============================================================================

export const TerraformStateSchema = z.strictObject({
  type: oneOf(["remote", "local", "existing"]).default("remote"),
  backend: z.string().optional(),
  config: z.record(z.string(), z.string()).default({}),
});

export const LocalProviderSchema = z.strictObject({
  kube_context: z.string().optional(),
  node_selectors: NodeSelectorsSchema.default(DEFAULT_NODE_SELECTORS),
});

export const ExistingProviderSchema = z.strictObject({
  kube_context: z.string().min(1),
  node_selectors: NodeSelectorsSchema.default(DEFAULT_NODE_SELECTORS),
});

export const DigitalOceanProviderSchema = z.strictObject({
  region: z.string().min(1),
  kubernetes_version: z.string().min(1),
  tags: z.array(z.string()).default([]),
  node_groups: z.record(z.string(), NodeGroupSchema),
});

export const AwsNodeGroupSchema = z
  .strictObject({
    ...NODE_GROUP_SHAPE,
    gpu: z.boolean().default(false),
    single_subnet: z.boolean().default(false),
    permissions_boundary: z.string().optional(),
  })
  .refine(nodeGroupBounds, NODE_GROUP_BOUNDS_MESSAGE);

export const AwsProviderSchema = z.strictObject({
  region: z.string().min(1),
  kubernetes_version: z.string().min(1),
  availability_zones: z.array(z.string()).min(1),
  node_groups: z.record(z.string(), AwsNodeGroupSchema),
  vpc_cidr_block: z.string().default("10.10.0.0/16"),
  existing_subnet_ids: z.array(z.string()).optional(),
  existing_security_group_id: z.string().optional(),
  permissions_boundary: z.string().optional(),
  tags: z.record(z.string(), z.string()).default({}),
});

export const GcpNodeGroupSchema = z
  .strictObject({
    ...NODE_GROUP_SHAPE,
    preemptible: z.boolean().default(false),
    labels: z.record(z.string(), z.string()).default({}),
  })
  .refine(nodeGroupBounds, NODE_GROUP_BOUNDS_MESSAGE);

export const GcpProviderSchema = z.strictObject({
  project: z.string().min(1),
  region: z.string().min(1),
  kubernetes_version: z.string().min(1),
  availability_zones: z.array(z.string()).default([]),
  release_channel: z.string().default("UNSPECIFIED"),
  networking_mode: oneOf(["ROUTE", "VPC_NATIVE"]).default("ROUTE"),
  network: z.string().default("default"),
  subnetwork: z.string().optional(),
  tags: z.array(z.string()).default([]),
  node_groups: z.record(z.string(), GcpNodeGroupSchema),
});

export const AzureProviderSchema = z.strictObject({
  region: z.string().min(1),
  kubernetes_version: z.string().min(1),
  storage_account_postfix: pattern(/^[a-z0-9]{1,8}$/, "must be 1-8 lowercase letters or digits"),
  resource_group_name: pattern(/^[\w\-.()]*[\w\-()]$/, "must contain only alphanumerics, '_', '-', '.', '(' and ')' and not end with '.'").optional(),
  vnet_subnet_id: z.string().optional(),
  private_cluster_enabled: z.boolean().default(false),
  max_pods: range(10, 250).optional(),
  tags: z.record(z.string(), z.string()).default({}),
  node_groups: z.record(z.string(), NodeGroupSchema),
});

export const ExternalContainerRegistrySchema = z.strictObject({
  enabled: z.boolean().default(false),
  url: z.string().optional(),
});

/**
 * Non-provider sections with their defaults, shared by the stage views and the
 * typed document.
 */
export const SectionFields = {
  terraform_state: TerraformStateSchema.default({ type: "remote", config: {} }),
  external_container_reg: ExternalContainerRegistrySchema.default({ enabled: false }),
};

// =============================================================================
// Section Ownership
// =============================================================================

/**
 * Top-level key of each provider's section.
 */
export const PROVIDER_SECTION = {
  local: "local",
  existing: "existing",
  do: "digital_ocean",
  aws: "amazon_web_services",
  gcp: "google_cloud_platform",
  azure: "azure",
} as const satisfies Record<ProviderVariant, string>;

export const ProviderSectionsShape = {
  local: LocalProviderSchema.optional(),
  existing: ExistingProviderSchema.optional(),
  digital_ocean: DigitalOceanProviderSchema.optional(),
  amazon_web_services: AwsProviderSchema.optional(),
  google_cloud_platform: GcpProviderSchema.optional(),
  azure: AzureProviderSchema.optional(),
};

/**
 * A provider's section is required for that provider (except `local`, whose
 * fields all have defaults) and rejected for every other provider.
 */
export const PROVIDER_SECTION_RULES: readonly FieldRule[] = Object.entries(PROVIDER_SECTION).flatMap(
  ([provider, section]) => {
    const when = { field: "provider", equals: provider };
    const rules: FieldRule[] = [
      forbiddenUnless(section, when, `'${section}' is set but provider is not '${provider}'`),
    ];
    if (provider !== "local") {
      rules.push(requiredWhen(section, when, `provider '${provider}' requires the '${section}' section`));
    }
    return rules;
  },
);

/**
 * Typed view of a validated document, covering every built-in section.
 * Unknown keys are stripped here; rejecting them is the union schema's job.
 */
export const ConfigDocumentSchema = z.object({
  ...GlobalConfigSchema.shape,
  ...SectionFields,
  ...ProviderSectionsShape,
});

export type ForgeConfig = z.infer<typeof ConfigDocumentSchema>;

/**
 * Narrows an optional provider section. Field rules guarantee presence for
 * the active provider, so a miss here means validation was skipped.
 *
 * @throws ConfigurationError when the section is absent
 */
export function requireSection<T>(section: T | undefined, provider: ProviderVariant): T {
  if (section === undefined) {
    throw new ConfigurationError(`provider '${provider}' requires the '${PROVIDER_SECTION[provider]}' section`, {
      details: { provider, section: PROVIDER_SECTION[provider] },
    });
  }
  return section;
}
