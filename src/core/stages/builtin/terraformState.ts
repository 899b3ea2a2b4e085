/**
 * `01-terraform-state` - the remote state backend.
 *
 * Creates the bucket (and lock table or storage account) that every later
 * stage keeps its state in. Runs only for `terraform_state.type: remote` on a
 * cloud provider, and keeps its own state locally. Earlier attempts may have
 * created the bucket without recording it, so its resources are imported
 * before the first apply.
 *
 * @module
 */

import { requireCredential } from "../../config/credentials.js";
import { isCloudProvider, requireSection, SectionFields, type ForgeConfig } from "../../config/ConfigSchema.js";
import type { EnvironmentScope } from "../../env/EnvironmentScope.js";
import type { StageOutputs } from "../../outputs/StageOutputs.js";
import {
  AZURE_STATE_RESOURCE_GROUP_SUFFIX,
  azureResourceGroup,
  azureStorageAccountName,
  localBackend,
  resourcePrefix,
  stateBucketName,
  type BackendBlock,
} from "../../provisioning/terraformSettings.js";
import { forbiddenUnless, requiredWhen } from "../../schema/constraints.js";
import type { StageDefinition } from "../Stage.js";
import { TerraformStage, type TerraformVariant } from "../TerraformStage.js";
import { UNSUPPORTED, type VariantTable } from "../variants.js";

export const TERRAFORM_STATE_STAGE = "01-terraform-state";

const MODULE = "module.terraform-state";

const EXISTING_STATE = { field: "terraform_state.type", equals: "existing" } as const;

// =============================================================================
// Variants
// =============================================================================

const digitalOcean: TerraformVariant = {
  inputVars: (config) => ({
    name: config.project_name,
    namespace: config.namespace,
    region: requireSection(config.digital_ocean, "do").region,
  }),
  stateImports: (config) => [
    {
      address: `${MODULE}.module.spaces.digitalocean_spaces_bucket.main`,
      id: `${requireSection(config.digital_ocean, "do").region},${stateBucketName(config)}`,
    },
  ],
};

const aws: TerraformVariant = {
  inputVars: (config) => ({
    name: config.project_name,
    namespace: config.namespace,
  }),
  stateImports: (config) => [
    { address: `${MODULE}.aws_s3_bucket.terraform-state`, id: stateBucketName(config) },
    { address: `${MODULE}.aws_dynamodb_table.terraform-state-lock`, id: `${stateBucketName(config)}-lock` },
  ],
  providers: (config) => ({ aws: { region: requireSection(config.amazon_web_services, "aws").region } }),
};

const gcp: TerraformVariant = {
  inputVars: (config) => ({
    name: config.project_name,
    namespace: config.namespace,
    region: requireSection(config.google_cloud_platform, "gcp").region,
  }),
  stateImports: (config) => [
    { address: `${MODULE}.module.gcs.google_storage_bucket.static-site`, id: stateBucketName(config) },
  ],
  providers: (config) => {
    const section = requireSection(config.google_cloud_platform, "gcp");
    return { google: { project: section.project, region: section.region } };
  },
};

function azureStateResourceGroup(config: ForgeConfig): string {
  return azureResourceGroup(
    config,
    requireSection(config.azure, "azure").resource_group_name,
    AZURE_STATE_RESOURCE_GROUP_SUFFIX,
  );
}

const azure: TerraformVariant = {
  inputVars: (config) => {
    const section = requireSection(config.azure, "azure");
    return {
      name: config.project_name,
      namespace: config.namespace,
      region: section.region,
      storage_account_postfix: section.storage_account_postfix,
      state_resource_group_name: azureStateResourceGroup(config),
      tags: section.tags,
    };
  },
  stateImports: (config, scope) => {
    const section = requireSection(config.azure, "azure");
    const subscriptionId = requireCredential(scope.variables(), "ARM_SUBSCRIPTION_ID", "azure");
    const resourceGroupUrl = `/subscriptions/${subscriptionId}/resourceGroups/${azureStateResourceGroup(config)}`;
    const storageAccount = azureStorageAccountName(config, section.storage_account_postfix);

    return [
      { address: `${MODULE}.azurerm_resource_group.terraform-state-resource-group`, id: resourceGroupUrl },
      {
        address: `${MODULE}.azurerm_storage_account.terraform-state-storage-account`,
        id: `${resourceGroupUrl}/providers/Microsoft.Storage/storageAccounts/${storageAccount}`,
      },
      {
        address: `${MODULE}.azurerm_storage_container.storage_container`,
        id: `https://${storageAccount}.blob.core.windows.net/${resourcePrefix(config)}-state`,
      },
    ];
  },
};

const VARIANTS: VariantTable<TerraformVariant> = {
  local: UNSUPPORTED,
  existing: UNSUPPORTED,
  do: digitalOcean,
  aws,
  gcp,
  azure,
};

// =============================================================================
// Stage
// =============================================================================

class TerraformStateStage extends TerraformStage {
  override enabled(): boolean {
    return this.config.terraform_state.type === "remote" && isCloudProvider(this.provider);
  }

  protected override backend(): BackendBlock {
    return localBackend(this.init.rootDir, this.name);
  }

  /**
   * Spaces speaks the S3 protocol, so later stages reach their DigitalOcean
   * state with the Spaces keys under the AWS names.
   */
  override extendScope(_outputs: StageOutputs, scope: EnvironmentScope): EnvironmentScope {
    if (this.provider !== "do") {
      return scope;
    }
    const env = scope.variables();
    return scope.extend(this.name, {
      AWS_ACCESS_KEY_ID: requireCredential(env, "SPACES_ACCESS_KEY_ID", "do"),
      AWS_SECRET_ACCESS_KEY: requireCredential(env, "SPACES_SECRET_ACCESS_KEY", "do"),
    });
  }
}

export const terraformStateStage: StageDefinition = {
  name: TERRAFORM_STATE_STAGE,
  priority: 10,
  inputShape: { terraform_state: SectionFields.terraform_state },
  outputShape: {},
  requires: [],
  rules: [
    requiredWhen("terraform_state.backend", EXISTING_STATE),
    requiredWhen("terraform_state.config", EXISTING_STATE),
    forbiddenUnless("terraform_state.backend", EXISTING_STATE),
    forbiddenUnless("terraform_state.config", EXISTING_STATE),
  ],
  sensitiveOutputs: [],
  variants: VARIANTS,
  create: (init) => new TerraformStateStage(terraformStateStage, init, VARIANTS),
};
