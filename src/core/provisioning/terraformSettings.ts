/**
 * Terraform settings generated for every Terraform-backed stage: the state
 * backend and provider blocks, written as `_clusterforge.tf.json` next to
 * the stage's templates.
 *
 * Remote state lives in the bucket the `01-terraform-state` stage creates.
 * That stage itself keeps local state, under `<root>/state/<stage>/`, outside
 * any scratch directory.
 *
 * @module
 */

import { isCloudProvider, type ForgeConfig } from "../config/ConfigSchema.js";
import { ConfigurationError } from "../errors/errors.js";
import { localStatePath } from "../utils/paths.js";

export const SETTINGS_FILENAME = "_clusterforge.tf.json";

export const AZURE_STATE_RESOURCE_GROUP_SUFFIX = "-state";

export const AZURE_NODE_RESOURCE_GROUP_SUFFIX = "-node-resource-group";

export interface BackendBlock {
  readonly type: string;
  readonly config: Readonly<Record<string, unknown>>;
}

/** `<project_name>-<namespace>`, the prefix of every state resource. */
export function resourcePrefix(config: ForgeConfig): string {
  return `${config.project_name}-${config.namespace}`;
}

export function stateBucketName(config: ForgeConfig): string {
  return `${resourcePrefix(config)}-terraform-state`;
}

/**
 * Azure resource group: the configured base name, or `<project>-<namespace>`,
 * followed by `suffix`.
 */
export function azureResourceGroup(config: ForgeConfig, baseResourceGroup?: string, suffix = ""): string {
  return `${baseResourceGroup ?? resourcePrefix(config)}${suffix}`;
}

/** Storage account names allow lowercase letters and digits only. */
export function azureStorageAccountName(config: ForgeConfig, postfix: string): string {
  return `${resourcePrefix(config).replace(/-/g, "")}${postfix}`.toLowerCase();
}

export function localBackend(rootDir: string, stage: string): BackendBlock {
  return { type: "local", config: { path: localStatePath(rootDir, stage) } };
}

/**
 * Backend for a stage's state according to `terraform_state`.
 *
 * Remote state needs a cloud provider; `local` and `existing` clusters fall
 * back to local state.
 */
export function stateBackend(config: ForgeConfig, stage: string, rootDir: string): BackendBlock {
  const state = config.terraform_state;

  if (state.type === "existing") {
    if (!state.backend) {
      throw new ConfigurationError("'terraform_state.backend' is required when 'terraform_state.type' is 'existing'");
    }
    return { type: state.backend, config: state.config };
  }

  if (state.type === "local" || !isCloudProvider(config.provider)) {
    return localBackend(rootDir, stage);
  }

  const bucket = stateBucketName(config);
  const key = `terraform/${resourcePrefix(config)}/${stage}`;

  switch (config.provider) {
    case "do":
      return {
        type: "s3",
        config: {
          bucket,
          key: `${key}.tfstate`,
          region: "us-west-1",
          endpoints: { s3: `https://${config.digital_ocean?.region ?? "nyc3"}.digitaloceanspaces.com` },
          skip_credentials_validation: true,
          skip_region_validation: true,
          skip_requesting_account_id: true,
          skip_s3_checksum: true,
        },
      };
    case "aws":
      return {
        type: "s3",
        config: {
          bucket,
          key: `${key}.tfstate`,
          region: config.amazon_web_services?.region,
          encrypt: true,
          dynamodb_table: `${bucket}-lock`,
        },
      };
    case "gcp":
      return { type: "gcs", config: { bucket, prefix: key } };
    case "azure": {
      const azure = config.azure;
      return {
        type: "azurerm",
        config: {
          resource_group_name: azureResourceGroup(config, azure?.resource_group_name, AZURE_STATE_RESOURCE_GROUP_SUFFIX),
          storage_account_name: azureStorageAccountName(config, azure?.storage_account_postfix ?? ""),
          container_name: `${resourcePrefix(config)}-state`,
          key,
        },
      };
    }
  }
}

/**
 * JSON text of the settings file.
 */
export function renderSettings(backend: BackendBlock, providers: Readonly<Record<string, unknown>> = {}): string {
  const document: Record<string, unknown> = {
    terraform: { backend: { [backend.type]: backend.config } },
  };
  if (Object.keys(providers).length > 0) {
    document.provider = providers;
  }
  return JSON.stringify(document, null, 2) + "\n";
}
