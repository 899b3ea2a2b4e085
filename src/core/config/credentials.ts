/**
 * Provider credentials.
 *
 * Credentials are read from an explicit environment record handed to the
 * orchestrator, never looked up ad hoc by stages. Missing variables are a
 * configuration error raised before any stage runs.
 *
 * @module
 */

import { ConfigurationError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { ProviderVariant } from "./ConfigSchema.js";

export type EnvironmentRecord = Readonly<Record<string, string | undefined>>;

/**
 * Variables each provider needs to deploy or destroy.
 */
export const REQUIRED_CREDENTIALS: Readonly<Record<ProviderVariant, readonly string[]>> = {
  local: [],
  existing: [],
  do: ["DIGITALOCEAN_TOKEN", "SPACES_ACCESS_KEY_ID", "SPACES_SECRET_ACCESS_KEY"],
  aws: ["AWS_ACCESS_KEY_ID", "AWS_SECRET_ACCESS_KEY"],
  gcp: ["GOOGLE_CREDENTIALS"],
  azure: ["ARM_CLIENT_ID", "ARM_CLIENT_SECRET", "ARM_SUBSCRIPTION_ID", "ARM_TENANT_ID"],
};

export function missingCredentials(provider: ProviderVariant, env: EnvironmentRecord): string[] {
  return REQUIRED_CREDENTIALS[provider].filter((name) => !env[name]);
}

/**
 * @throws ConfigurationError listing every missing variable
 */
export function assertCredentials(provider: ProviderVariant, env: EnvironmentRecord): void {
  const missing = missingCredentials(provider, env);
  if (missing.length === 0) return;

  throw new ConfigurationError(`Missing credentials for provider '${provider}'`, {
    code: ErrorCode.CREDENTIALS_MISSING,
    details: { provider, missing },
    hint: `Export ${missing.join(", ")} before running this command.`,
  });
}

/**
 * Reads one credential, failing with the same error as the pre-flight check.
 */
export function requireCredential(env: EnvironmentRecord, name: string, provider: ProviderVariant): string {
  const value = env[name];
  if (!value) {
    throw new ConfigurationError(`Missing credential ${name}`, {
      code: ErrorCode.CREDENTIALS_MISSING,
      details: { provider, missing: [name] },
      hint: `Export ${name} before running this command.`,
    });
  }
  return value;
}
