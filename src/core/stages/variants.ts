/**
 * Provider variant tables.
 *
 * A stage lists one entry per provider variant. The mapped type makes a
 * missing variant a compile error; a variant the stage cannot serve is marked
 * `UNSUPPORTED` and fails loudly when dispatched.
 *
 * @module
 */

import { PROVIDER_VARIANTS, type ProviderVariant } from "../config/ConfigSchema.js";
import { ConfigurationError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

export const UNSUPPORTED: unique symbol = Symbol("clusterforge.unsupported");

export type Unsupported = typeof UNSUPPORTED;

export type VariantTable<T> = { readonly [P in ProviderVariant]: T | Unsupported };

export function isSupported<T>(entry: T | Unsupported): entry is T {
  return entry !== UNSUPPORTED;
}

/**
 * Selects the active variant's implementation.
 *
 * @throws ConfigurationError (PROVIDER_UNSUPPORTED) when the stage marks the
 *   variant unsupported
 */
export function dispatch<T>(table: VariantTable<T>, provider: ProviderVariant, stage: string): T {
  const entry = table[provider];
  if (!isSupported(entry)) {
    throw new ConfigurationError(`Stage '${stage}' does not support provider '${provider}'`, {
      code: ErrorCode.PROVIDER_UNSUPPORTED,
      details: { stage, provider, supported: supportedVariants(table) },
    });
  }
  return entry;
}

export function supportedVariants<T>(table: VariantTable<T>): ProviderVariant[] {
  return PROVIDER_VARIANTS.filter((variant) => isSupported(table[variant]));
}

/**
 * Table with the same implementation for every variant.
 */
export function everyVariant<T>(impl: T): VariantTable<T> {
  return { local: impl, existing: impl, do: impl, aws: impl, gcp: impl, azure: impl };
}
