/**
 * Path resolution for clusterforge.
 *
 * Two kinds of locations exist:
 *
 * 1. **Project paths** - everything a run writes for one deployment lives
 *    under the project root (the directory holding the configuration file):
 *    rendered stage files under `stages/<name>/<provider>/`, persisted outputs
 *    and staging directories under `.clusterforge/`, and local Terraform state
 *    under `state/<name>/`.
 *
 * 2. **Cache paths** - machine-wide data that can be regenerated, resolved
 *    with `env-paths` so they follow platform conventions (XDG on Linux,
 *    `Library/Caches` on macOS, `AppData\Local` on Windows). The Terraform
 *    plugin cache lives here so provider binaries survive the per-stage
 *    staging directories.
 *
 * The `stages/<name>/<provider>/` convention is relied on by resumed runs and
 * external tooling; `stagePrefix` is the only place that builds it.
 *
 * @module
 */

import * as path from "node:path";
import * as fs from "node:fs/promises";
import envPaths from "env-paths";
import type { ProviderVariant } from "../config/ConfigSchema.js";

// =============================================================================
// Project Paths
// =============================================================================

/** Directory that holds rendered stage files. */
export const STAGES_DIR = "stages";

/** Directory that holds local Terraform state files. */
export const STATE_DIR = "state";

/**
 * Relative working directory of a stage: `stages/<name>/<provider>`.
 *
 * Always uses forward slashes so rendered file keys are identical on every
 * platform.
 */
export function stagePrefix(stageName: string, provider: ProviderVariant): string {
  return path.posix.join(STAGES_DIR, stageName, provider);
}

/**
 * Absolute path of a stage's local Terraform state file.
 */
export function localStatePath(rootDir: string, stageName: string): string {
  return path.join(path.resolve(rootDir), STATE_DIR, stageName, "terraform.tfstate");
}

// =============================================================================
// Cache Paths
// =============================================================================

export interface CachePaths {
  /** Root of clusterforge's machine-wide cache */
  readonly cacheDir: string;

  /** Shared `TF_PLUGIN_CACHE_DIR` */
  readonly pluginCacheDir: string;
}

let cachedPaths: CachePaths | null = null;

/**
 * Resolves cache paths without touching the filesystem.
 */
export function getCachePaths(): CachePaths {
  if (!cachedPaths) {
    const cacheDir = path.resolve(envPaths("clusterforge", { suffix: "" }).cache);
    cachedPaths = Object.freeze({
      cacheDir,
      pluginCacheDir: path.join(cacheDir, "terraform-plugins"),
    });
  }
  return cachedPaths;
}

/**
 * Resolves cache paths and creates the plugin cache directory, which
 * Terraform requires to exist.
 */
export async function ensureCachePaths(): Promise<CachePaths> {
  const paths = getCachePaths();
  await fs.mkdir(paths.pluginCacheDir, { recursive: true });
  return paths;
}
