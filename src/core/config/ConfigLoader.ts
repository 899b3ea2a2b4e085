/**
 * Configuration Loader.
 *
 * Reads `clusterforge-config.yaml` and validates it before any stage runs.
 * Validation is all-or-nothing and happens in a fixed order:
 *
 * 1. The strict union schema from the registry (unknown keys rejected,
 *    defaults applied)
 * 2. Cross-field rules, evaluated in one pass over the whole document
 * 3. The version marker
 * 4. The registry's output dependency graph
 *
 * Schema and rule problems are collected and reported together.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { ConfigDocumentSchema, type ForgeConfig } from "./ConfigSchema.js";
import { ConfigurationError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { StageRegistry } from "../registry/StageRegistry.js";
import { checkFieldRules, isRecord } from "../schema/constraints.js";
import { isVersionAccepted, ORCHESTRATOR_VERSION } from "../version.js";

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_CONFIG_FILENAME = "clusterforge-config.yaml";

// =============================================================================
// Types
// =============================================================================

export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

export interface ValidatedConfig {
  /** Typed view of the built-in sections */
  readonly config: ForgeConfig;

  /** Whole document with defaults applied, including extension sections */
  readonly document: Readonly<Record<string, unknown>>;
}

export interface LoadedConfig extends ValidatedConfig {
  /** Absolute path of the file that was read */
  readonly path: string;
}

// =============================================================================
// ConfigLoader Class
// =============================================================================

export class ConfigLoader {
  constructor(private readonly registry: StageRegistry) {}

  /**
   * Reads, parses and validates a configuration file.
   *
   * @throws ConfigurationError for a missing, unparsable or invalid file
   */
  async load(configPath: string): Promise<LoadedConfig> {
    const { document, path: absolutePath } = await this.read(configPath);
    return { ...this.validate(document), path: absolutePath };
  }

  /**
   * Reads and parses a configuration file without validating it. The
   * orchestrator validates as the first step of every pass.
   *
   * @throws ConfigurationError (CONFIG_NOT_FOUND, CONFIG_PARSE_FAILED)
   */
  async read(configPath: string): Promise<{ document: unknown; path: string }> {
    const absolutePath = path.resolve(configPath);

    let content: string;
    try {
      content = await fs.readFile(absolutePath, "utf-8");
    } catch (error) {
      throw new ConfigurationError(`Configuration file not found: ${absolutePath}`, {
        code: ErrorCode.CONFIG_NOT_FOUND,
        details: { path: absolutePath },
        hint: `Create ${path.basename(absolutePath)} or pass --config with the right path.`,
        cause: error,
      });
    }

    return { document: this.parse(content, absolutePath), path: absolutePath };
  }

  /**
   * Validates an already parsed document.
   *
   * @throws ConfigurationError (CONFIG_INVALID, VERSION_MISMATCH)
   * @throws DependencyOrderError when the registered stages read outputs out
   *   of order
   */
  validate(raw: unknown): ValidatedConfig {
    if (!isRecord(raw)) {
      throw new ConfigurationError("Configuration must be a mapping of sections", {
        details: { issues: [{ path: "(root)", message: "expected a mapping" }] },
      });
    }

    const result = this.registry.configSchema().safeParse(raw);
    if (!result.success) {
      throw invalid(
        result.error.issues.map((issue) => ({
          path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
          message: issue.message,
        })),
      );
    }

    const document: Record<string, unknown> = result.data;

    const violations = checkFieldRules(document, this.registry.rules());
    if (violations.length > 0) {
      throw invalid(violations.map((v) => ({ path: v.field, message: v.message })));
    }

    const config = ConfigDocumentSchema.parse(document);

    if (!isVersionAccepted(config.clusterforge_version)) {
      throw new ConfigurationError(
        `Configuration was written for version ${config.clusterforge_version}, this is ${ORCHESTRATOR_VERSION}`,
        {
          code: ErrorCode.VERSION_MISMATCH,
          details: { configured: config.clusterforge_version, running: ORCHESTRATOR_VERSION },
          hint: `Set clusterforge_version to ${ORCHESTRATOR_VERSION} after reviewing the release notes.`,
        },
      );
    }

    this.registry.validateDependencies();

    return { config, document };
  }

  private parse(content: string, configPath: string): unknown {
    try {
      return parseYaml(content);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      let details: Record<string, unknown> = { path: configPath };

      if (error instanceof YAMLParseError) {
        details = {
          ...details,
          line: error.linePos?.[0]?.line,
          column: error.linePos?.[0]?.col,
        };
      }

      throw new ConfigurationError("Invalid YAML syntax in configuration", {
        code: ErrorCode.CONFIG_PARSE_FAILED,
        details,
        hint: `Failed to parse ${path.basename(configPath)}: ${cause.message}`,
        cause,
      });
    }
  }
}

function invalid(issues: readonly ConfigIssue[]): ConfigurationError {
  const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ");
  return new ConfigurationError(
    `Invalid configuration: ${issues.length} issue${issues.length === 1 ? "" : "s"}`,
    {
      details: { issues },
      hint: `Fix the configuration file: ${summary}`,
    },
  );
}
