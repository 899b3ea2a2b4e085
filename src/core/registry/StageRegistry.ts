/**
 * Stage Registry - the ordered set of stages a run works with.
 *
 * Built-in stages register first, then extension stages in the order given.
 * `stages()` sorts by ascending priority; the sort is stable, so ties keep
 * registration order.
 *
 * Construction only reads static stage metadata and is cheap enough to
 * repeat on every command invocation.
 *
 * @module
 */

import { z } from "zod";
import { GlobalConfigSchema, PROVIDER_SECTION_RULES } from "../config/ConfigSchema.js";
import { ConfigurationError, DependencyOrderError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { FieldRule } from "../schema/constraints.js";
import type { SchemaShape, StageDefinition } from "../stages/Stage.js";
import { BUILTIN_STAGES } from "../stages/builtin/index.js";

export interface StageRegistryOptions {
  /** Additional stages, registered after the built-ins */
  readonly extensions?: readonly StageDefinition[];

  /** Replace the built-in set (tests register their own stages) */
  readonly builtins?: readonly StageDefinition[];
}

export class StageRegistry {
  private readonly ordered: readonly StageDefinition[];

  private constructor(definitions: readonly StageDefinition[]) {
    const seen = new Set<string>();
    for (const definition of definitions) {
      if (seen.has(definition.name)) {
        throw new ConfigurationError(`Stage '${definition.name}' is registered more than once`, {
          code: ErrorCode.STAGE_DUPLICATE,
          details: { stage: definition.name },
        });
      }
      seen.add(definition.name);
    }
    this.ordered = Object.freeze([...definitions].sort((a, b) => a.priority - b.priority));
  }

  /**
   * @throws ConfigurationError (STAGE_DUPLICATE) when two stages share a name
   */
  static create(options: StageRegistryOptions = {}): StageRegistry {
    return new StageRegistry([...(options.builtins ?? BUILTIN_STAGES), ...(options.extensions ?? [])]);
  }

  /**
   * Definitions in execution order.
   */
  stages(): readonly StageDefinition[] {
    return this.ordered;
  }

  get(name: string): StageDefinition | undefined {
    return this.ordered.find((definition) => definition.name === name);
  }

  /**
   * Strict schema for a whole configuration document: the global fields plus
   * every stage's sections. Unknown top-level keys are rejected.
   *
   * @throws ConfigurationError when two stages declare the same section with
   *   different schemas
   */
  configSchema() {
    const shape: Record<string, z.ZodType> = { ...GlobalConfigSchema.shape };
    const owners = new Map<string, string>(Object.keys(shape).map((key) => [key, "global"]));

    for (const definition of this.ordered) {
      for (const [key, schema] of Object.entries(definition.inputShape)) {
        const owner = owners.get(key);
        if (owner !== undefined && shape[key] !== schema) {
          throw new ConfigurationError(`Section '${key}' is declared by both '${owner}' and '${definition.name}'`, {
            details: { section: key, stages: [owner, definition.name] },
          });
        }
        shape[key] = schema;
        owners.set(key, definition.name);
      }
    }

    return z.strictObject(shape);
  }

  /**
   * Cross-field rules: provider section rules, then each stage's rules.
   */
  rules(): FieldRule[] {
    return [...PROVIDER_SECTION_RULES, ...this.ordered.flatMap((definition) => definition.rules)];
  }

  /**
   * Checks that every output a stage reads is published by a registered
   * stage that runs strictly earlier.
   *
   * @throws DependencyOrderError on the first broken reference
   */
  validateDependencies(): void {
    for (const consumer of this.ordered) {
      for (const reference of consumer.requires) {
        const producer = this.get(reference.stage);

        if (!producer) {
          throw new DependencyOrderError(
            `Stage '${consumer.name}' reads '${reference.field}' from unknown stage '${reference.stage}'`,
            { details: { consumer: consumer.name, ...reference } },
          );
        }

        if (!hasField(producer.outputShape, reference.field)) {
          throw new DependencyOrderError(
            `Stage '${consumer.name}' reads '${reference.field}', which stage '${producer.name}' does not publish`,
            { details: { consumer: consumer.name, ...reference, published: Object.keys(producer.outputShape) } },
          );
        }

        if (producer.priority >= consumer.priority) {
          throw new DependencyOrderError(
            `Stage '${consumer.name}' (priority ${consumer.priority}) reads '${reference.field}' from ` +
              `'${producer.name}' (priority ${producer.priority}), which does not run before it`,
            {
              details: {
                consumer: consumer.name,
                ...reference,
                consumerPriority: consumer.priority,
                producerPriority: producer.priority,
              },
            },
          );
        }
      }
    }
  }
}

function hasField(shape: SchemaShape, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(shape, field);
}
