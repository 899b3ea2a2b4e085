/**
 * Stage Outputs - the append-only record threaded through a run.
 *
 * Each completed stage publishes exactly one output record under
 * `stages/<name>`. Publishing returns a new snapshot; existing snapshots are
 * never modified, so a stage that captured an earlier snapshot keeps seeing
 * exactly what it was given.
 *
 * @module
 */

import { DependencyOrderError, ForgeError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

export type OutputRecord = Readonly<Record<string, unknown>>;

/**
 * Key under which a stage's record is published.
 */
export function outputKey(stage: string): string {
  return `stages/${stage}`;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

export class StageOutputs {
  private constructor(private readonly records: ReadonlyMap<string, OutputRecord>) {}

  static empty(): StageOutputs {
    return new StageOutputs(new Map());
  }

  /**
   * Builds a snapshot from `[stageName, record]` pairs in publication order.
   */
  static of(entries: Iterable<readonly [string, OutputRecord]>): StageOutputs {
    let outputs = StageOutputs.empty();
    for (const [stage, record] of entries) {
      outputs = outputs.with(stage, record);
    }
    return outputs;
  }

  /**
   * Returns a new snapshot with `stage`'s record appended.
   *
   * @throws ForgeError if the stage already published
   */
  with(stage: string, record: OutputRecord): StageOutputs {
    const key = outputKey(stage);
    if (this.records.has(key)) {
      throw new ForgeError(
        `Stage '${stage}' already published its outputs`,
        ErrorCode.INTERNAL_ERROR,
        { stage },
        undefined,
        undefined,
        false,
      );
    }
    const next = new Map(this.records);
    next.set(key, deepFreeze(structuredClone({ ...record })));
    return new StageOutputs(next);
  }

  has(stage: string): boolean {
    return this.records.has(outputKey(stage));
  }

  get(stage: string): OutputRecord | undefined {
    return this.records.get(outputKey(stage));
  }

  /**
   * Reads one field of an upstream stage's record.
   *
   * @throws DependencyOrderError when the stage has not published or the
   *   field is absent; either means the registry ordered stages wrongly
   */
  require(stage: string, field: string): unknown {
    const record = this.records.get(outputKey(stage));
    if (!record) {
      throw new DependencyOrderError(`Outputs of stage '${stage}' are not available yet`, {
        details: { stage, field, published: this.stages() },
      });
    }
    if (!(field in record)) {
      throw new DependencyOrderError(`Stage '${stage}' did not publish output '${field}'`, {
        details: { stage, field, fields: Object.keys(record) },
      });
    }
    return record[field];
  }

  /**
   * Stage names in publication order.
   */
  stages(): string[] {
    return [...this.records.keys()].map((key) => key.slice("stages/".length));
  }

  get size(): number {
    return this.records.size;
  }

  toJSON(): Record<string, OutputRecord> {
    return Object.fromEntries(this.records);
  }
}
