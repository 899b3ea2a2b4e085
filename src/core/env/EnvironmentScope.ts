/**
 * Environment Scope - explicit, immutable environment layering.
 *
 * A stage that produces ambient credentials (a kubeconfig path, a cluster
 * token, provider keys) extends the scope it was given and hands the
 * extended scope to the stages nested after it. Nothing writes to
 * `process.env`: the adapter receives `scope.variables()` as the child
 * process environment. Leaving a stage restores the previous scope simply
 * because the caller still holds it.
 *
 * @module
 */

import type { EnvironmentRecord } from "../config/credentials.js";

/**
 * One layer of overrides and the stage that contributed it.
 */
export interface ScopeLayer {
  readonly source: string;
  readonly overrides: Readonly<Record<string, string>>;
}

export class EnvironmentScope {
  private constructor(
    private readonly base: EnvironmentRecord,
    private readonly layers: readonly ScopeLayer[],
  ) {}

  /**
   * Root scope over a base environment (usually a copy of `process.env`).
   */
  static root(base: EnvironmentRecord = {}): EnvironmentScope {
    return new EnvironmentScope({ ...base }, []);
  }

  /**
   * Returns a new scope with `overrides` layered on top. Undefined and null
   * values are dropped, so optional credentials never unset a base variable.
   */
  extend(source: string, overrides: Record<string, string | null | undefined>): EnvironmentScope {
    const defined: Record<string, string> = {};
    for (const [key, value] of Object.entries(overrides)) {
      if (value !== undefined && value !== null) {
        defined[key] = value;
      }
    }
    if (Object.keys(defined).length === 0) {
      return this;
    }
    return new EnvironmentScope(this.base, [...this.layers, { source, overrides: defined }]);
  }

  get(name: string): string | undefined {
    for (let i = this.layers.length - 1; i >= 0; i--) {
      const value = this.layers[i].overrides[name];
      if (value !== undefined) return value;
    }
    return this.base[name];
  }

  /**
   * Flattened variables for a child process.
   */
  variables(): Record<string, string> {
    const merged: Record<string, string> = {};
    for (const [key, value] of Object.entries(this.base)) {
      if (value !== undefined) merged[key] = value;
    }
    for (const layer of this.layers) {
      Object.assign(merged, layer.overrides);
    }
    return merged;
  }

  /**
   * Variables contributed by stages only, without the base environment.
   */
  overrides(): Record<string, string> {
    const merged: Record<string, string> = {};
    for (const layer of this.layers) {
      Object.assign(merged, layer.overrides);
    }
    return merged;
  }

  /**
   * Stages that contributed a layer, innermost last.
   */
  sources(): string[] {
    return this.layers.map((layer) => layer.source);
  }

  get depth(): number {
    return this.layers.length;
  }
}
