/**
 * Per-stage outcome of a teardown pass, in the order stages finished.
 *
 * @module
 */

import type { DestroyOutcome } from "../errors/errors.js";

export type DestroyStatus = "success" | "failure";

export class DestroyReport {
  private readonly entries: DestroyOutcome[] = [];

  record(stage: string, success: boolean, error?: unknown): void {
    const outcome: DestroyOutcome = success
      ? { stage, success }
      : { stage, success, error: error instanceof Error ? error.message : String(error) };
    this.entries.push(outcome);
  }

  outcomes(): readonly DestroyOutcome[] {
    return this.entries;
  }

  status(stage: string): DestroyStatus | undefined {
    const entry = this.entries.find((outcome) => outcome.stage === stage);
    if (!entry) return undefined;
    return entry.success ? "success" : "failure";
  }

  hasFailures(): boolean {
    return this.entries.some((entry) => !entry.success);
  }

  /** `{ stage: "success" | "failure" }` */
  toStatus(): Record<string, DestroyStatus> {
    return Object.fromEntries(this.entries.map((entry) => [entry.stage, entry.success ? "success" : "failure"]));
  }
}
