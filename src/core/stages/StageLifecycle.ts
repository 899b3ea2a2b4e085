/**
 * Per-stage, per-run lifecycle state machine.
 *
 * Deploy runs move `pending → rendered → planned → deployed → checked`; a
 * resumed stage goes straight from `rendered` to `deployed`. Teardown runs
 * move `pending → planned → destroyed`. Any non-terminal state can fail, and
 * a disabled stage is `skipped` before it does anything.
 *
 * @module
 */

import { ForgeError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

export type StageState =
  | "pending"
  | "rendered"
  | "planned"
  | "deployed"
  | "checked"
  | "destroyed"
  | "failed"
  | "skipped";

export type RunDirection = "deploy" | "teardown";

type TransitionTable = Readonly<Record<StageState, readonly StageState[]>>;

const DEPLOY_TRANSITIONS: TransitionTable = {
  pending: ["rendered", "skipped", "failed"],
  rendered: ["planned", "deployed", "failed"],
  planned: ["deployed", "failed"],
  deployed: ["checked", "failed"],
  checked: [],
  destroyed: [],
  failed: [],
  skipped: [],
};

const TEARDOWN_TRANSITIONS: TransitionTable = {
  pending: ["planned", "destroyed", "skipped", "failed"],
  rendered: [],
  planned: ["destroyed", "failed"],
  deployed: [],
  checked: [],
  destroyed: [],
  failed: [],
  skipped: [],
};

const TABLES: Readonly<Record<RunDirection, TransitionTable>> = {
  deploy: DEPLOY_TRANSITIONS,
  teardown: TEARDOWN_TRANSITIONS,
};

export interface StageTransition {
  readonly from: StageState;
  readonly to: StageState;
}

export class StageLifecycle {
  private current: StageState = "pending";
  private readonly history: StageTransition[] = [];

  constructor(
    readonly stage: string,
    readonly direction: RunDirection,
  ) {}

  get state(): StageState {
    return this.current;
  }

  canTransition(to: StageState): boolean {
    return TABLES[this.direction][this.current].includes(to);
  }

  /**
   * @throws ForgeError (INTERNAL_ERROR) on a transition the run direction
   *   does not allow
   */
  transition(to: StageState): void {
    if (!this.canTransition(to)) {
      throw new ForgeError(
        `Illegal ${this.direction} transition for stage '${this.stage}': ${this.current} -> ${to}`,
        ErrorCode.INTERNAL_ERROR,
        { stage: this.stage, from: this.current, to, direction: this.direction },
        undefined,
        undefined,
        false,
      );
    }
    this.history.push({ from: this.current, to });
    this.current = to;
  }

  /**
   * Marks the stage failed unless it already reached a terminal state.
   */
  fail(): void {
    if (this.canTransition("failed")) {
      this.transition("failed");
    }
  }

  transitions(): readonly StageTransition[] {
    return this.history;
  }
}
