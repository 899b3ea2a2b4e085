/**
 * Step Timer for orchestration instrumentation.
 *
 * Emits `step.start` and `step.end` log events with durations. Timings are
 * keyed by step and stage, since every stage goes through the same steps.
 *
 * @module
 */

import type { ContextualLogger } from "./ContextualLogger.js";
import type { Step } from "./Step.js";

interface StepTiming {
  readonly step: Step;
  readonly stage?: string;
  readonly startTime: number;
}

/**
 * Timer for tracking step durations.
 *
 * @example
 * ```typescript
 * const timer = new StepTimer(logger);
 * const outputs = await timer.run(Step.STAGE_DEPLOY, () => adapter.apply(...), {
 *   stage: "02-infrastructure",
 * });
 * ```
 */
export class StepTimer {
  private readonly logger: ContextualLogger;
  private readonly timings = new Map<string, StepTiming>();
  private readonly now: () => number;

  constructor(logger: ContextualLogger, now: () => number = Date.now) {
    this.logger = logger;
    this.now = now;
  }

  start(step: Step, context: { stage?: string } & Record<string, unknown> = {}): void {
    const { stage, ...rest } = context;
    this.timings.set(timingKey(step, stage), { step, stage, startTime: this.now() });
    this.logger
      .withContext({ step, stage })
      .info("Step started", { event: "step.start", ...rest });
  }

  end(step: Step, stage?: string, context?: Record<string, unknown>): void {
    const timing = this.take(step, stage);
    if (!timing) return;

    this.logger.withContext({ step, stage }).info("Step completed", {
      event: "step.end",
      durationMs: this.now() - timing.startTime,
      ...context,
    });
  }

  endWithError(step: Step, error: Error, stage?: string): void {
    const timing = this.take(step, stage);
    if (!timing) return;

    this.logger.withContext({ step, stage }).error("Step failed", {
      event: "step.end",
      durationMs: this.now() - timing.startTime,
      error,
    });
  }

  /**
   * Runs `fn` between a start and an end event, logging failures before
   * rethrowing them.
   */
  async run<T>(
    step: Step,
    fn: () => Promise<T>,
    context: { stage?: string } & Record<string, unknown> = {},
  ): Promise<T> {
    this.start(step, context);
    try {
      const result = await fn();
      this.end(step, context.stage);
      return result;
    } catch (error) {
      this.endWithError(
        step,
        error instanceof Error ? error : new Error(String(error)),
        context.stage,
      );
      throw error;
    }
  }

  isRunning(step: Step, stage?: string): boolean {
    return this.timings.has(timingKey(step, stage));
  }

  private take(step: Step, stage?: string): StepTiming | undefined {
    const key = timingKey(step, stage);
    const timing = this.timings.get(key);
    this.timings.delete(key);
    return timing;
  }
}

function timingKey(step: Step, stage?: string): string {
  return stage ? `${step}@${stage}` : step;
}
