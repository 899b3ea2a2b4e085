/**
 * Spinner shown while a pass runs.
 *
 * On a TTY the @clack/prompts spinner animates; elsewhere (CI, pipes) the
 * same messages are printed once through CliUx.
 *
 * @module
 */

import * as clack from "@clack/prompts";
import type { CliUx } from "./CliUx.js";

export interface CliSpinnerOptions {
  readonly ux: CliUx;

  /** Override TTY detection (for testing) */
  readonly isTTY?: boolean;
}

export class CliSpinner {
  private readonly ux: CliUx;
  private readonly animated: boolean;
  private spinner: ReturnType<typeof clack.spinner> | null = null;
  private message = "";

  constructor(options: CliSpinnerOptions) {
    this.ux = options.ux;
    this.animated = (options.isTTY ?? process.stdout.isTTY ?? false) && options.ux.currentLevel !== "silent";
  }

  start(message: string): void {
    this.message = message;
    if (this.animated) {
      this.spinner = clack.spinner();
      this.spinner.start(message);
    } else {
      this.ux.info(message);
    }
  }

  succeed(message?: string): void {
    const text = message ?? this.message;
    this.spinner?.stop(text);
    this.spinner = null;
    this.ux.success(text);
  }

  fail(message?: string): void {
    const text = message ?? this.message;
    this.spinner?.stop(text, 1);
    this.spinner = null;
  }

  /**
   * Runs `operation` between `start` and `succeed`/`fail`, rethrowing its
   * error. Error reporting itself is left to the caller.
   */
  async wrap<T>(message: string, operation: () => Promise<T>, successMessage?: string): Promise<T> {
    this.start(message);
    try {
      const result = await operation();
      this.succeed(successMessage ?? message);
      return result;
    } catch (error) {
      this.fail(message);
      throw error;
    }
  }
}

export function createCliSpinner(options: CliSpinnerOptions): CliSpinner {
  return new CliSpinner(options);
}
