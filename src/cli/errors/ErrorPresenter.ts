/**
 * Error presentation for CLI output.
 *
 * Turns ForgeError and unknown errors into the lines printed when a pass
 * halts: code and message, the failing stage, details and hint. Stack traces
 * and causes are printed only in debug mode.
 *
 * @module
 */

import { ForgeError } from "../../core/errors/errors.js";
import { ErrorCode, getExitCode } from "../../core/errors/ErrorCode.js";
import { isRecord } from "../../core/schema/constraints.js";

// =============================================================================
// Types
// =============================================================================

export interface FormatErrorOptions {
  /** Include stack traces and the cause chain (default: false) */
  readonly debug?: boolean;
}

export interface ErrorPresenterOptions {
  /** Output function (default: console.error) */
  readonly output?: (line: string) => void;
  readonly debug?: boolean;
}

// =============================================================================
// ErrorPresenter Class
// =============================================================================

export class ErrorPresenter {
  private readonly output: (line: string) => void;
  private readonly debug: boolean;

  constructor(options: ErrorPresenterOptions = {}) {
    this.output = options.output ?? console.error;
    this.debug = options.debug ?? false;
  }

  /**
   * Prints the error and returns the process exit code for it.
   */
  present(error: unknown): number {
    for (const line of formatError(error, { debug: this.debug }).split("\n")) {
      this.output(line);
    }
    return exitCodeFor(error);
  }
}

// =============================================================================
// Format Functions
// =============================================================================

/**
 * Non-zero exit code for any error; ForgeError codes map to their category
 * range.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof ForgeError ? getExitCode(error.code) : 1;
}

/**
 * Stage an error is attributed to, when it carries one.
 */
export function failingStage(error: unknown): string | undefined {
  if (!(error instanceof ForgeError)) return undefined;
  const stage = error.details?.stage;
  return typeof stage === "string" ? stage : undefined;
}

export function formatError(error: unknown, options: FormatErrorOptions = {}): string {
  const forgeError = normalizeError(error);
  const lines: string[] = [`Error [${forgeError.code}]: ${forgeError.message}`, ""];

  const { stage, ...details } = forgeError.details ?? {};
  if (typeof stage === "string") {
    lines.push(`Stage: ${stage}`);
  }

  const detailLines = formatDetails(details);
  if (detailLines.length > 0 || typeof stage === "string") {
    lines.push(...detailLines, "");
  }

  if (forgeError.hint) {
    lines.push("Hint:");
    for (const hintLine of forgeError.hint.split("\n")) {
      lines.push(`  ${hintLine}`);
    }
    lines.push("");
  }

  if (options.debug) {
    if (forgeError.stack) {
      lines.push("Stack trace:", ...forgeError.stack.split("\n").slice(1), "");
    }
    if (forgeError.cause) {
      lines.push("Caused by:", `  ${forgeError.cause.message}`);
      lines.push(...(forgeError.cause.stack?.split("\n").slice(1) ?? []), "");
    }
  }

  return lines.join("\n").trimEnd();
}

function normalizeError(error: unknown): ForgeError {
  if (error instanceof ForgeError) {
    return error;
  }

  if (error instanceof Error) {
    const wrapped = new ForgeError(error.message, ErrorCode.INTERNAL_ERROR, undefined, undefined, error, false);
    wrapped.stack = error.stack;
    return wrapped;
  }

  return new ForgeError(String(error), ErrorCode.INTERNAL_ERROR, undefined, undefined, undefined, false);
}

function formatDetails(details: Record<string, unknown>): string[] {
  const lines: string[] = [];

  for (const [key, value] of Object.entries(details)) {
    if (value === undefined) continue;

    if (Array.isArray(value)) {
      if (value.length > 0) {
        lines.push(`${formatKey(key)}:`);
        for (const item of value) {
          lines.push(`  - ${formatItem(item)}`);
        }
      }
    } else if (typeof value === "object" && value !== null) {
      lines.push(`${formatKey(key)}: ${JSON.stringify(value)}`);
    } else {
      lines.push(`${formatKey(key)}: ${String(value)}`);
    }
  }

  return lines;
}

/**
 * Configuration issues and destroy outcomes read better as one line each.
 */
function formatItem(item: unknown): string {
  if (isRecord(item)) {
    if (typeof item.path === "string" && typeof item.message === "string") {
      return `${item.path}: ${item.message}`;
    }
    if (typeof item.stage === "string" && typeof item.success === "boolean") {
      return `${item.stage}: ${item.success ? "success" : `failure${typeof item.error === "string" ? ` (${item.error})` : ""}`}`;
    }
    return JSON.stringify(item);
  }
  return String(item);
}

/**
 * `failedStages` → `Failed Stages`
 */
function formatKey(key: string): string {
  return key
    .replace(/_/g, " ")
    .replace(/([A-Z])/g, " $1")
    .replace(/^./, (str) => str.toUpperCase())
    .trim();
}
