import { ErrorCode } from "./ErrorCode.js";

export class ForgeError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
    public readonly hint?: string,
    public readonly cause?: Error,
    public readonly isOperational: boolean = true,
    public readonly timestamp: Date = new Date(),
  ) {
    super(message);
    this.name = "ForgeError";
  }
}

/**
 * Options shared by the typed error subclasses.
 */
export interface ForgeErrorOptions {
  readonly details?: Record<string, unknown>;
  readonly hint?: string;
  readonly cause?: unknown;
}

function asError(cause: unknown): Error | undefined {
  if (cause === undefined) return undefined;
  return cause instanceof Error ? cause : new Error(String(cause));
}

/**
 * Schema, field, provider or credential problems. Always raised before any
 * provisioning side effect.
 */
export class ConfigurationError extends ForgeError {
  constructor(
    message: string,
    options: ForgeErrorOptions & {
      code?:
        | typeof ErrorCode.CONFIG_NOT_FOUND
        | typeof ErrorCode.CONFIG_PARSE_FAILED
        | typeof ErrorCode.CONFIG_INVALID
        | typeof ErrorCode.PROVIDER_UNSUPPORTED
        | typeof ErrorCode.CREDENTIALS_MISSING
        | typeof ErrorCode.VERSION_MISMATCH
        | typeof ErrorCode.DEPLOY_PREVENTED
        | typeof ErrorCode.STAGE_DUPLICATE;
    } = {},
  ) {
    super(
      message,
      options.code ?? ErrorCode.CONFIG_INVALID,
      options.details,
      options.hint,
      asError(options.cause),
    );
    this.name = "ConfigurationError";
  }
}

/**
 * A stage reads an output that no earlier stage produces. Indicates a
 * registry bug rather than a user mistake.
 */
export class DependencyOrderError extends ForgeError {
  constructor(message: string, options: ForgeErrorOptions = {}) {
    super(
      message,
      ErrorCode.STAGE_DEPENDENCY_ORDER,
      options.details,
      options.hint,
      asError(options.cause),
      false,
    );
    this.name = "DependencyOrderError";
  }
}

/**
 * The provisioning adapter reported a failure.
 */
export class ProvisioningError extends ForgeError {
  constructor(
    message: string,
    public readonly stage: string,
    options: ForgeErrorOptions = {},
  ) {
    super(
      message,
      ErrorCode.PROVISION_FAILED,
      { stage, ...options.details },
      options.hint,
      asError(options.cause),
    );
    this.name = "ProvisioningError";
  }
}

/**
 * Post-deploy verification failed; the stage's resource is unusable.
 */
export class CheckFailure extends ForgeError {
  constructor(
    message: string,
    public readonly stage: string,
    options: ForgeErrorOptions = {},
  ) {
    super(
      message,
      ErrorCode.CHECK_FAILED,
      { stage, ...options.details },
      options.hint,
      asError(options.cause),
    );
    this.name = "CheckFailure";
  }
}

/**
 * Outcome of a single stage's teardown.
 */
export interface DestroyOutcome {
  readonly stage: string;
  readonly success: boolean;
  readonly error?: string;
}

/**
 * One or more stages failed to tear down. Carries every stage's outcome.
 */
export class PartialDestroyFailure extends ForgeError {
  constructor(public readonly outcomes: readonly DestroyOutcome[]) {
    const failed = outcomes.filter((o) => !o.success).map((o) => o.stage);
    super(
      `Failed to destroy ${failed.length} stage${failed.length === 1 ? "" : "s"}: ${failed.join(", ")}`,
      ErrorCode.DESTROY_PARTIAL,
      { failedStages: failed },
      "Inspect the failing stages' provisioning output, fix the cause and re-run destroy.",
    );
    this.name = "PartialDestroyFailure";
  }
}

export function toUserMessage(err: unknown): { message: string; code?: string } {
  if (err instanceof ForgeError) {
    return { message: err.message, code: err.code };
  } else if (err instanceof Error) {
    return { message: err.message };
  } else {
    return { message: String(err) };
  }
}
