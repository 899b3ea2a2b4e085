/**
 * Standardized error codes for clusterforge.
 *
 * Error codes are stable public API contracts. They should be:
 * - SCREAMING_SNAKE_CASE
 * - Grouped by domain
 *
 * @module
 */

// =============================================================================
// Error Code Enum
// =============================================================================

/**
 * All official clusterforge error codes.
 *
 * Codes are grouped by domain:
 * - CONFIG_* / PROVIDER_* / VERSION_* / DEPLOY_* : Configuration (pre-flight)
 * - STAGE_* : Stage registry and ordering
 * - PROVISION_* : Provisioning adapter failures
 * - CHECK_* : Post-deploy verification
 * - DESTROY_* : Teardown
 * - OUTPUTS_* : Persisted stage outputs
 * - INTERNAL_* : Internal errors
 */
export const ErrorCode = {
  // Configuration errors (20-29)
  CONFIG_NOT_FOUND: "CONFIG_NOT_FOUND",
  CONFIG_PARSE_FAILED: "CONFIG_PARSE_FAILED",
  CONFIG_INVALID: "CONFIG_INVALID",
  PROVIDER_UNSUPPORTED: "PROVIDER_UNSUPPORTED",
  CREDENTIALS_MISSING: "CREDENTIALS_MISSING",
  VERSION_MISMATCH: "VERSION_MISMATCH",
  DEPLOY_PREVENTED: "DEPLOY_PREVENTED",

  // Stage registry errors (30-39)
  STAGE_DUPLICATE: "STAGE_DUPLICATE",
  STAGE_DEPENDENCY_ORDER: "STAGE_DEPENDENCY_ORDER",
  STAGE_OUTPUT_INVALID: "STAGE_OUTPUT_INVALID",

  // Provisioning errors (40-49)
  PROVISION_FAILED: "PROVISION_FAILED",
  PROVISION_OUTPUT_INVALID: "PROVISION_OUTPUT_INVALID",

  // Check errors (50-59)
  CHECK_FAILED: "CHECK_FAILED",

  // Destroy errors (60-69)
  DESTROY_PARTIAL: "DESTROY_PARTIAL",
  DESTROY_ABORTED: "DESTROY_ABORTED",

  // Output store errors (70-79)
  OUTPUTS_READ_FAILED: "OUTPUTS_READ_FAILED",
  OUTPUTS_INVALID: "OUTPUTS_INVALID",
  RENDER_WRITE_FAILED: "RENDER_WRITE_FAILED",

  // Internal errors (1)
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// Error Categories
// =============================================================================

/**
 * Error category for grouping related errors.
 */
export type ErrorCategory =
  | "configuration"
  | "stage"
  | "provisioning"
  | "check"
  | "destroy"
  | "outputs"
  | "internal";

/**
 * Gets the category for an error code.
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  if (
    code.startsWith("CONFIG_") ||
    code.startsWith("PROVIDER_") ||
    code.startsWith("CREDENTIALS_") ||
    code.startsWith("VERSION_") ||
    code.startsWith("DEPLOY_")
  )
    return "configuration";
  if (code.startsWith("STAGE_")) return "stage";
  if (code.startsWith("PROVISION_")) return "provisioning";
  if (code.startsWith("CHECK_")) return "check";
  if (code.startsWith("DESTROY_")) return "destroy";
  if (code.startsWith("OUTPUTS_") || code.startsWith("RENDER_")) return "outputs";
  return "internal";
}

// =============================================================================
// Exit Codes
// =============================================================================

/**
 * Exit code ranges by category:
 * - 1: Internal/generic error
 * - 20-29: Configuration errors
 * - 30-39: Stage registry errors
 * - 40-49: Provisioning errors
 * - 50-59: Check errors
 * - 60-69: Destroy errors
 * - 70-79: Output store / render errors
 */
const EXIT_CODE_MAP: Record<ErrorCode, number> = {
  [ErrorCode.CONFIG_NOT_FOUND]: 20,
  [ErrorCode.CONFIG_PARSE_FAILED]: 21,
  [ErrorCode.CONFIG_INVALID]: 22,
  [ErrorCode.PROVIDER_UNSUPPORTED]: 23,
  [ErrorCode.CREDENTIALS_MISSING]: 24,
  [ErrorCode.VERSION_MISMATCH]: 25,
  [ErrorCode.DEPLOY_PREVENTED]: 26,

  [ErrorCode.STAGE_DUPLICATE]: 30,
  [ErrorCode.STAGE_DEPENDENCY_ORDER]: 31,
  [ErrorCode.STAGE_OUTPUT_INVALID]: 32,

  [ErrorCode.PROVISION_FAILED]: 40,
  [ErrorCode.PROVISION_OUTPUT_INVALID]: 41,

  [ErrorCode.CHECK_FAILED]: 50,

  [ErrorCode.DESTROY_PARTIAL]: 60,
  [ErrorCode.DESTROY_ABORTED]: 61,

  [ErrorCode.OUTPUTS_READ_FAILED]: 70,
  [ErrorCode.OUTPUTS_INVALID]: 71,
  [ErrorCode.RENDER_WRITE_FAILED]: 72,

  [ErrorCode.INTERNAL_ERROR]: 1,
};

/**
 * Gets the exit code for an error code.
 */
export function getExitCode(code: ErrorCode): number {
  return EXIT_CODE_MAP[code] ?? 1;
}

/**
 * Narrows an arbitrary string to a known error code.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(EXIT_CODE_MAP, code);
}
