/**
 * Human-facing CLI output.
 *
 * Structured JSON logs go to stderr through the ContextualLogger; this
 * module prints the short, colored lines a person reads while a pass runs.
 * Colors are used only on a TTY unless forced either way.
 *
 * @module
 */

import pc from "picocolors";

// =============================================================================
// Types
// =============================================================================

/**
 * Output levels from least to most verbose.
 */
export type UxLevel = "silent" | "info" | "verbose" | "debug";

export interface CliUxOptions {
  readonly level: UxLevel;

  /** Default: whether stdout is a TTY */
  readonly colors?: boolean;

  /** Custom stdout writer (for testing) */
  readonly stdout?: (msg: string) => void;

  /** Custom stderr writer (for testing) */
  readonly stderr?: (msg: string) => void;
}

export interface ErrorDetails {
  readonly code?: string;
  readonly hint?: string;
  readonly stage?: string;
}

// =============================================================================
// Constants
// =============================================================================

const LEVEL_ORDER: Record<UxLevel, number> = {
  silent: 0,
  info: 1,
  verbose: 2,
  debug: 3,
};

const SYMBOLS = {
  success: "✓",
  error: "✗",
  warning: "⚠",
  info: "→",
};

// =============================================================================
// CliUx Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const ux = createCliUx({ level: "info" });
 *
 * ux.success("Stage deployed", { stage: "02-infrastructure" });
 * ux.error("terraform apply failed", { stage: "02-infrastructure", hint: "Run it manually" });
 * ```
 */
export class CliUx {
  private readonly level: UxLevel;
  private readonly useColors: boolean;
  private readonly writeStdout: (msg: string) => void;
  private readonly writeStderr: (msg: string) => void;

  constructor(options: CliUxOptions) {
    this.level = options.level;
    this.useColors = options.colors ?? process.stdout.isTTY ?? false;
    this.writeStdout = options.stdout ?? ((msg) => process.stdout.write(msg));
    this.writeStderr = options.stderr ?? ((msg) => process.stderr.write(msg));
  }

  get currentLevel(): UxLevel {
    return this.level;
  }

  get colors(): boolean {
    return this.useColors;
  }

  private canLog(level: UxLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  private paint(color: (text: string) => string, text: string): string {
    return this.useColors ? color(text) : text;
  }

  // ===========================================================================
  // Output methods
  // ===========================================================================

  success(message: string, details?: Readonly<Record<string, unknown>>): void {
    if (!this.canLog("info")) return;

    this.writeStdout(`${this.paint(pc.green, SYMBOLS.success)} ${message}\n`);
    for (const [key, value] of Object.entries(details ?? {})) {
      this.writeStdout(`  ${this.paint(pc.dim, key + ":")} ${String(value)}\n`);
    }
  }

  /**
   * Always shown, even when silent.
   */
  error(message: string, details?: ErrorDetails): void {
    const code = details?.code ? `${this.paint(pc.red, details.code)}: ` : "";
    this.writeStderr(`${this.paint(pc.red, SYMBOLS.error)} ${code}${message}\n`);

    if (details?.stage) {
      this.writeStderr(`  ${this.paint(pc.dim, "Stage:")} ${details.stage}\n`);
    }
    if (details?.hint) {
      this.writeStderr(`  ${this.paint(pc.dim, "Hint:")} ${details.hint}\n`);
    }
  }

  warn(message: string): void {
    if (!this.canLog("info")) return;
    this.writeStderr(`${this.paint(pc.yellow, SYMBOLS.warning)} ${message}\n`);
  }

  info(message: string): void {
    if (!this.canLog("info")) return;
    this.writeStdout(`${this.paint(pc.cyan, SYMBOLS.info)} ${message}\n`);
  }

  verbose(message: string): void {
    if (!this.canLog("verbose")) return;
    this.writeStdout(`  ${this.paint(pc.dim, message)}\n`);
  }

  debug(message: string): void {
    if (!this.canLog("debug")) return;
    this.writeStdout(`  ${this.paint(pc.dim, `[debug] ${message}`)}\n`);
  }

  /**
   * Plain line on stdout, for tables and previews.
   */
  line(message = ""): void {
    if (!this.canLog("info")) return;
    this.writeStdout(`${message}\n`);
  }

  header(title: string): void {
    if (!this.canLog("info")) return;
    this.writeStdout(`\n${this.paint(pc.bold, title)}\n`);
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCliUx(options: CliUxOptions): CliUx {
  return new CliUx(options);
}

let defaultInstance: CliUx | null = null;

/**
 * Gets or creates the process-wide CliUx instance.
 */
export function getCliUx(): CliUx {
  if (!defaultInstance) {
    defaultInstance = createCliUx({ level: "info" });
  }
  return defaultInstance;
}

export function setDefaultCliUx(ux: CliUx): void {
  defaultInstance = ux;
}

// =============================================================================
// Level Parsing
// =============================================================================

export interface UxLevelFlags {
  readonly verbose?: boolean;
  readonly debug?: boolean;
  readonly silent?: boolean;
}

/**
 * `--debug` wins over `--silent`, which wins over `--verbose`.
 */
export function parseUxLevel(flags: UxLevelFlags): UxLevel {
  if (flags.debug) return "debug";
  if (flags.silent) return "silent";
  if (flags.verbose) return "verbose";
  return "info";
}
