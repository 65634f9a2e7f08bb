/**
 * Human-facing CLI output for apiforge.
 *
 * Every command writes through a {@link CliUx}: progress and results to
 * stdout, warnings and errors to stderr. Verbosity is one of four levels;
 * errors are printed at every level, including `silent`.
 *
 * Machine-readable output (`--json`) goes through {@link CliUx.raw}, which
 * ignores the level and adds no symbols or colours.
 *
 * @module
 */

import pc from "picocolors";

// =============================================================================
// Types
// =============================================================================

/**
 * Output verbosity, from least to most.
 */
export type UxLevel = "silent" | "info" | "verbose" | "debug";

export interface CliUxOptions {
  readonly level: UxLevel;

  /** Defaults to whether stdout is a TTY */
  readonly colors?: boolean;

  readonly stdout?: (msg: string) => void;
  readonly stderr?: (msg: string) => void;
}

export interface ErrorDetails {
  readonly code?: string;
  readonly hint?: string;
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
  skipped: "-",
};

// =============================================================================
// CliUx Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const ux = createCliUx({ level: "info" });
 *
 * ux.success("Generated orders", { destination: "./orders" });
 * ux.step(3, 12, "config.pyproject");
 * ux.error("Configuration file not found", { code: "CONFIG_NOT_FOUND" });
 * ```
 */
export class CliUx {
  readonly level: UxLevel;
  private readonly colors: boolean;
  private readonly stdout: (msg: string) => void;
  private readonly stderr: (msg: string) => void;

  constructor(options: CliUxOptions) {
    this.level = options.level;
    this.colors = options.colors ?? process.stdout.isTTY ?? false;
    this.stdout = options.stdout ?? ((msg) => process.stdout.write(msg));
    this.stderr = options.stderr ?? ((msg) => process.stderr.write(msg));
  }

  isEnabled(level: UxLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  success(message: string, details?: Readonly<Record<string, unknown>>): void {
    const lines = [`${this.paint(pc.green, SYMBOLS.success)} ${message}`];
    for (const [key, value] of Object.entries(details ?? {})) {
      lines.push(`  ${this.paint(pc.dim, `${key}:`)} ${String(value)}`);
    }
    this.print("info", ...lines);
  }

  /**
   * Always shown, whatever the level.
   */
  error(message: string, details?: ErrorDetails): void {
    const code = details?.code ? `${this.paint(pc.red, details.code)}: ` : "";
    const lines = [`${this.paint(pc.red, SYMBOLS.error)} ${code}${message}`];
    if (details?.hint) {
      lines.push(`  ${this.paint(pc.dim, "Hint:")} ${details.hint}`);
    }
    this.errorBlock(lines);
  }

  /**
   * Pre-formatted lines on stderr, whatever the level.
   */
  errorBlock(lines: readonly string[]): void {
    for (const line of lines) {
      this.stderr(`${line}\n`);
    }
  }

  warn(message: string): void {
    if (this.isEnabled("info")) {
      this.errorBlock([`${this.paint(pc.yellow, SYMBOLS.warning)} ${message}`]);
    }
  }

  info(message: string): void {
    this.print("info", `${this.paint(pc.cyan, SYMBOLS.info)} ${message}`);
  }

  verbose(message: string): void {
    this.print("verbose", `  ${this.paint(pc.dim, message)}`);
  }

  debug(message: string): void {
    this.print("debug", `  ${this.paint(pc.dim, `[debug] ${message}`)}`);
  }

  /**
   * Numbered progress line, e.g. `[3/12] config.pyproject`.
   */
  step(current: number, total: number, description: string): void {
    this.print("info", `${this.paint(pc.dim, `[${current}/${total}]`)} ${description}`);
  }

  /**
   * A step that did not run, with the reason.
   */
  skipped(stepId: string, reason: string): void {
    this.print("info", `${this.paint(pc.yellow, SYMBOLS.skipped)} ${stepId} ${this.paint(pc.dim, `(${reason})`)}`);
  }

  detail(message: string): void {
    this.print("info", `  ${message}`);
  }

  newline(): void {
    this.print("info", "");
  }

  header(title: string): void {
    this.print("info", "", this.paint(pc.bold, title));
  }

  listItem(text: string): void {
    this.print("info", `  • ${text}`);
  }

  /**
   * Unadorned stdout output, written at every level.
   */
  raw(text: string): void {
    this.stdout(text.endsWith("\n") ? text : `${text}\n`);
  }

  private print(level: UxLevel, ...lines: string[]): void {
    if (!this.isEnabled(level)) {
      return;
    }
    for (const line of lines) {
      this.stdout(`${line}\n`);
    }
  }

  private paint(color: (text: string) => string, text: string): string {
    return this.colors ? color(text) : text;
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
 * Gets the process-wide instance, created at `info` on first use.
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
  readonly verbose: boolean;
  readonly debug: boolean;
  readonly silent: boolean;
}

/**
 * Maps the global flags to a level. `--debug` wins over `--silent`, which
 * wins over `--verbose`.
 */
export function parseUxLevel(flags: UxLevelFlags): UxLevel {
  if (flags.debug) {
    return "debug";
  }
  if (flags.silent) {
    return "silent";
  }
  if (flags.verbose) {
    return "verbose";
  }
  return "info";
}
