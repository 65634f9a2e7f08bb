/**
 * Spinner for long-running CLI work.
 *
 * On a TTY the @clack/prompts spinner animates in place; elsewhere (CI, pipes)
 * each message is printed once through {@link CliUx}. At the `silent` level
 * nothing is shown on either path.
 *
 * @module
 */

import * as clack from "@clack/prompts";
import type { CliUx } from "./CliUx.js";

// =============================================================================
// Types
// =============================================================================

export interface CliSpinnerOptions {
  readonly ux: CliUx;

  /** Overrides TTY detection */
  readonly isTTY?: boolean;
}

type ClackSpinner = ReturnType<typeof clack.spinner>;

interface ActiveSpin {
  message: string;
  /** Set only when animating */
  readonly animation?: ClackSpinner;
}

type SpinOutcome = "succeeded" | "failed" | "stopped";

// =============================================================================
// CliSpinner
// =============================================================================

/**
 * @example
 * ```typescript
 * const spinner = createCliSpinner({ ux });
 *
 * const result = await spinner.wrap("Generating orders", () => generate(config, dir));
 * ```
 */
export class CliSpinner {
  private readonly ux: CliUx;
  private readonly animated: boolean;
  private active: ActiveSpin | undefined;

  constructor(options: CliSpinnerOptions) {
    this.ux = options.ux;
    this.animated = (options.isTTY ?? process.stdout.isTTY ?? false) && options.ux.isEnabled("info");
  }

  get isRunning(): boolean {
    return this.active !== undefined;
  }

  start(message: string): void {
    if (!this.animated) {
      this.ux.info(message);
      this.active = { message };
      return;
    }
    const animation = clack.spinner();
    animation.start(message);
    this.active = { message, animation };
  }

  /**
   * Replaces the message. Without a TTY the new message is printed as a
   * verbose line, one per generation step.
   */
  update(message: string): void {
    if (!this.active) {
      return;
    }
    this.active.message = message;
    if (this.active.animation) {
      this.active.animation.message(message);
    } else {
      this.ux.verbose(message);
    }
  }

  stop(): void {
    this.finish("stopped");
  }

  succeed(message?: string): void {
    this.finish("succeeded", message);
  }

  fail(message?: string): void {
    this.finish("failed", message);
  }

  /**
   * Runs an operation between `start` and `succeed`, or `fail` and rethrow.
   */
  async wrap<T>(message: string, operation: () => Promise<T>, successMessage?: string): Promise<T> {
    this.start(message);

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      this.fail(message);
      throw error;
    }
    this.succeed(successMessage ?? message);
    return result;
  }

  private finish(outcome: SpinOutcome, message?: string): void {
    const spin = this.active;
    this.active = undefined;
    const text = message ?? spin?.message ?? "";

    switch (outcome) {
      case "stopped":
        spin?.animation?.stop();
        return;
      case "succeeded":
        if (spin?.animation) {
          spin.animation.stop(text);
        } else {
          this.ux.success(text);
        }
        return;
      case "failed":
        spin?.animation?.stop(text, 1);
        this.ux.error(text);
        return;
    }
  }
}

export function createCliSpinner(options: CliSpinnerOptions): CliSpinner {
  return new CliSpinner(options);
}
