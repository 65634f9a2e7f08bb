/**
 * Engine Trace.
 *
 * Collects timing entries for the phases of one invocation and, optionally,
 * for individual steps. Printed by `apiforge generate --verbose`.
 *
 * ```typescript
 * const trace = new EngineTrace();
 * trace.start("plan.resolve");
 * const plan = resolve(registry, config);
 * trace.end("plan.resolve");
 *
 * console.log(trace.toHumanString());
 * ```
 *
 * @module
 */

// =============================================================================
// Types
// =============================================================================

export interface TraceEntry {
  readonly name: string;
  readonly start: Date;
  /** Undefined while the entry is still running */
  readonly end?: Date;
  readonly durationMs?: number;
  /** Nesting depth: 0 for phases, 1 for steps recorded inside a phase */
  readonly depth: number;
  readonly context?: Record<string, unknown>;
}

/** A trace entry with ISO timestamps */
export type TraceEntryJson = Omit<TraceEntry, "start" | "end"> & {
  readonly start: string;
  readonly end?: string;
};

export interface TraceJson {
  trace: TraceEntryJson[];
  totalDurationMs: number;
}

type MutableTraceEntry = { -readonly [K in keyof TraceEntry]: TraceEntry[K] };

// =============================================================================
// EngineTrace
// =============================================================================

export class EngineTrace {
  private readonly entries: MutableTraceEntry[] = [];
  private readonly open = new Map<string, MutableTraceEntry>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  /**
   * Starts a top-level entry. Starting a name that is already open is ignored.
   */
  start(name: string, context?: Record<string, unknown>): void {
    if (this.open.has(name)) {
      return;
    }
    const entry: MutableTraceEntry = { name, start: this.clock(), depth: 0, context };
    this.entries.push(entry);
    this.open.set(name, entry);
  }

  /**
   * Ends an open entry. Unknown or already ended names are ignored.
   */
  end(name: string): void {
    const entry = this.open.get(name);
    if (!entry) {
      return;
    }
    entry.end = this.clock();
    entry.durationMs = entry.end.getTime() - entry.start.getTime();
    this.open.delete(name);
  }

  /**
   * Records an already measured nested entry, such as one generation step.
   */
  record(name: string, durationMs: number, context?: Record<string, unknown>): void {
    const end = this.clock();
    this.entries.push({
      name,
      start: new Date(end.getTime() - durationMs),
      end,
      durationMs,
      depth: 1,
      context,
    });
  }

  toArray(): TraceEntry[] {
    return this.entries.map((e) => ({ ...e }));
  }

  /**
   * Sum of the completed top-level entries.
   */
  totalDurationMs(): number {
    return this.entries
      .filter((e) => e.depth === 0)
      .reduce((sum, e) => sum + (e.durationMs ?? 0), 0);
  }

  toJSON(): TraceJson {
    return {
      trace: this.entries.map(({ start, end, ...rest }) => ({
        ...rest,
        start: start.toISOString(),
        end: end?.toISOString(),
      })),
      totalDurationMs: this.totalDurationMs(),
    };
  }

  /**
   * One line per entry, steps indented under their phase.
   */
  toHumanString(): string {
    if (this.entries.length === 0) {
      return "";
    }

    const labels = this.entries.map((e) => "  ".repeat(e.depth) + e.name);
    const width = Math.max(...labels.map((l) => l.length));

    const lines = this.entries.map((entry, i) => {
      const label = labels[i].padEnd(width);
      const timing = entry.durationMs !== undefined ? formatDuration(entry.durationMs) : "(in progress)";
      return `  ${label}  ${timing}`;
    });

    lines.push(`  ${"─".repeat(width + 12)}`);
    lines.push(`  Completed in ${formatDuration(this.totalDurationMs())}`);
    return lines.join("\n");
  }
}

/**
 * Formats a duration for display: `850ms`, `1.25s`.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}
