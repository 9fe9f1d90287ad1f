import { ClearSignError } from "./errors";
import type { OutputEntry, OutputKind, OutputLevel, OutputSink } from "./types";

/**
 * Accumulates entries reported during resolution / conversion and optionally
 * forwards each one to another sink (e.g. the console).
 */
export class OutputCollector implements OutputSink {
  readonly entries: OutputEntry[] = [];

  constructor(private readonly forward?: OutputSink) {}

  add(entry: OutputEntry): void {
    this.entries.push(entry);
    this.forward?.add(entry);
  }

  debug(kind: OutputKind, title: string, message: string): void {
    this.add({ level: "debug", kind, title, message });
  }

  info(kind: OutputKind, title: string, message: string): void {
    this.add({ level: "info", kind, title, message });
  }

  warning(kind: OutputKind, title: string, message: string): void {
    this.add({ level: "warning", kind, title, message });
  }

  /** Report an error. Returns `null` so callers can `return out.error(...)`. */
  error(kind: OutputKind, title: string, message: string): null {
    this.add({ level: "error", kind, title, message });
    return null;
  }

  count(level: OutputLevel): number {
    return this.entries.filter((entry) => entry.level === level).length;
  }

  get errorCount(): number {
    return this.count("error");
  }

  hasErrors(): boolean {
    return this.errorCount > 0;
  }
}

/**
 * Run `fn`, reporting any {@link ClearSignError} it throws as an error entry
 * and returning `null` in its place. Other errors propagate.
 */
export function captureErrors<T>(out: OutputCollector, fn: () => T): T | null {
  try {
    return fn();
  } catch (err) {
    if (err instanceof ClearSignError) {
      return out.error(err.kind, err.title, err.message);
    }
    throw err;
  }
}

export async function captureErrorsAsync<T>(
  out: OutputCollector,
  fn: () => Promise<T>
): Promise<T | null> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof ClearSignError) {
      return out.error(err.kind, err.title, err.message);
    }
    throw err;
  }
}

export function formatEntry(entry: OutputEntry): string {
  return `[${entry.level}] ${entry.title}: ${entry.message}`;
}

/** Sink writing warnings / errors to stderr and the rest to stdout. */
export function createConsoleSink(minLevel: OutputLevel = "info"): OutputSink {
  const order: OutputLevel[] = ["debug", "info", "warning", "error"];
  const threshold = order.indexOf(minLevel);
  return {
    add(entry) {
      if (order.indexOf(entry.level) < threshold) return;
      const line = formatEntry(entry);
      if (entry.level === "error") console.error(line);
      else if (entry.level === "warning") console.warn(line);
      else console.log(line);
    },
  };
}
