import type { OutputCollector } from "../output/collector";
import type { OutputEntry } from "../output/types";

export type ConversionStatus = "success" | "partial" | "failure";

export interface ConversionReport<T> {
  status: ConversionStatus;
  artifacts: T[];
  entries: OutputEntry[];
}

/**
 * `failure` when nothing was produced, `partial` when something was produced
 * but at least one unit reported an error.
 */
export function conversionStatus(artifactCount: number, errorCount: number): ConversionStatus {
  if (artifactCount === 0) return "failure";
  return errorCount > 0 ? "partial" : "success";
}

export function buildReport<T>(artifacts: T[], out: OutputCollector): ConversionReport<T> {
  return {
    status: conversionStatus(artifacts.length, out.errorCount),
    artifacts,
    entries: out.entries,
  };
}
