/**
 * CLI output formatting utilities with ANSI colors
 * No external dependencies - uses built-in Node.js ANSI escape codes
 */

import type { ConversionStatus, OutputEntry, OutputLevel } from "@clearsign/core";

// ── ANSI Color Codes ────────────────────────────────────────────────

const RESET = "\x1b[0m";

export const colors = {
  dim: (text: string) => `\x1b[2m${text}${RESET}`,
  bold: (text: string) => `\x1b[1m${text}${RESET}`,

  gray: (text: string) => `\x1b[90m${text}${RESET}`,
  cyan: (text: string) => `\x1b[36m${text}${RESET}`,

  bgGreen: (text: string) => `\x1b[42m\x1b[30m${text}${RESET}`,
  bgYellow: (text: string) => `\x1b[43m\x1b[30m${text}${RESET}`,
  bgRed: (text: string) => `\x1b[41m\x1b[97m${text}${RESET}`,
  bgBlue: (text: string) => `\x1b[44m\x1b[97m${text}${RESET}`,
};

// ── Formatting Helpers ──────────────────────────────────────────────

export function label(text: string): string {
  return colors.gray(text);
}

export function code(text: string): string {
  return colors.cyan(text);
}

export function levelBadge(level: OutputLevel): string {
  switch (level) {
    case "debug":
      return colors.dim(" DEBUG ");
    case "info":
      return colors.bgBlue(" INFO ");
    case "warning":
      return colors.bgYellow(" WARN ");
    case "error":
      return colors.bgRed(" ERROR ");
  }
}

export function statusBadge(status: ConversionStatus): string {
  switch (status) {
    case "success":
      return colors.bgGreen(" ✓ success ");
    case "partial":
      return colors.bgYellow(" ⚠ partial ");
    case "failure":
      return colors.bgRed(" ✗ failure ");
  }
}

export function formatEntryLine(entry: OutputEntry): string {
  return `${levelBadge(entry.level)} ${colors.bold(entry.title)} ${label(`(${entry.kind})`)} ${entry.message}`;
}

export function table(rows: Array<[string, string]>, keyWidth: number = 12): string {
  return rows
    .map(([key, value]) => {
      const padding = " ".repeat(Math.max(0, keyWidth - stripAnsi(key).length));
      return `${label(key)}${padding} ${value}`;
    })
    .join("\n");
}

// ── Utilities ───────────────────────────────────────────────────────

export function stripAnsi(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1b\[[0-9;]*m/g, "");
}
