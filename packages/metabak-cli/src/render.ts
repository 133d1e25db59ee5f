// ─── metabak Report Rendering ────────────────────────────────────────────────
// Plain tables on stdout for backup summaries and segment details.

import type { BackupFooter, Segment } from "./types.js";

// ─── ANSI Helpers ────────────────────────────────────────────────────────────

export const isColorSupported =
    process.env.FORCE_COLOR !== "0" &&
    (process.env.FORCE_COLOR !== undefined || (process.stderr.isTTY ?? false));

export const ANSI = {
    reset: "\x1b[0m",
    bold: "\x1b[1m",
    dim: "\x1b[2m",
    green: "\x1b[32m",
    red: "\x1b[31m",
    yellow: "\x1b[33m",
    cyan: "\x1b[36m",
    gray: "\x1b[90m",
} as const;

// ─── Summary ─────────────────────────────────────────────────────────────────

const COLUMN_WIDTH = 10;

function cell(value: string): string {
    return value.padEnd(COLUMN_WIDTH);
}

function byName(a: string, b: string): number {
    if (a < b) return -1;
    return a > b ? 1 : 0;
}

/**
 * Format the segment index as a table sorted by name.
 * With offsets the table gains a third column.
 */
export function formatSummary(footer: BackupFooter, withOffset: boolean): string[] {
    const names = Object.keys(footer.segments).sort(byName);
    const rule = "-".repeat(withOffset ? 34 : 23);

    const lines = [`Backup Version: ${footer.version}`, rule];
    lines.push(withOffset
        ? `${cell("Name")}| ${cell("Num")}| ${cell("Offset")}`
        : `${cell("Name")}| ${cell("Num")}`);
    lines.push(rule);

    for (const name of names) {
        const info = footer.segments[name];
        let row = `${cell(name)}| ${cell(String(info.count))}|`;
        if (withOffset) {
            row += ` ${cell(String(info.offset))}`;
        }
        lines.push(row);
    }
    return lines;
}

// ─── Segment Detail ──────────────────────────────────────────────────────────

export function formatSegment(segment: Segment): string[] {
    return [`Segment: ${segment.name}`, `Value: ${segment.toString()}`];
}

/**
 * Write report lines to stdout.
 */
export function renderLines(lines: readonly string[], write: (s: string) => void = (s) => process.stdout.write(s)): void {
    for (const line of lines) {
        write(`${line}\n`);
    }
}
