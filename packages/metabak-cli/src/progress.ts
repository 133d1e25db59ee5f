// ─── metabak Load Progress ───────────────────────────────────────────────────
// Per-segment counters behind a @clack/prompts spinner.

import * as p from "@clack/prompts";

/**
 * Counters keyed by segment name. Increments may interleave across the
 * concurrent segment reads of one load; each is applied whole.
 */
export class Progress {
    private readonly counts = new Map<string, number>();

    constructor(
        names: readonly string[] = [],
        private readonly onChange?: (progress: Progress) => void,
    ) {
        for (const name of names) this.counts.set(name, 0);
    }

    increment(name: string, by = 1): void {
        this.counts.set(name, (this.counts.get(name) ?? 0) + by);
        this.onChange?.(this);
    }

    count(name: string): number {
        return this.counts.get(name) ?? 0;
    }

    get total(): number {
        let sum = 0;
        for (const value of this.counts.values()) sum += value;
        return sum;
    }

    /** Non-zero counters in name order, e.g. `edge 250 · node 100`. */
    summary(): string {
        return [...this.counts.entries()]
            .filter(([, value]) => value > 0)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([name, value]) => `${name} ${value}`)
            .join(" · ");
    }
}

export interface SpinnerProgress {
    progress: Progress;
    done(message: string): void;
}

/**
 * Start a spinner that shows the running counters.
 */
export function startSpinnerProgress(names: readonly string[], title: string): SpinnerProgress {
    const spin = p.spinner();
    spin.start(title);
    const progress = new Progress(names, (current) => {
        spin.message(`${title} ${current.summary()}`);
    });
    return {
        progress,
        done(message) {
            spin.stop(`${message} (${progress.summary() || "empty"})`);
        },
    };
}
