// ─── metabak Logger ──────────────────────────────────────────────────────────
// Explicit logging capability, created per invocation and handed to each component.

import { ANSI, isColorSupported } from "./render.js";

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    success(message: string): void;
}

export interface LoggerOptions {
    verbose?: boolean;
    color?: boolean;
    /** Defaults to stderr; stdout is reserved for reports. */
    write?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
    const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
    const color = options.color ?? isColorSupported;
    const paint = (code: string, text: string) => (color ? `${code}${text}${ANSI.reset}` : text);
    const tag = (code: string, label: string) => paint(code, label.padEnd(5));

    return {
        debug(message) {
            if (options.verbose) write(`${tag(ANSI.gray, "debug")} ${paint(ANSI.dim, message)}`);
        },
        info(message) {
            write(`${tag(ANSI.cyan, "info")} ${message}`);
        },
        warn(message) {
            write(`${tag(ANSI.yellow, "warn")} ${message}`);
        },
        error(message) {
            write(`${tag(ANSI.red, "error")} ${message}`);
        },
        success(message) {
            write(`${tag(ANSI.green, "ok")} ${message}`);
        },
    };
}

export const silentLogger: Logger = {
    debug() {},
    info() {},
    warn() {},
    error() {},
    success() {},
};
