// ─── metabak CLI Options ─────────────────────────────────────────────────────
// argv → CLIOptions. Every invalid value is a UsageError.

import { parseArgs } from "node:util";

import { UsageError, describeCause } from "./errors.js";
import { isEncryptionAlgorithm } from "./keys.js";
import { DEFAULT_ALGORITHM, type CLIOptions } from "./types.js";

const DEFAULT_THREADS = "10";

function parseInteger(flag: string, raw: string, min: number): number {
    if (!/^-?\d+$/.test(raw.trim())) {
        throw new UsageError(`--${flag} must be an integer, got "${raw}"`);
    }
    const value = Number.parseInt(raw, 10);
    if (!Number.isSafeInteger(value) || value < min) {
        throw new UsageError(`--${flag} must be >= ${min}, got ${raw}`);
    }
    return value;
}

/**
 * `--offset -1` reads as a flag to parseArgs; join negative numbers to their flag.
 */
function joinNegativeValues(argv: readonly string[]): string[] {
    const out: string[] = [];
    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const next = argv[i + 1];
        if ((arg === "--offset" || arg === "--threads") && next !== undefined && /^-\d+$/.test(next)) {
            out.push(`${arg}=${next}`);
            i++;
        } else {
            out.push(arg);
        }
    }
    return out;
}

function parse(argv: readonly string[]) {
    try {
        return parseArgs({
            args: joinNegativeValues(argv),
            options: {
                "encrypt-rsa-key": { type: "string" },
                "encrypt-algo": { type: "string", default: DEFAULT_ALGORITHM },
                binary: { type: "boolean", default: false },
                stat: { type: "boolean", default: false },
                offset: { type: "string" },
                threads: { type: "string", default: DEFAULT_THREADS },
                verbose: { type: "boolean", default: false },
                help: { type: "boolean", short: "h", default: false },
                version: { type: "boolean", short: "v", default: false },
            },
            strict: true,
            allowPositionals: true,
        });
    } catch (err) {
        throw new UsageError(describeCause(err));
    }
}

export function parseOptions(argv: readonly string[]): CLIOptions {
    const { values, positionals } = parse(argv);

    const algo = values["encrypt-algo"] ?? DEFAULT_ALGORITHM;
    if (!isEncryptionAlgorithm(algo)) {
        throw new UsageError(`--encrypt-algo must be aes256gcm-rsa or chacha20-rsa, got "${algo}"`);
    }
    if (positionals.length > 2) {
        throw new UsageError(`expected META-URL [FILE], got ${positionals.length} arguments`);
    }

    return {
        metaUrl: positionals[0],
        file: positionals[1],
        encryptRsaKey: values["encrypt-rsa-key"],
        encryptAlgo: algo,
        binary: values.binary ?? false,
        stat: values.stat ?? false,
        offset: values.offset === undefined ? undefined : parseInteger("offset", values.offset, -1),
        threads: parseInteger("threads", values.threads ?? DEFAULT_THREADS, 1),
        verbose: values.verbose ?? false,
        help: values.help ?? false,
        version: values.version ?? false,
    };
}
