#!/usr/bin/env node
// ─── metabak CLI Entrypoint ──────────────────────────────────────────────────
// Load metadata from a previously dumped file, or show what a binary backup holds.
//
// Usage:
//   metabak dir:///var/lib/meta meta-dump.json.gz
//   metabak dir:///var/lib/meta meta-dump.bin --binary --threads 10
//   metabak meta-dump.bin --binary --stat --offset -1

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import { BackupError, UsageError, describeCause } from "./errors.js";
import { runInteractive } from "./interactive.js";
import { runLoad } from "./load.js";
import { createLogger } from "./logger.js";
import { parseOptions } from "./options.js";
import { PASSPHRASE_ENV, type CLIOptions } from "./types.js";

// ─── Version ─────────────────────────────────────────────────────────────────

function getVersion(): string {
    try {
        const pkgPath = join(dirname(fileURLToPath(import.meta.url)), "..", "package.json");
        const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
        if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
            return pkg.version;
        }
    } catch {
        // running outside the package layout
    }
    return "1.0.0";
}

// ─── Help ────────────────────────────────────────────────────────────────────

const HELP = `
  ${"\x1b[1m"}metabak${"\x1b[0m"} — load and inspect metadata backups

  ${"\x1b[2m"}Usage:${"\x1b[0m"}
    metabak META-URL [FILE]              Load a JSON dump (stdin when FILE is omitted)
    metabak META-URL FILE --binary       Load a binary backup
    metabak FILE --binary --stat         Show what a binary backup holds
    metabak                              Interactive inspection

  ${"\x1b[2m"}Options:${"\x1b[0m"}
    --encrypt-rsa-key KEY   RSA private key (PEM text or path to a PEM file)
    --encrypt-algo ALGO     aes256gcm-rsa (default) or chacha20-rsa
    --binary                Treat FILE as a binary backup container
    --stat                  Show the segment index (with --binary)
    --offset N              -1 lists segment offsets; N shows the segment at N
    --threads N             Concurrent segment reads for binary loads (default: 10)
    --verbose               Debug logging
    --help                  Show this help
    --version               Show version

  ${"\x1b[2m"}Environment:${"\x1b[0m"}
    ${PASSPHRASE_ENV}   Passphrase of an encrypted private key

  ${"\x1b[2m"}Files:${"\x1b[0m"}
    FILE.gz and FILE.zstd are decompressed; encrypted or compressed binary
    backups are decoded once to FILE without its last suffix and reused.

  ${"\x1b[2m"}Exit codes:${"\x1b[0m"}
    0  Success
    1  Load or inspection failed
    2  Invalid usage
`;

// ─── Main ────────────────────────────────────────────────────────────────────

async function main(): Promise<number> {
    let opts: CLIOptions;
    try {
        opts = parseOptions(process.argv.slice(2));
    } catch (err) {
        process.stderr.write(`Error: ${describeCause(err)}\nRun with --help for usage.\n`);
        return 2;
    }

    if (opts.help) {
        process.stderr.write(HELP);
        return 0;
    }

    if (opts.version) {
        process.stderr.write(`metabak v${getVersion()}\n`);
        return 0;
    }

    const logger = createLogger({ verbose: opts.verbose });

    if (!opts.metaUrl) {
        if (process.stdin.isTTY && process.stdout.isTTY) {
            return runInteractive(logger);
        }
        process.stderr.write(`Error: META-URL is required\nRun with --help for usage.\n`);
        return 2;
    }

    try {
        await runLoad(opts, { logger });
        return 0;
    } catch (err) {
        if (err instanceof UsageError) {
            process.stderr.write(`Error: ${err.message}\nRun with --help for usage.\n`);
            return 2;
        }
        process.stderr.write(`Error: ${describeCause(err)}\n`);
        if (opts.verbose && err instanceof BackupError && err.cause !== undefined) {
            process.stderr.write(`Caused by: ${describeCause(err.cause)}\n`);
        }
        return 1;
    }
}

// ─── Entry ───────────────────────────────────────────────────────────────────

main().then(
    (code) => process.exit(code),
    (err: unknown) => {
        process.stderr.write(`Fatal: ${describeCause(err)}\n`);
        process.exit(2);
    },
);
