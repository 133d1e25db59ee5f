// ─── metabak Load Command ────────────────────────────────────────────────────
// Decode a backup, then inspect it or feed it to the metadata store.

import type { Readable } from "node:stream";

import { SEGMENT_NAMES, readFooter, readSegment } from "./container.js";
import { materialize } from "./convert.js";
import { MetaStoreError, SourceNotFoundError, UsageError } from "./errors.js";
import { resolveDecodeSpec } from "./keys.js";
import type { Logger } from "./logger.js";
import { createMetaClient, redactUri, type MetaClient } from "./meta.js";
import { Progress, startSpinnerProgress } from "./progress.js";
import { FileRandomAccess } from "./random-access.js";
import { formatSegment, formatSummary, renderLines } from "./render.js";
import { openDecoded, type LayeredReader } from "./stream.js";
import type { CLIOptions } from "./types.js";

export interface LoadContext {
    logger: Logger;
    env?: NodeJS.ProcessEnv;
    stdin?: Readable;
    /** Report output; defaults to stdout. */
    write?: (s: string) => void;
    createClient?: (uri: string, logger: Logger) => MetaClient;
    /** Replaces the spinner, e.g. in tests. */
    progress?: Progress;
}

type LoadOptions = Pick<
    CLIOptions,
    "metaUrl" | "file" | "encryptRsaKey" | "encryptAlgo" | "binary" | "stat" | "offset" | "threads"
>;

/**
 * Print the index of a plain backup container, or one of its segments.
 *
 * @param offset - Unset: summary. -1: summary with offsets. Otherwise the segment at that offset.
 */
export async function statBackup(
    path: string,
    offset: number | undefined,
    logger: Logger,
    write?: (s: string) => void,
): Promise<void> {
    logger.info(`load backup from ${path}`);
    let file: FileRandomAccess;
    try {
        file = await FileRandomAccess.open(path);
    } catch (err) {
        throw new SourceNotFoundError(path, err, "open");
    }

    try {
        if (offset === undefined || offset === -1) {
            renderLines(formatSummary(await readFooter(file), offset === -1), write);
        } else {
            renderLines(formatSegment(await readSegment(file, offset)), write);
        }
    } finally {
        await file.close();
    }
}

/**
 * Run a load: `--binary --stat FILE` inspects, otherwise META-URL receives FILE
 * (or stdin for JSON dumps).
 */
export async function runLoad(options: LoadOptions, ctx: LoadContext): Promise<void> {
    const { logger } = ctx;
    const decodeOptions = { privateKeyRef: options.encryptRsaKey, algorithm: options.encryptAlgo };

    if (options.binary && options.stat) {
        const source = options.file ?? options.metaUrl;
        if (!source) throw new UsageError("--stat needs a backup FILE");
        const plain = await materialize(resolveDecodeSpec(source, decodeOptions, ctx.env), logger);
        return statBackup(plain, options.offset, logger, ctx.write);
    }

    const { metaUrl } = options;
    if (!metaUrl) throw new UsageError("META-URL is required");

    const client = (ctx.createClient ?? createMetaClient)(metaUrl, logger);
    const current = await client.peekFormat();
    if (current) {
        throw new MetaStoreError(`database ${redactUri(metaUrl)} is used by volume ${current.Name}`);
    }

    if (options.binary) {
        if (!options.file) throw new UsageError("--binary needs a backup FILE");
        const plain = await materialize(resolveDecodeSpec(options.file, decodeOptions, ctx.env), logger);
        await loadBinary(client, plain, options.threads, ctx);
    } else {
        let reader: LayeredReader | undefined;
        try {
            let stream: Readable;
            if (options.file) {
                reader = await openDecoded(resolveDecodeSpec(options.file, decodeOptions, ctx.env), logger);
                stream = reader.stream;
            } else {
                stream = ctx.stdin ?? process.stdin;
            }
            await client.loadMeta(stream);
        } finally {
            await reader?.close();
        }
    }

    const format = await client.load();
    if (format.SecretKey === "removed") {
        logger.warn("secret key was removed; please correct it with `config` command");
    }
    logger.success(`load metadata from ${options.file ?? "STDIN"} succeed`);
}

async function loadBinary(client: MetaClient, path: string, threads: number, ctx: LoadContext): Promise<void> {
    if (ctx.progress) {
        const progress = ctx.progress;
        await client.loadMetaV2(path, { threads, progress: (name, count) => progress.increment(name, count) });
        return;
    }

    const spinner = startSpinnerProgress(SEGMENT_NAMES, "Loading segments…");
    try {
        await client.loadMetaV2(path, {
            threads,
            progress: (name, count) => spinner.progress.increment(name, count),
        });
        spinner.done("Loaded");
    } catch (err) {
        spinner.done("Load failed");
        throw err;
    }
}
