// ─── metabak Metadata Store Client ───────────────────────────────────────────
// Minimal directory-backed engine that receives JSON dumps and binary backups.

import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import type { Readable } from "node:stream";
import { buffer } from "node:stream/consumers";

import { readFooter, readSegment } from "./container.js";
import { MetaStoreError, describeCause } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { FileRandomAccess } from "./random-access.js";
import type { LoadOption, VolumeFormat } from "./types.js";

export interface MetaClient {
    readonly uri: string;
    /** Stored format, or undefined when the store is empty. */
    peekFormat(): Promise<VolumeFormat | undefined>;
    /** Stored format; fails when the store holds none. */
    load(): Promise<VolumeFormat>;
    /** Load a JSON dump. */
    loadMeta(stream: Readable): Promise<void>;
    /** Load a plain binary backup container. */
    loadMetaV2(path: string, option: LoadOption): Promise<void>;
}

const SAFE_NAME = /^[A-Za-z0-9_.-]+$/;

/**
 * Replace the password of a meta URL with `****`.
 */
export function redactUri(uri: string): string {
    return uri.replace(/^([a-z][a-z0-9+.-]*:\/\/[^:/@]*):[^@/]*@/i, "$1:****@");
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toFormat(value: unknown, source: string): VolumeFormat {
    if (!isRecord(value) || typeof value.Name !== "string") {
        throw new MetaStoreError(`${source} has no volume format`);
    }
    const format: VolumeFormat = { Name: value.Name };
    for (const [key, field] of Object.entries(value)) {
        format[key] = field;
    }
    return format;
}

/**
 * Run `task` over `items` with at most `limit` in flight. After the first
 * failure no new task starts; the call settles once running tasks finish.
 */
export async function forEachConcurrent<T>(
    items: readonly T[],
    limit: number,
    task: (item: T) => Promise<void>,
): Promise<void> {
    let next = 0;
    let failed = false;
    const worker = async () => {
        while (!failed && next < items.length) {
            const item = items[next++];
            try {
                await task(item);
            } catch (err) {
                failed = true;
                throw err;
            }
        }
    };
    const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker);
    const results = await Promise.allSettled(workers);
    const rejected = results.find((result): result is PromiseRejectedResult => result.status === "rejected");
    if (rejected) throw rejected.reason;
}

// ─── Directory Engine ────────────────────────────────────────────────────────

class DirMetaClient implements MetaClient {
    private readonly formatPath: string;

    constructor(
        readonly uri: string,
        private readonly root: string,
        private readonly logger: Logger,
    ) {
        this.formatPath = join(root, "format.json");
    }

    async peekFormat(): Promise<VolumeFormat | undefined> {
        if (!existsSync(this.formatPath)) return undefined;
        return this.load();
    }

    async load(): Promise<VolumeFormat> {
        let raw: string;
        try {
            raw = await readFile(this.formatPath, "utf-8");
        } catch (err) {
            throw new MetaStoreError(`database ${redactUri(this.uri)} is not formatted: ${describeCause(err)}`, {
                cause: err,
            });
        }
        try {
            return toFormat(JSON.parse(raw), this.formatPath);
        } catch (err) {
            if (err instanceof MetaStoreError) throw err;
            throw new MetaStoreError(`corrupt format in ${this.formatPath}`, { cause: err });
        }
    }

    async loadMeta(stream: Readable): Promise<void> {
        const data = await buffer(stream);
        let dump: unknown;
        try {
            dump = JSON.parse(data.toString("utf-8"));
        } catch (err) {
            throw new MetaStoreError("metadata dump is not valid JSON", { cause: err });
        }
        if (!isRecord(dump)) throw new MetaStoreError("metadata dump is not an object");
        const format = toFormat(dump.Setting, "metadata dump");

        await mkdir(this.root, { recursive: true });
        await writeFile(join(this.root, "meta.json"), data);
        await this.saveFormat(format);
        this.logger.debug(`stored ${data.length} bytes of metadata in ${this.root}`);
    }

    async loadMetaV2(path: string, option: LoadOption): Promise<void> {
        const file = await FileRandomAccess.open(path);
        try {
            const footer = await readFooter(file);
            const names = Object.keys(footer.segments).sort();
            for (const name of names) {
                if (!SAFE_NAME.test(name)) throw new MetaStoreError(`invalid segment name ${JSON.stringify(name)}`);
            }

            const segmentDir = join(this.root, "segments");
            await mkdir(segmentDir, { recursive: true });
            const found: { format?: VolumeFormat } = {};

            await forEachConcurrent(names, option.threads, async (name) => {
                const segment = await readSegment(file, footer.segments[name].offset);
                if (segment.name !== name) {
                    throw new MetaStoreError(`index entry ${name} points at segment ${segment.name}`);
                }
                if (name === "format") {
                    found.format = toFormat(segment.value[0], "format segment");
                }
                await writeFile(join(segmentDir, `${name}.json`), segment.toString());
                option.progress?.(name, segment.value.length);
            });

            if (!found.format) throw new MetaStoreError(`backup ${path} has no format segment`);
            await this.saveFormat(found.format);
            this.logger.debug(`stored ${names.length} segments in ${segmentDir}`);
        } finally {
            await file.close();
        }
    }

    private async saveFormat(format: VolumeFormat): Promise<void> {
        await writeFile(this.formatPath, `${JSON.stringify(format, null, 2)}\n`);
    }
}

/**
 * Create a client for `dir:///path` or a bare directory path.
 */
export function createMetaClient(uri: string, logger: Logger = silentLogger): MetaClient {
    const scheme = /^([a-z][a-z0-9+.-]*):\/\//i.exec(uri);
    if (!scheme) return new DirMetaClient(uri, resolve(uri), logger);
    if (scheme[1].toLowerCase() !== "dir") {
        throw new MetaStoreError(`unsupported metadata engine ${scheme[1]}`, { context: { uri: redactUri(uri) } });
    }
    const path = uri.slice(scheme[0].length);
    if (!isAbsolute(path)) throw new MetaStoreError(`dir engine needs an absolute path, got ${path}`);
    return new DirMetaClient(uri, path, logger);
}
