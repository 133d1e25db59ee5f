// ─── metabak Layered Streams ─────────────────────────────────────────────────
// Decrypt then decompress a backup into one readable stream.

import { stat, open } from "node:fs/promises";
import { basename, dirname, resolve } from "node:path";
import { pipeline, Transform, type Readable, type TransformCallback } from "node:stream";
import { createGunzip } from "node:zlib";
import { Decompress } from "fzstd";

import type { DataEncryptor } from "./crypto.js";
import { DecodeInitError, SourceNotFoundError } from "./errors.js";
import { loadKeyMaterial } from "./keys.js";
import { silentLogger, type Logger } from "./logger.js";
import { EncryptedStorage, createStorage } from "./storage.js";
import type { Compression, DecodeSpec } from "./types.js";

// ─── Compression Selection ───────────────────────────────────────────────────

const SUFFIXES: Record<Exclude<Compression, "none">, string> = {
    gzip: ".gz",
    zstd: ".zstd",
};

const GZIP_MAGIC = Buffer.from([0x1f, 0x8b]);
const ZSTD_MAGIC = Buffer.from([0x28, 0xb5, 0x2f, 0xfd]);

/** Pick the compression layer from the file name. Only `.gz` and `.zstd` count. */
export function detectCompression(path: string): Compression {
    if (path.endsWith(SUFFIXES.gzip)) return "gzip";
    if (path.endsWith(SUFFIXES.zstd)) return "zstd";
    return "none";
}

export function compressionSuffix(compression: Exclude<Compression, "none">): string {
    return SUFFIXES[compression];
}

// ─── Zstandard ───────────────────────────────────────────────────────────────

class ZstdDecoder extends Transform {
    private readonly inner = new Decompress((chunk) => {
        if (chunk.length > 0) this.push(Buffer.from(chunk));
    });

    override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
        try {
            this.inner.push(chunk);
            callback();
        } catch (err) {
            callback(toError(err));
        }
    }

    override _flush(callback: TransformCallback): void {
        try {
            this.inner.push(new Uint8Array(0), true);
            callback();
        } catch (err) {
            callback(toError(err));
        }
    }
}

function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}

// ─── Composed Stream ─────────────────────────────────────────────────────────

/**
 * A decoded backup: reads come from the compression layer, which is the base
 * layer itself when the source is not compressed.
 */
export class LayeredReader {
    private closed = false;

    constructor(
        readonly compression: Compression,
        readonly compressionLayer: Readable,
        readonly baseLayer: Readable,
        private readonly logger: Logger = silentLogger,
    ) {}

    get stream(): Readable {
        return this.compressionLayer;
    }

    /** True when no compression layer wraps the base stream. */
    get sharesBase(): boolean {
        return this.compressionLayer === this.baseLayer;
    }

    [Symbol.asyncIterator](): AsyncIterator<Buffer> {
        return this.compressionLayer[Symbol.asyncIterator]();
    }

    /**
     * Close the compression layer, then the base layer unless both are the
     * same stream. Later calls do nothing.
     */
    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        const layers: Array<[string, Readable]> = this.sharesBase
            ? [["compression", this.compressionLayer]]
            : [["compression", this.compressionLayer], ["base", this.baseLayer]];

        // Destroying the decoder tears the base down with a premature-close error.
        for (const [label, stream] of layers) {
            stream.on("error", (err) => this.logger.debug(`${label} layer closed with: ${err.message}`));
        }
        for (const [, stream] of layers) {
            await closeLayer(stream);
        }
    }
}

function closeLayer(stream: Readable): Promise<void> {
    if (stream.closed) return Promise.resolve();
    return new Promise((resolvePromise) => {
        stream.once("close", () => resolvePromise());
        stream.destroy();
    });
}

/**
 * Read at least `size` bytes from a paused stream and push them back.
 * Returns fewer bytes only when the stream ends first; those are not pushed back.
 */
export async function peek(stream: Readable, size: number): Promise<Buffer> {
    const chunks: Buffer[] = [];
    let total = 0;
    let ended = false;
    const onEnd = () => {
        ended = true;
    };
    stream.once("end", onEnd);

    try {
        while (total < size && !ended) {
            const chunk: unknown = stream.read();
            if (Buffer.isBuffer(chunk)) {
                chunks.push(chunk);
                total += chunk.length;
                continue;
            }
            await readableOrEnd(stream);
        }
    } finally {
        stream.off("end", onEnd);
    }

    const head = Buffer.concat(chunks);
    if (!ended && head.length > 0) stream.unshift(head);
    return head;
}

function readableOrEnd(stream: Readable): Promise<void> {
    return new Promise((resolvePromise, reject) => {
        const cleanup = () => {
            stream.off("readable", onReady);
            stream.off("end", onReady);
            stream.off("error", onError);
        };
        const onReady = () => {
            cleanup();
            resolvePromise();
        };
        const onError = (err: Error) => {
            cleanup();
            reject(err);
        };
        stream.on("readable", onReady);
        stream.on("end", onReady);
        stream.on("error", onError);
    });
}

// ─── Open ────────────────────────────────────────────────────────────────────

export interface OpenLayeredOptions {
    encryptor?: DataEncryptor;
    logger?: Logger;
}

/**
 * Open `sourcePath` as a decoded stream. With an encryptor the file is fetched
 * through an encrypted object store rooted at its directory.
 */
export async function openLayered(sourcePath: string, options: OpenLayeredOptions = {}): Promise<LayeredReader> {
    const logger = options.logger ?? silentLogger;
    const base = options.encryptor
        ? await openEncrypted(sourcePath, options.encryptor)
        : await openPlain(sourcePath);

    const compression = detectCompression(sourcePath);
    logger.debug(`open ${sourcePath} (compression: ${compression}, encrypted: ${options.encryptor ? "yes" : "no"})`);

    try {
        const decoder = await createDecoder(compression, base, sourcePath, logger);
        return new LayeredReader(compression, decoder, base, logger);
    } catch (err) {
        base.destroy();
        throw err;
    }
}

/**
 * Load the decode spec's key material, if any, and open its source.
 */
export async function openDecoded(spec: DecodeSpec, logger: Logger = silentLogger): Promise<LayeredReader> {
    const encryptor = loadKeyMaterial(spec);
    return openLayered(spec.sourcePath, { encryptor, logger });
}

async function openPlain(sourcePath: string): Promise<Readable> {
    try {
        const handle = await open(sourcePath, "r");
        return handle.createReadStream();
    } catch (err) {
        throw new SourceNotFoundError(sourcePath, err, "open");
    }
}

async function openEncrypted(sourcePath: string, encryptor: DataEncryptor): Promise<Readable> {
    try {
        await stat(sourcePath);
    } catch (err) {
        throw new SourceNotFoundError(sourcePath, err);
    }
    const absPath = resolve(sourcePath);
    const blob = new EncryptedStorage(createStorage("file", dirname(absPath)), encryptor);
    return blob.get(basename(absPath), 0, -1);
}

async function createDecoder(
    compression: Compression,
    base: Readable,
    sourcePath: string,
    logger: Logger,
): Promise<Readable> {
    let decoder: Transform;
    switch (compression) {
        case "none":
            return base;
        case "gzip":
            await expectMagic(base, GZIP_MAGIC, "gzip", sourcePath);
            decoder = createGunzip();
            break;
        case "zstd":
            await expectMagic(base, ZSTD_MAGIC, "zstd", sourcePath);
            decoder = new ZstdDecoder();
            break;
    }

    pipeline(base, decoder, (err) => {
        if (err) logger.debug(`${compression} layer of ${sourcePath} stopped: ${err.message}`);
    });
    return decoder;
}

async function expectMagic(base: Readable, magic: Buffer, format: string, sourcePath: string): Promise<void> {
    const head = await peek(base, magic.length);
    if (head.length < magic.length || !head.subarray(0, magic.length).equals(magic)) {
        throw new DecodeInitError(`invalid ${format} header in ${sourcePath}`, {
            context: { sourcePath, format },
        });
    }
}
