// ─── metabak Conversion Cache ────────────────────────────────────────────────
// Materializes a decoded backup next to its source, once.

import { once } from "node:events";
import { createWriteStream, existsSync } from "node:fs";
import { extname } from "node:path";
import { pipeline } from "node:stream/promises";

import { CopyError, CreateTargetError } from "./errors.js";
import { loadKeyMaterial } from "./keys.js";
import { silentLogger, type Logger } from "./logger.js";
import { compressionSuffix, detectCompression, openLayered } from "./stream.js";
import type { DecodeSpec } from "./types.js";

const PLAIN_SUFFIX = ".plain";

/**
 * Path of the plain artifact for a source: the outermost suffix removed.
 * A suffix-less encrypted source gets `.plain` appended instead.
 */
export function plainPathFor(sourcePath: string): string {
    const compression = detectCompression(sourcePath);
    if (compression !== "none") {
        return sourcePath.slice(0, -compressionSuffix(compression).length);
    }
    const ext = extname(sourcePath);
    return ext ? sourcePath.slice(0, -ext.length) : `${sourcePath}${PLAIN_SUFFIX}`;
}

/**
 * Decode `spec.sourcePath` into a plain sibling file and return its path.
 *
 * Plain, uncompressed sources are returned untouched. An existing file at the
 * target path is reused as is: a partial file left by a failed run is not
 * detected and must be removed by hand.
 */
export async function materialize(spec: DecodeSpec, logger: Logger = silentLogger): Promise<string> {
    const { sourcePath } = spec;
    const encrypted = Boolean(spec.privateKeyRef);
    if (!encrypted && detectCompression(sourcePath) === "none") {
        return sourcePath;
    }

    const target = plainPathFor(sourcePath);
    if (existsSync(target)) {
        logger.info(`plain backup ${target} already exists, skip conversion`);
        return target;
    }

    const encryptor = loadKeyMaterial(spec);
    const reader = await openLayered(sourcePath, { encryptor, logger });
    try {
        const out = createWriteStream(target, { flags: "wx" });
        try {
            await once(out, "open");
        } catch (err) {
            throw new CreateTargetError(target, err);
        }

        try {
            await pipeline(reader.stream, out);
        } catch (err) {
            throw new CopyError(sourcePath, target, err);
        }
    } finally {
        await reader.close();
    }

    logger.info(`converted backup ${sourcePath} to ${target}`);
    return target;
}
