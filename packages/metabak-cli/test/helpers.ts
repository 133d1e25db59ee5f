// ─── metabak Test Fixtures ───────────────────────────────────────────────────
// Temp dirs, throwaway RSA keys and hand-built zstd frames.

import { generateKeyPairSync } from "node:crypto";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Readable } from "node:stream";
import { buffer } from "node:stream/consumers";

export const TEST_PASSPHRASE = "test-secret";

export function makeTempDir(prefix: string): { dir: string; cleanup: () => void } {
    const dir = mkdtempSync(join(tmpdir(), `metabak-${prefix}-`));
    return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

export function rsaKeyPem(): string {
    const { privateKey } = generateKeyPairSync("rsa", {
        modulusLength: 2048,
        publicKeyEncoding: { type: "spki", format: "pem" },
        privateKeyEncoding: { type: "pkcs1", format: "pem" },
    });
    return privateKey;
}

/** PKCS#1 key with a `Proc-Type: 4,ENCRYPTED` header. */
export function encryptedRsaKeyPem(passphrase = TEST_PASSPHRASE): string {
    const { privateKey } = generateKeyPairSync("rsa", {
        modulusLength: 2048,
        publicKeyEncoding: { type: "spki", format: "pem" },
        privateKeyEncoding: { type: "pkcs1", format: "pem", cipher: "aes-256-cbc", passphrase },
    });
    return privateKey;
}

/**
 * Single-segment zstd frame holding `content` in one raw block.
 * Content must be shorter than 256 bytes (one-byte content size field).
 */
export function zstdRawFrame(content: Buffer): Buffer {
    if (content.length >= 256) throw new RangeError("content too large for a one-byte size field");
    const header = Buffer.from([0x28, 0xb5, 0x2f, 0xfd, 0x20, content.length]);
    const block = (content.length << 3) | 1;
    const blockHeader = Buffer.from([block & 0xff, (block >> 8) & 0xff, (block >> 16) & 0xff]);
    return Buffer.concat([header, blockHeader, content]);
}

export async function readAll(stream: Readable): Promise<string> {
    return (await buffer(stream)).toString("utf-8");
}
