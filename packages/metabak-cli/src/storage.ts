// ─── metabak Object Storage ──────────────────────────────────────────────────
// Directory-rooted object access, optionally decrypting whole objects.

import { open, type FileHandle } from "node:fs/promises";
import { isAbsolute, relative, resolve } from "node:path";
import { Readable } from "node:stream";
import { buffer } from "node:stream/consumers";

import type { DataEncryptor } from "./crypto.js";
import { SourceNotFoundError } from "./errors.js";

export interface ObjectStorage {
    readonly root: string;
    /**
     * Read `limit` bytes of object `key` starting at `offset`.
     * A negative limit reads to the end of the object.
     */
    get(key: string, offset?: number, limit?: number): Promise<Readable>;
}

export type StorageKind = "file";

// ─── File Store ──────────────────────────────────────────────────────────────

export class FileStorage implements ObjectStorage {
    readonly root: string;

    constructor(root: string) {
        this.root = resolve(root);
    }

    async get(key: string, offset = 0, limit = -1): Promise<Readable> {
        const path = this.pathOf(key);
        let handle: FileHandle;
        try {
            handle = await open(path, "r");
        } catch (err) {
            throw new SourceNotFoundError(path, err, "open");
        }
        if (limit === 0) {
            await handle.close();
            return Readable.from([], { objectMode: false });
        }
        return handle.createReadStream({
            start: offset,
            end: limit < 0 ? undefined : offset + limit - 1,
        });
    }

    private pathOf(key: string): string {
        const path = resolve(this.root, key);
        const rel = relative(this.root, path);
        if (rel === "" || rel.startsWith("..") || isAbsolute(rel)) {
            throw new SourceNotFoundError(path, `object key ${key} escapes storage root ${this.root}`, "open");
        }
        return path;
    }
}

// ─── Encrypted Store ─────────────────────────────────────────────────────────

/**
 * Wraps a store whose objects are sealed by a {@link DataEncryptor}.
 * Objects are decrypted whole; the requested range is cut from the plaintext.
 */
export class EncryptedStorage implements ObjectStorage {
    constructor(
        private readonly inner: ObjectStorage,
        private readonly encryptor: DataEncryptor,
    ) {}

    get root(): string {
        return this.inner.root;
    }

    async get(key: string, offset = 0, limit = -1): Promise<Readable> {
        const ciphertext = await buffer(await this.inner.get(key, 0, -1));
        const plaintext = this.encryptor.decrypt(ciphertext, key);
        const end = limit < 0 ? plaintext.length : Math.min(plaintext.length, offset + limit);
        return Readable.from([plaintext.subarray(offset, end)], { objectMode: false });
    }
}

export function createStorage(kind: StorageKind, root: string): ObjectStorage {
    switch (kind) {
        case "file":
            return new FileStorage(root);
    }
}
