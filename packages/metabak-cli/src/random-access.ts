// ─── metabak Random Access ───────────────────────────────────────────────────
// Positional reads over a file or an in-memory buffer.

import { open, type FileHandle } from "node:fs/promises";

export interface RandomAccess {
    size(): Promise<number>;
    /** Read up to `length` bytes at `offset`; shorter only at end of data. */
    read(offset: number, length: number): Promise<Buffer>;
    close(): Promise<void>;
}

export class FileRandomAccess implements RandomAccess {
    private constructor(
        readonly path: string,
        private readonly handle: FileHandle,
    ) {}

    static async open(path: string): Promise<FileRandomAccess> {
        return new FileRandomAccess(path, await open(path, "r"));
    }

    async size(): Promise<number> {
        const stat = await this.handle.stat();
        return stat.size;
    }

    async read(offset: number, length: number): Promise<Buffer> {
        const buffer = Buffer.alloc(length);
        const { bytesRead } = await this.handle.read(buffer, 0, length, offset);
        return bytesRead === length ? buffer : buffer.subarray(0, bytesRead);
    }

    async close(): Promise<void> {
        await this.handle.close();
    }
}

export class BufferRandomAccess implements RandomAccess {
    constructor(private readonly data: Buffer) {}

    async size(): Promise<number> {
        return this.data.length;
    }

    async read(offset: number, length: number): Promise<Buffer> {
        return this.data.subarray(offset, Math.min(this.data.length, offset + length));
    }

    async close(): Promise<void> {
        return;
    }
}
