// ─── metabak Backup Container ────────────────────────────────────────────────
// Named segments written in one pass, indexed by a trailer at end of file.
//
// Segment:  u32be magic "MBKS" | u8 nameLen | name | u32be payloadLen | JSON array
// Trailer:  footer JSON | u32be footerLen | "MBKFOOT1"

import { once } from "node:events";
import { finished } from "node:stream/promises";
import type { Writable } from "node:stream";

import { MalformedFooterError, SegmentReadError } from "./errors.js";
import type { RandomAccess } from "./random-access.js";
import type { BackupFooter, Segment, SegmentInfo } from "./types.js";

export const BACKUP_VERSION = 1;

export const SEGMENT_NAMES = [
    "format",
    "counter",
    "sustained",
    "delFile",
    "sliceRef",
    "acl",
    "xattr",
    "quota",
    "stat",
    "node",
    "chunk",
    "edge",
    "parent",
    "symlink",
] as const;

const SEGMENT_MAGIC = 0x4d424b53;
const SEGMENT_PREFIX_SIZE = 5;
const LENGTH_SIZE = 4;
const MAX_NAME_BYTES = 255;

const FOOTER_MAGIC = Buffer.from("MBKFOOT1", "ascii");
const TRAILER_SIZE = LENGTH_SIZE + FOOTER_MAGIC.length;

const utf8Fatal = new TextDecoder("utf-8", { fatal: true });

// ─── Segment Records ─────────────────────────────────────────────────────────

class SegmentRecord implements Segment {
    constructor(
        readonly name: string,
        readonly offset: number,
        readonly value: unknown[],
    ) {}

    toString(): string {
        return JSON.stringify(this.value);
    }
}

/**
 * Encode one segment record.
 */
export function encodeSegment(name: string, items: readonly unknown[]): Buffer {
    const nameBytes = Buffer.from(name, "utf-8");
    if (nameBytes.length === 0 || nameBytes.length > MAX_NAME_BYTES) {
        throw new RangeError(`segment name must be 1-${MAX_NAME_BYTES} bytes, got ${nameBytes.length}`);
    }
    const payload = Buffer.from(JSON.stringify(items), "utf-8");

    const prefix = Buffer.alloc(SEGMENT_PREFIX_SIZE);
    prefix.writeUInt32BE(SEGMENT_MAGIC, 0);
    prefix.writeUInt8(nameBytes.length, 4);
    const length = Buffer.alloc(LENGTH_SIZE);
    length.writeUInt32BE(payload.length, 0);

    return Buffer.concat([prefix, nameBytes, length, payload]);
}

// ─── Writer ──────────────────────────────────────────────────────────────────

/**
 * Streams segments to a sink and appends the index once all are written.
 * Each name may be written once.
 */
export class BackupWriter {
    private position = 0;
    private done = false;
    private readonly segments = new Map<string, SegmentInfo>();

    constructor(
        private readonly sink: Writable,
        private readonly version: number = BACKUP_VERSION,
    ) {}

    get bytesWritten(): number {
        return this.position;
    }

    async writeSegment(name: string, items: readonly unknown[]): Promise<SegmentInfo> {
        if (this.done) throw new Error("backup already finished");
        if (this.segments.has(name)) {
            throw new Error(`segment ${name} already written`);
        }
        const info: SegmentInfo = { count: items.length, offset: this.position };
        await this.write(encodeSegment(name, items));
        this.segments.set(name, info);
        return info;
    }

    /**
     * Write the trailer and end the sink.
     */
    async finish(): Promise<BackupFooter> {
        if (this.done) throw new Error("backup already finished");
        this.done = true;

        // fromEntries defines own properties, so names such as __proto__ survive.
        const footer: BackupFooter = { version: this.version, segments: Object.fromEntries(this.segments) };
        const body = Buffer.from(JSON.stringify(footer), "utf-8");
        const length = Buffer.alloc(LENGTH_SIZE);
        length.writeUInt32BE(body.length, 0);

        await this.write(Buffer.concat([body, length, FOOTER_MAGIC]));
        this.sink.end();
        await finished(this.sink, { readable: false });
        return footer;
    }

    private async write(chunk: Buffer): Promise<void> {
        this.position += chunk.length;
        if (!this.sink.write(chunk)) {
            await once(this.sink, "drain");
        }
    }
}

// ─── Footer ──────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
    return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Validate a decoded footer object.
 */
export function parseFooter(raw: unknown): BackupFooter {
    if (!isRecord(raw)) throw new MalformedFooterError("footer is not an object");

    const { version, segments } = raw;
    if (typeof version !== "number" || !Number.isSafeInteger(version) || version < 1) {
        throw new MalformedFooterError(`invalid version ${String(version)}`);
    }
    if (!isRecord(segments)) throw new MalformedFooterError("segment index is not an object");

    const index: Array<[string, SegmentInfo]> = [];
    for (const [name, info] of Object.entries(segments)) {
        if (!isRecord(info) || !isCount(info.count) || !isCount(info.offset)) {
            throw new MalformedFooterError(`invalid index entry for segment ${name}`);
        }
        index.push([name, { count: info.count, offset: info.offset }]);
    }
    return { version, segments: Object.fromEntries(index) };
}

/**
 * Read the segment index from the trailer without touching the body.
 */
export async function readFooter(file: RandomAccess): Promise<BackupFooter> {
    const size = await file.size();
    if (size < TRAILER_SIZE) {
        throw new MalformedFooterError(`file too small (${size} bytes)`);
    }

    const trailer = await file.read(size - TRAILER_SIZE, TRAILER_SIZE);
    if (!trailer.subarray(LENGTH_SIZE).equals(FOOTER_MAGIC)) {
        throw new MalformedFooterError("trailer magic not found");
    }

    const footerLength = trailer.readUInt32BE(0);
    if (footerLength > size - TRAILER_SIZE) {
        throw new MalformedFooterError(`footer length ${footerLength} exceeds file size ${size}`);
    }

    const body = await file.read(size - TRAILER_SIZE - footerLength, footerLength);
    let raw: unknown;
    try {
        raw = JSON.parse(utf8Fatal.decode(body));
    } catch (err) {
        throw new MalformedFooterError("footer is not valid JSON", { cause: err });
    }
    return parseFooter(raw);
}

// ─── Segments ────────────────────────────────────────────────────────────────

/**
 * Read the single segment record starting at `offset`. Offsets come from a
 * footer entry; anything else is rejected when it does not decode.
 */
export async function readSegment(file: RandomAccess, offset: number): Promise<Segment> {
    const size = await file.size();
    if (!Number.isSafeInteger(offset) || offset < 0 || offset + SEGMENT_PREFIX_SIZE > size) {
        throw new SegmentReadError(offset, `offset out of bounds (file size ${size})`);
    }

    const prefix = await file.read(offset, SEGMENT_PREFIX_SIZE);
    if (prefix.readUInt32BE(0) !== SEGMENT_MAGIC) {
        throw new SegmentReadError(offset, "no segment record at this offset");
    }
    const nameLength = prefix.readUInt8(4);
    const headerEnd = offset + SEGMENT_PREFIX_SIZE + nameLength + LENGTH_SIZE;
    if (nameLength === 0 || headerEnd > size) {
        throw new SegmentReadError(offset, "truncated segment header");
    }

    const header = await file.read(offset + SEGMENT_PREFIX_SIZE, nameLength + LENGTH_SIZE);
    let name: string;
    try {
        name = utf8Fatal.decode(header.subarray(0, nameLength));
    } catch (err) {
        throw new SegmentReadError(offset, "segment name is not UTF-8", err);
    }

    const payloadLength = header.readUInt32BE(nameLength);
    if (headerEnd + payloadLength > size) {
        throw new SegmentReadError(offset, `segment ${name} runs past end of file`);
    }

    const payload = await file.read(headerEnd, payloadLength);
    let value: unknown;
    try {
        value = JSON.parse(utf8Fatal.decode(payload));
    } catch (err) {
        throw new SegmentReadError(offset, `segment ${name} payload is not valid JSON`, err);
    }
    if (!Array.isArray(value)) {
        throw new SegmentReadError(offset, `segment ${name} payload is not a list`);
    }
    return new SegmentRecord(name, offset, value);
}
