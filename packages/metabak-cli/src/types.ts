// ─── metabak Types ───────────────────────────────────────────────────────────
// Shared shapes for decoding, inspecting and loading metadata backups.

/** Encryption algorithm selector for RSA-wrapped backups. */
export type EncryptionAlgorithm = "aes256gcm-rsa" | "chacha20-rsa";

export const ENCRYPTION_ALGORITHMS: readonly EncryptionAlgorithm[] = ["aes256gcm-rsa", "chacha20-rsa"];

export const DEFAULT_ALGORITHM: EncryptionAlgorithm = "aes256gcm-rsa";

/** Environment variable holding the passphrase of an encrypted private key. */
export const PASSPHRASE_ENV = "METABAK_RSA_PASSPHRASE";

/** CLI invocation options parsed from argv. */
export interface CLIOptions {
    metaUrl?: string;
    file?: string;
    encryptRsaKey?: string;
    encryptAlgo: EncryptionAlgorithm;
    binary: boolean;
    stat: boolean;
    /** Unset: summary without offsets. -1: summary with offsets. Otherwise a segment offset. */
    offset?: number;
    threads: number;
    verbose: boolean;
    help: boolean;
    version: boolean;
}

// ─── Decoding ────────────────────────────────────────────────────────────────

/** Immutable description of how one source artifact is decoded. */
export interface DecodeSpec {
    sourcePath: string;
    privateKeyRef?: string;
    passphrase?: string;
    algorithm: EncryptionAlgorithm;
}

/** Compression layer selected from the source file name. */
export type Compression = "none" | "gzip" | "zstd";

// ─── Backup Container ────────────────────────────────────────────────────────

/** Index entry for one named segment. */
export interface SegmentInfo {
    count: number;
    offset: number;
}

/** Trailer of a backup container. */
export interface BackupFooter {
    readonly version: number;
    readonly segments: Readonly<Record<string, SegmentInfo>>;
}

/** One decoded segment record. */
export interface Segment {
    readonly name: string;
    readonly offset: number;
    readonly value: unknown[];
    toString(): string;
}

// ─── Metadata Store ──────────────────────────────────────────────────────────

/** Volume format as stored by the metadata engine. */
export interface VolumeFormat {
    Name: string;
    UUID?: string;
    Storage?: string;
    Bucket?: string;
    SecretKey?: string;
    [key: string]: unknown;
}

/** Invoked with the segment name and how many items were just loaded. */
export type ProgressCallback = (name: string, count: number) => void;

export interface LoadOption {
    threads: number;
    progress?: ProgressCallback;
}
