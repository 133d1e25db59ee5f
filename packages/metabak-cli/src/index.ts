// ─── metabak — Public API ────────────────────────────────────────────────────
// Re-exports for programmatic use.

export { DataEncryptor } from "./crypto.js";
export { isEncryptedPem, isEncryptionAlgorithm, loadKeyMaterial, resolveDecodeSpec, resolveKeyPem } from "./keys.js";

export {
    LayeredReader,
    compressionSuffix,
    detectCompression,
    openDecoded,
    openLayered,
    peek,
} from "./stream.js";
export type { OpenLayeredOptions } from "./stream.js";

export { materialize, plainPathFor } from "./convert.js";

export {
    BACKUP_VERSION,
    BackupWriter,
    SEGMENT_NAMES,
    encodeSegment,
    parseFooter,
    readFooter,
    readSegment,
} from "./container.js";

export { BufferRandomAccess, FileRandomAccess } from "./random-access.js";
export type { RandomAccess } from "./random-access.js";

export { EncryptedStorage, FileStorage, createStorage } from "./storage.js";
export type { ObjectStorage, StorageKind } from "./storage.js";

export { createMetaClient, forEachConcurrent, redactUri } from "./meta.js";
export type { MetaClient } from "./meta.js";

export { runLoad, statBackup } from "./load.js";
export type { LoadContext } from "./load.js";

export { parseOptions } from "./options.js";
export { Progress, startSpinnerProgress } from "./progress.js";
export { ANSI, formatSegment, formatSummary, renderLines } from "./render.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";

export {
    BackupError,
    CopyError,
    CreateTargetError,
    DecodeInitError,
    KeyResolutionError,
    MalformedFooterError,
    MetaStoreError,
    PassphraseRequiredError,
    SegmentReadError,
    SourceNotFoundError,
    UsageError,
} from "./errors.js";
export type { BackupErrorCode } from "./errors.js";

export {
    DEFAULT_ALGORITHM,
    ENCRYPTION_ALGORITHMS,
    PASSPHRASE_ENV,
} from "./types.js";
export type {
    BackupFooter,
    CLIOptions,
    Compression,
    DecodeSpec,
    EncryptionAlgorithm,
    LoadOption,
    ProgressCallback,
    Segment,
    SegmentInfo,
    VolumeFormat,
} from "./types.js";
