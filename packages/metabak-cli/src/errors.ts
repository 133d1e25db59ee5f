// ─── metabak Errors ──────────────────────────────────────────────────────────
// Every failure is terminal for the invocation; context carries the paths and
// offsets needed to act on it.

export type BackupErrorCode =
    | "KEY_RESOLUTION"
    | "PASSPHRASE_REQUIRED"
    | "SOURCE_NOT_FOUND"
    | "DECODE_INIT"
    | "CREATE_TARGET"
    | "COPY"
    | "MALFORMED_FOOTER"
    | "SEGMENT_READ"
    | "META_STORE"
    | "USAGE";

export interface BackupErrorOptions {
    context?: Record<string, string>;
    cause?: unknown;
}

/** Base class for all errors raised by metabak. */
export class BackupError extends Error {
    readonly code: BackupErrorCode;
    readonly context: Record<string, string>;

    constructor(code: BackupErrorCode, message: string, options: BackupErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = "BackupError";
        this.code = code;
        this.context = options.context ?? {};
    }

    toJSON(): { name: string; code: BackupErrorCode; message: string; context: Record<string, string> } {
        return { name: this.name, code: this.code, message: this.message, context: this.context };
    }
}

export class KeyResolutionError extends BackupError {
    constructor(message: string, options?: BackupErrorOptions) {
        super("KEY_RESOLUTION", message, options);
        this.name = "KeyResolutionError";
    }
}

export class PassphraseRequiredError extends BackupError {
    constructor(envName: string) {
        super(
            "PASSPHRASE_REQUIRED",
            `passphrase is required to private key, please try again after setting the '${envName}' environment variable`,
            { context: { env: envName } },
        );
        this.name = "PassphraseRequiredError";
    }
}

export class SourceNotFoundError extends BackupError {
    constructor(sourcePath: string, cause?: unknown, action: "stat" | "open" = "stat") {
        super("SOURCE_NOT_FOUND", `failed to ${action} ${sourcePath}: ${describeCause(cause)}`, {
            context: { sourcePath },
            cause,
        });
        this.name = "SourceNotFoundError";
    }
}

export class DecodeInitError extends BackupError {
    constructor(message: string, options?: BackupErrorOptions) {
        super("DECODE_INIT", message, options);
        this.name = "DecodeInitError";
    }
}

export class CreateTargetError extends BackupError {
    constructor(targetPath: string, cause?: unknown) {
        super("CREATE_TARGET", `failed to create plain backup ${targetPath}: ${describeCause(cause)}`, {
            context: { targetPath },
            cause,
        });
        this.name = "CreateTargetError";
    }
}

export class CopyError extends BackupError {
    constructor(sourcePath: string, targetPath: string, cause?: unknown) {
        super("COPY", `failed to convert ${sourcePath} to ${targetPath}: ${describeCause(cause)}`, {
            context: { sourcePath, targetPath },
            cause,
        });
        this.name = "CopyError";
    }
}

export class MalformedFooterError extends BackupError {
    constructor(message: string, options?: BackupErrorOptions) {
        super("MALFORMED_FOOTER", `failed to read footer: ${message}`, options);
        this.name = "MalformedFooterError";
    }
}

export class SegmentReadError extends BackupError {
    constructor(offset: number, message: string, cause?: unknown) {
        super("SEGMENT_READ", `failed to read segment at offset ${offset}: ${message}`, {
            context: { offset: String(offset) },
            cause,
        });
        this.name = "SegmentReadError";
    }
}

export class MetaStoreError extends BackupError {
    constructor(message: string, options?: BackupErrorOptions) {
        super("META_STORE", message, options);
        this.name = "MetaStoreError";
    }
}

export class UsageError extends BackupError {
    constructor(message: string) {
        super("USAGE", message);
        this.name = "UsageError";
    }
}

export function describeCause(cause: unknown): string {
    if (cause === undefined) return "unknown error";
    return cause instanceof Error ? cause.message : String(cause);
}
