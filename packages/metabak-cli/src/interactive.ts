// ─── metabak Interactive Flow ────────────────────────────────────────────────
// @clack/prompts walk-through for inspecting a binary backup.

import * as p from "@clack/prompts";
import { resolve } from "node:path";

import { materialize } from "./convert.js";
import { describeCause } from "./errors.js";
import { resolveDecodeSpec } from "./keys.js";
import { statBackup } from "./load.js";
import type { Logger } from "./logger.js";
import { DEFAULT_ALGORITHM, ENCRYPTION_ALGORITHMS, type EncryptionAlgorithm } from "./types.js";

type Action = "summary" | "offsets" | "segment";

/**
 * Run the interactive inspection flow.
 * Returns exit code: 0 = done, 1 = failed, 2 = cancelled.
 */
export async function runInteractive(logger: Logger): Promise<number> {
    p.intro("metabak — backup inspector");

    // ─── Step 1: Source ──────────────────────────────────────────────────

    const source = await p.text({
        message: "Backup path",
        placeholder: "./meta-dump.bin.gz",
        validate: (value: string) => {
            if (!value) return "Path is required";
            return undefined;
        },
    });
    if (p.isCancel(source)) {
        p.cancel("Cancelled.");
        return 2;
    }

    const keyRef = await p.text({
        message: "RSA private key path",
        placeholder: "leave empty for unencrypted backups",
        defaultValue: "",
    });
    if (p.isCancel(keyRef)) {
        p.cancel("Cancelled.");
        return 2;
    }

    let algorithm: EncryptionAlgorithm = DEFAULT_ALGORITHM;
    if (keyRef.trim()) {
        const picked = await p.select({
            message: "Encryption algorithm",
            options: ENCRYPTION_ALGORITHMS.map((value) => ({ value, label: value })),
        });
        if (p.isCancel(picked)) {
            p.cancel("Cancelled.");
            return 2;
        }
        algorithm = picked;
    }

    // ─── Step 2: Action ──────────────────────────────────────────────────

    const action = await p.select<Action>({
        message: "Show",
        options: [
            { value: "summary", label: "Segment summary" },
            { value: "offsets", label: "Segment summary with offsets" },
            { value: "segment", label: "One segment", hint: "by offset" },
        ],
    });
    if (p.isCancel(action)) {
        p.cancel("Cancelled.");
        return 2;
    }

    let offset: number | undefined = action === "offsets" ? -1 : undefined;
    if (action === "segment") {
        const raw = await p.text({
            message: "Segment offset",
            placeholder: "0",
            validate: (value: string) => (/^\d+$/.test(value) ? undefined : "Offset must be a non-negative integer"),
        });
        if (p.isCancel(raw)) {
            p.cancel("Cancelled.");
            return 2;
        }
        offset = Number.parseInt(raw, 10);
    }

    // ─── Step 3: Decode & Render ─────────────────────────────────────────

    const spin = p.spinner();
    spin.start("Decoding backup…");
    try {
        const spec = resolveDecodeSpec(resolve(source), {
            privateKeyRef: keyRef.trim() || undefined,
            algorithm,
        });
        const plain = await materialize(spec, logger);
        spin.stop(`Plain backup → ${plain}`);
        await statBackup(plain, offset, logger);
    } catch (err) {
        spin.stop(`Failed: ${describeCause(err)}`);
        p.outro("Done");
        return 1;
    }

    p.outro("Done");
    return 0;
}
