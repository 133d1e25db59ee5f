// ─── metabak Cryptographic Primitives ────────────────────────────────────────
// RSA-wrapped data keys with AES-256-GCM or ChaCha20-Poly1305 payloads.
// Node crypto only.

import {
    constants,
    createCipheriv,
    createDecipheriv,
    createPublicKey,
    privateDecrypt,
    publicEncrypt,
    randomBytes,
    type KeyObject,
} from "node:crypto";

import { DecodeInitError } from "./errors.js";
import type { EncryptionAlgorithm } from "./types.js";

// ─── Object Layout ───────────────────────────────────────────────────────────
// u16be wrapped-key length | u8 nonce length | wrapped key | nonce | ciphertext | tag
// The data key is a fresh 32-byte key per object, wrapped with RSA-OAEP(SHA-256).

const DATA_KEY_SIZE = 32;
const NONCE_SIZE = 12;
const TAG_SIZE = 16;
const HEADER_SIZE = 3;

const OAEP = { padding: constants.RSA_PKCS1_OAEP_PADDING, oaepHash: "sha256" } as const;

/**
 * Encrypts and decrypts whole objects with an RSA key pair.
 * Decryption needs the private key; encryption only its public half.
 */
export class DataEncryptor {
    private readonly publicKey: KeyObject;

    constructor(
        private readonly privateKey: KeyObject,
        readonly algorithm: EncryptionAlgorithm,
    ) {
        this.publicKey = createPublicKey(privateKey);
    }

    encrypt(plaintext: Buffer): Buffer {
        const dataKey = randomBytes(DATA_KEY_SIZE);
        const wrapped = publicEncrypt({ key: this.publicKey, ...OAEP }, dataKey);
        const nonce = randomBytes(NONCE_SIZE);

        const cipher = this.algorithm === "chacha20-rsa"
            ? createCipheriv("chacha20-poly1305", dataKey, nonce, { authTagLength: TAG_SIZE })
            : createCipheriv("aes-256-gcm", dataKey, nonce, { authTagLength: TAG_SIZE });
        const body = Buffer.concat([cipher.update(plaintext), cipher.final()]);

        const header = Buffer.alloc(HEADER_SIZE);
        header.writeUInt16BE(wrapped.length, 0);
        header.writeUInt8(NONCE_SIZE, 2);
        return Buffer.concat([header, wrapped, nonce, body, cipher.getAuthTag()]);
    }

    /**
     * @param name - Object name, reported when the payload does not decrypt.
     */
    decrypt(ciphertext: Buffer, name = "object"): Buffer {
        const fail = (reason: string, cause?: unknown) =>
            new DecodeInitError(`decrypt ${name}: ${reason}`, { context: { object: name }, cause });

        if (ciphertext.length < HEADER_SIZE) throw fail("ciphertext too short");
        const keyLength = ciphertext.readUInt16BE(0);
        const nonceLength = ciphertext.readUInt8(2);
        const bodyStart = HEADER_SIZE + keyLength + nonceLength;
        if (nonceLength !== NONCE_SIZE || ciphertext.length < bodyStart + TAG_SIZE) {
            throw fail("malformed header");
        }

        let dataKey: Buffer;
        try {
            dataKey = privateDecrypt(
                { key: this.privateKey, ...OAEP },
                ciphertext.subarray(HEADER_SIZE, HEADER_SIZE + keyLength),
            );
        } catch (err) {
            throw fail("cannot unwrap data key", err);
        }

        const nonce = ciphertext.subarray(HEADER_SIZE + keyLength, bodyStart);
        const body = ciphertext.subarray(bodyStart, ciphertext.length - TAG_SIZE);
        const tag = ciphertext.subarray(ciphertext.length - TAG_SIZE);

        const decipher = this.algorithm === "chacha20-rsa"
            ? createDecipheriv("chacha20-poly1305", dataKey, nonce, { authTagLength: TAG_SIZE })
            : createDecipheriv("aes-256-gcm", dataKey, nonce, { authTagLength: TAG_SIZE });
        decipher.setAuthTag(tag);
        try {
            return Buffer.concat([decipher.update(body), decipher.final()]);
        } catch (err) {
            throw fail("authentication failed", err);
        }
    }
}
