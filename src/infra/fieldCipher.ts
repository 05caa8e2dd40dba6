// src/infra/fieldCipher.ts
//
// Field-level encryption for payable display fields.
// Wire format: base64(nonce[12] || ciphertext || tag[16]); the plaintext is JSON.

import { createCipheriv, createDecipheriv, randomBytes } from "crypto";

const NONCE_BYTES = 12;
const TAG_BYTES = 16;
const KEY_BYTES = 32;

export interface FieldCipher {
  encrypt(value: unknown): string;
  /** Throws when the input is not a ciphertext produced with the same key. */
  decrypt(encoded: string): unknown;
  /** Display form of an encrypted field, or null when empty or undecryptable. */
  decryptDisplay(encoded: string | null): string | null;
}

export function createFieldCipher(secret: string): FieldCipher {
  const key = Buffer.from(secret, "utf8").subarray(0, KEY_BYTES);
  if (key.length !== KEY_BYTES) {
    throw new Error(`field cipher key must be ${KEY_BYTES} bytes, got ${key.length}`);
  }

  function encrypt(value: unknown): string {
    const nonce = randomBytes(NONCE_BYTES);
    const cipher = createCipheriv("aes-256-gcm", key, nonce);
    const body = Buffer.concat([cipher.update(JSON.stringify(value), "utf8"), cipher.final()]);
    return Buffer.concat([nonce, body, cipher.getAuthTag()]).toString("base64");
  }

  function decrypt(encoded: string): unknown {
    const raw = Buffer.from(encoded, "base64");
    if (raw.length < NONCE_BYTES + TAG_BYTES) {
      throw new Error("ciphertext too short");
    }
    const nonce = raw.subarray(0, NONCE_BYTES);
    const tag = raw.subarray(raw.length - TAG_BYTES);
    const body = raw.subarray(NONCE_BYTES, raw.length - TAG_BYTES);
    const decipher = createDecipheriv("aes-256-gcm", key, nonce);
    decipher.setAuthTag(tag);
    const plain = Buffer.concat([decipher.update(body), decipher.final()]).toString("utf8");
    return JSON.parse(plain);
  }

  function decryptDisplay(encoded: string | null): string | null {
    if (!encoded) return null;
    let value: unknown;
    try {
      value = decrypt(encoded);
    } catch {
      return null;
    }
    if (value === null || value === undefined) return null;
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") return String(value);
    return JSON.stringify(value);
  }

  return { encrypt, decrypt, decryptDisplay };
}
