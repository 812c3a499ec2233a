import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";

import type { EncryptedBlob } from "./types";

const AES_256_GCM = "aes-256-gcm";
export const KEY_LENGTH_BYTES = 32;
const IV_LENGTH_BYTES = 12;
const AUTH_TAG_LENGTH_BYTES = 16;

function assertValidKey(key: Buffer): void {
  if (key.byteLength !== KEY_LENGTH_BYTES) {
    throw new Error(`Invalid key length: expected ${KEY_LENGTH_BYTES} bytes, received ${key.byteLength}.`);
  }
}

export function zeroFill(buffer: Buffer): void {
  buffer.fill(0);
}

export function encrypt(plaintext: Buffer, key: Buffer): EncryptedBlob {
  assertValidKey(key);

  const iv = randomBytes(IV_LENGTH_BYTES);
  const cipher = createCipheriv(AES_256_GCM, key, iv);
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  const authTag = cipher.getAuthTag();

  return {
    iv,
    ciphertext,
    authTag,
  };
}

export function decrypt(blob: EncryptedBlob, key: Buffer): Buffer {
  assertValidKey(key);

  if (blob.iv.byteLength !== IV_LENGTH_BYTES) {
    throw new Error(`Invalid IV length: expected ${IV_LENGTH_BYTES} bytes, received ${blob.iv.byteLength}.`);
  }

  if (blob.authTag.byteLength !== AUTH_TAG_LENGTH_BYTES) {
    throw new Error(
      `Invalid auth tag length: expected ${AUTH_TAG_LENGTH_BYTES} bytes, received ${blob.authTag.byteLength}.`,
    );
  }

  const decipher = createDecipheriv(AES_256_GCM, key, blob.iv);
  decipher.setAuthTag(blob.authTag);

  return Buffer.concat([decipher.update(blob.ciphertext), decipher.final()]);
}
