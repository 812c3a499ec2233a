import { KEY_LENGTH_BYTES, decrypt, encrypt, zeroFill } from "./encryption";
import type { EncryptedBlob } from "./types";

const TOKEN_FORMAT_VERSION = "v1";

function parseKey(rawKey: string): Buffer {
  // Node's base64 decoder accepts both the standard and the url-safe alphabet.
  const key = Buffer.from(rawKey.trim(), "base64");
  if (key.byteLength !== KEY_LENGTH_BYTES) {
    throw new Error(
      `TOKEN_ENCRYPTION_KEY must decode to ${KEY_LENGTH_BYTES} bytes, received ${key.byteLength}.`,
    );
  }

  return key;
}

function serialize(blob: EncryptedBlob): string {
  return [
    TOKEN_FORMAT_VERSION,
    blob.iv.toString("base64url"),
    blob.authTag.toString("base64url"),
    blob.ciphertext.toString("base64url"),
  ].join(".");
}

function deserialize(value: string): EncryptedBlob {
  const parts = value.split(".");
  if (parts.length !== 4 || parts[0] !== TOKEN_FORMAT_VERSION) {
    throw new Error("Encrypted token is malformed.");
  }

  const [, iv, authTag, ciphertext] = parts;
  return {
    iv: Buffer.from(iv, "base64url"),
    authTag: Buffer.from(authTag, "base64url"),
    ciphertext: Buffer.from(ciphertext, "base64url"),
  };
}

/**
 * Encrypts provider tokens for storage in the users table. Holds the one
 * process-wide key; components receive the vault instead of reading the key.
 */
export class TokenVault {
  private readonly key: Buffer;

  constructor(rawKey: string) {
    this.key = parseKey(rawKey);
  }

  encrypt(plaintext: string): string {
    const buffer = Buffer.from(plaintext, "utf8");
    try {
      return serialize(encrypt(buffer, this.key));
    } finally {
      zeroFill(buffer);
    }
  }

  decrypt(ciphertext: string): string;
  decrypt(ciphertext: string | null): string | null;
  decrypt(ciphertext: string | null): string | null {
    if (ciphertext === null) {
      return null;
    }

    const plaintext = decrypt(deserialize(ciphertext), this.key);
    try {
      return plaintext.toString("utf8");
    } finally {
      zeroFill(plaintext);
    }
  }
}
