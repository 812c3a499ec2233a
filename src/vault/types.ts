export interface EncryptedBlob {
  iv: Buffer;
  ciphertext: Buffer;
  authTag: Buffer;
}
