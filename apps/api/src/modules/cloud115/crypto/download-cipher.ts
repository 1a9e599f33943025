import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";

const KEY_LENGTH = 16;

/**
 * Obfuscation cipher used by the download-info endpoint. A fresh key must be
 * generated for every request; the reply is decoded with the same key.
 */
export interface DownloadCipher {
  generateKey(): Buffer;
  encode(plain: Buffer, key: Buffer): string;
  decode(encoded: string, key: Buffer): Buffer;
}

function assertKey(key: Buffer): void {
  if (key.length !== KEY_LENGTH) {
    throw new Error(`Download cipher key must be ${KEY_LENGTH} bytes, got ${key.length}.`);
  }
}

/**
 * Capsule layout: base64(seed[16] || aes-128-ctr(key, iv = seed)(plain)).
 * Requests use the key itself as seed so the peer can recover it; replies
 * carry a seed of their own.
 */
export class ObfuscationCipher implements DownloadCipher {
  generateKey(): Buffer {
    return randomBytes(KEY_LENGTH);
  }

  encode(plain: Buffer, key: Buffer, seed: Buffer = key): string {
    assertKey(key);
    assertKey(seed);
    const cipher = createCipheriv("aes-128-ctr", key, seed);
    return Buffer.concat([seed, cipher.update(plain), cipher.final()]).toString("base64");
  }

  decode(encoded: string, key: Buffer): Buffer {
    assertKey(key);
    const blob = Buffer.from(encoded, "base64");
    if (blob.length < KEY_LENGTH) {
      throw new Error("Encoded download payload is corrupted (seed too short).");
    }
    const decipher = createDecipheriv("aes-128-ctr", key, blob.subarray(0, KEY_LENGTH));
    return Buffer.concat([decipher.update(blob.subarray(KEY_LENGTH)), decipher.final()]);
  }
}
