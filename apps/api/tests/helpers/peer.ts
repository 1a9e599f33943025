import { createHash } from "node:crypto";

/** Server-side views of what the session sends. */

const SEED_LENGTH = 16;
const COMPRESSED_KEY_LENGTH = 29;
const TIMESTAMP_LENGTH = 8;
const CHECKSUM_LENGTH = 4;

/** Recovers the request key from a download capsule sealed with the default seed. */
export function capsuleKey(encoded: string): Buffer {
  return Buffer.from(encoded, "base64").subarray(0, SEED_LENGTH);
}

export interface UploadToken {
  publicKey: Buffer;
  timestampMs: number;
}

export function decodeUploadToken(token: string): UploadToken {
  const raw = Buffer.from(token, "base64");
  const payloadLength = COMPRESSED_KEY_LENGTH + TIMESTAMP_LENGTH;
  if (raw.length !== payloadLength + CHECKSUM_LENGTH) {
    throw new Error("Upload token has an unexpected length.");
  }
  const payload = raw.subarray(0, payloadLength);
  const checksum = createHash("md5").update(payload).digest().subarray(0, CHECKSUM_LENGTH);
  if (!checksum.equals(raw.subarray(payloadLength))) {
    throw new Error("Upload token checksum mismatch.");
  }
  return {
    publicKey: Buffer.from(payload.subarray(0, COMPRESSED_KEY_LENGTH)),
    timestampMs: Number(payload.readBigUInt64BE(COMPRESSED_KEY_LENGTH))
  };
}
