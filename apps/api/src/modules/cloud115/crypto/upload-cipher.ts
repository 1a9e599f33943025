import { createCipheriv, createDecipheriv, createECDH, createHash } from "node:crypto";

const CURVE = "secp224r1";
const TIMESTAMP_LENGTH = 8;
const CHECKSUM_LENGTH = 4;

/** Session cipher for the upload-init endpoint, bound to one ECDH key pair. */
export interface UploadCipher {
  encodeToken(timestampMs: number): string;
  encrypt(plain: Buffer): Buffer;
  decrypt(body: Buffer): Buffer;
}

export interface SessionKey {
  key: Buffer;
  iv: Buffer;
}

export function deriveSessionKey(secret: Buffer): SessionKey {
  if (secret.length < 16) {
    throw new Error("ECDH shared secret is too short.");
  }
  return {
    key: Buffer.from(secret.subarray(0, 16)),
    iv: Buffer.from(secret.subarray(secret.length - 16))
  };
}

export class AesCbcSession {
  constructor(private readonly session: SessionKey) {}

  encrypt(plain: Buffer): Buffer {
    const cipher = createCipheriv("aes-128-cbc", this.session.key, this.session.iv);
    return Buffer.concat([cipher.update(plain), cipher.final()]);
  }

  decrypt(body: Buffer): Buffer {
    const decipher = createDecipheriv("aes-128-cbc", this.session.key, this.session.iv);
    return Buffer.concat([decipher.update(body), decipher.final()]);
  }
}

function checksum(payload: Buffer): Buffer {
  return createHash("md5").update(payload).digest().subarray(0, CHECKSUM_LENGTH);
}

export class EcdhCipher implements UploadCipher {
  private constructor(
    private readonly publicKey: Buffer,
    private readonly session: AesCbcSession
  ) {}

  static create(peerPublicKey: Buffer): EcdhCipher {
    const ecdh = createECDH(CURVE);
    ecdh.generateKeys();
    const secret = ecdh.computeSecret(peerPublicKey);
    const publicKey = Buffer.from(ecdh.getPublicKey(null, "compressed"));
    return new EcdhCipher(publicKey, new AesCbcSession(deriveSessionKey(secret)));
  }

  encodeToken(timestampMs: number): string {
    const stamp = Buffer.alloc(TIMESTAMP_LENGTH);
    stamp.writeBigUInt64BE(BigInt(Math.trunc(timestampMs)));
    const payload = Buffer.concat([this.publicKey, stamp]);
    return Buffer.concat([payload, checksum(payload)]).toString("base64");
  }

  encrypt(plain: Buffer): Buffer {
    return this.session.encrypt(plain);
  }

  decrypt(body: Buffer): Buffer {
    return this.session.decrypt(body);
  }
}

export function createUploadCipherFactory(peerPublicKeyHex: string | undefined): () => UploadCipher {
  return () => {
    if (!peerPublicKeyHex) {
      throw new Error("CLOUD115_ECDH_PEER_KEY is not configured; rapid upload is unavailable.");
    }
    return EcdhCipher.create(Buffer.from(peerPublicKeyHex, "hex"));
  };
}
