import { createECDH, randomBytes } from "node:crypto";
import { describe, it, expect } from "vitest";
import { ObfuscationCipher } from "../src/modules/cloud115/crypto/download-cipher.js";
import {
  AesCbcSession,
  createUploadCipherFactory,
  deriveSessionKey,
  EcdhCipher
} from "../src/modules/cloud115/crypto/upload-cipher.js";
import { capsuleKey, decodeUploadToken } from "./helpers/peer.js";

describe("ObfuscationCipher", () => {
  const cipher = new ObfuscationCipher();

  it("produces different capsules for the same payload under fresh keys", () => {
    const plain = Buffer.from(JSON.stringify({ pickcode: "pc1" }));
    const first = cipher.encode(plain, cipher.generateKey());
    const second = cipher.encode(plain, cipher.generateKey());

    expect(first).not.toBe(second);
  });

  it("decodes replies sealed with a server seed", () => {
    const key = cipher.generateKey();
    const reply = cipher.encode(Buffer.from("payload"), key, randomBytes(16));

    expect(cipher.decode(reply, key).toString()).toBe("payload");
  });

  it("exposes the request key to the peer", () => {
    const key = cipher.generateKey();
    const capsule = cipher.encode(Buffer.from("x"), key);

    expect(capsuleKey(capsule).equals(key)).toBe(true);
  });

  it("rejects truncated capsules and wrong key sizes", () => {
    expect(() => cipher.decode(Buffer.from("short").toString("base64"), cipher.generateKey())).toThrow(
      "Encoded download payload is corrupted (seed too short)."
    );
    expect(() => cipher.encode(Buffer.from("x"), Buffer.alloc(8))).toThrow("Download cipher key must be 16 bytes, got 8.");
  });
});

describe("EcdhCipher", () => {
  it("lets the peer recover the session key from the token", () => {
    const server = createECDH("secp224r1");
    server.generateKeys();
    const client = EcdhCipher.create(server.getPublicKey());

    const token = decodeUploadToken(client.encodeToken(1_700_000_000_123));
    const serverSession = new AesCbcSession(deriveSessionKey(server.computeSecret(token.publicKey)));

    expect(token.timestampMs).toBe(1_700_000_000_123);
    const sealed = client.encrypt(Buffer.from("appid=0&filesize=11"));
    expect(serverSession.decrypt(sealed).toString()).toBe("appid=0&filesize=11");
    expect(client.decrypt(serverSession.encrypt(Buffer.from('{"status":2}'))).toString()).toBe('{"status":2}');
  });

  it("detects a tampered token", () => {
    const server = createECDH("secp224r1");
    server.generateKeys();
    const raw = Buffer.from(EcdhCipher.create(server.getPublicKey()).encodeToken(1), "base64");
    raw[raw.length - 1] = (raw[raw.length - 1] ?? 0) ^ 0xff;

    expect(() => decodeUploadToken(raw.toString("base64"))).toThrow("Upload token checksum mismatch.");
  });

  it("refuses to build a cipher without a peer key", () => {
    expect(() => createUploadCipherFactory(undefined)()).toThrow(
      "CLOUD115_ECDH_PEER_KEY is not configured; rapid upload is unavailable."
    );
  });
});
