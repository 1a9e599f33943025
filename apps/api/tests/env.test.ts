import { describe, it, expect } from "vitest";
import { DEFAULT_USER_AGENT, parseEnv } from "../src/config/env.js";

describe("parseEnv", () => {
  it("fills defaults for an empty environment", () => {
    const env = parseEnv({});

    expect(env.API_PORT).toBe(8080);
    expect(env.CLOUD115_PAGE_SIZE).toBe(1000);
    expect(env.CLOUD115_QRCODE_SOURCE).toBe("linux");
    expect(env.CLOUD115_USER_AGENT).toBe(DEFAULT_USER_AGENT);
    expect(env.CLOUD115_TLS_INSECURE_SKIP_VERIFY).toBe(false);
    expect(env.CLOUD115_COOKIE).toBeUndefined();
  });

  it("trims optional text and reads boolean-like flags", () => {
    const env = parseEnv({
      CLOUD115_COOKIE: "  UID=1;CID=2;SEID=3  ",
      CLOUD115_QRCODE_TOKEN: "   ",
      CLOUD115_TLS_INSECURE_SKIP_VERIFY: " Yes ",
      CLOUD115_PAGE_SIZE: "0"
    });

    expect(env.CLOUD115_COOKIE).toBe("UID=1;CID=2;SEID=3");
    expect(env.CLOUD115_QRCODE_TOKEN).toBeUndefined();
    expect(env.CLOUD115_TLS_INSECURE_SKIP_VERIFY).toBe(true);
    expect(env.CLOUD115_PAGE_SIZE).toBe(0);
  });

  it("lists every invalid variable", () => {
    expect(() => parseEnv({ CLOUD115_QRCODE_SOURCE: "fax", CLOUD115_ECDH_PEER_KEY: "04abc" })).toThrow(
      /^Invalid environment variables: CLOUD115_QRCODE_SOURCE: .*; CLOUD115_ECDH_PEER_KEY: must be an uncompressed P-224 point in hex$/
    );
  });
});
