import { describe, it, expect } from "vitest";
import { generateSignature, generateUploadToken, uploadTarget } from "../src/modules/cloud115/signing.js";

describe("upload signing", () => {
  it("prefixes the target directory", () => {
    expect(uploadTarget("0")).toBe("U_1_0");
  });

  it("signs the file id against the target", () => {
    expect(generateSignature("42", "test-userkey", "FILEID", "U_1_0")).toBe("59FA29416ADFDDFA08CB81C38017B02BE6EA39D5");
  });

  it("folds the challenge answer into the token", () => {
    const base = { userId: "42", fileId: "FILEID", fileSize: "11", timestamp: "1700000000000" };

    expect(generateUploadToken({ ...base, signKey: "", signVal: "" })).toBe("208e993838f91e308a3534289679653c");
    expect(generateUploadToken({ ...base, signKey: "abc", signVal: "VAL" })).toBe("2567c84edbd82d23855ed4978053ecda");
  });
});
