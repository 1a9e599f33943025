import { describe, it, expect, vi } from "vitest";
import { SignatureChallengeExceededError, UploadError } from "../src/core/errors.js";
import {
  initialNegotiationState,
  nextNegotiationStep,
  runNegotiation,
  type NegotiationState
} from "../src/modules/cloud115/rapid-upload.js";

describe("nextNegotiationStep", () => {
  it("turns a need-sign reply into a challenge", () => {
    expect(
      nextNegotiationStep(initialNegotiationState, { status: 7, sign_key: "k1", sign_check: "0-9" }, "SHA")
    ).toEqual({ type: "challenge", signKey: "k1", signCheck: "0-9" });
  });

  it("ends once the challenge bound is reached", () => {
    const state: NegotiationState = { attempt: 2, signKey: "k", signVal: "v" };

    expect(() => nextNegotiationStep(state, { status: 7, sign_key: "k", sign_check: "0-1" }, "SHA", 2)).toThrow(
      SignatureChallengeExceededError
    );
  });

  it("rejects a challenge without its parameters", () => {
    expect(() => nextNegotiationStep(initialNegotiationState, { status: 7 }, "SHA")).toThrow(
      "rapid upload challenge is missing sign_key or sign_check"
    );
  });

  it("ignores an empty callback list on must-upload replies", () => {
    expect(nextNegotiationStep(initialNegotiationState, { status: 1, callback: [] }, "SHA")).toEqual({
      type: "done",
      result: { kind: "must_upload", sha1: "SHA", target: "", bucket: "", object: "", callback: "", callbackVar: "" }
    });
  });
});

describe("runNegotiation", () => {
  it("carries the sign pair into the next attempt", async () => {
    const send = vi
      .fn<(state: NegotiationState) => Promise<{ status: number; sign_key?: string; sign_check?: string; pickcode?: string }>>()
      .mockResolvedValueOnce({ status: 7, sign_key: "k1", sign_check: "0-1" })
      .mockResolvedValueOnce({ status: 7, sign_key: "k2", sign_check: "2-3" })
      .mockResolvedValueOnce({ status: 2, pickcode: "pc" });
    const answer = vi.fn(async (signCheck: string) => `val:${signCheck}`);

    const result = await runNegotiation({ send, answer }, "SHA");

    expect(result).toEqual({ kind: "accepted", pickCode: "pc", fileId: undefined, sha1: "SHA" });
    expect(send.mock.calls.map(([state]) => state)).toEqual([
      { attempt: 0, signKey: "", signVal: "" },
      { attempt: 1, signKey: "k1", signVal: "val:0-1" },
      { attempt: 2, signKey: "k2", signVal: "val:2-3" }
    ]);
  });

  it("never loops past the bound", async () => {
    const send = vi.fn(async () => ({ status: 7, sign_key: "k", sign_check: "0-0" }));
    const answer = vi.fn(async () => "v");

    await expect(runNegotiation({ send, answer }, "SHA", 1)).rejects.toBeInstanceOf(SignatureChallengeExceededError);
    expect(send).toHaveBeenCalledTimes(2);
    expect(answer).toHaveBeenCalledTimes(1);
  });

  it("propagates answer failures unchanged", async () => {
    const failure = new UploadError("invalid sign_check range: x");
    const send = vi.fn(async () => ({ status: 7, sign_key: "k", sign_check: "x" }));

    await expect(
      runNegotiation(
        {
          send,
          answer: async () => {
            throw failure;
          }
        },
        "SHA"
      )
    ).rejects.toBe(failure);
  });
});
