import { SignatureChallengeExceededError, UploadError } from "../../core/errors.js";
import type { UploadInitResponse } from "./api.js";

export const MAX_SIGN_CHALLENGES = 3;

export const UPLOAD_STATUS_MUST_UPLOAD = 1;
export const UPLOAD_STATUS_ACCEPTED = 2;
export const UPLOAD_STATUS_NEED_SIGN = 7;

export interface AcceptedUpload {
  kind: "accepted";
  pickCode: string;
  fileId: string | undefined;
  sha1: string;
}

export interface MustUpload {
  kind: "must_upload";
  sha1: string;
  target: string;
  bucket: string;
  object: string;
  callback: string;
  callbackVar: string;
}

export type UploadInitResult = AcceptedUpload | MustUpload;

/** Carried between attempts; the first attempt has an empty sign pair. */
export interface NegotiationState {
  attempt: number;
  signKey: string;
  signVal: string;
}

export type NegotiationStep =
  | { type: "done"; result: UploadInitResult }
  | { type: "challenge"; signKey: string; signCheck: string };

export const initialNegotiationState: NegotiationState = Object.freeze({ attempt: 0, signKey: "", signVal: "" });

/**
 * Decides what follows one upload-init reply. Throws once a challenge arrives
 * after `maxChallenges` have already been answered.
 */
export function nextNegotiationStep(
  state: NegotiationState,
  reply: UploadInitResponse,
  sha1: string,
  maxChallenges: number = MAX_SIGN_CHALLENGES
): NegotiationStep {
  switch (reply.status) {
    case UPLOAD_STATUS_ACCEPTED:
      return {
        type: "done",
        result: { kind: "accepted", pickCode: reply.pickcode ?? "", fileId: reply.file_id, sha1 }
      };
    case UPLOAD_STATUS_MUST_UPLOAD: {
      const callback = Array.isArray(reply.callback) ? undefined : reply.callback;
      return {
        type: "done",
        result: {
          kind: "must_upload",
          sha1,
          target: reply.target ?? "",
          bucket: reply.bucket ?? "",
          object: reply.object ?? "",
          callback: callback?.callback ?? "",
          callbackVar: callback?.callback_var ?? ""
        }
      };
    }
    case UPLOAD_STATUS_NEED_SIGN:
      if (state.attempt >= maxChallenges) {
        throw new SignatureChallengeExceededError(maxChallenges);
      }
      if (!reply.sign_key || !reply.sign_check) {
        throw new UploadError("rapid upload challenge is missing sign_key or sign_check");
      }
      return { type: "challenge", signKey: reply.sign_key, signCheck: reply.sign_check };
    default:
      throw new UploadError(
        `rapid upload rejected (status ${reply.status}, code ${reply.statuscode ?? "none"}): ${reply.statusmsg || "no message"}`
      );
  }
}

export interface NegotiationDriver {
  send(state: NegotiationState): Promise<UploadInitResponse>;
  answer(signCheck: string): Promise<string>;
  onChallenge?(state: NegotiationState, signKey: string, signCheck: string): void;
}

export async function runNegotiation(
  driver: NegotiationDriver,
  sha1: string,
  maxChallenges: number = MAX_SIGN_CHALLENGES
): Promise<UploadInitResult> {
  let state = initialNegotiationState;
  for (;;) {
    const reply = await driver.send(state);
    const step = nextNegotiationStep(state, reply, sha1, maxChallenges);
    if (step.type === "done") {
      return step.result;
    }
    driver.onChallenge?.(state, step.signKey, step.signCheck);
    state = {
      attempt: state.attempt + 1,
      signKey: step.signKey,
      signVal: await driver.answer(step.signCheck)
    };
  }
}
