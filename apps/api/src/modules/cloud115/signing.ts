import { createHash } from "node:crypto";

const TOKEN_SALT = "Qclm8MGWUv59TnrR0XPg";
const TOKEN_APP_VERSION = "2.0.0.0";

function sha1Hex(input: string): string {
  return createHash("sha1").update(input).digest("hex");
}

function md5Hex(input: string): string {
  return createHash("md5").update(input).digest("hex");
}

export function uploadTarget(dirId: string): string {
  return `U_1_${dirId}`;
}

export function generateSignature(userId: string, userKey: string, fileId: string, target: string): string {
  const inner = sha1Hex(`${userId}${fileId}${target}0`);
  return sha1Hex(`${userKey}${inner}000000`).toUpperCase();
}

export interface UploadTokenInput {
  userId: string;
  fileId: string;
  fileSize: string;
  timestamp: string;
  signKey: string;
  signVal: string;
}

export function generateUploadToken(input: UploadTokenInput): string {
  return md5Hex(
    TOKEN_SALT +
      input.fileId +
      input.fileSize +
      input.signKey +
      input.signVal +
      input.userId +
      input.timestamp +
      md5Hex(input.userId) +
      TOKEN_APP_VERSION
  );
}
