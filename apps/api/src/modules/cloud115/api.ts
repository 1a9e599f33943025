import { z } from "zod";
import { ProviderApiError } from "../../core/errors.js";

export const ApiLoginCheck = "https://passportapi.115.com/app/1.0/web/1.0/check/sso";
export const ApiQrCodeLoginWithApp = (app: string) => `https://passportapi.115.com/app/1.0/${app}/1.0/login/qrcode`;
export const ApiFileList = "https://webapi.115.com/files";
export const ApiDownloadGetUrl = "https://proapi.115.com/app/chrome/downurl";
export const ApiGetVersion = "https://appversion.115.com/1/web/1.0/api/chrome";
export const ApiUploadInfo = "https://proapi.115.com/app/uploadinfo";
export const ApiUploadInit = "https://uplb.115.com/4.0/initupload.php";

export const DEFAULT_PAGE_SIZE = 1000;
export const FALLBACK_APP_VERSION = "27.0.3.7";

const numberish = z.union([z.number(), z.string()]);
const idString = numberish.transform((value) => String(value));
const intFromNumberish = numberish.transform((value, ctx) => {
  const parsed = typeof value === "number" ? value : Number(value);
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

export const envelopeSchema = z
  .object({
    state: z.union([z.boolean(), z.number()]).optional(),
    errno: numberish.optional(),
    errNo: numberish.optional(),
    code: numberish.optional(),
    msg: z.string().optional(),
    message: z.string().optional(),
    error: z.string().optional(),
    error_msg: z.string().optional()
  })
  .passthrough();

export type Envelope = z.infer<typeof envelopeSchema>;

/** Throws when the body reports failure through `state`, whatever the HTTP status was. */
export function checkEnvelope(envelope: Envelope): void {
  if (envelope.state === undefined || envelope.state === true || envelope.state === 1) {
    return;
  }
  const message =
    envelope.error_msg || envelope.error || envelope.msg || envelope.message || "provider reported failure";
  throw new ProviderApiError(message, envelope.errno ?? envelope.errNo ?? envelope.code);
}

export const qrLoginResponseSchema = envelopeSchema.extend({
  data: z.object({
    user_id: idString.optional(),
    cookie: z.object({
      UID: z.string().min(1),
      CID: z.string().min(1),
      SEID: z.string().min(1)
    })
  })
});

export const loginCheckResponseSchema = envelopeSchema.extend({
  data: z
    .object({
      user_id: idString
    })
    .passthrough()
});

export const fileListItemSchema = z
  .object({
    fid: idString.optional(),
    cid: idString,
    pid: idString.optional(),
    n: z.string(),
    s: intFromNumberish.optional(),
    pc: z.string().default(""),
    sha: z.string().default(""),
    te: intFromNumberish.optional()
  })
  .passthrough();

export type FileListItem = z.infer<typeof fileListItemSchema>;

export const fileListResponseSchema = envelopeSchema.extend({
  count: intFromNumberish.default(0),
  offset: intFromNumberish.optional(),
  data: z.array(fileListItemSchema).default([])
});

export const appVersionResponseSchema = envelopeSchema.extend({
  data: z.record(
    z
      .object({
        version_code: z.string().optional()
      })
      .passthrough()
  )
});

export const uploadInfoResponseSchema = envelopeSchema.extend({
  user_id: idString,
  userkey: z.string().min(1)
});

export const downloadResponseSchema = envelopeSchema.extend({
  data: z.union([z.string(), z.null(), z.array(z.unknown()), z.record(z.unknown())]).optional()
});

export const downloadInfoSchema = z.record(
  z
    .object({
      file_name: z.string().default(""),
      file_size: intFromNumberish,
      pick_code: z.string().default(""),
      url: z.union([z.object({ url: z.string() }).passthrough(), z.literal(false), z.array(z.unknown())]).optional()
    })
    .passthrough()
);

export const uploadInitResponseSchema = z
  .object({
    request: z.string().optional(),
    status: intFromNumberish,
    statuscode: intFromNumberish.optional(),
    statusmsg: z.string().optional(),
    pickcode: z.string().optional(),
    target: z.string().optional(),
    sign_key: z.string().optional(),
    sign_check: z.string().optional(),
    bucket: z.string().optional(),
    object: z.string().optional(),
    file_id: idString.optional(),
    callback: z
      .union([
        z.object({
          callback: z.string(),
          callback_var: z.string()
        }),
        z.array(z.unknown())
      ])
      .optional()
  })
  .passthrough();

export type UploadInitResponse = z.infer<typeof uploadInitResponseSchema>;
