import type { Headers } from "undici";
import {
  describeError,
  DownloadError,
  EmptyDownloadError,
  ListError,
  LoginCheckFailedError,
  LoginError,
  MissingCredentialError,
  Pan115Error,
  UnexpectedEmptyResponseError,
  UploadError
} from "../../core/errors.js";
import type { FileEntry } from "../../core/types.js";
import { silentLogger, type Logger } from "../../lib/logger.js";
import {
  checkEnvelope,
  DEFAULT_PAGE_SIZE,
  downloadInfoSchema,
  downloadResponseSchema,
  envelopeSchema,
  FALLBACK_APP_VERSION,
  uploadInitResponseSchema,
  type FileListItem,
  type UploadInitResponse
} from "./api.js";
import { Pan115Client, type FetchFn, type RawExchange } from "./client.js";
import { digestRange, type ContentSource } from "./content-source.js";
import { CredentialCell, formatCookie, parseCookie, type Credential } from "./credential.js";
import { ObfuscationCipher, type DownloadCipher } from "./crypto/download-cipher.js";
import type { UploadCipher } from "./crypto/upload-cipher.js";
import { MAX_SIGN_CHALLENGES, runNegotiation, type NegotiationState, type UploadInitResult } from "./rapid-upload.js";
import { generateSignature, generateUploadToken, uploadTarget } from "./signing.js";

export interface Pan115SessionConfig {
  cookie?: string;
  qrCodeToken?: string;
  qrCodeSource?: string;
  pageSize?: number;
  userAgent: string;
  proxyUrl?: string;
  tlsInsecureSkipVerify?: boolean;
}

export interface Pan115SessionDeps {
  fetchFn?: FetchFn;
  downloadCipher?: DownloadCipher;
  createUploadCipher: () => UploadCipher;
  logger?: Logger;
  /** Milliseconds since the epoch. */
  now?: () => number;
  maxSignChallenges?: number;
}

export interface DownloadDescriptor {
  fileName: string;
  fileSize: number;
  pickCode: string;
  url: string;
  /** Headers the signing request carried; the byte fetch must replay them. */
  headers: Headers;
}

export interface RapidUploadParams {
  fileSize: number;
  fileName: string;
  dirId: string;
  preId: string;
  fileId: string;
  content: ContentSource;
}

function toFileEntry(item: FileListItem): FileEntry {
  const isDir = item.fid === undefined;
  return {
    id: isDir ? item.cid : (item.fid ?? ""),
    parentId: isDir ? (item.pid ?? "") : item.cid,
    name: item.n,
    size: isDir ? 0 : (item.s ?? 0),
    pickCode: item.pc,
    sha1: item.sha,
    isDir,
    modifiedAt: new Date((item.te ?? 0) * 1000)
  };
}

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DownloadError(`${what} is not valid JSON`, { cause: error });
  }
}

/**
 * An authenticated 115 session. `login` must not run concurrently with the
 * other operations; callers serialise it.
 */
export class Pan115Session {
  readonly client: Pan115Client;
  readonly userAgent: string;
  private readonly credential = new CredentialCell();
  private readonly downloadCipher: DownloadCipher;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly maxSignChallenges: number;
  private cookie: string | undefined;
  private qrCodeToken: string | undefined;
  private readonly qrCodeSource: string;
  private readonly pageSize: number;

  constructor(
    config: Pan115SessionConfig,
    private readonly deps: Pan115SessionDeps
  ) {
    this.userAgent = config.userAgent;
    this.cookie = config.cookie;
    this.qrCodeToken = config.qrCodeToken;
    this.qrCodeSource = config.qrCodeSource ?? "linux";
    this.pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE;
    this.downloadCipher = deps.downloadCipher ?? new ObfuscationCipher();
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? Date.now;
    this.maxSignChallenges = deps.maxSignChallenges ?? MAX_SIGN_CHALLENGES;
    this.client = new Pan115Client({
      userAgent: config.userAgent,
      cookie: () => this.credential.cookie(),
      fetchFn: deps.fetchFn,
      proxyUrl: config.proxyUrl,
      tlsInsecureSkipVerify: config.tlsInsecureSkipVerify,
      logger: this.logger
    });
  }

  get currentCredential(): Readonly<Credential> | null {
    return this.credential.get();
  }

  get cookieString(): string | undefined {
    return this.cookie;
  }

  get hasPendingQrCode(): boolean {
    return this.qrCodeToken !== undefined;
  }

  get userId(): string | null {
    return this.client.userId;
  }

  /**
   * Replaces the credential without a round trip. The identity bound to the
   * previous cookie is dropped; operations that sign with the user id verify
   * the new cookie first.
   */
  setCredential(credential: Credential): void {
    this.credential.set(credential);
    this.cookie = formatCookie(credential);
    this.client.resetIdentity();
    this.logger.info({ uid: credential.uid }, "115 credential replaced");
  }

  async login(): Promise<Credential> {
    let candidate: Credential;
    const qrCodeToken = this.qrCodeToken;
    if (qrCodeToken) {
      this.qrCodeToken = undefined;
      this.logger.info({ app: this.qrCodeSource }, "Logging in to 115 by qrcode");
      try {
        ({ credential: candidate } = await this.client.qrCodeLoginWithApp(qrCodeToken, this.qrCodeSource));
      } catch (error) {
        throw new LoginError(`failed to login by qrcode: ${describeError(error)}`, { cause: error });
      }
      this.cookie = formatCookie(candidate);
    } else if (this.cookie) {
      try {
        candidate = parseCookie(this.cookie);
      } catch (error) {
        throw new LoginError(`failed to login by cookies: ${describeError(error)}`, { cause: error });
      }
    } else {
      throw new MissingCredentialError();
    }

    let userId: string;
    try {
      userId = await this.client.loginCheck(formatCookie(candidate));
    } catch (error) {
      throw new LoginCheckFailedError(`115 login check failed: ${describeError(error)}`, { cause: error });
    }
    this.credential.set(candidate);
    this.logger.info({ userId }, "115 session ready");
    return candidate;
  }

  async listFiles(dirId: string, pageSize: number = this.pageSize): Promise<FileEntry[]> {
    const limit = pageSize > 0 ? pageSize : DEFAULT_PAGE_SIZE;
    const out: FileEntry[] = [];
    try {
      for (;;) {
        const page = await this.client.listPage(dirId, out.length, limit);
        for (const item of page.items) {
          out.push(toFileEntry(item));
        }
        if (page.items.length === 0 || out.length >= page.count) {
          break;
        }
      }
    } catch (error) {
      throw new ListError(`failed to list 115 directory ${dirId}: ${describeError(error)}`, { cause: error });
    }
    this.logger.debug({ dirId, count: out.length, limit }, "Listed 115 directory");
    return out;
  }

  async resolveDownload(pickCode: string, userAgent: string = this.userAgent): Promise<DownloadDescriptor> {
    const key = this.downloadCipher.generateKey();
    const params = JSON.stringify({ pickcode: pickCode });
    const data = this.downloadCipher.encode(Buffer.from(params, "utf8"), key);

    let exchange: RawExchange;
    try {
      exchange = await this.client.postDownloadInfo(data, userAgent, Math.floor(this.now() / 1000));
    } catch (error) {
      throw new DownloadError(`failed to request download info: ${describeError(error)}`, { cause: error });
    }

    const json = parseJson(exchange.body, "download info response");
    const envelope = downloadResponseSchema.safeParse(json);
    try {
      const loose = envelope.success ? envelope : envelopeSchema.safeParse(json);
      if (loose.success) {
        checkEnvelope(loose.data);
      }
    } catch (error) {
      throw new DownloadError(`download info rejected: ${describeError(error)}`, {
        cause: error,
        statusCode: error instanceof Pan115Error ? error.statusCode : undefined
      });
    }
    if (!envelope.success) {
      throw new DownloadError("download info response has an unexpected shape", { cause: envelope.error });
    }
    if (typeof envelope.data.data !== "string") {
      throw new UnexpectedEmptyResponseError("download info response carries no encoded payload");
    }

    let decoded: Buffer;
    try {
      decoded = this.downloadCipher.decode(envelope.data.data, key);
    } catch (error) {
      throw new DownloadError(`failed to decode download info: ${describeError(error)}`, { cause: error });
    }

    const infos = downloadInfoSchema.safeParse(parseJson(decoded.toString("utf8"), "decoded download info"));
    if (!infos.success) {
      throw new DownloadError("decoded download info has an unexpected shape", { cause: infos.error });
    }

    for (const info of Object.values(infos.data)) {
      if (info.file_size < 0) {
        throw new EmptyDownloadError();
      }
      const url = info.url && !Array.isArray(info.url) ? info.url.url : "";
      if (!url) {
        throw new UnexpectedEmptyResponseError(`download info for ${info.pick_code || pickCode} carries no url`);
      }
      return {
        fileName: info.file_name,
        fileSize: info.file_size,
        pickCode: info.pick_code || pickCode,
        url,
        headers: exchange.requestHeaders
      };
    }
    throw new UnexpectedEmptyResponseError();
  }

  private async verifyIdentity(): Promise<string> {
    const cookie = this.credential.cookie();
    if (!cookie) {
      throw new UploadError("rapid upload requires a logged in session");
    }
    try {
      return await this.client.loginCheck(cookie);
    } catch (error) {
      throw new LoginCheckFailedError(`115 login check failed: ${describeError(error)}`, { cause: error });
    }
  }

  async getAppVersion(): Promise<string> {
    try {
      const versions = await this.client.getAppVersions();
      const win = versions.find((ver) => ver.appName === "win" && ver.version);
      return win ? win.version : FALLBACK_APP_VERSION;
    } catch (error) {
      this.logger.warn({ err: error }, "Failed to query 115 app version, using fallback");
      return FALLBACK_APP_VERSION;
    }
  }

  async initiateRapidUpload(params: RapidUploadParams): Promise<UploadInitResult> {
    const { fileSize, fileName, dirId, preId, fileId, content } = params;
    const userId = this.client.userId ?? (await this.verifyIdentity());

    let cipher: UploadCipher;
    let userKey: string;
    try {
      cipher = this.deps.createUploadCipher();
      userKey = await this.client.getUserKey();
    } catch (error) {
      throw new UploadError(`failed to prepare rapid upload: ${describeError(error)}`, { cause: error });
    }

    const target = uploadTarget(dirId);
    const fileSizeStr = String(fileSize);
    const form = new URLSearchParams({
      appid: "0",
      appversion: await this.getAppVersion(),
      userid: userId,
      filename: fileName,
      filesize: fileSizeStr,
      fileid: fileId,
      preid: preId,
      target,
      sig: generateSignature(userId, userKey, fileId, target)
    });

    const send = async (state: NegotiationState): Promise<UploadInitResponse> => {
      const t = this.now();
      const timestamp = String(t);
      form.set("t", timestamp);
      form.set(
        "token",
        generateUploadToken({
          userId,
          fileId,
          fileSize: fileSizeStr,
          timestamp,
          signKey: state.signKey,
          signVal: state.signVal
        })
      );
      if (state.signKey && state.signVal) {
        form.set("sign_key", state.signKey);
        form.set("sign_val", state.signVal);
      }

      let decrypted: Buffer;
      try {
        const encodedToken = cipher.encodeToken(t);
        const body = await this.client.postUploadInit(encodedToken, cipher.encrypt(Buffer.from(form.toString(), "utf8")));
        decrypted = cipher.decrypt(body);
      } catch (error) {
        throw new UploadError(`upload init request failed: ${describeError(error)}`, { cause: error });
      }

      let json: unknown;
      try {
        json = JSON.parse(decrypted.toString("utf8"));
      } catch (error) {
        throw new UploadError("upload init response is not valid JSON", { cause: error });
      }
      const reply = uploadInitResponseSchema.safeParse(json);
      if (!reply.success) {
        throw new UploadError("upload init response has an unexpected shape", { cause: reply.error });
      }
      return reply.data;
    };

    const result = await runNegotiation(
      {
        send,
        answer: (signCheck) => digestRange(content, signCheck),
        onChallenge: (state, signKey, signCheck) =>
          this.logger.info({ fileName, attempt: state.attempt + 1, signKey, signCheck }, "115 rapid upload challenge")
      },
      fileId,
      this.maxSignChallenges
    );
    this.logger.info({ fileName, outcome: result.kind }, "115 rapid upload negotiated");
    return result;
  }
}
