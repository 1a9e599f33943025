import { Agent, type Dispatcher, fetch as undiciFetch, Headers, ProxyAgent, type RequestInit, type Response } from "undici";
import type { z } from "zod";
import { describeError, Pan115Error } from "../../core/errors.js";
import type { Logger } from "../../lib/logger.js";
import {
  ApiDownloadGetUrl,
  ApiFileList,
  ApiGetVersion,
  ApiLoginCheck,
  ApiQrCodeLoginWithApp,
  ApiUploadInfo,
  ApiUploadInit,
  appVersionResponseSchema,
  checkEnvelope,
  envelopeSchema,
  fileListResponseSchema,
  loginCheckResponseSchema,
  qrLoginResponseSchema,
  uploadInfoResponseSchema,
  type Envelope,
  type FileListItem
} from "./api.js";
import type { Credential } from "./credential.js";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface Pan115ClientOptions {
  userAgent: string;
  /** Supplies the session cookie for authenticated calls. */
  cookie: () => string | undefined;
  fetchFn?: FetchFn;
  proxyUrl?: string;
  tlsInsecureSkipVerify?: boolean;
  logger?: Logger;
}

export interface AppVersion {
  appName: string;
  version: string;
}

export interface FileListPage {
  count: number;
  items: FileListItem[];
}

export interface RawExchange {
  body: string;
  requestHeaders: Headers;
}

export interface QrLoginResult {
  credential: Credential;
  userId?: string;
}

function normalizeProxyUrl(input?: string): string | null {
  const trimmed = input?.trim();
  if (!trimmed) return null;
  const parsed = new URL(trimmed);
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error("115 proxy URL must use http:// or https://");
  }
  return parsed.toString();
}

function createDispatcher(opts: Pan115ClientOptions): Dispatcher {
  const rejectUnauthorized = !opts.tlsInsecureSkipVerify;
  const proxyUrl = normalizeProxyUrl(opts.proxyUrl);
  if (proxyUrl) {
    return new ProxyAgent({ uri: proxyUrl, requestTls: { rejectUnauthorized } });
  }
  return new Agent({ connect: { rejectUnauthorized } });
}

function withQuery(url: string, query: Record<string, string | number>): string {
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    target.searchParams.set(key, String(value));
  }
  return target.toString();
}

/**
 * Low-level 115 web API client. Knows endpoint URLs and envelope conventions;
 * credential ownership stays with the session.
 */
export class Pan115Client {
  private readonly fetchFn: FetchFn;
  private readonly dispatcher: Dispatcher | null;
  private userKey: string | null = null;
  userId: string | null = null;

  constructor(private readonly opts: Pan115ClientOptions) {
    if (opts.fetchFn) {
      this.fetchFn = opts.fetchFn;
      this.dispatcher = null;
    } else {
      const dispatcher = createDispatcher(opts);
      this.dispatcher = dispatcher;
      this.fetchFn = (url, init) => undiciFetch(url, { ...init, dispatcher });
    }
  }

  buildHeaders(overrides: { userAgent?: string; cookie?: string; form?: boolean } = {}): Headers {
    const headers = new Headers();
    headers.set("User-Agent", overrides.userAgent ?? this.opts.userAgent);
    headers.set("Accept", "application/json, text/plain, */*");
    const cookie = overrides.cookie ?? this.opts.cookie();
    if (cookie) {
      headers.set("Cookie", cookie);
    }
    if (overrides.form) {
      headers.set("Content-Type", "application/x-www-form-urlencoded");
    }
    return headers;
  }

  async send(url: string, init: RequestInit & { headers: Headers }): Promise<Response> {
    const method = init.method ?? "GET";
    let res: Response;
    try {
      res = await this.fetchFn(url, init);
    } catch (error) {
      throw new Pan115Error(`${method} ${new URL(url).pathname} failed: ${describeError(error)}`, {
        cause: error
      });
    }
    this.opts.logger?.debug({ method, url: new URL(url).origin + new URL(url).pathname, status: res.status }, "115 request");
    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new Pan115Error(`115 API error (${res.status}): ${text || "unknown error"}`);
    }
    return res;
  }

  async sendJson<T extends Envelope>(
    url: string,
    init: RequestInit & { headers: Headers },
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const res = await this.send(url, init);
    const text = await res.text();
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new Pan115Error(`115 API returned invalid JSON from ${new URL(url).pathname}`, { cause: error });
    }
    const envelope = schema.safeParse(json);
    if (!envelope.success) {
      const loose = envelopeSchema.safeParse(json);
      if (loose.success) {
        checkEnvelope(loose.data);
      }
      const message = envelope.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new Pan115Error(`Unexpected 115 response from ${new URL(url).pathname}: ${message}`, {
        cause: envelope.error
      });
    }
    checkEnvelope(envelope.data);
    return envelope.data;
  }

  async qrCodeLoginWithApp(uid: string, app: string): Promise<QrLoginResult> {
    const body = new URLSearchParams({ account: uid, app });
    const result = await this.sendJson(
      ApiQrCodeLoginWithApp(app),
      { method: "POST", headers: this.buildHeaders({ cookie: "", form: true }), body: body.toString() },
      qrLoginResponseSchema
    );
    const { UID, CID, SEID } = result.data.cookie;
    return { credential: { uid: UID, cid: CID, seid: SEID }, userId: result.data.user_id };
  }

  /** Verifies `cookie` against the passport service and records the user id. */
  async loginCheck(cookie: string): Promise<string> {
    const result = await this.sendJson(
      withQuery(ApiLoginCheck, { _: Date.now() }),
      { method: "GET", headers: this.buildHeaders({ cookie }) },
      loginCheckResponseSchema
    );
    if (this.userId !== result.data.user_id) {
      this.userKey = null;
    }
    this.userId = result.data.user_id;
    return result.data.user_id;
  }

  /** Drops the user id and cached user key so the next caller re-verifies the cookie. */
  resetIdentity(): void {
    this.userId = null;
    this.userKey = null;
  }

  async listPage(dirId: string, offset: number, limit: number): Promise<FileListPage> {
    const url = withQuery(ApiFileList, {
      aid: 1,
      cid: dirId,
      o: "user_ptime",
      asc: 0,
      offset,
      show_dir: 1,
      limit,
      snap: 0,
      natsort: 1,
      record_open_time: 1,
      format: "json",
      fc_mix: 0
    });
    const result = await this.sendJson(url, { method: "GET", headers: this.buildHeaders() }, fileListResponseSchema);
    return { count: result.count, items: result.data };
  }

  async getAppVersions(): Promise<AppVersion[]> {
    const result = await this.sendJson(ApiGetVersion, { method: "GET", headers: this.buildHeaders() }, appVersionResponseSchema);
    return Object.entries(result.data).map(([appName, info]) => ({ appName, version: info.version_code ?? "" }));
  }

  async getUserKey(): Promise<string> {
    if (this.userKey) {
      return this.userKey;
    }
    const result = await this.sendJson(ApiUploadInfo, { method: "GET", headers: this.buildHeaders() }, uploadInfoResponseSchema);
    this.userKey = result.userkey;
    this.userId = this.userId ?? result.user_id;
    return result.userkey;
  }

  async postDownloadInfo(data: string, userAgent: string, timestampSec: number): Promise<RawExchange> {
    const requestHeaders = this.buildHeaders({ userAgent, form: true });
    const res = await this.send(withQuery(ApiDownloadGetUrl, { t: timestampSec }), {
      method: "POST",
      headers: requestHeaders,
      body: new URLSearchParams({ data }).toString()
    });
    return { body: await res.text(), requestHeaders };
  }

  async postUploadInit(encodedToken: string, encrypted: Buffer): Promise<Buffer> {
    const res = await this.send(withQuery(ApiUploadInit, { k_ec: encodedToken }), {
      method: "POST",
      headers: this.buildHeaders({ form: true }),
      body: encrypted
    });
    return Buffer.from(await res.arrayBuffer());
  }

  async close(): Promise<void> {
    await this.dispatcher?.close();
  }
}
