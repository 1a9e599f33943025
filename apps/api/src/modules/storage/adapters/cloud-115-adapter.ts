import { FullUploadRequiredError } from "../../../core/errors.js";
import type { FileEntry } from "../../../core/types.js";
import { silentLogger, type Logger } from "../../../lib/logger.js";
import { computeUploadHashes, type ContentSource } from "../../cloud115/content-source.js";
import type { Credential } from "../../cloud115/credential.js";
import type { MustUpload } from "../../cloud115/rapid-upload.js";
import type { DownloadDescriptor, Pan115Session } from "../../cloud115/session.js";
import type { StorageAdapter, StoredFile } from "../storage-adapter.js";

/**
 * Moves the bytes when the provider does not already hold the content,
 * e.g. an OSS multipart client using the bucket and object from `init`.
 */
export interface UploadTransfer {
  upload(init: MustUpload, content: ContentSource, fileName: string): Promise<{ pickCode: string }>;
}

export interface Cloud115AdapterOptions {
  transfer?: UploadTransfer;
  logger?: Logger;
}

export class Cloud115Adapter implements StorageAdapter {
  private loginPromise: Promise<Credential> | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly session: Pan115Session,
    private readonly opts: Cloud115AdapterOptions = {}
  ) {
    this.logger = opts.logger ?? silentLogger;
  }

  /**
   * Runs `session.login`, or joins the one already in flight. A failed login
   * is retried by the next caller.
   */
  login(): Promise<Credential> {
    if (!this.loginPromise) {
      this.loginPromise = this.session.login().finally(() => {
        this.loginPromise = null;
      });
    }
    return this.loginPromise;
  }

  async ensureLoggedIn(): Promise<void> {
    if (this.loginPromise || !this.session.currentCredential) {
      await this.login();
    }
  }

  async listFiles(dirId: string): Promise<FileEntry[]> {
    await this.ensureLoggedIn();
    return this.session.listFiles(dirId);
  }

  async getDownloadLink(pickCode: string, userAgent?: string): Promise<DownloadDescriptor> {
    await this.ensureLoggedIn();
    return this.session.resolveDownload(pickCode, userAgent);
  }

  async writeFile(dirId: string, fileName: string, content: ContentSource): Promise<StoredFile> {
    await this.ensureLoggedIn();
    const { fileId, preId } = await computeUploadHashes(content);
    const result = await this.session.initiateRapidUpload({
      fileSize: content.size,
      fileName,
      dirId,
      preId,
      fileId,
      content
    });

    if (result.kind === "accepted") {
      return { pickCode: result.pickCode, sha1: result.sha1, rapid: true };
    }

    if (!this.opts.transfer) {
      throw new FullUploadRequiredError(fileName);
    }
    this.logger.info({ fileName, bucket: result.bucket, object: result.object }, "Falling back to full upload");
    const uploaded = await this.opts.transfer.upload(result, content, fileName);
    return { pickCode: uploaded.pickCode, sha1: result.sha1, rapid: false };
  }
}
