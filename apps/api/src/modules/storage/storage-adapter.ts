import type { FileEntry } from "../../core/types.js";
import type { ContentSource } from "../cloud115/content-source.js";
import type { DownloadDescriptor } from "../cloud115/session.js";

export type StoredFile = {
  pickCode: string;
  sha1: string;
  /** True when the provider already held the content and no bytes were sent. */
  rapid: boolean;
};

export interface StorageAdapter {
  listFiles(dirId: string): Promise<FileEntry[]>;
  getDownloadLink(pickCode: string, userAgent?: string): Promise<DownloadDescriptor>;
  writeFile(dirId: string, fileName: string, content: ContentSource): Promise<StoredFile>;
}
