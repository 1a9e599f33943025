export type StorageType = "cloud_115";

export interface StorageTarget {
  id: string;
  name: string;
  type: StorageType;
  rootDirId: string;
}

export interface CloudFileEntry {
  id: string;
  parentId: string;
  name: string;
  size: number;
  pickCode: string;
  sha1: string;
  isDir: boolean;
  modifiedAt: string;
}

export interface DownloadLink {
  fileName: string;
  fileSize: number;
  pickCode: string;
  url: string;
  headers: Record<string, string>;
}

export type UploadOutcome =
  | { kind: "accepted"; pickCode: string; sha1: string }
  | { kind: "uploaded"; pickCode: string; sha1: string };
