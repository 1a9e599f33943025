export interface FileEntry {
  id: string;
  parentId: string;
  name: string;
  size: number;
  pickCode: string;
  sha1: string;
  isDir: boolean;
  modifiedAt: Date;
}
