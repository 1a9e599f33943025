import { createHash } from "node:crypto";
import { open, stat } from "node:fs/promises";
import path from "node:path";
import { UploadError } from "../../core/errors.js";

/**
 * Random-access view of upload content. Signature challenges re-read ranges,
 * so implementations must not be one-shot streams.
 */
export interface ContentSource {
  readonly size: number;
  readRange(start: number, length: number): Promise<Buffer>;
}

export class BufferContentSource implements ContentSource {
  constructor(private readonly content: Buffer) {}

  get size(): number {
    return this.content.length;
  }

  async readRange(start: number, length: number): Promise<Buffer> {
    return this.content.subarray(start, start + length);
  }
}

export class FileContentSource implements ContentSource {
  private constructor(
    private readonly filePath: string,
    readonly size: number
  ) {}

  static async open(filePath: string): Promise<FileContentSource> {
    const absolute = path.resolve(filePath);
    const st = await stat(absolute);
    if (!st.isFile()) {
      throw new Error(`Not a file: ${absolute}`);
    }
    return new FileContentSource(absolute, st.size);
  }

  async readRange(start: number, length: number): Promise<Buffer> {
    const handle = await open(this.filePath, "r");
    try {
      const buffer = Buffer.alloc(Math.max(0, Math.min(length, this.size - start)));
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, start);
      return buffer.subarray(0, bytesRead);
    } finally {
      await handle.close();
    }
  }
}

export const PRE_HASH_LENGTH = 128 * 1024;
const HASH_CHUNK_LENGTH = 4 * 1024 * 1024;

export interface UploadHashes {
  /** SHA-1 of the whole content, upper-case hex. */
  fileId: string;
  /** SHA-1 of the first 128 KiB, upper-case hex. */
  preId: string;
}

async function sha1OfRange(source: ContentSource, start: number, length: number): Promise<string> {
  const hash = createHash("sha1");
  let offset = start;
  const end = start + length;
  while (offset < end) {
    const chunk = await source.readRange(offset, Math.min(HASH_CHUNK_LENGTH, end - offset));
    if (chunk.length === 0) {
      break;
    }
    hash.update(chunk);
    offset += chunk.length;
  }
  return hash.digest("hex").toUpperCase();
}

export async function computeUploadHashes(source: ContentSource): Promise<UploadHashes> {
  const [fileId, preId] = await Promise.all([
    sha1OfRange(source, 0, source.size),
    sha1OfRange(source, 0, Math.min(PRE_HASH_LENGTH, source.size))
  ]);
  return { fileId, preId };
}

/** Answers a `sign_check` such as "0-131071" (inclusive bounds). */
export async function digestRange(source: ContentSource, rangeSpec: string): Promise<string> {
  const match = /^(\d+)-(\d+)$/.exec(rangeSpec.trim());
  if (!match) {
    throw new UploadError(`invalid sign_check range: ${rangeSpec}`);
  }
  const start = Number(match[1]);
  const end = Number(match[2]);
  if (end < start || end >= source.size) {
    throw new UploadError(`sign_check range ${rangeSpec} is outside content of ${source.size} bytes`);
  }
  return sha1OfRange(source, start, end - start + 1);
}
