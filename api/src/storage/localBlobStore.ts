import fs from "node:fs/promises";
import path from "node:path";
import {
  contentTypeForKey,
  keyFromUrl,
  type BlobInfo,
  type BlobStore,
} from "./blobStore.js";

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Writes blobs under `rootDir`; the app serves that directory at `baseUrl`. */
export class LocalBlobStore implements BlobStore {
  constructor(
    private readonly rootDir: string,
    private readonly baseUrl: string
  ) {}

  async put(key: string, data: Buffer, _contentType: string): Promise<string> {
    const filePath = path.join(this.rootDir, key);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, data);
    return `${this.baseUrl}/${key}`;
  }

  async remove(url: string): Promise<boolean> {
    const key = keyFromUrl(this.baseUrl, url);
    if (!key) return false;

    try {
      await fs.unlink(path.join(this.rootDir, key));
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  async stat(url: string): Promise<BlobInfo | null> {
    const key = keyFromUrl(this.baseUrl, url);
    if (!key) return null;

    try {
      const stats = await fs.stat(path.join(this.rootDir, key));
      if (!stats.isFile()) return null;
      return { url, size: stats.size, contentType: contentTypeForKey(key) };
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }
}
