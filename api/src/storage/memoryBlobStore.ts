import { keyFromUrl, type BlobInfo, type BlobStore } from "./blobStore.js";

interface StoredBlob {
  data: Buffer;
  contentType: string;
}

export class MemoryBlobStore implements BlobStore {
  private readonly blobs = new Map<string, StoredBlob>();

  constructor(private readonly baseUrl: string = "memory://blobs") {}

  async put(key: string, data: Buffer, contentType: string): Promise<string> {
    this.blobs.set(key, { data: Buffer.from(data), contentType });
    return `${this.baseUrl}/${key}`;
  }

  async remove(url: string): Promise<boolean> {
    const key = keyFromUrl(this.baseUrl, url);
    return key !== null && this.blobs.delete(key);
  }

  async stat(url: string): Promise<BlobInfo | null> {
    const key = keyFromUrl(this.baseUrl, url);
    const blob = key === null ? undefined : this.blobs.get(key);
    if (!blob) return null;
    return { url, size: blob.data.length, contentType: blob.contentType };
  }

  keys(): string[] {
    return [...this.blobs.keys()];
  }
}
