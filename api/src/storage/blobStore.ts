import { UPLOAD_EXTENSIONS } from "@studyspots/shared";

export interface BlobInfo {
  url: string;
  size: number;
  contentType: string;
}

/**
 * Opaque storage for uploaded images. Blobs are addressed by the public URL
 * `put` hands back.
 */
export interface BlobStore {
  put(key: string, data: Buffer, contentType: string): Promise<string>;
  /** False when the URL does not name a stored blob. */
  remove(url: string): Promise<boolean>;
  stat(url: string): Promise<BlobInfo | null>;
}

/**
 * Maps a public URL back to a storage key. Returns null for URLs outside
 * `baseUrl` and for keys that would escape the store (`..`, absolute paths).
 */
export function keyFromUrl(baseUrl: string, url: string): string | null {
  const prefix = `${baseUrl}/`;
  if (!url.startsWith(prefix)) return null;

  const key = url.slice(prefix.length);
  if (key.length === 0) return null;
  const segments = key.split("/");
  if (segments.some((s) => s === "" || s === "." || s === "..")) return null;
  return key;
}

export function contentTypeForKey(key: string): string {
  const dot = key.lastIndexOf(".");
  const ext = dot === -1 ? "" : key.slice(dot).toLowerCase();
  const match = Object.entries(UPLOAD_EXTENSIONS).find(([, e]) => e === ext);
  return match ? match[0] : "application/octet-stream";
}
