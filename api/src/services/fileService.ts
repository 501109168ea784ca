import { randomUUID } from "node:crypto";
import { ALLOWED_UPLOAD_TYPES, UPLOAD_EXTENSIONS } from "@studyspots/shared";
import { InvalidInputError, NotFoundError } from "../lib/errors.js";
import { createLogger } from "../lib/logger.js";
import type { BlobInfo, BlobStore } from "../storage/blobStore.js";
import type { UploadedFile } from "./userService.js";

const log = createLogger("files");

export type FileService = ReturnType<typeof createFileService>;

function isAllowedType(contentType: string): boolean {
  return ALLOWED_UPLOAD_TYPES.some((t) => t === contentType);
}

function photoType(file: UploadedFile): string {
  const contentType = file.contentType.split(";")[0]?.trim().toLowerCase() ?? "";
  if (!isAllowedType(contentType)) {
    log.warn(`rejected upload of type "${file.contentType}"`);
    throw new InvalidInputError(
      `File type ${file.contentType || "(none)"} not allowed. Allowed types: ${ALLOWED_UPLOAD_TYPES.join(", ")}`
    );
  }
  if (file.data.length === 0) throw new InvalidInputError("No file provided");
  return contentType;
}

export function createFileService({ blobs }: { blobs: BlobStore }) {
  async function store(file: UploadedFile, contentType: string): Promise<string> {
    const key = `photos/${randomUUID()}${UPLOAD_EXTENSIONS[contentType] ?? ""}`;
    const url = await blobs.put(key, file.data, contentType);
    log.info(`uploaded ${file.data.length} bytes to ${url}`);
    return url;
  }

  async function uploadPhoto(file: UploadedFile): Promise<string> {
    return store(file, photoType(file));
  }

  /** Checks every file before storing any, then stores them in order. */
  async function uploadPhotos(files: UploadedFile[]): Promise<string[]> {
    if (files.length === 0) throw new InvalidInputError("No files provided");
    const checked = files.map((file) => ({ file, contentType: photoType(file) }));

    const urls: string[] = [];
    for (const { file, contentType } of checked) {
      urls.push(await store(file, contentType));
    }
    return urls;
  }

  async function deleteFile(url: string): Promise<void> {
    if (!(await blobs.remove(url))) throw new NotFoundError("File");
    log.info(`deleted ${url}`);
  }

  async function getFileInfo(url: string): Promise<BlobInfo> {
    const info = await blobs.stat(url);
    if (!info) throw new NotFoundError("File");
    return info;
  }

  return { uploadPhoto, uploadPhotos, deleteFile, getFileInfo };
}
