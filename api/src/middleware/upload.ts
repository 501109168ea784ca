import express, { type Request } from "express";
import multer from "multer";
import type { UploadedFile } from "../services/userService.js";

export const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;
export const MAX_FILES_PER_UPLOAD = 10;

// Uploads arrive as the raw request body, typed by its Content-Type header.
// Every type is buffered so the services can reject non-images with a 400.
export const rawUpload = express.raw({ type: () => true, limit: MAX_UPLOAD_BYTES });

export function readUpload(req: Request): UploadedFile {
  const body: unknown = req.body;
  return {
    data: Buffer.isBuffer(body) ? body : Buffer.alloc(0),
    contentType: req.get("content-type") ?? "",
  };
}

// multipart/form-data with the images under the `files` field.
export const multipartUpload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: MAX_UPLOAD_BYTES, files: MAX_FILES_PER_UPLOAD },
}).array("files", MAX_FILES_PER_UPLOAD);

export function readUploads(req: Request): UploadedFile[] {
  const files = req.files;
  if (!Array.isArray(files)) return [];
  return files.map((file) => ({ data: file.buffer, contentType: file.mimetype }));
}
