import { Router } from "express";
import { fileUrlQuerySchema } from "@studyspots/shared";
import { uploadLimiter } from "../middleware/rateLimit.js";
import {
  multipartUpload,
  rawUpload,
  readUpload,
  readUploads,
} from "../middleware/upload.js";
import { parse } from "../middleware/validate.js";
import type { Services } from "../services/index.js";

export function fileRoutes({ files }: Pick<Services, "files">) {
  const router = Router();

  router.post("/upload", uploadLimiter, rawUpload, async (req, res) => {
    const url = await files.uploadPhoto(readUpload(req));
    res.json({ url, message: "File uploaded successfully" });
  });

  router.post("/upload-multiple", uploadLimiter, multipartUpload, async (req, res) => {
    const urls = await files.uploadPhotos(readUploads(req));
    res.json({ urls, message: `${urls.length} files uploaded successfully` });
  });

  router.delete("/delete", async (req, res) => {
    const { file_url } = parse(fileUrlQuerySchema, req.query);
    await files.deleteFile(file_url);
    res.json({ message: "File deleted successfully" });
  });

  router.get("/info", async (req, res) => {
    const { file_url } = parse(fileUrlQuerySchema, req.query);
    const info = await files.getFileInfo(file_url);
    res.json({ url: info.url, size: info.size, content_type: info.contentType });
  });

  return router;
}
