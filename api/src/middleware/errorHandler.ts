import type { NextFunction, Request, Response } from "express";
import multer from "multer";
import { ApiError } from "../lib/errors.js";
import { createLogger } from "../lib/logger.js";

const log = createLogger("http");

// body-parser errors carry an HTTP status and a `type` tag.
function clientErrorOf(err: unknown): { status: number; type: string; message: string } | null {
  if (!(err instanceof Error)) return null;
  const status: unknown = "status" in err ? err.status : undefined;
  if (typeof status !== "number" || status < 400 || status >= 500) return null;
  const type: unknown = "type" in err ? err.type : undefined;
  return { status, type: typeof type === "string" ? type : "", message: err.message };
}

export function notFound(_req: Request, res: Response) {
  res.status(404).json({ error: "Not found" });
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  if (err instanceof ApiError) {
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
      ...(err.details !== undefined ? { details: err.details } : {}),
    });
    return;
  }

  if (err instanceof multer.MulterError) {
    res.status(400).json({ error: err.message, code: err.code });
    return;
  }

  const clientError = clientErrorOf(err);
  if (clientError) {
    res.status(clientError.status).json({
      error:
        clientError.type === "entity.parse.failed"
          ? "Malformed JSON body"
          : clientError.message,
    });
    return;
  }

  log.error("unhandled error", {
    error: err instanceof Error ? err.stack ?? err.message : String(err),
  });
  res.status(500).json({ error: "Internal server error" });
}
