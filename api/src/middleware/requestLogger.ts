import type { NextFunction, Request, Response } from "express";
import { createLogger } from "../lib/logger.js";

const log = createLogger("http");

export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const started = Date.now();
  res.on("finish", () => {
    log.info(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`);
  });
  next();
}
