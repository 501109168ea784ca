import express from "express";
import cors from "cors";
import helmet from "helmet";
import { errorHandler, notFound } from "./middleware/errorHandler.js";
import { generalLimiter } from "./middleware/rateLimit.js";
import { requestLogger } from "./middleware/requestLogger.js";
import { bookmarkRoutes } from "./routes/bookmarks.js";
import { cafeRoutes } from "./routes/cafes.js";
import { fileRoutes } from "./routes/files.js";
import { reviewRoutes } from "./routes/reviews.js";
import { userRoutes } from "./routes/users.js";
import type { Services } from "./services/index.js";

export interface AppOptions {
  services: Services;
  corsOrigins?: string[];
  /** Directory served read-only under /files; omitted in tests. */
  staticDir?: string;
}

export function createApp({ services, corsOrigins = [], staticDir }: AppOptions) {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(
    cors({
      origin: corsOrigins,
      credentials: true,
    })
  );
  app.use(requestLogger);
  app.use(express.json());
  app.use(generalLimiter);

  if (staticDir) {
    app.use("/files", express.static(staticDir, { index: false }));
  }

  app.get("/", (_req, res) => {
    res.json({ message: "Study spot review API" });
  });

  // Health check
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // Routes
  app.use(bookmarkRoutes(services));
  app.use(userRoutes(services));
  app.use(cafeRoutes(services));
  app.use(reviewRoutes(services));
  app.use(fileRoutes(services));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
