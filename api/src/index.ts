import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { createLogger } from "./lib/logger.js";
import { createServices } from "./services/index.js";
import { LocalBlobStore } from "./storage/localBlobStore.js";
import { createMemoryStores } from "./store/memoryStore.js";
import { createPostgresStores } from "./store/postgresStore.js";
import type { Stores } from "./store/types.js";

const log = createLogger("server");

function openStores(): Stores {
  if (env.storeDriver === "postgres") {
    log.info("using postgres store");
    return createPostgresStores(env.databaseUrl);
  }
  log.warn("using in-memory store; data is lost on restart");
  return createMemoryStores();
}

const stores = openStores();
const blobs = new LocalBlobStore(env.uploadDir, env.publicFilesUrl);
const services = createServices({ stores, blobs });

const app = createApp({
  services,
  corsOrigins: env.corsOrigins,
  staticDir: env.uploadDir,
});

const server = app.listen(env.port, () => {
  log.info(`API server running on port ${env.port}`);
});

let shuttingDown = false;

function shutdown(signal: NodeJS.Signals) {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info(`${signal} received, shutting down`);

  server.close((err) => {
    if (err) log.error("failed to close http server", { error: err.message });
    stores
      .close()
      .then(() => process.exit(err ? 1 : 0))
      .catch((closeErr: unknown) => {
        log.error("failed to close stores", {
          error: closeErr instanceof Error ? closeErr.message : String(closeErr),
        });
        process.exit(1);
      });
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
