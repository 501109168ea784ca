import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { createCafeSchema, createUserSchema } from "@studyspots/shared";
import { env } from "../config/env.js";
import { ConflictError } from "../lib/errors.js";
import { createLogger } from "../lib/logger.js";
import { createServices } from "../services/index.js";
import { LocalBlobStore } from "../storage/localBlobStore.js";
import { createPostgresStores } from "../store/postgresStore.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const log = createLogger("seed");

const seedFileSchema = z.object({
  users: z.array(createUserSchema),
  cafes: z.array(createCafeSchema),
});

async function main() {
  const raw = await fs.readFile(path.resolve(__dirname, "seed-data.json"), "utf8");
  const data = seedFileSchema.parse(JSON.parse(raw));

  const stores = createPostgresStores(env.databaseUrl);
  const services = createServices({
    stores,
    blobs: new LocalBlobStore(env.uploadDir, env.publicFilesUrl),
  });

  try {
    // Seeding twice leaves one copy of each user and cafe.
    let usersCreated = 0;
    for (const user of data.users) {
      try {
        await services.users.createUser(user);
        usersCreated++;
      } catch (err) {
        if (!(err instanceof ConflictError)) throw err;
        log.info(`user ${user.name} already present`);
      }
    }

    const existing = new Set((await services.cafes.listCafes()).map((c) => c.name));
    let cafesCreated = 0;
    for (const cafe of data.cafes) {
      if (existing.has(cafe.name)) continue;
      await services.cafes.createCafe(cafe);
      cafesCreated++;
    }

    log.info(`done: ${usersCreated} users, ${cafesCreated} cafes`);
  } finally {
    await stores.close();
  }
}

main().catch((e: unknown) => {
  log.error("failed", { error: e instanceof Error ? e.message : String(e) });
  process.exitCode = 1;
});
