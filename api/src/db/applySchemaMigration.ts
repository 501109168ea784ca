import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import postgres from "postgres";
import { env } from "../config/env.js";
import { createLogger } from "../lib/logger.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const log = createLogger("schema-migration");

interface ConnectionInfo {
  current_database: string;
  current_user: string;
  now: string;
}

async function main() {
  const migrationPath = path.resolve(__dirname, "../../schema.sql");
  const migrationSql = await fs.readFile(migrationPath, "utf8");

  const sql = postgres(env.databaseUrl, { prepare: false, max: 1 });

  try {
    const [info] = await sql<ConnectionInfo[]>`
      select
        current_database() as current_database,
        current_user as current_user,
        now()::text as now
    `;
    log.info(
      `connected database=${info?.current_database ?? "?"} user=${info?.current_user ?? "?"} now=${info?.now ?? "?"}`
    );

    // BEGIN/COMMIT plus several statements: needs the simple protocol.
    await sql.unsafe(migrationSql).simple();

    log.info("applied successfully");
  } finally {
    await sql.end({ timeout: 5 });
  }
}

main().catch((e: unknown) => {
  log.error("failed", { error: e instanceof Error ? e.message : String(e) });
  process.exitCode = 1;
});
