import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema.js";

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseConnection {
  db: Database;
  close(): Promise<void>;
}

// Drizzle ORM client over postgres-js. Only opened when STORE_DRIVER=postgres.
export function connectDatabase(databaseUrl: string): DatabaseConnection {
  const client = postgres(databaseUrl, { prepare: false });
  return {
    db: drizzle(client, { schema }),
    close: () => client.end({ timeout: 5 }),
  };
}
