/**
 * Database Client
 *
 * Lazily connects on first use so that CSV-only runs never need
 * DATABASE_URL.
 */

import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import { ConfigError } from "@/lib/parcels/errors";
import * as schema from "./schema";

export type Database = NodePgDatabase<typeof schema>;

let pool: pg.Pool | undefined;
let database: Database | undefined;

export function getDb(connectionString = process.env.DATABASE_URL): Database {
  if (database) return database;

  if (!connectionString) {
    throw new ConfigError("DATABASE_URL is not set", ["DATABASE_URL: Required"]);
  }

  pool = new pg.Pool({ connectionString });
  database = drizzle(pool, { schema });
  return database;
}

export async function closeDb(): Promise<void> {
  const current = pool;
  pool = undefined;
  database = undefined;
  await current?.end();
}
