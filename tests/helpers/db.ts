import SQLite from "better-sqlite3";
import { Kysely, SqliteDialect } from "kysely";

import { createSchema } from "../../src/db/schema.js";

import type { Database } from "../../src/db/types.js";

/**
 * Fresh in-memory database with the full pipeline schema.
 */
export async function createTestDb(): Promise<Kysely<Database>> {
  const db = new Kysely<Database>({
    dialect: new SqliteDialect({ database: new SQLite(":memory:") }),
  });
  await createSchema(db);
  return db;
}
