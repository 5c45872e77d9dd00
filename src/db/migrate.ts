import { logger } from "../logger.js";
import { closeConnection, db } from "./connection.js";
import {
  TABLE_NAMES,
  countTableRows,
  createSchema,
  dropSchema,
  listTables,
  type TableStat,
} from "./schema.js";

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Create every table and index that does not exist yet
 */
export async function runMigration(options?: {
  fresh?: boolean;
}): Promise<void> {
  try {
    if (options?.fresh === true) {
      logger.info("Dropping existing tables (--fresh mode)...");
      await dropSchema(db);
      logger.info("Tables dropped");
    }

    logger.info("Running schema migration...");
    await createSchema(db);
    logger.info("Schema migration completed successfully");
  } catch (error) {
    logger.error({ error }, "Schema migration failed");
    throw error;
  }
}

/**
 * Check if the schema exists (all pipeline tables present)
 */
export async function hasSchema(): Promise<boolean> {
  const tables = new Set(await listTables(db));
  return TABLE_NAMES.every((name) => tables.has(name));
}

/**
 * Get table statistics
 */
export async function getTableStats(): Promise<TableStat[]> {
  return countTableRows(db);
}

// ============================================================================
// CLI Entry Point (only runs when executed directly, not when imported)
// ============================================================================

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const fresh = args.includes("--fresh");

  if (fresh) {
    console.log("Running migration with --fresh flag (will drop all tables)");
  }

  try {
    await runMigration({ fresh });
    console.log("Migration completed successfully!");

    const stats = await getTableStats();
    console.log("\nTable statistics:");
    for (const row of stats) {
      console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
    }
  } catch (error) {
    console.error("Migration failed:", error);
    process.exitCode = 1;
  } finally {
    await closeConnection();
  }
}

// Only run main() if this file is executed directly (not imported)
const isMainModule = process.argv[1]?.includes("migrate");
if (isMainModule === true) {
  void main();
}
