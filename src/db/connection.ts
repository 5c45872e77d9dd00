import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import {
  Kysely,
  PostgresDialect,
  SqliteDialect,
  sql,
  type Dialect,
} from "kysely";
import pg from "pg";

import { config } from "../config.js";
import { logger } from "../logger.js";

import type { Database } from "./types.js";

const { Pool } = pg;

// ============================================================================
// Configuration
// ============================================================================

const DATABASE_URL = config.databaseUrl;

const SQLITE_PREFIX = "sqlite:";

const poolConfig: pg.PoolConfig = {
  connectionString: DATABASE_URL,
  max: 20, // Maximum pool connections
  idleTimeoutMillis: 30_000, // Close idle connections after 30s
  connectionTimeoutMillis: 5000, // Connection timeout
};

export type DatabaseKind = "postgres" | "sqlite";

export const databaseKind: DatabaseKind = DATABASE_URL.startsWith(
  SQLITE_PREFIX
)
  ? "sqlite"
  : "postgres";

// ============================================================================
// Pool and Kysely Instance
// ============================================================================

export const pool = databaseKind === "postgres" ? new Pool(poolConfig) : null;

function createSqliteDatabase(url: string): SQLite.Database {
  const path = url.slice(SQLITE_PREFIX.length);

  if (path !== ":memory:") {
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  const database = new SQLite(path);
  database.pragma("journal_mode = WAL");
  return database;
}

function createDialect(): Dialect {
  if (pool !== null) {
    return new PostgresDialect({ pool });
  }
  return new SqliteDialect({ database: createSqliteDatabase(DATABASE_URL) });
}

export const db = new Kysely<Database>({
  dialect: createDialect(),
});

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (error) {
    logger.warn({ error }, "Database health check failed");
    return false;
  }
}

/**
 * Gracefully close the database connection
 */
export async function closeConnection(): Promise<void> {
  try {
    // db.destroy() also ends the pg pool
    await db.destroy();
    logger.info("Database connection closed");
  } catch (error) {
    logger.error({ error }, "Error closing database connection");
    throw error;
  }
}

/**
 * Get the current database URL (for display, with password masked)
 */
export function getDatabaseUrl(): string {
  if (databaseKind === "sqlite") {
    return DATABASE_URL;
  }
  const url = new URL(DATABASE_URL);
  if (url.password !== "") {
    url.password = "****";
  }
  return url.toString();
}

/**
 * Get pool statistics (PostgreSQL only)
 */
export function getPoolStats(): {
  totalCount: number;
  idleCount: number;
  waitingCount: number;
} | null {
  if (pool === null) {
    return null;
  }
  return {
    totalCount: pool.totalCount,
    idleCount: pool.idleCount,
    waitingCount: pool.waitingCount,
  };
}
