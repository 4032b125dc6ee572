/**
 * SQLite Database Infrastructure
 *
 * Provides a single-file SQLite database for:
 * - Roles (named buckets of grants)
 * - Role grants (role id -> permission name associations)
 * - Users (the directory used to resolve a user id to a role id)
 *
 * The permission catalog itself is not stored here; it ships with the program.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, statSync } from 'fs';
import { dirname } from 'path';

// Database singleton
let db: Database.Database | null = null;

/**
 * Get the database path from environment or default
 */
function getDbPath(): string {
  return process.env.PERMGATE_DB_PATH || './permgate.db';
}

/**
 * Get or create the database connection
 */
export function getDatabase(): Database.Database {
  if (db) return db;

  const dbPath = getDbPath();

  // Ensure directory exists
  const dir = dirname(dbPath);
  if (dbPath !== ':memory:' && dir !== '.' && !existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  db = new Database(dbPath);

  // Enable WAL mode for better concurrency
  db.pragma('journal_mode = WAL');

  // Enable foreign keys
  db.pragma('foreign_keys = ON');

  return db;
}

/**
 * Initialize all database tables
 */
export function initDatabase(): void {
  const db = getDatabase();

  // Roles table - created by admin operations or template instantiation
  db.exec(`
    CREATE TABLE IF NOT EXISTS roles (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      description TEXT,
      created_at TEXT DEFAULT (datetime('now'))
    );
  `);

  // Role grants table - (role_id, permission_name) is unique.
  // No foreign key to roles: role deletion is handled outside this service and
  // grants of a missing role simply resolve to nothing.
  db.exec(`
    CREATE TABLE IF NOT EXISTS role_grants (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      role_id INTEGER NOT NULL,
      permission_name TEXT NOT NULL,
      granted_at TEXT NOT NULL,
      UNIQUE(role_id, permission_name)
    );

    CREATE INDEX IF NOT EXISTS idx_role_grants_role
      ON role_grants(role_id, id);
  `);

  // Users table - read-only from this service's point of view
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY,
      username TEXT NOT NULL,
      email TEXT,
      role_id INTEGER,
      created_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_users_role
      ON users(role_id);
  `);
}

/**
 * Close the database connection
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Get database stats for health checks
 */
export function getDatabaseStats(): {
  path: string;
  sizeBytes: number;
  tables: { name: string; rowCount: number }[];
} {
  const db = getDatabase();
  const dbPath = getDbPath();

  // Get table row counts
  const tables = db
    .prepare(
      `
    SELECT name FROM sqlite_master
    WHERE type='table' AND name NOT LIKE 'sqlite_%'
    ORDER BY name
  `
    )
    .all() as { name: string }[];

  const tableStats = tables.map((t) => {
    const count = db
      .prepare(`SELECT COUNT(*) as count FROM "${t.name}"`)
      .get() as { count: number };
    return { name: t.name, rowCount: count.count };
  });

  // In-memory databases have no file
  let sizeBytes = 0;
  if (dbPath !== ':memory:' && existsSync(dbPath)) {
    sizeBytes = statSync(dbPath).size;
  }

  return {
    path: dbPath,
    sizeBytes,
    tables: tableStats,
  };
}
