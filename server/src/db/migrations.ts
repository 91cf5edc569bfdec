/**
 * Database Migrations
 *
 * Sequential, numbered migrations that bring the schema from any prior
 * version to the current one. Runs every time a database is opened.
 *
 * Rules:
 * - Migrations are append-only. Never edit a shipped migration.
 * - Each migration runs inside a transaction.
 * - To evolve the schema, add a new function to the `migrations` array.
 */

import type Database from "better-sqlite3";
import { createComponentLogger } from "../logging.js";

type Migration = (db: Database.Database) => void;

/**
 * Run all pending migrations. Already-applied migrations are skipped.
 * Returns the schema version after migrating.
 */
export function runMigrations(db: Database.Database): number {
  const log = createComponentLogger("db");

  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const row = db.prepare<[], { v: number | null }>("SELECT MAX(version) AS v FROM schema_version").get();
  const currentVersion = row?.v ?? -1;
  const targetVersion = migrations.length - 1;

  if (currentVersion >= targetVersion) {
    return currentVersion;
  }

  log.info(`Schema at v${currentVersion}, target v${targetVersion}`, {
    pending: targetVersion - currentVersion,
  });

  const stamp = db.prepare<[number]>(
    "INSERT INTO schema_version (version, applied_at) VALUES (?, datetime('now'))",
  );

  for (let i = currentVersion + 1; i < migrations.length; i++) {
    const migrate = migrations[i];
    const txn = db.transaction(() => {
      migrate(db);
      stamp.run(i);
    });
    txn();
    log.debug(`Applied migration ${i}`);
  }

  return targetVersion;
}

const migrations: Migration[] = [
  // ── v0: Documents and their ordered segments ──────────────────────
  function v0_documents(db) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        type TEXT NOT NULL,
        user_id TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS document_chunks (
        id TEXT PRIMARY KEY,
        document_id TEXT NOT NULL,
        chunk_index INTEGER NOT NULL,
        content TEXT NOT NULL,
        FOREIGN KEY (document_id) REFERENCES documents(id) ON DELETE CASCADE
      );
    `);
  },

  // ── v1: Lookup indexes ────────────────────────────────────────────
  function v1_indexes(db) {
    db.exec(`
      CREATE UNIQUE INDEX IF NOT EXISTS idx_chunks_document_order
        ON document_chunks(document_id, chunk_index);
      CREATE INDEX IF NOT EXISTS idx_documents_user
        ON documents(user_id, created_at);
    `);
  },
];
