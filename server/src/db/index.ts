/**
 * Database Setup
 *
 * SQLite database holding documents and their segments.
 */

import Database from "better-sqlite3";
import * as path from "path";
import * as fs from "fs";
import { runMigrations } from "./migrations.js";
import { createComponentLogger } from "../logging.js";

export const DB_FILENAME = "docprime.db";

/**
 * Open (creating if needed) the database in `dbDir`, or an in-memory
 * database when `dbDir` is ":memory:".
 */
export function openDatabase(dbDir: string): Database.Database {
  const inMemory = dbDir === ":memory:";
  let dbPath = ":memory:";
  if (!inMemory) {
    fs.mkdirSync(dbDir, { recursive: true });
    dbPath = path.join(dbDir, DB_FILENAME);
  }

  const db = new Database(dbPath);
  if (!inMemory) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");

  runMigrations(db);

  createComponentLogger("db").info(`Database initialized at ${dbPath}`);
  return db;
}
