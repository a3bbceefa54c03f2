import Database from "better-sqlite3";
import fs from "fs";
import path from "path";

export type Db = Database.Database;

/** Opens the rebalancer database; ":memory:" keeps everything in process. */
export function initDb(dbPath: string): Db {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true, mode: 0o700 });
  }

  const db = new Database(dbPath);

  if (dbPath !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");

  return db;
}
