import fs from "fs";
import path from "path";
import type { Db } from "./index";
import { toErrorMessage } from "../utils/errors";

const MIGRATIONS_DIR = path.join(__dirname, "migrations");

export function runMigrations(db: Db, migrationsDir: string = MIGRATIONS_DIR): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS migrations (
      id TEXT PRIMARY KEY,
      applied_at INTEGER NOT NULL
    );
  `);

  const rows = db
    .prepare("SELECT id FROM migrations")
    .all() as Array<{ id: string }>;

  const applied = new Set(rows.map(r => r.id));
  const newlyApplied: string[] = [];

  if (!fs.existsSync(migrationsDir)) {
    throw new Error(`[db] migrations directory not found: ${migrationsDir}`);
  }

  const files = fs
    .readdirSync(migrationsDir)
    .filter(f => f.endsWith(".sql"))
    .sort();

  for (const file of files) {
    if (applied.has(file)) continue;

    const sql = fs.readFileSync(path.join(migrationsDir, file), "utf8");

    try {
      db.transaction(() => {
        db.exec(sql);
        db.prepare(
          "INSERT INTO migrations (id, applied_at) VALUES (?, ?)"
        ).run(file, Date.now());
      })();
    } catch (err) {
      throw new Error(`[db] migration ${file} failed: ${toErrorMessage(err)}`);
    }

    newlyApplied.push(file);
  }

  return newlyApplied;
}
