import { describe, it, expect } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { initDb } from "./index";
import { runMigrations } from "./migrate";

describe("runMigrations", () => {
  it("should apply each migration once", () => {
    const db = initDb(":memory:");

    expect(runMigrations(db)).toEqual(["001_rebalancer.sql", "002_attempt_release.sql"]);
    expect(runMigrations(db)).toEqual([]);

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name LIKE 'rebalance_%' ORDER BY name")
      .all() as Array<{ name: string }>;
    expect(tables.map((t) => t.name)).toEqual([
      "rebalance_attempts",
      "rebalance_exclusions",
      "rebalance_fee_epoch",
    ]);

    const columns = db.prepare("PRAGMA table_info(rebalance_attempts)").all() as Array<{ name: string }>;
    expect(columns.map((c) => c.name)).toContain("released_at");
  });

  it("should roll back a failing migration", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "rebalancer-migrations-"));
    fs.writeFileSync(path.join(dir, "001_ok.sql"), "CREATE TABLE ok (id INTEGER);");
    fs.writeFileSync(path.join(dir, "002_bad.sql"), "CREATE TABLE broken (;");

    const db = initDb(":memory:");
    try {
      expect(() => runMigrations(db, dir)).toThrow(/migration 002_bad.sql failed/);

      const applied = db.prepare("SELECT id FROM migrations ORDER BY id").all() as Array<{ id: string }>;
      expect(applied.map((r) => r.id)).toEqual(["001_ok.sql"]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("should fail when the migrations directory is missing", () => {
    const db = initDb(":memory:");
    expect(() => runMigrations(db, path.join(os.tmpdir(), "does-not-exist-rebalancer"))).toThrow(
      /migrations directory not found/
    );
  });
});
