import type { Db } from "../db";
import type { ExclusionEntry } from "../types/rebalance";

type ExclusionRow = Omit<ExclusionEntry, "permanent"> & { permanent: number };

export function loadExclusions(db: Db): ExclusionEntry[] {
  const rows = db
    .prepare(
      `SELECT pair_key, source_channel, destination_channel, failures, expires_at,
              permanent, reason, updated_at
       FROM rebalance_exclusions
       ORDER BY pair_key ASC`
    )
    .all() as ExclusionRow[];

  return rows.map((r) => ({ ...r, permanent: r.permanent === 1 }));
}

export function saveExclusion(db: Db, entry: ExclusionEntry): void {
  db.prepare(
    `INSERT OR REPLACE INTO rebalance_exclusions
     (pair_key, source_channel, destination_channel, failures, expires_at, permanent, reason, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
  ).run(
    entry.pair_key,
    entry.source_channel,
    entry.destination_channel,
    entry.failures,
    entry.expires_at,
    entry.permanent ? 1 : 0,
    entry.reason,
    entry.updated_at
  );
}

export function deleteExclusion(db: Db, pairKey: string): boolean {
  const result = db
    .prepare(`DELETE FROM rebalance_exclusions WHERE pair_key = ?`)
    .run(pairKey);
  return result.changes > 0;
}
