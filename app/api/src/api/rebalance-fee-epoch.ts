import type { Db } from "../db";
import type { FeeLedger } from "../types/rebalance";

export function loadFeeLedger(db: Db): FeeLedger | null {
  const row = db
    .prepare(`SELECT epoch_start, spent FROM rebalance_fee_epoch WHERE id = 1`)
    .get() as FeeLedger | undefined;
  return row ?? null;
}

export function saveFeeLedger(db: Db, ledger: FeeLedger): void {
  db.prepare(
    `INSERT INTO rebalance_fee_epoch (id, epoch_start, spent, updated_at)
     VALUES (1, ?, ?, ?)
     ON CONFLICT(id) DO UPDATE SET
       epoch_start = excluded.epoch_start,
       spent = excluded.spent,
       updated_at = excluded.updated_at`
  ).run(ledger.epoch_start, ledger.spent, Date.now());
}
