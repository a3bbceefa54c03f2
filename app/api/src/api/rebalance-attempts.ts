import type { Db } from "../db";
import type { RebalanceAttempt, RebalanceAttemptStatus } from "../types/rebalance";

const COLUMNS = `id, source_channel, destination_channel, amount, fee_ceiling, status,
  payment_id, fee_paid, failure_reason, epoch_start, created_at, resolved_at, released_at`;

export function createRebalanceAttempt(
  db: Db,
  params: {
    source_channel: string;
    destination_channel: string;
    amount: number;
    fee_ceiling: number;
    epoch_start: number;
    created_at: number;
  }
): RebalanceAttempt {
  const result = db
    .prepare(
      `INSERT INTO rebalance_attempts
       (source_channel, destination_channel, amount, fee_ceiling, status, payment_id,
        fee_paid, failure_reason, epoch_start, created_at, resolved_at)
       VALUES (?, ?, ?, ?, 'pending', NULL, NULL, NULL, ?, ?, NULL)`
    )
    .run(
      params.source_channel,
      params.destination_channel,
      params.amount,
      params.fee_ceiling,
      params.epoch_start,
      params.created_at
    );

  return {
    id: Number(result.lastInsertRowid),
    source_channel: params.source_channel,
    destination_channel: params.destination_channel,
    amount: params.amount,
    fee_ceiling: params.fee_ceiling,
    status: "pending",
    payment_id: null,
    fee_paid: null,
    failure_reason: null,
    epoch_start: params.epoch_start,
    created_at: params.created_at,
    resolved_at: null,
    released_at: null,
  };
}

/**
 * Writes the mutable columns of an attempt back to its row. released_at is
 * left alone; only releaseOutstandingAttempts sets it.
 */
export function updateRebalanceAttempt(db: Db, attempt: RebalanceAttempt): void {
  db.prepare(
    `UPDATE rebalance_attempts
     SET status = ?, payment_id = ?, fee_paid = ?, failure_reason = ?, resolved_at = ?
     WHERE id = ?`
  ).run(
    attempt.status,
    attempt.payment_id,
    attempt.fee_paid,
    attempt.failure_reason,
    attempt.resolved_at,
    attempt.id
  );
}

export function getRebalanceAttempt(db: Db, id: number): RebalanceAttempt | undefined {
  return db
    .prepare(`SELECT ${COLUMNS} FROM rebalance_attempts WHERE id = ?`)
    .get(id) as RebalanceAttempt | undefined;
}

export function getRebalanceAttempts(db: Db, limit: number = 50): RebalanceAttempt[] {
  return db
    .prepare(
      `SELECT ${COLUMNS}
       FROM rebalance_attempts
       ORDER BY created_at DESC, id DESC
       LIMIT ?`
    )
    .all(limit) as RebalanceAttempt[];
}

/**
 * Attempts whose outcome the node has not confirmed: ambiguous ones, and
 * in-flight ones left behind by a restart.
 */
export function getOutstandingAttempts(db: Db): RebalanceAttempt[] {
  const statuses: RebalanceAttemptStatus[] = ["in_flight", "ambiguous"];
  return db
    .prepare(
      `SELECT ${COLUMNS}
       FROM rebalance_attempts
       WHERE status IN (?, ?) AND payment_id IS NOT NULL
       ORDER BY id ASC`
    )
    .all(...statuses) as RebalanceAttempt[];
}

/**
 * Marks the pair's unconfirmed attempts as released by a manual reset. They
 * are still reconciled, but no longer keep the pair excluded.
 */
export function releaseOutstandingAttempts(
  db: Db,
  sourceChannel: string,
  destinationChannel: string,
  at: number
): number {
  const result = db
    .prepare(
      `UPDATE rebalance_attempts
       SET released_at = ?
       WHERE source_channel = ? AND destination_channel = ?
         AND status IN ('in_flight', 'ambiguous') AND released_at IS NULL`
    )
    .run(at, sourceChannel, destinationChannel);
  return result.changes;
}

/** Latest succeeded rebalance per channel, on either side of the pair. */
export function getLastRebalancedAt(db: Db): Map<string, number> {
  const rows = db
    .prepare(
      `SELECT channel, MAX(resolved_at) AS at FROM (
         SELECT source_channel AS channel, resolved_at FROM rebalance_attempts WHERE status = 'succeeded'
         UNION ALL
         SELECT destination_channel AS channel, resolved_at FROM rebalance_attempts WHERE status = 'succeeded'
       )
       GROUP BY channel`
    )
    .all() as Array<{ channel: string; at: number | null }>;

  const out = new Map<string, number>();
  for (const r of rows) {
    if (r.at != null) out.set(r.channel, r.at);
  }
  return out;
}

export type RebalanceSummary = {
  since: number;
  attempts: number;
  succeeded: number;
  failed: number;
  ambiguous: number;
  amount_moved: number;
  fees_paid: number;
};

/** Audit totals for attempts created at or after `since`. */
export function getRebalanceSummary(db: Db, since: number): RebalanceSummary {
  const row = db
    .prepare(
      `SELECT
         COUNT(*) AS attempts,
         COALESCE(SUM(CASE WHEN status = 'succeeded' THEN 1 ELSE 0 END), 0) AS succeeded,
         COALESCE(SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END), 0) AS failed,
         COALESCE(SUM(CASE WHEN status = 'ambiguous' THEN 1 ELSE 0 END), 0) AS ambiguous,
         COALESCE(SUM(CASE WHEN status = 'succeeded' THEN amount ELSE 0 END), 0) AS amount_moved,
         COALESCE(SUM(CASE WHEN status = 'succeeded' THEN fee_paid ELSE 0 END), 0) AS fees_paid
       FROM rebalance_attempts
       WHERE created_at >= ?`
    )
    .get(since) as Omit<RebalanceSummary, "since">;

  return { since, ...row };
}
