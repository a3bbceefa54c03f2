/**
 * Everything a rebalance pass touches, built once at startup and passed down
 * explicitly: policy, node adapter, storage, fee ledger, backoff table, and the
 * clock/sleep pair (swappable in tests).
 */

import type { RebalanceConfig } from "../config/env";
import type { Db } from "../db";
import type { RebalanceNode } from "../types/node";
import { parsePairKey } from "../types/rebalance";
import { releaseOutstandingAttempts } from "../api/rebalance-attempts";
import { FeeBudgetManager } from "../utils/fee-budget";
import { PairBackoff } from "../utils/pair-backoff";
import { sleep as timerSleep } from "../utils/timeout";

export type RebalanceContext = {
  config: RebalanceConfig;
  node: RebalanceNode;
  db: Db;
  budget: FeeBudgetManager;
  backoff: PairBackoff;
  clock: () => number;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export function createRebalanceContext(args: {
  config: RebalanceConfig;
  node: RebalanceNode;
  db: Db;
  clock?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}): RebalanceContext {
  const clock = args.clock ?? Date.now;
  const budget = new FeeBudgetManager(args.config, args.db, clock);
  const backoff = new PairBackoff(args.config, args.db, clock);

  const ledger = budget.load();
  const exclusions = backoff.load();

  if (args.config.debug) {
    console.log("[rebalancer] state loaded:", {
      epoch_start: new Date(ledger.epoch_start).toISOString(),
      fee_spent_sats: ledger.spent,
      exclusions,
    });
  }

  return {
    config: args.config,
    node: args.node,
    db: args.db,
    budget,
    backoff,
    clock,
    sleep: args.sleep ?? timerSleep,
  };
}

/** Writes the in-memory ledger and exclusion table back before exit. */
export function persistRebalanceState(ctx: RebalanceContext): void {
  ctx.budget.persist();
  ctx.backoff.persist();
}

/**
 * Manual reset of a pair: clears its exclusion and releases any attempt still
 * awaiting confirmation, so reconciling that attempt cannot exclude the pair
 * again. Returns false when there was nothing to reset.
 */
export function resetPair(ctx: RebalanceContext, key: string): boolean {
  const pair = parsePairKey(key);
  if (!pair) return false;

  const cleared = ctx.backoff.reset(key);
  const released = releaseOutstandingAttempts(
    ctx.db,
    pair.source_channel,
    pair.destination_channel,
    ctx.clock()
  );

  if (released > 0) {
    console.log(`[rebalancer] released ${released} unconfirmed attempt(s) for ${key}`);
  }
  return cleared || released > 0;
}
