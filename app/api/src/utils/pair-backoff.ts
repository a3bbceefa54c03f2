import type { Db } from "../db";
import type { RebalanceConfig } from "../config/env";
import { pairKey, type ExclusionEntry } from "../types/rebalance";
import { deleteExclusion, loadExclusions, saveExclusion } from "../api/rebalance-exclusions";

export type PairBackoffConfig = Pick<
  RebalanceConfig,
  "cooldownBaseMs" | "cooldownMaxMs" | "successCooldownMs" | "failureCap" | "failureCapCooldownMs"
>;

export type PairState = "idle" | "attempting" | "excluded";

export type PairRef = { source_channel: string; destination_channel: string };

/** Reason recorded when an attempt could not be confirmed terminal. */
export const AMBIGUOUS_REASON = "ambiguous";

/**
 * Per-pair failure history and cool-downs.
 *
 * idle → attempting on selection; a success returns to idle with a short
 * cool-down; a failure or missing route excludes the pair for
 * min(base · 2^failures, max) and, once failures reach the cap, permanently
 * (or for failureCapCooldownMs when configured). Expired cool-downs fall back
 * to idle on their own.
 */
export class PairBackoff {
  private readonly entries = new Map<string, ExclusionEntry>();
  private attempting: string | null = null;

  constructor(
    private readonly config: PairBackoffConfig,
    private readonly db: Db | null,
    private readonly clock: () => number = Date.now
  ) {}

  load(): number {
    this.entries.clear();
    if (this.db) {
      for (const entry of loadExclusions(this.db)) {
        this.entries.set(entry.pair_key, entry);
      }
    }
    return this.entries.size;
  }

  persist(): void {
    if (!this.db) return;
    for (const entry of this.entries.values()) {
      saveExclusion(this.db, entry);
    }
  }

  /** Cool-down after the n-th consecutive failure. */
  cooldownFor(failures: number): number {
    const raw = this.config.cooldownBaseMs * 2 ** failures;
    return Math.min(raw, this.config.cooldownMaxMs);
  }

  isExcluded(key: string, now: number = this.clock()): boolean {
    const entry = this.entries.get(key);
    if (!entry) return false;
    if (entry.permanent) return true;
    return entry.expires_at != null && entry.expires_at > now;
  }

  excludedPairs(now: number = this.clock()): Set<string> {
    const out = new Set<string>();
    for (const key of this.entries.keys()) {
      if (this.isExcluded(key, now)) out.add(key);
    }
    return out;
  }

  stateOf(key: string, now: number = this.clock()): PairState {
    if (this.attempting === key) return "attempting";
    return this.isExcluded(key, now) ? "excluded" : "idle";
  }

  get(key: string): ExclusionEntry | undefined {
    const entry = this.entries.get(key);
    return entry ? { ...entry } : undefined;
  }

  list(): ExclusionEntry[] {
    return [...this.entries.values()]
      .map((e) => ({ ...e }))
      .sort((a, b) => a.pair_key.localeCompare(b.pair_key));
  }

  markAttempting(pair: PairRef): void {
    this.attempting = pairKey(pair.source_channel, pair.destination_channel);
  }

  /** Back to idle without touching the failure history (deferred or skipped). */
  release(pair: PairRef): void {
    const key = pairKey(pair.source_channel, pair.destination_channel);
    if (this.attempting === key) this.attempting = null;
  }

  recordSuccess(pair: PairRef): ExclusionEntry {
    const now = this.clock();
    return this.store(pair, {
      failures: 0,
      expires_at: now + this.config.successCooldownMs,
      permanent: false,
      reason: null,
      updated_at: now,
    });
  }

  recordFailure(pair: PairRef, reason: string): ExclusionEntry {
    const now = this.clock();
    const key = pairKey(pair.source_channel, pair.destination_channel);
    const previous = this.entries.get(key);
    const failures = (previous?.failures ?? 0) + 1;

    if (failures >= this.config.failureCap) {
      const capCooldown = this.config.failureCapCooldownMs;
      if (capCooldown == null) {
        return this.store(pair, {
          failures,
          expires_at: null,
          permanent: true,
          reason,
          updated_at: now,
        });
      }
      return this.store(pair, {
        failures,
        expires_at: Math.max(previous?.expires_at ?? 0, now + capCooldown),
        permanent: false,
        reason,
        updated_at: now,
      });
    }

    return this.store(pair, {
      failures,
      expires_at: Math.max(previous?.expires_at ?? 0, now + this.cooldownFor(failures)),
      permanent: false,
      reason,
      updated_at: now,
    });
  }

  /** Excluded until the outstanding payment is reconciled or the pair is reset by hand. */
  recordUnresolved(pair: PairRef): ExclusionEntry {
    const now = this.clock();
    const previous = this.entries.get(pairKey(pair.source_channel, pair.destination_channel));
    return this.store(pair, {
      failures: previous?.failures ?? 0,
      expires_at: null,
      permanent: true,
      reason: AMBIGUOUS_REASON,
      updated_at: now,
    });
  }

  /** Manual reset: clears the failure history and any exclusion for the pair. */
  reset(key: string): boolean {
    const existed = this.entries.delete(key);
    if (this.db) deleteExclusion(this.db, key);
    return existed;
  }

  private store(
    pair: PairRef,
    fields: Omit<ExclusionEntry, "pair_key" | "source_channel" | "destination_channel">
  ): ExclusionEntry {
    const key = pairKey(pair.source_channel, pair.destination_channel);
    const entry: ExclusionEntry = {
      pair_key: key,
      source_channel: pair.source_channel,
      destination_channel: pair.destination_channel,
      ...fields,
    };

    this.entries.set(key, entry);
    if (this.attempting === key) this.attempting = null;
    if (this.db) saveExclusion(this.db, entry);

    return { ...entry };
  }
}
