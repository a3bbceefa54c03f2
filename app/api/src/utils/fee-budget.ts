import type { Db } from "../db";
import type { RebalanceConfig } from "../config/env";
import type { FeeLedger } from "../types/rebalance";
import { loadFeeLedger, saveFeeLedger } from "../api/rebalance-fee-epoch";
import { NoBudgetError } from "./errors";

export type FeeBudgetConfig = Pick<
  RebalanceConfig,
  | "maxFeeSats"
  | "maxFeeRatePpm"
  | "epochBudgetSats"
  | "epochMs"
  | "minFeeSats"
  | "allowPartialBudget"
  | "earningsFeeSharePpm"
>;

export type FeeCapConfig = Pick<RebalanceConfig, "maxFeeSats" | "maxFeeRatePpm" | "earningsFeeSharePpm">;

export type FeeBudgetSnapshot = {
  epoch_start: number;
  epoch_end: number;
  spent: number;
  budget: number;
  remaining: number;
};

/**
 * Fee the per-attempt and rate caps allow for `amount`. With an earnings share
 * configured and a known destination fee rate, it is also held to that share
 * of what the destination earns forwarding `amount` back out.
 */
export function feeCapFor(
  amount: number,
  config: FeeCapConfig,
  destinationFeeRatePpm: number | null = null
): number {
  const byRate = Math.floor((amount * config.maxFeeRatePpm) / 1_000_000);
  const cap = Math.min(config.maxFeeSats, byRate);

  if (config.earningsFeeSharePpm == null || destinationFeeRatePpm == null) return cap;

  const earnings = (amount * destinationFeeRatePpm) / 1_000_000;
  return Math.min(cap, Math.floor((earnings * config.earningsFeeSharePpm) / 1_000_000));
}

/**
 * Authorizes rebalance fees against a per-attempt cap, a rate cap and a
 * cumulative per-epoch budget. Epochs are aligned to multiples of epochMs; the
 * spent counter resets when a new one starts. Every change is written through
 * to the database when one is attached.
 */
export class FeeBudgetManager {
  private ledger: FeeLedger;

  constructor(
    private readonly config: FeeBudgetConfig,
    private readonly db: Db | null,
    private readonly clock: () => number = Date.now
  ) {
    this.ledger = { epoch_start: this.epochStartAt(clock()), spent: 0 };
  }

  /** Restores the spent counter when the stored ledger belongs to the current epoch. */
  load(): FeeLedger {
    const stored = this.db ? loadFeeLedger(this.db) : null;
    const current = this.epochStartAt(this.clock());

    this.ledger =
      stored && stored.epoch_start === current
        ? { epoch_start: stored.epoch_start, spent: stored.spent }
        : { epoch_start: current, spent: 0 };

    return { ...this.ledger };
  }

  persist(): void {
    if (this.db) saveFeeLedger(this.db, this.ledger);
  }

  epochStartAt(now: number): number {
    return Math.floor(now / this.config.epochMs) * this.config.epochMs;
  }

  currentEpochStart(): number {
    this.rollover();
    return this.ledger.epoch_start;
  }

  remaining(): number {
    this.rollover();
    return Math.max(0, this.config.epochBudgetSats - this.ledger.spent);
  }

  /** Cap for `amount` ignoring the epoch budget; see feeCapFor. */
  capFor(amount: number, destinationFeeRatePpm: number | null = null): number {
    return feeCapFor(amount, this.config, destinationFeeRatePpm);
  }

  /** min(per-attempt cap, rate cap, earnings cap, remaining epoch budget) */
  allowanceFor(amount: number, destinationFeeRatePpm: number | null = null): number {
    return Math.min(this.capFor(amount, destinationFeeRatePpm), this.remaining());
  }

  /**
   * Returns the fee ceiling for an attempt moving `amount`.
   *
   * @throws NoBudgetError when the allowance is below the minimum viable fee, or
   *         (unless partial budgets are allowed) when the remaining epoch budget
   *         cannot cover the fee the caps call for.
   */
  authorize(amount: number, destinationFeeRatePpm: number | null = null): number {
    const cap = this.capFor(amount, destinationFeeRatePpm);
    const allowance = this.allowanceFor(amount, destinationFeeRatePpm);

    if (!this.config.allowPartialBudget && allowance < cap) {
      throw new NoBudgetError(
        `Epoch fee budget exhausted: ${this.remaining()} sats remaining < ${cap} sats needed for ${amount} sats. Deferring.`,
        allowance
      );
    }
    if (allowance < this.config.minFeeSats) {
      throw new NoBudgetError(
        `Fee allowance ${allowance} sats for ${amount} sats is below the minimum viable fee of ${this.config.minFeeSats} sats. Deferring.`,
        allowance
      );
    }

    return allowance;
  }

  /** Deducts the fee a succeeded payment actually paid. */
  recordSpend(fee: number): void {
    this.rollover();
    this.ledger.spent += Math.max(0, fee);
    if (this.ledger.spent > this.config.epochBudgetSats) {
      console.warn(
        `[fee-budget] spent ${this.ledger.spent} sats exceeds epoch budget ${this.config.epochBudgetSats} sats (node charged above the ceiling)`
      );
    }
    this.persist();
  }

  /** An unconfirmed payment may have cost up to its ceiling; count that until reconciled. */
  reserveAmbiguous(ceiling: number): void {
    this.rollover();
    this.ledger.spent += Math.max(0, ceiling);
    this.persist();
  }

  /**
   * Replaces a reserved ceiling with the confirmed fee (0 for a failed
   * payment). Only corrects the ledger of the epoch the attempt was reserved
   * in; returns false when that epoch has already closed.
   */
  settleAmbiguous(ceiling: number, actualFee: number, epochStart: number): boolean {
    this.rollover();
    if (epochStart !== this.ledger.epoch_start) return false;

    this.ledger.spent = Math.max(0, this.ledger.spent - ceiling + actualFee);
    this.persist();
    return true;
  }

  snapshot(): FeeBudgetSnapshot {
    this.rollover();
    return {
      epoch_start: this.ledger.epoch_start,
      epoch_end: this.ledger.epoch_start + this.config.epochMs,
      spent: this.ledger.spent,
      budget: this.config.epochBudgetSats,
      remaining: Math.max(0, this.config.epochBudgetSats - this.ledger.spent),
    };
  }

  private rollover(): void {
    const current = this.epochStartAt(this.clock());
    if (current !== this.ledger.epoch_start) {
      this.ledger = { epoch_start: current, spent: 0 };
      this.persist();
    }
  }
}
