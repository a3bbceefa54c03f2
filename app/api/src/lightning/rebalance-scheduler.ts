/**
 * Automated circular rebalance scheduler: at a fixed interval, reconciles any
 * unconfirmed payments, refreshes the channel set, and works through the
 * ranked candidates one attempt at a time. Never runs two attempts at once.
 */

import type { RebalanceContext } from "./context";
import { refreshChannels } from "./channel-monitor";
import { selectCandidates } from "./rebalance-candidates";
import { planRebalance, type RebalancePlan } from "./rebalance-planner";
import { RebalanceExecutor, type ExecutionResult } from "./rebalance-executor";
import { NO_ROUTE_REASON } from "../types/node";
import type { Channel } from "../types/rebalance";
import { ConnectivityError, NoBudgetError, NoRouteError } from "../utils/errors";
import type { PairRef } from "../utils/pair-backoff";

export type PassSummary = {
  started_at: number;
  finished_at: number;
  /** Set when the pass ended early because the node could not be reached. */
  aborted: string | null;
  reconciled: number;
  considered: number;
  succeeded: number;
  failed: number;
  deferred: number;
  ambiguous: number;
};

export class RebalanceScheduler {
  private readonly executor: RebalanceExecutor;
  private loopDone: Promise<void> | null = null;
  private stopping = false;
  private wake = new AbortController();
  private lastPass: PassSummary | null = null;

  constructor(private readonly ctx: RebalanceContext) {
    this.executor = new RebalanceExecutor(ctx);
  }

  get isRunning(): boolean {
    return this.loopDone !== null;
  }

  get lastSummary(): PassSummary | null {
    return this.lastPass;
  }

  start(): void {
    if (this.loopDone) return;
    this.stopping = false;
    this.wake = new AbortController();
    this.loopDone = this.loop();
  }

  /**
   * Stops after the attempt in progress (if any) has finished. Resolves once
   * the loop has exited.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    this.wake.abort();
    if (this.loopDone) {
      await this.loopDone;
      this.loopDone = null;
    }
  }

  private async loop(): Promise<void> {
    const { clock, sleep, config } = this.ctx;

    while (!this.stopping) {
      const started = clock();

      try {
        await this.runPass();
      } catch (e) {
        console.error("[rebalance-scheduler] pass failed:", e);
      }

      if (this.stopping) break;

      const elapsed = clock() - started;
      await sleep(Math.max(0, config.intervalMs - elapsed), this.wake.signal);
    }
  }

  async runPass(): Promise<PassSummary> {
    const { ctx } = this;
    const { config, budget, backoff, clock } = ctx;

    const summary: PassSummary = {
      started_at: clock(),
      finished_at: 0,
      aborted: null,
      reconciled: 0,
      considered: 0,
      succeeded: 0,
      failed: 0,
      deferred: 0,
      ambiguous: 0,
    };

    const done = () => {
      summary.finished_at = clock();
      this.lastPass = summary;
      if (config.debug || summary.considered > 0 || summary.aborted) {
        console.log("[rebalance-scheduler] pass complete:", summary);
      }
      return summary;
    };

    for (const result of await this.executor.reconcileOutstanding()) {
      this.applyOutcome(result);
      if (result.outcome !== "ambiguous") summary.reconciled++;
    }

    let channels: Channel[];
    try {
      channels = await refreshChannels(ctx);
    } catch (err) {
      if (!(err instanceof ConnectivityError)) throw err;
      console.warn("[rebalance-scheduler] node unreachable, skipping pass:", err.message);
      summary.aborted = err.message;
      return done();
    }

    const tried = new Set<string>();

    while (summary.considered < config.maxCandidatesPerPass && !this.stopping) {
      const candidate = selectCandidates(channels, config, backoff.excludedPairs()).find(
        (c) => !tried.has(c.pair_key)
      );
      if (!candidate) break;

      tried.add(candidate.pair_key);
      summary.considered++;

      const pair: PairRef = {
        source_channel: candidate.source.id,
        destination_channel: candidate.destination.id,
      };
      backoff.markAttempting(pair);

      let plan: RebalancePlan | null;
      try {
        plan = await planRebalance(ctx, candidate.source, candidate.destination);
      } catch (err) {
        if (err instanceof NoRouteError) {
          const entry = backoff.recordFailure(pair, NO_ROUTE_REASON);
          console.warn("[rebalance-scheduler] no route, cooling pair down:", {
            pair: candidate.pair_key,
            amount: candidate.amount,
            failures: entry.failures,
            expires_at: entry.expires_at,
            permanent: entry.permanent,
          });
          summary.failed++;
          continue;
        }
        if (err instanceof ConnectivityError) {
          backoff.release(pair);
          console.warn("[rebalance-scheduler] node unreachable while planning:", err.message);
          summary.aborted = err.message;
          break;
        }
        throw err;
      }

      if (!plan) {
        backoff.release(pair);
        continue;
      }

      let feeCeiling: number;
      try {
        feeCeiling = budget.authorize(plan.amount, plan.destination.fee_rate_ppm);
      } catch (err) {
        if (!(err instanceof NoBudgetError)) throw err;
        backoff.release(pair);
        summary.deferred++;
        console.log("[rebalance-scheduler] deferred:", {
          pair: plan.pair_key,
          amount: plan.amount,
          allowance: err.allowance,
          reason: err.message,
        });
        continue;
      }

      if (config.dryRun) {
        backoff.release(pair);
        summary.deferred++;
        console.log("[rebalance-scheduler][dry-run] would rebalance:", {
          outgoing_channel: plan.hints.outgoing_channel,
          incoming_channel: plan.hints.incoming_channel,
          tokens: plan.amount,
          max_fee_sats: feeCeiling,
          estimated_fee_sats: plan.estimated_fee,
        });
        continue;
      }

      const result = await this.executor.execute(plan, feeCeiling);
      this.applyOutcome(result);

      if (result.outcome === "succeeded") summary.succeeded++;
      else if (result.outcome === "ambiguous") summary.ambiguous++;
      else if (result.outcome === "aborted") summary.deferred++;
      else summary.failed++;

      // balances moved (or may have); re-read them before picking the next pair
      if (result.outcome === "succeeded" || result.outcome === "ambiguous") {
        try {
          channels = await refreshChannels(ctx);
        } catch (err) {
          if (!(err instanceof ConnectivityError)) throw err;
          summary.aborted = err.message;
          break;
        }
      }
    }

    return done();
  }

  private applyOutcome({ attempt, outcome }: ExecutionResult): void {
    const { backoff } = this.ctx;
    const pair: PairRef = {
      source_channel: attempt.source_channel,
      destination_channel: attempt.destination_channel,
    };

    switch (outcome) {
      case "succeeded":
        backoff.recordSuccess(pair);
        break;
      case "failed":
        backoff.recordFailure(pair, attempt.failure_reason ?? "failed");
        break;
      case "no_route":
        backoff.recordFailure(pair, NO_ROUTE_REASON);
        break;
      case "ambiguous":
        // a pair reset by hand stays eligible while its old payment is reconciled
        if (attempt.released_at == null) backoff.recordUnresolved(pair);
        break;
      case "aborted":
        backoff.release(pair);
        break;
    }
  }
}
