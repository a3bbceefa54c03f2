/**
 * Circular rebalance execution: the node pays a self-addressed invoice out
 * through the plan's source channel and back in through its destination.
 *
 * Attempts move pending → in_flight → succeeded | failed, or end ambiguous
 * when the node never reports a terminal status. An ambiguous payment is only
 * ever re-queried, never resubmitted, so its fee cannot be paid twice.
 */

import {
  createRebalanceAttempt,
  getOutstandingAttempts,
  updateRebalanceAttempt,
} from "../api/rebalance-attempts";
import { NO_ROUTE_REASON, type PaymentStatus } from "../types/node";
import type { RebalanceAttempt } from "../types/rebalance";
import {
  AmbiguousOutcomeError,
  ConnectivityError,
  NoRouteError,
  PaymentFailedError,
  toErrorMessage,
} from "../utils/errors";
import { withTimeout } from "../utils/timeout";
import type { RebalanceContext } from "./context";
import type { RebalancePlan } from "./rebalance-planner";

export type ExecutionOutcome =
  | "succeeded"
  | "failed"
  | "no_route"
  // nothing reached the node; the pair is not penalized
  | "aborted"
  | "ambiguous";

export type ExecutionResult = {
  attempt: RebalanceAttempt;
  outcome: ExecutionOutcome;
};

type TerminalStatus = Exclude<PaymentStatus, { state: "pending" }>;

export class RebalanceExecutor {
  constructor(private readonly ctx: RebalanceContext) {}

  /**
   * Runs one attempt to a terminal state, or to an ambiguous one once
   * reconciliation is exhausted. Never throws for node-side problems; every
   * outcome is recorded on the returned attempt.
   */
  async execute(plan: RebalancePlan, feeCeiling: number): Promise<ExecutionResult> {
    const { node, db, budget, clock, config } = this.ctx;

    const attempt = createRebalanceAttempt(db, {
      source_channel: plan.source.id,
      destination_channel: plan.destination.id,
      amount: plan.amount,
      fee_ceiling: feeCeiling,
      epoch_start: budget.currentEpochStart(),
      created_at: clock(),
    });

    if (config.debug) {
      console.log("[rebalance-executor] starting attempt:", {
        id: attempt.id,
        pair: plan.pair_key,
        amount: plan.amount,
        fee_ceiling: feeCeiling,
        estimated_fee: plan.estimated_fee,
      });
    }

    let invoiceId: string;
    try {
      invoiceId = await withTimeout(
        node.createInvoice(plan.amount, `rebalance ${plan.source.id} -> ${plan.destination.id}`),
        config.nodeTimeoutMs,
        "createInvoice"
      );
    } catch (err) {
      return this.finish(attempt, "aborted", {
        status: "failed",
        failure_reason: `invoice_failed: ${toErrorMessage(err)}`,
      });
    }

    let paymentId: string;
    try {
      paymentId = await withTimeout(
        node.payInvoice(invoiceId, feeCeiling, plan.hints),
        config.nodeTimeoutMs,
        "payInvoice"
      );
    } catch (err) {
      if (err instanceof ConnectivityError) {
        // the request may have reached the node
        budget.reserveAmbiguous(feeCeiling);
        return this.submitUnconfirmed(attempt, invoiceId, err.message);
      }

      await this.cancelInvoice(invoiceId);

      if (err instanceof NoRouteError) {
        return this.finish(attempt, "no_route", {
          status: "failed",
          failure_reason: NO_ROUTE_REASON,
        });
      }
      const reason = err instanceof PaymentFailedError ? err.reason : toErrorMessage(err);
      return this.finish(attempt, "failed", { status: "failed", failure_reason: reason });
    }

    attempt.status = "in_flight";
    attempt.payment_id = paymentId;
    updateRebalanceAttempt(db, attempt);

    let status: TerminalStatus;
    try {
      status = await this.pollUntilTerminal(paymentId);
    } catch (err) {
      if (!(err instanceof AmbiguousOutcomeError)) throw err;

      budget.reserveAmbiguous(feeCeiling);
      attempt.status = "ambiguous";
      attempt.failure_reason = err.message;
      updateRebalanceAttempt(db, attempt);

      console.warn("[rebalance-executor] payment status unconfirmed, reconciling:", {
        id: attempt.id,
        pair: plan.pair_key,
        amount: plan.amount,
        fee_ceiling: feeCeiling,
        payment_id: paymentId,
      });

      const resolved = await this.reconcile(paymentId);
      if (resolved) {
        return this.settle(attempt, resolved, invoiceId, true);
      }

      return this.finish(attempt, "ambiguous", {
        status: "ambiguous",
        failure_reason: `unresolved after ${config.reconcileAttempts} reconciliation queries`,
      });
    }

    return this.settle(attempt, status, invoiceId, false);
  }

  /**
   * A submission that timed out. Without an attempt id nothing can be queried
   * and the ceiling stays reserved; with one, the attempt is reconciled like a
   * poll timeout.
   */
  private async submitUnconfirmed(
    attempt: RebalanceAttempt,
    invoiceId: string,
    message: string
  ): Promise<ExecutionResult> {
    const failure_reason = `submit_unconfirmed: ${message}`;
    const paymentId = this.ctx.node.attemptIdFor?.(invoiceId) ?? null;
    if (paymentId == null) {
      return this.finish(attempt, "ambiguous", { status: "ambiguous", failure_reason });
    }

    attempt.status = "ambiguous";
    attempt.payment_id = paymentId;
    attempt.failure_reason = failure_reason;
    updateRebalanceAttempt(this.ctx.db, attempt);

    const resolved = await this.reconcile(paymentId);
    if (resolved) {
      return this.settle(attempt, resolved, invoiceId, true);
    }
    return this.finish(attempt, "ambiguous", { status: "ambiguous", failure_reason });
  }

  /**
   * Queries every stored in-flight or ambiguous attempt once. Returns the
   * attempts that reached a terminal status, plus those still unconfirmed as
   * "ambiguous" so their pairs stay excluded.
   */
  async reconcileOutstanding(): Promise<ExecutionResult[]> {
    const { db, budget } = this.ctx;
    const results: ExecutionResult[] = [];

    for (const attempt of getOutstandingAttempts(db)) {
      if (attempt.payment_id == null) continue;

      if (attempt.status === "in_flight") {
        // left behind by a restart mid-payment; reserve its ceiling like any unconfirmed payment
        if (attempt.epoch_start === budget.currentEpochStart()) {
          budget.reserveAmbiguous(attempt.fee_ceiling);
        }
        attempt.status = "ambiguous";
        attempt.failure_reason = "interrupted while in flight";
        updateRebalanceAttempt(db, attempt);
      }

      const status = await this.queryStatus(attempt.payment_id);
      if (status && status.state !== "pending") {
        results.push(await this.settle(attempt, status, null, true));
      } else {
        results.push({ attempt, outcome: "ambiguous" });
      }
    }

    return results;
  }

  /**
   * Polls with growing delays until the node reports a terminal status.
   *
   * @throws AmbiguousOutcomeError when the poll deadline passes first
   */
  private async pollUntilTerminal(paymentId: string): Promise<TerminalStatus> {
    const { clock, sleep, config } = this.ctx;
    const deadline = clock() + config.paymentPollTimeoutMs;
    let delay = config.paymentPollIntervalMs;

    for (;;) {
      const status = await this.queryStatus(paymentId);
      if (status && status.state !== "pending") return status;

      const left = deadline - clock();
      if (left <= 0) {
        throw new AmbiguousOutcomeError(
          `no terminal status after ${config.paymentPollTimeoutMs}ms`,
          paymentId
        );
      }

      await sleep(Math.min(delay, left));
      delay = Math.min(delay * 2, config.paymentPollMaxIntervalMs);
    }
  }

  /** Status queries only; the payment is never resubmitted. */
  private async reconcile(paymentId: string): Promise<TerminalStatus | null> {
    const { sleep, config } = this.ctx;

    for (let i = 0; i < config.reconcileAttempts; i++) {
      await sleep(config.reconcileIntervalMs);
      const status = await this.queryStatus(paymentId);
      if (status && status.state !== "pending") return status;
    }

    return null;
  }

  /** One status query; a failed or timed-out query counts as "no answer yet". */
  private async queryStatus(paymentId: string): Promise<PaymentStatus | null> {
    try {
      return await withTimeout(
        this.ctx.node.getPaymentStatus(paymentId),
        this.ctx.config.nodeTimeoutMs,
        "getPaymentStatus"
      );
    } catch (err) {
      if (this.ctx.config.debug) {
        console.warn(`[rebalance-executor] status query for ${paymentId} failed:`, toErrorMessage(err));
      }
      return null;
    }
  }

  /**
   * Applies a terminal status to the attempt and the fee ledger. `reserved`
   * means the ceiling was already deducted and must be corrected instead.
   */
  private async settle(
    attempt: RebalanceAttempt,
    status: TerminalStatus,
    invoiceId: string | null,
    reserved: boolean
  ): Promise<ExecutionResult> {
    const { budget } = this.ctx;

    if (status.state === "succeeded") {
      if (reserved) {
        budget.settleAmbiguous(attempt.fee_ceiling, status.fee, attempt.epoch_start);
      } else {
        budget.recordSpend(status.fee);
      }
      return this.finish(attempt, "succeeded", {
        status: "succeeded",
        fee_paid: status.fee,
        failure_reason: null,
      });
    }

    if (reserved) {
      budget.settleAmbiguous(attempt.fee_ceiling, 0, attempt.epoch_start);
    }
    if (invoiceId) await this.cancelInvoice(invoiceId);

    return this.finish(attempt, status.reason === NO_ROUTE_REASON ? "no_route" : "failed", {
      status: "failed",
      fee_paid: 0,
      failure_reason: status.reason,
    });
  }

  private async cancelInvoice(invoiceId: string): Promise<void> {
    try {
      await withTimeout(
        this.ctx.node.cancelInvoice(invoiceId),
        this.ctx.config.nodeTimeoutMs,
        "cancelInvoice"
      );
    } catch (err) {
      console.warn(`[rebalance-executor] could not cancel invoice ${invoiceId}:`, toErrorMessage(err));
    }
  }

  private finish(
    attempt: RebalanceAttempt,
    outcome: ExecutionOutcome,
    patch: Partial<Pick<RebalanceAttempt, "status" | "fee_paid" | "failure_reason">>
  ): ExecutionResult {
    Object.assign(attempt, patch);
    attempt.resolved_at = attempt.status === "ambiguous" ? null : this.ctx.clock();
    updateRebalanceAttempt(this.ctx.db, attempt);

    const context = {
      id: attempt.id,
      pair: `${attempt.source_channel}>${attempt.destination_channel}`,
      amount: attempt.amount,
      fee_ceiling: attempt.fee_ceiling,
      fee_paid: attempt.fee_paid,
      reason: attempt.failure_reason,
    };

    if (outcome === "succeeded") {
      console.log("[rebalance-executor] rebalance succeeded:", context);
    } else if (outcome === "ambiguous") {
      console.warn("[rebalance-executor] payment outcome unresolved, pair excluded pending reconciliation:", context);
    } else {
      console.warn(`[rebalance-executor] rebalance ${outcome}:`, context);
    }

    return { attempt, outcome };
  }
}
