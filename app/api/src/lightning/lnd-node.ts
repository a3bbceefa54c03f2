/**
 * RebalanceNode backed by LND through ln-service. A circular rebalance here is
 * an invoice on our own node paid along a route that leaves through the
 * source channel and comes back from the destination channel's peer.
 */

import type { Channel } from "../types/rebalance";
import {
  NO_ROUTE_REASON,
  type PaymentStatus,
  type RebalanceNode,
  type RouteEstimate,
  type RouteHints,
} from "../types/node";
import { NoRouteError, PaymentFailedError, toErrorMessage } from "../utils/errors";
import { ENV } from "../config/env";
import {
  cancelLndInvoice,
  createLndInvoice,
  getLndChannels,
  getLndFeeRates,
  getLndIdentity,
  getLndPayment,
  getLndRouteToDestination,
  subscribeLndPayViaRoutes,
  type LndRoute,
} from "./lnd";
import type { PaymentLookup } from "ln-service";

type OpenInvoice = {
  tokens: number;
  mtokens: string;
  payment: string;
};

/** ln-service rejects with `[code, message, details]`. */
function lndErrorCode(err: unknown): number | null {
  return Array.isArray(err) && typeof err[0] === "number" ? err[0] : null;
}

export class LndNode implements RebalanceNode {
  private publicKey: string | null = null;
  private readonly invoices = new Map<string, OpenInvoice>();

  /**
   * Resolves our own public key; every circular route ends there.
   * @throws when LND is unreachable or its credentials are missing
   */
  async connect(): Promise<string> {
    const { public_key } = await getLndIdentity();
    if (!public_key) {
      throw new Error("Could not get own node public key");
    }
    this.publicKey = public_key;
    return public_key;
  }

  private async self(): Promise<string> {
    return this.publicKey ?? this.connect();
  }

  async listChannels(): Promise<Channel[]> {
    const [{ channels }, feeRates] = await Promise.all([getLndChannels(), getLndFeeRates()]);
    const rateById = new Map(feeRates.channels.map((r): [string, number] => [r.id, r.fee_rate]));

    return channels.map((c) => ({
      id: c.id,
      partner_public_key: c.partner_public_key,
      capacity: c.capacity,
      local_balance: c.local_balance,
      remote_balance: c.remote_balance,
      is_active: c.is_active,
      last_rebalanced_at: null,
      fee_rate_ppm: rateById.get(c.id) ?? null,
    }));
  }

  async createInvoice(amount: number, description: string): Promise<string> {
    const invoice = await createLndInvoice(amount, description);
    this.invoices.set(invoice.id, {
      tokens: amount,
      mtokens: invoice.mtokens ?? String(amount * 1000),
      payment: invoice.payment ?? invoice.id,
    });
    return invoice.id;
  }

  async findRoute(hints: RouteHints, amount: number, maxFee: number): Promise<RouteEstimate | null> {
    const { route } = await getLndRouteToDestination({
      destination: await this.self(),
      tokens: amount,
      outgoing_channel: hints.outgoing_channel,
      incoming_peer: hints.incoming_peer,
      max_fee: maxFee,
    });
    if (!route) return null;
    return { fee: route.fee, hops: route.hops.length };
  }

  async payInvoice(invoiceId: string, maxFee: number, hints: RouteHints): Promise<string> {
    const invoice = this.invoices.get(invoiceId);
    if (!invoice) {
      throw new PaymentFailedError(`Unknown invoice ${invoiceId}`, "unknown_invoice");
    }

    let route: LndRoute | undefined;
    try {
      ({ route } = await getLndRouteToDestination({
        destination: await this.self(),
        tokens: invoice.tokens,
        outgoing_channel: hints.outgoing_channel,
        incoming_peer: hints.incoming_peer,
        max_fee: maxFee,
        payment: invoice.payment,
        total_mtokens: invoice.mtokens,
      }));
    } catch (err) {
      throw new PaymentFailedError(`Route lookup failed: ${toErrorMessage(err)}`, "route_lookup_failed");
    }

    if (!route) {
      throw new NoRouteError(
        `No route out through ${hints.outgoing_channel} and back from ${hints.incoming_peer}`
      );
    }

    const sub = subscribeLndPayViaRoutes(invoiceId, [route]);

    // the outcome is read back through getPaymentStatus; listeners only log
    sub.on("error", (err: unknown) => {
      console.warn(`[lnd] payment ${invoiceId} subscription error:`, toErrorMessage(err));
    });
    sub.on("failure", (failure: unknown) => {
      if (ENV.debug) console.log(`[lnd] payment ${invoiceId} failed:`, failure);
    });
    sub.on("success", () => {
      if (ENV.debug) console.log(`[lnd] payment ${invoiceId} settled`);
    });

    return invoiceId;
  }

  /** Payments are tracked by the invoice's payment hash, which is its id. */
  attemptIdFor(invoiceId: string): string | null {
    return invoiceId;
  }

  async getPaymentStatus(attemptId: string): Promise<PaymentStatus> {
    let lookup: PaymentLookup;
    try {
      lookup = await getLndPayment(attemptId);
    } catch (err) {
      // not yet known to the router right after submission
      if (lndErrorCode(err) === 404) return { state: "pending" };
      throw err;
    }

    if (lookup.is_confirmed) {
      this.invoices.delete(attemptId);
      return { state: "succeeded", fee: lookup.payment?.fee ?? 0 };
    }

    if (lookup.is_failed) {
      const failed = lookup.failed;
      let reason = "failed";
      if (failed?.is_route_not_found) reason = NO_ROUTE_REASON;
      else if (failed?.is_insufficient_balance) reason = "insufficient_balance";
      else if (failed?.is_pathfinding_timeout) reason = "pathfinding_timeout";
      else if (failed?.is_invalid_payment) reason = "invalid_payment";
      return { state: "failed", reason };
    }

    return { state: "pending" };
  }

  async cancelInvoice(invoiceId: string): Promise<void> {
    this.invoices.delete(invoiceId);
    await cancelLndInvoice(invoiceId);
  }
}
