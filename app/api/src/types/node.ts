import type { Channel } from "./rebalance";

/** Channel-scoped constraints for a self-payment; the node picks the hops in between. */
export interface RouteHints {
  outgoing_channel: string;
  incoming_channel: string;
  incoming_peer: string;
}

export interface RouteEstimate {
  fee: number;
  hops: number;
}

export type PaymentStatus =
  | { state: "pending" }
  | { state: "succeeded"; fee: number }
  | { state: "failed"; reason: string };

/** Failure reason a node reports when pathfinding found nothing for the hints. */
export const NO_ROUTE_REASON = "no_route";

/**
 * What the rebalancer needs from a Lightning node. Any implementation of these
 * calls can drive the engine; LndNode is the ln-service one.
 */
export interface RebalanceNode {
  listChannels(): Promise<Channel[]>;
  createInvoice(amount: number, description: string): Promise<string>;
  /**
   * Submits the payment and returns without waiting for it to settle.
   * Rejects with NoRouteError when no path matches the hints.
   */
  payInvoice(invoiceId: string, maxFee: number, hints: RouteHints): Promise<string>;
  getPaymentStatus(attemptId: string): Promise<PaymentStatus>;
  /**
   * Attempt id a payment of `invoiceId` will carry, for nodes that can tell
   * without a reply from payInvoice. Lets a submission that timed out still be
   * reconciled.
   */
  attemptIdFor?(invoiceId: string): string | null;
  /** Pathfinding probe; null when the node has no route for the hints. */
  findRoute(hints: RouteHints, amount: number, maxFee: number): Promise<RouteEstimate | null>;
  cancelInvoice(invoiceId: string): Promise<void>;
}
