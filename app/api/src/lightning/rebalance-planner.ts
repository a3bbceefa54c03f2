/**
 * Sizes a rebalance for a selected pair and pins its first and last hops.
 * The node's pathfinder fills in everything between.
 */

import type { RebalanceConfig } from "../config/env";
import type { Channel } from "../types/rebalance";
import { pairKey } from "../types/rebalance";
import type { RebalanceNode, RouteEstimate, RouteHints } from "../types/node";
import { ConnectivityError, NoRouteError, toErrorMessage } from "../utils/errors";
import { withTimeout } from "../utils/timeout";
import { feeCapFor } from "../utils/fee-budget";

export type AmountConfig = Pick<
  RebalanceConfig,
  "maxAmount" | "minAmount" | "reserveSats" | "targetLowRatioPpm" | "targetHighRatioPpm"
>;

export type RebalancePlan = {
  pair_key: string;
  source: Channel;
  destination: Channel;
  amount: number;
  hints: RouteHints;
  /** Fee of the route the node found for the probe. */
  estimated_fee: number;
};

/**
 * Amount to move from `source` to `destination`:
 * min(source local above the high edge, destination remote above the low
 * edge, maxAmount), each side less the reserve. Returns null when that is
 * below minAmount; the pair is then skipped for this pass.
 */
export function computeRebalanceAmount(
  source: Channel,
  destination: Channel,
  config: AmountConfig
): number | null {
  const sourceRoom =
    source.local_balance -
    (config.targetHighRatioPpm * source.capacity) / 1_000_000 -
    config.reserveSats;
  const destinationRoom =
    destination.remote_balance -
    (config.targetLowRatioPpm * destination.capacity) / 1_000_000 -
    config.reserveSats;

  const amount = Math.floor(Math.min(sourceRoom, destinationRoom, config.maxAmount));

  if (!Number.isFinite(amount) || amount < config.minAmount) return null;
  return amount;
}

export function routeHintsFor(source: Channel, destination: Channel): RouteHints {
  return {
    outgoing_channel: source.id,
    incoming_channel: destination.id,
    incoming_peer: destination.partner_public_key,
  };
}

/**
 * Builds the plan and asks the node for a route under the same fee cap the
 * budget will authorize (flat, rate and earnings caps). Returns null when the
 * amount or that cap is not viable.
 *
 * @throws NoRouteError when the node reports no path for the hints
 * @throws ConnectivityError when the probe fails or times out
 */
export async function planRebalance(
  ctx: { node: RebalanceNode; config: RebalanceConfig },
  source: Channel,
  destination: Channel
): Promise<RebalancePlan | null> {
  const amount = computeRebalanceAmount(source, destination, ctx.config);
  if (amount == null) return null;

  const maxFee = feeCapFor(amount, ctx.config, destination.fee_rate_ppm);
  if (maxFee < ctx.config.minFeeSats) {
    if (ctx.config.debug) {
      console.log(`[rebalance-planner] skipping ${pairKey(source.id, destination.id)}: fee cap ${maxFee} sats below minimum`);
    }
    return null;
  }

  const hints = routeHintsFor(source, destination);

  let estimate: RouteEstimate | null;
  try {
    estimate = await withTimeout(
      ctx.node.findRoute(hints, amount, maxFee),
      ctx.config.nodeTimeoutMs,
      "findRoute"
    );
  } catch (err) {
    if (err instanceof NoRouteError || err instanceof ConnectivityError) throw err;
    throw new ConnectivityError(`findRoute failed: ${toErrorMessage(err)}`, err);
  }

  if (!estimate) {
    throw new NoRouteError(
      `No route for ${amount} sats from ${source.id} back in through ${destination.id}`
    );
  }

  return {
    pair_key: pairKey(source.id, destination.id),
    source,
    destination,
    amount,
    hints,
    estimated_fee: estimate.fee,
  };
}
