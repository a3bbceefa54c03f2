/**
 * Candidate selection for circular rebalance: pairs every donor channel (local
 * ratio above the band) with every receiver (local ratio below it) and ranks
 * the pairs by how far out of band they are.
 */

import type { RebalanceConfig } from "../config/env";
import { pairKey, type Channel } from "../types/rebalance";
import {
  snapshotChannelLiquidity,
  pairDeficiency,
  type TargetBand,
} from "../utils/rebalance-liquidity";
import { computeRebalanceAmount, type AmountConfig } from "./rebalance-planner";

export type SelectorConfig = AmountConfig &
  Pick<RebalanceConfig, "includedPeers" | "excludedPeers" | "allowSamePeer">;

export type RebalanceCandidate = {
  pair_key: string;
  source: Channel;
  destination: Channel;
  amount: number;
  /** Sats the source sits above the band plus sats the destination sits below it. */
  deficiency: number;
};

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function peerAllowed(peer: string, config: SelectorConfig): boolean {
  if (config.excludedPeers.includes(peer)) return false;
  if (config.includedPeers.length && !config.includedPeers.includes(peer)) return false;
  return true;
}

/**
 * Ordered (source, destination) pairs worth rebalancing:
 * - both channels active and their peers allowed by the include/exclude lists
 * - source local ratio above the high edge, destination below the low edge
 * - different channels, and different peers unless allowSamePeer
 * - pair not in `excluded` (cooling down pairs are dropped, not down-ranked)
 * - a viable amount (computeRebalanceAmount is not null)
 *
 * Sorted by deficiency (largest first), then source id, then destination id,
 * so identical inputs always give the same order.
 */
export function selectCandidates(
  channels: Channel[],
  config: SelectorConfig,
  excluded: ReadonlySet<string>
): RebalanceCandidate[] {
  const band: TargetBand = {
    lowPpm: config.targetLowRatioPpm,
    highPpm: config.targetHighRatioPpm,
  };

  const usable = channels
    .filter((c) => c.is_active)
    .filter((c) => peerAllowed(c.partner_public_key, config))
    .map((c) => ({ ch: c, snap: snapshotChannelLiquidity(c, band) }));

  const sources = usable.filter((x) => x.snap.is_source);
  const destinations = usable.filter((x) => x.snap.is_destination);

  const candidates: RebalanceCandidate[] = [];

  for (const out of sources) {
    for (const inc of destinations) {
      if (out.ch.id === inc.ch.id) continue;
      if (!config.allowSamePeer && out.ch.partner_public_key === inc.ch.partner_public_key) {
        continue;
      }

      const key = pairKey(out.ch.id, inc.ch.id);
      if (excluded.has(key)) continue;

      const amount = computeRebalanceAmount(out.ch, inc.ch, config);
      if (amount == null) continue;

      candidates.push({
        pair_key: key,
        source: out.ch,
        destination: inc.ch,
        amount,
        deficiency: pairDeficiency(out.snap, inc.snap),
      });
    }
  }

  return candidates.sort(
    (a, b) =>
      b.deficiency - a.deficiency ||
      compareIds(a.source.id, b.source.id) ||
      compareIds(a.destination.id, b.destination.id)
  );
}
