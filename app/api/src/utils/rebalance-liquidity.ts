/**
 * Liquidity snapshot of a channel against the target local-balance band.
 * A channel above the band's high edge can donate outbound liquidity; one below
 * the low edge needs it.
 */

import type { Channel } from "../types/rebalance";

export type TargetBand = {
  lowPpm: number;
  highPpm: number;
};

export type ChannelLiquiditySnapshot = {
  id: string;
  capacity: number;
  is_active: boolean;

  local_balance: number;
  remote_balance: number;

  local_ratio_ppm: number;

  /** Sats of local balance above the band's high edge (negative when below it). */
  surplus_sats: number;
  /** Sats of local balance missing below the band's low edge (negative when above it). */
  deficit_sats: number;

  is_source: boolean;
  is_destination: boolean;
};

/** Build a liquidity snapshot of a channel relative to the band. */
export function snapshotChannelLiquidity(ch: Channel, band: TargetBand): ChannelLiquiditySnapshot {
  const capacity = ch.capacity;
  const local = ch.local_balance;

  const highSats = (band.highPpm * capacity) / 1_000_000;
  const lowSats = (band.lowPpm * capacity) / 1_000_000;

  return {
    id: ch.id,
    capacity,
    is_active: ch.is_active,
    local_balance: local,
    remote_balance: ch.remote_balance,
    local_ratio_ppm: capacity > 0 ? Math.floor((local * 1_000_000) / capacity) : 0,
    surplus_sats: local - highSats,
    deficit_sats: lowSats - local,
    // compared in integer space so a ratio sitting exactly on an edge is inside the band
    is_source: capacity > 0 && local * 1_000_000 > band.highPpm * capacity,
    is_destination: capacity > 0 && local * 1_000_000 < band.lowPpm * capacity,
  };
}

/** Combined deficiency of a pair: surplus of the donor plus deficit of the receiver. */
export function pairDeficiency(
  source: ChannelLiquiditySnapshot,
  destination: ChannelLiquiditySnapshot
): number {
  return Math.max(0, source.surplus_sats) + Math.max(0, destination.deficit_sats);
}
