import type { RebalanceConfig } from "../config/env";
import type { Db } from "../db";
import type { RebalanceNode } from "../types/node";
import type { Channel } from "../types/rebalance";
import { getLastRebalancedAt } from "../api/rebalance-attempts";
import { ConnectivityError, toErrorMessage } from "../utils/errors";
import { withTimeout } from "../utils/timeout";

const clamp0 = (n: number) => (Number.isFinite(n) && n > 0 ? n : 0);

/**
 * Clamps negative or missing amounts to zero. Returns null for a channel whose
 * balances add up to more than its capacity.
 */
export function normalizeChannel(ch: Channel): Channel | null {
  const capacity = clamp0(ch.capacity);
  const local = clamp0(ch.local_balance);
  const remote = clamp0(ch.remote_balance);

  if (local + remote > capacity) {
    console.warn(
      `[channel-monitor] dropping ${ch.id}: local ${local} + remote ${remote} > capacity ${capacity}`
    );
    return null;
  }

  return {
    id: String(ch.id),
    partner_public_key: String(ch.partner_public_key),
    capacity,
    local_balance: local,
    remote_balance: remote,
    is_active: !!ch.is_active,
    last_rebalanced_at: ch.last_rebalanced_at ?? null,
    fee_rate_ppm:
      ch.fee_rate_ppm != null && Number.isFinite(ch.fee_rate_ppm) && ch.fee_rate_ppm >= 0
        ? ch.fee_rate_ppm
        : null,
  };
}

/**
 * Fetches the node's channel set and normalizes it, filling in
 * last_rebalanced_at from the attempt history.
 *
 * @throws ConnectivityError when the node is unreachable or the call times out;
 *         the caller aborts the pass and nothing is modified.
 */
export async function refreshChannels(ctx: {
  node: RebalanceNode;
  config: RebalanceConfig;
  db: Db;
}): Promise<Channel[]> {
  let raw: Channel[];
  try {
    raw = await withTimeout(ctx.node.listChannels(), ctx.config.nodeTimeoutMs, "listChannels");
  } catch (err) {
    if (err instanceof ConnectivityError) throw err;
    throw new ConnectivityError(`listChannels failed: ${toErrorMessage(err)}`, err);
  }

  const lastRebalanced = getLastRebalancedAt(ctx.db);
  const channels: Channel[] = [];

  for (const ch of raw) {
    const normalized = normalizeChannel(ch);
    if (!normalized) continue;
    normalized.last_rebalanced_at =
      normalized.last_rebalanced_at ?? lastRebalanced.get(normalized.id) ?? null;
    channels.push(normalized);
  }

  if (ctx.config.debug) {
    console.log(`[channel-monitor] ${channels.length}/${raw.length} channels usable`);
  }

  return channels;
}
