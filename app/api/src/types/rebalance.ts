export interface Channel {
  id: string;
  partner_public_key: string;
  capacity: number;
  local_balance: number;
  remote_balance: number;
  is_active: boolean;
  last_rebalanced_at: number | null;
  /** Our outgoing fee rate on the channel (ppm); null when the node does not report one. */
  fee_rate_ppm: number | null;
}

export type RebalanceAttemptStatus =
  | "pending"
  | "in_flight"
  | "succeeded"
  | "failed"
  | "ambiguous";

export type RebalanceAttempt = {
  id: number;
  source_channel: string;
  destination_channel: string;
  amount: number;
  fee_ceiling: number;
  status: RebalanceAttemptStatus;
  payment_id: string | null;
  fee_paid: number | null;
  failure_reason: string | null;
  epoch_start: number;
  created_at: number;
  resolved_at: number | null;
  /** Set when the pair was reset by hand while this attempt was still unconfirmed. */
  released_at: number | null;
};

export type ExclusionEntry = {
  pair_key: string;
  source_channel: string;
  destination_channel: string;
  failures: number;
  /** null while permanent */
  expires_at: number | null;
  permanent: boolean;
  reason: string | null;
  updated_at: number;
};

export type FeeLedger = {
  epoch_start: number;
  spent: number;
};

/** Directional key: value leaves through `source` and returns through `destination`. */
export function pairKey(sourceChannel: string, destinationChannel: string): string {
  return `${sourceChannel}>${destinationChannel}`;
}

/** Inverse of pairKey; null for anything that is not a `source>destination` key. */
export function parsePairKey(key: string): { source_channel: string; destination_channel: string } | null {
  const parts = key.split(">");
  if (parts.length !== 2 || !parts[0] || !parts[1]) return null;
  return { source_channel: parts[0], destination_channel: parts[1] };
}
