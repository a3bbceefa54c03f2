// LND (Lightning Network Daemon) client integration
import {
  authenticatedLndGrpc,
  getIdentity,
  getChannels,
  getFeeRates,
  createInvoice,
  cancelHodlInvoice,
  getRouteToDestination,
  subscribeToPayViaRoutes,
  getPayment,
} from "ln-service";
import fs from "fs";
import path from "path";
import { ENV } from "../config/env";

export function lndPaths(lndDir: string = ENV.lndDir, network: string = ENV.bitcoinNetwork) {
  return {
    cert: path.join(lndDir, "tls.cert"),
    macaroon: path.join(lndDir, "data", "chain", "bitcoin", network, "admin.macaroon"),
  };
}

let lndClient: ReturnType<typeof authenticatedLndGrpc> | null = null;

/**
 * Checks if LND files are available (TLS cert and admin macaroon)
 * @returns true if both files exist, false otherwise
 */
export function isLndAvailable(): boolean {
  const paths = lndPaths();
  return fs.existsSync(paths.cert) && fs.existsSync(paths.macaroon);
}

/**
 * Initializes the LND client if files are available
 * @throws Error if LND files are missing or client initialization fails
 */
export function getLndClient() {
  if (lndClient) {
    return lndClient;
  }

  if (!isLndAvailable()) {
    throw new Error(`LND files not available under ${ENV.lndDir}: missing TLS cert or admin macaroon`);
  }

  const paths = lndPaths();

  try {
    const cert = fs.readFileSync(paths.cert).toString("base64");
    const macaroon = fs.readFileSync(paths.macaroon).toString("base64");

    lndClient = authenticatedLndGrpc({
      cert,
      macaroon,
      socket: ENV.lndGrpcHost,
    });

    return lndClient;
  } catch (err) {
    throw new Error(`Failed to initialize LND client: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Gets our node's public key (destination of every circular rebalance).
 */
export async function getLndIdentity() {
  const { lnd } = getLndClient();
  return getIdentity({ lnd });
}

/**
 * Lists open LND channels (read-only)
 */
export async function getLndChannels() {
  const { lnd } = getLndClient();
  return getChannels({ lnd });
}

/**
 * Our outgoing fee policy per channel (fee_rate in ppm)
 */
export async function getLndFeeRates() {
  const { lnd } = getLndClient();
  return getFeeRates({ lnd });
}

/**
 * Creates an invoice on our own node for a self-pay rebalance.
 */
export async function createLndInvoice(tokens: number, description: string) {
  const { lnd } = getLndClient();
  return createInvoice({ lnd, tokens, description });
}

/**
 * Cancels an open invoice so a failed rebalance leaves nothing payable behind.
 */
export async function cancelLndInvoice(id: string) {
  const { lnd } = getLndClient();
  return cancelHodlInvoice({ lnd, id });
}

/**
 * Gets a route to a destination with optional outgoing channel and incoming peer (for circular rebalance).
 */
export async function getLndRouteToDestination(options: {
  destination: string;
  tokens: number;
  outgoing_channel?: string;
  incoming_peer?: string;
  max_fee?: number;
  payment?: string;
  total_mtokens?: string;
}) {
  const { lnd } = getLndClient();
  return getRouteToDestination({ lnd, ...options });
}

export type LndRoute = NonNullable<Awaited<ReturnType<typeof getLndRouteToDestination>>["route"]>;

/**
 * Starts paying via a pre-built route and returns the subscription without
 * waiting for the payment to settle.
 */
export function subscribeLndPayViaRoutes(id: string, routes: LndRoute[]) {
  const { lnd } = getLndClient();
  return subscribeToPayViaRoutes({ lnd, id, routes });
}

/**
 * Looks up an outgoing payment by hash.
 */
export async function getLndPayment(id: string) {
  const { lnd } = getLndClient();
  return getPayment({ lnd, id });
}
