// Type declarations for the parts of ln-service the rebalancer calls
declare module "ln-service" {
  import type { EventEmitter } from "events";

  // Opaque handle returned by authenticatedLndGrpc; only ever passed back in
  export type AuthenticatedLnd = object;

  export interface AuthenticatedLndGrpc {
    lnd: AuthenticatedLnd;
  }

  export function authenticatedLndGrpc(options: {
    cert: string;
    macaroon: string;
    socket: string;
  }): AuthenticatedLndGrpc;

  export interface Identity {
    public_key: string;
  }

  export function getIdentity(options: { lnd: AuthenticatedLnd }): Promise<Identity>;

  export interface Channel {
    id: string;
    partner_public_key: string;
    capacity: number;
    local_balance: number;
    remote_balance: number;
    is_active: boolean;
    is_private?: boolean;
  }

  export function getChannels(options: {
    lnd: AuthenticatedLnd;
    is_active?: boolean;
  }): Promise<{ channels: Channel[] }>;

  export interface ChannelFeeRate {
    base_fee: number;
    base_fee_mtokens: string;
    fee_rate: number;
    id: string;
    transaction_id: string;
    transaction_vout: number;
  }

  export function getFeeRates(options: { lnd: AuthenticatedLnd }): Promise<{ channels: ChannelFeeRate[] }>;

  export function createInvoice(options: {
    lnd: AuthenticatedLnd;
    tokens: number;
    description?: string;
    expires_at?: string;
  }): Promise<{
    id: string;
    request: string;
    tokens: number;
    mtokens?: string;
    payment?: string;
  }>;

  export function cancelHodlInvoice(options: {
    lnd: AuthenticatedLnd;
    id: string;
  }): Promise<void>;

  export interface RouteHop {
    channel: string;
    channel_capacity: number;
    fee: number;
    fee_mtokens: string;
    forward: number;
    forward_mtokens: string;
    public_key: string;
    timeout: number;
  }

  export interface Route {
    fee: number;
    fee_mtokens: string;
    hops: RouteHop[];
    mtokens: string;
    payment?: string;
    timeout: number;
    tokens: number;
    total_mtokens?: string;
  }

  export function getRouteToDestination(options: {
    lnd: AuthenticatedLnd;
    destination: string;
    tokens: number;
    outgoing_channel?: string;
    incoming_peer?: string;
    max_fee?: number;
    payment?: string;
    total_mtokens?: string;
  }): Promise<{ route?: Route }>;

  export function subscribeToPayViaRoutes(options: {
    lnd: AuthenticatedLnd;
    id: string;
    routes: Route[];
  }): EventEmitter;

  export interface PaymentLookup {
    failed?: {
      is_insufficient_balance: boolean;
      is_invalid_payment: boolean;
      is_pathfinding_timeout: boolean;
      is_route_not_found: boolean;
    };
    is_confirmed: boolean;
    is_failed: boolean;
    is_pending: boolean;
    payment?: {
      fee: number;
      fee_mtokens: string;
      id: string;
      tokens: number;
    };
  }

  export function getPayment(options: {
    lnd: AuthenticatedLnd;
    id: string;
  }): Promise<PaymentLookup>;
}
