import { describe, it, expect, vi, beforeEach } from "vitest";
import { EventEmitter } from "events";
import type { PaymentLookup } from "ln-service";
import { LndNode } from "./lnd-node";
import * as lnd from "./lnd";
import type { LndRoute } from "./lnd";
import { NoRouteError, PaymentFailedError } from "../utils/errors";

vi.mock("./lnd", () => ({
  getLndIdentity: vi.fn(),
  getLndChannels: vi.fn(),
  getLndFeeRates: vi.fn(),
  createLndInvoice: vi.fn(),
  cancelLndInvoice: vi.fn(),
  getLndRouteToDestination: vi.fn(),
  subscribeLndPayViaRoutes: vi.fn(),
  getLndPayment: vi.fn(),
}));

const SELF = "02self";
const hints = { outgoing_channel: "100x1x0", incoming_channel: "200x1x0", incoming_peer: "03peer" };

const route: LndRoute = {
  fee: 3,
  fee_mtokens: "3000",
  hops: [],
  mtokens: "100003000",
  timeout: 800_000,
  tokens: 100_003,
};

function lookup(overrides: Partial<PaymentLookup>): PaymentLookup {
  return { is_confirmed: false, is_failed: false, is_pending: true, ...overrides };
}

describe("LndNode", () => {
  beforeEach(() => {
    vi.resetAllMocks();
    vi.mocked(lnd.getLndIdentity).mockResolvedValue({ public_key: SELF });
    vi.mocked(lnd.createLndInvoice).mockResolvedValue({
      id: "hash-1",
      request: "lnbcrt1test",
      tokens: 100_000,
      mtokens: "100000000",
      payment: "secret-1",
    });
  });

  it("should map channels with our fee rate and leave last_rebalanced_at empty", async () => {
    vi.mocked(lnd.getLndChannels).mockResolvedValue({
      channels: [
        {
          id: "100x1x0",
          partner_public_key: "03peer",
          capacity: 1_000_000,
          local_balance: 700_000,
          remote_balance: 290_000,
          is_active: true,
          is_private: false,
        },
        {
          id: "300x1x0",
          partner_public_key: "03other",
          capacity: 500_000,
          local_balance: 100_000,
          remote_balance: 390_000,
          is_active: false,
        },
      ],
    });
    vi.mocked(lnd.getLndFeeRates).mockResolvedValue({
      channels: [
        {
          base_fee: 1,
          base_fee_mtokens: "1000",
          fee_rate: 250,
          id: "100x1x0",
          transaction_id: "aa".repeat(32),
          transaction_vout: 0,
        },
      ],
    });

    expect(await new LndNode().listChannels()).toEqual([
      {
        id: "100x1x0",
        partner_public_key: "03peer",
        capacity: 1_000_000,
        local_balance: 700_000,
        remote_balance: 290_000,
        is_active: true,
        last_rebalanced_at: null,
        fee_rate_ppm: 250,
      },
      {
        id: "300x1x0",
        partner_public_key: "03other",
        capacity: 500_000,
        local_balance: 100_000,
        remote_balance: 390_000,
        is_active: false,
        last_rebalanced_at: null,
        fee_rate_ppm: null,
      },
    ]);
  });

  it("should use the payment hash of an invoice as its attempt id", async () => {
    const node = new LndNode();
    const id = await node.createInvoice(100_000, "rebalance");
    expect(node.attemptIdFor(id)).toBe("hash-1");
  });

  it("should probe a route back to our own key", async () => {
    vi.mocked(lnd.getLndRouteToDestination).mockResolvedValue({ route });
    const node = new LndNode();

    expect(await node.findRoute(hints, 100_000, 50)).toEqual({ fee: 3, hops: 0 });
    expect(lnd.getLndRouteToDestination).toHaveBeenCalledWith({
      destination: SELF,
      tokens: 100_000,
      outgoing_channel: "100x1x0",
      incoming_peer: "03peer",
      max_fee: 50,
    });
  });

  it("should return null from the probe when there is no route", async () => {
    vi.mocked(lnd.getLndRouteToDestination).mockResolvedValue({});
    expect(await new LndNode().findRoute(hints, 100_000, 50)).toBeNull();
  });

  it("should submit the invoice along a route and return its hash", async () => {
    const emitter = new EventEmitter();
    vi.mocked(lnd.getLndRouteToDestination).mockResolvedValue({ route });
    vi.mocked(lnd.subscribeLndPayViaRoutes).mockReturnValue(emitter);

    const node = new LndNode();
    const id = await node.createInvoice(100_000, "rebalance 100x1x0 -> 200x1x0");

    expect(await node.payInvoice(id, 50, hints)).toBe("hash-1");
    expect(lnd.getLndRouteToDestination).toHaveBeenCalledWith({
      destination: SELF,
      tokens: 100_000,
      outgoing_channel: "100x1x0",
      incoming_peer: "03peer",
      max_fee: 50,
      payment: "secret-1",
      total_mtokens: "100000000",
    });
    expect(lnd.subscribeLndPayViaRoutes).toHaveBeenCalledWith("hash-1", [route]);
    expect(emitter.listenerCount("error")).toBe(1);
  });

  it("should throw NoRouteError when no route fits the hints", async () => {
    vi.mocked(lnd.getLndRouteToDestination).mockResolvedValue({});
    const node = new LndNode();
    const id = await node.createInvoice(100_000, "rebalance");

    await expect(node.payInvoice(id, 50, hints)).rejects.toThrow(NoRouteError);
    expect(lnd.subscribeLndPayViaRoutes).not.toHaveBeenCalled();
  });

  it("should refuse to pay an invoice it did not create", async () => {
    await expect(new LndNode().payInvoice("hash-9", 50, hints)).rejects.toThrow(PaymentFailedError);
  });

  describe("getPaymentStatus", () => {
    it("should report a confirmed payment with its fee", async () => {
      vi.mocked(lnd.getLndPayment).mockResolvedValue(
        lookup({
          is_confirmed: true,
          is_pending: false,
          payment: { fee: 7, fee_mtokens: "7000", id: "hash-1", tokens: 100_000 },
        })
      );
      expect(await new LndNode().getPaymentStatus("hash-1")).toEqual({ state: "succeeded", fee: 7 });
    });

    it("should map a pathfinding failure to no_route", async () => {
      vi.mocked(lnd.getLndPayment).mockResolvedValue(
        lookup({
          is_failed: true,
          is_pending: false,
          failed: {
            is_insufficient_balance: false,
            is_invalid_payment: false,
            is_pathfinding_timeout: false,
            is_route_not_found: true,
          },
        })
      );
      expect(await new LndNode().getPaymentStatus("hash-1")).toEqual({ state: "failed", reason: "no_route" });
    });

    it("should treat a payment the router does not know yet as pending", async () => {
      vi.mocked(lnd.getLndPayment).mockRejectedValue([404, "SentPaymentNotFound"]);
      expect(await new LndNode().getPaymentStatus("hash-1")).toEqual({ state: "pending" });
    });

    it("should pass other errors through", async () => {
      vi.mocked(lnd.getLndPayment).mockRejectedValue([503, "UnexpectedError"]);
      await expect(new LndNode().getPaymentStatus("hash-1")).rejects.toEqual([503, "UnexpectedError"]);
    });
  });
});
