import { describe, it, expect } from "vitest";
import { computeRebalanceAmount, planRebalance, routeHintsFor } from "./rebalance-planner";
import { ConnectivityError, NoRouteError } from "../utils/errors";
import { FakeNode } from "../testing/fake-node";
import { channel, testConfig } from "../testing/fixtures";

const source = channel("100x1x0", "peer-a", 1_000_000, 900_000);
const destination = channel("200x1x0", "peer-b", 1_000_000, 100_000);

describe("rebalance-planner", () => {
  describe("computeRebalanceAmount", () => {
    it("should take the smaller of source surplus and destination room", () => {
      // min(900k - 600k, 900k - 400k, 500k)
      expect(computeRebalanceAmount(source, destination, testConfig({ reserveSats: 0 }))).toBe(300_000);
    });

    it("should hold back the reserve on both sides", () => {
      expect(computeRebalanceAmount(source, destination, testConfig({ reserveSats: 1000 }))).toBe(299_000);
    });

    it("should respect the per-attempt cap", () => {
      const config = testConfig({ reserveSats: 0, maxAmount: 100_000 });
      expect(computeRebalanceAmount(source, destination, config)).toBe(100_000);
    });

    it("should skip a pair whose amount is below the minimum", () => {
      const barely = channel("300x1x0", "peer-c", 1_000_000, 610_000);
      const config = testConfig({ reserveSats: 0, minAmount: 20_000 });
      expect(computeRebalanceAmount(barely, destination, config)).toBeNull();
    });

    it("should size from the destination's remote balance", () => {
      // remote 450k - 400k low edge = 50k
      const nearlyFull = channel("400x1x0", "peer-d", 1_000_000, 550_000);
      expect(computeRebalanceAmount(source, nearlyFull, testConfig({ reserveSats: 0 }))).toBe(50_000);
    });
  });

  describe("routeHintsFor", () => {
    it("should pin the first and last hop", () => {
      expect(routeHintsFor(source, destination)).toEqual({
        outgoing_channel: "100x1x0",
        incoming_channel: "200x1x0",
        incoming_peer: "peer-b",
      });
    });
  });

  describe("planRebalance", () => {
    it("should probe the route under the fee cap the budget will authorize", async () => {
      const node = new FakeNode();
      node.route = { fee: 7, hops: 4 };

      const plan = await planRebalance(
        { node, config: testConfig({ reserveSats: 0 }) },
        source,
        destination
      );

      expect(plan).toEqual({
        pair_key: "100x1x0>200x1x0",
        source,
        destination,
        amount: 300_000,
        hints: routeHintsFor(source, destination),
        estimated_fee: 7,
      });
      expect(node.calls.findRoute).toEqual([
        // min(500 flat, 300k at 1000 ppm)
        { hints: routeHintsFor(source, destination), amount: 300_000, maxFee: 300 },
      ]);
    });

    it("should hold the probe to the destination's earnings share", async () => {
      const node = new FakeNode();
      const earning = { ...destination, fee_rate_ppm: 200 };

      await planRebalance(
        { node, config: testConfig({ reserveSats: 0, earningsFeeSharePpm: 500_000 }) },
        source,
        earning
      );

      // 300k at 200 ppm earns 60 sats; half is 30
      expect(node.calls.findRoute.map((r) => r.maxFee)).toEqual([30]);
    });

    it("should skip a pair whose fee cap is below the minimum viable fee without probing", async () => {
      const node = new FakeNode();
      const free = { ...destination, fee_rate_ppm: 0 };

      const plan = await planRebalance(
        { node, config: testConfig({ reserveSats: 0, earningsFeeSharePpm: 500_000 }) },
        source,
        free
      );

      expect(plan).toBeNull();
      expect(node.calls.findRoute).toHaveLength(0);
    });

    it("should not probe a pair with no viable amount", async () => {
      const node = new FakeNode();
      const plan = await planRebalance(
        { node, config: testConfig({ minAmount: 400_000 }) },
        source,
        destination
      );

      expect(plan).toBeNull();
      expect(node.calls.findRoute).toHaveLength(0);
    });

    it("should throw NoRouteError when the node has no path", async () => {
      const node = new FakeNode();
      node.route = null;

      await expect(planRebalance({ node, config: testConfig() }, source, destination)).rejects.toThrow(
        NoRouteError
      );
    });

    it("should report an unreachable node as a ConnectivityError", async () => {
      const node = new FakeNode();
      node.unreachable = true;

      await expect(planRebalance({ node, config: testConfig() }, source, destination)).rejects.toThrow(
        ConnectivityError
      );
    });
  });
});
