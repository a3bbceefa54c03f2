import { describe, it, expect } from "vitest";
import { selectCandidates } from "./rebalance-candidates";
import { channel, testConfig } from "../testing/fixtures";
import type { Channel } from "../types/rebalance";

const config = testConfig({ reserveSats: 0 });

function fleet(): Channel[] {
  return [
    channel("a", "peer-1", 1_000_000, 900_000),
    channel("b", "peer-2", 1_000_000, 100_000),
    channel("c", "peer-3", 1_000_000, 800_000),
    channel("d", "peer-4", 1_000_000, 200_000),
    channel("e", "peer-5", 1_000_000, 500_000),
  ];
}

const keys = (channels: Channel[], cfg = config, excluded: ReadonlySet<string> = new Set()) =>
  selectCandidates(channels, cfg, excluded).map((c) => c.pair_key);

describe("selectCandidates", () => {
  it("should rank pairs by deficiency, then source id, then destination id", () => {
    const candidates = selectCandidates(fleet(), config, new Set());

    expect(candidates.map((c) => [c.pair_key, c.deficiency, c.amount])).toEqual([
      ["a>b", 600_000, 300_000],
      ["a>d", 500_000, 300_000],
      ["c>b", 500_000, 200_000],
      ["c>d", 400_000, 200_000],
    ]);
  });

  it("should only pair sources above the band with destinations below it", () => {
    for (const c of selectCandidates(fleet(), config, new Set())) {
      expect(c.source.local_balance / c.source.capacity).toBeGreaterThan(0.6);
      expect(c.destination.local_balance / c.destination.capacity).toBeLessThan(0.4);
      expect(c.source.id).not.toBe(c.destination.id);
    }
  });

  it("should give the same order for the same input in any order", () => {
    expect(keys(fleet().reverse())).toEqual(keys(fleet()));
  });

  it("should drop excluded pairs instead of ranking them lower", () => {
    expect(keys(fleet(), config, new Set(["a>b", "c>d"]))).toEqual(["a>d", "c>b"]);
  });

  it("should skip inactive channels", () => {
    const channels = fleet().map((c) => (c.id === "a" ? { ...c, is_active: false } : c));
    expect(keys(channels)).toEqual(["c>b", "c>d"]);
  });

  it("should skip pairs on the same peer unless allowed", () => {
    const channels = fleet().map((c) => (c.id === "d" ? { ...c, partner_public_key: "peer-1" } : c));

    expect(keys(channels)).toEqual(["a>b", "c>b", "c>d"]);
    expect(keys(channels, { ...config, allowSamePeer: true })).toEqual(["a>b", "a>d", "c>b", "c>d"]);
  });

  it("should apply the peer include and exclude lists", () => {
    expect(keys(fleet(), { ...config, excludedPeers: ["peer-2"] })).toEqual(["a>d", "c>d"]);
    expect(keys(fleet(), { ...config, includedPeers: ["peer-1", "peer-2"] })).toEqual(["a>b"]);
  });

  it("should skip pairs whose amount is below the minimum", () => {
    expect(keys(fleet(), { ...config, minAmount: 250_000 })).toEqual(["a>b", "a>d"]);
  });

  it("should return nothing when every channel is inside the band", () => {
    expect(keys([channel("x", "peer-1", 1_000_000, 500_000), channel("y", "peer-2", 1_000_000, 450_000)])).toEqual(
      []
    );
  });
});
