import { describe, it, expect } from "vitest";
import { PairBackoff, AMBIGUOUS_REASON, type PairBackoffConfig } from "./pair-backoff";
import { memoryDb, TestClock, T0 } from "../testing/fixtures";

const MINUTE = 60_000;

const baseConfig: PairBackoffConfig = {
  cooldownBaseMs: 15 * MINUTE,
  cooldownMaxMs: 1440 * MINUTE,
  successCooldownMs: 30 * MINUTE,
  failureCap: 5,
  failureCapCooldownMs: null,
};

const pair = { source_channel: "100x1x0", destination_channel: "200x1x0" };
const key = "100x1x0>200x1x0";

function setup(overrides: Partial<PairBackoffConfig> = {}) {
  const time = new TestClock(T0);
  return { backoff: new PairBackoff({ ...baseConfig, ...overrides }, null, time.clock), time };
}

describe("PairBackoff", () => {
  describe("cooldownFor", () => {
    it("should double per failure up to the maximum", () => {
      const { backoff } = setup();
      expect(backoff.cooldownFor(1)).toBe(30 * MINUTE);
      expect(backoff.cooldownFor(2)).toBe(60 * MINUTE);
      expect(backoff.cooldownFor(20)).toBe(1440 * MINUTE);
    });

    it("should never decrease as failures grow", () => {
      const { backoff } = setup();
      for (let n = 0; n < 30; n++) {
        expect(backoff.cooldownFor(n + 1)).toBeGreaterThanOrEqual(backoff.cooldownFor(n));
      }
    });
  });

  describe("state transitions", () => {
    it("should go idle → attempting → idle on release", () => {
      const { backoff } = setup();
      expect(backoff.stateOf(key)).toBe("idle");

      backoff.markAttempting(pair);
      expect(backoff.stateOf(key)).toBe("attempting");

      backoff.release(pair);
      expect(backoff.stateOf(key)).toBe("idle");
      expect(backoff.get(key)).toBeUndefined();
    });

    it("should exclude a failed pair until its cool-down expires", () => {
      const { backoff, time } = setup();
      backoff.markAttempting(pair);
      const entry = backoff.recordFailure(pair, "temporary_channel_failure");

      expect(entry.failures).toBe(1);
      expect(entry.expires_at).toBe(T0 + 30 * MINUTE);
      expect(backoff.stateOf(key)).toBe("excluded");

      time.advance(30 * MINUTE - 1);
      expect(backoff.isExcluded(key)).toBe(true);

      time.advance(1);
      expect(backoff.isExcluded(key)).toBe(false);
      expect(backoff.stateOf(key)).toBe("idle");
    });

    it("should exclude permanently once failures reach the cap", () => {
      const { backoff, time } = setup();

      for (let i = 0; i < 5; i++) {
        backoff.recordFailure(pair, "no_route");
        time.advance(2 * 1440 * MINUTE);
      }

      const entry = backoff.get(key);
      expect(entry?.failures).toBe(5);
      expect(entry?.permanent).toBe(true);
      expect(entry?.expires_at).toBeNull();

      time.advance(365 * 1440 * MINUTE);
      expect(backoff.excludedPairs().has(key)).toBe(true);
    });

    it("should use the finite cap cool-down when one is configured", () => {
      const { backoff } = setup({ failureCapCooldownMs: 7 * 1440 * MINUTE });
      backoff.recordFailure(pair, "x");
      backoff.recordFailure(pair, "x");
      backoff.recordFailure(pair, "x");
      backoff.recordFailure(pair, "x");
      const entry = backoff.recordFailure(pair, "x");

      expect(entry.permanent).toBe(false);
      expect(entry.expires_at).toBe(T0 + 7 * 1440 * MINUTE);
    });

    it("should clear the failure count on success and hold a short cool-down", () => {
      const { backoff } = setup();
      backoff.recordFailure(pair, "x");
      backoff.recordFailure(pair, "x");

      const entry = backoff.recordSuccess(pair);
      expect(entry.failures).toBe(0);
      expect(entry.expires_at).toBe(T0 + 30 * MINUTE);
      expect(entry.reason).toBeNull();
    });

    it("should exclude an unresolved pair without counting a failure", () => {
      const { backoff } = setup();
      backoff.recordFailure(pair, "x");

      const entry = backoff.recordUnresolved(pair);
      expect(entry.permanent).toBe(true);
      expect(entry.failures).toBe(1);
      expect(entry.reason).toBe(AMBIGUOUS_REASON);
    });

    it("should reset a pair by hand", () => {
      const { backoff } = setup();
      backoff.recordUnresolved(pair);

      expect(backoff.reset(key)).toBe(true);
      expect(backoff.isExcluded(key)).toBe(false);
      expect(backoff.reset(key)).toBe(false);
    });
  });

  describe("persistence", () => {
    it("should reload exclusions written by an earlier instance", () => {
      const db = memoryDb();
      const time = new TestClock(T0);

      const first = new PairBackoff(baseConfig, db, time.clock);
      first.recordFailure(pair, "no_route");
      first.recordUnresolved({ source_channel: "300x1x0", destination_channel: "200x1x0" });

      const second = new PairBackoff(baseConfig, db, time.clock);
      expect(second.load()).toBe(2);
      expect(second.get(key)).toEqual(first.get(key));
      expect(second.get("300x1x0>200x1x0")?.permanent).toBe(true);
    });

    it("should drop a reset pair from storage", () => {
      const db = memoryDb();
      const time = new TestClock(T0);

      const first = new PairBackoff(baseConfig, db, time.clock);
      first.recordFailure(pair, "no_route");
      first.reset(key);

      expect(new PairBackoff(baseConfig, db, time.clock).load()).toBe(0);
    });
  });
});
