import { loadRebalanceConfig, type RebalanceConfig } from "../config/env";
import { initDb, type Db } from "../db";
import { runMigrations } from "../db/migrate";
import { createRebalanceContext, type RebalanceContext } from "../lightning/context";
import type { Channel } from "../types/rebalance";
import { FakeNode } from "./fake-node";

/** Defaults from an empty environment, then the overrides. */
export function testConfig(overrides: Partial<RebalanceConfig> = {}): RebalanceConfig {
  return { ...loadRebalanceConfig({}), ...overrides };
}

export function channel(
  id: string,
  peer: string,
  capacity: number,
  local: number,
  extra: Partial<Channel> = {}
): Channel {
  return {
    id,
    partner_public_key: peer,
    capacity,
    local_balance: local,
    remote_balance: capacity - local,
    is_active: true,
    last_rebalanced_at: null,
    fee_rate_ppm: null,
    ...extra,
  };
}

export function memoryDb(): Db {
  const db = initDb(":memory:");
  runMigrations(db);
  return db;
}

/** Manual clock; sleeping advances it instantly. */
export class TestClock {
  constructor(public now: number) {}

  readonly clock = (): number => this.now;

  readonly sleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
    if (signal?.aborted) return;
    this.now += Math.max(0, ms);
  };

  advance(ms: number): void {
    this.now += ms;
  }
}

/** 2024-01-01T00:00:00Z, an exact multiple of a day. */
export const T0 = 1_704_067_200_000;

export function testContext(
  opts: {
    config?: Partial<RebalanceConfig>;
    node?: FakeNode;
    db?: Db;
    now?: number;
  } = {}
): { ctx: RebalanceContext; node: FakeNode; time: TestClock; db: Db } {
  const node = opts.node ?? new FakeNode();
  const db = opts.db ?? memoryDb();
  const time = new TestClock(opts.now ?? T0);

  const ctx = createRebalanceContext({
    config: testConfig(opts.config),
    node,
    db,
    clock: time.clock,
    sleep: time.sleep,
  });

  return { ctx, node, time, db };
}
