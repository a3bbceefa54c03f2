import { PORTS } from "./config/ports";
import { ENV, requireRebalanceConfig, type RebalanceConfig } from "./config/env";
import { initDb } from "./db";
import { runMigrations } from "./db/migrate";
import { LndNode } from "./lightning/lnd-node";
import { createRebalanceContext, persistRebalanceState } from "./lightning/context";
import { RebalanceScheduler } from "./lightning/rebalance-scheduler";
import { createStatusServer } from "./api/server";
import { ConfigError, toErrorMessage } from "./utils/errors";
import { withTimeout } from "./utils/timeout";

async function main(): Promise<void> {
  let config: RebalanceConfig;
  try {
    config = requireRebalanceConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      for (const problem of err.problems) console.error("[config]", problem);
      process.exit(1);
    }
    throw err;
  }

  const db = initDb(ENV.dbPath);
  const applied = runMigrations(db);
  if (applied.length) console.log("[db] applied migrations:", applied.join(", "));

  const node = new LndNode();
  try {
    const pubkey = await withTimeout(node.connect(), config.nodeTimeoutMs, "getIdentity");
    console.log(`[lnd] connected to ${pubkey} at ${ENV.lndGrpcHost} (${ENV.bitcoinNetwork})`);
  } catch (err) {
    console.error("[lnd] node unreachable at startup:", toErrorMessage(err));
    db.close();
    process.exit(1);
  }

  const ctx = createRebalanceContext({ config, node, db });
  const scheduler = new RebalanceScheduler(ctx);

  const server = createStatusServer({ ctx, lastPass: () => scheduler.lastSummary });
  server.listen(PORTS.statusApi, () => {
    console.log(`[status-api] listening on ${PORTS.statusApi}`);
  });

  if (config.dryRun) console.log("[rebalance-scheduler] dry run: no payments will be sent");
  scheduler.start();
  console.log(`[rebalance-scheduler] started, interval ${config.intervalMs}ms`);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[rebalancer] ${signal} received, finishing current attempt`);

    await scheduler.stop();
    persistRebalanceState(ctx);
    await new Promise<void>((resolve) => server.close(() => resolve()));
    db.close();

    console.log("[rebalancer] stopped");
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        console.error("[rebalancer] shutdown failed:", err);
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  console.error("[rebalancer] fatal:", err);
  process.exit(1);
});
