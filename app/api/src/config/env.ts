// Environment variable configuration and validation.
// Process-level settings live in ENV; rebalancing policy is built into an
// explicit RebalanceConfig by loadRebalanceConfig() and validated before start.

import { ConfigError } from "../utils/errors";

export const ENV = {
    // Set DEBUG=1 or DEBUG=true to enable verbose console output
    debug: process.env.DEBUG === "1" || process.env.DEBUG === "true",

    // "mainnet" | "testnet" | "regtest"
    bitcoinNetwork: process.env.BITCOIN_NETWORK || "mainnet",
    // gRPC address of the LND node (host:port)
    lndGrpcHost: process.env.LND_GRPC_HOST || "127.0.0.1:10009",
    // Directory holding tls.cert and data/chain/bitcoin/<network>/admin.macaroon
    lndDir: process.env.LND_DIR || "/lnd",

    // SQLite file for exclusions, fee ledger and attempt history (":memory:" disables persistence)
    dbPath: process.env.DB_PATH || "/data/db/rebalancer.sqlite",
};

export type RebalanceConfig = {
    debug: boolean;
    dryRun: boolean;

    // --- Scheduling ---
    intervalMs: number;
    maxCandidatesPerPass: number;

    // --- Amount planning (sats) ---
    maxAmount: number;
    minAmount: number;
    reserveSats: number;
    // Target local-balance band, parts per million of capacity
    targetLowRatioPpm: number;
    targetHighRatioPpm: number;

    // --- Fee budget (sats) ---
    maxFeeSats: number;
    maxFeeRatePpm: number;
    epochBudgetSats: number;
    epochMs: number;
    minFeeSats: number;
    allowPartialBudget: boolean;
    // Share (ppm) of what the destination's own fee rate would earn on the
    // amount that a rebalance may spend; null disables the limit
    earningsFeeSharePpm: number | null;

    // --- Backoff ---
    cooldownBaseMs: number;
    cooldownMaxMs: number;
    successCooldownMs: number;
    failureCap: number;
    // null keeps capped pairs excluded until a manual reset
    failureCapCooldownMs: number | null;

    // --- Candidate filters ---
    includedPeers: string[];
    excludedPeers: string[];
    allowSamePeer: boolean;

    // --- Node calls ---
    nodeTimeoutMs: number;
    paymentPollIntervalMs: number;
    paymentPollMaxIntervalMs: number;
    paymentPollTimeoutMs: number;
    reconcileAttempts: number;
    reconcileIntervalMs: number;
};

const MINUTE_MS = 60_000;

function list(raw: string | undefined): string[] {
    return (raw ?? "")
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s !== "");
}

function flag(raw: string | undefined): boolean {
    return raw === "1" || raw === "true";
}

/**
 * Builds the rebalancing policy from environment variables. Values are not
 * checked here; call validateRebalanceConfig() before using the result.
 */
export function loadRebalanceConfig(env: NodeJS.ProcessEnv = process.env): RebalanceConfig {
    const capCooldown = env.REBALANCE_FAILURE_CAP_COOLDOWN_MINUTES;
    const earningsShare = env.REBALANCE_MAX_FEE_EARNINGS_SHARE_PPM;

    return {
        debug: flag(env.DEBUG),
        // Set to "true" to log decisions without creating invoices or paying
        dryRun: flag(env.REBALANCE_SCHEDULER_DRY_RUN),

        // How often a pass starts, in milliseconds (default: 10 min)
        intervalMs: Number(env.REBALANCE_INTERVAL_MS ?? "600000"),
        maxCandidatesPerPass: Number(env.REBALANCE_MAX_CANDIDATES_PER_PASS ?? "3"),

        // Hard ceiling on a single rebalance amount
        maxAmount: Number(env.REBALANCE_MAX_TOKENS ?? "500000"),
        // Smaller amounts are not worth the base fees along the route
        minAmount: Number(env.REBALANCE_MIN_TOKENS ?? "10000"),
        // Sats to keep back from available liquidity when sizing a rebalance
        reserveSats: Number(env.REBALANCE_SAFETY_BUFFER_SATS ?? "1000"),
        targetLowRatioPpm: Number(env.REBALANCE_TARGET_LOW_RATIO_PPM ?? "400000"),
        targetHighRatioPpm: Number(env.REBALANCE_TARGET_HIGH_RATIO_PPM ?? "600000"),

        // Max fee in sats for a single rebalance
        maxFeeSats: Number(env.REBALANCE_MAX_FEE_SATS ?? "500"),
        // Max fee as parts per million of the amount
        maxFeeRatePpm: Number(env.REBALANCE_MAX_FEE_RATE_PPM ?? "1000"),
        // Total fees allowed per epoch before automation defers
        epochBudgetSats: Number(env.REBALANCE_EPOCH_BUDGET_SATS ?? "5000"),
        epochMs: Number(env.REBALANCE_EPOCH_MINUTES ?? "1440") * MINUTE_MS,
        minFeeSats: Number(env.REBALANCE_MIN_FEE_SATS ?? "1"),
        allowPartialBudget: flag(env.REBALANCE_ALLOW_PARTIAL_BUDGET),
        // e.g. 500000: spend at most half of what the destination's outgoing
        // fee rate earns when the moved liquidity is routed out again
        earningsFeeSharePpm:
            earningsShare == null || earningsShare.trim() === ""
                ? null
                : Number(earningsShare),

        cooldownBaseMs: Number(env.REBALANCE_COOLDOWN_BASE_MINUTES ?? "15") * MINUTE_MS,
        cooldownMaxMs: Number(env.REBALANCE_COOLDOWN_MAX_MINUTES ?? "1440") * MINUTE_MS,
        // Minimum minutes before a pair that just succeeded is selected again
        successCooldownMs: Number(env.REBALANCE_SUCCESS_COOLDOWN_MINUTES ?? "30") * MINUTE_MS,
        failureCap: Number(env.REBALANCE_FAILURE_CAP ?? "5"),
        failureCapCooldownMs:
            capCooldown == null || capCooldown.trim() === ""
                ? null
                : Number(capCooldown) * MINUTE_MS,

        includedPeers: list(env.REBALANCE_INCLUDED_PEERS),
        excludedPeers: list(env.REBALANCE_EXCLUDED_PEERS),
        allowSamePeer: flag(env.REBALANCE_ALLOW_SAME_PEER),

        nodeTimeoutMs: Number(env.REBALANCE_NODE_TIMEOUT_MS ?? "30000"),
        paymentPollIntervalMs: Number(env.REBALANCE_PAYMENT_POLL_INTERVAL_MS ?? "2000"),
        paymentPollMaxIntervalMs: Number(env.REBALANCE_PAYMENT_POLL_MAX_INTERVAL_MS ?? "15000"),
        paymentPollTimeoutMs: Number(env.REBALANCE_PAYMENT_POLL_TIMEOUT_MS ?? "120000"),
        reconcileAttempts: Number(env.REBALANCE_RECONCILE_ATTEMPTS ?? "5"),
        reconcileIntervalMs: Number(env.REBALANCE_RECONCILE_INTERVAL_MS ?? "10000"),
    };
}

/** Returns every problem found; an empty list means the config is usable. */
export function validateRebalanceConfig(config: RebalanceConfig): string[] {
    const problems: string[] = [];

    const positive: Array<keyof RebalanceConfig> = [
        "intervalMs",
        "maxCandidatesPerPass",
        "maxAmount",
        "minAmount",
        "epochMs",
        "failureCap",
        "nodeTimeoutMs",
        "paymentPollIntervalMs",
        "paymentPollMaxIntervalMs",
        "paymentPollTimeoutMs",
    ];
    const nonNegative: Array<keyof RebalanceConfig> = [
        "reserveSats",
        "maxFeeSats",
        "maxFeeRatePpm",
        "epochBudgetSats",
        "minFeeSats",
        "cooldownBaseMs",
        "cooldownMaxMs",
        "successCooldownMs",
        "reconcileAttempts",
        "reconcileIntervalMs",
    ];

    for (const key of positive) {
        const v = config[key];
        if (typeof v !== "number" || !Number.isFinite(v) || v <= 0) {
            problems.push(`${key} must be a positive number`);
        }
    }
    for (const key of nonNegative) {
        const v = config[key];
        if (typeof v !== "number" || !Number.isFinite(v) || v < 0) {
            problems.push(`${key} must be a non-negative number`);
        }
    }

    const { targetLowRatioPpm: low, targetHighRatioPpm: high } = config;
    if (!Number.isFinite(low) || !Number.isFinite(high) || low < 0 || high > 1_000_000 || low > high) {
        problems.push("target ratio band must satisfy 0 <= low <= high <= 1000000 ppm");
    }
    if (config.minAmount > config.maxAmount) {
        problems.push("minAmount must not exceed maxAmount");
    }
    if (config.cooldownBaseMs > config.cooldownMaxMs) {
        problems.push("cooldownBaseMs must not exceed cooldownMaxMs");
    }
    if (
        config.failureCapCooldownMs !== null &&
        (!Number.isFinite(config.failureCapCooldownMs) || config.failureCapCooldownMs <= 0)
    ) {
        problems.push("failureCapCooldownMs must be a positive number when set");
    }
    if (
        config.earningsFeeSharePpm !== null &&
        (!Number.isFinite(config.earningsFeeSharePpm) || config.earningsFeeSharePpm <= 0)
    ) {
        problems.push("earningsFeeSharePpm must be a positive number when set");
    }
    const overlap = config.includedPeers.filter((p) => config.excludedPeers.includes(p));
    if (overlap.length) {
        problems.push(`peers both included and excluded: ${overlap.join(", ")}`);
    }

    return problems;
}

/** Loads and validates in one step; throws ConfigError listing every problem. */
export function requireRebalanceConfig(env: NodeJS.ProcessEnv = process.env): RebalanceConfig {
    const config = loadRebalanceConfig(env);
    const problems = validateRebalanceConfig(config);
    if (problems.length) {
        throw new ConfigError(problems);
    }
    return config;
}
