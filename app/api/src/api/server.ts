import http from "http";
import { resetPair, type RebalanceContext } from "../lightning/context";
import type { PassSummary } from "../lightning/rebalance-scheduler";
import { getRebalanceAttempts, getRebalanceSummary } from "./rebalance-attempts";
import { toErrorMessage } from "../utils/errors";

const MAX_LIST_LIMIT = 500;

export type StatusDeps = {
  ctx: RebalanceContext;
  lastPass: () => PassSummary | null;
};

export type StatusResponse = {
  status: number;
  body: unknown;
};

function intParam(params: URLSearchParams, name: string, fallback: number): number | null {
  const raw = params.get(name);
  if (raw == null || raw === "") return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 0 ? n : null;
}

function pairKeyFromBody(body: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || !("pair_key" in parsed)) return null;
  const key = parsed.pair_key;
  return typeof key === "string" && key.includes(">") ? key : null;
}

/**
 * Routes one status API request. Kept free of the http plumbing so it can be
 * called directly.
 */
export function handleStatusRequest(
  deps: StatusDeps,
  method: string,
  rawUrl: string,
  body: string = ""
): StatusResponse {
  const { ctx } = deps;
  const url = new URL(rawUrl, "http://localhost");

  if (method === "GET" && url.pathname === "/health") {
    try {
      ctx.db.prepare("SELECT 1").get();
      return { status: 200, body: { status: "ok", db: "ok", last_pass: deps.lastPass() } };
    } catch {
      return { status: 500, body: { status: "error", db: "error" } };
    }
  }

  if (method === "GET" && url.pathname === "/api/rebalances") {
    const limit = intParam(url.searchParams, "limit", 50);
    if (limit == null || limit < 1) {
      return { status: 400, body: { error: "invalid_limit" } };
    }
    return {
      status: 200,
      body: getRebalanceAttempts(ctx.db, Math.min(limit, MAX_LIST_LIMIT)),
    };
  }

  if (method === "GET" && url.pathname === "/api/rebalances/summary") {
    const since = intParam(url.searchParams, "since", ctx.budget.currentEpochStart());
    if (since == null) {
      return { status: 400, body: { error: "invalid_since" } };
    }
    return { status: 200, body: getRebalanceSummary(ctx.db, since) };
  }

  if (method === "GET" && url.pathname === "/api/exclusions") {
    const now = ctx.clock();
    return {
      status: 200,
      body: ctx.backoff.list().map((e) => ({
        ...e,
        state: ctx.backoff.stateOf(e.pair_key, now),
      })),
    };
  }

  if (method === "GET" && url.pathname === "/api/budget") {
    return { status: 200, body: ctx.budget.snapshot() };
  }

  if (method === "POST" && url.pathname === "/api/exclusions/reset") {
    const key = pairKeyFromBody(body);
    if (!key) {
      return { status: 400, body: { error: "missing_pair_key" } };
    }
    if (!resetPair(ctx, key)) {
      return { status: 404, body: { error: "pair_not_found" } };
    }
    console.log(`[status-api] exclusion reset for ${key}`);
    return { status: 200, body: { ok: true, pair_key: key } };
  }

  return { status: 404, body: { error: "not_found" } };
}

export function createStatusServer(deps: StatusDeps): http.Server {
  return http.createServer((req, res) => {
    res.setHeader("Content-Type", "application/json");

    let body = "";
    req.on("data", (chunk: Buffer) => {
      body += chunk.toString();
    });

    req.on("end", () => {
      try {
        const out = handleStatusRequest(deps, req.method ?? "GET", req.url ?? "/", body);
        res.writeHead(out.status);
        res.end(JSON.stringify(out.body));
      } catch (err) {
        console.error("[status-api] request failed:", err);
        res.writeHead(500);
        res.end(JSON.stringify({ error: toErrorMessage(err) }));
      }
    });
  });
}
