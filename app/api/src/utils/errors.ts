/**
 * Error taxonomy for the rebalancer. Each is caught at the component boundary
 * where it arises and turned into a pair- or attempt-scoped state transition;
 * only ConfigError and a startup ConnectivityError end the process.
 */

/** Invalid configuration at startup. */
export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Node unreachable or a call exceeded its timeout. Aborts the pass, no pair is penalized. */
export class ConnectivityError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "ConnectivityError";
  }
}

/** The node found no path for the requested route hints. The pair is cooled down. */
export class NoRouteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NoRouteError";
  }
}

/** Not enough fee allowance for this attempt. Deferred: no failure, no exclusion. */
export class NoBudgetError extends Error {
  constructor(message: string, public readonly allowance: number) {
    super(message);
    this.name = "NoBudgetError";
  }
}

/** The node reported a definite payment failure. Counts as a consecutive failure. */
export class PaymentFailedError extends Error {
  constructor(message: string, public readonly reason: string) {
    super(message);
    this.name = "PaymentFailedError";
  }
}

/** Payment status could not be confirmed terminal within bounded polling. */
export class AmbiguousOutcomeError extends Error {
  constructor(message: string, public readonly paymentId: string | null) {
    super(message);
    this.name = "AmbiguousOutcomeError";
  }
}

/**
 * ln-service rejects with `[code, message, details]` arrays rather than Error
 * instances; render those (and anything else) as a single readable line.
 */
export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (Array.isArray(err)) {
    const [code, message, details] = err;
    const parts = [code, message].filter((p) => p != null).map(String);
    if (details != null) {
      parts.push(typeof details === "string" ? details : JSON.stringify(details));
    }
    return parts.join(" ");
  }
  return String(err);
}
