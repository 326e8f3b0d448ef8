/**
 * Errors raised by the reactive graph.
 */

import type { z } from "zod/v4";

/** Base class for every error the graph raises itself. */
export class SignalError extends Error {
  override name = "SignalError";
}

/**
 * A value assigned to, or computed for, a signal does not satisfy the
 * signal's declared type. The signal keeps its previous value.
 */
export class TypeMismatchError extends SignalError {
  override name = "TypeMismatchError";

  constructor(
    label: string,
    readonly value: unknown,
    readonly issues: z.ZodError["issues"],
  ) {
    super(
      `${label}: value ${describe(value)} does not match type (${issues
        .map((issue) => issue.message)
        .join("; ")})`,
    );
  }
}

/** A compute step threw. The original error is kept as `cause`. */
export class ComputeError extends SignalError {
  override name = "ComputeError";

  constructor(label: string, cause: unknown) {
    super(`${label}: compute step failed: ${reason(cause)}`, { cause });
  }
}

/** Deferred scopes were exited out of order, or twice. */
export class DeferredScopeError extends SignalError {
  override name = "DeferredScopeError";
}

const reason = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

function describe(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  if (value === null || typeof value !== "object") return String(value);
  return Array.isArray(value) ? "[array]" : "[object]";
}
