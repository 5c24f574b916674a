/**
 * Error taxonomy for the memory service.
 * Every error carries a stable `code` so the HTTP layer can map it to a status.
 */

export type ProviderErrorKind = "auth" | "rate_limit" | "network" | "timeout" | "upstream" | "cancelled";

export class MemoryServiceError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "MemoryServiceError";
  }
}

/** LLM collaborator failed (transport, auth, rate limit, timeout, cancellation). */
export class ProviderError extends MemoryServiceError {
  constructor(
    public readonly kind: ProviderErrorKind,
    message: string,
    public readonly provider: string,
    public readonly status?: number
  ) {
    super(message, `PROVIDER_${kind.toUpperCase()}`, { provider, status });
    this.name = "ProviderError";
  }
}

/** Bad caller input. Never retried. */
export class ValidationError extends MemoryServiceError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

export class SessionNotFound extends MemoryServiceError {
  constructor(public readonly sessionId: string) {
    super(`Session not found: ${sessionId}`, "SESSION_NOT_FOUND", { sessionId });
    this.name = "SessionNotFound";
  }
}

/** Append on a full store with no way to make room. */
export class CapacityViolation extends MemoryServiceError {
  constructor(capacity: number, context?: Record<string, unknown>) {
    super(`Message store is at capacity (${capacity})`, "CAPACITY_VIOLATION", { capacity, ...context });
    this.name = "CapacityViolation";
  }
}

/** Invariant violation. Fatal for the session that raised it. */
export class InternalStateError extends MemoryServiceError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "INTERNAL_STATE_ERROR", context);
    this.name = "InternalStateError";
  }
}

/** Tag a failure with the session it happened in, for callers that did not know the id up front. */
export function withSessionId(err: unknown, sessionId: string): unknown {
  if (err instanceof MemoryServiceError) err.context.sessionId = sessionId;
  return err;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
