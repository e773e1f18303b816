// API error helpers.
// Purpose: centralize the API error payload shape and the status each failure kind maps to.
// Assumes API failures respond with { ok: false, error: { code, message, details? } }.
// Usage: sendJson(res, statusForFailure(kind), buildFailurePayload(failure)).

import type { OperationFailure } from "../../engine/results.js";

// =============================================================================
// TYPES
// =============================================================================

export type ApiErrorDetails = Record<string, unknown>;

export type ApiErrorPayload = {
  ok: false;
  error: {
    code: string;
    message: string;
    details?: ApiErrorDetails;
  };
};

const FAILURE_STATUS: Record<OperationFailure["kind"], number> = {
  busy: 409,
  not_found: 404,
  port_conflict: 409,
  runtime_unavailable: 503,
  failed: 500,
};

// =============================================================================
// ERROR BUILDERS
// =============================================================================

export function buildApiErrorPayload(params: {
  code: string;
  message: string;
  details?: ApiErrorDetails;
}): ApiErrorPayload {
  const error = {
    code: params.code,
    message: params.message,
    ...(params.details ? { details: params.details } : {}),
  };

  return { ok: false, error };
}

export function buildFailurePayload(failure: OperationFailure): ApiErrorPayload {
  const details =
    failure.kind === "port_conflict"
      ? { ports: failure.ports, conflicting: failure.conflicting }
      : undefined;
  return buildApiErrorPayload({ code: failure.kind, message: failure.message, details });
}

export function statusForFailure(kind: OperationFailure["kind"]): number {
  return FAILURE_STATUS[kind];
}

export function buildInternalErrorDetails(cause: unknown): ApiErrorDetails {
  const details: ApiErrorDetails = { reason: "unexpected_error" };

  if (!cause || typeof cause !== "object" || !("code" in cause)) {
    return details;
  }

  if (typeof cause.code === "string" && cause.code.trim()) {
    details.error_code = cause.code;
  }

  return details;
}
