import type { EnvironmentDescriptor } from "../catalog/types.js";

// =============================================================================
// OPERATION RESULTS
// =============================================================================

export type OperationKind = "start" | "stop" | "pull";

export type OperationFailure =
  | { kind: "busy"; message: string }
  | { kind: "not_found"; message: string }
  | {
      kind: "port_conflict";
      message: string;
      ports: number[];
      conflicting: string[];
    }
  | { kind: "runtime_unavailable"; message: string }
  | { kind: "failed"; message: string };

export type OperationResult =
  | { ok: true; id: string; operation: OperationKind; environment: EnvironmentDescriptor | null }
  | { ok: false; id: string; operation: OperationKind; error: OperationFailure };

export type ImageCheckResult =
  | { ok: true; id: string; images: string[]; missing: string[] }
  | { ok: false; id: string; error: OperationFailure };

export type ReadyCheckResult = {
  ready: boolean;
  port?: number;
};

// =============================================================================
// PROGRESS EVENTS
// =============================================================================

export type ProgressEvent =
  | { type: "log"; line: string }
  | { type: "done"; message: string }
  | { type: "error"; message: string; error: OperationFailure };

export function isTerminalEvent(event: ProgressEvent): boolean {
  return event.type === "done" || event.type === "error";
}

export function failure(
  kind: Exclude<OperationFailure["kind"], "port_conflict">,
  message: string,
): OperationFailure {
  return { kind, message };
}
