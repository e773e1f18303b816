import { logConsoleEvent, type EventLog } from "../core/logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type LockOutcome<T> = { acquired: true; value: T } | { acquired: false };

export type SettleHook<T> = (outcome: { value?: T; error?: unknown }) => Promise<void>;

// =============================================================================
// COORDINATOR
// =============================================================================

/**
 * Per-environment exclusivity for start/stop/pull sequences.
 *
 * A second caller for an id already in flight is turned away at once. After the
 * operation settles, the settle hook runs exactly once (success or failure) and the
 * lock is released afterwards, so the cache patch for an id never interleaves with
 * another operation on that id. Distinct ids share nothing.
 */
export class OperationCoordinator {
  private readonly inFlight = new Map<string, string>();

  constructor(private readonly logger?: EventLog) {}

  async withLock<T>(
    id: string,
    operationName: string,
    operation: () => Promise<T>,
    settle: SettleHook<T>,
  ): Promise<LockOutcome<T>> {
    const holder = this.inFlight.get(id);
    if (holder !== undefined) {
      logConsoleEvent(this.logger, "env.operation.busy", {
        envId: id,
        operation: operationName,
        holder,
      });
      return { acquired: false };
    }

    this.inFlight.set(id, operationName);
    try {
      let value: T;
      try {
        value = await operation();
      } catch (error) {
        await settle({ error });
        throw error;
      }
      await settle({ value });
      return { acquired: true, value };
    } finally {
      this.inFlight.delete(id);
    }
  }
}
