import { EventEmitter } from "node:events";

import { isTerminalEvent, type ProgressEvent } from "./results.js";

// =============================================================================
// PROGRESS FEED
// =============================================================================

/**
 * Ordered, append-only progress buffer with live fan-out.
 *
 * Every subscriber replays the buffer from the first event, then follows live events
 * until the terminal `done`/`error` event. Events published after the terminal one
 * are dropped.
 */
export class ProgressFeed {
  private readonly events: ProgressEvent[] = [];
  private readonly emitter = new EventEmitter();
  private closed = false;

  publish(event: ProgressEvent): void {
    if (this.closed) return;
    this.events.push(event);
    if (isTerminalEvent(event)) {
      this.closed = true;
    }
    this.emitter.emit("event", event);
  }

  log(line: string): void {
    this.publish({ type: "log", line });
  }

  subscribe(): AsyncIterableIterator<ProgressEvent> {
    const pending: ProgressEvent[] = [...this.events];
    let finished = false;
    let wake: (() => void) | null = null;

    const onEvent = (event: ProgressEvent): void => {
      pending.push(event);
      wake?.();
    };
    const detach = (): void => {
      finished = true;
      this.emitter.off("event", onEvent);
      wake?.();
    };

    if (!this.closed) {
      this.emitter.on("event", onEvent);
    }

    const iterator: AsyncIterableIterator<ProgressEvent> = {
      next: async () => {
        for (;;) {
          const event = pending.shift();
          if (event) {
            if (isTerminalEvent(event)) detach();
            return { done: false, value: event };
          }
          if (finished || this.closed) {
            detach();
            return { done: true, value: undefined };
          }
          await new Promise<void>((resolve) => {
            wake = resolve;
          });
          wake = null;
        }
      },
      return: async () => {
        detach();
        return { done: true, value: undefined };
      },
      [Symbol.asyncIterator]() {
        return iterator;
      },
    };

    return iterator;
  }
}
