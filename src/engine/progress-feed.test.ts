import { describe, expect, it } from "vitest";

import { ProgressFeed } from "./progress-feed.js";
import type { ProgressEvent } from "./results.js";

async function collect(events: AsyncIterable<ProgressEvent>): Promise<ProgressEvent[]> {
  const seen: ProgressEvent[] = [];
  for await (const event of events) {
    seen.push(event);
  }
  return seen;
}

describe("ProgressFeed", () => {
  it("replays buffered events and follows live ones up to the terminal event", async () => {
    const feed = new ProgressFeed();
    feed.log("first");

    const subscriber = collect(feed.subscribe());
    feed.log("second");
    feed.publish({ type: "done", message: "finished" });

    expect(await subscriber).toEqual([
      { type: "log", line: "first" },
      { type: "log", line: "second" },
      { type: "done", message: "finished" },
    ]);
    expect(await collect(feed.subscribe())).toHaveLength(3);
  });

  it("gives a late subscriber the whole history", async () => {
    const feed = new ProgressFeed();
    feed.log("only");
    feed.publish({ type: "error", message: "nope", error: { kind: "failed", message: "nope" } });

    expect(await collect(feed.subscribe())).toEqual([
      { type: "log", line: "only" },
      { type: "error", message: "nope", error: { kind: "failed", message: "nope" } },
    ]);
  });

  it("drops events published after the terminal one", async () => {
    const feed = new ProgressFeed();
    feed.publish({ type: "done", message: "finished" });
    feed.log("late");

    expect(await collect(feed.subscribe())).toEqual([{ type: "done", message: "finished" }]);
  });

  it("stops a subscriber that returns early without closing the feed", async () => {
    const feed = new ProgressFeed();
    feed.log("one");
    const iterator = feed.subscribe();

    expect(await iterator.next()).toEqual({ done: false, value: { type: "log", line: "one" } });
    await iterator.return?.();
    feed.log("two");

    expect(await iterator.next()).toEqual({ done: true, value: undefined });

    const later = collect(feed.subscribe());
    feed.publish({ type: "done", message: "finished" });
    expect(await later).toEqual([
      { type: "log", line: "one" },
      { type: "log", line: "two" },
      { type: "done", message: "finished" },
    ]);
  });
});
