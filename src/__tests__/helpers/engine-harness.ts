import { CacheStore } from "../../cache/cache-store.js";
import { ReconciliationEngine, type ReconcilerOptions } from "../../engine/reconciler.js";

import { FakeRuntimeProbe, RecordingLogger } from "./fake-runtime-probe.js";
import { createTempCatalog, type TempCatalog } from "./temp-catalog.js";

export const HARNESS_START = Date.parse("2026-03-01T12:00:00.000Z");

export type EngineHarness = {
  catalog: TempCatalog;
  probe: FakeRuntimeProbe;
  logger: RecordingLogger;
  store: CacheStore;
  engine: ReconciliationEngine;
  advance: (ms: number) => void;
  isoAt: () => string;
  cleanup: () => Promise<void>;
};

type HarnessOptions = Pick<
  ReconcilerOptions,
  "ttlHours" | "fingerprintRecheckSeconds" | "readiness"
>;

/** Engine over a temp catalog, the in-memory probe and a clock that only moves when told. */
export async function createEngineHarness(opts: HarnessOptions = {}): Promise<EngineHarness> {
  const catalog = await createTempCatalog();
  const probe = new FakeRuntimeProbe();
  const logger = new RecordingLogger();
  const store = new CacheStore(catalog.cachePath, { logger });
  let time = HARNESS_START;

  const engine = new ReconciliationEngine({
    catalogRoot: catalog.root,
    store,
    probe,
    logger,
    clock: () => time,
    ...opts,
  });

  return {
    catalog,
    probe,
    logger,
    store,
    engine,
    advance: (ms) => {
      time += ms;
    },
    isoAt: () => new Date(time).toISOString(),
    cleanup: async () => {
      await engine.idle();
      await catalog.cleanup();
    },
  };
}
