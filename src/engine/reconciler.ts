/*
Purpose: serve the environment list from the cache when the catalog has not changed,
rebuild it otherwise, and apply start/stop/pull results to the cache one entry at a time.
Assumptions: this process is the only writer of the cache file; the runtime probe may be
slow or unreachable at any call.
Usage: const engine = new ReconciliationEngine({ catalogRoot, store, probe, logger }).
*/

import path from "node:path";

import fse from "fs-extra";

import type { CacheStore, DescriptorMutator } from "../cache/cache-store.js";
import { parseComposition } from "../catalog/compose.js";
import { readEnvironmentDetails, type EnvironmentDetails } from "../catalog/details.js";
import { computeCatalogFingerprint } from "../catalog/fingerprint.js";
import { locateEnvironment } from "../catalog/locate.js";
import { scanCatalog } from "../catalog/scanner.js";
import {
  sortedEnvironments,
  type CatalogSnapshot,
  type EnvironmentDescriptor,
} from "../catalog/types.js";
import { formatErrorMessage } from "../core/error-format.js";
import { RuntimeUnavailableError } from "../core/errors.js";
import { logConsoleEvent, type EventLog } from "../core/logger.js";
import { uniqueInOrder } from "../core/utils.js";

import { OperationCoordinator } from "./coordinator.js";
import type { ContainerState, EnvironmentRef, RunningContainer, RuntimeProbe } from "./ports.js";
import { ProgressFeed } from "./progress-feed.js";
import { waitForPort, type PortConnector } from "./readiness.js";
import {
  failure,
  type ImageCheckResult,
  type OperationFailure,
  type OperationResult,
  type ProgressEvent,
  type ReadyCheckResult,
} from "./results.js";
import { computeStats, type CatalogStats } from "./stats.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReconcilerOptions = {
  catalogRoot: string;
  store: CacheStore;
  probe: RuntimeProbe;
  coordinator?: OperationCoordinator;
  logger?: EventLog;
  // 0 disables the age limit.
  ttlHours?: number;
  fingerprintRecheckSeconds?: number;
  clock?: () => number;
  readiness?: {
    host?: string;
    intervalMs?: number;
    connect?: PortConnector;
    sleep?: (ms: number) => Promise<void>;
  };
};

export type GetEnvironmentsOptions = {
  forceRescan?: boolean;
};

export type EnvironmentView = EnvironmentDetails & {
  environment: EnvironmentDescriptor | null;
};

export type RunningContainersResult =
  | { ok: true; containers: RunningContainer[] }
  | { ok: false; error: OperationFailure };

type ResolvedTarget = {
  ref: EnvironmentRef;
  images: string[];
};

type StateChangeOutcome =
  | { ok: true; state: ContainerState }
  | { ok: false; error: OperationFailure };

type PullOutcome =
  | { ok: true; pulled: string[]; hasImages: boolean }
  | { ok: false; error: OperationFailure; hasImages: boolean | null };

type Verification = {
  fingerprint: string;
  at: number;
};

const DEFAULT_TTL_HOURS = 24;
const DEFAULT_RECHECK_SECONDS = 30;

// =============================================================================
// ENGINE
// =============================================================================

export class ReconciliationEngine {
  readonly catalogRoot: string;
  readonly coordinator: OperationCoordinator;

  private readonly store: CacheStore;
  private readonly probe: RuntimeProbe;
  private readonly logger?: EventLog;
  private readonly ttlMs: number;
  private readonly recheckMs: number;
  private readonly clock: () => number;
  private readonly background = new Set<Promise<void>>();
  private verified: Verification | null = null;

  constructor(private readonly opts: ReconcilerOptions) {
    this.catalogRoot = path.resolve(opts.catalogRoot);
    this.store = opts.store;
    this.probe = opts.probe;
    this.logger = opts.logger;
    this.coordinator = opts.coordinator ?? new OperationCoordinator(opts.logger);
    this.ttlMs = (opts.ttlHours ?? DEFAULT_TTL_HOURS) * 3_600_000;
    this.recheckMs = (opts.fingerprintRecheckSeconds ?? DEFAULT_RECHECK_SECONDS) * 1_000;
    this.clock = opts.clock ?? Date.now;
  }

  // ---------------------------------------------------------------------------
  // Listing
  // ---------------------------------------------------------------------------

  async getEnvironments(opts: GetEnvironmentsOptions = {}): Promise<EnvironmentDescriptor[]> {
    if (!opts.forceRescan) {
      const cached = await this.store.load();
      if (cached && (await this.isCurrent(cached))) {
        logConsoleEvent(this.logger, "cache.hit", {
          environments: Object.keys(cached.environments).length,
        });
        return sortedEnvironments(cached);
      }
    }

    const snapshot = await this.rescan();
    return sortedEnvironments(snapshot);
  }

  async stats(): Promise<CatalogStats> {
    return computeStats(await this.getEnvironments({ forceRescan: false }));
  }

  async describe(id: string): Promise<EnvironmentView | null> {
    const details = await readEnvironmentDetails(this.catalogRoot, id);
    if (!details) return null;

    const cached = await this.store.load();
    return { ...details, environment: cached?.environments[id] ?? null };
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  async start(id: string): Promise<OperationResult> {
    return this.changeState(id, "start");
  }

  async stop(id: string): Promise<OperationResult> {
    return this.changeState(id, "stop");
  }

  async checkImages(id: string): Promise<ImageCheckResult> {
    const target = await this.resolveTarget(id);
    if (!target) {
      return { ok: false, id, error: failure("not_found", `Unknown environment: ${id}`) };
    }

    try {
      const missing = await this.missingImages(target.images);
      return { ok: true, id, images: target.images, missing };
    } catch (err) {
      return { ok: false, id, error: this.runtimeFailure(err, id) };
    }
  }

  /**
   * Pulls every missing image of `id`. The pull starts at once and runs to completion
   * whether or not anyone consumes the returned events; the cache entry is patched
   * before the terminal event is published.
   */
  pullImages(id: string): AsyncIterableIterator<ProgressEvent> {
    const feed = new ProgressFeed();
    const task = this.runPull(id, feed).catch((err: unknown) => {
      feed.publish({
        type: "error",
        message: formatErrorMessage(err),
        error: failure("failed", formatErrorMessage(err)),
      });
    });

    this.background.add(task);
    void task.finally(() => this.background.delete(task));

    return feed.subscribe();
  }

  async runningContainers(): Promise<RunningContainersResult> {
    try {
      return { ok: true, containers: await this.probe.runningContainers() };
    } catch (err) {
      return { ok: false, error: this.runtimeFailure(err) };
    }
  }

  async waitReady(id: string, timeoutMs: number): Promise<ReadyCheckResult> {
    const target = await this.resolveTarget(id);
    if (!target) return { ready: false };

    let port = target.ref.ports[0];
    try {
      const state = await this.probe.containerState(target.ref);
      port = Object.values(state.services)[0] ?? port;
    } catch (err) {
      // Fall back to the declared port.
      this.runtimeFailure(err, id);
    }
    if (port === undefined) return { ready: false };

    const readiness = this.opts.readiness ?? {};
    return waitForPort(port, {
      timeoutMs,
      host: readiness.host,
      intervalMs: readiness.intervalMs,
      connect: readiness.connect,
      sleep: readiness.sleep,
      now: this.clock,
    });
  }

  /** Resolves once every pull started by this engine has finished. */
  async idle(): Promise<void> {
    await Promise.all([...this.background]);
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async isCurrent(snapshot: CatalogSnapshot): Promise<boolean> {
    if (snapshot.catalog_root !== this.catalogRoot) {
      logConsoleEvent(this.logger, "cache.fingerprint.mismatch", {
        reason: "catalog_root",
        cached: snapshot.catalog_root,
      });
      return false;
    }

    const now = this.clock();
    const generatedAt = Date.parse(snapshot.generated_at);
    if (this.ttlMs > 0 && (Number.isNaN(generatedAt) || now - generatedAt > this.ttlMs)) {
      logConsoleEvent(this.logger, "cache.fingerprint.mismatch", {
        reason: "ttl",
        generated_at: snapshot.generated_at,
      });
      return false;
    }

    const verified = this.verified;
    if (
      verified &&
      verified.fingerprint === snapshot.catalog_fingerprint &&
      now - verified.at < this.recheckMs
    ) {
      return true;
    }

    const current = await computeCatalogFingerprint(this.catalogRoot);
    if (current.fingerprint !== snapshot.catalog_fingerprint) {
      logConsoleEvent(this.logger, "cache.fingerprint.mismatch", {
        reason: "fingerprint",
        cached_environments: Object.keys(snapshot.environments).length,
        environments: current.environments,
      });
      this.verified = null;
      return false;
    }

    this.verified = { fingerprint: current.fingerprint, at: now };
    return true;
  }

  private async rescan(): Promise<CatalogSnapshot> {
    const snapshot = await scanCatalog(this.catalogRoot, {
      logger: this.logger,
      now: () => this.isoNow(),
    });
    const environments = Object.values(snapshot.environments);

    let present: Map<string, boolean> | null = null;
    const refs = uniqueInOrder(environments.flatMap((env) => env.images));
    try {
      present = refs.length > 0 ? await this.probe.imagesPresent(refs) : new Map();
    } catch (err) {
      this.runtimeFailure(err);
    }

    let states: Map<string, ContainerState> | null = null;
    try {
      states = await this.probe.containerStates(
        environments.map((env) => this.refFor(env.id, env.compose_file, env.services)),
      );
    } catch (err) {
      this.runtimeFailure(err);
    }

    const checkedAt = this.isoNow();
    for (const env of environments) {
      if (present) {
        const lookup = present;
        env.has_images = env.images.length > 0 && env.images.every((ref) => lookup.get(ref) === true);
      }
      if (states) {
        applyContainerState(env, states.get(env.id) ?? { status: "stopped", services: {} });
      }
      if (present || states) {
        env.last_checked = checkedAt;
      }
    }

    try {
      await this.store.save(snapshot);
      this.verified = { fingerprint: snapshot.catalog_fingerprint, at: this.clock() };
    } catch (err) {
      // The scan stands; the next listing rescans.
      logConsoleEvent(this.logger, "cache.save.error", { message: formatErrorMessage(err) });
    }
    return snapshot;
  }

  private async changeState(id: string, operation: "start" | "stop"): Promise<OperationResult> {
    const target = await this.resolveTarget(id);
    if (!target) {
      return {
        ok: false,
        id,
        operation,
        error: failure("not_found", `Unknown environment: ${id}`),
      };
    }

    logConsoleEvent(this.logger, "env.operation.start", { envId: id, operation });

    let patched: EnvironmentDescriptor | null = null;
    const lock = await this.coordinator.withLock(
      id,
      operation,
      () => this.attemptStateChange(target.ref, operation),
      async ({ value }) => {
        patched = await this.patchEntry(id, (env) => {
          env.last_checked = this.isoNow();
          if (value?.ok) applyContainerState(env, value.state);
        });
      },
    );

    if (!lock.acquired) {
      return {
        ok: false,
        id,
        operation,
        error: failure("busy", `Another operation is in progress for ${id}`),
      };
    }

    const outcome = lock.value;
    logConsoleEvent(this.logger, "env.operation.complete", {
      envId: id,
      operation,
      ok: outcome.ok,
      ...(outcome.ok ? {} : { error: outcome.error.kind, message: outcome.error.message }),
    });

    return outcome.ok
      ? { ok: true, id, operation, environment: patched }
      : { ok: false, id, operation, error: outcome.error };
  }

  private async attemptStateChange(
    ref: EnvironmentRef,
    operation: "start" | "stop",
  ): Promise<StateChangeOutcome> {
    try {
      if (operation === "start") {
        const result = await this.probe.start(ref);
        if (!result.ok) {
          const error: OperationFailure = result.portConflict
            ? {
                kind: "port_conflict",
                message: result.message,
                ports: result.ports,
                conflicting: result.conflicting,
              }
            : failure("failed", result.message);
          return { ok: false, error };
        }
      } else {
        const result = await this.probe.stop(ref);
        if (!result.ok) return { ok: false, error: failure("failed", result.message) };
      }
    } catch (err) {
      return { ok: false, error: this.runtimeFailure(err, ref.id) };
    }

    const expected: ContainerState["status"] = operation === "start" ? "running" : "stopped";
    try {
      return { ok: true, state: await this.probe.containerState(ref) };
    } catch (err) {
      this.runtimeFailure(err, ref.id);
      return { ok: true, state: { status: expected, services: {} } };
    }
  }

  private async runPull(id: string, feed: ProgressFeed): Promise<void> {
    const target = await this.resolveTarget(id);
    if (!target) {
      const error = failure("not_found", `Unknown environment: ${id}`);
      feed.publish({ type: "error", message: error.message, error });
      return;
    }

    const lock = await this.coordinator.withLock(
      id,
      "pull",
      () => this.attemptPull(target, feed),
      async ({ value }) => {
        const hasImages = value ? value.hasImages : null;
        await this.patchEntry(id, (env) => {
          env.last_checked = this.isoNow();
          if (hasImages !== null) env.has_images = hasImages;
        });
      },
    );

    if (!lock.acquired) {
      const error = failure("busy", `Another operation is in progress for ${id}`);
      feed.publish({ type: "error", message: error.message, error });
      return;
    }

    const outcome = lock.value;
    logConsoleEvent(this.logger, "env.pull.complete", {
      envId: id,
      ok: outcome.ok,
      pulled: outcome.ok ? outcome.pulled : [],
    });

    if (outcome.ok) {
      const message =
        outcome.pulled.length > 0
          ? `Pulled ${outcome.pulled.length} image(s)`
          : "All images already present";
      feed.publish({ type: "done", message });
    } else {
      feed.publish({ type: "error", message: outcome.error.message, error: outcome.error });
    }
  }

  private async attemptPull(target: ResolvedTarget, feed: ProgressFeed): Promise<PullOutcome> {
    if (target.images.length === 0) {
      return { ok: false, error: failure("failed", "No images declared"), hasImages: false };
    }

    let missing: string[];
    try {
      missing = await this.missingImages(target.images);
    } catch (err) {
      return { ok: false, error: this.runtimeFailure(err, target.ref.id), hasImages: null };
    }

    const pulled: string[] = [];
    for (const ref of missing) {
      feed.log(`Pulling ${ref}`);
      try {
        for await (const line of this.probe.pullImage(ref)) {
          feed.log(line);
        }
      } catch (err) {
        return {
          ok: false,
          error: this.runtimeFailure(err, target.ref.id),
          hasImages: false,
        };
      }
      pulled.push(ref);
    }

    return { ok: true, pulled, hasImages: true };
  }

  // A failed cache write leaves the entry stale; it never fails the operation itself.
  private async patchEntry(
    id: string,
    mutate: DescriptorMutator,
  ): Promise<EnvironmentDescriptor | null> {
    try {
      return await this.store.patch(id, mutate);
    } catch (err) {
      logConsoleEvent(this.logger, "cache.patch.error", {
        envId: id,
        message: formatErrorMessage(err),
      });
      return null;
    }
  }

  private async missingImages(images: readonly string[]): Promise<string[]> {
    if (images.length === 0) return [];
    const present = await this.probe.imagesPresent(images);
    return images.filter((ref) => present.get(ref) !== true);
  }

  private async resolveTarget(id: string): Promise<ResolvedTarget | null> {
    const location = await locateEnvironment(this.catalogRoot, id);
    if (!location) return null;

    let text: string;
    try {
      text = await fse.readFile(location.composePath, "utf8");
    } catch (err) {
      logConsoleEvent(this.logger, "catalog.read_error", {
        envId: id,
        message: formatErrorMessage(err),
      });
      return null;
    }
    const parsed = parseComposition(text, location.composePath);
    const services = parsed.ok ? parsed.composition.services : {};

    return {
      ref: this.refFor(id, path.basename(location.composePath), services),
      images: parsed.ok ? parsed.composition.images : parsed.images,
    };
  }

  private refFor(id: string, composeFile: string, services: Record<string, number>): EnvironmentRef {
    const dir = path.join(this.catalogRoot, id);
    return {
      id,
      dir,
      composePath: path.join(dir, composeFile),
      ports: uniqueInOrder(Object.values(services)),
    };
  }

  private runtimeFailure(err: unknown, envId?: string): OperationFailure {
    const message = formatErrorMessage(err);
    if (err instanceof RuntimeUnavailableError) {
      logConsoleEvent(this.logger, "runtime.unavailable", {
        message,
        ...(envId ? { envId } : {}),
      });
      return failure("runtime_unavailable", message);
    }
    return failure("failed", message);
  }

  private isoNow(): string {
    return new Date(this.clock()).toISOString();
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function applyContainerState(env: EnvironmentDescriptor, state: ContainerState): void {
  env.status = state.status;
  if (state.status === "running") {
    env.services = { ...env.services, ...state.services };
  }
}
