import { RuntimeUnavailableError } from "../../core/errors.js";
import type { EventLog, LogEventInput } from "../../core/logger.js";
import type {
  ContainerState,
  EnvironmentRef,
  RunningContainer,
  RuntimeProbe,
  RuntimeStartResult,
  RuntimeStopResult,
} from "../../engine/ports.js";

// =============================================================================
// FAKE PROBE
// =============================================================================

type ProbeCall =
  | { method: "imagesPresent"; refs: string[] }
  | { method: "containerState"; id: string }
  | { method: "containerStates"; ids: string[] }
  | { method: "start"; id: string }
  | { method: "stop"; id: string }
  | { method: "pullImage"; ref: string }
  | { method: "runningContainers" };

/**
 * In-memory runtime: a set of local images and a table of running environments.
 * `start` publishes the environment's declared ports, refusing ports another running
 * environment already holds.
 */
export class FakeRuntimeProbe implements RuntimeProbe {
  readonly calls: ProbeCall[] = [];
  readonly images = new Set<string>();
  readonly running = new Map<string, { container: string; services: Record<string, number> }>();
  // Lines each pulled image reports; a ref listed in `failPulls` throws after them.
  readonly pullOutput = new Map<string, string[]>();
  readonly failPulls = new Set<string>();
  unavailable = false;
  // Resolves held start calls when set; lets tests observe an in-flight operation.
  gate: Promise<void> | null = null;

  callsTo(method: ProbeCall["method"]): ProbeCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  async imagesPresent(refs: readonly string[]): Promise<Map<string, boolean>> {
    this.calls.push({ method: "imagesPresent", refs: [...refs] });
    this.assertAvailable();
    return new Map(refs.map((ref) => [ref, this.images.has(ref)]));
  }

  async containerState(env: EnvironmentRef): Promise<ContainerState> {
    this.calls.push({ method: "containerState", id: env.id });
    this.assertAvailable();
    return this.stateOf(env.id);
  }

  async containerStates(envs: readonly EnvironmentRef[]): Promise<Map<string, ContainerState>> {
    this.calls.push({ method: "containerStates", ids: envs.map((env) => env.id) });
    this.assertAvailable();
    return new Map(envs.map((env) => [env.id, this.stateOf(env.id)]));
  }

  async start(env: EnvironmentRef): Promise<RuntimeStartResult> {
    this.calls.push({ method: "start", id: env.id });
    if (this.gate) await this.gate;
    this.assertAvailable();

    if (this.running.has(env.id)) return { ok: true };

    const conflicting: string[] = [];
    const ports: number[] = [];
    for (const [otherId, other] of this.running) {
      if (otherId === env.id) continue;
      const overlap = Object.values(other.services).filter((port) => env.ports.includes(port));
      if (overlap.length > 0) {
        conflicting.push(other.container);
        ports.push(...overlap);
      }
    }
    if (conflicting.length > 0) {
      return {
        ok: false,
        portConflict: true,
        conflicting,
        ports,
        message: `Bind for 0.0.0.0:${ports[0]} failed: port is already allocated`,
      };
    }

    const services: Record<string, number> = {};
    env.ports.forEach((port, index) => {
      services[index === 0 ? "web" : `web${index + 1}`] = port;
    });
    this.running.set(env.id, { container: containerNameFor(env.id), services });
    return { ok: true };
  }

  async stop(env: EnvironmentRef): Promise<RuntimeStopResult> {
    this.calls.push({ method: "stop", id: env.id });
    this.assertAvailable();
    this.running.delete(env.id);
    return { ok: true };
  }

  async *pullImage(ref: string): AsyncGenerator<string> {
    this.calls.push({ method: "pullImage", ref });
    this.assertAvailable();
    for (const line of this.pullOutput.get(ref) ?? [`${ref}: Pull complete`]) {
      yield line;
    }
    if (this.failPulls.has(ref)) {
      throw new Error(`pull access denied for ${ref}`);
    }
    this.images.add(ref);
  }

  async runningContainers(): Promise<RunningContainer[]> {
    this.calls.push({ method: "runningContainers" });
    this.assertAvailable();
    return [...this.running.entries()].map(([id, entry]) => ({
      id: id.replace(/[^a-z0-9]/gi, "").slice(0, 12),
      name: entry.container,
      image: "example/image",
      status: "Up 1 minute",
      ports: Object.values(entry.services)
        .map((port) => `0.0.0.0:${port}->${port}/tcp`)
        .join(", "),
    }));
  }

  private stateOf(id: string): ContainerState {
    const entry = this.running.get(id);
    return entry
      ? { status: "running", services: { ...entry.services } }
      : { status: "stopped", services: {} };
  }

  private assertAvailable(): void {
    if (this.unavailable) {
      throw new RuntimeUnavailableError("Cannot connect to the Docker daemon");
    }
  }
}

export function containerNameFor(id: string): string {
  return `${id.replace("/", "-").toLowerCase()}-1`;
}

// =============================================================================
// RECORDING LOGGER
// =============================================================================

export class RecordingLogger implements EventLog {
  readonly events: LogEventInput[] = [];

  log(event: LogEventInput): void {
    this.events.push(event);
  }

  types(): string[] {
    return this.events.map((event) => event.type);
  }
}
