import path from "node:path";

import { RuntimeUnavailableError } from "../core/errors.js";
import { logConsoleEvent, type EventLog } from "../core/logger.js";
import type {
  ContainerState,
  EnvironmentRef,
  RunningContainer,
  RuntimeProbe,
  RuntimeStartResult,
  RuntimeStopResult,
} from "../engine/ports.js";

import {
  classifyComposeFailure,
  composeDown,
  composeUp,
  detectComposeCommand,
  runCommand,
  streamCommandLines,
  type CommandResult,
  type CommandRunner,
  type LineStreamer,
} from "./compose.js";
import {
  COMPOSE_SERVICE_LABEL,
  COMPOSE_WORKING_DIR_LABEL,
  containerName,
  dockerClient,
  formatPorts,
  imageExists,
  isDockerUnavailableError,
  listContainers,
  publishedPorts,
  type ContainerSummary,
  type DockerApi,
} from "./docker.js";

// =============================================================================
// TYPES
// =============================================================================

export type DockerRuntimeProbeOptions = {
  docker?: DockerApi;
  run?: CommandRunner;
  streamLines?: LineStreamer;
  // Empty or absent: detect on first use.
  composeCommand?: readonly string[];
  commandTimeoutMs?: number;
  logger?: EventLog;
};

const IMAGE_INSPECT_CONCURRENCY = 16;

// =============================================================================
// PROBE
// =============================================================================

export class DockerRuntimeProbe implements RuntimeProbe {
  private readonly docker: DockerApi;
  private readonly run: CommandRunner;
  private readonly streamLines: LineStreamer;
  private composeCommand: Promise<string[]> | null;

  constructor(private readonly opts: DockerRuntimeProbeOptions = {}) {
    this.docker = opts.docker ?? dockerClient();
    this.run = opts.run ?? runCommand;
    this.streamLines = opts.streamLines ?? streamCommandLines;
    this.composeCommand =
      opts.composeCommand && opts.composeCommand.length > 0
        ? Promise.resolve([...opts.composeCommand])
        : null;
  }

  async imagesPresent(refs: readonly string[]): Promise<Map<string, boolean>> {
    const unique = [...new Set(refs)];
    const present = new Map<string, boolean>();

    for (let offset = 0; offset < unique.length; offset += IMAGE_INSPECT_CONCURRENCY) {
      const chunk = unique.slice(offset, offset + IMAGE_INSPECT_CONCURRENCY);
      const results = await Promise.all(chunk.map((ref) => imageExists(this.docker, ref)));
      chunk.forEach((ref, index) => present.set(ref, results[index] === true));
    }

    return present;
  }

  async containerState(env: EnvironmentRef): Promise<ContainerState> {
    const states = await this.containerStates([env]);
    return states.get(env.id) ?? { status: "stopped", services: {} };
  }

  async containerStates(envs: readonly EnvironmentRef[]): Promise<Map<string, ContainerState>> {
    const containers = await listContainers(this.docker, { all: true });
    const byDir = groupByWorkingDir(containers);

    const states = new Map<string, ContainerState>();
    for (const env of envs) {
      states.set(env.id, stateOf(byDir.get(path.resolve(env.dir)) ?? []));
    }
    return states;
  }

  async start(env: EnvironmentRef): Promise<RuntimeStartResult> {
    const conflict = await this.findPortConflict(env);
    if (conflict) {
      return {
        ok: false,
        portConflict: true,
        ports: conflict.ports,
        conflicting: conflict.containers,
        message: `Port ${conflict.ports.join(", ")} already in use by ${conflict.containers.join(", ")}`,
      };
    }

    const result = await composeUp(this.run, await this.resolveComposeCommand(), env, {
      timeoutMs: this.opts.commandTimeoutMs,
    });
    if (result.exitCode === 0) return { ok: true };

    this.throwIfUnavailable(result);
    const failure = classifyComposeFailure(result);
    if (failure.portConflict) {
      const ports = failure.ports.length > 0 ? failure.ports : env.ports;
      const holders = await this.containersPublishing(ports, env.dir);
      return {
        ok: false,
        portConflict: true,
        ports,
        conflicting: holders,
        message: failure.message,
      };
    }

    return { ok: false, portConflict: false, ports: [], conflicting: [], message: failure.message };
  }

  async stop(env: EnvironmentRef): Promise<RuntimeStopResult> {
    const result = await composeDown(this.run, await this.resolveComposeCommand(), env, {
      timeoutMs: this.opts.commandTimeoutMs,
    });
    if (result.exitCode === 0) return { ok: true };

    this.throwIfUnavailable(result);
    return { ok: false, message: classifyComposeFailure(result).message };
  }

  pullImage(ref: string): AsyncIterable<string> {
    return this.streamLines("docker", ["pull", ref]);
  }

  async runningContainers(): Promise<RunningContainer[]> {
    const containers = await listContainers(this.docker, { all: false });
    return containers.map((container) => ({
      id: container.Id.slice(0, 12),
      name: containerName(container),
      image: container.Image,
      status: container.Status,
      ports: formatPorts(container),
    }));
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private resolveComposeCommand(): Promise<string[]> {
    if (!this.composeCommand) {
      const detecting = detectComposeCommand(this.run);
      this.composeCommand = detecting;
      // A failed detection is retried on the next call.
      void detecting.then(
        (command) => {
          logConsoleEvent(this.opts.logger, "runtime.compose.detected", { command });
        },
        () => {
          if (this.composeCommand === detecting) this.composeCommand = null;
        },
      );
    }
    return this.composeCommand;
  }

  private async findPortConflict(
    env: EnvironmentRef,
  ): Promise<{ ports: number[]; containers: string[] } | null> {
    if (env.ports.length === 0) return null;

    const running = await listContainers(this.docker, { all: false });
    const ownDir = path.resolve(env.dir);
    const ports: number[] = [];
    const containers: string[] = [];

    for (const container of running) {
      if (container.Labels[COMPOSE_WORKING_DIR_LABEL] === ownDir) continue;
      const overlap = publishedPorts(container).filter((port) => env.ports.includes(port));
      if (overlap.length === 0) continue;
      containers.push(containerName(container));
      for (const port of overlap) if (!ports.includes(port)) ports.push(port);
    }

    return containers.length > 0 ? { ports: ports.sort((a, b) => a - b), containers } : null;
  }

  private async containersPublishing(ports: readonly number[], ownDir: string): Promise<string[]> {
    const running = await listContainers(this.docker, { all: false });
    const resolved = path.resolve(ownDir);
    return running
      .filter((container) => container.Labels[COMPOSE_WORKING_DIR_LABEL] !== resolved)
      .filter((container) => publishedPorts(container).some((port) => ports.includes(port)))
      .map(containerName);
  }

  private throwIfUnavailable(result: CommandResult): void {
    const details = { message: result.stdout, stderr: result.stderr };
    if (isDockerUnavailableError(details)) {
      throw new RuntimeUnavailableError(
        `Docker is not reachable: ${result.stderr.trim() || result.stdout.trim()}`,
      );
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function groupByWorkingDir(containers: readonly ContainerSummary[]): Map<string, ContainerSummary[]> {
  const byDir = new Map<string, ContainerSummary[]>();
  for (const container of containers) {
    const dir = container.Labels[COMPOSE_WORKING_DIR_LABEL];
    if (!dir) continue;
    const key = path.resolve(dir);
    const list = byDir.get(key) ?? [];
    list.push(container);
    byDir.set(key, list);
  }
  return byDir;
}

function stateOf(containers: readonly ContainerSummary[]): ContainerState {
  const running = containers.filter((container) => container.State === "running");
  if (running.length === 0) {
    return { status: "stopped", services: {} };
  }

  const services: Record<string, number> = {};
  for (const container of running) {
    const service = container.Labels[COMPOSE_SERVICE_LABEL];
    const port = publishedPorts(container)[0];
    if (service && port !== undefined && services[service] === undefined) {
      services[service] = port;
    }
  }
  return { status: "running", services };
}
