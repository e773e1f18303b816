/**
 * Engine ports define the boundary between the reconciler and the container runtime.
 * Purpose: keep the cache engine independent of how the runtime is driven.
 * Assumptions: every call may be slow, and every call may throw RuntimeUnavailableError
 * when the runtime cannot be reached.
 * Usage: DockerRuntimeProbe in production, FakeRuntimeProbe in tests.
 */

import type { EnvironmentStatus } from "../catalog/types.js";

// =============================================================================
// TYPES
// =============================================================================

export type EnvironmentRef = {
  id: string;
  dir: string;
  composePath: string;
  // Host ports the composition file asks for.
  ports: number[];
};

export type ContainerState = {
  status: Exclude<EnvironmentStatus, "unknown">;
  // service -> published host port, for running containers only.
  services: Record<string, number>;
};

export type RuntimeStartResult =
  | { ok: true }
  | {
      ok: false;
      portConflict: boolean;
      // Names of the containers holding the requested ports.
      conflicting: string[];
      ports: number[];
      message: string;
    };

export type RuntimeStopResult = { ok: true } | { ok: false; message: string };

export type RunningContainer = {
  id: string;
  name: string;
  image: string;
  status: string;
  ports: string;
};

// =============================================================================
// PORTS
// =============================================================================

export interface RuntimeProbe {
  imagesPresent(refs: readonly string[]): Promise<Map<string, boolean>>;
  containerState(env: EnvironmentRef): Promise<ContainerState>;
  // One runtime query for many environments; missing ids are stopped.
  containerStates(envs: readonly EnvironmentRef[]): Promise<Map<string, ContainerState>>;
  // Idempotent: starting a running environment succeeds.
  start(env: EnvironmentRef): Promise<RuntimeStartResult>;
  // Idempotent: stopping a stopped environment succeeds.
  stop(env: EnvironmentRef): Promise<RuntimeStopResult>;
  // Yields progress lines; throws when the pull fails.
  pullImage(ref: string): AsyncIterable<string>;
  runningContainers(): Promise<RunningContainer[]>;
}
