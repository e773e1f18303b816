import Docker from "dockerode";

import { DockerError, RuntimeUnavailableError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export const COMPOSE_WORKING_DIR_LABEL = "com.docker.compose.project.working_dir";
export const COMPOSE_SERVICE_LABEL = "com.docker.compose.service";

export type ContainerPort = {
  IP?: string;
  PrivatePort: number;
  PublicPort?: number;
  Type: string;
};

// The subset of a container listing entry the console reads.
export type ContainerSummary = {
  Id: string;
  Names: string[];
  Image: string;
  State: string;
  Status: string;
  Labels: Record<string, string>;
  Ports: ContainerPort[];
};

// The subset of the dockerode client the console calls.
export type DockerApi = {
  getImage(name: string): { inspect(): Promise<unknown> };
  listContainers(opts?: { all?: boolean }): Promise<ContainerSummary[]>;
};

type DockerErrorDetails = {
  message: string;
  code?: string;
  reason?: string;
  statusCode?: number;
};

// =============================================================================
// CLIENT HELPERS
// =============================================================================

export function dockerClient(): Docker {
  return new Docker();
}

export async function imageExists(docker: DockerApi, imageName: string): Promise<boolean> {
  try {
    await docker.getImage(imageName).inspect();
    return true;
  } catch (err) {
    // Only "no such image" means absent; anything else is a runtime fault.
    if (resolveDockerErrorDetails(err).statusCode === 404) return false;
    throw toRuntimeError("inspect image", err);
  }
}

export async function listContainers(
  docker: DockerApi,
  opts: { all: boolean },
): Promise<ContainerSummary[]> {
  try {
    return await docker.listContainers({ all: opts.all });
  } catch (err) {
    throw toRuntimeError("list containers", err);
  }
}

export function containerName(container: ContainerSummary): string {
  const name = container.Names[0] ?? container.Id.slice(0, 12);
  return name.startsWith("/") ? name.slice(1) : name;
}

export function publishedPorts(container: ContainerSummary): number[] {
  const ports: number[] = [];
  for (const port of container.Ports) {
    if (port.PublicPort !== undefined && !ports.includes(port.PublicPort)) {
      ports.push(port.PublicPort);
    }
  }
  return ports;
}

/** `0.0.0.0:8080->80/tcp, 443/tcp` style summary, IPv6 duplicates dropped. */
export function formatPorts(container: ContainerSummary): string {
  const parts: string[] = [];
  for (const port of container.Ports) {
    const text =
      port.PublicPort !== undefined
        ? `${port.IP && !port.IP.includes(":") ? port.IP : "0.0.0.0"}:${port.PublicPort}->${port.PrivatePort}/${port.Type}`
        : `${port.PrivatePort}/${port.Type}`;
    if (!parts.includes(text)) parts.push(text);
  }
  return parts.join(", ");
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

export function toRuntimeError(action: string, err: unknown): RuntimeUnavailableError | DockerError {
  const details = resolveDockerErrorDetails(err);
  const detail = details.reason || details.message || "Unknown docker error.";

  if (isDockerUnavailableError(details)) {
    return new RuntimeUnavailableError(`Docker is not reachable (${action}): ${detail}`, err);
  }
  return new DockerError(`Failed to ${action}: ${detail}`, err);
}

export function resolveDockerErrorDetails(err: unknown): DockerErrorDetails {
  if (!err || typeof err !== "object") {
    return { message: String(err) };
  }

  const message = "message" in err && typeof err.message === "string" ? err.message : String(err);
  const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
  const reason = "reason" in err && typeof err.reason === "string" ? err.reason : undefined;
  const statusCode =
    "statusCode" in err && typeof err.statusCode === "number" ? err.statusCode : undefined;

  return { message, code, reason, statusCode };
}

export function isDockerUnavailableError(details: { message: string; code?: string; stderr?: string }): boolean {
  if (details.code === "ENOENT" || details.code === "ECONNREFUSED" || details.code === "EACCES") {
    return true;
  }

  const text = `${details.message}\n${details.stderr ?? ""}`.toLowerCase();
  return (
    text.includes("cannot connect to the docker daemon") ||
    text.includes("is the docker daemon running") ||
    text.includes("error during connect") ||
    text.includes("docker.sock") ||
    text.includes("connect econnrefused") ||
    text.includes("connect enoent")
  );
}
