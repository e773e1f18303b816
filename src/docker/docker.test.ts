import { describe, expect, it } from "vitest";

import { composeContainer, RecordingDocker } from "../__tests__/helpers/fake-docker.js";
import { DockerError, RuntimeUnavailableError } from "../core/errors.js";

import {
  containerName,
  formatPorts,
  imageExists,
  isDockerUnavailableError,
  listContainers,
  publishedPorts,
  toRuntimeError,
  type ContainerSummary,
} from "./docker.js";

function dualStackContainer(): ContainerSummary {
  return {
    ...composeContainer({ name: "web-1", dir: "/catalog/nginx/x", service: "web" }),
    Ports: [
      { IP: "0.0.0.0", PrivatePort: 80, PublicPort: 8080, Type: "tcp" },
      { IP: "::", PrivatePort: 80, PublicPort: 8080, Type: "tcp" },
      { PrivatePort: 443, Type: "tcp" },
    ],
  };
}

describe("container summaries", () => {
  it("strips the leading slash from names and falls back to the short id", () => {
    const container = composeContainer({ name: "web-1", dir: "/d", service: "web" });

    expect(containerName(container)).toBe("web-1");
    expect(containerName({ ...container, Names: [] })).toBe(container.Id.slice(0, 12));
  });

  it("lists each published port once", () => {
    expect(publishedPorts(dualStackContainer())).toEqual([8080]);
  });

  it("formats ports the way docker ps does, without IPv6 duplicates", () => {
    expect(formatPorts(dualStackContainer())).toBe("0.0.0.0:8080->80/tcp, 443/tcp");
  });
});

describe("imageExists", () => {
  it("is true for a local image and false for a missing one", async () => {
    const docker = new RecordingDocker();
    docker.images.add("example/web:1.0");

    expect(await imageExists(docker, "example/web:1.0")).toBe(true);
    expect(await imageExists(docker, "example/web:2.0")).toBe(false);
  });

  it("throws RuntimeUnavailableError when the daemon cannot be reached", async () => {
    const docker = new RecordingDocker();
    docker.failure = new Error("connect ENOENT /var/run/docker.sock");

    await expect(imageExists(docker, "example/web:1.0")).rejects.toBeInstanceOf(
      RuntimeUnavailableError,
    );
  });

  it("reports a daemon-side failure instead of a missing image", async () => {
    const docker = new RecordingDocker();
    docker.failure = Object.assign(new Error("(HTTP code 500) server error"), {
      statusCode: 500,
      reason: "server error",
    });

    const outcome = imageExists(docker, "example/web:1.0");

    await expect(outcome).rejects.toBeInstanceOf(DockerError);
    await expect(outcome).rejects.toThrow("Failed to inspect image: server error");
  });
});

describe("listContainers", () => {
  it("passes the all flag through", async () => {
    const docker = new RecordingDocker();

    await listContainers(docker, { all: true });

    expect(docker.listCalls).toEqual([{ all: true }]);
  });

  it("wraps a refused connection as RuntimeUnavailableError", async () => {
    const docker = new RecordingDocker();
    docker.failure = Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });

    await expect(listContainers(docker, { all: false })).rejects.toThrow(
      "Docker is not reachable (list containers): connect ECONNREFUSED",
    );
  });
});

describe("toRuntimeError", () => {
  it("prefers the API reason over the raw message", () => {
    const error = toRuntimeError("inspect image", { message: "HTTP 500", reason: "server error" });

    expect(error).toBeInstanceOf(DockerError);
    expect(error.message).toBe("Failed to inspect image: server error");
  });
});

describe("isDockerUnavailableError", () => {
  it.each([
    [{ message: "spawn docker ENOENT", code: "ENOENT" }, true],
    [{ message: "exit 1", stderr: "Cannot connect to the Docker daemon at unix:///var/run/docker.sock." }, true],
    [{ message: "error during connect: Get http://localhost" }, true],
    [{ message: "no such image" }, false],
  ])("%o -> %s", (details, expected) => {
    expect(isDockerUnavailableError(details)).toBe(expected);
  });
});
