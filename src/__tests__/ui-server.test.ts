import { afterEach, describe, expect, it } from "vitest";

import { formatSseEvent } from "../ui/router.js";
import { startApiServer, type ApiServerHandle } from "../ui/server.js";

import { createEngineHarness, type EngineHarness } from "./helpers/engine-harness.js";
import { containerNameFor } from "./helpers/fake-runtime-probe.js";

const REDIS = "redis/CVE-0000-0001";
const NGINX = "nginx/CVE-0000-0002";
const WEB_IMAGE = "example/web:1.0";

const servers: ApiServerHandle[] = [];
const harnesses: EngineHarness[] = [];

afterEach(async () => {
  for (const server of servers) {
    await server.close();
  }
  servers.length = 0;

  for (const harness of harnesses) {
    await harness.cleanup();
  }
  harnesses.length = 0;
});

// =============================================================================
// HELPERS
// =============================================================================

async function startServer(
  opts: Parameters<typeof createEngineHarness>[0] = {},
): Promise<{ harness: EngineHarness; url: string }> {
  const harness = await createEngineHarness(opts);
  harnesses.push(harness);
  await harness.catalog.addEnvironment(REDIS, {
    services: { web: { image: WEB_IMAGE, ports: ["6379:6379"] } },
  });
  await harness.catalog.addEnvironment(NGINX, {
    services: { web: { image: "example/nginx:1.0", ports: ["8080:80"] } },
  });

  const server = await startApiServer({ engine: harness.engine, logger: harness.logger });
  servers.push(server);
  return { harness, url: server.url };
}

async function getJson(url: string): Promise<{ status: number; body: unknown }> {
  const res = await fetch(url);
  const body: unknown = await res.json();
  return { status: res.status, body };
}

async function postJson(url: string, payload: string): Promise<{ status: number; body: unknown }> {
  const res = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: payload,
  });
  const body: unknown = await res.json();
  return { status: res.status, body };
}

// =============================================================================
// TESTS
// =============================================================================

describe("API server: listing", () => {
  it("lists environments, rescanning only when cache=false", async () => {
    const { harness, url } = await startServer();

    const first = await getJson(`${url}/api/environments`);
    const cached = await getJson(`${url}/api/environments`);
    const rescanned = await getJson(`${url}/api/environments?cache=false`);

    expect(first.status).toBe(200);
    expect(first.body).toMatchObject({ ok: true, result: [{ id: NGINX }, { id: REDIS }] });
    expect(cached.body).toEqual(first.body);
    expect(rescanned.status).toBe(200);
    expect(harness.probe.callsTo("containerStates")).toHaveLength(2);
  });

  it("refreshes and reports the count", async () => {
    const { url } = await startServer();

    const { status, body } = await postJson(`${url}/api/refresh`, "");

    expect(status).toBe(200);
    expect(body).toMatchObject({ ok: true, result: { count: 2 } });
  });

  it("returns stats", async () => {
    const { url } = await startServer();

    expect((await getJson(`${url}/api/stats`)).body).toEqual({
      ok: true,
      result: {
        total: 2,
        running: 0,
        stopped: 2,
        unknown: 0,
        with_exploit: 0,
        with_images: 0,
        categories: { nginx: 1, redis: 1 },
      },
    });
  });

  it("describes one environment and rejects malformed ids", async () => {
    const { url } = await startServer();

    const found = await getJson(`${url}/api/env/${REDIS}`);
    const unknown = await getJson(`${url}/api/env/redis/missing`);
    const malformed = await getJson(`${url}/api/env/redis`);

    expect(found.body).toMatchObject({ ok: true, result: { id: REDIS, cve: "CVE-0000-0001" } });
    expect(unknown.status).toBe(404);
    expect(malformed).toEqual({
      status: 400,
      body: { ok: false, error: { code: "bad_request", message: "Invalid environment id." } },
    });
  });
});

describe("API server: operations", () => {
  it("starts an environment", async () => {
    const { url } = await startServer();
    await getJson(`${url}/api/environments`);

    const { status, body } = await postJson(`${url}/api/start`, JSON.stringify({ id: REDIS }));

    expect(status).toBe(200);
    expect(body).toMatchObject({
      ok: true,
      result: { ok: true, id: REDIS, operation: "start", environment: { status: "running" } },
    });
  });

  it("reports a port conflict with its holders", async () => {
    const { harness, url } = await startServer();
    harness.probe.running.set("other/x", { container: "other-web-1", services: { web: 8080 } });

    const { status, body } = await postJson(`${url}/api/start`, JSON.stringify({ id: NGINX }));

    expect(status).toBe(409);
    expect(body).toEqual({
      ok: false,
      error: {
        code: "port_conflict",
        message: "Bind for 0.0.0.0:8080 failed: port is already allocated",
        details: { ports: [8080], conflicting: ["other-web-1"] },
      },
    });
  });

  it("stops an environment", async () => {
    const { harness, url } = await startServer();
    harness.probe.running.set(REDIS, { container: containerNameFor(REDIS), services: { web: 6379 } });

    const { status, body } = await postJson(`${url}/api/stop`, JSON.stringify({ id: REDIS }));

    expect(status).toBe(200);
    expect(body).toMatchObject({ ok: true, result: { ok: true, operation: "stop" } });
    expect(harness.probe.running.has(REDIS)).toBe(false);
  });

  it("rejects bad bodies and wrong methods", async () => {
    const { url } = await startServer();

    expect(await postJson(`${url}/api/start`, "{")).toEqual({
      status: 400,
      body: { ok: false, error: { code: "bad_request", message: "Request body must be JSON." } },
    });
    expect(await postJson(`${url}/api/start`, JSON.stringify({ name: REDIS }))).toEqual({
      status: 400,
      body: {
        ok: false,
        error: { code: "bad_request", message: 'Request body must be { "id": "<category>/<name>" }.' },
      },
    });
    expect(await getJson(`${url}/api/start`)).toEqual({
      status: 405,
      body: { ok: false, error: { code: "method_not_allowed", message: "Method GET not allowed." } },
    });
    expect((await getJson(`${url}/api/nowhere`)).status).toBe(404);
  });

  it("maps an unknown id to 404", async () => {
    const { url } = await startServer();

    const { status, body } = await postJson(`${url}/api/start`, JSON.stringify({ id: "nope/none" }));

    expect(status).toBe(404);
    expect(body).toEqual({
      ok: false,
      error: { code: "not_found", message: "Unknown environment: nope/none" },
    });
  });

  it("checks images", async () => {
    const { url } = await startServer();

    expect((await getJson(`${url}/api/check-images?id=${REDIS}`)).body).toEqual({
      ok: true,
      result: { ok: true, id: REDIS, images: [WEB_IMAGE], missing: [WEB_IMAGE] },
    });
    expect((await getJson(`${url}/api/check-images`)).status).toBe(400);
  });

  it("reports an unreachable runtime as 503", async () => {
    const { harness, url } = await startServer();
    harness.probe.unavailable = true;

    expect(await getJson(`${url}/api/running`)).toEqual({
      status: 503,
      body: {
        ok: false,
        error: { code: "runtime_unavailable", message: "Cannot connect to the Docker daemon" },
      },
    });
  });
});

describe("API server: progress and readiness", () => {
  it("streams a pull as server-sent events", async () => {
    const { url } = await startServer();
    await getJson(`${url}/api/environments`);

    const res = await fetch(`${url}/api/pull-stream?id=${REDIS}`);
    const text = await res.text();

    expect(res.headers.get("content-type")).toBe("text/event-stream; charset=utf-8");
    expect(text).toBe(
      [
        "event: log",
        `data: {"line":"Pulling ${WEB_IMAGE}"}`,
        "",
        "event: log",
        `data: {"line":"${WEB_IMAGE}: Pull complete"}`,
        "",
        "event: done",
        'data: {"message":"Pulled 1 image(s)"}',
        "",
        "",
      ].join("\n"),
    );
  });

  it("waits for the environment port", async () => {
    const { url } = await startServer({ readiness: { connect: async () => true } });

    expect((await getJson(`${url}/api/wait-ready?id=${REDIS}&timeout=0`)).body).toEqual({
      ok: true,
      result: { ready: true, port: 6379 },
    });
    expect((await getJson(`${url}/api/wait-ready?id=${REDIS}&timeout=soon`)).status).toBe(400);
  });
});

describe("formatSseEvent", () => {
  it("carries the structured failure on error events", () => {
    expect(
      formatSseEvent({
        type: "error",
        message: "busy",
        error: { kind: "busy", message: "busy" },
      }),
    ).toBe('event: error\ndata: {"message":"busy","error":{"kind":"busy","message":"busy"}}\n\n');
  });
});
