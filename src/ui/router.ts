import type { IncomingMessage, ServerResponse } from "node:http";

import { z } from "zod";

import { formatErrorMessage } from "../core/error-format.js";
import { logConsoleEvent, type EventLog } from "../core/logger.js";
import type { ReconciliationEngine } from "../engine/reconciler.js";
import type { ProgressEvent } from "../engine/results.js";

import {
  buildApiErrorPayload,
  buildFailurePayload,
  buildInternalErrorDetails,
  statusForFailure,
} from "./http/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ApiRouterOptions = {
  engine: ReconciliationEngine;
  logger?: EventLog;
  // Upper bound for /api/wait-ready, in seconds.
  maxWaitSeconds?: number;
};

type ApiRouteMatch =
  | { type: "environments" }
  | { type: "refresh" }
  | { type: "stats" }
  | { type: "environment"; id: string }
  | { type: "start" }
  | { type: "stop" }
  | { type: "check_images" }
  | { type: "pull_stream" }
  | { type: "wait_ready" }
  | { type: "running" }
  | { type: "bad_request" }
  | { type: "not_found" };

type OptionalNumberParseResult = { ok: true; value: number | null } | { ok: false };

type BodyParseResult = { ok: true; id: string } | { ok: false; message: string };

const IdBodySchema = z.object({ id: z.string().min(1) });

const MAX_BODY_BYTES = 64 * 1024;
const DEFAULT_WAIT_SECONDS = 60;
const DEFAULT_MAX_WAIT_SECONDS = 600;

// =============================================================================
// PUBLIC API
// =============================================================================

export function createApiRouter(
  options: ApiRouterOptions,
): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    void routeRequest(req, res, options);
  };
}

// =============================================================================
// ROUTING
// =============================================================================

async function routeRequest(
  req: IncomingMessage,
  res: ServerResponse,
  options: ApiRouterOptions,
): Promise<void> {
  const rawUrl = req.url ?? "/";
  const method = (req.method ?? "GET").toUpperCase();

  let url: URL;
  try {
    url = new URL(rawUrl, "http://127.0.0.1");
  } catch {
    sendApiError(res, 400, "bad_request", "Malformed request URL.", method === "HEAD");
    return;
  }

  try {
    await handleApiRequest(req, res, method, url, options);
  } catch (err) {
    logConsoleEvent(options.logger, "api.error", {
      path: url.pathname,
      message: formatErrorMessage(err),
    });

    if (res.headersSent) {
      res.end();
      return;
    }

    sendJson(
      res,
      500,
      buildApiErrorPayload({
        code: "internal_error",
        message: "Unexpected server error.",
        details: buildInternalErrorDetails(err),
      }),
      method === "HEAD",
    );
  }
}

async function handleApiRequest(
  req: IncomingMessage,
  res: ServerResponse,
  method: string,
  url: URL,
  options: ApiRouterOptions,
): Promise<void> {
  const isHead = method === "HEAD";
  const route = matchApiRoute(url.pathname);

  if (route.type === "not_found") {
    sendApiError(res, 404, "not_found", "Endpoint not found.", isHead);
    return;
  }
  if (route.type === "bad_request") {
    sendApiError(res, 400, "bad_request", "Invalid environment id.", isHead);
    return;
  }

  const expectsPost = route.type === "refresh" || route.type === "start" || route.type === "stop";
  if (expectsPost ? method !== "POST" : !isReadMethod(method)) {
    sendApiError(res, 405, "method_not_allowed", `Method ${method} not allowed.`, isHead);
    return;
  }

  const { engine } = options;

  switch (route.type) {
    case "environments": {
      const useCache = url.searchParams.get("cache") !== "false";
      const environments = await engine.getEnvironments({ forceRescan: !useCache });
      sendApiOk(res, environments, isHead);
      return;
    }
    case "refresh": {
      const environments = await engine.getEnvironments({ forceRescan: true });
      sendApiOk(res, { count: environments.length, environments }, false);
      return;
    }
    case "stats": {
      sendApiOk(res, await engine.stats(), isHead);
      return;
    }
    case "environment": {
      const view = await engine.describe(route.id);
      if (!view) {
        sendApiError(res, 404, "not_found", `Unknown environment: ${route.id}`, isHead);
        return;
      }
      sendApiOk(res, view, isHead);
      return;
    }
    case "start":
    case "stop": {
      const body = await readIdBody(req);
      if (!body.ok) {
        sendApiError(res, 400, "bad_request", body.message, false);
        return;
      }
      const result =
        route.type === "start" ? await engine.start(body.id) : await engine.stop(body.id);
      if (result.ok) {
        sendApiOk(res, result, false);
      } else {
        sendJson(res, statusForFailure(result.error.kind), buildFailurePayload(result.error), false);
      }
      return;
    }
    case "check_images": {
      const id = requireIdParam(url);
      if (!id) {
        sendApiError(res, 400, "bad_request", "Missing id parameter.", isHead);
        return;
      }
      const result = await engine.checkImages(id);
      if (result.ok) {
        sendApiOk(res, result, isHead);
      } else {
        sendJson(res, statusForFailure(result.error.kind), buildFailurePayload(result.error), isHead);
      }
      return;
    }
    case "pull_stream": {
      const id = requireIdParam(url);
      if (!id) {
        sendApiError(res, 400, "bad_request", "Missing id parameter.", isHead);
        return;
      }
      await streamProgress(res, engine.pullImages(id));
      return;
    }
    case "wait_ready": {
      const id = requireIdParam(url);
      const timeout = parseOptionalNonNegativeInteger(url.searchParams.get("timeout"));
      if (!id || !timeout.ok) {
        sendApiError(res, 400, "bad_request", "Expected id and a non-negative timeout.", isHead);
        return;
      }
      const maxSeconds = options.maxWaitSeconds ?? DEFAULT_MAX_WAIT_SECONDS;
      const seconds = Math.min(timeout.value ?? DEFAULT_WAIT_SECONDS, maxSeconds);
      sendApiOk(res, await engine.waitReady(id, seconds * 1_000), isHead);
      return;
    }
    case "running": {
      const result = await engine.runningContainers();
      if (result.ok) {
        sendApiOk(res, result.containers, isHead);
      } else {
        sendJson(res, statusForFailure(result.error.kind), buildFailurePayload(result.error), isHead);
      }
      return;
    }
  }
}

function matchApiRoute(pathname: string): ApiRouteMatch {
  switch (pathname) {
    case "/api/environments":
      return { type: "environments" };
    case "/api/refresh":
      return { type: "refresh" };
    case "/api/stats":
      return { type: "stats" };
    case "/api/start":
      return { type: "start" };
    case "/api/stop":
      return { type: "stop" };
    case "/api/check-images":
      return { type: "check_images" };
    case "/api/pull-stream":
      return { type: "pull_stream" };
    case "/api/wait-ready":
      return { type: "wait_ready" };
    case "/api/running":
      return { type: "running" };
  }

  const envPrefix = "/api/env/";
  if (pathname.startsWith(envPrefix)) {
    const id = safeDecodePath(pathname.slice(envPrefix.length));
    if (!id || id.split("/").length !== 2) return { type: "bad_request" };
    return { type: "environment", id };
  }

  return { type: "not_found" };
}

// =============================================================================
// STREAMING
// =============================================================================

async function streamProgress(
  res: ServerResponse,
  events: AsyncIterableIterator<ProgressEvent>,
): Promise<void> {
  res.statusCode = 200;
  res.setHeader("Content-Type", "text/event-stream; charset=utf-8");
  res.setHeader("Cache-Control", "no-store");
  res.setHeader("Connection", "keep-alive");
  res.flushHeaders();

  // The pull keeps running when the client goes away; only this subscription ends.
  const onClose = (): void => {
    void events.return?.();
  };
  res.on("close", onClose);

  try {
    for await (const event of events) {
      if (res.destroyed || res.writableEnded) break;
      res.write(formatSseEvent(event));
    }
  } finally {
    res.off("close", onClose);
    if (!res.writableEnded) res.end();
  }
}

export function formatSseEvent(event: ProgressEvent): string {
  const data =
    event.type === "log"
      ? { line: event.line }
      : event.type === "done"
        ? { message: event.message }
        : { message: event.message, error: event.error };
  return `event: ${event.type}\ndata: ${JSON.stringify(data)}\n\n`;
}

// =============================================================================
// RESPONSES
// =============================================================================

function sendApiOk(res: ServerResponse, result: unknown, isHead: boolean): void {
  sendJson(res, 200, { ok: true, result }, isHead);
}

function sendApiError(
  res: ServerResponse,
  status: number,
  code: "not_found" | "bad_request" | "method_not_allowed",
  message: string,
  isHead: boolean,
): void {
  sendJson(res, status, buildApiErrorPayload({ code, message }), isHead);
}

function sendJson(res: ServerResponse, status: number, payload: unknown, isHead: boolean): void {
  const body = JSON.stringify(payload);
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.setHeader("Cache-Control", "no-store");
  res.setHeader("Content-Length", Buffer.byteLength(body));

  if (isHead) {
    res.end();
    return;
  }

  res.end(body);
}

// =============================================================================
// REQUEST PARSING
// =============================================================================

async function readIdBody(req: IncomingMessage): Promise<BodyParseResult> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), "utf8");
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      return { ok: false, message: "Request body too large." };
    }
    chunks.push(buffer);
  }

  let doc: unknown;
  try {
    doc = JSON.parse(Buffer.concat(chunks).toString("utf8"));
  } catch {
    return { ok: false, message: "Request body must be JSON." };
  }

  const parsed = IdBodySchema.safeParse(doc);
  if (!parsed.success) {
    return { ok: false, message: 'Request body must be { "id": "<category>/<name>" }.' };
  }
  return { ok: true, id: parsed.data.id };
}

function requireIdParam(url: URL): string | null {
  const value = url.searchParams.get("id")?.trim();
  return value ? value : null;
}

function isReadMethod(method: string): boolean {
  return method === "GET" || method === "HEAD";
}

function safeDecodePath(value: string): string | null {
  try {
    const decoded = decodeURIComponent(value);
    return decoded.includes("\0") ? null : decoded;
  } catch {
    return null;
  }
}

function parseOptionalNonNegativeInteger(value: string | null): OptionalNumberParseResult {
  if (value === null) {
    return { ok: true, value: null };
  }

  const trimmed = value.trim();
  if (!trimmed) {
    return { ok: true, value: null };
  }

  if (!/^\d+$/.test(trimmed)) {
    return { ok: false };
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed)) {
    return { ok: false };
  }

  return { ok: true, value: parsed };
}
