import http from "node:http";

import type { EventLog } from "../core/logger.js";
import type { ReconciliationEngine } from "../engine/reconciler.js";

import { createApiRouter } from "./router.js";

// =============================================================================
// TYPES
// =============================================================================

export type StartApiServerOptions = {
  engine: ReconciliationEngine;
  logger?: EventLog;
  host?: string;
  port?: number;
};

export type ApiServerHandle = {
  url: string;
  close: () => Promise<void>;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function startApiServer(options: StartApiServerOptions): Promise<ApiServerHandle> {
  const port = options.port ?? 0;
  if (!Number.isInteger(port) || port < 0) {
    throw new Error("Port must be a non-negative integer.");
  }
  const host = options.host ?? "127.0.0.1";

  const router = createApiRouter({ engine: options.engine, logger: options.logger });
  const server = http.createServer((req, res) => router(req, res));
  await listen(server, host, port);

  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Unable to determine API server address.");
  }

  const urlHost = address.family === "IPv6" ? `[${address.address}]` : address.address;
  return {
    url: `http://${urlHost}:${address.port}`,
    close: () => closeServer(server),
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function listen(server: http.Server, host: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      server.off("error", onError);
      reject(err);
    };

    server.once("error", onError);
    server.listen({ host, port }, () => {
      server.off("error", onError);
      resolve();
    });
  });
}

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.closeAllConnections();
    server.close((err) => {
      if (err) {
        reject(err);
        return;
      }
      resolve();
    });
  });
}
