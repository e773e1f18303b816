import net from "node:net";

import type { ReadyCheckResult } from "./results.js";

export type PortConnector = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

export type WaitReadyOptions = {
  host?: string;
  timeoutMs: number;
  intervalMs?: number;
  connect?: PortConnector;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

const DEFAULT_INTERVAL_MS = 1_000;
const ATTEMPT_TIMEOUT_MS = 1_000;

export const tcpConnect: PortConnector = (host, port, timeoutMs) =>
  new Promise((resolve) => {
    const socket = net.connect({ host, port });
    const finish = (accepted: boolean): void => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(accepted);
    };
    socket.setTimeout(timeoutMs);
    socket.once("connect", () => finish(true));
    socket.once("timeout", () => finish(false));
    socket.once("error", () => finish(false));
  });

/** Polls `port` until it accepts a TCP connection or the deadline passes. */
export async function waitForPort(port: number, opts: WaitReadyOptions): Promise<ReadyCheckResult> {
  const host = opts.host ?? "127.0.0.1";
  const connect = opts.connect ?? tcpConnect;
  const sleep = opts.sleep ?? defaultSleep;
  const now = opts.now ?? Date.now;
  const interval = opts.intervalMs ?? DEFAULT_INTERVAL_MS;
  const deadline = now() + opts.timeoutMs;

  for (;;) {
    if (await connect(host, port, ATTEMPT_TIMEOUT_MS)) {
      return { ready: true, port };
    }
    if (now() + interval > deadline) {
      return { ready: false, port };
    }
    await sleep(interval);
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
