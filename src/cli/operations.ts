import type { AppContext } from "../app/context.js";

import { formatFailure, formatServices } from "./format.js";

export async function startCommand(ctx: AppContext, id: string): Promise<void> {
  const result = await ctx.engine.start(id);
  if (!result.ok) {
    reportFailure(formatFailure(id, result.error));
    return;
  }

  const ports = result.environment ? formatServices(result.environment.services) : "";
  console.log(ports ? `Started ${id} (${ports})` : `Started ${id}`);
}

export async function stopCommand(ctx: AppContext, id: string): Promise<void> {
  const result = await ctx.engine.stop(id);
  if (!result.ok) {
    reportFailure(formatFailure(id, result.error));
    return;
  }
  console.log(`Stopped ${id}`);
}

export async function imagesCommand(ctx: AppContext, id: string): Promise<void> {
  const result = await ctx.engine.checkImages(id);
  if (!result.ok) {
    reportFailure(formatFailure(id, result.error));
    return;
  }

  for (const image of result.images) {
    console.log(`${result.missing.includes(image) ? "missing" : "present"}  ${image}`);
  }
  if (result.images.length === 0) {
    console.log(`${id} declares no images.`);
  }
}

export async function pullCommand(ctx: AppContext, id: string): Promise<void> {
  for await (const event of ctx.engine.pullImages(id)) {
    switch (event.type) {
      case "log":
        console.log(event.line);
        break;
      case "done":
        console.log(event.message);
        break;
      case "error":
        reportFailure(formatFailure(id, event.error));
        break;
    }
  }
}

export async function waitCommand(ctx: AppContext, id: string, timeoutSeconds: number): Promise<void> {
  const result = await ctx.engine.waitReady(id, timeoutSeconds * 1_000);
  if (result.ready) {
    console.log(`${id} is accepting connections on port ${result.port}.`);
    return;
  }

  const where = result.port === undefined ? "no published port" : `port ${result.port}`;
  reportFailure([`${id} was not ready after ${timeoutSeconds}s (${where}).`]);
}

function reportFailure(lines: string[]): void {
  for (const line of lines) console.error(line);
  process.exitCode = 1;
}
