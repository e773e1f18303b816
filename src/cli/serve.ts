import type { AppContext } from "../app/context.js";
import { startApiServer } from "../ui/server.js";

export type ServeCommandOptions = {
  host?: string;
  port?: number;
};

export async function serveCommand(ctx: AppContext, opts: ServeCommandOptions): Promise<void> {
  const handle = await startApiServer({
    engine: ctx.engine,
    logger: ctx.logger,
    host: opts.host ?? ctx.config.server.host,
    port: opts.port ?? ctx.config.server.port,
  });

  console.log(`API listening on ${handle.url} (catalog: ${ctx.engine.catalogRoot})`);

  await new Promise<void>((resolve) => {
    const shutdown = (): void => {
      process.off("SIGINT", shutdown);
      process.off("SIGTERM", shutdown);
      resolve();
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  });

  await handle.close();
  await ctx.engine.idle();
}
