import { existsSync } from "node:fs";
import { join } from "node:path";

import fastifyStatic from "@fastify/static";
import Fastify, { type FastifyInstance } from "fastify";

import { fastifyLoggerConfig, serverLogger } from "../logger.js";
import { errorHandler } from "./plugins/error-handler.js";
import { registerApiRoutes } from "./routes/index.js";

import type { AppConfig } from "../config/index.js";
import type { IdMapStore } from "../services/registry/stores/index.js";

export interface PreviewServerOptions {
  store: IdMapStore;
  /** Defaults to the shared pino configuration */
  logger?: boolean;
}

/**
 * Fastify app serving the generated site plus a read-only id-map API.
 * The store is closed with the server, or right away when the server
 * cannot be created.
 */
export async function createPreviewServer(
  config: Pick<AppConfig, "siteRoot" | "pathPrefix">,
  options: PreviewServerOptions
): Promise<FastifyInstance> {
  try {
    if (!existsSync(config.siteRoot)) {
      throw new Error(`Site root not found: ${config.siteRoot} (run build first)`);
    }
    return await configure(config, options);
  } catch (error) {
    // The server owns the store; without a server nothing else closes it
    await options.store.close();
    throw error;
  }
}

async function configure(
  config: Pick<AppConfig, "siteRoot" | "pathPrefix">,
  options: PreviewServerOptions
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger === false ? false : fastifyLoggerConfig,
  });

  // Register error handler
  await app.register(errorHandler, {
    notFoundPage: join(config.siteRoot, "404.html"),
  });

  // Register API routes
  await registerApiRoutes(app, { store: options.store, config });

  // Static site (directory requests resolve to index.html)
  await app.register(fastifyStatic, {
    root: config.siteRoot,
    prefix: "/",
    redirect: true,
  });

  serverLogger.debug(
    { siteRoot: config.siteRoot, idMap: options.store.location },
    "Preview server configured"
  );

  app.addHook("onClose", async () => {
    await options.store.close();
  });

  return app;
}

export async function startPreviewServer(
  app: FastifyInstance,
  address: { port: number; host: string }
): Promise<string> {
  const url = await app.listen({ port: address.port, host: address.host });
  app.log.info({ host: address.host, port: address.port }, "Preview server started");
  return url;
}
