import ora from "ora";

import { loadConfig } from "../../config/index.js";
import { createPreviewServer, startPreviewServer } from "../../server/index.js";
import { createIdMapStore } from "../../services/registry/stores/index.js";
import { reportFailure } from "../utils/display.js";
import { parsePort } from "../utils/options.js";

import type { Command } from "commander";
import type { FastifyInstance } from "fastify";

interface PreviewCommandOptions {
  config: string;
  port: string;
  host: string;
}

export function registerPreviewCommand(program: Command): void {
  program
    .command("preview")
    .description("Serve the generated site locally")
    .requiredOption("-c, --config <path>", "Path to the JSON config file")
    .option("-p, --port <number>", "Port to listen on", "8000")
    .option("--host <host>", "Interface to bind", "127.0.0.1")
    .action(async (options: PreviewCommandOptions) => {
      const spinner = ora("Starting preview server...").start();
      let app: FastifyInstance | undefined;

      try {
        const port = parsePort(options.port);
        const config = loadConfig(options.config, { allowMissingBaseUrl: true });
        app = await createPreviewServer(config, {
          store: createIdMapStore(config),
        });
        const url = await startPreviewServer(app, { port, host: options.host });

        spinner.succeed(`Serving ${config.siteRoot} at ${url}`);
      } catch (error) {
        reportFailure(spinner, error);
        // Closes the id map store with it
        await app?.close();
      }
    });
}
