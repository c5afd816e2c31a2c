import ora from "ora";

import { loadConfig } from "../../config/index.js";
import { outputPaths } from "../../services/build/index.js";
import { buildDeliveryPackages } from "../../services/delivery/index.js";
import { readMappingReport } from "../../services/reports/index.js";
import { isoNow } from "../../utils/time.js";
import { reportFailure } from "../utils/display.js";

import type { Command } from "commander";

interface DeliverCommandOptions {
  config: string;
  mapping?: string;
}

/**
 * Rebuild delivery folders from a mapping report without touching the id map
 */
export function registerDeliverCommand(program: Command): void {
  program
    .command("deliver")
    .description("Rebuild per-clinic delivery folders from a mapping report")
    .requiredOption("-c, --config <path>", "Path to the JSON config file")
    .option("-m, --mapping <path>", "Mapping report to read (default: <outputRoot>/mapping.csv)")
    .action((options: DeliverCommandOptions) => {
      const spinner = ora("Reading mapping report...").start();

      try {
        const config = loadConfig(options.config, { allowMissingBaseUrl: true });
        const paths = outputPaths(config);
        const records = readMappingReport(options.mapping ?? paths.mappingPath);

        spinner.text = "Packaging deliveries...";
        const packages = buildDeliveryPackages(records, config, {
          deliveryRoot: paths.deliveryRoot,
          createdAt: isoNow(),
        });

        spinner.succeed(
          `Wrote ${String(packages.length)} delivery folder(s) to ${paths.deliveryRoot}`
        );
      } catch (error) {
        reportFailure(spinner, error);
      }
    });
}
