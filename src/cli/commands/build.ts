import chalk from "chalk";
import ora from "ora";

import { loadConfig } from "../../config/index.js";
import { BuildPipeline } from "../../services/build/index.js";
import { createIdMapStore } from "../../services/registry/stores/index.js";
import { displayBuildSummary, reportFailure } from "../utils/display.js";

import type { IdMapStore } from "../../services/registry/stores/index.js";
import type { Command } from "commander";

interface BuildCommandOptions {
  config: string;
  skipQr?: boolean;
  ifChanged?: boolean;
  dryRun?: boolean;
}

// ============================================================================
// Build Command
// ============================================================================

export function registerBuildCommand(program: Command): void {
  program
    .command("build")
    .description("Reconcile the clinic spreadsheet and regenerate pages, QR images and reports")
    .requiredOption("-c, --config <path>", "Path to the JSON config file")
    .option("--skip-qr", "Skip QR images, delivery folders and the outbox")
    .option("--if-changed", "Do nothing when the spreadsheet is unchanged since the last build")
    .option("--dry-run", "Reconcile and print the summary without writing anything")
    .addHelpText(
      "after",
      `
Examples:
  dental-qr build --config config.json
  dental-qr build --config config.json --if-changed
  dental-qr build --config config.json --dry-run
`
    )
    .action(async (options: BuildCommandOptions) => {
      const spinner = ora("Loading config...").start();
      let store: IdMapStore | undefined;

      try {
        const skipQr = options.skipQr === true;
        const config = loadConfig(options.config, { allowMissingBaseUrl: skipQr });
        store = createIdMapStore(config);

        const pipeline = new BuildPipeline(config, store);
        pipeline.setProgressCallback((progress) => {
          spinner.text =
            progress.total > 0
              ? `${progress.phase}: ${String(progress.current)}/${String(progress.total)} (${progress.currentItem ?? ""})`
              : `${progress.phase}...`;
        });

        const summary = await pipeline.run({
          skipQr,
          ifChanged: options.ifChanged === true,
          dryRun: options.dryRun === true,
        });

        switch (summary.status) {
          case "unchanged":
            spinner.info("Spreadsheet unchanged since the last build, nothing to do");
            return;
          case "dry-run":
            spinner.succeed(chalk.yellow("Dry run complete, nothing was written"));
            break;
          case "built":
            spinner.succeed(`Built ${String(summary.total)} clinic page(s)`);
            break;
        }
        displayBuildSummary(summary);
      } catch (error) {
        reportFailure(spinner, error);
      } finally {
        await store?.close();
      }
    });
}
