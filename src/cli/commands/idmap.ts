import chalk from "chalk";
import ora from "ora";

import { loadConfig } from "../../config/index.js";
import { createIdMapStore } from "../../services/registry/stores/index.js";
import { displayClinicsTable, reportFailure } from "../utils/display.js";
import { parseStatusFilter } from "../utils/options.js";

import type { IdMapStore } from "../../services/registry/stores/index.js";
import type { IdMapTable } from "../../types/index.js";
import type { Command } from "commander";

interface IdMapCommandOptions {
  config: string;
  status?: string;
}

async function withIdMap(
  configPath: string,
  message: string,
  handler: (table: IdMapTable, store: IdMapStore) => void
): Promise<void> {
  const spinner = ora(message).start();
  let store: IdMapStore | undefined;

  try {
    const config = loadConfig(configPath, { allowMissingBaseUrl: true });
    store = createIdMapStore(config);
    const table = await store.load();
    spinner.stop();
    handler(table, store);
  } catch (error) {
    reportFailure(spinner, error);
  } finally {
    await store?.close();
  }
}

// ============================================================================
// Id map Commands
// ============================================================================

export function registerIdMapCommand(program: Command): void {
  const idmap = program
    .command("idmap")
    .description("Inspect the persisted clinic id map");

  // idmap list
  idmap
    .command("list")
    .description("List every clinic id with its last known status")
    .requiredOption("-c, --config <path>", "Path to the JSON config file")
    .option("-s, --status <status>", "Only ACTIVE or INACTIVE clinics")
    .action(async (options: IdMapCommandOptions) => {
      await withIdMap(options.config, "Loading id map...", (table) => {
        const status = parseStatusFilter(options.status);
        const entries =
          status === undefined
            ? table.entries
            : table.entries.filter((entry) => entry.status === status);

        if (entries.length === 0) {
          console.log(chalk.yellow("No clinic ids found"));
          return;
        }

        displayClinicsTable(entries);
        console.log(chalk.gray(`\n${String(entries.length)} of ${String(table.entries.length)} clinic id(s)`));
      });
    });

  // idmap verify
  idmap
    .command("verify")
    .description("Check the id map for duplicate ids or names")
    .requiredOption("-c, --config <path>", "Path to the JSON config file")
    .action(async (options: IdMapCommandOptions) => {
      await withIdMap(options.config, "Verifying id map...", (table, store) => {
        const active = table.entries.filter((entry) => entry.status === "ACTIVE").length;
        console.log(`${chalk.green("✓")} ${store.location}`);
        console.log(`  Entries:  ${String(table.entries.length)}`);
        console.log(`  Active:   ${String(active)}`);
        console.log(`  Inactive: ${String(table.entries.length - active)}`);
        console.log(`  Revision: ${table.revision.slice(0, 12)}`);
      });
    });
}
