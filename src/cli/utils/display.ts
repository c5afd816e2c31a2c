/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import {
  BatchValidationError,
  ConfigError,
  describeIssue,
  errorMessage,
} from "../../errors.js";

import { CHANGE_TYPES } from "../../types/index.js";

import type { BuildSummary } from "../../services/build/index.js";
import type { ChangeType, IdMapEntry } from "../../types/index.js";
import type { Ora } from "ora";

const CHANGE_COLORS: Record<ChangeType, (text: string) => string> = {
  NEW: chalk.green,
  REACTIVATED: chalk.cyan,
  DEACTIVATED: chalk.yellow,
  UNCHANGED: chalk.gray,
};

/**
 * Display the result of a build
 */
export function displayBuildSummary(summary: BuildSummary): void {
  const table = new CliTable3({
    head: [chalk.cyan("Metric"), chalk.cyan("Value")],
  });

  table.push(
    ["Source", summary.origin],
    ["Spreadsheet rows", String(summary.records)],
    ["Clinic ids", String(summary.total)],
    ["Active", chalk.green(String(summary.active))],
    ["Inactive", chalk.gray(String(summary.inactive))]
  );
  for (const changeType of CHANGE_TYPES) {
    table.push([
      changeType,
      CHANGE_COLORS[changeType](String(summary.changes[changeType])),
    ]);
  }
  if (summary.outbox !== undefined) {
    table.push([
      "Outbox ZIPs",
      `${String(summary.outbox.zipsCreated)} / ${String(summary.outbox.targets)} targets`,
    ]);
  }

  console.log(table.toString());

  if (summary.newIds.length > 0) {
    console.log(chalk.bold("\nNew clinic ids:"));
    console.log(`  ${summary.newIds.join(", ")}`);
  }
}

/**
 * Display id-map entries in a formatted table
 */
export function displayClinicsTable(entries: readonly IdMapEntry[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Clinic ID"),
      chalk.cyan("Name"),
      chalk.cyan("Status"),
      chalk.cyan("Since"),
    ],
    colWidths: [14, 40, 10, 28],
    wordWrap: true,
  });

  for (const entry of entries) {
    table.push([
      chalk.green(entry.clinicId),
      entry.clinicName,
      entry.status === "ACTIVE" ? chalk.green(entry.status) : chalk.gray(entry.status),
      entry.statusChangedAt || chalk.gray("N/A"),
    ]);
  }

  console.log(table.toString());
}

/**
 * Fail the spinner and print everything the operator needs to fix the input
 */
export function reportFailure(spinner: Ora, error: unknown): void {
  if (error instanceof BatchValidationError) {
    spinner.fail(
      `Clinic batch rejected (${String(error.issues.length)} problem(s)), nothing was written`
    );
    for (const issue of error.issues) {
      console.error(`  ${chalk.red("✗")} ${describeIssue(issue)}`);
    }
  } else if (error instanceof ConfigError) {
    spinner.fail("Invalid config");
    for (const problem of error.problems) {
      console.error(`  ${chalk.red("✗")} ${problem}`);
    }
  } else {
    spinner.fail(`Failed: ${errorMessage(error)}`);
  }
  process.exitCode = 1;
}
