#!/usr/bin/env node

/**
 * Dental clinic QR CLI
 *
 * Keeps the clinic id map in step with the association's spreadsheet and
 * generates the landing pages, QR images and delivery packages.
 */

import { Command } from "commander";

import { registerBuildCommand } from "./commands/build.js";
import { registerDeliverCommand } from "./commands/deliver.js";
import { registerIdMapCommand } from "./commands/idmap.js";
import { registerPreviewCommand } from "./commands/preview.js";

const program = new Command();

program
  .name("dental-qr")
  .description("Dental clinic QR pages: id map, static site and delivery packages")
  .version("0.1.0");

registerBuildCommand(program);
registerPreviewCommand(program);
registerDeliverCommand(program);
registerIdMapCommand(program);

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
