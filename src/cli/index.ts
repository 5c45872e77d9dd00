#!/usr/bin/env node

/**
 * Marketplace Sales Pipeline CLI
 *
 * Ingests Ozon, Wildberries and Yandex Market sales into one sales register.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerRegisterCommand } from "./commands/register.js";
import { registerSyncCommand } from "./commands/sync.js";
import { registerWorkerCommand } from "./commands/worker.js";

const program = new Command();

program
  .name("sales-pipeline")
  .description("Marketplace sales ingestion and sales register CLI")
  .version("0.1.0");

// Register all commands
registerDbCommand(program);
registerSyncCommand(program);
registerRegisterCommand(program);
registerWorkerCommand(program);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

program.parse();
