#!/usr/bin/env node

/**
 * Eurostat Ingest CLI
 *
 * Loads configured statistical datasets into the store and queries them.
 */

import { Command } from "commander";

import { registerDatasetsCommand } from "./commands/datasets.js";
import { registerDbCommand } from "./commands/db.js";
import { registerIngestCommand } from "./commands/ingest.js";
import { registerQueryCommand } from "./commands/query.js";
import { registerSourceCommands } from "./commands/sources.js";

const program = new Command();

program
  .name("eurostat-ingest")
  .description("Statistics ingestion pipeline CLI")
  .version("0.1.0");

// Register all commands
registerDbCommand(program);
registerDatasetsCommand(program);
registerIngestCommand(program);
registerQueryCommand(program);
registerSourceCommands(program);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

await program.parseAsync();
