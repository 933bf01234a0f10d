import chalk from "chalk";

import { errorMessage } from "../../errors.js";
import { createRegistry } from "../../pipeline.js";
import { displayDatasetsTable } from "../utils/display.js";

import type { Command } from "commander";

export function registerDatasetsCommand(program: Command): void {
  const datasets = program
    .command("datasets")
    .description("Inspect the dataset registry");

  // datasets list
  datasets
    .command("list")
    .description("List configured datasets")
    .option("--json", "Output as JSON")
    .action((options: { json?: boolean }) => {
      try {
        const registry = createRegistry();
        const all = registry.all();

        if (options.json === true) {
          console.log(JSON.stringify(all, null, 2));
          return;
        }

        console.log(chalk.bold(`\n${String(all.length)} datasets:\n`));
        displayDatasetsTable(all);
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });
}
