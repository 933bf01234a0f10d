import chalk from "chalk";
import ora from "ora";

import { closeConnection } from "../../db/connection.js";
import { errorMessage } from "../../errors.js";
import { createRepository } from "../../pipeline.js";
import {
  displaySourcesTable,
  displayStatistics,
  displaySummary,
} from "../utils/display.js";

import type { Command } from "commander";

export function registerSourceCommands(program: Command): void {
  // stats
  program
    .command("stats")
    .description("Show store totals and per-family coverage")
    .action(async () => {
      try {
        const repository = createRepository();
        displaySummary(await repository.summary());
        displayStatistics(await repository.statistics("demographic"));
        displayStatistics(await repository.statistics("industrial"));
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // sources
  program
    .command("sources")
    .description("List data sources and when they were last updated")
    .action(async () => {
      try {
        const sources = await createRepository().listSources();
        if (sources.length === 0) {
          console.log(chalk.yellow("No data sources yet (run 'ingest')"));
          return;
        }
        displaySourcesTable(sources);
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // delete-source
  program
    .command("delete-source")
    .description("Delete every fact loaded from a source (raw snapshots are kept)")
    .argument("<name>", "Data source name")
    .action(async (name: string) => {
      const spinner = ora(`Deleting facts for ${name}...`).start();

      try {
        const repository = createRepository();
        const source = await repository.findSourceByName(name);
        if (source === null) {
          spinner.fail(`Unknown data source: ${name}`);
          process.exitCode = 1;
          return;
        }

        const deleted = await repository.deleteBySource(source.id);
        spinner.succeed(`Deleted ${String(deleted)} facts from ${name}`);
      } catch (error) {
        spinner.fail(`Failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
