import chalk from "chalk";
import ora from "ora";

import { closeConnection } from "../../db/connection.js";
import { errorMessage } from "../../errors.js";
import {
  createOrchestrator,
  createRegistry,
  createRepository,
} from "../../pipeline.js";
import { FileSource } from "../../source/file-source.js";
import { displayRunResults } from "../utils/display.js";
import {
  collectFieldMapping,
  collectParam,
  parseInteger,
  parsePayloadFormat,
  parsePositiveInteger,
} from "../utils/options.js";

import type { PayloadFormat } from "../../datasets/types.js";
import type { IngestionRunResult } from "../../ingest/orchestrator.js";
import type { Command } from "commander";

interface IngestOptions {
  all?: boolean;
  startPage?: number;
  param: Record<string, string>;
  replace?: boolean;
  concurrency?: number;
  file?: string;
  format?: PayloadFormat;
  delimiter?: string;
  fieldMapping: Record<string, string>;
  sourceName?: string;
}

export function registerIngestCommand(program: Command): void {
  program
    .command("ingest")
    .description("Fetch, normalize and store one or more datasets")
    .argument("[datasets...]", "Dataset ids (see 'datasets list')")
    .option("--all", "Ingest every configured dataset")
    .option(
      "--start-page <n>",
      "Resume at this page index (single dataset only)",
      parseInteger
    )
    .option(
      "--param <key=value>",
      "Query parameter override (repeatable)",
      collectParam,
      {}
    )
    .option("--replace", "Delete the source's facts before loading")
    .option(
      "--concurrency <n>",
      "Datasets ingested in parallel",
      parsePositiveInteger
    )
    .option("--file <path>", "Read the dataset from a local CSV or JSON export")
    .option(
      "--format <format>",
      "File format: jsonstat, json or csv (default: from the extension)",
      parsePayloadFormat
    )
    .option("--delimiter <char>", "CSV field delimiter for --file")
    .option(
      "--field-mapping <column:field>",
      "Rename a file column before normalization (repeatable)",
      collectFieldMapping,
      {}
    )
    .option("--source-name <name>", "Data source name for a file (default: file name)")
    .addHelpText(
      "after",
      `
Examples:
  cli ingest demo_pjan
  cli ingest sts_inpr_m --param geo=DE --param sinceTimePeriod=2020-01
  cli ingest --all --concurrency 2
  cli ingest lfsi_sla_q --start-page 3
  cli ingest demo_pjan --file ./exports/population.csv --field-mapping geo:region
`
    )
    .action(async (datasetIds: string[], options: IngestOptions) => {
      const spinner = ora("Preparing ingestion...").start();
      const controller = new AbortController();
      const onInterrupt = (): void => {
        spinner.text = "Cancelling after the current page...";
        controller.abort();
      };
      process.once("SIGINT", onInterrupt);

      try {
        const registry = createRegistry();
        const ids =
          options.all === true
            ? registry.all().map((descriptor) => descriptor.id)
            : datasetIds;

        if (ids.length === 0) {
          spinner.fail("Name at least one dataset, or pass --all");
          process.exitCode = 1;
          return;
        }
        if (options.startPage !== undefined && ids.length !== 1) {
          spinner.fail("--start-page applies to a single dataset");
          process.exitCode = 1;
          return;
        }

        if (options.file !== undefined && ids.length !== 1) {
          spinner.fail("--file applies to a single dataset");
          process.exitCode = 1;
          return;
        }

        const source =
          options.file !== undefined
            ? new FileSource({
                path: options.file,
                format: options.format,
                delimiter: options.delimiter,
                fieldMapping: options.fieldMapping,
                sourceName: options.sourceName,
              })
            : undefined;
        const orchestrator = createOrchestrator(registry, createRepository(), source);
        orchestrator.setProgressCallback((event) => {
          const page =
            event.pageIndex !== null ? ` page ${String(event.pageIndex)}` : "";
          spinner.text = `${event.datasetId}: ${event.state}${page} (${String(event.pagesPersisted)} persisted)`;
        });

        spinner.text = `Ingesting ${String(ids.length)} dataset(s)...`;
        const runOptions = {
          overrides: options.param,
          replaceExisting: options.replace,
          signal: controller.signal,
        };

        let results: IngestionRunResult[];
        const [single] = ids;
        if (ids.length === 1 && single !== undefined) {
          results = [
            await orchestrator.run(single, {
              ...runOptions,
              startPage: options.startPage,
            }),
          ];
        } else {
          results = await orchestrator.runMany(ids, {
            ...runOptions,
            concurrency: options.concurrency,
          });
        }

        const failed = results.filter((result) => result.state === "FAILED");
        if (failed.length > 0) {
          spinner.fail(
            `${String(failed.length)} of ${String(results.length)} dataset(s) failed`
          );
          process.exitCode = 1;
        } else {
          spinner.succeed(`Ingested ${String(results.length)} dataset(s)`);
        }

        displayRunResults(results);
      } catch (error) {
        spinner.fail(chalk.red(`Failed: ${errorMessage(error)}`));
        process.exitCode = 1;
      } finally {
        process.removeListener("SIGINT", onInterrupt);
        await closeConnection();
      }
    });
}
