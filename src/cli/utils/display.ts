/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { DatasetDescriptor } from "../../datasets/types.js";
import type {
  DemographicRecord,
  FactStatistics,
  IndustrialRecord,
  StoreSummary,
} from "../../db/repository.js";
import type {
  IngestionRunResult,
  IngestionState,
} from "../../ingest/orchestrator.js";
import type { DataSource } from "../../types/facts.js";

function dash(value: string | number | null): string {
  return value === null ? chalk.dim("-") : String(value);
}

export function formatPeriod(record: {
  year: number;
  quarter: number | null;
  month: number | null;
}): string {
  if (record.month !== null) {
    return `${String(record.year)}-${String(record.month).padStart(2, "0")}`;
  }
  if (record.quarter !== null) {
    return `${String(record.year)}-Q${String(record.quarter)}`;
  }
  return String(record.year);
}

export function formatAgeBand(
  ageMin: number | null,
  ageMax: number | null
): string {
  if (ageMin === null && ageMax === null) {
    return "all";
  }
  if (ageMax === null) {
    return `${String(ageMin)}+`;
  }
  return `${String(ageMin ?? 0)}-${String(ageMax - 1)}`;
}

function colorState(state: IngestionState): string {
  switch (state) {
    case "COMPLETED":
      return chalk.green(state);
    case "FAILED":
      return chalk.red(state);
    case "CANCELLED":
      return chalk.yellow(state);
    default:
      return state;
  }
}

/**
 * Display configured datasets
 */
export function displayDatasetsTable(
  datasets: readonly DatasetDescriptor[]
): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Id"),
      chalk.cyan("Family"),
      chalk.cyan("Format"),
      chalk.cyan("Measure"),
      chalk.cyan("Name"),
    ],
    colWidths: [14, 13, 10, 12, 50],
    wordWrap: true,
  });

  for (const dataset of datasets) {
    table.push([
      chalk.green(dataset.id),
      dataset.family,
      dataset.format,
      dataset.measure,
      dataset.name,
    ]);
  }

  console.log(table.toString());
}

export function displayDemographicTable(records: DemographicRecord[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Region"),
      chalk.cyan("Period"),
      chalk.cyan("Sex"),
      chalk.cyan("Age"),
      chalk.cyan("Value"),
      chalk.cyan("Source"),
    ],
  });

  for (const record of records) {
    table.push([
      record.regionCode,
      formatPeriod(record),
      record.sex ?? "T",
      formatAgeBand(record.ageMin, record.ageMax),
      record.value.toLocaleString("en-US"),
      record.source,
    ]);
  }

  console.log(table.toString());
}

export function displayIndustrialTable(records: IndustrialRecord[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Region"),
      chalk.cyan("Period"),
      chalk.cyan("Industry"),
      chalk.cyan("Unit"),
      chalk.cyan("Value"),
      chalk.cyan("Source"),
    ],
  });

  for (const record of records) {
    table.push([
      record.regionCode,
      formatPeriod(record),
      record.industryCode ?? "TOTAL",
      dash(record.unit),
      record.value.toLocaleString("en-US"),
      record.source,
    ]);
  }

  console.log(table.toString());
}

export function displaySourcesTable(sources: DataSource[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Id"),
      chalk.cyan("Name"),
      chalk.cyan("Type"),
      chalk.cyan("Last Updated"),
    ],
  });

  for (const source of sources) {
    table.push([
      String(source.id),
      chalk.green(source.name),
      source.sourceType,
      source.lastUpdated ?? chalk.dim("never"),
    ]);
  }

  console.log(table.toString());
}

export function displayRunResults(results: IngestionRunResult[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Dataset"),
      chalk.cyan("State"),
      chalk.cyan("Pages"),
      chalk.cyan("Fetched"),
      chalk.cyan("Dropped"),
      chalk.cyan("Inserted"),
      chalk.cyan("Updated"),
    ],
  });

  for (const result of results) {
    table.push([
      result.datasetId,
      colorState(result.state),
      String(result.pagesPersisted),
      String(result.recordsFetched),
      String(result.recordsDropped),
      String(result.inserted),
      String(result.updated),
    ]);
  }

  console.log(table.toString());

  for (const result of results) {
    if (result.error !== undefined) {
      const status =
        result.error.status !== undefined
          ? ` (HTTP ${String(result.error.status)})`
          : "";
      const resume =
        result.lastPersistedPage !== null
          ? `; resume with --start-page ${String(result.lastPersistedPage + 1)}`
          : "";
      console.log(
        chalk.red(
          `  ${result.datasetId}: ${result.error.name}: ${result.error.message}${status}${resume}`
        )
      );
    }
  }
}

export function displaySummary(summary: StoreSummary): void {
  console.log(chalk.bold("\nStore totals:\n"));
  console.log(`  Sources:           ${String(summary.sources)}`);
  console.log(`  Regions:           ${String(summary.regions)}`);
  console.log(`  Raw snapshots:     ${String(summary.rawSnapshots)}`);
  console.log(`  Demographic facts: ${String(summary.demographicFacts)}`);
  console.log(`  Industrial facts:  ${String(summary.industrialFacts)}`);
}

export function displayStatistics(stats: FactStatistics): void {
  console.log(chalk.bold(`\n${stats.family} facts:`));
  console.log(`  Records:       ${String(stats.totalRecords)}`);
  console.log(`  Years covered: ${stats.yearsCovered}`);
  console.log(`  Regions:       ${String(stats.regionCount)}`);
  if (stats.industryCodes !== undefined) {
    const codes = stats.industryCodes;
    const shown = codes.slice(0, 15).join(", ");
    const more = codes.length > 15 ? ` (+${String(codes.length - 15)} more)` : "";
    console.log(`  Industry codes: ${codes.length > 0 ? shown + more : "-"}`);
  }
}
