import chalk from "chalk";
import { InvalidArgumentError } from "commander";

import { closeConnection } from "../../db/connection.js";
import { errorMessage } from "../../errors.js";
import { createRepository } from "../../pipeline.js";
import {
  displayDemographicTable,
  displayIndustrialTable,
} from "../utils/display.js";
import { parseInteger, parsePositiveInteger } from "../utils/options.js";

import type { Sex } from "../../types/facts.js";
import type { Command } from "commander";

interface CommonQueryOptions {
  region?: string;
  year?: number;
  source?: string;
  limit?: number;
  json?: boolean;
}

interface DemographicQueryOptions extends CommonQueryOptions {
  sex?: Sex;
  ageMin?: number;
  ageMax?: number;
}

interface IndustrialQueryOptions extends CommonQueryOptions {
  month?: number;
  industry?: string;
}

function parseSex(value: string): Sex {
  const upper = value.toUpperCase();
  if (upper === "M" || upper === "F" || upper === "O") {
    return upper;
  }
  throw new InvalidArgumentError(`Sex must be M, F or O, got: ${value}`);
}

function addCommonOptions(command: Command): Command {
  return command
    .option("--region <code>", "Region code (e.g. DE, FR10)")
    .option("--year <year>", "Year", parseInteger)
    .option("--source <name>", "Data source name")
    .option("--limit <n>", "Maximum rows", parsePositiveInteger, 50)
    .option("--json", "Output as JSON");
}

export function registerQueryCommand(program: Command): void {
  const query = program
    .command("query")
    .description("Query stored facts");

  // query demographics
  addCommonOptions(
    query
      .command("demographics")
      .description("Query demographic facts")
      .option("--sex <code>", "M, F or O", parseSex)
      .option("--age-min <n>", "Inclusive lower age bound", parseInteger)
      .option("--age-max <n>", "Exclusive upper age bound", parseInteger)
  ).action(async (options: DemographicQueryOptions) => {
    try {
      const records = await createRepository().queryDemographics({
        regionCode: options.region,
        year: options.year,
        source: options.source,
        sex: options.sex,
        ageMin: options.ageMin,
        ageMax: options.ageMax,
        limit: options.limit,
      });

      if (options.json === true) {
        console.log(JSON.stringify({ count: records.length, data: records }, null, 2));
        return;
      }
      if (records.length === 0) {
        console.log(chalk.yellow("No demographic facts match"));
        return;
      }
      displayDemographicTable(records);
      console.log(chalk.dim(`${String(records.length)} row(s)`));
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exitCode = 1;
    } finally {
      await closeConnection();
    }
  });

  // query industrial
  addCommonOptions(
    query
      .command("industrial")
      .description("Query industrial and energy facts")
      .option("--month <n>", "Month (1-12)", parseInteger)
      .option("--industry <code>", "NACE or energy balance code")
  ).action(async (options: IndustrialQueryOptions) => {
    try {
      const records = await createRepository().queryIndustrial({
        regionCode: options.region,
        year: options.year,
        source: options.source,
        month: options.month,
        industryCode: options.industry,
        limit: options.limit,
      });

      if (options.json === true) {
        console.log(JSON.stringify({ count: records.length, data: records }, null, 2));
        return;
      }
      if (records.length === 0) {
        console.log(chalk.yellow("No industrial facts match"));
        return;
      }
      displayIndustrialTable(records);
      console.log(chalk.dim(`${String(records.length)} row(s)`));
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exitCode = 1;
    } finally {
      await closeConnection();
    }
  });
}
