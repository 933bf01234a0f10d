import ora from "ora";

import { errorMessage } from "../../errors.js";
import {
  checkConnection,
  closeConnection,
  getDatabaseUrl,
  getDb,
} from "../../db/connection.js";
import { runMigration, hasSchema, getTableStats } from "../../db/migrate.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

async function printTableStats(heading: string): Promise<void> {
  const stats = await getTableStats();
  console.log(`\n${heading}:`);
  for (const row of stats) {
    console.log(`  ${row.tableName}: ${String(row.rowCount)} rows`);
  }
}

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db migrate
  db.command("migrate")
    .description("Create tables and indexes that do not exist yet")
    .option("--fresh", "Drop all tables first (destructive!)")
    .action(async (options: { fresh?: boolean }) => {
      const spinner = ora("Running migration...").start();

      try {
        if (options.fresh === true) {
          spinner.text = "Dropping existing tables...";
        }

        await runMigration(getDb(), { fresh: options.fresh });
        spinner.succeed("Migration completed successfully");

        await printTableStats("Tables");
      } catch (error) {
        spinner.fail(`Migration failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // db status
  db.command("status")
    .description("Check database connection and show statistics")
    .action(async () => {
      const spinner = ora("Checking database connection...").start();

      try {
        const connected = await checkConnection();

        if (!connected) {
          spinner.fail("Database connection failed");
          console.log(`\nDatabase URL: ${getDatabaseUrl()}`);
          process.exitCode = 1;
          return;
        }

        spinner.succeed("Database connected");
        console.log(`\nDatabase URL: ${getDatabaseUrl()}`);

        if (!(await hasSchema())) {
          console.log("\nSchema: Not initialized (run 'db migrate')");
        } else {
          await printTableStats("Table statistics");
        }
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
