#!/usr/bin/env node
/**
 * reapply CLI entry point
 *
 * Commands:
 * - run    - Apply a migration plan in one transaction
 * - verify - Report how much of a plan is already in place
 * - show   - Validate a plan file and print it
 */

import { resolve } from "path";

import chalk from "chalk";
import { Command } from "commander";
import ora from "ora";

import { VERSION } from "../index.js";
import { createDatabase } from "../db/client.js";
import { ReapplyError, logger } from "../lib/index.js";
import { loadPlanFile } from "../migration/plan-loader.js";
import { createMigrationRunner } from "../migration/runner.js";

import { maskDatabaseUrl, resolveSettings } from "./config.js";
import {
  formatError,
  formatJson,
  formatPlanTerminal,
  formatSummary,
  formatVerification,
  formatWarning,
  isValidOutputFormat,
  type OutputFormat,
} from "./formatters.js";

import type { LogLevel } from "../lib/logger.js";
import type { MigrationPlan } from "../migration/plan.schema.js";
import type { MigrationRunner } from "../migration/runner.js";
import type { Database } from "../db/client.js";

interface ConnectionOptions {
  databaseUrl?: string;
  schema?: string;
  output?: string;
  verbose?: boolean;
  quiet?: boolean;
}

function fail(error: Error, verbose: boolean): never {
  console.error(formatError(error));
  if (verbose && error instanceof ReapplyError && error.context !== undefined) {
    console.error(chalk.gray(JSON.stringify(error.context, null, 2)));
  }
  process.exit(1);
}

function outputFormatFrom(options: ConnectionOptions): OutputFormat {
  const format = options.output ?? "terminal";
  if (!isValidOutputFormat(format)) {
    fail(new Error(`Invalid output format: ${format}. Use: terminal, json`), false);
  }
  return format;
}

function configureLogging(options: ConnectionOptions, format: OutputFormat, level: LogLevel): void {
  if (options.quiet || format === "json") {
    logger.configure({ level: "error" });
  } else if (options.verbose) {
    logger.configure({ level: "debug" });
  } else {
    logger.configure({ level });
  }
}

async function loadPlanOrExit(planPath: string, verbose: boolean): Promise<MigrationPlan> {
  const planResult = await loadPlanFile(resolve(planPath));
  if (!planResult.success) {
    fail(planResult.error, verbose);
  }
  return planResult.data;
}

/**
 * Open a runner for a plan, applying the settings' schema override
 */
async function openRunner(
  planPath: string,
  options: ConnectionOptions
): Promise<{ database: Database; runner: MigrationRunner }> {
  const verbose = Boolean(options.verbose);
  const settings = resolveSettings({
    ...(options.databaseUrl !== undefined && { databaseUrl: options.databaseUrl }),
    ...(options.schema !== undefined && { schema: options.schema }),
  });
  if (!settings.success) {
    fail(settings.error, verbose);
  }

  configureLogging(options, outputFormatFrom(options), settings.data.logLevel);

  let plan = await loadPlanOrExit(planPath, verbose);
  const schemaOverride = settings.data.schema;
  if (schemaOverride !== undefined && schemaOverride !== plan.schema) {
    logger.warn(formatWarning(`Using schema "${schemaOverride}" instead of the plan's "${plan.schema}"`));
    plan = { ...plan, schema: schemaOverride };
  }

  logger.debug(`Connecting to ${maskDatabaseUrl(settings.data.databaseUrl)}`);
  const database = createDatabase({
    connectionString: settings.data.databaseUrl,
    connectionTimeoutMillis: settings.data.connectTimeoutMs,
    max: 1,
  });

  return { database, runner: createMigrationRunner(database, plan) };
}

const program = new Command();

program
  .name("reapply")
  .description("Idempotent schema, seed and backfill migrations for PostgreSQL")
  .version(VERSION);

function withConnectionOptions(command: Command): Command {
  return command
    .option("--database-url <url>", "PostgreSQL connection string (default: $REAPPLY_DATABASE_URL or $DATABASE_URL)")
    .option("--schema <name>", "Override the plan's target schema")
    .option("-o, --output <format>", "Output format: terminal, json", "terminal")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)");
}

withConnectionOptions(
  program
    .command("run <plan>")
    .description("Apply a migration plan; safe to repeat")
    .option("--dry-run", "Run every step, then roll back")
).action(async (planPath: string, options: ConnectionOptions & { dryRun?: boolean }) => {
  const format = outputFormatFrom(options);

  const { database, runner } = await openRunner(planPath, options);
  const dryRun = Boolean(options.dryRun);
  const spinner = format === "terminal" && !options.quiet ? ora(`Applying ${planPath}...`).start() : null;

  const result = await runner.run({ dryRun }).finally(() => database.close());
  if (!result.success) {
    spinner?.fail("Migration rolled back");
    fail(result.error, Boolean(options.verbose));
  }
  spinner?.stop();
  console.log(formatSummary(result.data, format));
});

withConnectionOptions(
  program.command("verify <plan>").description("Report which parts of a plan are already in place")
).action(async (planPath: string, options: ConnectionOptions) => {
  const format = outputFormatFrom(options);

  const { database, runner } = await openRunner(planPath, options);
  const result = await runner.verify().finally(() => database.close());
  if (!result.success) {
    fail(result.error, Boolean(options.verbose));
  }
  console.log(formatVerification(result.data, format));
  // 2 = reachable database, plan not (fully) applied
  process.exitCode = result.data.complete ? 0 : 2;
});

program
  .command("show <plan>")
  .description("Validate a plan file and print it")
  .option("-o, --output <format>", "Output format: terminal, json", "terminal")
  .action(async (planPath: string, options: ConnectionOptions) => {
    const format = outputFormatFrom(options);
    const plan = await loadPlanOrExit(planPath, false);
    console.log(format === "json" ? formatJson(plan) : formatPlanTerminal(plan));
  });

program.parseAsync().catch((error: unknown) => {
  fail(error instanceof Error ? error : new Error(String(error)), true);
});
