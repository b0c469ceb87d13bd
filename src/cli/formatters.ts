import chalk from "chalk";

import type { MigrationPlan } from "../migration/plan.schema.js";
import type { MigrationSummary, VerificationReport } from "../migration/runner.js";

/**
 * Output format types
 */
export type OutputFormat = "terminal" | "json";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["terminal", "json"];

const LABEL_WIDTH = 20;

function row(label: string, value: string | number): string {
  return `  ${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

/**
 * Format a run summary for terminal output with colors
 */
export function formatSummaryTerminal(summary: MigrationSummary): string {
  const lines: string[] = [];

  const headline = `${summary.planId} ${summary.dryRun ? "checked" : "applied"} in ${summary.durationMs}ms`;
  lines.push(summary.dryRun ? chalk.yellow(`[DRY RUN] ${headline} (rolled back)`) : chalk.green(`✓ ${headline}`));
  lines.push("");
  lines.push(row("Tables created", summary.tablesCreated));
  lines.push(row("Columns added", summary.columnsAdded));
  lines.push(row("Constraints added", summary.constraintsAdded));
  lines.push(row("Categories seeded", summary.categoriesSeeded));
  lines.push(row("Rows backfilled", summary.rowsBackfilled));

  if (summary.seeded.length > 0) {
    lines.push("");
    lines.push(chalk.bold("Reference rows"));
    for (const seed of summary.seeded) {
      const state = seed.wasInserted ? chalk.green("inserted") : chalk.gray("existing");
      lines.push(`  ${seed.name.padEnd(LABEL_WIDTH - 2)}id ${seed.id} ${state}`);
    }
  }

  if (summary.rules.length > 0) {
    lines.push("");
    lines.push(chalk.bold("Backfill rules"));
    for (const rule of summary.rules) {
      lines.push(`  ${rule.match} → ${rule.category}: ${rule.rowsAffected} row(s)`);
    }
  }

  return lines.join("\n");
}

/**
 * Format a verification report for terminal output with colors
 */
export function formatVerificationTerminal(report: VerificationReport): string {
  const lines: string[] = [];

  lines.push(
    report.complete
      ? chalk.green(`✓ ${report.planId} is fully applied`)
      : chalk.yellow(`${report.planId} is not fully applied`)
  );

  if (report.objects.length > 0) {
    lines.push("");
    lines.push(chalk.bold("Schema objects"));
    for (const object of report.objects) {
      const mark = object.exists ? chalk.green("present") : chalk.red("missing");
      lines.push(`  ${`${object.kind} ${object.target}`.padEnd(LABEL_WIDTH * 2)}${mark}`);
    }
  }

  if (report.seeds.length > 0) {
    lines.push("");
    lines.push(chalk.bold("Reference rows"));
    for (const seed of report.seeds) {
      const mark = seed.id === null ? chalk.red("missing") : chalk.green(`id ${seed.id}`);
      lines.push(`  ${seed.name.padEnd(LABEL_WIDTH - 2)}${mark}`);
    }
  }

  if (report.itemsByCategory !== null) {
    lines.push("");
    lines.push(chalk.bold("Rows by category"));
    for (const entry of report.itemsByCategory) {
      lines.push(row(entry.category, entry.count));
    }
    lines.push(row("(none)", report.uncategorized ?? 0));
  }

  return lines.join("\n");
}

/**
 * Format a validated plan for terminal output
 */
export function formatPlanTerminal(plan: MigrationPlan): string {
  const lines: string[] = [];

  lines.push(chalk.bold.underline(`${plan.id}`));
  lines.push(plan.description);
  lines.push("");
  lines.push(row("Schema", plan.schema));
  for (const table of plan.tables) {
    lines.push(row("Table", `${table.name} (${table.columns.map((c) => c.name).join(", ")})`));
  }
  for (const column of plan.columns) {
    lines.push(row("Column", `${column.table}.${column.name} ${column.type.toUpperCase()}`));
  }
  for (const constraint of plan.constraints) {
    lines.push(row("Constraint", `${constraint.table}.${constraint.name} ${constraint.definition}`));
  }
  if (plan.seed) {
    lines.push(row("Seed", `${plan.seed.table}: ${plan.seed.rows.map((r) => r.name).join(", ")}`));
  }
  if (plan.backfill) {
    lines.push(
      row("Backfill", `${plan.backfill.table}.${plan.backfill.referenceColumn} by ${plan.backfill.matchColumn}`)
    );
    for (const rule of plan.backfill.rules) {
      lines.push(`    ${rule.match} → ${rule.category}`);
    }
  }

  return lines.join("\n");
}

/**
 * Format any result as JSON
 */
export function formatJson(value: MigrationSummary | VerificationReport | MigrationPlan): string {
  return JSON.stringify(value, null, 2);
}

export function formatSummary(summary: MigrationSummary, format: OutputFormat): string {
  return format === "json" ? formatJson(summary) : formatSummaryTerminal(summary);
}

export function formatVerification(report: VerificationReport, format: OutputFormat): string {
  return format === "json" ? formatJson(report) : formatVerificationTerminal(report);
}

/**
 * Check if a string is a valid output format
 */
export function isValidOutputFormat(format: string): format is OutputFormat {
  return OUTPUT_FORMATS.some((candidate) => candidate === format);
}

/**
 * Format an error for terminal output
 */
export function formatError(error: Error): string {
  return chalk.red(`Error: ${error.message}`);
}

/**
 * Format a warning for terminal output
 */
export function formatWarning(message: string): string {
  return chalk.yellow(`Warning: ${message}`);
}

/**
 * Format a success message for terminal output
 */
export function formatSuccess(message: string): string {
  return chalk.green(`✓ ${message}`);
}
