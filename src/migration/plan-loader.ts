import { readFile } from "node:fs/promises";
import { extname } from "node:path";

import { load as loadYaml } from "js-yaml";

import { ReapplyError, ValidationError, describeError } from "../lib/errors.js";
import { ok, err } from "../lib/result.js";

import { MigrationPlanSchema } from "./plan.schema.js";

import type { MigrationPlan } from "./plan.schema.js";
import type { Result } from "../lib/result.js";

/**
 * Validate raw plan data
 */
export function parsePlan(data: unknown): Result<MigrationPlan, ValidationError> {
  const validated = MigrationPlanSchema.safeParse(data);

  if (!validated.success) {
    return err(
      new ValidationError("Invalid migration plan", {
        errors: validated.error.errors.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      })
    );
  }

  const plan = validated.data;
  const seeded = new Set(plan.seed?.rows.map((row) => row.name) ?? []);
  const unknownTargets = (plan.backfill?.rules ?? [])
    .map((rule) => rule.category)
    .filter((category) => !seeded.has(category));

  if (unknownTargets.length > 0) {
    return err(
      new ValidationError("Backfill rules target categories the plan does not seed", {
        categories: [...new Set(unknownTargets)],
      })
    );
  }

  return ok(plan);
}

/**
 * Load and validate a plan from a YAML or JSON file
 */
export async function loadPlanFile(filePath: string): Promise<Result<MigrationPlan, ReapplyError>> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    return err(
      new ReapplyError(`Failed to read plan file: ${filePath}`, "PLAN_READ_ERROR", {
        error: describeError(error),
      })
    );
  }

  let data: unknown;
  try {
    data = extname(filePath).toLowerCase() === ".json" ? JSON.parse(content) : loadYaml(content);
  } catch (error) {
    return err(
      new ValidationError(`Plan file is not valid ${extname(filePath) === ".json" ? "JSON" : "YAML"}: ${filePath}`, {
        error: describeError(error),
      })
    );
  }

  const parsed = parsePlan(data);
  if (!parsed.success) {
    return err(
      new ValidationError(`${parsed.error.message}: ${filePath}`, parsed.error.context)
    );
  }
  return parsed;
}
