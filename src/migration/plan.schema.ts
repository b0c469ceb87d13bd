import { z } from "zod";

/**
 * Unquoted SQL identifier. Identifiers are always emitted quoted, this only
 * keeps plans to names that need no quoting to type by hand.
 */
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Column type grammar: `INTEGER`, `VARCHAR(50)`, `NUMERIC(10, 2)`, `TIMESTAMP WITH TIME ZONE`
 */
const COLUMN_TYPE_PATTERN = /^[A-Za-z][A-Za-z0-9 ]*(\(\s*\d+(\s*,\s*\d+)?\s*\))?(\[\])?$/;

/**
 * Regex pattern for plan IDs (lowercase, alphanumeric with hyphens)
 */
const PLAN_ID_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

/** Longest reference name the bundled `VARCHAR(50)` key column accepts */
export const MAX_SEED_NAME_LENGTH = 50;

export const IdentifierSchema = z
  .string()
  .regex(IDENTIFIER_PATTERN, "Identifier must start with a letter or underscore and contain only letters, digits and underscores");

export const ObjectKindSchema = z.enum(["table", "column", "constraint"]);

export const ColumnReferenceSchema = z.object({
  table: IdentifierSchema,
  column: IdentifierSchema.default("id"),
});

/**
 * A column as it appears in CREATE TABLE or ALTER TABLE ... ADD COLUMN
 */
export const ColumnDefinitionSchema = z.object({
  name: IdentifierSchema,
  type: z.string().trim().regex(COLUMN_TYPE_PATTERN, "Unsupported column type"),
  primaryKey: z.boolean().default(false),
  notNull: z.boolean().default(false),
  unique: z.boolean().default(false),
  references: ColumnReferenceSchema.optional(),
});

/**
 * Named table constraint. `definition` is the SQL after
 * `ADD CONSTRAINT <name>`, e.g. `CHECK (quantity >= 0)`; plans are trusted input.
 */
export const ConstraintDefinitionSchema = z.object({
  name: IdentifierSchema,
  definition: z.string().trim().min(1, "Constraint definition cannot be empty"),
});

export const TableDefinitionSchema = z.object({
  name: IdentifierSchema,
  columns: z.array(ColumnDefinitionSchema).min(1, "A table needs at least one column"),
});

export const ColumnChangeSchema = ColumnDefinitionSchema.extend({
  table: IdentifierSchema,
});

export const ConstraintChangeSchema = ConstraintDefinitionSchema.extend({
  table: IdentifierSchema,
});

export const SeedRecordSchema = z.object({
  name: z.string().min(1).max(MAX_SEED_NAME_LENGTH),
  description: z.string().nullable().optional(),
});

export const SeedDefinitionSchema = z.object({
  table: IdentifierSchema,
  idColumn: IdentifierSchema.default("id"),
  keyColumn: IdentifierSchema.default("name"),
  descriptionColumn: IdentifierSchema.default("description"),
  rows: z.array(SeedRecordSchema).default([]),
});

/**
 * `match` is compared case-insensitively against the match column;
 * `category` names a seeded reference row.
 */
export const BackfillRuleSchema = z.object({
  match: z.string().min(1, "Rule match value cannot be empty"),
  category: z.string().min(1, "Rule category cannot be empty"),
});

export const BackfillDefinitionSchema = z.object({
  table: IdentifierSchema,
  matchColumn: IdentifierSchema,
  referenceColumn: IdentifierSchema,
  rules: z.array(BackfillRuleSchema).default([]),
});

/**
 * One idempotent migration step
 */
export const MigrationPlanSchema = z.object({
  id: z.string().regex(PLAN_ID_PATTERN, "Plan ID must be lowercase alphanumeric with hyphens"),
  description: z.string().min(10, "Description must be at least 10 characters"),
  schema: IdentifierSchema.default("public"),
  tables: z.array(TableDefinitionSchema).default([]),
  columns: z.array(ColumnChangeSchema).default([]),
  constraints: z.array(ConstraintChangeSchema).default([]),
  seed: SeedDefinitionSchema.optional(),
  backfill: BackfillDefinitionSchema.optional(),
});

// Inferred types
export type ObjectKind = z.infer<typeof ObjectKindSchema>;
export type ColumnReference = z.infer<typeof ColumnReferenceSchema>;
export type ColumnDefinition = z.infer<typeof ColumnDefinitionSchema>;
export type ConstraintDefinition = z.infer<typeof ConstraintDefinitionSchema>;
export type TableDefinition = z.infer<typeof TableDefinitionSchema>;
export type ColumnChange = z.infer<typeof ColumnChangeSchema>;
export type ConstraintChange = z.infer<typeof ConstraintChangeSchema>;
export type SeedRecord = z.infer<typeof SeedRecordSchema>;
export type SeedDefinition = z.infer<typeof SeedDefinitionSchema>;
export type BackfillRule = z.infer<typeof BackfillRuleSchema>;
export type BackfillDefinition = z.infer<typeof BackfillDefinitionSchema>;
export type MigrationPlan = z.infer<typeof MigrationPlanSchema>;
export type MigrationPlanInput = z.input<typeof MigrationPlanSchema>;
