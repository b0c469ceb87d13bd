import { MigrationPlanSchema } from "@/migration/plan.schema.js";

import type { MigrationPlan, MigrationPlanInput } from "@/migration/plan.schema.js";

export const INVENTORY_PLAN: MigrationPlanInput = {
  id: "inventory-categories",
  description: "Add product categories to the stock inventory and classify existing items",
  tables: [
    {
      name: "categories",
      columns: [
        { name: "id", type: "SERIAL", primaryKey: true },
        { name: "name", type: "VARCHAR(50)", notNull: true, unique: true },
        { name: "description", type: "TEXT" },
      ],
    },
  ],
  columns: [
    {
      table: "stock_items",
      name: "category_id",
      type: "INTEGER",
      references: { table: "categories", column: "id" },
    },
  ],
  seed: {
    table: "categories",
    rows: [
      { name: "Drinks", description: "Beverages and liquid refreshments" },
      { name: "Snacks", description: "Chips and savory snacks" },
      { name: "Biscuits", description: "Cookies and biscuits" },
    ],
  },
  backfill: {
    table: "stock_items",
    matchColumn: "item_name",
    referenceColumn: "category_id",
    rules: [
      { match: "coke", category: "Drinks" },
      { match: "lays", category: "Snacks" },
      { match: "bisckets", category: "Biscuits" },
    ],
  },
};

/**
 * Inventory plan with defaults applied, optionally overridden
 */
export function createTestPlan(overrides: Partial<MigrationPlanInput> = {}): MigrationPlan {
  return MigrationPlanSchema.parse({ ...INVENTORY_PLAN, ...overrides });
}

/**
 * Inventory plan with a different rule list
 */
export function planWithRules(rules: { match: string; category: string }[]): MigrationPlan {
  const base = createTestPlan();
  if (!base.backfill) {
    throw new Error("inventory plan has no backfill");
  }
  return { ...base, backfill: { ...base.backfill, rules } };
}
