import { describe, it, expect, beforeEach } from "vitest";

import { BackfillEngine, normalizeMatch } from "@/migration/backfill.js";
import { BackfillExecutionError } from "@/migration/errors.js";

import {
  categoryByItem,
  createMigratedSchema,
  createTestDatabase,
  type TestDatabase,
} from "@tests/fixtures/database.js";
import { createFakeClient, pgError } from "@tests/fixtures/fake-pool.js";

import type { BackfillRule } from "@/migration/plan.schema.js";
import type { BackfillResult } from "@/migration/backfill.js";

const TARGET = { table: "stock_items", matchColumn: "item_name", referenceColumn: "category_id" };

const CATEGORY_IDS = new Map([
  ["Drinks", 1],
  ["Snacks", 2],
  ["Biscuits", 3],
]);

const RULES: BackfillRule[] = [
  { match: "coke", category: "Drinks" },
  { match: "lays", category: "Snacks" },
  { match: "bisckets", category: "Biscuits" },
];

describe("normalizeMatch", () => {
  it("should lower-case ASCII letters", () => {
    expect(normalizeMatch("Coke")).toBe("coke");
    expect(normalizeMatch("LAYS 2")).toBe("lays 2");
  });

  it("should leave other characters unchanged", () => {
    expect(normalizeMatch("ÉCLAIR")).toBe("Éclair");
  });
});

describe("BackfillEngine", () => {
  describe("against an in-memory database", () => {
    let db: TestDatabase;

    const backfill = (rules: BackfillRule[]): Promise<BackfillResult> =>
      db.database.withTransaction((client) =>
        new BackfillEngine(client, "public", TARGET).backfill(rules, CATEGORY_IDS)
      );

    beforeEach(() => {
      db = createTestDatabase();
      createMigratedSchema(db.mem, ["Coke", "coke", "COKE", "LAYS", "Water", "Bisckets", "Coke Zero"]);
      db.mem.public.none(`INSERT INTO categories (name) VALUES ('Drinks'), ('Snacks'), ('Biscuits')`);
    });

    it("should assign categories by case-insensitive exact match", async () => {
      const result = await backfill(RULES);

      expect(result.rowsAffected).toBe(5);
      expect(result.rules.map((r) => [r.match, r.categoryId, r.rowsAffected])).toEqual([
        ["coke", 1, 3],
        ["lays", 2, 1],
        ["bisckets", 3, 1],
      ]);
      expect(categoryByItem(db.mem)).toEqual({
        Coke: "Drinks",
        coke: "Drinks",
        COKE: "Drinks",
        LAYS: "Snacks",
        Water: null,
        Bisckets: "Biscuits",
        "Coke Zero": null,
      });
    });

    it("should fold only A-Z on both sides", async () => {
      db.mem.public.none(`INSERT INTO stock_items (item_name) VALUES ('ÉCLAIR'), ('éclair')`);

      const result = await backfill([{ match: "ÉCLAIR", category: "Biscuits" }]);

      expect(result.rules[0]?.match).toBe("Éclair");
      expect(result.rowsAffected).toBe(1);
      expect(categoryByItem(db.mem)["ÉCLAIR"]).toBe("Biscuits");
      expect(categoryByItem(db.mem)["éclair"]).toBeNull();
    });

    it("should let the later rule win when two rules match a row", async () => {
      await backfill([
        { match: "coke", category: "Drinks" },
        { match: "COKE", category: "Snacks" },
      ]);

      expect(categoryByItem(db.mem)["Coke"]).toBe("Snacks");
      expect(categoryByItem(db.mem)["coke"]).toBe("Snacks");
      expect(categoryByItem(db.mem)["COKE"]).toBe("Snacks");
    });

    it("should leave rows no rule matches untouched", async () => {
      db.mem.public.none(`UPDATE stock_items SET category_id = 1 WHERE item_name = 'Water'`);

      await backfill(RULES);

      expect(categoryByItem(db.mem)["Water"]).toBe("Drinks");
    });

    it("should rewrite matching rows on every run", async () => {
      const first = await backfill(RULES);
      const second = await backfill(RULES);

      expect(second.rowsAffected).toBe(first.rowsAffected);
      expect(categoryByItem(db.mem)["LAYS"]).toBe("Snacks");
    });

    it("should succeed with no rules", async () => {
      expect(await backfill([])).toEqual({ rowsAffected: 0, rules: [] });
    });
  });

  describe("failures", () => {
    it("should reject a rule for a category without an id", async () => {
      const fake = createFakeClient();

      const attempt = new BackfillEngine(fake.client, "public", TARGET).backfill(
        [...RULES, { match: "haribo", category: "Candy" }],
        CATEGORY_IDS
      );

      await expect(attempt).rejects.toBeInstanceOf(BackfillExecutionError);
      await expect(attempt).rejects.toThrow('Rule 4 targets unknown category "Candy"');
      expect(fake.query).toHaveBeenCalledTimes(3);
    });

    it("should wrap update failures with the rule position", async () => {
      const fake = createFakeClient();
      fake.query.mockRejectedValueOnce(pgError("23503", "violates foreign key constraint"));

      const attempt = new BackfillEngine(fake.client, "public", TARGET).backfill(RULES, CATEGORY_IDS);

      await expect(attempt).rejects.toMatchObject({
        code: "BACKFILL_EXECUTION_ERROR",
        message: 'Rule 1 ("coke" → Drinks) failed',
        context: { rule: 1, table: "stock_items", sqlState: "23503" },
      });
    });

    it("should bind the category id and the normalized match", async () => {
      const fake = createFakeClient();
      fake.query.mockResolvedValueOnce({ rows: [], rowCount: null });

      const result = await new BackfillEngine(fake.client, "public", TARGET).backfill(
        [{ match: "Coke", category: "Drinks" }],
        CATEGORY_IDS
      );

      expect(result.rowsAffected).toBe(0);
      expect(fake.statements()[0]).toBe(
        'UPDATE "public"."stock_items" SET "category_id" = $1 ' +
          `WHERE translate("item_name", 'ABCDEFGHIJKLMNOPQRSTUVWXYZ', 'abcdefghijklmnopqrstuvwxyz') = $2`
      );
      expect(fake.query.mock.calls[0]?.[1]).toEqual([1, "coke"]);
    });
  });
});
