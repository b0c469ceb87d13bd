import { describe, it, expect, beforeEach } from "vitest";

import { SeedResolutionError } from "@/migration/errors.js";
import { SeedDefinitionSchema } from "@/migration/plan.schema.js";
import { ReferenceSeeder, toCategoryIds } from "@/migration/seeder.js";

import {
  createMigratedSchema,
  createTestDatabase,
  readCategories,
  type TestDatabase,
} from "@tests/fixtures/database.js";
import { createTransactionalClient, pgError } from "@tests/fixtures/fake-pool.js";

const TARGET = SeedDefinitionSchema.parse({ table: "categories" });

const RECORDS = [
  { name: "Drinks", description: "Beverages and liquid refreshments" },
  { name: "Snacks", description: "Chips and savory snacks" },
  { name: "Biscuits" },
];

describe("ReferenceSeeder", () => {
  describe("against an in-memory database", () => {
    let db: TestDatabase;

    beforeEach(() => {
      db = createTestDatabase();
      createMigratedSchema(db.mem, []);
    });

    it("should insert missing rows in input order", async () => {
      const results = await db.database.withTransaction((client) =>
        new ReferenceSeeder(client, "public", TARGET).seed(RECORDS)
      );

      expect(results).toEqual([
        { name: "Drinks", id: 1, wasInserted: true },
        { name: "Snacks", id: 2, wasInserted: true },
        { name: "Biscuits", id: 3, wasInserted: true },
      ]);
      expect(readCategories(db.mem)).toEqual([
        { id: 1, name: "Drinks", description: "Beverages and liquid refreshments" },
        { id: 2, name: "Snacks", description: "Chips and savory snacks" },
        { id: 3, name: "Biscuits", description: null },
      ]);
    });

    it("should resolve existing rows instead of duplicating them", async () => {
      const seedAll = () =>
        db.database.withTransaction((client) => new ReferenceSeeder(client, "public", TARGET).seed(RECORDS));

      const first = await seedAll();
      const second = await seedAll();

      expect(second.map((r) => r.id)).toEqual(first.map((r) => r.id));
      expect(second.every((r) => !r.wasInserted)).toBe(true);
      expect(readCategories(db.mem)).toHaveLength(3);
    });

    it("should keep a pre-existing row and its description", async () => {
      db.mem.public.none(`INSERT INTO categories (name, description) VALUES ('Snacks', 'Crisps')`);

      const results = await db.database.withTransaction((client) =>
        new ReferenceSeeder(client, "public", TARGET).seed(RECORDS)
      );

      expect(results.find((r) => r.name === "Snacks")).toEqual({ name: "Snacks", id: 1, wasInserted: false });
      expect(readCategories(db.mem).find((c) => c.name === "Snacks")?.description).toBe("Crisps");
    });
  });

  describe("conflict handling", () => {
    const isInsert = (sql: string): boolean => sql.startsWith("INSERT");

    it("should insert under a savepoint, binding a null description", async () => {
      const fake = createTransactionalClient((sql) => (isInsert(sql) ? { rows: [{ id: 4 }], rowCount: 1 } : undefined));

      const results = await new ReferenceSeeder(fake.client, "public", TARGET).seed([{ name: "Biscuits" }]);

      expect(results).toEqual([{ name: "Biscuits", id: 4, wasInserted: true }]);
      expect(fake.statements()).toEqual([
        "SAVEPOINT reapply_seed",
        'INSERT INTO "public"."categories" ("name", "description") VALUES ($1, $2) ' +
          'ON CONFLICT ("name") DO NOTHING RETURNING "id" AS id',
        "RELEASE SAVEPOINT reapply_seed",
      ]);
      expect(fake.query.mock.calls[1]?.[1]).toEqual(["Biscuits", null]);
    });

    it("should look up the existing id after a unique violation inside a transaction", async () => {
      const fake = createTransactionalClient((sql) => {
        if (isInsert(sql)) {
          throw pgError("23505", 'duplicate key value violates unique constraint "categories_name_key"');
        }
        return sql.startsWith("SELECT") ? { rows: [{ id: 9 }], rowCount: 1 } : undefined;
      });
      await fake.client.query("BEGIN");

      const results = await new ReferenceSeeder(fake.client, "public", TARGET).seed([{ name: "Drinks" }]);

      expect(results).toEqual([{ name: "Drinks", id: 9, wasInserted: false }]);
      expect(fake.statements().slice(1)).toEqual([
        "SAVEPOINT reapply_seed",
        expect.stringMatching(/^INSERT INTO "public"."categories"/),
        "ROLLBACK TO SAVEPOINT reapply_seed",
        "RELEASE SAVEPOINT reapply_seed",
        'SELECT "id" AS id FROM "public"."categories" WHERE "name" = $1',
      ]);
    });

    it("should fail when a conflicting row cannot be found", async () => {
      const fake = createTransactionalClient();

      const attempt = new ReferenceSeeder(fake.client, "public", TARGET).seed([{ name: "Drinks" }]);

      await expect(attempt).rejects.toBeInstanceOf(SeedResolutionError);
      await expect(attempt).rejects.toThrow('categories row "Drinks" conflicted on insert but is not visible');
    });

    it("should not swallow other insert failures", async () => {
      const fake = createTransactionalClient((sql) => {
        if (isInsert(sql)) {
          throw pgError("42P01", 'relation "public.categories" does not exist');
        }
        return undefined;
      });

      const attempt = new ReferenceSeeder(fake.client, "public", TARGET).seed([{ name: "Drinks" }]);

      await expect(attempt).rejects.toMatchObject({
        code: "SEED_RESOLUTION_ERROR",
        context: { name: "Drinks", table: "categories", sqlState: "42P01" },
      });
      expect(fake.statements()).not.toContain('SELECT "id" AS id FROM "public"."categories" WHERE "name" = $1');
    });

    it("should honor custom column names", async () => {
      const fake = createTransactionalClient((sql) => (isInsert(sql) ? { rows: [{ id: "17" }], rowCount: 1 } : undefined));
      const target = SeedDefinitionSchema.parse({
        table: "product_types",
        idColumn: "type_id",
        keyColumn: "label",
        descriptionColumn: "notes",
      });

      const [result] = await new ReferenceSeeder(fake.client, "catalog", target).seed([{ name: "Frozen" }]);

      expect(result).toEqual({ name: "Frozen", id: "17", wasInserted: true });
      expect(fake.statements()[1]).toContain('INSERT INTO "catalog"."product_types" ("label", "notes")');
      expect(fake.statements()[1]).toContain('RETURNING "type_id" AS id');
    });
  });
});

describe("toCategoryIds", () => {
  it("should map names to ids", () => {
    const ids = toCategoryIds([
      { name: "Drinks", id: 1, wasInserted: true },
      { name: "Snacks", id: 2, wasInserted: false },
    ]);
    expect([...ids]).toEqual([
      ["Drinks", 1],
      ["Snacks", 2],
    ]);
  });
});
