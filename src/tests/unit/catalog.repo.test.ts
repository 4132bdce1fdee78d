import assert from "node:assert/strict";
import test from "node:test";
import { loadCatalogSeed, normalizeCatalogEntry, parseCatalogSeed } from "../../db/catalog-seed";
import { CatalogRepository } from "../../db/repositories/catalog.repo";
import { SupabaseFilter, SupabaseSelectOptions } from "../../db/supabase.client";
import { CatalogEntry } from "../../shared/types/catalog.types";
import { createRecordingLogger } from "../helpers/recording-logger";

const SEED: CatalogEntry[] = [
  { id: "1", title: "Departamento", price: 3_000_000, city: "CDMX", is_active: true },
  { id: "2", title: "Vendido", price: 3_000_000, city: "CDMX", is_active: false },
  { id: "3", title: "Casa", price: 4_000_000, city: "Monterrey", is_active: true },
];

function fakeSupabase(rows: unknown[]) {
  const calls: Array<{ table: string; filters: ReadonlyArray<SupabaseFilter>; options?: SupabaseSelectOptions }> = [];
  return {
    calls,
    async selectMany(
      table: string,
      filters: ReadonlyArray<SupabaseFilter>,
      options?: SupabaseSelectOptions,
    ): Promise<unknown[]> {
      calls.push({ table, filters, options });
      return rows;
    },
  };
}

async function testMemoryBackendFilters(): Promise<void> {
  const repository = new CatalogRepository(createRecordingLogger(), undefined, SEED);
  assert.equal(repository.getBackend(), "memory");
  const entries = await repository.activeInCity(" cdmx ");
  assert.deepEqual(entries.map((entry) => entry.id), ["1"]);
  assert.deepEqual(await repository.activeInCity(""), []);
}

async function testSupabaseBackendQueriesAndMapsRows(): Promise<void> {
  const logger = createRecordingLogger();
  const supabase = fakeSupabase([
    {
      id: 12,
      title: "Casa en Cumbres",
      price: "3200000.00",
      city: "Monterrey",
      area: "Cumbres",
      bedrooms: 3,
      bathrooms: 2,
      property_type: "house",
      active: true,
    },
    { id: 13, title: "", price: "100", city: "Monterrey", active: true },
  ]);
  const repository = new CatalogRepository(logger, supabase);
  assert.equal(repository.getBackend(), "supabase");

  const entries = await repository.activeInCity("Monterrey");
  assert.deepEqual(entries, [
    {
      id: "12",
      title: "Casa en Cumbres",
      price: 3_200_000,
      city: "Monterrey",
      area: "Cumbres",
      bedrooms: 3,
      bathrooms: 2,
      property_type: "house",
      is_active: true,
    },
  ]);
  assert.equal(supabase.calls[0].table, "properties");
  assert.deepEqual(supabase.calls[0].filters, [
    { column: "active", op: "eq", value: true },
    { column: "city", op: "ilike", value: "Monterrey" },
  ]);
  assert.equal(logger.find("catalog.rows.skipped")?.meta?.skipped, 1);
}

async function testPingReportsReachability(): Promise<void> {
  assert.equal(await new CatalogRepository(createRecordingLogger(), undefined, SEED).ping(), true);

  const supabase = fakeSupabase([]);
  assert.equal(await new CatalogRepository(createRecordingLogger(), supabase).ping(), true);
  assert.deepEqual(supabase.calls, [
    { table: "properties", filters: [], options: { columns: "id", limit: 1 } },
  ]);

  const logger = createRecordingLogger();
  const unreachable = new CatalogRepository(logger, {
    async selectMany(): Promise<unknown[]> {
      throw new Error("Supabase request failed: HTTP 503");
    },
  });
  assert.equal(await unreachable.ping(), false);
  assert.equal(logger.find("catalog.health.failed")?.level, "error");
  assert.equal(logger.find("catalog.health.failed")?.meta?.error, "Supabase request failed: HTTP 503");
}

function testNormalizeCatalogEntry(): void {
  assert.equal(normalizeCatalogEntry({ id: "1", title: "x", price: 0, city: "CDMX" }), null);
  assert.equal(normalizeCatalogEntry("row"), null);
  assert.deepEqual(
    normalizeCatalogEntry({ id: "9", title: "Lote", price: 900000, city: "Puebla", property_type: "Land", is_active: false }),
    { id: "9", title: "Lote", price: 900_000, city: "Puebla", property_type: "land", is_active: false },
  );
}

function testParseCatalogSeed(): void {
  assert.equal(parseCatalogSeed({ properties: [SEED[0]] }).length, 1);
  assert.throws(() => parseCatalogSeed([SEED[0], { id: "x" }]), /Invalid catalog seed entry at index 1/);
  assert.throws(() => parseCatalogSeed("nope"), /Catalog seed must be an array/);
}

function testSeedFileLoads(): void {
  const entries = loadCatalogSeed("data/catalog.seed.json");
  assert.equal(entries.length, 30);
  assert.equal(entries.filter((entry) => !entry.is_active).length, 2);
  assert.equal(new Set(entries.map((entry) => entry.id)).size, 30);
}

test("filters the in-memory catalog by city and active flag", testMemoryBackendFilters);
test("queries the properties table and maps its rows", testSupabaseBackendQueriesAndMapsRows);
test("pings the catalog backend", testPingReportsReachability);
test("validates catalog rows", testNormalizeCatalogEntry);
test("parses a catalog seed document", testParseCatalogSeed);
test("loads the bundled seed catalog", testSeedFileLoads);
