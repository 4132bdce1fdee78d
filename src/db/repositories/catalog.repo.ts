import { Logger } from "../../config/logger";
import { CatalogEntry, CatalogSource } from "../../shared/types/catalog.types";
import { normalizeCatalogEntry } from "../catalog-seed";
import { SupabaseRestClient } from "../supabase.client";

const PROPERTIES_TABLE = "properties";
const PROPERTY_COLUMNS = "id,title,price,city,area,bedrooms,bathrooms,property_type,active";

export type CatalogBackend = "supabase" | "memory";

type CatalogRowReader = Pick<SupabaseRestClient, "selectMany">;

export class CatalogRepository implements CatalogSource {
  constructor(
    private readonly logger: Logger,
    private readonly supabaseClient?: CatalogRowReader,
    private readonly seedEntries: ReadonlyArray<CatalogEntry> = [],
  ) {}

  getBackend(): CatalogBackend {
    return this.supabaseClient ? "supabase" : "memory";
  }

  /** Reachability check used by `/health`. The in-memory seed is always reachable. */
  async ping(): Promise<boolean> {
    if (!this.supabaseClient) {
      return true;
    }
    try {
      await this.supabaseClient.selectMany(PROPERTIES_TABLE, [], { columns: "id", limit: 1 });
      return true;
    } catch (error) {
      this.logger.error("catalog.health.failed", {
        error: error instanceof Error ? error.message : "Unknown error",
      });
      return false;
    }
  }

  async activeInCity(city: string): Promise<CatalogEntry[]> {
    const cityKey = city.trim().toLowerCase();
    if (!cityKey) {
      return [];
    }

    if (!this.supabaseClient) {
      return this.seedEntries
        .filter((entry) => entry.is_active && entry.city.trim().toLowerCase() === cityKey)
        .map((entry) => ({ ...entry }));
    }

    const rows = await this.supabaseClient.selectMany(
      PROPERTIES_TABLE,
      [
        { column: "active", op: "eq", value: true },
        { column: "city", op: "ilike", value: city.trim() },
      ],
      { columns: PROPERTY_COLUMNS, order: "id.asc" },
    );

    const entries: CatalogEntry[] = [];
    let skipped = 0;
    for (const row of rows) {
      const entry = normalizeCatalogEntry(row);
      if (entry) {
        entries.push(entry);
      } else {
        skipped += 1;
      }
    }
    if (skipped > 0) {
      this.logger.warn("catalog.rows.skipped", { city, skipped });
    }
    return entries;
  }
}
