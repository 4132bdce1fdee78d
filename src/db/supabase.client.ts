import fetch from "node-fetch";

export interface SupabaseRestClientConfig {
  url: string;
  serviceRoleKey: string;
}

export type SupabaseFilterOperator = "eq" | "ilike";

export interface SupabaseFilter {
  column: string;
  op: SupabaseFilterOperator;
  value: string | number | boolean;
}

export interface SupabaseSelectOptions {
  columns?: string;
  order?: string;
  limit?: number;
}

export class SupabaseRestClient {
  constructor(private readonly config: SupabaseRestClientConfig) {}

  async selectMany(
    table: string,
    filters: ReadonlyArray<SupabaseFilter>,
    options?: SupabaseSelectOptions,
  ): Promise<unknown[]> {
    const query = new URLSearchParams();
    query.set("select", options?.columns ?? "*");
    for (const filter of filters) {
      query.append(filter.column, `${filter.op}.${String(filter.value)}`);
    }
    if (options?.order) {
      query.set("order", options.order);
    }
    if (options?.limit !== undefined) {
      query.set("limit", String(options.limit));
    }

    const response = await fetch(
      `${this.config.url}/rest/v1/${table}?${query.toString()}`,
      {
        method: "GET",
        headers: this.baseHeaders({
          accept: "application/json",
        }),
      },
    );

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Supabase select failed: HTTP ${response.status} - ${body}`);
    }

    const rows: unknown = await response.json();
    if (!Array.isArray(rows)) {
      return [];
    }
    return rows;
  }

  private baseHeaders(extraHeaders?: Record<string, string>): Record<string, string> {
    return {
      apikey: this.config.serviceRoleKey,
      authorization: `Bearer ${this.config.serviceRoleKey}`,
      "content-type": "application/json",
      ...(extraHeaders ?? {}),
    };
  }
}
