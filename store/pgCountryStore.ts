import { dbLogger } from "../config/logger";
import { StorageError } from "../utils/errors";
import { nameKey } from "../utils/reconcileCountries";

import type { CountryStore, CountryWriter } from "./countryStore";
import type {
  CacheStatus,
  CountryFilters,
  CountryRecord,
  CountrySort,
  CountrySummary,
  CountryUpdate,
  StoredCountry,
  UpdatableField,
} from "../types/country";
import type { Pool, PoolClient } from "pg";

type CountryRow = {
  id: number;
  name: string;
  capital: string | null;
  region: string | null;
  population: number | string; // BIGINT
  currency_code: string | null;
  exchange_rate: number | null;
  estimated_gdp: number;
  flag_url: string | null;
  last_refreshed_at: Date;
};

const COUNTRY_COLUMNS = `id, name, capital, region, population, currency_code,
  exchange_rate, estimated_gdp, flag_url, last_refreshed_at`;

const FIELD_TYPES: Record<UpdatableField, string> = {
  capital: "text",
  region: "text",
  population: "bigint",
  currency_code: "text",
  exchange_rate: "float8",
  estimated_gdp: "float8",
  flag_url: "text",
};

const SORT_ORDER: Record<CountrySort, string> = {
  gdp_desc: "estimated_gdp DESC, id",
  gdp_asc: "estimated_gdp ASC, id",
  name_asc: "name ASC",
  name_desc: "name DESC",
};

function toStoredCountry(row: CountryRow): StoredCountry {
  return { ...row, population: Number(row.population) };
}

class PgCountryWriter implements CountryWriter {
  constructor(private readonly client: PoolClient) {}

  async bulkInsert(records: readonly CountryRecord[], refreshedAt: Date): Promise<void> {
    if (records.length === 0) return;

    await this.client.query(
      `INSERT INTO countries
        (name, name_key, capital, region, population, currency_code, exchange_rate, estimated_gdp, flag_url, last_refreshed_at)
      SELECT u.*, $10::timestamptz
      FROM UNNEST($1::text[], $2::text[], $3::text[], $4::text[], $5::bigint[], $6::text[], $7::float8[], $8::float8[], $9::text[])
        AS u(name, name_key, capital, region, population, currency_code, exchange_rate, estimated_gdp, flag_url)`,
      [
        records.map((r) => r.name),
        records.map((r) => nameKey(r.name)),
        records.map((r) => r.capital),
        records.map((r) => r.region),
        records.map((r) => r.population),
        records.map((r) => r.currency_code),
        records.map((r) => r.exchange_rate),
        records.map((r) => r.estimated_gdp),
        records.map((r) => r.flag_url),
        refreshedAt,
      ]
    );
    dbLogger.info({ count: records.length }, "Bulk-inserted countries");
  }

  async bulkUpdate(
    records: readonly CountryUpdate[],
    fields: readonly UpdatableField[],
    refreshedAt: Date
  ): Promise<void> {
    if (records.length === 0) return;

    const assignments = fields.map((field) => `${field} = u.${field}`);
    assignments.push(`last_refreshed_at = $${String(fields.length + 2)}::timestamptz`);
    const arrays = [
      "$1::int[]",
      ...fields.map((field, i) => `$${String(i + 2)}::${FIELD_TYPES[field]}[]`),
    ];

    await this.client.query(
      `UPDATE countries AS c
      SET ${assignments.join(", ")}
      FROM UNNEST(${arrays.join(", ")}) AS u(${["id", ...fields].join(", ")})
      WHERE c.id = u.id`,
      [
        records.map((r) => r.id),
        ...fields.map((field) => records.map((r) => r[field])),
        refreshedAt,
      ]
    );
    dbLogger.info({ count: records.length, fields }, "Bulk-updated countries");
  }

  async upsertCacheStatus(refreshedAt: Date): Promise<void> {
    await this.client.query(
      `INSERT INTO cache_status (id, last_full_refresh_at)
      VALUES (1, $1)
      ON CONFLICT (id) DO UPDATE SET last_full_refresh_at = EXCLUDED.last_full_refresh_at`,
      [refreshedAt]
    );
    dbLogger.info({ refreshedAt }, "Updated cache status");
  }
}

export class PgCountryStore implements CountryStore {
  constructor(private readonly pool: Pool) {}

  private async withStorageError<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      dbLogger.error({ err: error, operation }, "Database query failed");
      throw new StorageError(`Database operation failed (${operation})`, {
        cause: error,
      });
    }
  }

  async listAll(): Promise<StoredCountry[]> {
    return this.withStorageError("listAll", async () => {
      const { rows } = await this.pool.query<CountryRow>(
        `SELECT ${COUNTRY_COLUMNS} FROM countries ORDER BY id`
      );
      return rows.map(toStoredCountry);
    });
  }

  async transaction<T>(work: (tx: CountryWriter) => Promise<T>): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new StorageError("Could not connect to the database", { cause: error });
    }

    try {
      await client.query("BEGIN");
      dbLogger.debug("Transaction started");
      const result = await work(new PgCountryWriter(client));
      await client.query("COMMIT");
      dbLogger.debug("Transaction committed");
      client.release();
      return result;
    } catch (error) {
      let broken: Error | undefined;
      try {
        await client.query("ROLLBACK");
        dbLogger.warn({ err: error }, "Transaction rolled back");
      } catch (rollbackError) {
        dbLogger.error({ err: rollbackError }, "Rollback failed, discarding client");
        broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      }
      client.release(broken);

      throw error instanceof StorageError
        ? error
        : new StorageError("Failed to save data to the database", { cause: error });
    }
  }

  async getSummary(limit: number): Promise<CountrySummary> {
    return this.withStorageError("getSummary", async () => {
      const [count, top, status] = await Promise.all([
        this.pool.query<{ total: number }>("SELECT COUNT(*)::int AS total FROM countries"),
        this.pool.query<Pick<CountryRow, "name" | "estimated_gdp" | "flag_url">>(
          `SELECT name, estimated_gdp, flag_url FROM countries
          ORDER BY estimated_gdp DESC, id LIMIT $1`,
          [limit]
        ),
        this.pool.query<{ last_full_refresh_at: Date | null }>(
          "SELECT last_full_refresh_at FROM cache_status WHERE id = 1"
        ),
      ]);
      return {
        total: count.rows[0]?.total ?? 0,
        top: top.rows,
        last_full_refresh_at: status.rows[0]?.last_full_refresh_at ?? null,
      };
    });
  }

  async listCountries(filters: CountryFilters): Promise<StoredCountry[]> {
    return this.withStorageError("listCountries", async () => {
      const values: string[] = [];
      const where: string[] = [];

      if (filters.region !== undefined) {
        values.push(filters.region);
        where.push(`LOWER(region) = LOWER($${String(values.length)})`);
      }
      if (filters.currency !== undefined) {
        values.push(filters.currency);
        where.push(`LOWER(currency_code) = LOWER($${String(values.length)})`);
      }
      const order = filters.sort !== undefined ? SORT_ORDER[filters.sort] : "id";

      const { rows } = await this.pool.query<CountryRow>(
        `SELECT ${COUNTRY_COLUMNS} FROM countries
        ${where.length > 0 ? `WHERE ${where.join(" AND ")}` : ""}
        ORDER BY ${order}`,
        values
      );
      return rows.map(toStoredCountry);
    });
  }

  async findByName(name: string): Promise<StoredCountry | null> {
    return this.withStorageError("findByName", async () => {
      const { rows } = await this.pool.query<CountryRow>(
        `SELECT ${COUNTRY_COLUMNS} FROM countries WHERE name_key = $1 LIMIT 1`,
        [nameKey(name)]
      );
      const row = rows[0];
      return row !== undefined ? toStoredCountry(row) : null;
    });
  }

  async deleteByName(name: string): Promise<boolean> {
    return this.withStorageError("deleteByName", async () => {
      const result = await this.pool.query(
        "DELETE FROM countries WHERE name_key = $1",
        [nameKey(name)]
      );
      return (result.rowCount ?? 0) > 0;
    });
  }

  async getStatus(): Promise<{ total: number } & CacheStatus> {
    return this.withStorageError("getStatus", async () => {
      const [count, status] = await Promise.all([
        this.pool.query<{ total: number }>("SELECT COUNT(*)::int AS total FROM countries"),
        this.pool.query<{ last_full_refresh_at: Date | null }>(
          "SELECT last_full_refresh_at FROM cache_status WHERE id = 1"
        ),
      ]);
      return {
        total: count.rows[0]?.total ?? 0,
        last_full_refresh_at: status.rows[0]?.last_full_refresh_at ?? null,
      };
    });
  }
}
