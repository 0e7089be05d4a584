import type {
  CacheStatus,
  CountryFilters,
  CountryRecord,
  CountrySummary,
  CountryUpdate,
  StoredCountry,
  UpdatableField,
} from "../types/country";

/**
 * Writes available inside a refresh transaction. Nothing written through a
 * writer is visible to readers until the surrounding transaction commits.
 */
export interface CountryWriter {
  bulkInsert(records: readonly CountryRecord[], refreshedAt: Date): Promise<void>;
  bulkUpdate(
    records: readonly CountryUpdate[],
    fields: readonly UpdatableField[],
    refreshedAt: Date
  ): Promise<void>;
  upsertCacheStatus(refreshedAt: Date): Promise<void>;
}

export interface CountryStore {
  /** Every stored country in one read. */
  listAll(): Promise<StoredCountry[]>;

  /**
   * Run `work` in a single transaction: all of its writes land or none do.
   * Failures surface as StorageError.
   */
  transaction<T>(work: (tx: CountryWriter) => Promise<T>): Promise<T>;

  getSummary(limit: number): Promise<CountrySummary>;

  listCountries(filters: CountryFilters): Promise<StoredCountry[]>;
  findByName(name: string): Promise<StoredCountry | null>;
  deleteByName(name: string): Promise<boolean>;
  getStatus(): Promise<{ total: number } & CacheStatus>;
}
