/**
 * A normalised country as produced by a refresh, before it has a stored identity.
 */
export interface CountryRecord {
  name: string;
  capital: string | null;
  region: string | null;
  population: number;
  currency_code: string | null;
  exchange_rate: number | null; // null when the rate is unknown or unusable
  estimated_gdp: number;
  flag_url: string | null;
}

export interface StoredCountry extends CountryRecord {
  id: number;
  last_refreshed_at: Date;
}

/**
 * A record matched to an existing row: fresh values, stored id and name.
 */
export interface CountryUpdate extends CountryRecord {
  id: number;
}

export const UPDATABLE_FIELDS = [
  "capital",
  "region",
  "population",
  "currency_code",
  "exchange_rate",
  "estimated_gdp",
  "flag_url",
] as const;

export type UpdatableField = (typeof UPDATABLE_FIELDS)[number];

export interface CacheStatus {
  last_full_refresh_at: Date | null;
}

export interface CountrySummary {
  total: number;
  top: Array<Pick<StoredCountry, "name" | "estimated_gdp" | "flag_url">>;
  last_full_refresh_at: Date | null;
}

export type CountrySort = "gdp_desc" | "gdp_asc" | "name_asc" | "name_desc";

export interface CountryFilters {
  region?: string;
  currency?: string;
  sort?: CountrySort;
}

export interface RefreshResult {
  status: "success";
  countries_processed: number;
}
