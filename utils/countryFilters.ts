import { ValidationError } from "./errors";

import type { CountryFilters, CountrySort } from "../types/country";

const SORTS: readonly CountrySort[] = ["gdp_desc", "gdp_asc", "name_asc", "name_desc"];

function isCountrySort(value: string): value is CountrySort {
  return SORTS.some((sort) => sort === value);
}

function readParam(query: Record<string, unknown>, key: string): string | undefined {
  const value = query[key];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

/**
 * Read `region`, `currency` and `sort` from a query string object.
 * Blank and repeated parameters are ignored; an unknown sort is rejected.
 */
export function parseCountryFilters(query: Record<string, unknown>): CountryFilters {
  const filters: CountryFilters = {};

  const region = readParam(query, "region");
  if (region !== undefined) filters.region = region;

  const currency = readParam(query, "currency");
  if (currency !== undefined) filters.currency = currency;

  const sort = readParam(query, "sort");
  if (sort !== undefined) {
    if (!isCountrySort(sort)) {
      throw new ValidationError("Validation failed", {
        sort: `must be one of ${SORTS.join(", ")}`,
      });
    }
    filters.sort = sort;
  }

  return filters;
}
