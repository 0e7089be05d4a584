import type { RawCountry, RawRateTable } from "./fetchCountryData";
import type { CountryRecord } from "../types/country";

export const GDP_MULTIPLIER_MIN = 1000;
export const GDP_MULTIPLIER_MAX = 2000;

export type SkipReason = "missing_name";

export interface MergeNote {
  name: string;
  issue: "invalid_exchange_rate";
  currency_code: string;
  value: number | string | null;
}

export type MergeOutcome =
  | { status: "merged"; record: CountryRecord; notes: MergeNote[] }
  | { status: "skipped"; reason: SkipReason; raw: RawCountry };

export interface MergeBatch {
  records: CountryRecord[];
  skipped: Array<{ reason: SkipReason; raw: RawCountry }>;
  notes: MergeNote[];
}

/**
 * Non-negative integer population. Anything missing, non-numeric or negative
 * counts as 0; fractions are truncated.
 */
export function parsePopulation(value: number | string | null): number {
  const parsed = typeof value === "string" ? Number(value.trim()) : (value ?? 0);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return 0;
  }
  return Math.floor(parsed);
}

/**
 * Positive finite rate, or null when the value cannot be used as one.
 */
export function parseExchangeRate(value: number | string | null): number | null {
  if (value === null || (typeof value === "string" && value.trim() === "")) {
    return null;
  }
  const parsed = typeof value === "string" ? Number(value.trim()) : value;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

export function estimateGdp(
  population: number,
  exchangeRate: number | null,
  random: () => number = Math.random
): number {
  if (population <= 0 || exchangeRate === null) {
    return 0;
  }
  const multiplier =
    GDP_MULTIPLIER_MIN + random() * (GDP_MULTIPLIER_MAX - GDP_MULTIPLIER_MIN);
  return (population * multiplier) / exchangeRate;
}

export function mergeCountry(
  raw: RawCountry,
  rates: RawRateTable,
  random: () => number = Math.random
): MergeOutcome {
  const name = raw.name?.trim() ?? "";
  if (name === "") {
    return { status: "skipped", reason: "missing_name", raw };
  }

  const notes: MergeNote[] = [];
  const population = parsePopulation(raw.population);
  const firstCode = raw.currencies?.[0]?.code?.trim() ?? "";
  const currencyCode = firstCode === "" ? null : firstCode;

  let exchangeRate: number | null = null;
  if (currencyCode !== null && Object.hasOwn(rates, currencyCode)) {
    const rawRate = rates[currencyCode] ?? null;
    exchangeRate = parseExchangeRate(rawRate);
    if (exchangeRate === null) {
      notes.push({
        name,
        issue: "invalid_exchange_rate",
        currency_code: currencyCode,
        value: rawRate,
      });
    }
  }

  return {
    status: "merged",
    record: {
      name,
      capital: raw.capital,
      region: raw.region,
      population,
      currency_code: currencyCode,
      exchange_rate: exchangeRate,
      estimated_gdp: estimateGdp(population, exchangeRate, random),
      flag_url: raw.flag,
    },
    notes,
  };
}

export function mergeCountries(
  raws: RawCountry[],
  rates: RawRateTable,
  random: () => number = Math.random
): MergeBatch {
  const batch: MergeBatch = { records: [], skipped: [], notes: [] };

  for (const raw of raws) {
    const outcome = mergeCountry(raw, rates, random);
    if (outcome.status === "skipped") {
      batch.skipped.push({ reason: outcome.reason, raw: outcome.raw });
    } else {
      batch.records.push(outcome.record);
      batch.notes.push(...outcome.notes);
    }
  }

  return batch;
}
