import { z } from "zod";

import { upstreamLogger } from "../config/logger";

import { UpstreamError } from "./errors";

export const COUNTRIES_SERVICE = "RestCountries API";
export const RATES_SERVICE = "Open Exchange Rate API";

/**
 * Anything shaped like the global `fetch`. Injected so tests never touch the network.
 */
export type HttpClient = (url: string, init?: RequestInit) => Promise<Response>;

// ============================================================================
// Payload schemas
// ============================================================================

const nullableString = z.string().nullable().catch(null);

const rawCurrencySchema = z
  .object({ code: nullableString })
  .catch({ code: null });

const rawCountrySchema = z
  .object({
    name: nullableString,
    capital: nullableString,
    region: nullableString,
    population: z.union([z.number(), z.string()]).nullable().catch(null),
    flag: nullableString,
    currencies: z.array(rawCurrencySchema).nullable().catch(null),
  })
  .catch({
    name: null,
    capital: null,
    region: null,
    population: null,
    flag: null,
    currencies: null,
  });

const countriesPayloadSchema = z.array(rawCountrySchema);

const rateTableSchema = z.record(
  z.string(),
  z.union([z.number(), z.string()]).nullable().catch(null)
);

const ratesPayloadSchema = z.object({
  rates: rateTableSchema.optional().catch({}),
});

export type RawCountry = z.infer<typeof rawCountrySchema>;
export type RawRateTable = z.infer<typeof rateTableSchema>;

export interface UpstreamData {
  countries: RawCountry[];
  rates: RawRateTable;
}

export interface UpstreamOptions {
  countriesUrl: string;
  ratesUrl: string;
  timeoutMs: number;
  http?: HttpClient;
}

// ============================================================================
// Requests
// ============================================================================

async function requestJson(
  http: HttpClient,
  service: string,
  url: string,
  timeoutMs: number
): Promise<{ body: unknown; status: number }> {
  upstreamLogger.debug({ service, url, timeoutMs }, "Sending upstream request");

  const startTime = performance.now();
  let response: Response;
  try {
    response = await http(url, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    upstreamLogger.error({ service, url, err: error }, "Upstream request failed");
    throw new UpstreamError(service, undefined, { cause: error });
  }

  const duration = Math.round(performance.now() - startTime);
  upstreamLogger.debug(
    { service, status: response.status, duration: `${String(duration)}ms` },
    "Received upstream response"
  );

  if (!response.ok) {
    upstreamLogger.error(
      { service, status: response.status, statusText: response.statusText },
      "Upstream returned non-2xx status"
    );
    await response.body?.cancel();
    throw new UpstreamError(service, response.status);
  }

  try {
    return { body: await response.json(), status: response.status };
  } catch (error) {
    upstreamLogger.error({ service, err: error }, "Upstream body is not valid JSON");
    throw new UpstreamError(service, response.status, { cause: error });
  }
}

export async function fetchCountries(
  http: HttpClient,
  url: string,
  timeoutMs: number
): Promise<RawCountry[]> {
  const { body, status } = await requestJson(http, COUNTRIES_SERVICE, url, timeoutMs);
  const parsed = countriesPayloadSchema.safeParse(body);
  if (!parsed.success) {
    upstreamLogger.error(
      { service: COUNTRIES_SERVICE, issues: parsed.error.issues },
      "Unexpected countries payload"
    );
    throw new UpstreamError(COUNTRIES_SERVICE, status, { cause: parsed.error });
  }
  return parsed.data;
}

export async function fetchRates(
  http: HttpClient,
  url: string,
  timeoutMs: number
): Promise<RawRateTable> {
  const { body, status } = await requestJson(http, RATES_SERVICE, url, timeoutMs);
  const parsed = ratesPayloadSchema.safeParse(body);
  if (!parsed.success) {
    upstreamLogger.error(
      { service: RATES_SERVICE, issues: parsed.error.issues },
      "Unexpected exchange rate payload"
    );
    throw new UpstreamError(RATES_SERVICE, status, { cause: parsed.error });
  }
  return parsed.data.rates ?? {};
}

function asUpstreamError(reason: unknown, service: string): UpstreamError {
  return reason instanceof UpstreamError
    ? reason
    : new UpstreamError(service, undefined, { cause: reason });
}

/**
 * Fetch countries and exchange rates concurrently. Both are required: if
 * either fails the whole fetch fails, reporting the countries service first
 * when both are down.
 */
export async function fetchUpstreamData(options: UpstreamOptions): Promise<UpstreamData> {
  const http = options.http ?? fetch;
  upstreamLogger.info("Starting concurrent fetch from external APIs");

  const [countries, rates] = await Promise.allSettled([
    fetchCountries(http, options.countriesUrl, options.timeoutMs),
    fetchRates(http, options.ratesUrl, options.timeoutMs),
  ]);

  if (countries.status === "rejected") {
    throw asUpstreamError(countries.reason, COUNTRIES_SERVICE);
  }
  if (rates.status === "rejected") {
    throw asUpstreamError(rates.reason, RATES_SERVICE);
  }

  upstreamLogger.info(
    { countryCount: countries.value.length, rateCount: Object.keys(rates.value).length },
    "Fetched data from both APIs"
  );
  return { countries: countries.value, rates: rates.value };
}
