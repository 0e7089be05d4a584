import { refreshLogger } from "../config/logger";
import { UPDATABLE_FIELDS, type RefreshResult, type StoredCountry } from "../types/country";
import { StorageError } from "../utils/errors";
import {
  fetchUpstreamData,
  type HttpClient,
  type UpstreamData,
  type UpstreamOptions,
} from "../utils/fetchCountryData";
import {
  generateSummaryImage,
  type SummaryImageOptions,
  type SummaryImageResult,
} from "../utils/generateSummaryImage";
import { mergeCountries } from "../utils/mergeCountryRecords";
import { reconcileCountries } from "../utils/reconcileCountries";

import type { CountryStore } from "../store/countryStore";

export type RefreshState =
  | "idle"
  | "fetching"
  | "merging"
  | "reconciling"
  | "committing"
  | "generating_artifact"
  | "done"
  | "failed";

export interface RefreshOptions {
  store: CountryStore;
  upstream: Omit<UpstreamOptions, "http">;
  artifact: Omit<SummaryImageOptions, "http">;
  http?: HttpClient;
  random?: () => number;
  now?: () => Date;
  onTransition?: (state: RefreshState) => void;
  /** Replaces the summary image step; defaults to generateSummaryImage. */
  generateArtifact?: (
    store: CountryStore,
    options: SummaryImageOptions
  ) => Promise<SummaryImageResult>;
}

/**
 * Fetch both upstreams, merge, reconcile against the store and commit in one
 * transaction, then regenerate the summary image.
 *
 * Rejects with UpstreamError or StorageError; nothing is written when either
 * occurs. Summary image failures are logged and never fail the refresh.
 */
export async function refreshCountryData(options: RefreshOptions): Promise<RefreshResult> {
  const { store } = options;
  const now = options.now ?? (() => new Date());
  let state: RefreshState = "idle";
  const enter = (next: RefreshState): void => {
    refreshLogger.debug({ from: state, to: next }, "Refresh state transition");
    state = next;
    options.onTransition?.(next);
  };

  refreshLogger.info("Country data refresh initiated");

  enter("fetching");
  let upstream: UpstreamData;
  try {
    upstream = await fetchUpstreamData({ ...options.upstream, http: options.http });
  } catch (error) {
    enter("failed");
    refreshLogger.error({ err: error }, "Refresh failed while fetching upstream data");
    throw error;
  }
  refreshLogger.info(
    {
      countries: upstream.countries.length,
      exchangeRates: Object.keys(upstream.rates).length,
    },
    "Processing upstream data"
  );

  enter("merging");
  const batch = mergeCountries(upstream.countries, upstream.rates, options.random);
  for (const skipped of batch.skipped) {
    refreshLogger.warn({ reason: skipped.reason, raw: skipped.raw }, "Skipping country");
  }
  for (const note of batch.notes) {
    refreshLogger.warn(note, "Could not parse exchange rate, storing country without GDP");
  }

  enter("reconciling");
  let existing: StoredCountry[];
  try {
    existing = await store.listAll();
  } catch (error) {
    enter("failed");
    refreshLogger.error({ err: error }, "Refresh failed while reading existing countries");
    throw error instanceof StorageError
      ? error
      : new StorageError("Could not read existing countries", { cause: error });
  }
  const { toInsert, toUpdate } = reconcileCountries(existing, batch.records);
  refreshLogger.info(
    { existing: existing.length, toInsert: toInsert.length, toUpdate: toUpdate.length },
    "Reconciled countries against the store"
  );

  enter("committing");
  const refreshedAt = now();
  try {
    await store.transaction(async (tx) => {
      await tx.bulkInsert(toInsert, refreshedAt);
      await tx.bulkUpdate(toUpdate, UPDATABLE_FIELDS, refreshedAt);
      await tx.upsertCacheStatus(refreshedAt);
    });
  } catch (error) {
    enter("failed");
    refreshLogger.error({ err: error }, "Refresh failed while committing");
    throw error instanceof StorageError
      ? error
      : new StorageError("Failed to save data to the database", { cause: error });
  }
  refreshLogger.info({ refreshedAt }, "Refresh committed");

  enter("generating_artifact");
  const generate = options.generateArtifact ?? generateSummaryImage;
  try {
    const artifact = await generate(store, { ...options.artifact, http: options.http });
    if (!artifact.ok) {
      refreshLogger.warn({ err: artifact.error }, "Summary image not regenerated");
    }
  } catch (error) {
    refreshLogger.error({ err: error }, "Summary image generation threw");
  }

  enter("done");
  const result: RefreshResult = {
    status: "success",
    countries_processed: upstream.countries.length,
  };
  refreshLogger.info(result, "Country data refresh completed");
  return result;
}
