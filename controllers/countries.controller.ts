import { existsSync } from "node:fs";
import path from "node:path";

import { config } from "../config/env";
import { refreshCountryData } from "../services/refreshCountries";
import { countryStore } from "../store";
import { parseCountryFilters } from "../utils/countryFilters";
import { NotFoundError } from "../utils/errors";
import { singleFlight } from "../utils/singleFlight";

import type { NextFunction, Request, Response } from "express";

// one refresh at a time; concurrent requests share the running one
const runRefresh = singleFlight(() =>
  refreshCountryData({
    store: countryStore,
    upstream: {
      countriesUrl: config.countriesApiUrl,
      ratesUrl: config.exchangeRateApiUrl,
      timeoutMs: config.upstreamTimeoutMs,
    },
    artifact: {
      outputPath: config.summaryImagePath,
      fontPath: config.summaryFontPath,
      flagTimeoutMs: config.flagTimeoutMs,
    },
  })
);

export async function refreshData(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const result = await runRefresh();
    res.status(200).json(result);
  } catch (err) {
    next(err);
  }
}

export async function getAllCountries(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const filters = parseCountryFilters(req.query);
    const countries = await countryStore.listCountries(filters);
    res.json(countries);
  } catch (err) {
    next(err);
  }
}

export async function getCountryByName(
  req: Request<{ name: string }>,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const country = await countryStore.findByName(req.params.name);
    if (country === null) {
      throw new NotFoundError("Country not found");
    }
    res.status(200).json(country);
  } catch (err) {
    next(err);
  }
}

export async function deleteCountryByName(
  req: Request<{ name: string }>,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const deleted = await countryStore.deleteByName(req.params.name);
    if (!deleted) {
      throw new NotFoundError("Country not found");
    }
    res.status(200).json({ message: "Country deleted successfully" });
  } catch (err) {
    next(err);
  }
}

export async function getStatus(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const status = await countryStore.getStatus();
    res.status(200).json({
      total_countries: status.total,
      last_refreshed_at: status.last_full_refresh_at,
    });
  } catch (err) {
    next(err);
  }
}

export function getSummaryImage(req: Request, res: Response, next: NextFunction): void {
  const imgPath = path.resolve(config.summaryImagePath);

  if (!existsSync(imgPath)) {
    next(new NotFoundError("Summary image not found"));
    return;
  }

  res.type("png");
  res.sendFile(imgPath, (err) => {
    if (err) {
      next(err);
    }
  });
}
