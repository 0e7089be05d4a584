import { existsSync } from "node:fs";
import { mkdir, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { createCanvas, GlobalFonts, loadImage, type Image } from "@napi-rs/canvas";

import { imageLogger } from "../config/logger";

import { ArtifactError, errorMessage } from "./errors";

import type { HttpClient } from "./fetchCountryData";
import type { CountryStore } from "../store/countryStore";

export const TOP_COUNTRIES = 5;
const WIDTH = 1000;
const HEIGHT = 800;
const FLAG_WIDTH = 60;
const FLAG_HEIGHT = 40;
export const FONT_FAMILY = "SummaryFont";
export const FALLBACK_FONT = "sans-serif";

export interface SummaryImageOptions {
  outputPath: string;
  fontPath: string;
  flagTimeoutMs: number;
  http?: HttpClient;
}

export interface SummaryArtifact {
  path: string;
  bytes: number;
  totalCountries: number;
  flagsDrawn: number;
  font: string;
}

export type SummaryImageResult =
  | { ok: true; artifact: SummaryArtifact }
  | { ok: false; error: ArtifactError };

const billions = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatRefreshTime(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

export function formatRankLine(rank: number, name: string, estimatedGdp: number): string {
  return `${String(rank)}. ${name} - GDP: $${billions.format(estimatedGdp / 1_000_000_000)} Billion`;
}

let registeredFontPath: string | null = null;

/**
 * Register the bundled font, or fall back to the built-in face when the file
 * is missing or unreadable.
 */
export function resolveFontFamily(fontPath: string): string {
  if (registeredFontPath === fontPath) {
    return FONT_FAMILY;
  }
  if (!existsSync(fontPath)) {
    imageLogger.warn({ fontPath }, "Font not found, falling back to default font");
    return FALLBACK_FONT;
  }
  try {
    if (GlobalFonts.registerFromPath(fontPath, FONT_FAMILY)) {
      registeredFontPath = fontPath;
      return FONT_FAMILY;
    }
    imageLogger.warn({ fontPath }, "Font could not be loaded, falling back to default font");
  } catch (error) {
    imageLogger.warn({ fontPath, err: error }, "Font could not be loaded, falling back to default font");
  }
  return FALLBACK_FONT;
}

async function fetchFlag(
  http: HttpClient,
  url: string,
  timeoutMs: number
): Promise<Image | null> {
  try {
    const response = await http(url, { signal: AbortSignal.timeout(timeoutMs) });
    if (!response.ok) {
      imageLogger.warn({ url, status: response.status }, "Failed to fetch flag image, skipping");
      await response.body?.cancel();
      return null;
    }
    const image = await loadImage(Buffer.from(await response.arrayBuffer()));
    if (image.width === 0 || image.height === 0) {
      imageLogger.warn({ url }, "Flag image is empty, skipping");
      return null;
    }
    return image;
  } catch (error) {
    imageLogger.warn({ url, err: error }, "Could not load flag image, skipping");
    return null;
  }
}

/**
 * Render the summary PNG from the current store state and write it to
 * `outputPath`, replacing any previous image. Never throws: failures come
 * back as an ArtifactError.
 */
export async function generateSummaryImage(
  source: Pick<CountryStore, "getSummary">,
  options: SummaryImageOptions
): Promise<SummaryImageResult> {
  const http = options.http ?? fetch;
  imageLogger.debug("Starting summary image generation");

  try {
    const summary = await source.getSummary(TOP_COUNTRIES);
    const flags = await Promise.all(
      summary.top.map((country) =>
        country.flag_url !== null
          ? fetchFlag(http, country.flag_url, options.flagTimeoutMs)
          : Promise.resolve(null)
      )
    );
    const flagsDrawn = flags.filter((flag) => flag !== null).length;
    imageLogger.debug({ total: summary.total, flagsDrawn }, "Image data ready");

    const font = resolveFontFamily(options.fontPath);
    const canvas = createCanvas(WIDTH, HEIGHT);
    const ctx = canvas.getContext("2d");

    ctx.fillStyle = "#ffffff";
    ctx.fillRect(0, 0, WIDTH, HEIGHT);
    ctx.textBaseline = "top";

    ctx.fillStyle = "#000000";
    ctx.font = `36px ${font}`;
    ctx.fillText("Country Data Summary", 50, 40);

    ctx.fillStyle = "#323232";
    ctx.font = `22px ${font}`;
    ctx.fillText(`Total Countries Cached: ${String(summary.total)}`, 50, 110);
    if (summary.last_full_refresh_at !== null) {
      ctx.fillText(`Last Refreshed: ${formatRefreshTime(summary.last_full_refresh_at)}`, 50, 150);
    }

    ctx.fillStyle = "#000000";
    ctx.font = `28px ${font}`;
    ctx.fillText("Top 5 Countries by Estimated GDP:", 50, 230);

    ctx.fillStyle = "#141414";
    ctx.font = `22px ${font}`;
    summary.top.forEach((country, i) => {
      const y = 300 + i * 80;
      const flag = flags[i];
      if (flag !== null && flag !== undefined) {
        ctx.drawImage(flag, 60, y, FLAG_WIDTH, FLAG_HEIGHT);
      }
      ctx.fillText(formatRankLine(i + 1, country.name, country.estimated_gdp), 140, y + 5);
    });

    const png = await canvas.encode("png");
    await mkdir(dirname(options.outputPath), { recursive: true });
    const tempPath = `${options.outputPath}.tmp`;
    await writeFile(tempPath, png);
    await rename(tempPath, options.outputPath);

    imageLogger.info(
      { path: options.outputPath, bytes: png.length },
      "Summary image generated"
    );
    return {
      ok: true,
      artifact: {
        path: options.outputPath,
        bytes: png.length,
        totalCountries: summary.total,
        flagsDrawn,
        font,
      },
    };
  } catch (error) {
    const artifactError = new ArtifactError(
      `Failed to generate summary image: ${errorMessage(error)}`,
      { cause: error }
    );
    imageLogger.error({ err: error }, artifactError.message);
    return { ok: false, error: artifactError };
  }
}
