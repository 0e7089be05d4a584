import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1).default("postgresql://localhost:5432/countries"),
  DATABASE_SSL: booleanFlag,
  COUNTRIES_API_URL: z
    .string()
    .url()
    .default(
      "https://restcountries.com/v2/all?fields=name,capital,region,population,flag,currencies"
    ),
  EXCHANGE_RATE_API_URL: z
    .string()
    .url()
    .default("https://open.er-api.com/v6/latest/USD"),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  FLAG_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  SUMMARY_IMAGE_PATH: z.string().min(1).default("cache/summary.png"),
  SUMMARY_FONT_PATH: z.string().min(1).default("assets/fonts/Lato-Regular.ttf"),
});

export interface AppConfig {
  port: number;
  databaseUrl: string;
  databaseSsl: boolean;
  countriesApiUrl: string;
  exchangeRateApiUrl: string;
  upstreamTimeoutMs: number;
  flagTimeoutMs: number;
  summaryImagePath: string;
  summaryFontPath: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    databaseUrl: vars.DATABASE_URL,
    databaseSsl: vars.DATABASE_SSL,
    countriesApiUrl: vars.COUNTRIES_API_URL,
    exchangeRateApiUrl: vars.EXCHANGE_RATE_API_URL,
    upstreamTimeoutMs: vars.UPSTREAM_TIMEOUT_MS,
    flagTimeoutMs: vars.FLAG_TIMEOUT_MS,
    summaryImagePath: vars.SUMMARY_IMAGE_PATH,
    summaryFontPath: vars.SUMMARY_FONT_PATH,
  };
}

export const config = loadConfig();
