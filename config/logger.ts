import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type Level, type LoggerOptions } from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
const LOG_FILE = process.env.LOG_FILE;

function isLevel(value: string): value is Level {
  return ["fatal", "error", "warn", "info", "debug", "trace"].includes(value);
}

// stdout, plus a file when LOG_FILE is set
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const level: Level = isLevel(LOG_LEVEL) ? LOG_LEVEL : "info";
  return pino.multistream([
    { level, stream: process.stdout },
    { level, stream: pino.destination({ dest: LOG_FILE, sync: false }) },
  ]);
}

const destination = createDestination();

export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

export const refreshLogger = logger.child({ module: "refresh" });
export const upstreamLogger = logger.child({ module: "upstream" });
export const dbLogger = logger.child({ module: "database" });
export const imageLogger = logger.child({ module: "summary-image" });
export const serverLogger = logger.child({ module: "server" });

if (LOG_FILE !== undefined && LOG_FILE !== "") {
  logger.info({ logFile: LOG_FILE, logLevel: LOG_LEVEL }, "Logging to file enabled");
}
