import { serverLogger } from "../config/logger";
import {
  NotFoundError,
  StorageError,
  UpstreamError,
  ValidationError,
} from "../utils/errors";

import type { NextFunction, Request, Response } from "express";

export interface ErrorResponse {
  status: number;
  body: {
    error: string;
    details?: string | Record<string, string>;
    service_name?: string;
    status_code?: number | null;
  };
}

function clientStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    const { status } = error;
    if (typeof status === "number" && status >= 400 && status < 500) {
      return status;
    }
  }
  return undefined;
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof UpstreamError) {
    return {
      status: error.statusCode,
      body: {
        error: "External data source unavailable",
        details: error.message,
        service_name: error.service,
        status_code: error.upstreamStatus ?? null,
      },
    };
  }

  if (error instanceof ValidationError) {
    return {
      status: error.statusCode,
      body:
        error.details !== undefined
          ? { error: "Validation failed", details: error.details }
          : { error: "Validation failed" },
    };
  }

  if (error instanceof NotFoundError) {
    return { status: error.statusCode, body: { error: error.message } };
  }

  if (error instanceof StorageError) {
    return { status: error.statusCode, body: { error: "Internal server error" } };
  }

  // e.g. malformed JSON bodies rejected by express.json()
  const status = clientStatus(error);
  if (status !== undefined) {
    return { status, body: { error: "Bad request" } };
  }

  return { status: 500, body: { error: "Internal server error" } };
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const { status, body } = toErrorResponse(err);
  if (status >= 500) {
    serverLogger.error({ err, method: req.method, url: req.originalUrl }, "Request failed");
  } else {
    serverLogger.debug({ status, method: req.method, url: req.originalUrl }, "Request rejected");
  }
  res.status(status).json(body);
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: "Not found",
    details: `Route ${req.method} ${req.originalUrl} not found`,
  });
}
