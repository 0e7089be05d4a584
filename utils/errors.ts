// ============================================================================
// Refresh pipeline errors
// ============================================================================

export class UpstreamError extends Error {
  code = "UPSTREAM_ERROR" as const;
  statusCode = 503;
  readonly service: string;
  readonly upstreamStatus?: number;

  constructor(service: string, upstreamStatus?: number, options?: ErrorOptions) {
    super(`Could not fetch data from ${service}`, options);
    this.name = "UpstreamError";
    this.service = service;
    this.upstreamStatus = upstreamStatus;
  }
}

export class StorageError extends Error {
  code = "STORAGE_ERROR" as const;
  statusCode = 500;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StorageError";
  }
}

export class ArtifactError extends Error {
  code = "ARTIFACT_ERROR" as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ArtifactError";
  }
}

// ============================================================================
// Read API errors
// ============================================================================

export class NotFoundError extends Error {
  code = "NOT_FOUND" as const;
  statusCode = 404;

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends Error {
  code = "VALIDATION_ERROR" as const;
  statusCode = 400;
  details?: Record<string, string>;

  constructor(message: string, details?: Record<string, string>) {
    super(message);
    this.name = "ValidationError";
    this.details = details;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
