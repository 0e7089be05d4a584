import { describe, it, expect } from "vitest";

import { toErrorResponse } from "../../../middleware/errorHandler";
import {
  ArtifactError,
  NotFoundError,
  StorageError,
  UpstreamError,
  ValidationError,
} from "../../../utils/errors";

describe("middleware/errorHandler", () => {
  describe("toErrorResponse", () => {
    it("should name the failing upstream service", () => {
      expect(toErrorResponse(new UpstreamError("Open Exchange Rate API", 429))).toEqual({
        status: 503,
        body: {
          error: "External data source unavailable",
          details: "Could not fetch data from Open Exchange Rate API",
          service_name: "Open Exchange Rate API",
          status_code: 429,
        },
      });
    });

    it("should report a null upstream status for connection failures", () => {
      const { body } = toErrorResponse(new UpstreamError("RestCountries API"));

      expect(body.status_code).toBeNull();
    });

    it("should hide storage details behind a generic 500", () => {
      const error = new StorageError("Failed to save data to the database", {
        cause: new Error("password authentication failed"),
      });

      expect(toErrorResponse(error)).toEqual({
        status: 500,
        body: { error: "Internal server error" },
      });
    });

    it("should pass validation details through", () => {
      expect(toErrorResponse(new ValidationError("Validation failed", { name: "is required" }))).toEqual({
        status: 400,
        body: { error: "Validation failed", details: { name: "is required" } },
      });
      expect(toErrorResponse(new ValidationError("Validation failed"))).toEqual({
        status: 400,
        body: { error: "Validation failed" },
      });
    });

    it("should use the not-found message", () => {
      expect(toErrorResponse(new NotFoundError("Country not found"))).toEqual({
        status: 404,
        body: { error: "Country not found" },
      });
    });

    it("should keep client errors raised by middleware as 4xx", () => {
      const parseError = Object.assign(new SyntaxError("Unexpected end of JSON input"), {
        status: 400,
      });

      expect(toErrorResponse(parseError)).toEqual({ status: 400, body: { error: "Bad request" } });
    });

    it("should treat anything else as a 500", () => {
      expect(toErrorResponse(new ArtifactError("disk full")).status).toBe(500);
      expect(toErrorResponse("boom")).toEqual({
        status: 500,
        body: { error: "Internal server error" },
      });
      expect(toErrorResponse({ status: 502 }).status).toBe(500);
    });
  });
});
