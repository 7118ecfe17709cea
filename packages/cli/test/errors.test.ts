/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import {
  ConflictError,
  ContainerNotFoundError,
  DocumentReadError,
  IndexNotFoundError,
  NotAuthorizedError,
  QueryCompilationError,
  SearchNotFoundError,
  UserNotFoundError,
  ValidationError,
} from "@annostore/sdk";
import { CliError, mapSdkErrorToExitCode, formatCliError } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("not found", { exitCode: 2 });
      expect(err.exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapSdkErrorToExitCode", () => {
    it("should map every not-found error to exit code 2", () => {
      expect(mapSdkErrorToExitCode(new ContainerNotFoundError("letters"))).toBe(2);
      expect(mapSdkErrorToExitCode(new SearchNotFoundError("s1"))).toBe(2);
      expect(mapSdkErrorToExitCode(new IndexNotFoundError("letters", "body.type", "hashed"))).toBe(2);
      expect(mapSdkErrorToExitCode(new UserNotFoundError("ada"))).toBe(2);
    });

    it("should map authorization failures to exit code 3", () => {
      expect(mapSdkErrorToExitCode(new NotAuthorizedError("No authentication found"))).toBe(3);
    });

    it("should map validation, conflict, storage and usage errors to exit code 1", () => {
      const errors = [
        new ValidationError("bad"),
        new QueryCompilationError(["unknown operator"]),
        new ConflictError("stale etag"),
        new DocumentReadError("/tmp/x.json"),
        new InvalidArgumentError("bad flag"),
      ];

      for (const err of errors) {
        expect(mapSdkErrorToExitCode(err)).toBe(1);
      }
    });

    it("should use the exit code a CliError carries", () => {
      expect(mapSdkErrorToExitCode(new CliError("aborted", { exitCode: 4 }))).toBe(4);
    });

    it("should default to exit code 1 for unknown errors", () => {
      expect(mapSdkErrorToExitCode(new Error("unknown"))).toBe(1);
      expect(mapSdkErrorToExitCode("string error")).toBe(1);
      expect(mapSdkErrorToExitCode(null)).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should format error message", () => {
      expect(formatCliError(new Error("test error"))).toBe("test error");
    });

    it("should truncate long messages", () => {
      const formatted = formatCliError(new Error("x".repeat(3000)));
      expect(formatted).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should include cause in verbose mode", () => {
      const err = new Error("wrapper", { cause: new Error("underlying") });

      const formatted = formatCliError(err, true);
      expect(formatted).toContain("\n  Cause: Error: underlying");
    });

    it("should not include stack in non-verbose mode", () => {
      expect(formatCliError(new Error("test"), false)).toBe("test");
    });

    it("should handle non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(42)).toBe("42");
      expect(formatCliError(null)).toBe("null");
    });
  });
});
