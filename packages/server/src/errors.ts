/**
 * Mapping of sdk and validation errors to MCP error codes
 */

import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import {
  ConflictError,
  NotAuthorizedError,
  NotFoundError,
  ValidationError,
} from "@annostore/sdk";
import { z } from "zod";

export class ToolTimeoutError extends Error {
  readonly code = "ETIMEDOUT";

  constructor(timeoutMs: number) {
    super(`Tool execution timeout after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

export function mapErrorToMcp(error: unknown): { code: number; message: string } {
  if (error instanceof z.ZodError) {
    return {
      code: ErrorCode.InvalidParams,
      message: `Validation error: ${error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join(", ")}`,
    };
  }

  if (error instanceof ValidationError) {
    return { code: ErrorCode.InvalidParams, message: error.message };
  }

  if (error instanceof NotFoundError) {
    return { code: ErrorCode.InvalidRequest, message: `Not found: ${error.message}` };
  }

  if (error instanceof NotAuthorizedError) {
    return { code: ErrorCode.InvalidRequest, message: `Not authorized: ${error.message}` };
  }

  if (error instanceof ConflictError) {
    return { code: ErrorCode.InvalidRequest, message: `Conflict: ${error.message}` };
  }

  if (error instanceof ToolTimeoutError) {
    return { code: ErrorCode.RequestTimeout, message: error.message };
  }

  if (error instanceof Error) {
    return { code: ErrorCode.InternalError, message: error.message };
  }

  return { code: ErrorCode.InternalError, message: String(error) };
}
