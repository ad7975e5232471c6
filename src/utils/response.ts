import type { Response } from "express";
import type { BridgeError } from "../errors/index.js";
import type { ErrorResponse } from "../types/index.js";

/**
 * Send a standardized error response
 */
export function sendError(
  res: Response,
  message: string,
  code: string,
  statusCode: number = 500,
  details?: unknown
): void {
  const errorResponse: ErrorResponse = { error: message, code, details };
  res.status(statusCode).json(errorResponse);
}

/**
 * Send a gateway error with its own code and status
 */
export function sendBridgeError(res: Response, error: BridgeError, includeDetails = false): void {
  sendError(res, error.message, error.code, error.statusCode, includeDetails ? error.details : undefined);
}

export function toIsoString(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}
