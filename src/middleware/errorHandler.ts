import type { Request, Response, NextFunction, ErrorRequestHandler } from "express";
import { BridgeError } from "../errors/index.js";
import type { ErrorResponse } from "../types/index.js";

/**
 * Global error handler. Gateway errors keep their code and status; anything
 * else is a 500, with the stack only when detailed errors are enabled.
 */
export function createErrorHandler(enableDetailedErrors: boolean): ErrorRequestHandler {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof BridgeError) {
      console.error(`[Error] ${err.name} (${err.code}):`, err.message);
      const response: ErrorResponse = {
        error: err.message,
        code: err.code,
        details: enableDetailedErrors ? err.details : undefined,
      };
      res.status(err.statusCode).json(response);
      return;
    }

    if (err instanceof SyntaxError && "status" in err && err.status === 400) {
      const response: ErrorResponse = { error: "Request body is not valid JSON", code: "INVALID_JSON" };
      res.status(400).json(response);
      return;
    }

    console.error("[Error]", err);
    const message = err instanceof Error && err.message ? err.message : "Internal Server Error";
    const response: ErrorResponse = {
      error: message,
      code: "INTERNAL_ERROR",
      details: enableDetailedErrors && err instanceof Error ? err.stack : undefined,
    };
    res.status(500).json(response);
  };
}
