import type { Request, Response } from "express";
import type { ErrorResponse } from "../types/index.js";

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  const response: ErrorResponse = {
    error: `No route for ${req.method} ${req.path}`,
    code: "NOT_FOUND",
  };
  res.status(404).json(response);
}
