import type { Request, Response, NextFunction } from "express";

/**
 * Logs each request once it completes: method, path, status and duration
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  res.on("finish", () => {
    console.log(
      `[${new Date().toISOString()}] ${req.method} ${req.path} -> ${res.statusCode} (${Date.now() - startTime}ms)`
    );
  });
  next();
}
