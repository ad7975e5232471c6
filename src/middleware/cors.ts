import type { Request, Response, NextFunction, RequestHandler } from "express";

/**
 * CORS middleware. Permissive ("*") unless an origin is given.
 */
export function createCorsMiddleware(allowedOrigin = "*"): RequestHandler {
  return (_req: Request, res: Response, next: NextFunction): void => {
    res.header("Access-Control-Allow-Origin", allowedOrigin);
    res.header("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept, Authorization");
    next();
  };
}

/**
 * Handle preflight OPTIONS requests
 */
export function preflightHandler(_req: Request, res: Response): void {
  res.sendStatus(204);
}
