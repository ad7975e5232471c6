/**
 * Middleware exports
 */
export { createCorsMiddleware, preflightHandler } from "./cors.js";
export { requestLogger } from "./requestLogger.js";
export { createErrorHandler } from "./errorHandler.js";
export { notFoundHandler } from "./notFound.js";
