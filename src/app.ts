import express, { type Express, type Request, type Response } from "express";
import type { AppConfig } from "./config/index.js";
import {
  createCorsMiddleware,
  createErrorHandler,
  notFoundHandler,
  preflightHandler,
  requestLogger,
} from "./middleware/index.js";
import { createRoutes } from "./routes/index.js";
import type { ChatOrchestrator, ToolSession } from "./services/index.js";

export interface AppDeps {
  config: AppConfig;
  session: ToolSession;
  orchestrator: ChatOrchestrator;
}

/**
 * Create and configure Express application
 */
export function createApp({ config, session, orchestrator }: AppDeps): Express {
  const app = express();
  const { enableRequestLogging, enableDetailedErrors } = config.features;

  // Body parsing middleware
  app.use(express.json());

  // Request logging
  if (enableRequestLogging) {
    app.use(requestLogger);
  }

  // CORS
  app.use(createCorsMiddleware());
  app.options("*", preflightHandler);

  // API routes
  app.use("/api", createRoutes({ session, orchestrator, enableDetailedErrors }));

  // Root endpoint - API info
  app.get("/", (_req: Request, res: Response) => {
    res.json({
      name: "Tool Bridge Gateway",
      version: "1.0.0",
      description: "Lets a language model call the tools of one Tool Host over MCP",
      backend: orchestrator.backendName,
      endpoints: {
        health: "GET /api/health",
        connect: "POST /api/connect",
        tools: "GET /api/tools",
        execute: "POST /api/tools/:toolName/execute",
        chat: "POST /api/chat",
        disconnect: "DELETE /api/session",
      },
    });
  });

  // Error handlers (must be last)
  app.use(notFoundHandler);
  app.use(createErrorHandler(enableDetailedErrors));

  return app;
}
