import type { Express } from "express";
import type { AppConfig } from "./config/index.js";
import type { ToolSession } from "./services/index.js";
import { describeError } from "./errors/index.js";

export interface ServerDeps {
  config: AppConfig;
  session: ToolSession;
}

/**
 * Start the HTTP server and set up lifecycle handlers
 */
export function startServer(app: Express, { config, session }: ServerDeps) {
  const { port, host, env } = config.server;

  const server = app.listen(port, host, () => {
    console.log(`
╔══════════════════════════════════════════════════════════════╗
║          Tool Bridge Gateway                                 ║
╠══════════════════════════════════════════════════════════════╣
║  Server running at: http://${host}:${port.toString().padEnd(27)}║
║  Environment: ${env.padEnd(45)}║
║  Model backend: ${config.model.provider.padEnd(43)}║
║  Tool host: ${config.toolHost.type.padEnd(47)}║
╠══════════════════════════════════════════════════════════════╣
║  Endpoints:                                                  ║
║    POST   /api/connect              Connect to tool host     ║
║    GET    /api/tools                List available tools     ║
║    POST   /api/tools/:name/execute  Execute a tool           ║
║    POST   /api/chat                 Chat with the model      ║
║    DELETE /api/session              Close tool session       ║
╚══════════════════════════════════════════════════════════════╝
    `);
  });

  // Handle server errors
  server.on("error", (error: NodeJS.ErrnoException) => {
    if (error.code === "EADDRINUSE") {
      console.error(`[Error] Port ${port} is already in use`);
    } else {
      console.error("[Error] Server error:", error);
    }
    process.exit(1);
  });

  setupGracefulShutdown(server, session);

  return server;
}

/**
 * Set up graceful shutdown handlers
 */
function setupGracefulShutdown(server: ReturnType<Express["listen"]>, session: ToolSession) {
  let shuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`\n[Shutdown] Received ${signal}. Starting graceful shutdown...`);

    try {
      // Stop accepting new connections
      server.close();

      // ToolSession.close never throws
      await session.close();
      console.log("[Shutdown] Tool session closed");

      console.log("[Shutdown] Shutdown complete");
      process.exit(0);
    } catch (error) {
      console.error("[Shutdown] Error during shutdown:", describeError(error));
      process.exit(1);
    }
  }

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

  process.on("uncaughtException", (error) => {
    console.error("[Fatal] Uncaught Exception:", error);
    void gracefulShutdown("uncaughtException");
  });

  process.on("unhandledRejection", (reason, promise) => {
    console.error("[Fatal] Unhandled Rejection at:", promise, "reason:", reason);
  });
}
