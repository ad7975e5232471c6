import "dotenv/config";
import { createApp } from "./app.js";
import { loadConfig } from "./config/index.js";
import { describeError } from "./errors/index.js";
import { startServer } from "./server.js";
import { ChatOrchestrator, ToolSession, createModelBackend } from "./services/index.js";

function main(): void {
  const config = loadConfig();

  const session = new ToolSession({
    transport: config.toolHost,
    toolCallTimeoutMs: config.orchestration.toolCallTimeoutMs,
  });
  const backend = createModelBackend(config.model);
  const orchestrator = new ChatOrchestrator(session, backend, {
    maxRounds: config.orchestration.maxRounds,
    generateTimeoutMs: config.orchestration.generateTimeoutMs,
  });

  const app = createApp({ config, session, orchestrator });
  startServer(app, { config, session });
}

try {
  main();
} catch (error) {
  console.error("[Fatal] Failed to start:", describeError(error));
  process.exit(1);
}
