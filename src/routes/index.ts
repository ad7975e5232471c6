import { Router } from "express";
import { createChatController } from "../controllers/chatController.js";
import { createSessionController } from "../controllers/sessionController.js";
import type { ChatOrchestrator, ToolSession } from "../services/index.js";

export interface RouteDeps {
  session: ToolSession;
  orchestrator: ChatOrchestrator;
  enableDetailedErrors: boolean;
}

export function createRoutes(deps: RouteDeps): Router {
  const router = Router();
  const sessionController = createSessionController(deps);
  const chat = createChatController(deps);

  // Health check
  router.get("/health", sessionController.healthCheck);

  // Tool session
  router.post("/connect", sessionController.connect);
  router.get("/tools", sessionController.getTools);
  router.post("/tools/:toolName/execute", sessionController.executeTool);
  router.delete("/session", sessionController.disconnect);

  // Model-driven chat
  router.post("/chat", chat);

  return router;
}
