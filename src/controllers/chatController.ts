import type { Request, Response, NextFunction } from "express";
import { BridgeError } from "../errors/index.js";
import type { ChatOrchestrator } from "../services/index.js";
import type { ChatRequest, ChatResponseBody, ErrorResponse } from "../types/index.js";
import { sendBridgeError, sendError } from "../utils/index.js";

export interface ChatControllerDeps {
  orchestrator: ChatOrchestrator;
  enableDetailedErrors: boolean;
}

/**
 * POST /api/chat
 *
 * Runs the prompt through the orchestration loop. Backend failures come back
 * as a normal reply with state "failed"; only tool session failures are
 * answered with an error status.
 */
export function createChatController({ orchestrator, enableDetailedErrors }: ChatControllerDeps) {
  return async function chat(
    req: Request<object, ChatResponseBody | ErrorResponse, ChatRequest>,
    res: Response<ChatResponseBody | ErrorResponse>,
    next: NextFunction
  ): Promise<void> {
    try {
      const message: unknown = req.body?.message;

      if (typeof message !== "string" || message.trim() === "") {
        sendError(res, "message is required and must be a string", "INVALID_REQUEST", 400);
        return;
      }

      console.log(`[ChatController] Chat request: "${message.slice(0, 50)}..."`);

      const run = await orchestrator.run(message);

      res.json({
        reply: run.reply,
        state: run.state,
        rounds: run.rounds,
        toolsUsed: run.toolCalls.length > 0 ? run.toolCalls : undefined,
      });
    } catch (error) {
      if (error instanceof BridgeError) {
        sendBridgeError(res, error, enableDetailedErrors);
        return;
      }

      console.error("[ChatController] Error:", error);
      next(error);
    }
  };
}
