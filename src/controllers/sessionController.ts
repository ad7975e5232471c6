import type { Request, Response, NextFunction, RequestHandler } from "express";
import { BridgeError, ToolCallError } from "../errors/index.js";
import { isJsonObject, type ChatOrchestrator, type SessionInfo, type ToolSession } from "../services/index.js";
import type {
  ConnectResponse,
  DisconnectResponse,
  ErrorResponse,
  ExecuteToolRequest,
  ExecuteToolResponse,
  HealthResponse,
  SessionInfoResponse,
  ToolsListResponse,
} from "../types/index.js";
import { sendBridgeError, sendError, toIsoString } from "../utils/index.js";

export interface SessionControllerDeps {
  session: ToolSession;
  orchestrator: ChatOrchestrator;
  enableDetailedErrors: boolean;
}

export interface SessionController {
  healthCheck: RequestHandler;
  connect: RequestHandler;
  getTools: RequestHandler;
  executeTool: RequestHandler<{ toolName: string }, ExecuteToolResponse | ErrorResponse, ExecuteToolRequest>;
  disconnect: RequestHandler;
}

function toSessionInfoResponse(info: SessionInfo): SessionInfoResponse {
  return { ...info, connectedAt: toIsoString(info.connectedAt) };
}

/**
 * Handlers for the tool session lifecycle and direct tool execution
 */
export function createSessionController({ session, orchestrator, enableDetailedErrors }: SessionControllerDeps): SessionController {
  const handleError = (error: unknown, res: Response, next: NextFunction) => {
    if (error instanceof BridgeError) {
      sendBridgeError(res, error, enableDetailedErrors);
      return;
    }
    next(error);
  };

  return {
    /**
     * GET /api/health
     */
    healthCheck(_req: Request, res: Response<HealthResponse>): void {
      const info = session.getInfo();
      res.json({
        status: info.status === "broken" ? "degraded" : "healthy",
        timestamp: new Date().toISOString(),
        backend: orchestrator.backendName,
        session: toSessionInfoResponse(info),
      });
    },

    /**
     * POST /api/connect
     * Connect the tool session (no-op when already connected)
     */
    async connect(_req: Request, res: Response<ConnectResponse | ErrorResponse>, next: NextFunction): Promise<void> {
      try {
        console.log("[SessionController] Connect request");
        await session.connect();
        res.status(201).json({
          tools: session.listCachedTools(),
          session: toSessionInfoResponse(session.getInfo()),
        });
      } catch (error) {
        handleError(error, res, next);
      }
    },

    /**
     * GET /api/tools
     * Tools cached at connect time
     */
    getTools(_req: Request, res: Response<ToolsListResponse | ErrorResponse>, next: NextFunction): void {
      try {
        const tools = session.listCachedTools();
        res.json({ tools, count: tools.length });
      } catch (error) {
        handleError(error, res, next);
      }
    },

    /**
     * POST /api/tools/:toolName/execute
     * Execute a tool directly, bypassing the model
     */
    async executeTool(
      req: Request<{ toolName: string }, ExecuteToolResponse | ErrorResponse, ExecuteToolRequest>,
      res: Response<ExecuteToolResponse | ErrorResponse>,
      next: NextFunction
    ): Promise<void> {
      try {
        const { toolName } = req.params;
        const toolArgs: unknown = req.body?.arguments;

        if (toolArgs !== undefined && !isJsonObject(toolArgs)) {
          sendError(res, "arguments must be an object if provided", "INVALID_REQUEST", 400);
          return;
        }

        console.log(`[SessionController] Execute tool '${toolName}'`);
        const result = await session.callTool(toolName, toolArgs ?? {});

        if (result.status === "error") {
          throw new ToolCallError(result.error, toolName, result.code, { durationMs: result.durationMs });
        }

        res.json({
          success: true,
          result: result.content,
          toolName,
          executionTime: result.durationMs,
        });
      } catch (error) {
        handleError(error, res, next);
      }
    },

    /**
     * DELETE /api/session
     */
    async disconnect(_req: Request, res: Response<DisconnectResponse>): Promise<void> {
      await session.close();
      res.json({ success: true, message: "Tool session closed" });
    },
  };
}
