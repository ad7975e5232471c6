import type { ChatRun, SessionInfo, ToolCallRecord } from "../services/index.js";
import type { ToolSpec } from "./tool.types.js";

/**
 * Standard error response
 */
export interface ErrorResponse {
  error: string;
  code: string;
  details?: unknown;
}

/**
 * Session info for API responses
 */
export interface SessionInfoResponse extends Omit<SessionInfo, "connectedAt"> {
  connectedAt: string | null;
}

/**
 * Response when the tool session is connected
 */
export interface ConnectResponse {
  tools: readonly ToolSpec[];
  session: SessionInfoResponse;
}

/**
 * Tools list response
 */
export interface ToolsListResponse {
  tools: readonly ToolSpec[];
  count: number;
}

/**
 * Request body for executing a tool directly
 */
export interface ExecuteToolRequest {
  arguments?: Record<string, unknown>;
}

/**
 * Response from tool execution
 */
export interface ExecuteToolResponse {
  success: true;
  result: string[];
  toolName: string;
  executionTime: number;
}

/**
 * Chat request body
 */
export interface ChatRequest {
  message: string;
}

/**
 * Chat response body
 */
export interface ChatResponseBody {
  reply: string;
  state: ChatRun["state"];
  rounds: number;
  toolsUsed?: ToolCallRecord[];
}

/**
 * Disconnect response
 */
export interface DisconnectResponse {
  success: boolean;
  message: string;
}

/**
 * Health check response
 */
export interface HealthResponse {
  status: string;
  timestamp: string;
  backend: string;
  session: SessionInfoResponse;
}
