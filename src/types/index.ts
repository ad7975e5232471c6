/**
 * Type exports
 * Re-export all types from their respective modules
 */

// Conversation types
export type {
  JsonValue,
  JsonObject,
  TextPart,
  FunctionCallPart,
  FunctionResultPart,
  Part,
  Role,
  Turn,
  Conversation,
  ModelTurn,
} from "./conversation.types.js";

// Tool types
export type {
  SchemaNode,
  ToolSpec,
  TranslationDiagnostic,
  TranslatedToolSet,
  ToolCallResult,
  ToolListResult,
} from "./tool.types.js";

// API types
export type {
  ErrorResponse,
  SessionInfoResponse,
  ConnectResponse,
  ToolsListResponse,
  ExecuteToolRequest,
  ExecuteToolResponse,
  ChatRequest,
  ChatResponseBody,
  DisconnectResponse,
  HealthResponse,
} from "./api.types.js";
