/**
 * Service exports
 *
 * Centralized exports for all service modules.
 */

// Tool host session
export { ToolSession } from "./ToolSession.js";
export type { SessionInfo, SessionStatus, ToolSessionOptions } from "./ToolSession.js";
export { createTransport, describeTransport } from "./transports.js";
export type { TransportFactory } from "./transports.js";

// Schema translation and result handling
export { translate, translateTool, translateToolSet, toJsonSchema } from "./SchemaTranslator.js";
export { collectFunctionCalls, collectText, isJsonObject, parseArguments, formatToolContent, toFunctionResult } from "./ResultAggregator.js";
export { ConversationLog } from "./ConversationLog.js";

// Orchestration
export { ChatOrchestrator, replies, MAX_ITERATIONS_REPLY } from "./ChatOrchestrator.js";
export type { ChatRun, OrchestrationState, OrchestratorOptions, ToolCallRecord } from "./ChatOrchestrator.js";

// Model backends
export { createModelBackend, GeminiBackend, BedrockBackend } from "./backends/index.js";
export type { ModelBackend } from "./backends/index.js";
