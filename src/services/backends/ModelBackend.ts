import type { Conversation, ModelTurn } from "../../types/conversation.types.js";
import type { TranslatedToolSet } from "../../types/tool.types.js";

/**
 * A language model that can request function calls.
 *
 * Implementations must honour `signal`: once it aborts, the in-flight
 * request is abandoned.
 */
export interface ModelBackend {
  /** Display name used in logs and in the reply strings of failed requests */
  readonly name: string;

  generate(conversation: Conversation, tools: TranslatedToolSet, signal: AbortSignal): Promise<ModelTurn>;
}
