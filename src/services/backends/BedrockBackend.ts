import {
  BedrockRuntimeClient,
  ConverseCommand,
  type ContentBlock,
  type Message,
  type Tool,
  type ToolConfiguration,
  type ToolUseBlock,
} from "@aws-sdk/client-bedrock-runtime";
import { Type } from "@google/genai";
import { BackendError, describeError } from "../../errors/index.js";
import type { Conversation, ModelTurn, Part } from "../../types/conversation.types.js";
import type { TranslatedToolSet } from "../../types/tool.types.js";
import { parseArguments } from "../ResultAggregator.js";
import { toJsonSchema } from "../SchemaTranslator.js";
import type { ModelBackend } from "./ModelBackend.js";

type Document = Exclude<ToolUseBlock["input"], undefined>;

export interface BedrockBackendOptions {
  region: string;
  modelId: string;
  maxTokens: number;
  temperature: number;
  systemPrompt?: string;
  /** Pre-built SDK client */
  client?: BedrockRuntimeClient;
}

/**
 * Narrow an arbitrary value to a Smithy document
 */
export function toDocument(value: unknown): Document {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toDocument);
  }
  if (typeof value === "object") {
    const document: Record<string, Document> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry !== undefined) {
        document[key] = toDocument(entry);
      }
    }
    return document;
  }
  return null;
}

/**
 * Convert translated declarations to Bedrock tool configuration
 */
export function toBedrockToolConfig(tools: TranslatedToolSet): ToolConfiguration | undefined {
  const specs: Tool[] = [];

  for (const declaration of tools.declarations) {
    if (!declaration.name) {
      continue;
    }
    specs.push({
      toolSpec: {
        name: declaration.name,
        description: declaration.description || `Tool: ${declaration.name}`,
        inputSchema: {
          json: toDocument(toJsonSchema(declaration.parameters ?? { type: Type.OBJECT, properties: {} })),
        },
      },
    });
  }

  return specs.length > 0 ? { tools: specs } : undefined;
}

function toolResultText(response: Record<string, unknown>): string {
  if (typeof response.result === "string") {
    return response.result;
  }
  if (typeof response.error === "string") {
    return response.error;
  }
  return JSON.stringify(response);
}

/**
 * Convert the conversation to Converse messages.
 *
 * Bedrock pairs results with calls by toolUseId. Calls without an id get one
 * derived from their position, and results take the id of the call at the
 * same position in the preceding model turn.
 */
export function toBedrockMessages(conversation: Conversation): Message[] {
  const messages: Message[] = [{ role: "user", content: [{ text: conversation.prompt }] }];
  let pendingIds: string[] = [];

  conversation.turns.forEach((turn, turnIndex) => {
    const content: ContentBlock[] = [];

    if (turn.role === "model") {
      pendingIds = [];
      for (const part of turn.parts) {
        if (part.kind === "text" && part.text && !part.thought) {
          content.push({ text: part.text });
        } else if (part.kind === "functionCall") {
          const toolUseId = part.id ?? `call_${turnIndex}_${pendingIds.length}`;
          pendingIds.push(toolUseId);
          content.push({
            toolUse: {
              toolUseId,
              name: part.name,
              input: toDocument(parseArguments(part.arguments).args),
            },
          });
        }
      }
      messages.push({ role: "assistant", content });
      return;
    }

    let resultIndex = 0;
    for (const part of turn.parts) {
      if (part.kind === "functionResult") {
        const toolUseId = part.id ?? pendingIds[resultIndex] ?? `call_${turnIndex}_${resultIndex}`;
        resultIndex += 1;
        content.push({
          toolResult: {
            toolUseId,
            content: [{ text: toolResultText(part.response) }],
            status: "error" in part.response ? "error" : "success",
          },
        });
      } else if (part.kind === "text" && part.text) {
        content.push({ text: part.text });
      }
    }
    messages.push({ role: "user", content });
  });

  return messages;
}

/**
 * Map Converse output blocks back to parts
 */
export function fromBedrockContent(blocks: readonly ContentBlock[]): ModelTurn {
  const parts: Part[] = [];

  for (const block of blocks) {
    if (block.text !== undefined) {
      parts.push({ kind: "text", text: block.text });
    } else if (block.toolUse !== undefined) {
      const input = block.toolUse.input;
      parts.push({
        kind: "functionCall",
        ...(block.toolUse.toolUseId !== undefined && { id: block.toolUse.toolUseId }),
        name: block.toolUse.name ?? "unknown",
        arguments: typeof input === "object" && input !== null && !Array.isArray(input) ? input : {},
      });
    }
  }

  return { parts };
}

/**
 * BedrockBackend - Handles LLM interactions via AWS Bedrock
 *
 * Uses the Converse API with tool use support.
 */
export class BedrockBackend implements ModelBackend {
  readonly name = "Bedrock";
  private readonly client: BedrockRuntimeClient;

  constructor(private readonly options: BedrockBackendOptions) {
    this.client = options.client ?? new BedrockRuntimeClient({ region: options.region });
    console.log(`[BedrockBackend] Initialized with model: ${options.modelId}`);
  }

  async generate(conversation: Conversation, tools: TranslatedToolSet, signal: AbortSignal): Promise<ModelTurn> {
    const command = new ConverseCommand({
      modelId: this.options.modelId,
      messages: toBedrockMessages(conversation),
      system: this.options.systemPrompt ? [{ text: this.options.systemPrompt }] : undefined,
      toolConfig: toBedrockToolConfig(tools),
      inferenceConfig: {
        maxTokens: this.options.maxTokens,
        temperature: this.options.temperature,
      },
    });

    try {
      const response = await this.client.send(command, { abortSignal: signal });
      const turn = fromBedrockContent(response.output?.message?.content ?? []);
      console.log(
        `[BedrockBackend] Response: ${turn.parts.length} part(s) | stop: ${response.stopReason ?? "unknown"}`
      );
      return turn;
    } catch (error) {
      console.error("[BedrockBackend] Error:", describeError(error));
      throw new BackendError(this.name, describeError(error), error);
    }
  }
}
