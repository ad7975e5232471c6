// Gemini adapter using the @google/genai SDK
// Tool declarations are passed through as translated; conversation turns map
// onto Gemini Content (model -> functionCall parts, user -> functionResponse parts)

import { GoogleGenAI } from "@google/genai";
import type { Content, GenerateContentResponse, Part as GeminiPart } from "@google/genai";
import { BackendError, describeError } from "../../errors/index.js";
import type { Conversation, ModelTurn, Part } from "../../types/conversation.types.js";
import type { TranslatedToolSet } from "../../types/tool.types.js";
import { parseArguments } from "../ResultAggregator.js";
import type { ModelBackend } from "./ModelBackend.js";

export interface GeminiBackendOptions {
  apiKey?: string;
  model: string;
  systemPrompt?: string;
  /** Pre-built SDK client */
  client?: GoogleGenAI;
}

function toGeminiPart(part: Part): GeminiPart {
  switch (part.kind) {
    case "text":
      return {
        text: part.text,
        ...(part.thought !== undefined && { thought: part.thought }),
        ...(part.thoughtSignature !== undefined && { thoughtSignature: part.thoughtSignature }),
      };
    case "functionCall":
      return {
        functionCall: {
          ...(part.id !== undefined && { id: part.id }),
          name: part.name,
          args: parseArguments(part.arguments).args,
        },
        ...(part.thoughtSignature !== undefined && { thoughtSignature: part.thoughtSignature }),
      };
    case "functionResult":
      return {
        functionResponse: {
          ...(part.id !== undefined && { id: part.id }),
          name: part.name,
          response: part.response,
        },
      };
  }
}

/**
 * The prompt becomes the first user content, followed by every turn in order
 */
export function toGeminiContents(conversation: Conversation): Content[] {
  const contents: Content[] = [{ role: "user", parts: [{ text: conversation.prompt }] }];

  for (const turn of conversation.turns) {
    contents.push({
      role: turn.role,
      parts: turn.parts.map(toGeminiPart),
    });
  }

  return contents;
}

/**
 * Parts of the first candidate, kept as received so they can be replayed on
 * the next round: thought parts and thought signatures included. Unsupported
 * part kinds are skipped.
 */
export function fromGeminiResponse(response: Pick<GenerateContentResponse, "candidates">): ModelTurn {
  const parts: Part[] = [];

  for (const part of response.candidates?.[0]?.content?.parts ?? []) {
    if (part.functionCall) {
      parts.push({
        kind: "functionCall",
        ...(part.functionCall.id !== undefined && { id: part.functionCall.id }),
        name: part.functionCall.name ?? "unknown",
        arguments: part.functionCall.args ?? {},
        ...(part.thoughtSignature !== undefined && { thoughtSignature: part.thoughtSignature }),
      });
      continue;
    }

    if (typeof part.text === "string") {
      parts.push({
        kind: "text",
        text: part.text,
        ...(part.thought === true && { thought: true }),
        ...(part.thoughtSignature !== undefined && { thoughtSignature: part.thoughtSignature }),
      });
    }
  }

  return { parts };
}

export class GeminiBackend implements ModelBackend {
  readonly name = "Gemini";
  private client: GoogleGenAI | undefined;

  constructor(private readonly options: GeminiBackendOptions) {
    this.client = options.client;
    console.log(`[GeminiBackend] Initialized with model: ${options.model}`);
  }

  private getClient(): GoogleGenAI {
    if (!this.client) {
      if (!this.options.apiKey) {
        throw new BackendError(this.name, "GEMINI_API_KEY is not configured");
      }
      this.client = new GoogleGenAI({ apiKey: this.options.apiKey });
    }
    return this.client;
  }

  async generate(conversation: Conversation, tools: TranslatedToolSet, signal: AbortSignal): Promise<ModelTurn> {
    const client = this.getClient();

    try {
      const response = await client.models.generateContent({
        model: this.options.model,
        contents: toGeminiContents(conversation),
        config: {
          systemInstruction: this.options.systemPrompt,
          tools: tools.declarations.length > 0 ? [{ functionDeclarations: [...tools.declarations] }] : undefined,
          abortSignal: signal,
        },
      });

      const turn = fromGeminiResponse(response);
      const calls = turn.parts.filter((part) => part.kind === "functionCall").length;
      console.log(`[GeminiBackend] Response received: ${turn.parts.length} part(s), ${calls} function call(s)`);
      return turn;
    } catch (error) {
      console.error("[GeminiBackend] Error:", describeError(error));
      throw new BackendError(this.name, describeError(error), error);
    }
  }
}
