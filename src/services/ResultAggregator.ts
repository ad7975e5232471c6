import type {
  FunctionCallPart,
  FunctionResultPart,
  JsonObject,
  ModelTurn,
} from "../types/conversation.types.js";
import type { ToolCallResult } from "../types/tool.types.js";

export interface ParsedArguments {
  args: JsonObject;
  /** True when the model sent a string that was not a JSON object */
  malformed: boolean;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Function calls of a model turn, in the order the model emitted them
 */
export function collectFunctionCalls(turn: ModelTurn): FunctionCallPart[] {
  return turn.parts.filter((part): part is FunctionCallPart => part.kind === "functionCall");
}

/**
 * Answer text of a model turn, concatenated in order. Thought parts are skipped.
 */
export function collectText(turn: ModelTurn): string {
  return turn.parts
    .map((part) => (part.kind === "text" && !part.thought ? part.text : ""))
    .join("");
}

/**
 * Arguments may arrive as a mapping or as a JSON string. A string that does
 * not decode to an object degrades to empty arguments.
 */
export function parseArguments(raw: FunctionCallPart["arguments"] | undefined): ParsedArguments {
  if (raw === undefined) {
    return { args: {}, malformed: false };
  }

  if (typeof raw !== "string") {
    return { args: raw, malformed: false };
  }

  if (raw.trim() === "") {
    return { args: {}, malformed: false };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { args: {}, malformed: true };
  }

  return isJsonObject(parsed) ? { args: parsed, malformed: false } : { args: {}, malformed: true };
}

/**
 * Format tool output text segments for the model
 */
export function formatToolContent(content: readonly string[]): string {
  return content.join("\n");
}

/**
 * Wrap one tool outcome into the result part paired with its call
 */
export function toFunctionResult(call: FunctionCallPart, result: ToolCallResult): FunctionResultPart {
  const response: JsonObject =
    result.status === "success"
      ? { result: formatToolContent(result.content) }
      : { error: result.error };

  return {
    kind: "functionResult",
    ...(call.id !== undefined && { id: call.id }),
    name: call.name,
    response,
  };
}
