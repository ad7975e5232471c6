export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = Record<string, unknown>;

export interface TextPart {
  kind: "text";
  text: string;
  /** Model reasoning rather than answer text; replayed but never returned to the caller */
  thought?: boolean;
  /** Opaque backend token that must be sent back with the part unchanged */
  thoughtSignature?: string;
}

export interface FunctionCallPart {
  kind: "functionCall";
  /** Correlation id, when the model backend supplies one */
  id?: string;
  name: string;
  /** Either a mapping or a JSON-encoded string, as the backend returned it */
  arguments: JsonObject | string;
  thoughtSignature?: string;
}

export interface FunctionResultPart {
  kind: "functionResult";
  id?: string;
  name: string;
  response: JsonObject;
}

export type Part = TextPart | FunctionCallPart | FunctionResultPart;

export type Role = "model" | "user";

export interface Turn {
  readonly role: Role;
  readonly parts: readonly Part[];
}

/**
 * What a model backend receives on each round: the original prompt plus
 * every turn appended so far. On the first round `turns` is empty.
 */
export interface Conversation {
  readonly prompt: string;
  readonly turns: readonly Turn[];
}

/**
 * One model response
 */
export interface ModelTurn {
  parts: Part[];
}
