import type { FunctionDeclaration } from "@google/genai";
import type { ToolCallErrorCode } from "../errors/index.js";

/**
 * Parameter schema as published by the Tool Host (JSON-Schema-like).
 * Values below the top level are untrusted and validated during translation.
 */
export interface SchemaNode {
  type?: string;
  description?: string;
  properties?: Record<string, unknown>;
  items?: unknown;
  required?: string[];
  [key: string]: unknown;
}

/**
 * A tool as listed by the Tool Host at session start
 */
export interface ToolSpec {
  name: string;
  description: string;
  parameterSchema: SchemaNode;
}

/**
 * A property or tool dropped during schema translation
 */
export interface TranslationDiagnostic {
  tool: string;
  /** Dotted path of the dropped property, empty when the whole tool was dropped */
  path: string;
  message: string;
}

/**
 * Model-native declarations for every translatable tool.
 * Computed once per connect and never mutated afterwards.
 */
export interface TranslatedToolSet {
  readonly declarations: readonly FunctionDeclaration[];
  readonly diagnostics: readonly TranslationDiagnostic[];
}

export type ToolCallResult =
  | {
      status: "success";
      /** Text segments in the order the Tool Host returned them */
      content: string[];
      durationMs: number;
    }
  | {
      status: "error";
      error: string;
      code: ToolCallErrorCode;
      durationMs: number;
    };

export interface ToolListResult {
  tools: readonly ToolSpec[];
  translated: TranslatedToolSet;
}
