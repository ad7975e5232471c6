import { Type, type FunctionDeclaration, type Schema } from "@google/genai";
import { SchemaTranslationError, describeError } from "../errors/index.js";
import type { JsonValue } from "../types/conversation.types.js";
import type { ToolSpec, TranslatedToolSet, TranslationDiagnostic } from "../types/tool.types.js";

/**
 * JSON Schema type name -> Gemini schema type. Anything else becomes STRING.
 */
const TYPE_MAP: Readonly<Record<string, Type>> = {
  string: Type.STRING,
  integer: Type.INTEGER,
  number: Type.NUMBER,
  boolean: Type.BOOLEAN,
  array: Type.ARRAY,
  object: Type.OBJECT,
};

export type DiagnosticReporter = (diagnostic: TranslationDiagnostic) => void;

const logDiagnostic: DiagnosticReporter = (diagnostic) => {
  const where = diagnostic.path ? `${diagnostic.tool}.${diagnostic.path}` : diagnostic.tool;
  console.warn(`[SchemaTranslator] Dropped ${where}: ${diagnostic.message}`);
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === "string");
}

export function mapType(type: unknown): Type {
  if (typeof type === "string" && Object.hasOwn(TYPE_MAP, type)) {
    return TYPE_MAP[type];
  }
  return Type.STRING;
}

function joinPath(parent: string, key: string): string {
  return parent ? `${parent}.${key}` : key;
}

/**
 * Translate the `properties` of an object node one entry at a time.
 * A property that fails is dropped and reported; its siblings are kept.
 */
function translateProperties(
  properties: Record<string, unknown>,
  path: string,
  report: (path: string, message: string) => void
): Record<string, Schema> {
  const translated: Record<string, Schema> = {};

  for (const [key, value] of Object.entries(properties)) {
    const propertyPath = joinPath(path, key);
    try {
      translated[key] = translateNode(value, propertyPath, report);
    } catch (error) {
      report(propertyPath, describeError(error));
    }
  }

  return translated;
}

function translateNode(
  node: unknown,
  path: string,
  report: (path: string, message: string) => void
): Schema {
  if (!isRecord(node)) {
    throw new SchemaTranslationError(`Expected a schema object, got ${node === null ? "null" : typeof node}`, path);
  }

  const type = mapType(node.type);
  const schema: Schema = { type };

  if (typeof node.description === "string") {
    schema.description = node.description;
  }

  if (isStringArray(node.enum) && type === Type.STRING) {
    schema.enum = [...node.enum];
  }

  if (type === Type.ARRAY && node.items !== undefined) {
    schema.items = translateNode(node.items, `${path}[]`, report);
  }

  if (type === Type.OBJECT) {
    if (node.properties !== undefined) {
      if (!isRecord(node.properties)) {
        throw new SchemaTranslationError("properties must be an object", path);
      }
      schema.properties = translateProperties(node.properties, path, report);
    }
    if (isStringArray(node.required)) {
      schema.required = [...node.required];
    }
  }

  return schema;
}

/**
 * Convert one schema node to the model-native schema.
 *
 * Nested properties that cannot be translated are dropped and passed to
 * `report`; only a node that is not an object at all throws.
 */
export function translate(node: unknown, report: DiagnosticReporter = logDiagnostic, tool = ""): Schema {
  return translateNode(node, "", (path, message) => report({ tool, path, message }));
}

/**
 * Convert one tool. The parameters are always an object schema, even when
 * none of the properties survive translation.
 */
export function translateTool(spec: ToolSpec, report: DiagnosticReporter = logDiagnostic): FunctionDeclaration {
  if (typeof spec.name !== "string" || spec.name.trim() === "") {
    throw new SchemaTranslationError("Tool has no usable name", "");
  }
  if (spec.description !== undefined && typeof spec.description !== "string") {
    throw new SchemaTranslationError("Tool description must be a string", "");
  }

  const toolReport = (path: string, message: string) => report({ tool: spec.name, path, message });
  const source = spec.parameterSchema;
  const parameters: Schema = { type: Type.OBJECT, properties: {} };

  if (!isRecord(source)) {
    toolReport("", "parameter schema is not an object, declaring no parameters");
    return { name: spec.name, description: spec.description ?? "", parameters };
  }

  if (isRecord(source.properties)) {
    parameters.properties = translateProperties(source.properties, "", toolReport);
  } else if (source.properties !== undefined) {
    toolReport("", "properties must be an object, declaring no parameters");
  }

  if (isStringArray(source.required)) {
    parameters.required = [...source.required];
  }

  return {
    name: spec.name,
    description: spec.description ?? "",
    parameters,
  };
}

/**
 * Translate every tool. A tool that cannot be assembled is dropped from the
 * set and recorded as a diagnostic; the rest are still translated.
 */
export function translateToolSet(specs: readonly ToolSpec[], report: DiagnosticReporter = logDiagnostic): TranslatedToolSet {
  const diagnostics: TranslationDiagnostic[] = [];
  const collect: DiagnosticReporter = (diagnostic) => {
    diagnostics.push(diagnostic);
    report(diagnostic);
  };

  const declarations: FunctionDeclaration[] = [];
  for (const spec of specs) {
    try {
      declarations.push(translateTool(spec, collect));
    } catch (error) {
      collect({ tool: String(spec.name ?? "(unnamed)"), path: "", message: describeError(error) });
    }
  }

  return Object.freeze({
    declarations: Object.freeze(declarations),
    diagnostics: Object.freeze(diagnostics),
  });
}

/**
 * Convert a translated schema back to plain JSON Schema, for backends that
 * take JSON Schema directly.
 */
export function toJsonSchema(schema: Schema): { [key: string]: JsonValue } {
  const json: { [key: string]: JsonValue } = {
    type: (schema.type ?? Type.STRING).toLowerCase(),
  };

  if (schema.description !== undefined) {
    json.description = schema.description;
  }
  if (schema.enum !== undefined) {
    json.enum = [...schema.enum];
  }
  if (schema.items !== undefined) {
    json.items = toJsonSchema(schema.items);
  }
  if (schema.properties !== undefined) {
    const properties: { [key: string]: JsonValue } = {};
    for (const [key, value] of Object.entries(schema.properties)) {
      properties[key] = toJsonSchema(value);
    }
    json.properties = properties;
  }
  if (schema.required !== undefined) {
    json.required = [...schema.required];
  }

  return json;
}
