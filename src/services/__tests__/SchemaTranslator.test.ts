import { Type } from "@google/genai";
import { describe, expect, it } from "vitest";
import type { ToolSpec, TranslationDiagnostic } from "../../types/index.js";
import { mapType, toJsonSchema, translate, translateTool, translateToolSet } from "../SchemaTranslator.js";

function collector() {
  const diagnostics: TranslationDiagnostic[] = [];
  return { diagnostics, report: (d: TranslationDiagnostic) => diagnostics.push(d) };
}

describe("mapType", () => {
  it("maps every JSON Schema type name", () => {
    expect(mapType("string")).toBe(Type.STRING);
    expect(mapType("integer")).toBe(Type.INTEGER);
    expect(mapType("number")).toBe(Type.NUMBER);
    expect(mapType("boolean")).toBe(Type.BOOLEAN);
    expect(mapType("array")).toBe(Type.ARRAY);
    expect(mapType("object")).toBe(Type.OBJECT);
  });

  it("falls back to STRING for unknown or missing types", () => {
    expect(mapType("date-time")).toBe(Type.STRING);
    expect(mapType(undefined)).toBe(Type.STRING);
    expect(mapType(42)).toBe(Type.STRING);
    expect(mapType("toString")).toBe(Type.STRING);
  });
});

describe("translate", () => {
  it("keeps descriptions and string enums", () => {
    const schema = translate({ type: "string", description: "Unit", enum: ["c", "f"] });
    expect(schema).toEqual({ type: Type.STRING, description: "Unit", enum: ["c", "f"] });
  });

  it("translates array items recursively", () => {
    const schema = translate({ type: "array", items: { type: "object", properties: { id: { type: "integer" } } } });
    expect(schema).toEqual({
      type: Type.ARRAY,
      items: { type: Type.OBJECT, properties: { id: { type: Type.INTEGER } } },
    });
  });

  it("preserves array nesting three levels deep", () => {
    const inner = { type: "array", items: { type: "integer" } };
    const schema = translate({ type: "array", items: { type: "array", items: inner } });

    expect(schema).toEqual({
      type: Type.ARRAY,
      items: { type: Type.ARRAY, items: { type: Type.ARRAY, items: { type: Type.INTEGER } } },
    });
    expect(schema.items?.items).toEqual(translate(inner));
  });

  it("accepts an array without items as an untyped array", () => {
    const { diagnostics, report } = collector();
    const declaration = translateTool(
      {
        name: "tag",
        description: "",
        parameterSchema: { type: "object", properties: { tags: { type: "array", description: "Anything" } } },
      },
      report
    );

    expect(declaration.parameters?.properties).toEqual({ tags: { type: Type.ARRAY, description: "Anything" } });
    expect(diagnostics).toEqual([]);
  });

  it("drops a broken nested property and keeps its siblings", () => {
    const { diagnostics, report } = collector();
    const schema = translate(
      { type: "object", properties: { good: { type: "number" }, bad: "not a schema" } },
      report,
      "probe"
    );

    expect(schema).toEqual({ type: Type.OBJECT, properties: { good: { type: Type.NUMBER } } });
    expect(diagnostics).toEqual([
      { tool: "probe", path: "bad", message: "Expected a schema object, got string" },
    ]);
  });

  it("throws when the node itself is not an object", () => {
    expect(() => translate(null)).toThrow("Expected a schema object, got null");
  });
});

describe("translateTool", () => {
  it("always declares object parameters, even without properties", () => {
    const declaration = translateTool({ name: "ping", description: "", parameterSchema: {} });
    expect(declaration).toEqual({
      name: "ping",
      description: "",
      parameters: { type: Type.OBJECT, properties: {} },
    });
  });

  it("carries the required list through unchanged", () => {
    const declaration = translateTool({
      name: "calculator",
      description: "Arithmetic",
      parameterSchema: {
        type: "object",
        properties: { a: { type: "number" }, b: { type: "number" } },
        required: ["a", "b"],
      },
    });

    expect(declaration.parameters).toEqual({
      type: Type.OBJECT,
      properties: { a: { type: Type.NUMBER }, b: { type: Type.NUMBER } },
      required: ["a", "b"],
    });
  });

  it("maps an unknown property type to STRING", () => {
    const declaration = translateTool({
      name: "schedule",
      description: "",
      parameterSchema: { type: "object", properties: { when: { type: "date" } } },
    });
    expect(declaration.parameters?.properties).toEqual({ when: { type: Type.STRING } });
  });

  it("throws for a tool without a name", () => {
    expect(() => translateTool({ name: " ", description: "", parameterSchema: {} })).toThrow("Tool has no usable name");
  });
});

describe("translateToolSet", () => {
  it("translates each tool once and records dropped tools", () => {
    const { diagnostics, report } = collector();
    const specs: ToolSpec[] = [
      { name: "echo", description: "Echo", parameterSchema: { type: "object", properties: { text: { type: "string" } } } },
      { name: "", description: "", parameterSchema: {} },
    ];

    const set = translateToolSet(specs, report);

    expect(set.declarations.map((d) => d.name)).toEqual(["echo"]);
    expect(diagnostics).toEqual([{ tool: "", path: "", message: "Tool has no usable name" }]);
    expect(set.diagnostics).toEqual(diagnostics);
    expect(Object.isFrozen(set)).toBe(true);
    expect(Object.isFrozen(set.declarations)).toBe(true);
  });
});

describe("toJsonSchema", () => {
  it("lowercases types and keeps structure", () => {
    const json = toJsonSchema({
      type: Type.OBJECT,
      properties: { tags: { type: Type.ARRAY, items: { type: Type.STRING, enum: ["a"] } } },
      required: ["tags"],
    });

    expect(json).toEqual({
      type: "object",
      properties: { tags: { type: "array", items: { type: "string", enum: ["a"] } } },
      required: ["tags"],
    });
  });
});
