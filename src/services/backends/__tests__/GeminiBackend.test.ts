import { GenerateContentResponse, GoogleGenAI, Type } from "@google/genai";
import { describe, expect, it, vi } from "vitest";
import { BackendError } from "../../../errors/index.js";
import type { Conversation, TranslatedToolSet } from "../../../types/index.js";
import { GeminiBackend, fromGeminiResponse, toGeminiContents } from "../GeminiBackend.js";

const conversation: Conversation = {
  prompt: "What is 2 + 3?",
  turns: [
    {
      role: "model",
      parts: [{ kind: "functionCall", id: "c1", name: "calculator", arguments: '{"operation":"add","a":2,"b":3}' }],
    },
    {
      role: "user",
      parts: [{ kind: "functionResult", id: "c1", name: "calculator", response: { result: "2 add 3 = 5" } }],
    },
  ],
};

const noTools: TranslatedToolSet = { declarations: [], diagnostics: [] };

describe("toGeminiContents", () => {
  it("puts the prompt first and maps every turn", () => {
    expect(toGeminiContents(conversation)).toEqual([
      { role: "user", parts: [{ text: "What is 2 + 3?" }] },
      {
        role: "model",
        parts: [{ functionCall: { id: "c1", name: "calculator", args: { operation: "add", a: 2, b: 3 } } }],
      },
      {
        role: "user",
        parts: [{ functionResponse: { id: "c1", name: "calculator", response: { result: "2 add 3 = 5" } } }],
      },
    ]);
  });
});

describe("fromGeminiResponse", () => {
  it("keeps text, thoughts and function calls as received", () => {
    const turn = fromGeminiResponse({
      candidates: [
        {
          content: {
            role: "model",
            parts: [
              { text: "planning...", thought: true },
              { text: "Let me check." },
              { functionCall: { id: "c9", name: "get_time", args: { timezone: "UTC" } } },
              { functionCall: {} },
            ],
          },
        },
      ],
    });

    expect(turn.parts).toEqual([
      { kind: "text", text: "planning...", thought: true },
      { kind: "text", text: "Let me check." },
      { kind: "functionCall", id: "c9", name: "get_time", arguments: { timezone: "UTC" } },
      { kind: "functionCall", name: "unknown", arguments: {} },
    ]);
  });

  it("replays thought signatures on the next round", () => {
    const turn = fromGeminiResponse({
      candidates: [
        {
          content: {
            role: "model",
            parts: [
              { text: "weighing options", thought: true, thoughtSignature: "sig-thought" },
              { functionCall: { name: "echo", args: { text: "hi" } }, thoughtSignature: "sig-call" },
            ],
          },
        },
      ],
    });

    const contents = toGeminiContents({
      prompt: "Say hi",
      turns: [
        { role: "model", parts: turn.parts },
        { role: "user", parts: [{ kind: "functionResult", name: "echo", response: { result: "hi" } }] },
      ],
    });

    expect(contents[1]).toEqual({
      role: "model",
      parts: [
        { text: "weighing options", thought: true, thoughtSignature: "sig-thought" },
        { functionCall: { name: "echo", args: { text: "hi" } }, thoughtSignature: "sig-call" },
      ],
    });
  });

  it("returns no parts when there is no candidate", () => {
    expect(fromGeminiResponse({ candidates: [] })).toEqual({ parts: [] });
  });
});

describe("GeminiBackend", () => {
  it("fails with a BackendError when no API key is configured", async () => {
    const backend = new GeminiBackend({ model: "gemini-2.0-flash" });

    await expect(backend.generate(conversation, noTools, new AbortController().signal)).rejects.toThrow(
      new BackendError("Gemini", "GEMINI_API_KEY is not configured")
    );
  });

  it("sends contents, tools and the abort signal", async () => {
    const client = new GoogleGenAI({ apiKey: "test-secret" });
    const response = Object.assign(new GenerateContentResponse(), {
      candidates: [{ content: { role: "model", parts: [{ text: "5" }] } }],
    });
    const generateContent = vi.spyOn(client.models, "generateContent").mockResolvedValue(response);
    const backend = new GeminiBackend({ model: "gemini-2.0-flash", systemPrompt: "Be brief", client });
    const tools: TranslatedToolSet = {
      declarations: [{ name: "echo", description: "Echo", parameters: { type: Type.OBJECT, properties: {} } }],
      diagnostics: [],
    };
    const signal = new AbortController().signal;

    const turn = await backend.generate({ prompt: "Hi", turns: [] }, tools, signal);

    expect(turn).toEqual({ parts: [{ kind: "text", text: "5" }] });
    expect(generateContent).toHaveBeenCalledWith({
      model: "gemini-2.0-flash",
      contents: [{ role: "user", parts: [{ text: "Hi" }] }],
      config: {
        systemInstruction: "Be brief",
        tools: [{ functionDeclarations: tools.declarations }],
        abortSignal: signal,
      },
    });
  });

  it("wraps SDK failures", async () => {
    const client = new GoogleGenAI({ apiKey: "test-secret" });
    vi.spyOn(client.models, "generateContent").mockRejectedValue(new Error("429 Too Many Requests"));
    const backend = new GeminiBackend({ model: "gemini-2.0-flash", client });

    await expect(backend.generate(conversation, noTools, new AbortController().signal)).rejects.toMatchObject({
      name: "BackendError",
      backend: "Gemini",
      message: "429 Too Many Requests",
    });
  });
});
