import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

export const DEMO_HOST_INFO = { name: "tool-bridge-demo-host", version: "1.0.0" } as const;

type Operator = "add" | "subtract" | "multiply" | "divide";
type TextOperation = "uppercase" | "lowercase" | "reverse" | "length" | "wordcount";

const OPERATORS: Record<Operator, string> = { add: "+", subtract: "-", multiply: "*", divide: "/" };

function reply(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}

function fail(text: string): CallToolResult {
  return { content: [{ type: "text", text }], isError: true };
}

function applyText(text: string, operation: TextOperation): string {
  switch (operation) {
    case "uppercase":
      return text.toUpperCase();
    case "lowercase":
      return text.toLowerCase();
    case "reverse":
      return [...text].reverse().join("");
    case "length":
      return `${text.length} characters`;
    case "wordcount": {
      const words = text.split(/\s+/).filter((word) => word.length > 0);
      return `${words.length} words`;
    }
  }
}

/**
 * Tool Host bundled with the gateway: runs in process when no external host
 * is configured, and backs the tests.
 */
export function createDemoToolHost(): McpServer {
  const server = new McpServer(DEMO_HOST_INFO);
  const log = (tool: string, detail: string) => console.log(`[DemoToolHost] ${tool}: ${detail}`);

  server.tool(
    "echo",
    "Returns its input unchanged. Handy for checking that the tool channel works.",
    { text: z.string().describe("Text to send back") },
    async ({ text }) => {
      log("echo", `${text.length} chars`);
      return reply(text);
    }
  );

  server.tool(
    "calculator",
    "Applies one arithmetic operator to two numbers",
    {
      operation: z.enum(["add", "subtract", "multiply", "divide"]).describe("Operator to apply"),
      a: z.number().describe("Left operand"),
      b: z.number().describe("Right operand"),
    },
    async ({ operation, a, b }) => {
      log("calculator", `${a} ${OPERATORS[operation]} ${b}`);
      if (operation === "divide" && b === 0) {
        return fail("Cannot divide by zero");
      }
      const value =
        operation === "add" ? a + b : operation === "subtract" ? a - b : operation === "multiply" ? a * b : a / b;
      return reply(`${a} ${OPERATORS[operation]} ${b} = ${value}`);
    }
  );

  server.tool(
    "get_time",
    "Reports the current time in an IANA timezone",
    {
      timezone: z.string().optional().default("UTC").describe("IANA timezone name, for example Europe/Oslo"),
    },
    async ({ timezone }) => {
      log("get_time", timezone);
      const now = new Date();
      try {
        return reply(`${now.toLocaleString("en-GB", { timeZone: timezone })} (${timezone})`);
      } catch {
        return fail(`Unknown timezone '${timezone}'`);
      }
    }
  );

  server.tool(
    "text_transform",
    "Rewrites or measures a piece of text",
    {
      text: z.string().describe("Input text"),
      operation: z.enum(["uppercase", "lowercase", "reverse", "length", "wordcount"]).describe("What to do with it"),
    },
    async ({ text, operation }) => {
      log("text_transform", operation);
      return reply(applyText(text, operation));
    }
  );

  return server;
}
