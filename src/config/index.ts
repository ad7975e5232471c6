/**
 * Configuration for the Tool Bridge Gateway.
 *
 * Built once at process start by `loadConfig()` and passed by reference into
 * the tool session, the model backend and the HTTP app. Nothing here reads
 * the environment after startup.
 */
import { z } from "zod";
import { ConfigError } from "../errors/index.js";

const stdioTransportSchema = z.object({
  type: z.literal("stdio"),
  /** Command to execute */
  command: z.string().min(1),
  /** Command arguments */
  args: z.array(z.string()).optional(),
  /** Environment variables */
  env: z.record(z.string()).optional(),
  /** Working directory */
  cwd: z.string().optional(),
});

const sseTransportSchema = z.object({
  type: z.literal("sse"),
  url: z.string().url(),
});

const streamableHttpTransportSchema = z.object({
  type: z.literal("streamable-http"),
  url: z.string().url(),
});

/** The bundled demonstration host, linked in process */
const inMemoryTransportSchema = z.object({
  type: z.literal("in-memory"),
});

const transportSchema = z.discriminatedUnion("type", [
  stdioTransportSchema,
  sseTransportSchema,
  streamableHttpTransportSchema,
  inMemoryTransportSchema,
]);

export type StdioTransportConfig = z.infer<typeof stdioTransportSchema>;
export type ToolHostTransportConfig = z.infer<typeof transportSchema>;

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  NODE_ENV: z.string().default("development"),
  ENABLE_REQUEST_LOGGING: z.string().optional(),

  TOOL_HOST_CONFIG: z.string().optional(),
  TOOL_HOST_TRANSPORT: z.enum(["stdio", "sse", "streamable-http", "in-memory"]).optional(),
  TOOL_HOST_COMMAND: z.string().optional(),
  TOOL_HOST_ARGS: z.string().optional(),
  TOOL_HOST_CWD: z.string().optional(),
  TOOL_HOST_URL: z.string().optional(),

  MODEL_PROVIDER: z.enum(["gemini", "bedrock"]).default("gemini"),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default("gemini-2.0-flash"),
  AWS_REGION: z.string().default("us-east-1"),
  BEDROCK_MODEL_ID: z.string().default("anthropic.claude-3-sonnet-20240229-v1:0"),
  BEDROCK_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  BEDROCK_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.7),

  MAX_ROUNDS: z.coerce.number().int().positive().default(10),
  GENERATE_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  TOOL_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  LLM_SYSTEM_PROMPT: z.string().optional(),
});

type RawEnv = z.infer<typeof envSchema>;

export type ModelProvider = RawEnv["MODEL_PROVIDER"];

export interface GeminiConfig {
  readonly apiKey?: string;
  readonly model: string;
}

export interface BedrockConfig {
  readonly region: string;
  readonly modelId: string;
  readonly maxTokens: number;
  readonly temperature: number;
}

export interface ModelConfig {
  readonly provider: ModelProvider;
  readonly systemPrompt: string;
  readonly gemini: GeminiConfig;
  readonly bedrock: BedrockConfig;
}

export interface OrchestrationConfig {
  /** Hard cap on generate calls per chat request */
  readonly maxRounds: number;
  /** Per generate call */
  readonly generateTimeoutMs: number;
  /** Per tool call */
  readonly toolCallTimeoutMs: number;
}

export interface AppConfig {
  readonly server: {
    readonly port: number;
    readonly host: string;
    readonly env: string;
  };
  readonly features: {
    readonly enableRequestLogging: boolean;
    readonly enableDetailedErrors: boolean;
  };
  readonly toolHost: ToolHostTransportConfig;
  readonly model: ModelConfig;
  readonly orchestration: OrchestrationConfig;
}

export const DEFAULT_SYSTEM_PROMPT = `You are a helpful AI assistant with access to tools.

When a request needs live data or an action, call the appropriate tool. For multi-step tasks, call tools in sequence and use each result to decide the next step. When a tool reports an error, explain it or try an alternative.

Answer concisely once you have everything you need.`;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/**
 * Parse TOOL_HOST_ARGS: either a JSON array of strings or a space separated list
 */
export function parseArgs(raw: string | undefined): string[] | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }

  const trimmed = raw.trim();
  if (trimmed.startsWith("[")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      throw new ConfigError("TOOL_HOST_ARGS is not valid JSON", String(error));
    }
    const result = z.array(z.string()).safeParse(parsed);
    if (!result.success) {
      throw new ConfigError("TOOL_HOST_ARGS must be an array of strings", formatIssues(result.error));
    }
    return result.data;
  }

  return trimmed.split(/\s+/);
}

function resolveToolHost(env: RawEnv): ToolHostTransportConfig {
  let candidate: unknown;

  if (env.TOOL_HOST_CONFIG) {
    try {
      candidate = JSON.parse(env.TOOL_HOST_CONFIG);
    } catch (error) {
      throw new ConfigError("TOOL_HOST_CONFIG is not valid JSON", String(error));
    }
  } else {
    const type =
      env.TOOL_HOST_TRANSPORT ??
      (env.TOOL_HOST_COMMAND ? "stdio" : env.TOOL_HOST_URL ? "sse" : "in-memory");

    switch (type) {
      case "stdio":
        candidate = {
          type,
          command: env.TOOL_HOST_COMMAND,
          args: parseArgs(env.TOOL_HOST_ARGS),
          cwd: env.TOOL_HOST_CWD,
        };
        break;
      case "sse":
      case "streamable-http":
        candidate = { type, url: env.TOOL_HOST_URL };
        break;
      case "in-memory":
        candidate = { type };
        break;
    }
  }

  const result = transportSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(
      `Invalid tool host configuration: ${formatIssues(result.error).join("; ")}`,
      formatIssues(result.error)
    );
  }
  return result.data;
}

/**
 * Build the configuration value from environment variables.
 * Throws ConfigError listing every invalid setting.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  const raw = parsed.data;

  const config: AppConfig = {
    server: {
      port: raw.PORT,
      host: raw.HOST,
      env: raw.NODE_ENV,
    },
    features: {
      enableRequestLogging: raw.ENABLE_REQUEST_LOGGING !== "false",
      enableDetailedErrors: raw.NODE_ENV === "development",
    },
    toolHost: resolveToolHost(raw),
    model: {
      provider: raw.MODEL_PROVIDER,
      systemPrompt: raw.LLM_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
      gemini: {
        apiKey: raw.GEMINI_API_KEY,
        model: raw.GEMINI_MODEL,
      },
      bedrock: {
        region: raw.AWS_REGION,
        modelId: raw.BEDROCK_MODEL_ID,
        maxTokens: raw.BEDROCK_MAX_TOKENS,
        temperature: raw.BEDROCK_TEMPERATURE,
      },
    },
    orchestration: {
      maxRounds: raw.MAX_ROUNDS,
      generateTimeoutMs: raw.GENERATE_TIMEOUT_MS,
      toolCallTimeoutMs: raw.TOOL_CALL_TIMEOUT_MS,
    },
  };

  return Object.freeze(config);
}
