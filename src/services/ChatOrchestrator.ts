import { v4 as uuidv4 } from "uuid";
import { BackendError, BackendTimeoutError, describeError } from "../errors/index.js";
import type { Conversation, FunctionCallPart, FunctionResultPart, JsonObject, ModelTurn } from "../types/conversation.types.js";
import type { TranslatedToolSet } from "../types/tool.types.js";
import type { ModelBackend } from "./backends/ModelBackend.js";
import { ConversationLog } from "./ConversationLog.js";
import { collectFunctionCalls, collectText, parseArguments, toFunctionResult } from "./ResultAggregator.js";
import type { ToolSession } from "./ToolSession.js";

export type OrchestrationState =
  | "idle"
  | "connecting"
  | "generating"
  | "dispatching"
  | "done"
  | "failed"
  | "exhausted";

export type TerminalState = Extract<OrchestrationState, "done" | "failed" | "exhausted">;

export const DEFAULT_MAX_ROUNDS = 10;
export const DEFAULT_GENERATE_TIMEOUT_MS = 120_000;

export const MAX_ITERATIONS_REPLY = "Maximum iterations reached";

export const replies = {
  timeout: (backend: string) => `Error: ${backend} API call timed out`,
  backendError: (backend: string, message: string) => `Error calling ${backend}: ${message}`,
  noResponse: (backend: string) => `No response from ${backend}`,
  exhausted: () => MAX_ITERATIONS_REPLY,
};

export interface OrchestratorOptions {
  maxRounds?: number;
  generateTimeoutMs?: number;
  /** Observes every state transition of every run */
  onStateChange?: (transition: { runId: string; from: OrchestrationState; to: OrchestrationState }) => void;
}

export interface ToolCallRecord {
  name: string;
  arguments: JsonObject;
  /** Argument text the model sent that was not a JSON object; the call ran with {} */
  rawArguments?: string;
  result?: string;
  error?: string;
  durationMs: number;
}

export interface ChatRun {
  runId: string;
  reply: string;
  state: TerminalState;
  /** Generate calls made */
  rounds: number;
  toolCalls: ToolCallRecord[];
  conversation: Conversation;
}

/**
 * ChatOrchestrator - drives one prompt through generate / dispatch rounds
 *
 * Each run owns its conversation log and round counter; runs may proceed
 * concurrently over the shared tool session.
 */
export class ChatOrchestrator {
  private readonly maxRounds: number;
  private readonly generateTimeoutMs: number;

  constructor(
    private readonly session: ToolSession,
    private readonly backend: ModelBackend,
    private readonly options: OrchestratorOptions = {}
  ) {
    this.maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    this.generateTimeoutMs = options.generateTimeoutMs ?? DEFAULT_GENERATE_TIMEOUT_MS;
  }

  get backendName(): string {
    return this.backend.name;
  }

  /**
   * Explicit lifecycle control; chat() also connects lazily
   */
  connect(): Promise<void> {
    return this.session.connect();
  }

  close(): Promise<void> {
    return this.session.close();
  }

  /**
   * Send a prompt and return the final answer. Backend failures, timeouts and
   * an exhausted round budget come back as descriptive strings.
   *
   * @throws ConnectionError | HostUnavailableError when the lazy connect fails
   * @throws SessionBrokenError when the tool host channel dies mid-request
   * @throws NotConnectedError after close()
   */
  async chat(prompt: string): Promise<string> {
    const run = await this.run(prompt);
    return run.reply;
  }

  async run(prompt: string): Promise<ChatRun> {
    const runId = uuidv4();
    let state: OrchestrationState = "idle";
    const transition = (to: OrchestrationState) => {
      this.options.onStateChange?.({ runId, from: state, to });
      state = to;
    };

    console.log(`[Orchestrator] Run ${runId}: "${prompt.slice(0, 50)}${prompt.length > 50 ? "..." : ""}"`);

    // joins a connect already in flight; a closed or broken session is not reopened here
    if (this.session.status === "idle" || this.session.status === "connecting") {
      transition("connecting");
      try {
        await this.session.connect();
      } catch (error) {
        transition("failed");
        console.error(`[Orchestrator] Run ${runId}: tool session connect failed:`, describeError(error));
        throw error;
      }
    }

    const log = new ConversationLog(prompt);
    const toolCalls: ToolCallRecord[] = [];
    let rounds = 0;

    const finish = (to: TerminalState, reply: string): ChatRun => {
      transition(to);
      console.log(`[Orchestrator] Run ${runId} ${to} after ${rounds} round(s), ${toolCalls.length} tool call(s)`);
      return { runId, reply, state: to, rounds, toolCalls, conversation: log.snapshot() };
    };

    while (rounds < this.maxRounds) {
      rounds += 1;
      transition("generating");

      let turn: ModelTurn;
      try {
        const tools = this.session.getTranslatedTools();
        if (rounds === 1) {
          console.log(`[Orchestrator] Sending initial prompt to ${this.backend.name}...`);
        } else {
          console.log(`[Orchestrator] Round ${rounds}: continuing conversation with function results...`);
        }
        turn = await this.generateWithTimeout(log.snapshot(), tools);
      } catch (error) {
        if (error instanceof BackendTimeoutError) {
          console.error(`[Orchestrator] ${this.backend.name} call timed out after ${this.generateTimeoutMs}ms`);
          return finish("failed", replies.timeout(this.backend.name));
        }
        if (error instanceof BackendError) {
          return finish("failed", replies.backendError(this.backend.name, error.message));
        }
        transition("failed");
        throw error;
      }

      const calls = collectFunctionCalls(turn);
      if (calls.length > 0) {
        transition("dispatching");
        console.log(`[Orchestrator] ${this.backend.name} wants to call ${calls.length} function(s)`);

        let results: FunctionResultPart[];
        try {
          results = await this.dispatch(calls, toolCalls);
        } catch (error) {
          transition("failed");
          throw error;
        }
        log.appendExchange(turn, results);
        continue;
      }

      const text = collectText(turn);
      if (text.length > 0) {
        return finish("done", text);
      }
      return finish("done", replies.noResponse(this.backend.name));
    }

    console.warn(`[Orchestrator] Run ${runId}: hit max rounds (${this.maxRounds})`);
    return finish("exhausted", replies.exhausted());
  }

  /**
   * Every call runs, in order; a failing call becomes an error result and
   * does not stop its siblings.
   */
  private async dispatch(calls: FunctionCallPart[], records: ToolCallRecord[]): Promise<FunctionResultPart[]> {
    const results: FunctionResultPart[] = [];

    for (const [index, call] of calls.entries()) {
      const { args, malformed } = parseArguments(call.arguments);
      const rawArguments = malformed && typeof call.arguments === "string" ? call.arguments : undefined;
      if (rawArguments !== undefined) {
        console.warn(`[Orchestrator] Arguments for '${call.name}' are not a JSON object, calling with {}. Raw:`, rawArguments);
      }

      console.log(`[Orchestrator] Function call ${index + 1}/${calls.length}: ${call.name}`);
      const outcome = await this.session.callTool(call.name, args);

      records.push({
        name: call.name,
        arguments: args,
        ...(rawArguments !== undefined && { rawArguments }),
        ...(outcome.status === "success"
          ? { result: outcome.content.join("\n") }
          : { error: outcome.error }),
        durationMs: outcome.durationMs,
      });
      results.push(toFunctionResult(call, outcome));
    }

    return results;
  }

  /**
   * Race the backend against the timeout. On expiry the request is aborted
   * and abandoned.
   */
  private async generateWithTimeout(conversation: Conversation, tools: TranslatedToolSet): Promise<ModelTurn> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new BackendTimeoutError(this.backend.name, this.generateTimeoutMs));
        controller.abort();
      }, this.generateTimeoutMs);
    });

    const generation = new Promise<ModelTurn>((resolve, reject) => {
      this.backend.generate(conversation, tools, controller.signal).then(resolve, reject);
    }).catch((error: unknown) => {
      if (error instanceof BackendError || error instanceof BackendTimeoutError) {
        throw error;
      }
      throw new BackendError(this.backend.name, describeError(error), error);
    });

    try {
      return await Promise.race([generation, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
