import type {
  Conversation,
  FunctionResultPart,
  ModelTurn,
  Turn,
} from "../types/conversation.types.js";
import { collectFunctionCalls } from "./ResultAggregator.js";

/**
 * Append-only record of one chat request.
 *
 * Turns are only ever appended in pairs: the model turn that requested
 * function calls, then a user turn with exactly one result per call, in
 * call order. Appended turns are frozen.
 */
export class ConversationLog {
  private readonly turns: Turn[] = [];

  constructor(readonly prompt: string) {}

  get length(): number {
    return this.turns.length;
  }

  appendExchange(modelTurn: ModelTurn, results: readonly FunctionResultPart[]): void {
    const calls = collectFunctionCalls(modelTurn);

    if (calls.length === 0) {
      throw new Error("Cannot append an exchange for a model turn without function calls");
    }
    if (calls.length !== results.length) {
      throw new Error(`Expected ${calls.length} function result(s), got ${results.length}`);
    }
    calls.forEach((call, index) => {
      if (results[index].name !== call.name) {
        throw new Error(
          `Function result ${index} is for '${results[index].name}' but call ${index} was '${call.name}'`
        );
      }
    });

    const requested: Turn = { role: "model", parts: Object.freeze([...modelTurn.parts]) };
    const answered: Turn = { role: "user", parts: Object.freeze([...results]) };
    this.turns.push(Object.freeze(requested), Object.freeze(answered));
  }

  /**
   * Immutable view handed to the model backend
   */
  snapshot(): Conversation {
    return Object.freeze({ prompt: this.prompt, turns: Object.freeze([...this.turns]) });
  }
}
