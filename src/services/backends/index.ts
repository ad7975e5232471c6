import type { ModelConfig } from "../../config/index.js";
import { BedrockBackend } from "./BedrockBackend.js";
import { GeminiBackend } from "./GeminiBackend.js";
import type { ModelBackend } from "./ModelBackend.js";

export type { ModelBackend } from "./ModelBackend.js";
export { GeminiBackend } from "./GeminiBackend.js";
export { BedrockBackend } from "./BedrockBackend.js";

/**
 * Build the backend selected by `model.provider`
 */
export function createModelBackend(config: ModelConfig): ModelBackend {
  switch (config.provider) {
    case "gemini":
      return new GeminiBackend({
        apiKey: config.gemini.apiKey,
        model: config.gemini.model,
        systemPrompt: config.systemPrompt,
      });
    case "bedrock":
      return new BedrockBackend({
        ...config.bedrock,
        systemPrompt: config.systemPrompt,
      });
  }
}
