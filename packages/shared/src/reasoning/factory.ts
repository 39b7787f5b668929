import { AnthropicReasoner } from "./anthropic.js"
import { OpenAICompatibleReasoner } from "./openai-compatible.js"
import type { BackendId, Reasoner } from "./types.js"

export interface ReasonerOptions {
  backend: BackendId
  model?: string
  apiKey?: string
  baseUrl?: string
  /** Anthropic only. */
  maxTokens?: number
}

export function createReasoner(options: ReasonerOptions): Reasoner {
  switch (options.backend) {
    case "anthropic":
      return new AnthropicReasoner({
        apiKey: options.apiKey,
        model: options.model,
        baseUrl: options.baseUrl,
        maxTokens: options.maxTokens,
      })
    case "ollama":
    case "deepseek":
    case "openai":
      return new OpenAICompatibleReasoner({
        provider: options.backend,
        model: options.model,
        apiKey: options.apiKey,
        baseUrl: options.baseUrl,
      })
  }
}
