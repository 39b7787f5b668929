/**
 * OpenAI-compatible reasoner.
 *
 * One client covers Ollama (its `/v1` endpoint), DeepSeek and OpenAI; the
 * providers differ only in base URL, default model and key requirements.
 */

import OpenAI from "openai"

import {
  BaseReasoner,
  createResponse,
  type Message,
  type ReasonerEvent,
  ReasonerConfigError,
  type ReasonerResponse,
} from "./types.js"

export type OpenAICompatibleProvider = "ollama" | "deepseek" | "openai"

export const DEFAULT_OLLAMA_HOST = "http://localhost:11434"
export const DEFAULT_DEEPSEEK_BASE_URL = "https://api.deepseek.com"

/** Ollama ignores the key, but the SDK requires a non-empty one. */
const OLLAMA_PLACEHOLDER_KEY = "ollama"

export const DEFAULT_MODELS: Record<OpenAICompatibleProvider, string> = {
  ollama: "llama3.2",
  deepseek: "deepseek-chat",
  openai: "gpt-4o",
}

export interface OpenAICompatibleReasonerOptions {
  provider: OpenAICompatibleProvider
  model?: string
  apiKey?: string
  /** For ollama: the server host; `/v1` is appended when missing. */
  baseUrl?: string
}

export class OpenAICompatibleReasoner extends BaseReasoner {
  readonly backendId: OpenAICompatibleProvider
  readonly modelId: string

  private readonly client: OpenAI

  constructor(options: OpenAICompatibleReasonerOptions) {
    super()
    this.backendId = options.provider
    this.modelId = options.model || DEFAULT_MODELS[options.provider]
    this.client = createOpenAIClient(options)
  }

  async reason(messages: readonly Message[]): Promise<ReasonerResponse> {
    const start = Date.now()
    const completion = await this.client.chat.completions.create({
      model: this.modelId,
      messages: messages.map(toChatMessage),
    })

    const content = completion.choices[0]?.message.content ?? ""
    return createResponse({
      content,
      modelId: this.modelId,
      durationMs: Date.now() - start,
      metadata: usageMetadata(completion.usage),
    })
  }

  override async *streamReason(messages: readonly Message[]): AsyncIterable<ReasonerEvent> {
    const start = Date.now()
    const stream = await this.client.chat.completions.create({
      model: this.modelId,
      messages: messages.map(toChatMessage),
      stream: true,
      stream_options: { include_usage: true },
    })

    let fullText = ""
    let metadata: Record<string, unknown> = {}

    for await (const chunk of stream) {
      const text = chunk.choices[0]?.delta?.content
      if (text) {
        fullText += text
        yield { type: "text", content: text }
      }
      // The final chunk carries usage when include_usage is honoured.
      if (chunk.usage) {
        metadata = usageMetadata(chunk.usage)
      }
    }

    yield {
      type: "complete",
      response: createResponse({
        content: fullText,
        modelId: this.modelId,
        durationMs: Date.now() - start,
        metadata,
      }),
    }
  }
}

export function createOpenAIClient(options: {
  provider: OpenAICompatibleProvider
  apiKey?: string
  baseUrl?: string
}): OpenAI {
  switch (options.provider) {
    case "ollama":
      return new OpenAI({
        apiKey: options.apiKey || OLLAMA_PLACEHOLDER_KEY,
        baseURL: ollamaBaseUrl(options.baseUrl ?? DEFAULT_OLLAMA_HOST),
      })
    case "deepseek":
      if (!options.apiKey) {
        throw new ReasonerConfigError(
          "DEEPSEEK_API_KEY is not set. Set it in the environment to use the DeepSeek backend.",
        )
      }
      return new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl ?? DEFAULT_DEEPSEEK_BASE_URL,
      })
    case "openai":
      if (!options.apiKey) {
        throw new ReasonerConfigError(
          "OPENAI_API_KEY is not set. Set it in the environment to use the OpenAI backend.",
        )
      }
      return new OpenAI({
        apiKey: options.apiKey,
        ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
      })
  }
}

/** `http://localhost:11434` → `http://localhost:11434/v1` */
export function ollamaBaseUrl(host: string): string {
  const trimmed = host.replace(/\/+$/, "")
  return trimmed.endsWith("/v1") ? trimmed : `${trimmed}/v1`
}

function toChatMessage(message: Message): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content }
    case "user":
      return { role: "user", content: message.content }
    case "assistant":
      return { role: "assistant", content: message.content }
  }
}

function usageMetadata(usage: OpenAI.CompletionUsage | null | undefined): Record<string, unknown> {
  if (!usage) return {}
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
  }
}
