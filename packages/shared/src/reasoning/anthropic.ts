/**
 * Anthropic reasoner.
 *
 * System messages (persona, skill instructions, tool output) are joined into
 * the `system` parameter; user/assistant turns form the message list.
 */

import Anthropic from "@anthropic-ai/sdk"

import {
  BaseReasoner,
  createResponse,
  type Message,
  type ReasonerEvent,
  ReasonerConfigError,
  type ReasonerResponse,
} from "./types.js"

export const DEFAULT_ANTHROPIC_MODEL = "claude-sonnet-4-5-20250929"
const DEFAULT_MAX_TOKENS = 4096

export interface AnthropicReasonerOptions {
  apiKey?: string
  model?: string
  baseUrl?: string
  maxTokens?: number
}

export class AnthropicReasoner extends BaseReasoner {
  readonly backendId = "anthropic"
  readonly modelId: string

  private readonly client: Anthropic
  private readonly maxTokens: number

  constructor(options: AnthropicReasonerOptions) {
    super()
    if (!options.apiKey) {
      throw new ReasonerConfigError(
        "ANTHROPIC_API_KEY is not set. Set it in the environment to use the Anthropic backend.",
      )
    }
    this.modelId = options.model || DEFAULT_ANTHROPIC_MODEL
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS
    this.client = new Anthropic({
      apiKey: options.apiKey,
      ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
    })
  }

  async reason(messages: readonly Message[]): Promise<ReasonerResponse> {
    const start = Date.now()
    const { system, turns } = splitSystem(messages)
    const message = await this.client.messages.create({
      model: this.modelId,
      max_tokens: this.maxTokens,
      ...(system ? { system } : {}),
      messages: turns,
    })

    return createResponse({
      content: textOf(message.content),
      modelId: this.modelId,
      durationMs: Date.now() - start,
      metadata: {
        inputTokens: message.usage.input_tokens,
        outputTokens: message.usage.output_tokens,
        stopReason: message.stop_reason,
      },
    })
  }

  override async *streamReason(messages: readonly Message[]): AsyncIterable<ReasonerEvent> {
    const start = Date.now()
    const { system, turns } = splitSystem(messages)
    const stream = this.client.messages.stream({
      model: this.modelId,
      max_tokens: this.maxTokens,
      ...(system ? { system } : {}),
      messages: turns,
    })

    let fullText = ""
    for await (const event of stream) {
      if (event.type === "content_block_delta" && event.delta.type === "text_delta") {
        fullText += event.delta.text
        yield { type: "text", content: event.delta.text }
      }
    }

    const finalMessage = await stream.finalMessage()
    yield {
      type: "complete",
      response: createResponse({
        content: fullText,
        modelId: this.modelId,
        durationMs: Date.now() - start,
        metadata: {
          inputTokens: finalMessage.usage.input_tokens,
          outputTokens: finalMessage.usage.output_tokens,
          stopReason: finalMessage.stop_reason,
        },
      }),
    }
  }
}

function splitSystem(messages: readonly Message[]): {
  system: string
  turns: Anthropic.MessageParam[]
} {
  const system: string[] = []
  const turns: Anthropic.MessageParam[] = []
  for (const message of messages) {
    if (message.role === "system") {
      system.push(message.content)
    } else {
      turns.push({ role: message.role, content: message.content })
    }
  }
  return { system: system.join("\n\n"), turns }
}

function textOf(blocks: readonly Anthropic.ContentBlock[]): string {
  let text = ""
  for (const block of blocks) {
    if (block.type === "text") text += block.text
  }
  return text
}
