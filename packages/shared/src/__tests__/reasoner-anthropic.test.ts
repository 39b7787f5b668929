import { beforeEach, describe, expect, it, vi } from "vitest"

const { mockCreate, mockStream, mockConstructor } = vi.hoisted(() => ({
  mockCreate: vi.fn(),
  mockStream: vi.fn(),
  mockConstructor: vi.fn(),
}))

vi.mock("@anthropic-ai/sdk", () => ({
  default: class {
    messages = { create: mockCreate, stream: mockStream }
    constructor(options: unknown) {
      mockConstructor(options)
    }
  },
}))

import { AnthropicReasoner, DEFAULT_ANTHROPIC_MODEL } from "../reasoning/anthropic.js"
import { createReasoner } from "../reasoning/factory.js"
import { createMessage, type ReasonerEvent, ReasonerConfigError } from "../reasoning/types.js"

const messages = [
  createMessage("system", "persona"),
  createMessage("system", "Tool output (echo):\nmsg=hi"),
  createMessage("user", "hi"),
]

beforeEach(() => {
  mockCreate.mockReset()
  mockStream.mockReset()
  mockConstructor.mockReset()
})

describe("AnthropicReasoner", () => {
  it("requires an API key", () => {
    expect(() => new AnthropicReasoner({})).toThrow(ReasonerConfigError)
    expect(() => new AnthropicReasoner({})).toThrow("ANTHROPIC_API_KEY is not set")
  })

  it("passes the key and optional base URL to the client", () => {
    const reasoner = new AnthropicReasoner({ apiKey: "test-secret", baseUrl: "http://proxy" })
    expect(mockConstructor).toHaveBeenCalledWith({ apiKey: "test-secret", baseURL: "http://proxy" })
    expect(reasoner.modelId).toBe(DEFAULT_ANTHROPIC_MODEL)
    expect(reasoner.backendId).toBe("anthropic")
  })

  it("joins system messages into the system parameter", async () => {
    mockCreate.mockResolvedValue({
      content: [
        { type: "text", text: "Hi " },
        { type: "text", text: "there" },
      ],
      usage: { input_tokens: 9, output_tokens: 2 },
      stop_reason: "end_turn",
    })
    const reasoner = new AnthropicReasoner({ apiKey: "test-secret", model: "claude-test", maxTokens: 100 })

    const response = await reasoner.reason(messages)

    expect(mockCreate).toHaveBeenCalledWith({
      model: "claude-test",
      max_tokens: 100,
      system: "persona\n\nTool output (echo):\nmsg=hi",
      messages: [{ role: "user", content: "hi" }],
    })
    expect(response.content).toBe("Hi there")
    expect(response.metadata).toEqual({ inputTokens: 9, outputTokens: 2, stopReason: "end_turn" })
  })

  it("omits system when there are no system messages", async () => {
    mockCreate.mockResolvedValue({ content: [], usage: { input_tokens: 1, output_tokens: 0 }, stop_reason: null })
    await new AnthropicReasoner({ apiKey: "test-secret" }).reason([createMessage("user", "hi")])

    expect(mockCreate).toHaveBeenCalledWith({
      model: DEFAULT_ANTHROPIC_MODEL,
      max_tokens: 4096,
      messages: [{ role: "user", content: "hi" }],
    })
  })

  it("streams text deltas and finishes with usage from the final message", async () => {
    mockStream.mockReturnValue({
      async *[Symbol.asyncIterator]() {
        yield { type: "message_start" }
        yield { type: "content_block_delta", delta: { type: "text_delta", text: "Hel" } }
        yield { type: "content_block_delta", delta: { type: "input_json_delta", partial_json: "{}" } }
        yield { type: "content_block_delta", delta: { type: "text_delta", text: "lo" } }
      },
      finalMessage: async () => ({ usage: { input_tokens: 4, output_tokens: 2 }, stop_reason: "end_turn" }),
    })
    const events: ReasonerEvent[] = []

    for await (const event of new AnthropicReasoner({ apiKey: "test-secret" }).streamReason(messages)) {
      events.push(event)
    }

    expect(events.map((e) => (e.type === "text" ? e.content : "complete"))).toEqual([
      "Hel",
      "lo",
      "complete",
    ])
    const last = events[2]
    if (last?.type === "complete") {
      expect(last.response.content).toBe("Hello")
      expect(last.response.metadata).toEqual({ inputTokens: 4, outputTokens: 2, stopReason: "end_turn" })
    }
  })

  it("is built by createReasoner for the anthropic backend", () => {
    expect(createReasoner({ backend: "anthropic", apiKey: "test-secret" }).backendId).toBe("anthropic")
  })
})
