/**
 * Reasoning backend contract.
 *
 * A reasoner turns a message list into a reply. The orchestrator owns the
 * persona and context assembly; reasoners only forward role + content.
 */

import { randomUUID } from "node:crypto"

export type MessageRole = "system" | "user" | "assistant"

export const MESSAGE_ROLES: readonly MessageRole[] = ["system", "user", "assistant"]

export interface Message {
  readonly role: MessageRole
  readonly content: string
  readonly id: string
  readonly timestamp: string
}

export function createMessage(
  role: MessageRole,
  content: string,
  identity?: { id?: string; timestamp?: string },
): Message {
  return Object.freeze({
    role,
    content,
    id: identity?.id ?? randomUUID(),
    timestamp: identity?.timestamp ?? new Date().toISOString(),
  })
}

/**
 * Reasoner output for a single turn.
 * `metadata` is diagnostic (token counts, backend-specific fields); callers
 * must not depend on specific keys for core behaviour.
 */
export interface ReasonerResponse {
  readonly content: string
  readonly modelId: string
  readonly id: string
  readonly timestamp: string
  readonly durationMs: number
  readonly metadata: Readonly<Record<string, unknown>>
}

export function createResponse(input: {
  content: string
  modelId: string
  durationMs?: number
  metadata?: Record<string, unknown>
}): ReasonerResponse {
  return Object.freeze({
    content: input.content,
    modelId: input.modelId,
    id: randomUUID(),
    timestamp: new Date().toISOString(),
    durationMs: input.durationMs ?? 0,
    metadata: Object.freeze({ ...input.metadata }),
  })
}

// ──────────────────────────────────────────────────
// Streaming events
// ──────────────────────────────────────────────────

export interface ReasonerTextEvent {
  type: "text"
  content: string
}

/** Always the last event of a stream. */
export interface ReasonerCompleteEvent {
  type: "complete"
  response: ReasonerResponse
}

export type ReasonerEvent = ReasonerTextEvent | ReasonerCompleteEvent

// ──────────────────────────────────────────────────
// Reasoner
// ──────────────────────────────────────────────────

export type BackendId = "ollama" | "deepseek" | "openai" | "anthropic"

export const BACKEND_IDS: readonly BackendId[] = ["ollama", "deepseek", "openai", "anthropic"]

export function isBackendId(value: string): value is BackendId {
  return (BACKEND_IDS as readonly string[]).includes(value)
}

export interface Reasoner {
  readonly backendId: string
  readonly modelId: string
  reason(messages: readonly Message[]): Promise<ReasonerResponse>
  streamReason(messages: readonly Message[]): AsyncIterable<ReasonerEvent>
}

/**
 * Base class supplying the default streaming behaviour: the full reply from
 * `reason()` as a single text event, then the complete event.
 */
export abstract class BaseReasoner implements Reasoner {
  abstract readonly backendId: string
  abstract readonly modelId: string

  abstract reason(messages: readonly Message[]): Promise<ReasonerResponse>

  async *streamReason(messages: readonly Message[]): AsyncIterable<ReasonerEvent> {
    const response = await this.reason(messages)
    yield { type: "text", content: response.content }
    yield { type: "complete", response }
  }
}

export class ReasonerConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ReasonerConfigError"
  }
}
