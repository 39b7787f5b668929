import { randomUUID } from "node:crypto"

import type { Message } from "../reasoning/types.js"

/**
 * Conversation state across turns. Holds user and assistant messages only;
 * the persona and per-turn context are rebuilt by the orchestrator each turn.
 */
export interface Session {
  readonly id: string
  readonly createdAt: string
  messages: Message[]
}

export function createSession(init?: Partial<Session>): Session {
  return {
    id: init?.id ?? randomUUID(),
    createdAt: init?.createdAt ?? new Date().toISOString(),
    messages: init?.messages ? [...init.messages] : [],
  }
}
