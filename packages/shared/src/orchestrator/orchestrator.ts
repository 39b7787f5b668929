/**
 * Orchestrator: assembles the per-turn message list and delegates to a
 * Reasoner.
 *
 * Message order: persona, skill instructions, tool output, session history,
 * user prompt. Only the user prompt and the reply are appended to the
 * session; persona and per-turn context are rebuilt every turn.
 */

import {
  createMessage,
  type Message,
  type Reasoner,
  type ReasonerEvent,
  type ReasonerResponse,
} from "../reasoning/types.js"
import type { Session } from "../session/session.js"
import { type Logger, silentLogger } from "../tracing/logger.js"
import { DEFAULT_PERSONA } from "./persona.js"

/** Named block of text injected as a system message for one turn. */
export interface ContextBlock {
  name: string
  content: string
}

export interface ExecuteOptions {
  session?: Session
  skillInstructions?: ContextBlock
  toolOutput?: ContextBlock
}

export interface OrchestratorOptions {
  persona?: string
  logger?: Logger
}

export class Orchestrator {
  readonly persona: string
  private readonly logger: Logger

  constructor(
    readonly reasoner: Reasoner,
    options: OrchestratorOptions = {},
  ) {
    this.persona = options.persona ?? DEFAULT_PERSONA
    this.logger = options.logger ?? silentLogger
  }

  buildMessages(prompt: string, options: ExecuteOptions = {}): Message[] {
    const messages: Message[] = [createMessage("system", this.persona)]
    if (options.skillInstructions) {
      const { name, content } = options.skillInstructions
      messages.push(createMessage("system", `Skill instructions (${name}):\n${content}`))
    }
    if (options.toolOutput) {
      const { name, content } = options.toolOutput
      messages.push(createMessage("system", `Tool output (${name}):\n${content}`))
    }
    if (options.session) {
      messages.push(...options.session.messages)
    }
    messages.push(createMessage("user", prompt))
    return messages
  }

  async execute(prompt: string, options: ExecuteOptions = {}): Promise<ReasonerResponse> {
    const messages = this.buildMessages(prompt, options)
    this.logger.debug("reasoning", {
      backend: this.reasoner.backendId,
      model: this.reasoner.modelId,
      messages: messages.length,
    })
    const response = await this.reasoner.reason(messages)
    this.remember(prompt, response, options.session)
    return response
  }

  /**
   * Stream the reply. The session is only updated once the complete event
   * arrives, so an aborted stream leaves it untouched.
   */
  async *executeStream(prompt: string, options: ExecuteOptions = {}): AsyncGenerator<ReasonerEvent> {
    const messages = this.buildMessages(prompt, options)
    this.logger.debug("reasoning (stream)", {
      backend: this.reasoner.backendId,
      model: this.reasoner.modelId,
      messages: messages.length,
    })
    for await (const event of this.reasoner.streamReason(messages)) {
      if (event.type === "complete") {
        this.remember(prompt, event.response, options.session)
      }
      yield event
    }
  }

  private remember(prompt: string, response: ReasonerResponse, session?: Session): void {
    if (!session) return
    session.messages.push(createMessage("user", prompt), createMessage("assistant", response.content))
  }
}
