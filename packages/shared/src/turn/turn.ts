/**
 * One conversational turn: route → gate → reason → artifact.
 *
 * Routing is opt-in. At most one tool runs per turn; its result is folded
 * into the context as a system message. A PermissionDeniedError from the
 * gate aborts the turn before the reasoner is called.
 */

import { ToolNotFoundError, type ToolRegistry } from "../tools/registry.js"
import { type ActionArgs, type ActionResult, extractArgsOf, type RoutableAction } from "../tools/types.js"
import type { Gate } from "../gate/gate.js"
import type { Orchestrator, ContextBlock } from "../orchestrator/orchestrator.js"
import type { ReasonerResponse } from "../reasoning/types.js"
import { buildCatalog } from "../routing/catalog.js"
import type { Router } from "../routing/router.js"
import { isSelected, type RoutingDecision, withArgs } from "../routing/types.js"
import type { SkillRegistry } from "../skills/registry.js"
import { SkillNotFoundError } from "../skills/types.js"
import type { Session } from "../session/session.js"
import { type Logger, silentLogger } from "../tracing/logger.js"
import { OreAttributes, withSpan } from "../tracing/spans.js"
import { buildArtifact, type ExecutionArtifact } from "../artifact/artifact.js"

export interface TurnInput {
  prompt: string
  /** Run the router over tools and skills. Ignored when `toolName` is set. */
  route?: boolean
  toolName?: string
  /** Explicit tool arguments; they win over arguments extracted from the prompt. */
  toolArgs?: ActionArgs
  skillName?: string
  session?: Session
  sessionName?: string | null
  stream?: boolean
  /** Receives text chunks as they arrive when `stream` is set. */
  onChunk?: (text: string) => void
}

export interface TurnDeps {
  orchestrator: Orchestrator
  gate: Gate
  router: Router
  tools: ToolRegistry
  skills?: SkillRegistry
  logger?: Logger
}

export interface TurnOutcome {
  response: ReasonerResponse
  artifact: ExecutionArtifact
}

export async function runTurn(input: TurnInput, deps: TurnDeps): Promise<TurnOutcome> {
  const logger = deps.logger ?? silentLogger
  const { prompt } = input

  // ── Routing ──
  let decision: RoutingDecision | null = null
  if (input.route && !input.toolName) {
    const targets = buildCatalog(deps.tools.list(), deps.skills?.list() ?? [])
    decision = await withSpan("ore.route", {}, async (span) => {
      const routed = deps.router.route(prompt, targets)
      span.setAttributes({
        [OreAttributes.ROUTE_TARGET]: routed.target ?? "",
        [OreAttributes.ROUTE_TARGET_TYPE]: routed.targetType,
        [OreAttributes.ROUTE_CONFIDENCE]: routed.confidence,
      })
      return routed
    })
  }

  // ── Tool ──
  let tool: RoutableAction | undefined
  if (input.toolName) {
    tool = deps.tools.require(input.toolName)
  } else if (decision && isSelected(decision) && decision.targetType === "tool") {
    tool = deps.tools.get(decision.target)
    if (!tool) throw new ToolNotFoundError(decision.target)
  }

  let toolResult: ActionResult | null = null
  if (tool) {
    const args: ActionArgs = { ...extractArgsOf(tool, prompt), ...input.toolArgs }
    if (decision && isSelected(decision)) {
      decision = withArgs(decision, args)
    }
    const selected = tool
    toolResult = await withSpan(
      "ore.gate.run",
      { [OreAttributes.ACTION_NAME]: selected.name },
      () => deps.gate.run(selected, args),
    )
    logger.info("tool ran", { tool: selected.name, status: toolResult.status })
  }

  // ── Skill ──
  let skillName: string | null = null
  if (input.skillName) {
    skillName = input.skillName
  } else if (decision && isSelected(decision) && decision.targetType === "skill") {
    skillName = decision.target
  }

  let skillInstructions: ContextBlock | undefined
  if (skillName) {
    if (!deps.skills) throw new SkillNotFoundError(skillName)
    skillInstructions = { name: skillName, content: await deps.skills.instructionsFor(skillName) }
    logger.info("skill activated", { skill: skillName })
  }

  // ── Reasoning ──
  const toolOutput: ContextBlock | undefined = toolResult
    ? { name: toolResult.actionName, content: describeResult(toolResult) }
    : undefined
  const executeOptions = { session: input.session, skillInstructions, toolOutput }
  const { orchestrator } = deps

  const response = await withSpan(
    "ore.reason",
    {
      [OreAttributes.BACKEND_ID]: orchestrator.reasoner.backendId,
      [OreAttributes.MODEL_ID]: orchestrator.reasoner.modelId,
      ...(skillName ? { [OreAttributes.SKILL_NAME]: skillName } : {}),
      ...(input.sessionName ? { [OreAttributes.SESSION_NAME]: input.sessionName } : {}),
    },
    async () => {
      if (!input.stream) {
        return orchestrator.execute(prompt, executeOptions)
      }
      let completed: ReasonerResponse | undefined
      for await (const event of orchestrator.executeStream(prompt, executeOptions)) {
        if (event.type === "text") {
          input.onChunk?.(event.content)
        } else {
          completed = event.response
        }
      }
      if (!completed) {
        throw new Error("Reasoner stream ended without a complete event")
      }
      return completed
    },
  )

  const artifact = buildArtifact({
    prompt,
    sessionName: input.sessionName ?? null,
    modelId: response.modelId,
    grantedPermissions: deps.gate.grantedPermissions,
    routing: decision,
    skill: skillName,
    toolResult,
    response,
  })

  return { response, artifact }
}

/** Tool output as the model sees it; failures carry the error message instead. */
export function describeResult(result: ActionResult): string {
  if (result.status === "ok") return result.output
  return `[error] ${result.metadata.errorMessage ?? "unknown error"}`
}
