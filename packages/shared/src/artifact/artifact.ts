/**
 * Execution artifact: a portable record of one turn: what was asked, how
 * it was routed, which tool or skill ran, and what the model replied.
 *
 * In memory the artifact uses the library's camelCase value objects; on the
 * wire every key (including metadata keys) is snake_case.
 */

import { randomUUID } from "node:crypto"

import type { Permission } from "../permissions/index.js"
import type { ReasonerResponse } from "../reasoning/types.js"
import type { RoutingDecision } from "../routing/types.js"
import type { ActionResult, ActionResultMetadata } from "../tools/types.js"
import { mapKeys, toCamelCase, toSnakeCase } from "./keys.js"
import {
  type ActionResultWire,
  ARTIFACT_VERSION,
  type ExecutionArtifactWire,
  ExecutionArtifactWireSchema,
  type ReasonerResponseWire,
  type RoutingDecisionWire,
} from "./schemas.js"

export interface ExecutionArtifact {
  readonly artifactVersion: typeof ARTIFACT_VERSION
  readonly id: string
  readonly timestamp: string
  readonly prompt: string
  readonly sessionName: string | null
  readonly modelId: string
  readonly grantedPermissions: readonly Permission[]
  readonly routing: RoutingDecision | null
  readonly skill: string | null
  readonly toolResult: ActionResult | null
  readonly response: ReasonerResponse
}

export type BuildArtifactInput = Omit<ExecutionArtifact, "artifactVersion" | "id" | "timestamp">

export function buildArtifact(input: BuildArtifactInput): ExecutionArtifact {
  return Object.freeze({
    artifactVersion: ARTIFACT_VERSION,
    id: randomUUID(),
    timestamp: new Date().toISOString(),
    prompt: input.prompt,
    sessionName: input.sessionName,
    modelId: input.modelId,
    grantedPermissions: Object.freeze([...input.grantedPermissions]),
    routing: input.routing,
    skill: input.skill,
    toolResult: input.toolResult,
    response: input.response,
  })
}

// ──────────────────────────────────────────────────
// To wire
// ──────────────────────────────────────────────────

function decisionToWire(decision: RoutingDecision): RoutingDecisionWire {
  const base = {
    confidence: decision.confidence,
    args: { ...decision.args },
    reasoning: decision.reasoning,
    id: decision.id,
    timestamp: decision.timestamp,
  }
  if (decision.targetType === "fallback") {
    return { ...base, target: null, target_type: "fallback" }
  }
  return { ...base, target: decision.target, target_type: decision.targetType }
}

function resultToWire(result: ActionResult): ActionResultWire {
  const metadata: ActionResultWire["metadata"] = {}
  for (const [key, value] of Object.entries(result.metadata)) {
    metadata[toSnakeCase(key)] = value
  }
  return {
    tool_name: result.actionName,
    output: result.output,
    status: result.status,
    id: result.id,
    timestamp: result.timestamp,
    metadata,
  }
}

function responseToWire(response: ReasonerResponse): ReasonerResponseWire {
  return {
    content: response.content,
    model_id: response.modelId,
    id: response.id,
    timestamp: response.timestamp,
    duration_ms: response.durationMs,
    metadata: mapKeys(response.metadata, toSnakeCase),
  }
}

export function artifactToWire(artifact: ExecutionArtifact): ExecutionArtifactWire {
  return {
    artifact_version: artifact.artifactVersion,
    id: artifact.id,
    timestamp: artifact.timestamp,
    prompt: artifact.prompt,
    session_name: artifact.sessionName,
    model_id: artifact.modelId,
    granted_permissions: [...artifact.grantedPermissions],
    routing: artifact.routing ? decisionToWire(artifact.routing) : null,
    skill: artifact.skill,
    tool_result: artifact.toolResult ? resultToWire(artifact.toolResult) : null,
    response: responseToWire(artifact.response),
  }
}

export function artifactToJson(artifact: ExecutionArtifact): string {
  return JSON.stringify(artifactToWire(artifact), null, 2)
}

// ──────────────────────────────────────────────────
// From wire
// ──────────────────────────────────────────────────

function decisionFromWire(wire: RoutingDecisionWire): RoutingDecision {
  const base = {
    confidence: wire.confidence,
    args: Object.freeze({ ...wire.args }),
    reasoning: wire.reasoning,
    id: wire.id,
    timestamp: wire.timestamp,
  }
  if (wire.target_type === "fallback") {
    return Object.freeze({ ...base, target: null, targetType: "fallback" })
  }
  return Object.freeze({ ...base, target: wire.target, targetType: wire.target_type })
}

function resultFromWire(wire: ActionResultWire): ActionResult {
  const { execution_time_ms, checked_permissions, error_message, ...rest } = wire.metadata
  const metadata: ActionResultMetadata = {}
  for (const [key, value] of Object.entries(rest)) {
    metadata[toCamelCase(key)] = value
  }
  if (execution_time_ms !== undefined) metadata.executionTimeMs = execution_time_ms
  if (checked_permissions !== undefined) metadata.checkedPermissions = checked_permissions
  if (error_message !== undefined) metadata.errorMessage = error_message

  return Object.freeze({
    actionName: wire.tool_name,
    output: wire.output,
    status: wire.status,
    id: wire.id,
    timestamp: wire.timestamp,
    metadata: Object.freeze(metadata),
  })
}

function responseFromWire(wire: ReasonerResponseWire): ReasonerResponse {
  return Object.freeze({
    content: wire.content,
    modelId: wire.model_id,
    id: wire.id,
    timestamp: wire.timestamp,
    durationMs: wire.duration_ms,
    metadata: Object.freeze(mapKeys(wire.metadata, toCamelCase)),
  })
}

/** Validate a parsed JSON value and rebuild the artifact. Throws a ZodError on bad input. */
export function parseArtifactWire(value: unknown): ExecutionArtifact {
  const wire = ExecutionArtifactWireSchema.parse(value)
  return Object.freeze({
    artifactVersion: wire.artifact_version,
    id: wire.id,
    timestamp: wire.timestamp,
    prompt: wire.prompt,
    sessionName: wire.session_name,
    modelId: wire.model_id,
    grantedPermissions: Object.freeze([...wire.granted_permissions]),
    routing: wire.routing ? decisionFromWire(wire.routing) : null,
    skill: wire.skill,
    toolResult: wire.tool_result ? resultFromWire(wire.tool_result) : null,
    response: responseFromWire(wire.response),
  })
}
