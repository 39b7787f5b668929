import { z } from "zod"

import { ALL_PERMISSIONS } from "../permissions/index.js"

// ──────────────────────────────────────────────────
// Wire format of an execution artifact (snake_case)
// ──────────────────────────────────────────────────

export const ARTIFACT_VERSION = "1.0"

const DecisionBaseWireSchema = z.object({
  confidence: z.number().min(0).max(1),
  args: z.record(z.string()),
  reasoning: z.string(),
  id: z.string(),
  timestamp: z.string(),
})

export const SelectedDecisionWireSchema = DecisionBaseWireSchema.extend({
  target: z.string(),
  target_type: z.enum(["tool", "skill"]),
})

export const FallbackDecisionWireSchema = DecisionBaseWireSchema.extend({
  target: z.null(),
  target_type: z.literal("fallback"),
})

export const RoutingDecisionWireSchema = z.union([
  SelectedDecisionWireSchema,
  FallbackDecisionWireSchema,
])

export type RoutingDecisionWire = z.infer<typeof RoutingDecisionWireSchema>

export const ActionResultMetadataWireSchema = z
  .object({
    execution_time_ms: z.number().optional(),
    checked_permissions: z.array(z.enum(ALL_PERMISSIONS)).optional(),
    error_message: z.string().optional(),
  })
  .catchall(z.unknown())

export const ActionResultWireSchema = z.object({
  tool_name: z.string(),
  output: z.string(),
  status: z.enum(["ok", "error"]),
  id: z.string(),
  timestamp: z.string(),
  metadata: ActionResultMetadataWireSchema,
})

export type ActionResultWire = z.infer<typeof ActionResultWireSchema>

export const ReasonerResponseWireSchema = z.object({
  content: z.string(),
  model_id: z.string(),
  id: z.string(),
  timestamp: z.string(),
  duration_ms: z.number(),
  metadata: z.record(z.unknown()),
})

export type ReasonerResponseWire = z.infer<typeof ReasonerResponseWireSchema>

export const ExecutionArtifactWireSchema = z.object({
  artifact_version: z.literal(ARTIFACT_VERSION),
  id: z.string(),
  timestamp: z.string(),
  prompt: z.string(),
  session_name: z.string().nullable(),
  model_id: z.string(),
  granted_permissions: z.array(z.enum(ALL_PERMISSIONS)),
  routing: RoutingDecisionWireSchema.nullable(),
  skill: z.string().nullable(),
  tool_result: ActionResultWireSchema.nullable(),
  response: ReasonerResponseWireSchema,
})

export type ExecutionArtifactWire = z.infer<typeof ExecutionArtifactWireSchema>
