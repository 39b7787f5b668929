/**
 * Routable actions (tools) and the results they produce.
 *
 * An action is a named, possibly side-effecting unit of work invoked with
 * string-keyed arguments. It declares the permissions it needs; the Gate
 * refuses to run it unless all of them are granted.
 */

import { randomUUID } from "node:crypto"

import type { Permission } from "../permissions/index.js"

export type ActionArgs = Record<string, string>

export type ActionStatus = "ok" | "error"

/**
 * Diagnostic metadata attached to an ActionResult.
 * `executionTimeMs` and `checkedPermissions` are filled in by the Gate;
 * `errorMessage` is set by the action when `status` is "error".
 */
export interface ActionResultMetadata {
  executionTimeMs?: number
  checkedPermissions?: readonly Permission[]
  errorMessage?: string
  [key: string]: unknown
}

export interface ActionResult {
  readonly actionName: string
  readonly output: string
  readonly status: ActionStatus
  readonly id: string
  readonly timestamp: string
  readonly metadata: Readonly<ActionResultMetadata>
}

export interface RoutableAction {
  /** Unique name used for lookup, routing and logging. */
  readonly name: string
  readonly description: string
  /** Empty set = runs under any grant. */
  readonly requiredPermissions: ReadonlySet<Permission>
  run(args: ActionArgs): Promise<ActionResult>
  /** Phrases matched against prompts by the router. */
  routingHints?(): readonly string[]
  /** Best-effort structured arguments from free text. */
  extractArgs?(prompt: string): ActionArgs
}

export interface CreateActionResultInput {
  actionName: string
  output: string
  status: ActionStatus
  metadata?: ActionResultMetadata
  id?: string
  timestamp?: string
}

export function createActionResult(input: CreateActionResultInput): ActionResult {
  return Object.freeze({
    actionName: input.actionName,
    output: input.output,
    status: input.status,
    id: input.id ?? randomUUID(),
    timestamp: input.timestamp ?? new Date().toISOString(),
    metadata: Object.freeze({ ...input.metadata }),
  })
}

export function actionError(actionName: string, errorMessage: string): ActionResult {
  return createActionResult({
    actionName,
    output: "",
    status: "error",
    metadata: { errorMessage },
  })
}

export function routingHintsOf(action: RoutableAction): readonly string[] {
  return action.routingHints?.() ?? []
}

export function extractArgsOf(action: RoutableAction, prompt: string): ActionArgs {
  return action.extractArgs?.(prompt) ?? {}
}
