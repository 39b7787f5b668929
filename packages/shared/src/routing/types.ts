/**
 * Routing value objects.
 *
 * A RoutingTarget is a read-only projection of a tool or skill; a
 * RoutingDecision is the frozen outcome of one routing call.
 */

import { randomUUID } from "node:crypto"

import type { ActionArgs } from "../tools/types.js"

export type TargetType = "tool" | "skill"

export type DecisionType = TargetType | "fallback"

export interface RoutingTarget {
  readonly name: string
  readonly targetType: TargetType
  readonly description: string
  /** Phrases matched case-insensitively as literal substrings of the prompt. */
  readonly hints: readonly string[]
}

interface RoutingDecisionBase {
  /** In [0, 1]. */
  readonly confidence: number
  /** Always empty from the router; callers attach extracted args via `withArgs`. */
  readonly args: Readonly<ActionArgs>
  readonly reasoning: string
  readonly id: string
  readonly timestamp: string
}

export interface SelectedDecision extends RoutingDecisionBase {
  readonly target: string
  readonly targetType: TargetType
}

export interface FallbackDecision extends RoutingDecisionBase {
  readonly target: null
  readonly targetType: "fallback"
}

export type RoutingDecision = SelectedDecision | FallbackDecision

export function isSelected(decision: RoutingDecision): decision is SelectedDecision {
  return decision.targetType !== "fallback"
}

export function createRoutingTarget(
  name: string,
  targetType: TargetType,
  description: string,
  hints: readonly string[],
): RoutingTarget {
  return Object.freeze({ name, targetType, description, hints: Object.freeze([...hints]) })
}

export function fallbackDecision(confidence: number, reasoning: string): FallbackDecision {
  return Object.freeze({
    target: null,
    targetType: "fallback",
    confidence,
    args: Object.freeze({}),
    reasoning,
    id: randomUUID(),
    timestamp: new Date().toISOString(),
  })
}

export function selectedDecision(
  target: string,
  targetType: TargetType,
  confidence: number,
  reasoning: string,
): SelectedDecision {
  return Object.freeze({
    target,
    targetType,
    confidence,
    args: Object.freeze({}),
    reasoning,
    id: randomUUID(),
    timestamp: new Date().toISOString(),
  })
}

/**
 * Return a new decision with `args` merged over the existing ones.
 * Identity (`id`, `timestamp`) is kept; the input decision is untouched.
 */
export function withArgs<T extends RoutingDecision>(decision: T, args: ActionArgs): T {
  return Object.freeze<T>({
    ...decision,
    args: Object.freeze({ ...decision.args, ...args }),
  })
}
