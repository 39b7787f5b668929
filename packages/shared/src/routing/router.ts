/**
 * Rule router: intent detection without an extra LLM call.
 *
 * Scores a prompt against every target's hints by literal, case-insensitive
 * substring match. A target's score is the length of its longest matching
 * hint divided by the longest hint anywhere in the catalog, so confidences
 * are comparable across targets. Highest confidence wins; ties go to the
 * lexicographically smallest name. Below the threshold the decision is a
 * fallback carrying the best score that was found.
 *
 * Matching is substring-based, not tokenized: the hint "echo" matches
 * "echotype". Confidence is defined on raw substring length.
 */

import { compareNames } from "../common/order.js"
import { type Logger, silentLogger } from "../tracing/logger.js"
import {
  fallbackDecision,
  type RoutingDecision,
  type RoutingTarget,
  selectedDecision,
} from "./types.js"

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.5

export interface Router {
  /** Must not mutate `targets` or any target in it. */
  route(prompt: string, targets: readonly RoutingTarget[]): RoutingDecision
}

export interface RuleRouterOptions {
  /** Minimum confidence to select a target, in [0, 1]. Default 0.5. */
  confidenceThreshold?: number
  logger?: Logger
}

interface Candidate {
  target: RoutingTarget
  confidence: number
  matchedHint: string
}

export class RuleRouter implements Router {
  readonly confidenceThreshold: number
  private readonly logger: Logger

  constructor(options: RuleRouterOptions = {}) {
    const threshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new RangeError(`confidenceThreshold must be within [0, 1], got ${threshold}`)
    }
    this.confidenceThreshold = threshold
    this.logger = options.logger ?? silentLogger
  }

  route(prompt: string, targets: readonly RoutingTarget[]): RoutingDecision {
    const decision = this.decide(prompt, targets)
    this.logger.debug("route decided", {
      target: decision.target,
      targetType: decision.targetType,
      confidence: decision.confidence,
    })
    return decision
  }

  private decide(prompt: string, targets: readonly RoutingTarget[]): RoutingDecision {
    if (targets.length === 0) {
      return fallbackDecision(0, "No targets available.")
    }

    const normalized = prompt.trim().toLowerCase()
    if (!normalized) {
      return fallbackDecision(0, "Empty prompt.")
    }

    let maxHintLen = 1
    for (const target of targets) {
      for (const hint of target.hints) {
        maxHintLen = Math.max(maxHintLen, hintLength(hint))
      }
    }

    const candidates: Candidate[] = []
    for (const target of targets) {
      let matchedHint = ""
      let matchedLen = 0
      for (const hint of target.hints) {
        const length = hintLength(hint)
        if (length > matchedLen && normalized.includes(hint.toLowerCase())) {
          matchedHint = hint
          matchedLen = length
        }
      }
      if (matchedLen > 0) {
        candidates.push({
          target,
          confidence: Math.min(1, matchedLen / maxHintLen),
          matchedHint,
        })
      }
    }

    candidates.sort(
      (a, b) => b.confidence - a.confidence || compareNames(a.target.name, b.target.name),
    )

    const top = candidates[0]
    if (!top) {
      return fallbackDecision(0, "No hint matched the prompt.")
    }

    if (top.confidence < this.confidenceThreshold) {
      return fallbackDecision(
        top.confidence,
        `Best match '${top.target.name}' below threshold ` +
          `(${top.confidence.toFixed(2)} < ${this.confidenceThreshold}).`,
      )
    }

    return selectedDecision(
      top.target.name,
      top.target.targetType,
      top.confidence,
      `Matched hint "${top.matchedHint}" for ${top.target.targetType} '${top.target.name}'.`,
    )
  }
}

/** Length in code points, so astral characters count once. */
function hintLength(hint: string): number {
  return [...hint].length
}
