/**
 * Tracing span helpers: typed wrappers around the OpenTelemetry API.
 *
 * These helpers keep instrumentation call-sites concise and ensure
 * consistent attribute naming across a turn (route → gate → reason).
 */

import { type Attributes, type Span, SpanStatusCode, trace } from "@opentelemetry/api"

// ──────────────────────────────────────────────────
// Semantic Attribute Constants
// ──────────────────────────────────────────────────

export const OreAttributes = {
  ROUTE_TARGET: "ore.route.target",
  ROUTE_TARGET_TYPE: "ore.route.target_type",
  ROUTE_CONFIDENCE: "ore.route.confidence",
  ACTION_NAME: "ore.action.name",
  ACTION_STATUS: "ore.action.status",
  PERMISSIONS_CHECKED: "ore.permissions.checked",
  PERMISSIONS_DENIED: "ore.permissions.denied",
  SKILL_NAME: "ore.skill.name",
  SESSION_NAME: "ore.session.name",
  MODEL_ID: "ore.model.id",
  BACKEND_ID: "ore.backend.id",
  EXECUTION_DURATION_MS: "ore.execution.duration_ms",
} as const

// ──────────────────────────────────────────────────
// Tracer
// ──────────────────────────────────────────────────

const TRACER_NAME = "ore"

function getTracer() {
  return trace.getTracer(TRACER_NAME)
}

// ──────────────────────────────────────────────────
// withSpan
// ──────────────────────────────────────────────────

/**
 * Execute an async function inside a new span.
 *
 * On success the span ends with OK status; on error it records the
 * exception and sets ERROR status before re-throwing.
 *
 * ```ts
 * const result = await withSpan("ore.gate.run", { [OreAttributes.ACTION_NAME]: action.name }, async (span) => {
 *   // ... instrumented work
 * })
 * ```
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = getTracer()
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span)
      span.setStatus({ code: SpanStatusCode.OK })
      return result
    } catch (err) {
      span.setStatus({ code: SpanStatusCode.ERROR, message: String(err) })
      if (err instanceof Error) {
        span.recordException(err)
      }
      throw err
    } finally {
      span.end()
    }
  })
}

// ──────────────────────────────────────────────────
// Utility
// ──────────────────────────────────────────────────

/** Add attributes to the current active span. */
export function setSpanAttributes(attributes: Attributes): void {
  const span = trace.getActiveSpan()
  if (span) {
    span.setAttributes(attributes)
  }
}

/** Record an event (log-style annotation) on the current active span. */
export function addSpanEvent(name: string, attributes?: Attributes): void {
  const span = trace.getActiveSpan()
  if (span) {
    span.addEvent(name, attributes)
  }
}
