/**
 * Structured JSON logger with automatic trace context inclusion.
 *
 * Every log entry includes traceId and spanId from the active OTel span
 * (if any), so a turn's log lines line up with its route/gate/reason spans.
 *
 * All entries go to stderr: stdout carries the assistant reply and any
 * machine-readable output the CLI prints.
 */

import { trace } from "@opentelemetry/api"

export type LogLevel = "debug" | "info" | "warn" | "error"

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"]

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

/** Minimal logging surface accepted by gate, router, skills and orchestrator. */
export interface Logger {
  debug(message: string, extra?: Record<string, unknown>): void
  info(message: string, extra?: Record<string, unknown>): void
  warn(message: string, extra?: Record<string, unknown>): void
  error(message: string, extra?: Record<string, unknown>): void
}

const noop = (): void => {}

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
}

export interface TracingLoggerOptions {
  /** Minimum log level to emit. Defaults to "info". */
  level?: LogLevel
  /** Service name to include in every log line. */
  serviceName?: string
}

export class TracingLogger implements Logger {
  private readonly minLevel: number
  private readonly serviceName: string

  constructor(options?: TracingLoggerOptions) {
    this.minLevel = LOG_LEVEL_ORDER[options?.level ?? "info"]
    this.serviceName = options?.serviceName ?? "ore"
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this.log("debug", message, extra)
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this.log("info", message, extra)
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this.log("warn", message, extra)
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this.log("error", message, extra)
  }

  private log(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < this.minLevel) return

    const entry: Record<string, unknown> = {
      level,
      time: new Date().toISOString(),
      service: this.serviceName,
      msg: message,
    }

    const span = trace.getActiveSpan()
    if (span) {
      const ctx = span.spanContext()
      entry.traceId = ctx.traceId
      entry.spanId = ctx.spanId
    }

    if (extra) {
      Object.assign(entry, extra)
    }

    process.stderr.write(JSON.stringify(entry) + "\n")
  }
}
