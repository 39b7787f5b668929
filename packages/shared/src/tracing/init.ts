/**
 * Process-wide OpenTelemetry setup for a single `ore` run.
 *
 * The CLI starts tracing after reading its configuration and stops it when
 * the run ends, so spans from route, gate and reason stages are flushed
 * before exit. With tracing off, `withSpan` runs against the API's no-op
 * tracer and nothing is exported.
 */

import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http"
import { HttpInstrumentation } from "@opentelemetry/instrumentation-http"
import { resourceFromAttributes } from "@opentelemetry/resources"
import { NodeSDK } from "@opentelemetry/sdk-node"
import {
  AlwaysOnSampler,
  BatchSpanProcessor,
  ConsoleSpanExporter,
  ParentBasedSampler,
  type Sampler,
  SimpleSpanProcessor,
  type SpanProcessor,
  TraceIdRatioBasedSampler,
} from "@opentelemetry/sdk-trace-node"
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions"

export type TracingExporterType = "otlp" | "console" | "none"

export const TRACING_EXPORTER_TYPES: readonly TracingExporterType[] = ["otlp", "console", "none"]

/** Mirrors the OTEL_* environment variables the CLI reads. */
export interface TracingConfig {
  enabled: boolean
  /** Collector base URL; spans go to `<endpoint>/v1/traces`. */
  endpoint: string
  /** Fraction of root turns to sample, in [0, 1]. */
  sampleRate: number
  serviceName: string
  /** `none` keeps tracing off even when `enabled` is set. */
  exporterType: TracingExporterType
}

export const DEFAULT_TRACING_CONFIG: TracingConfig = {
  enabled: false,
  endpoint: "http://localhost:4318",
  sampleRate: 1.0,
  serviceName: "ore",
  exporterType: "otlp",
}

let sdk: NodeSDK | undefined

/** Every turn at rate 1; below that, root spans by trace-id ratio and children follow their parent. */
export function buildSampler(sampleRate: number): Sampler {
  if (sampleRate >= 1) return new AlwaysOnSampler()
  return new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(sampleRate) })
}

/** Console spans print as they end; OTLP spans are batched for the collector. */
export function buildSpanProcessor(config: Pick<TracingConfig, "endpoint" | "exporterType">): SpanProcessor {
  if (config.exporterType === "console") {
    return new SimpleSpanProcessor(new ConsoleSpanExporter())
  }
  return new BatchSpanProcessor(new OTLPTraceExporter({ url: `${config.endpoint}/v1/traces` }))
}

/**
 * Start the SDK for this run. Returns whether tracing is active afterwards;
 * a second call while active leaves the running SDK in place.
 */
export function initTracing(config: TracingConfig, serviceVersion = "0.0.0"): boolean {
  if (sdk) return true
  if (!config.enabled || config.exporterType === "none") return false

  sdk = new NodeSDK({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: config.serviceName,
      [ATTR_SERVICE_VERSION]: serviceVersion,
    }),
    sampler: buildSampler(config.sampleRate),
    spanProcessors: [buildSpanProcessor(config)],
    // Outgoing model calls are plain HTTP(S) requests from the SDK clients.
    instrumentations: [new HttpInstrumentation()],
  })
  sdk.start()
  return true
}

export function isTracingActive(): boolean {
  return sdk !== undefined
}

/** Flush pending spans and stop the SDK; a no-op when tracing never started. */
export async function shutdownTracing(): Promise<void> {
  const running = sdk
  if (!running) return
  sdk = undefined
  await running.shutdown()
}
