export {
  buildSampler,
  buildSpanProcessor,
  DEFAULT_TRACING_CONFIG,
  initTracing,
  isTracingActive,
  shutdownTracing,
  TRACING_EXPORTER_TYPES,
  type TracingConfig,
  type TracingExporterType,
} from "./init.js"
export {
  isLogLevel,
  LOG_LEVELS,
  type LogLevel,
  type Logger,
  silentLogger,
  TracingLogger,
  type TracingLoggerOptions,
} from "./logger.js"
export { addSpanEvent, OreAttributes, setSpanAttributes, withSpan } from "./spans.js"
