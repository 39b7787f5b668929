/**
 * Configuration module: validates environment variables at startup.
 *
 * All config is sourced from the environment and validated eagerly.
 * Invalid values throw immediately so the process fails fast; command-line
 * flags are applied on top by the program.
 */

import { homedir } from "node:os"
import { join } from "node:path"

import { parsePermissionList, type Permission, sortPermissions } from "@ore/shared/permissions"
import {
  BACKEND_IDS,
  type BackendId,
  DEFAULT_DEEPSEEK_BASE_URL,
  DEFAULT_OLLAMA_HOST,
  isBackendId,
} from "@ore/shared/reasoning"
import { DEFAULT_CONFIDENCE_THRESHOLD } from "@ore/shared/routing"
import {
  DEFAULT_TRACING_CONFIG,
  isLogLevel,
  LOG_LEVELS,
  type LogLevel,
  TRACING_EXPORTER_TYPES,
  type TracingConfig,
  type TracingExporterType,
} from "@ore/shared/tracing"

export interface BackendCredentials {
  apiKey?: string
  baseUrl?: string
}

export interface Config {
  /** Reasoning backend */
  backend: BackendId
  /** Model override; otherwise the backend default (or discovery for Ollama) */
  model?: string
  /** Ollama server base URL, without the /v1 suffix */
  ollamaHost: string
  deepseek: BackendCredentials
  openai: BackendCredentials
  anthropic: BackendCredentials
  /** Directory scanned for skills */
  skillsRoot: string
  /** Directory holding named session files */
  sessionsRoot: string
  /** Persona prompt file; the built-in persona when absent */
  personaFile?: string
  /** Router confidence threshold, in [0, 1] */
  routeThreshold: number
  /** Permissions granted by the environment (ORE_ALLOW) */
  allow: Permission[]
  logLevel: LogLevel
  /** OpenTelemetry tracing configuration */
  tracing: TracingConfig
}

/**
 * Load and validate configuration from environment variables.
 * Throws on invalid enumerations and unknown permission names.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const backend = env.ORE_BACKEND || "ollama"
  if (!isBackendId(backend)) {
    throw new Error(`Invalid ORE_BACKEND: ${backend}. Must be one of: ${BACKEND_IDS.join(", ")}.`)
  }

  const logLevel = env.LOG_LEVEL || "warn"
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${logLevel}. Must be one of: ${LOG_LEVELS.join(", ")}.`)
  }

  const exporterType = env.OTEL_EXPORTER_TYPE || DEFAULT_TRACING_CONFIG.exporterType
  if (!isExporterType(exporterType)) {
    throw new Error(
      `Invalid OTEL_EXPORTER_TYPE: ${exporterType}. Must be one of: ${TRACING_EXPORTER_TYPES.join(", ")}.`,
    )
  }

  const home = homedir()

  return {
    backend,
    model: env.ORE_MODEL || undefined,
    ollamaHost: env.OLLAMA_HOST || DEFAULT_OLLAMA_HOST,
    deepseek: {
      apiKey: env.DEEPSEEK_API_KEY || undefined,
      baseUrl: env.DEEPSEEK_BASE_URL || DEFAULT_DEEPSEEK_BASE_URL,
    },
    openai: {
      apiKey: env.OPENAI_API_KEY || undefined,
      baseUrl: env.OPENAI_BASE_URL || undefined,
    },
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY || undefined,
      baseUrl: env.ANTHROPIC_BASE_URL || undefined,
    },
    skillsRoot: env.ORE_SKILLS_ROOT || join(home, ".ore", "skills"),
    sessionsRoot: env.ORE_SESSIONS_ROOT || join(home, ".ore", "sessions"),
    personaFile: env.ORE_PERSONA_FILE || undefined,
    routeThreshold: parseFloatOr(env.ORE_ROUTE_THRESHOLD, DEFAULT_CONFIDENCE_THRESHOLD),
    allow: sortPermissions(parsePermissionList(env.ORE_ALLOW)),
    logLevel,
    tracing: {
      enabled: env.OTEL_TRACING_ENABLED === "true",
      endpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT || DEFAULT_TRACING_CONFIG.endpoint,
      sampleRate: parseFloatOr(env.OTEL_SAMPLE_RATE, DEFAULT_TRACING_CONFIG.sampleRate),
      serviceName: env.OTEL_SERVICE_NAME || DEFAULT_TRACING_CONFIG.serviceName,
      exporterType,
    },
  }
}

/** API key and base URL for the selected backend. Ollama takes its host instead. */
export function credentialsFor(config: Config, backend: BackendId): BackendCredentials {
  switch (backend) {
    case "ollama":
      return { baseUrl: config.ollamaHost }
    case "deepseek":
      return config.deepseek
    case "openai":
      return config.openai
    case "anthropic":
      return config.anthropic
  }
}

function isExporterType(value: string): value is TracingExporterType {
  return (TRACING_EXPORTER_TYPES as readonly string[]).includes(value)
}

/** Fraction in [0, 1]; non-numeric input falls back. */
function parseFloatOr(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback
  const parsed = parseFloat(value)
  if (Number.isNaN(parsed)) return fallback
  return Math.max(0, Math.min(1, parsed))
}
