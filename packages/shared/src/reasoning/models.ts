/**
 * Model discovery against an OpenAI-compatible `/v1/models` endpoint
 * (a local Ollama server by default).
 */

import { createOpenAIClient, type OpenAICompatibleProvider } from "./openai-compatible.js"

/** Preferred base names (no tag), in order, when auto-choosing a default. */
export const PREFERRED_MODELS = ["llama3.2", "llama3.1", "llama3", "mistral", "llama2", "qwen2.5"] as const

export interface FetchModelsOptions {
  provider?: OpenAICompatibleProvider
  baseUrl?: string
  apiKey?: string
}

/** Full model names as the server reports them, e.g. `llama3.2:latest`. */
export async function fetchModels(options: FetchModelsOptions = {}): Promise<string[]> {
  const client = createOpenAIClient({
    provider: options.provider ?? "ollama",
    baseUrl: options.baseUrl,
    apiKey: options.apiKey,
  })

  const names: string[] = []
  for await (const model of client.models.list()) {
    if (model.id) names.push(model.id)
  }
  return names
}

/**
 * Pick a default: the first PREFERRED_MODELS base name that is available
 * (returned with its tag), else the first available, else undefined.
 */
export function chooseDefaultModel(available: readonly string[]): string | undefined {
  const baseToFull = new Map<string, string>()
  for (const full of available) {
    const base = full.split(":")[0] ?? full
    if (!baseToFull.has(base)) baseToFull.set(base, full)
  }

  for (const preferred of PREFERRED_MODELS) {
    const full = baseToFull.get(preferred)
    if (full) return full
  }
  return available[0]
}

export async function defaultModel(options: FetchModelsOptions = {}): Promise<string | undefined> {
  return chooseDefaultModel(await fetchModels(options))
}
