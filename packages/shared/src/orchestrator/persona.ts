import { readFile } from "node:fs/promises"

export const DEFAULT_PERSONA =
  "You are the ore assistant. You reason step by step, say plainly when you are unsure, " +
  "and use any tool output or skill instructions given to you before answering."

/**
 * Resolve the system prompt. With no path the built-in persona is used;
 * a path that cannot be read is an error, never a silent fallback.
 */
export async function loadPersona(path?: string): Promise<string> {
  if (!path) return DEFAULT_PERSONA
  const text = await readFile(path, "utf-8")
  return text.trim()
}
