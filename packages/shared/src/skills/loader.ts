/**
 * SKILL.md loader: parses frontmatter metadata and body content.
 *
 * SKILL.md format:
 * ```
 * ---
 * name: summarize
 * description: Summarize a document into key points
 * hints:
 *   - summarize
 *   - give me the gist
 * ---
 * # Full skill instructions here...
 * ```
 *
 * `name` and `description` are required. `hints` is optional; anything but a
 * list is treated as no hints.
 */

import { readFile, stat } from "node:fs/promises"
import { isAbsolute, join, relative, resolve, sep } from "node:path"

import { parse as parseYaml } from "yaml"

import { ResourceAccessError, type SkillDefinition, SkillLoadError, type SkillMetadata } from "./types.js"

export const SKILL_FILENAME = "SKILL.md"

const RESOURCES_DIR = "resources"

/** Frontmatter delimited by --- lines; group 1 is YAML, group 2 the body. */
const FRONTMATTER_RE = /^---\r?\n([\s\S]*?)\r?\n---[^\S\r\n]*(?:\r?\n|$)([\s\S]*)$/

// ---------------------------------------------------------------------------
// Frontmatter parsing
// ---------------------------------------------------------------------------

export interface SplitFrontmatter {
  frontmatter: Record<string, unknown>
  body: string
}

export function splitFrontmatter(raw: string, source: string): SplitFrontmatter {
  const text = raw.replace(/^(?:\r?\n)+/, "")
  if (!text.startsWith("---")) {
    throw new SkillLoadError(`No YAML frontmatter found in ${source}`, source)
  }

  const match = FRONTMATTER_RE.exec(text)
  if (!match) {
    throw new SkillLoadError(`Unclosed YAML frontmatter in ${source}`, source)
  }

  let parsed: unknown
  try {
    parsed = parseYaml(match[1] ?? "")
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new SkillLoadError(`Invalid YAML frontmatter in ${source}: ${reason}`, source)
  }

  if (!isRecord(parsed)) {
    throw new SkillLoadError(`YAML frontmatter is not a mapping in ${source}`, source)
  }

  return { frontmatter: parsed, body: match[2] ?? "" }
}

// ---------------------------------------------------------------------------
// SKILL.md parsing
// ---------------------------------------------------------------------------

/**
 * Parse a SKILL.md string into metadata and instructions.
 * `dir` is the skill directory the file was read from.
 */
export function parseSkillMd(raw: string, dir: string, mtimeMs: number): SkillDefinition {
  const filePath = join(dir, SKILL_FILENAME)
  const { frontmatter, body } = splitFrontmatter(raw, filePath)

  const name = frontmatter.name
  if (typeof name !== "string" || !name.trim()) {
    throw new SkillLoadError(`Missing or invalid 'name' in ${filePath}`, filePath)
  }
  const description = frontmatter.description
  if (typeof description !== "string" || !description.trim()) {
    throw new SkillLoadError(`Missing or invalid 'description' in ${filePath}`, filePath)
  }

  const rawHints = frontmatter.hints
  const hints = Array.isArray(rawHints) ? rawHints.map((hint) => String(hint)) : []

  return {
    metadata: {
      name,
      description,
      hints,
      dir,
      filePath,
      mtimeMs,
    },
    instructions: body.trim(),
  }
}

// ---------------------------------------------------------------------------
// Disk loading
// ---------------------------------------------------------------------------

/** Load `<dir>/SKILL.md`. Missing files surface as SkillLoadError. */
export async function loadSkillFile(dir: string): Promise<SkillDefinition> {
  const skillDir = resolve(dir)
  const filePath = join(skillDir, SKILL_FILENAME)

  let raw: string
  let mtimeMs: number
  try {
    const [content, fileStat] = await Promise.all([readFile(filePath, "utf-8"), stat(filePath)])
    raw = content
    mtimeMs = fileStat.mtimeMs
  } catch {
    throw new SkillLoadError(`No ${SKILL_FILENAME} in ${skillDir}`, filePath)
  }

  return parseSkillMd(raw, skillDir, mtimeMs)
}

export async function loadSkillMetadata(dir: string): Promise<SkillMetadata> {
  const def = await loadSkillFile(dir)
  return def.metadata
}

export async function loadSkillInstructions(dir: string): Promise<string> {
  const def = await loadSkillFile(dir)
  return def.instructions
}

/**
 * Read `<dir>/resources/<ref>`. The resolved path must stay inside
 * `resources/`; anything else is rejected before the file is touched.
 */
export async function loadSkillResource(dir: string, ref: string): Promise<string> {
  const resourcesRoot = resolve(dir, RESOURCES_DIR)
  const target = resolve(resourcesRoot, ref)
  const rel = relative(resourcesRoot, target)

  if (!rel || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new ResourceAccessError(
      `Path traversal blocked: '${ref}' resolves outside ${resourcesRoot}`,
    )
  }

  try {
    return await readFile(target, "utf-8")
  } catch {
    throw new ResourceAccessError(`Resource not found: ${target}`)
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
