/**
 * Skill system types.
 *
 * Skills are instruction modules stored as `<root>/<dir>/SKILL.md`. The
 * frontmatter carries lightweight metadata (indexed and routed on); the
 * body carries instructions, loaded on demand when a skill is activated.
 * Optional resource files live under `<dir>/resources/`.
 */

export interface SkillMetadata {
  /** Unique skill name from the frontmatter `name` key. */
  name: string
  /** One-line description from the frontmatter `description` key. */
  description: string
  /** Routing hints from the frontmatter `hints` list. */
  hints: string[]
  /** Absolute path to the skill directory. */
  dir: string
  /** Absolute path to the SKILL.md file. */
  filePath: string
  /** File modification time (ms since epoch) for change detection. */
  mtimeMs: number
}

export interface SkillDefinition {
  metadata: SkillMetadata
  /** SKILL.md body after the frontmatter, trimmed. */
  instructions: string
}

export class SkillLoadError extends Error {
  readonly source: string

  constructor(message: string, source: string) {
    super(message)
    this.name = "SkillLoadError"
    this.source = source
  }
}

export class SkillNotFoundError extends Error {
  readonly skillName: string

  constructor(skillName: string) {
    super(`Unknown skill: ${skillName}`)
    this.name = "SkillNotFoundError"
    this.skillName = skillName
  }
}

export class ResourceAccessError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ResourceAccessError"
  }
}
