/**
 * SkillRegistry: in-memory metadata index with mtime-based cache invalidation.
 *
 * Scans a skills root for subdirectories containing SKILL.md, keyed by the
 * frontmatter `name`; on a duplicate name the later directory in sorted order
 * wins. Malformed skills are logged and skipped; a missing root
 * is an empty registry. Instructions and resources are read on demand.
 *
 * Directory structure:
 *   {root}/
 *     summarize/SKILL.md
 *     code-review/SKILL.md
 *     code-review/resources/checklist.md
 */

import { readdir, stat } from "node:fs/promises"
import { join, resolve } from "node:path"

import { compareNames } from "../common/order.js"
import { type Logger, silentLogger } from "../tracing/logger.js"
import { loadSkillFile, loadSkillInstructions, loadSkillResource, SKILL_FILENAME } from "./loader.js"
import { SkillLoadError, type SkillMetadata, SkillNotFoundError } from "./types.js"

export interface SkillRegistryOptions {
  logger?: Logger
}

export class SkillRegistry {
  private readonly root: string
  private readonly logger: Logger
  /** Keyed by skill name. */
  private readonly entries = new Map<string, SkillMetadata>()
  /** Keyed by skill directory; survives refreshes so unchanged files are not re-parsed. */
  private readonly byDir = new Map<string, SkillMetadata>()

  constructor(root: string, options: SkillRegistryOptions = {}) {
    this.root = resolve(root)
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Scan the root and rebuild the index.
   * Files whose mtime has not changed since the last scan are reused as-is.
   */
  async refresh(): Promise<void> {
    let children: string[]
    try {
      children = await readdir(this.root)
    } catch {
      this.entries.clear()
      this.byDir.clear()
      return
    }

    this.entries.clear()
    const seenDirs = new Set<string>()

    for (const child of children.sort(compareNames)) {
      const dir = join(this.root, child)
      const skillFile = join(dir, SKILL_FILENAME)

      try {
        const dirStat = await stat(dir)
        if (!dirStat.isDirectory()) continue
        const fileStat = await stat(skillFile)
        if (!fileStat.isFile()) continue

        seenDirs.add(dir)

        let metadata = this.byDir.get(dir)
        if (!metadata || metadata.mtimeMs !== fileStat.mtimeMs) {
          metadata = (await loadSkillFile(dir)).metadata
          this.byDir.set(dir, metadata)
        }

        const existing = this.entries.get(metadata.name)
        if (existing) {
          this.logger.warn("duplicate skill name; keeping last", {
            skill: metadata.name,
            kept: dir,
            replaced: existing.dir,
          })
        }
        this.entries.set(metadata.name, metadata)
      } catch (err) {
        if (err instanceof SkillLoadError) {
          this.byDir.delete(dir)
          this.logger.warn(`Skipping skill in ${dir}: ${err.message}`, { dir })
          continue
        }
        // No SKILL.md in this directory, or it vanished mid-scan.
        if (isMissingFile(err)) continue
        throw err
      }
    }

    for (const dir of [...this.byDir.keys()]) {
      if (!seenDirs.has(dir)) this.byDir.delete(dir)
    }

  }

  /** All indexed skills, sorted by name. */
  list(): SkillMetadata[] {
    return [...this.entries.values()].sort((a, b) => compareNames(a.name, b.name))
  }

  names(): string[] {
    return this.list().map((skill) => skill.name)
  }

  get(name: string): SkillMetadata | undefined {
    return this.entries.get(name)
  }

  has(name: string): boolean {
    return this.entries.has(name)
  }

  get size(): number {
    return this.entries.size
  }

  /** Full instruction body of a registered skill, read fresh from disk. */
  async instructionsFor(name: string): Promise<string> {
    return loadSkillInstructions(this.require(name).dir)
  }

  async resourceFor(name: string, ref: string): Promise<string> {
    return loadSkillResource(this.require(name).dir, ref)
  }

  private require(name: string): SkillMetadata {
    const metadata = this.entries.get(name)
    if (!metadata) {
      throw new SkillNotFoundError(name)
    }
    return metadata
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR")
}
