/**
 * Built-in read-file tool: reads a UTF-8 text file.
 *
 * Requires `filesystem-read`. Relative paths resolve against the process
 * working directory. With a configured `root`, relative paths resolve
 * against it instead, and paths containing a `..` segment or resolving
 * outside it are refused before any I/O happens.
 */

import { readFile } from "node:fs/promises"
import { isAbsolute, relative, resolve, sep } from "node:path"

import type { Permission } from "../permissions/index.js"
import {
  type ActionArgs,
  actionError,
  type ActionResult,
  createActionResult,
  type RoutableAction,
} from "./types.js"

export interface ReadFileToolOptions {
  /** Directory reads are confined to. Unset means any path is readable. */
  root?: string
}

const READ_FILE_HINTS = ["read file", "read the file", "show file", "open file", "cat"] as const

/** A token with a path separator, or a name ending in a short extension. */
const PATH_TOKEN_RE = /^(?:.*[/\\].*|[^\s]+\.[A-Za-z0-9]{1,8})$/
const TRAILING_PUNCTUATION_RE = /[.,;:!?'")\]]+$/
const LEADING_QUOTES_RE = /^['"(]+/

export class ReadFileTool implements RoutableAction {
  readonly name = "read-file"
  readonly description = "Read a local file. Args: path=<filepath>. Requires filesystem-read."
  readonly requiredPermissions: ReadonlySet<Permission> = new Set<Permission>(["filesystem-read"])

  private readonly root: string | undefined

  constructor(options: ReadFileToolOptions = {}) {
    this.root = options.root
  }

  async run(args: ActionArgs): Promise<ActionResult> {
    const pathArg = (args.path ?? "").trim()
    if (!pathArg) {
      return actionError(this.name, "Missing required argument: path=...")
    }

    let target = resolve(pathArg)
    if (this.root !== undefined) {
      if (pathArg.split(/[/\\]/).includes("..")) {
        return actionError(this.name, `Path must not contain '..' segments: ${pathArg}`)
      }
      const root = resolve(this.root)
      target = resolve(root, pathArg)
      const rel = relative(root, target)
      if (rel.startsWith(`..${sep}`) || rel === ".." || isAbsolute(rel)) {
        return actionError(this.name, `Path is outside the tool root: ${pathArg}`)
      }
    }

    try {
      const content = await readFile(target, "utf-8")
      return createActionResult({ actionName: this.name, output: content, status: "ok" })
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        return actionError(this.name, `File not found: ${pathArg}`)
      }
      return actionError(this.name, err instanceof Error ? err.message : String(err))
    }
  }

  routingHints(): readonly string[] {
    return READ_FILE_HINTS
  }

  /** `read the file at /tmp/notes.txt.` → `{ path: "/tmp/notes.txt" }` */
  extractArgs(prompt: string): ActionArgs {
    for (const raw of prompt.trim().split(/\s+/)) {
      const token = raw.replace(LEADING_QUOTES_RE, "").replace(TRAILING_PUNCTUATION_RE, "")
      if (token && PATH_TOKEN_RE.test(token)) {
        return { path: token }
      }
    }
    return {}
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err
}
