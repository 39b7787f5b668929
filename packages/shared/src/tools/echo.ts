/**
 * Built-in echo tool: writes its arguments back as `key=value` lines.
 * Needs no permissions; useful for exercising routing and the gate.
 */

import type { Permission } from "../permissions/index.js"
import {
  type ActionArgs,
  type ActionResult,
  createActionResult,
  type RoutableAction,
} from "./types.js"

const ECHO_HINTS = ["echo", "repeat"] as const

export class EchoTool implements RoutableAction {
  readonly name = "echo"
  readonly description = "Echo arguments back (e.g. msg=hello). No permissions required."
  readonly requiredPermissions: ReadonlySet<Permission> = new Set()

  async run(args: ActionArgs): Promise<ActionResult> {
    const keys = Object.keys(args).sort()
    const output = keys.length === 0
      ? "(no arguments)"
      : keys.map((key) => `${key}=${args[key] ?? ""}`).join("\n")

    return createActionResult({ actionName: this.name, output, status: "ok" })
  }

  routingHints(): readonly string[] {
    return ECHO_HINTS
  }

  /** `please echo hello world` → `{ msg: "hello world" }` */
  extractArgs(prompt: string): ActionArgs {
    const trimmed = prompt.trim()
    const lower = trimmed.toLowerCase()

    let msg = trimmed
    for (const hint of ECHO_HINTS) {
      const idx = lower.indexOf(hint)
      if (idx !== -1) {
        msg = trimmed.slice(idx + hint.length).trim()
        break
      }
    }

    return msg ? { msg } : {}
  }
}
