import { createInterface } from "node:readline"

import { writeStderr } from "./terminal.js"

const EXIT_COMMANDS = new Set(["/exit", "/quit", "exit", "quit"])

export interface ReplOptions {
  input: NodeJS.ReadableStream
  /** Shown on stderr before the first line. */
  banner?: string
  /** Handle one non-empty line. Errors are reported and the loop continues. */
  onLine: (line: string) => Promise<void>
}

/** Read lines until EOF or an exit command. */
export async function runRepl(options: ReplOptions): Promise<void> {
  const rl = createInterface({ input: options.input, terminal: false })
  if (options.banner) writeStderr(options.banner)

  try {
    for await (const raw of rl) {
      const line = raw.trim()
      if (!line) continue
      if (EXIT_COMMANDS.has(line)) break
      try {
        await options.onLine(line)
      } catch (err) {
        writeStderr(`error: ${err instanceof Error ? err.message : String(err)}`)
      }
    }
  } finally {
    rl.close()
  }
}
