/**
 * Tool Registry
 *
 * Registry of available actions keyed by name. The router never reads the
 * registry directly; callers project it into routing targets per call.
 */

import { compareNames } from "../common/order.js"
import { EchoTool } from "./echo.js"
import { ReadFileTool, type ReadFileToolOptions } from "./read-file.js"
import type { RoutableAction } from "./types.js"

export class ToolNotFoundError extends Error {
  constructor(readonly toolName: string) {
    super(`Unknown tool: ${toolName}`)
    this.name = "ToolNotFoundError"
  }
}

export class ToolRegistry {
  private tools = new Map<string, RoutableAction>()

  register(tool: RoutableAction): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`)
    }
    this.tools.set(tool.name, tool)
  }

  get(name: string): RoutableAction | undefined {
    return this.tools.get(name)
  }

  /** Like `get`, but throws ToolNotFoundError for unknown names. */
  require(name: string): RoutableAction {
    const tool = this.tools.get(name)
    if (!tool) throw new ToolNotFoundError(name)
    return tool
  }

  has(name: string): boolean {
    return this.tools.has(name)
  }

  /** All tools, sorted by name. */
  list(): RoutableAction[] {
    return [...this.tools.values()].sort((a, b) => compareNames(a.name, b.name))
  }

  names(): string[] {
    return this.list().map((tool) => tool.name)
  }

  get size(): number {
    return this.tools.size
  }
}

export interface DefaultToolRegistryOptions {
  readFile?: ReadFileToolOptions
}

/** Create a registry with the built-in tools (echo, read-file). */
export function createDefaultToolRegistry(options: DefaultToolRegistryOptions = {}): ToolRegistry {
  const registry = new ToolRegistry()
  registry.register(new EchoTool())
  registry.register(new ReadFileTool(options.readFile))
  return registry
}
