export { EchoTool } from "./echo.js"
export { ReadFileTool, type ReadFileToolOptions } from "./read-file.js"
export {
  createDefaultToolRegistry,
  type DefaultToolRegistryOptions,
  ToolNotFoundError,
  ToolRegistry,
} from "./registry.js"
export {
  type ActionArgs,
  actionError,
  type ActionResult,
  type ActionResultMetadata,
  type ActionStatus,
  createActionResult,
  type CreateActionResultInput,
  extractArgsOf,
  type RoutableAction,
  routingHintsOf,
} from "./types.js"
