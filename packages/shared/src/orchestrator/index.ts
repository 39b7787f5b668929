export {
  type ContextBlock,
  type ExecuteOptions,
  Orchestrator,
  type OrchestratorOptions,
} from "./orchestrator.js"
export { DEFAULT_PERSONA, loadPersona } from "./persona.js"
