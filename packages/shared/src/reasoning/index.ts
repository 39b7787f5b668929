export { AnthropicReasoner, type AnthropicReasonerOptions, DEFAULT_ANTHROPIC_MODEL } from "./anthropic.js"
export { createReasoner, type ReasonerOptions } from "./factory.js"
export {
  chooseDefaultModel,
  defaultModel,
  fetchModels,
  type FetchModelsOptions,
  PREFERRED_MODELS,
} from "./models.js"
export {
  createOpenAIClient,
  DEFAULT_DEEPSEEK_BASE_URL,
  DEFAULT_MODELS,
  DEFAULT_OLLAMA_HOST,
  ollamaBaseUrl,
  type OpenAICompatibleProvider,
  OpenAICompatibleReasoner,
  type OpenAICompatibleReasonerOptions,
} from "./openai-compatible.js"
export {
  BACKEND_IDS,
  type BackendId,
  BaseReasoner,
  createMessage,
  createResponse,
  isBackendId,
  type Message,
  MESSAGE_ROLES,
  type MessageRole,
  type Reasoner,
  type ReasonerCompleteEvent,
  ReasonerConfigError,
  type ReasonerEvent,
  type ReasonerResponse,
  type ReasonerTextEvent,
} from "./types.js"
