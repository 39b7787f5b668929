export { type StoredMessage, StoredMessageSchema, type StoredSession, StoredSessionSchema } from "./schemas.js"
export { createSession, type Session } from "./session.js"
export {
  assertValidSessionName,
  deserializeSession,
  FileSessionStore,
  InMemorySessionStore,
  InvalidSessionNameError,
  serializeSession,
  SessionNotFoundError,
  type SessionStore,
} from "./store.js"
