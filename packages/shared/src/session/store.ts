/**
 * Session persistence.
 *
 * The orchestrator never touches storage; the CLI loads a session before a
 * turn and saves it afterwards through this interface.
 */

import { mkdir, readdir, readFile, writeFile } from "node:fs/promises"
import { join } from "node:path"

import { createMessage } from "../reasoning/types.js"
import { StoredSessionSchema } from "./schemas.js"
import { createSession, type Session } from "./session.js"

export interface SessionStore {
  /** Persist under a user-facing name, replacing any previous copy. */
  save(session: Session, name: string): Promise<void>
  /** Throws SessionNotFoundError for unknown names. */
  load(name: string): Promise<Session>
  /** Stored names, sorted. */
  list(): Promise<string[]>
}

export class SessionNotFoundError extends Error {
  readonly sessionName: string

  constructor(sessionName: string, location?: string) {
    super(`Session '${sessionName}' not found${location ? ` at ${location}` : ""}`)
    this.name = "SessionNotFoundError"
    this.sessionName = sessionName
  }
}

export class InvalidSessionNameError extends Error {
  constructor(sessionName: string) {
    super(`Invalid session name: '${sessionName}'. Use letters, digits, '.', '_' or '-'.`)
    this.name = "InvalidSessionNameError"
  }
}

const SESSION_NAME_RE = /^[A-Za-z0-9._-]+$/

export function assertValidSessionName(name: string): void {
  if (!SESSION_NAME_RE.test(name) || name === "." || name === "..") {
    throw new InvalidSessionNameError(name)
  }
}

// ──────────────────────────────────────────────────
// Serialization
// ──────────────────────────────────────────────────

export function serializeSession(session: Session): string {
  return JSON.stringify(
    {
      id: session.id,
      createdAt: session.createdAt,
      messages: session.messages.map((m) => ({
        role: m.role,
        content: m.content,
        id: m.id,
        timestamp: m.timestamp,
      })),
    },
    null,
    2,
  )
}

export function deserializeSession(raw: string): Session {
  const data = StoredSessionSchema.parse(JSON.parse(raw))
  return createSession({
    id: data.id,
    createdAt: data.createdAt,
    messages: data.messages.map((m) =>
      createMessage(m.role, m.content, { id: m.id, timestamp: m.timestamp }),
    ),
  })
}

// ──────────────────────────────────────────────────
// File store
// ──────────────────────────────────────────────────

/** One pretty-printed JSON file per session: `<root>/<name>.json`. */
export class FileSessionStore implements SessionStore {
  constructor(private readonly root: string) {}

  async save(session: Session, name: string): Promise<void> {
    assertValidSessionName(name)
    await mkdir(this.root, { recursive: true })
    await writeFile(this.pathFor(name), serializeSession(session) + "\n", "utf-8")
  }

  async load(name: string): Promise<Session> {
    assertValidSessionName(name)
    const path = this.pathFor(name)
    let raw: string
    try {
      raw = await readFile(path, "utf-8")
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        throw new SessionNotFoundError(name, path)
      }
      throw err
    }
    return deserializeSession(raw)
  }

  async list(): Promise<string[]> {
    let entries: string[]
    try {
      entries = await readdir(this.root)
    } catch {
      return []
    }
    return entries
      .filter((entry) => entry.endsWith(".json"))
      .map((entry) => entry.slice(0, -".json".length))
      .sort()
  }

  private pathFor(name: string): string {
    return join(this.root, `${name}.json`)
  }
}

// ──────────────────────────────────────────────────
// In-memory store
// ──────────────────────────────────────────────────

/** Keeps serialized copies so callers cannot mutate stored state. */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, string>()

  async save(session: Session, name: string): Promise<void> {
    assertValidSessionName(name)
    this.sessions.set(name, serializeSession(session))
  }

  async load(name: string): Promise<Session> {
    const raw = this.sessions.get(name)
    if (raw === undefined) {
      throw new SessionNotFoundError(name)
    }
    return deserializeSession(raw)
  }

  async list(): Promise<string[]> {
    return [...this.sessions.keys()].sort()
  }
}
