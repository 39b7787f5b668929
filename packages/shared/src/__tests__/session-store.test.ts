import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { afterEach, beforeEach, describe, expect, it } from "vitest"

import { createMessage } from "../reasoning/types.js"
import {
  assertValidSessionName,
  createSession,
  deserializeSession,
  FileSessionStore,
  InMemorySessionStore,
  InvalidSessionNameError,
  serializeSession,
  SessionNotFoundError,
} from "../session/index.js"

function sampleSession() {
  return createSession({
    id: "s-1",
    createdAt: "2024-05-01T10:00:00.000Z",
    messages: [
      createMessage("user", "hello", { id: "m-1", timestamp: "2024-05-01T10:00:01.000Z" }),
      createMessage("assistant", "hi there", { id: "m-2", timestamp: "2024-05-01T10:00:02.000Z" }),
    ],
  })
}

// ---------------------------------------------------------------------------
// Names and serialization
// ---------------------------------------------------------------------------

describe("assertValidSessionName", () => {
  it("accepts simple names", () => {
    expect(() => assertValidSessionName("work-2024_v1.2")).not.toThrow()
  })

  it("rejects empty names, separators and dot segments", () => {
    for (const name of ["", "a/b", "a\\b", "..", ".", "has space"]) {
      expect(() => assertValidSessionName(name)).toThrow(InvalidSessionNameError)
    }
  })
})

describe("serializeSession / deserializeSession", () => {
  it("restores every field", () => {
    const restored = deserializeSession(serializeSession(sampleSession()))
    expect(restored).toEqual(sampleSession())
  })

  it("generates ids and timestamps for older files without them", () => {
    const restored = deserializeSession(
      JSON.stringify({ messages: [{ role: "user", content: "hi" }] }),
    )
    expect(restored.messages[0]?.content).toBe("hi")
    expect(restored.messages[0]?.id).toMatch(/^[0-9a-f-]{36}$/)
    expect(restored.messages[0]?.timestamp).not.toBe("")
    expect(restored.id).toMatch(/^[0-9a-f-]{36}$/)
    expect(Number.isNaN(Date.parse(restored.createdAt))).toBe(false)
  })

  it("rejects malformed content", () => {
    expect(() => deserializeSession(JSON.stringify({ messages: [{ role: "tool" }] }))).toThrow()
  })

  it("creates sessions with an id and an empty history", () => {
    const session = createSession()
    expect(session.id).toMatch(/^[0-9a-f-]{36}$/)
    expect(session.messages).toEqual([])
  })
})

// ---------------------------------------------------------------------------
// FileSessionStore
// ---------------------------------------------------------------------------

describe("FileSessionStore", () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "ore-sessions-"))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it("lists a missing root as empty", async () => {
    expect(await new FileSessionStore(join(root, "nope")).list()).toEqual([])
  })

  it("creates the directory and writes pretty-printed JSON", async () => {
    const dir = join(root, "nested", "sessions")
    const store = new FileSessionStore(dir)

    await store.save(sampleSession(), "work")

    const raw = await readFile(join(dir, "work.json"), "utf-8")
    expect(raw).toBe(serializeSession(sampleSession()) + "\n")
    expect(raw.split("\n")[1]).toBe('  "id": "s-1",')
  })

  it("round-trips a session", async () => {
    const store = new FileSessionStore(root)
    await store.save(sampleSession(), "work")
    expect(await store.load("work")).toEqual(sampleSession())
  })

  it("overwrites on save", async () => {
    const store = new FileSessionStore(root)
    const session = sampleSession()
    await store.save(session, "work")
    session.messages.push(createMessage("user", "again"))
    await store.save(session, "work")

    expect((await store.load("work")).messages).toHaveLength(3)
  })

  it("lists saved names sorted, ignoring other files", async () => {
    const store = new FileSessionStore(root)
    await store.save(sampleSession(), "zeta")
    await store.save(sampleSession(), "alpha")
    await writeFile(join(root, "notes.txt"), "x")

    expect(await store.list()).toEqual(["alpha", "zeta"])
  })

  it("throws SessionNotFoundError for unknown names", async () => {
    const store = new FileSessionStore(root)
    await expect(store.load("missing")).rejects.toThrow(SessionNotFoundError)
    await expect(store.load("missing")).rejects.toThrow(
      `Session 'missing' not found at ${join(root, "missing.json")}`,
    )
  })

  it("rejects invalid names before touching the disk", async () => {
    const store = new FileSessionStore(root)
    await expect(store.save(sampleSession(), "../escape")).rejects.toThrow(InvalidSessionNameError)
    await expect(store.load("../escape")).rejects.toThrow(InvalidSessionNameError)
  })
})

// ---------------------------------------------------------------------------
// InMemorySessionStore
// ---------------------------------------------------------------------------

describe("InMemorySessionStore", () => {
  it("stores copies", async () => {
    const store = new InMemorySessionStore()
    const session = sampleSession()
    await store.save(session, "b")
    session.messages.length = 0

    expect((await store.load("b")).messages).toHaveLength(2)
  })

  it("lists sorted names and reports unknown ones", async () => {
    const store = new InMemorySessionStore()
    await store.save(sampleSession(), "b")
    await store.save(sampleSession(), "a")

    expect(await store.list()).toEqual(["a", "b"])
    await expect(store.load("c")).rejects.toThrow("Session 'c' not found")
  })
})
