import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { Readable } from "node:stream"

import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest"

import {
  BaseReasoner,
  createResponse,
  type Message,
  type ReasonerOptions,
  type ReasonerResponse,
} from "@ore/shared/reasoning"
import { InMemorySessionStore } from "@ore/shared/session"

import { type CliDeps, parseToolArgs, runCli, UsageError, validateModes } from "../program.js"

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

class RecordingReasoner extends BaseReasoner {
  readonly backendId: string
  readonly modelId: string
  readonly calls: Message[][] = []

  constructor(options: ReasonerOptions) {
    super()
    this.backendId = options.backend
    this.modelId = options.model ?? "default-model"
  }

  async reason(messages: readonly Message[]): Promise<ReasonerResponse> {
    this.calls.push([...messages])
    return createResponse({ content: `reply ${this.calls.length}`, modelId: this.modelId })
  }
}

let workdir: string
let skillsRoot: string
let reasoners: RecordingReasoner[]
let stdoutSpy: MockInstance<typeof process.stdout.write>
let stderrSpy: MockInstance<typeof process.stderr.write>

beforeAll(async () => {
  workdir = await mkdtemp(join(tmpdir(), "ore-cli-"))
  skillsRoot = join(workdir, "skills")
  await mkdir(join(skillsRoot, "summarize"), { recursive: true })
  await writeFile(
    join(skillsRoot, "summarize", "SKILL.md"),
    "---\nname: summarize\ndescription: Summaries\nhints:\n  - summarize\n---\nUse three bullets.\n",
  )
})

afterAll(async () => {
  await rm(workdir, { recursive: true, force: true })
})

beforeEach(() => {
  reasoners = []
  stdoutSpy = vi.spyOn(process.stdout, "write").mockImplementation(() => true)
  stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true)
})

afterEach(() => {
  stdoutSpy.mockRestore()
  stderrSpy.mockRestore()
})

function deps(overrides: Partial<CliDeps> = {}, env: Record<string, string> = {}): CliDeps {
  return {
    env: {
      ORE_MODEL: "test-model",
      ORE_SKILLS_ROOT: skillsRoot,
      ORE_SESSIONS_ROOT: join(workdir, "sessions"),
      ...env,
    },
    createReasoner: (options) => {
      const reasoner = new RecordingReasoner(options)
      reasoners.push(reasoner)
      return reasoner
    },
    fetchModels: async () => [],
    sessionStore: new InMemorySessionStore(),
    ...overrides,
  }
}

function stdout(): string {
  return stdoutSpy.mock.calls.map((call) => String(call[0])).join("")
}

function stderr(): string {
  return stderrSpy.mock.calls.map((call) => String(call[0])).join("")
}

function systemMessages(call: readonly Message[] | undefined): string[] {
  return (call ?? []).filter((m) => m.role === "system").map((m) => m.content)
}

// ---------------------------------------------------------------------------
// Argument helpers
// ---------------------------------------------------------------------------

describe("validateModes", () => {
  const base = { toolArg: [], allow: [] }

  it("rejects conflicting flags", () => {
    expect(() => validateModes(undefined, { ...base, interactive: true, conversational: true })).toThrow(
      "--interactive and --conversational cannot be used together",
    )
    expect(() => validateModes(undefined, { ...base, interactive: true, saveSession: "s" })).toThrow(UsageError)
    expect(() => validateModes("x", { ...base, tool: "echo", route: true })).toThrow(
      "--tool and --route cannot be used together",
    )
  })

  it("requires a prompt unless a mode or listing is chosen", () => {
    expect(() => validateModes(undefined, base)).toThrow("a prompt is required")
    expect(() => validateModes(undefined, { ...base, listTools: true })).not.toThrow()
    expect(() => validateModes(undefined, { ...base, conversational: true })).not.toThrow()
  })
})

describe("parseToolArgs", () => {
  it("splits on the first '='", () => {
    expect(parseToolArgs(["msg=a=b", "path=x.txt", "empty="])).toEqual({
      msg: "a=b",
      path: "x.txt",
      empty: "",
    })
  })

  it("rejects pairs without a key", () => {
    expect(() => parseToolArgs(["=v"])).toThrow("Invalid --tool-arg '=v': expected key=value")
    expect(() => parseToolArgs(["novalue"])).toThrow("Invalid --tool-arg 'novalue': expected key=value")
  })
})

// ---------------------------------------------------------------------------
// runCli
// ---------------------------------------------------------------------------

describe("runCli", () => {
  it("prints the reply for a single prompt", async () => {
    const code = await runCli(["hello"], deps())

    expect(code).toBe(0)
    expect(stdout()).toBe("reply 1\n")
    expect(reasoners[0]?.modelId).toBe("test-model")
    expect(reasoners[0]?.calls[0]?.at(-1)?.content).toBe("hello")
  })

  it("streams the reply followed by a newline", async () => {
    expect(await runCli(["hello", "--stream"], deps())).toBe(0)
    expect(stdoutSpy.mock.calls.map((call) => call[0])).toEqual(["reply 1", "\n"])
  })

  it("prints the version", async () => {
    expect(await runCli(["--version"], deps())).toBe(0)
    expect(stdout()).toBe("0.1.0\n")
  })

  it("reports usage errors with exit code 1", async () => {
    expect(await runCli(["-i", "-c"], deps())).toBe(1)
    expect(stderr()).toBe("error: --interactive and --conversational cannot be used together\n")
  })

  it("rejects an unknown backend flag", async () => {
    expect(await runCli(["hi", "--backend", "gpt"], deps())).toBe(1)
    expect(stderr()).toBe("error: Invalid --backend: gpt. Must be one of: ollama, deepseek, openai, anthropic.\n")
  })

  it("rejects unknown permissions", async () => {
    expect(await runCli(["hi", "--allow", "network,root"], deps())).toBe(1)
    expect(stderr()).toBe(
      "error: Unknown permission: root. Valid permissions: filesystem-read, filesystem-write, network, shell\n",
    )
  })

  it("lists tools with their permissions", async () => {
    expect(await runCli(["--list-tools"], deps())).toBe(0)
    expect(stdout()).toBe(
      "echo\tEcho arguments back (e.g. msg=hello). No permissions required.\t[none]\n" +
        "read-file\tRead a local file. Args: path=<filepath>. Requires filesystem-read.\t[filesystem-read]\n",
    )
    expect(reasoners).toHaveLength(0)
  })

  it("lists skills", async () => {
    expect(await runCli(["--list-skills"], deps())).toBe(0)
    expect(stdout()).toBe("summarize\tSummaries\n")
  })

  it("reports an empty skills directory", async () => {
    const empty = join(workdir, "no-skills")
    expect(await runCli(["--list-skills"], deps({}, { ORE_SKILLS_ROOT: empty }))).toBe(0)
    expect(stdout()).toBe(`No skills found in ${empty}\n`)
  })

  it("lists sessions", async () => {
    expect(await runCli(["--list-sessions"], deps())).toBe(0)
    expect(stdout()).toBe("No saved sessions.\n")
  })

  it("lists models sorted", async () => {
    const fetchModels = vi.fn(async () => ["phi3", "llama3.2:latest"])
    expect(await runCli(["--list-models"], deps({ fetchModels }))).toBe(0)
    expect(stdout()).toBe("Available ollama models:\n  llama3.2:latest\n  phi3\n")
    expect(fetchModels).toHaveBeenCalledWith({ provider: "ollama", baseUrl: "http://localhost:11434" })
  })

  it("refuses to list anthropic models", async () => {
    expect(await runCli(["--list-models", "--backend", "anthropic"], deps())).toBe(1)
    expect(stderr()).toBe("error: --list-models is not supported for the anthropic backend\n")
  })

  it("chooses an Ollama model when none is configured", async () => {
    const fetchModels = async () => ["phi3", "llama3.2:latest"]
    expect(await runCli(["hi"], deps({ fetchModels }, { ORE_MODEL: "" }))).toBe(0)
    expect(stderr()).toBe("Using model: llama3.2:latest\n")
    expect(reasoners[0]?.modelId).toBe("llama3.2:latest")
  })

  it("fails when no Ollama model is installed", async () => {
    expect(await runCli(["hi"], deps({}, { ORE_MODEL: "" }))).toBe(1)
    expect(stderr()).toBe("error: No Ollama models found. Install one with e.g. `ollama pull llama3.2`.\n")
  })

  it("runs an explicit tool and passes its output to the model", async () => {
    expect(await runCli(["say something", "--tool", "echo", "--tool-arg", "msg=hi"], deps())).toBe(0)
    expect(systemMessages(reasoners[0]?.calls[0])[1]).toBe("Tool output (echo):\nmsg=hi")
  })

  it("rejects an unknown tool before reasoning", async () => {
    expect(await runCli(["x", "--tool", "nope"], deps())).toBe(1)
    expect(stderr()).toBe("error: Unknown tool: nope\n")
    expect(reasoners).toHaveLength(0)
  })

  it("denies a tool without the required permission", async () => {
    expect(await runCli(["x", "--tool", "read-file", "--tool-arg", "path=a.txt"], deps())).toBe(1)
    expect(stderr()).toContain("error: Action 'read-file' denied: missing permissions: filesystem-read\n")
    expect(reasoners[0]?.calls).toEqual([])
  })

  it("routes to a tool above the configured threshold", async () => {
    const code = await runCli(
      ["please echo hello", "--route", "--json"],
      deps({}, { ORE_ROUTE_THRESHOLD: "0.3" }),
    )

    expect(code).toBe(0)
    const wire = JSON.parse(stdout()) as Record<string, unknown>
    expect(wire.routing).toMatchObject({
      target: "echo",
      target_type: "tool",
      args: { msg: "hello" },
    })
    expect(wire.tool_result).toMatchObject({ tool_name: "echo", output: "msg=hello", status: "ok" })
    expect(wire.response).toMatchObject({ content: "reply 1", model_id: "test-model" })
  })

  it("activates a skill by name", async () => {
    expect(await runCli(["notes", "--skill", "summarize"], deps())).toBe(0)
    expect(systemMessages(reasoners[0]?.calls[0])[1]).toBe("Skill instructions (summarize):\nUse three bullets.")
  })

  it("rejects an unknown skill", async () => {
    expect(await runCli(["notes", "--skill", "nope"], deps())).toBe(1)
    expect(stderr()).toContain("error: ")
    expect(reasoners).toHaveLength(0)
  })

  it("writes the artifact to a file", async () => {
    const path = join(workdir, "artifact.json")
    expect(await runCli(["hello", "--artifact", path, "--allow", "network"], deps())).toBe(0)

    const wire = JSON.parse(await readFile(path, "utf-8")) as Record<string, unknown>
    expect(wire.artifact_version).toBe("1.0")
    expect(wire.prompt).toBe("hello")
    expect(wire.granted_permissions).toEqual(["network"])
    expect(wire.session_name).toBeNull()
    expect(stdout()).toBe("reply 1\n")
  })

  it("saves and resumes a named session", async () => {
    const sessionStore = new InMemorySessionStore()

    expect(await runCli(["first", "--save-session", "work"], deps({ sessionStore }))).toBe(0)
    const saved = await sessionStore.load("work")
    expect(saved.messages.map((m) => `${m.role}:${m.content}`)).toEqual(["user:first", "assistant:reply 1"])

    expect(await runCli(["second", "--resume-session", "work"], deps({ sessionStore }))).toBe(0)
    const history = reasoners[1]?.calls[0]?.filter((m) => m.role !== "system").map((m) => m.content)
    expect(history).toEqual(["first", "reply 1", "second"])
    expect((await sessionStore.load("work")).messages).toHaveLength(4)
  })

  it("fails to resume a missing session", async () => {
    expect(await runCli(["x", "--resume-session", "ghost"], deps())).toBe(1)
    expect(stderr()).toBe("error: Session 'ghost' not found\n")
  })

  it("keeps memory across lines in conversational mode", async () => {
    const input = Readable.from(["first\n", "second\n", "/exit\n", "ignored\n"])
    expect(await runCli(["-c"], deps({ input }))).toBe(0)

    const calls = reasoners[0]?.calls ?? []
    expect(calls).toHaveLength(2)
    expect(calls[1]?.filter((m) => m.role !== "system").map((m) => m.content)).toEqual([
      "first",
      "reply 1",
      "second",
    ])
    expect(stdout()).toBe("reply 1\nreply 2\n")
  })

  it("forgets between lines in interactive mode", async () => {
    const input = Readable.from(["first\nsecond\n"])
    expect(await runCli(["-i"], deps({ input }))).toBe(0)

    const calls = reasoners[0]?.calls ?? []
    expect(calls[1]?.filter((m) => m.role !== "system").map((m) => m.content)).toEqual(["second"])
  })
})
