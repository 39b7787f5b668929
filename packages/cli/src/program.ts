/**
 * Command-line surface: `ore [prompt]`.
 *
 * Single-turn by default; `-i` opens a stateless REPL and `-c` a REPL with
 * conversation memory. Replies and machine-readable output go to stdout,
 * diagnostics and logs to stderr.
 */

import { writeFile } from "node:fs/promises"

import { Command, CommanderError } from "commander"

import { artifactToJson } from "@ore/shared/artifact"
import { Gate } from "@ore/shared/gate"
import { loadPersona, Orchestrator } from "@ore/shared/orchestrator"
import { ALL_PERMISSIONS, parsePermissions, sortPermissions } from "@ore/shared/permissions"
import {
  BACKEND_IDS,
  type BackendId,
  createReasoner as defaultCreateReasoner,
  chooseDefaultModel,
  fetchModels as defaultFetchModels,
  type FetchModelsOptions,
  isBackendId,
  type Reasoner,
  type ReasonerOptions,
} from "@ore/shared/reasoning"
import { isSelected, RuleRouter } from "@ore/shared/routing"
import { createSession, FileSessionStore, type Session, type SessionStore } from "@ore/shared/session"
import { SkillNotFoundError, SkillRegistry } from "@ore/shared/skills"
import { type ActionArgs, createDefaultToolRegistry, type ToolRegistry } from "@ore/shared/tools"
import { initTracing, type Logger, shutdownTracing, TracingLogger } from "@ore/shared/tracing"
import { runTurn, type TurnDeps, type TurnOutcome } from "@ore/shared/turn"

import { type Config, credentialsFor, loadConfig } from "./config.js"
import { runRepl } from "./repl.js"
import { writeChunk, writeStderr, writeStdout } from "./terminal.js"

export const VERSION = "0.1.0"

export interface CliOptions {
  backend?: string
  model?: string
  system?: string
  listModels?: boolean
  listTools?: boolean
  listSkills?: boolean
  listSessions?: boolean
  interactive?: boolean
  conversational?: boolean
  saveSession?: string
  resumeSession?: string
  stream?: boolean
  verbose?: boolean
  route?: boolean
  tool?: string
  toolArg: string[]
  skill?: string
  allow: string[]
  json?: boolean
  artifact?: string
}

/** Collaborators the program builds by default; tests substitute fakes. */
export interface CliDeps {
  env?: Record<string, string | undefined>
  createReasoner?: (options: ReasonerOptions) => Reasoner
  fetchModels?: (options: FetchModelsOptions) => Promise<string[]>
  sessionStore?: SessionStore
  tools?: ToolRegistry
  /** REPL input; defaults to process.stdin. */
  input?: NodeJS.ReadableStream
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "UsageError"
  }
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

// ──────────────────────────────────────────────────
// Argument validation
// ──────────────────────────────────────────────────

export function validateModes(prompt: string | undefined, options: CliOptions): void {
  if (options.interactive && options.conversational) {
    throw new UsageError("--interactive and --conversational cannot be used together")
  }
  if (options.interactive && (options.saveSession || options.resumeSession)) {
    throw new UsageError(
      "--save-session and --resume-session require --conversational or a single prompt, not --interactive",
    )
  }
  if (options.tool && options.route) {
    throw new UsageError("--tool and --route cannot be used together")
  }
  const listing =
    options.listModels || options.listTools || options.listSkills || options.listSessions
  if (!prompt && !listing && !options.interactive && !options.conversational) {
    throw new UsageError("a prompt is required (or use --interactive, --conversational or a --list-* option)")
  }
}

/** `key=value` pairs; the first `=` splits, so values may contain `=`. */
export function parseToolArgs(pairs: readonly string[]): ActionArgs {
  const args: ActionArgs = {}
  for (const pair of pairs) {
    const eq = pair.indexOf("=")
    const key = eq > 0 ? pair.slice(0, eq).trim() : ""
    if (!key) {
      throw new UsageError(`Invalid --tool-arg '${pair}': expected key=value`)
    }
    args[key] = pair.slice(eq + 1)
  }
  return args
}

function parseBackend(value: string): BackendId {
  if (!isBackendId(value)) {
    throw new UsageError(`Invalid --backend: ${value}. Must be one of: ${BACKEND_IDS.join(", ")}.`)
  }
  return value
}

// ──────────────────────────────────────────────────
// Listings
// ──────────────────────────────────────────────────

function printTools(tools: ToolRegistry): void {
  for (const tool of tools.list()) {
    const perms = sortPermissions(tool.requiredPermissions)
    writeStdout(`${tool.name}\t${tool.description}\t[${perms.length ? perms.join(", ") : "none"}]`)
  }
}

function printSkills(skills: SkillRegistry, root: string): void {
  if (skills.size === 0) {
    writeStdout(`No skills found in ${root}`)
    return
  }
  for (const skill of skills.list()) {
    writeStdout(`${skill.name}\t${skill.description}`)
  }
}

async function printSessions(store: SessionStore): Promise<void> {
  const names = await store.list()
  if (names.length === 0) {
    writeStdout("No saved sessions.")
    return
  }
  for (const name of names) {
    writeStdout(name)
  }
}

// ──────────────────────────────────────────────────
// Program
// ──────────────────────────────────────────────────

export function buildProgram(deps: CliDeps = {}): Command {
  const program = new Command()

  program
    .name("ore")
    .description("Route a prompt to a tool or skill and ask a language model")
    .version(VERSION)
    .argument("[prompt]", "user input")
    .option("--backend <name>", `reasoning backend (${BACKEND_IDS.join(", ")})`)
    .option("--model <name>", "model id (default: backend default, or first available Ollama model)")
    .option("--system <file>", "persona prompt file")
    .option("--list-models", "list models available from the backend and exit")
    .option("--list-tools", "list built-in tools and exit")
    .option("--list-skills", "list skills and exit")
    .option("--list-sessions", "list saved sessions and exit")
    .option("-i, --interactive", "read prompts line by line, without memory")
    .option("-c, --conversational", "read prompts line by line, with conversation memory")
    .option("--save-session <name>", "save the conversation under a name")
    .option("--resume-session <name>", "continue a saved conversation")
    .option("-s, --stream", "stream the reply as it is generated")
    .option("-v, --verbose", "log routing and tool details to stderr")
    .option("--route", "pick a tool or skill from the prompt")
    .option("--tool <name>", "run a tool before reasoning")
    .option("--tool-arg <key=value>", "tool argument (repeatable)", collect, [])
    .option("--skill <name>", "activate a skill's instructions")
    .option(
      "--allow <permissions>",
      `grant permissions, repeatable or comma-separated (${ALL_PERMISSIONS.join(", ")})`,
      collect,
      [],
    )
    .option("--json", "print the execution artifact as JSON instead of the reply")
    .option("--artifact <file>", "write the execution artifact to a file")
    .action(async (prompt: string | undefined, options: CliOptions) => {
      await execute(prompt, options, deps)
    })

  program.exitOverride()
  return program
}

async function execute(prompt: string | undefined, options: CliOptions, deps: CliDeps): Promise<void> {
  validateModes(prompt, options)

  const config = loadConfig(deps.env ?? process.env)
  const backend = options.backend ? parseBackend(options.backend) : config.backend
  const logger = new TracingLogger({ level: options.verbose ? "debug" : config.logLevel })
  if (initTracing(config.tracing, VERSION)) {
    logger.debug("tracing started", {
      exporter: config.tracing.exporterType,
      sampleRate: config.tracing.sampleRate,
    })
  }

  const tools = deps.tools ?? createDefaultToolRegistry()
  const store = deps.sessionStore ?? new FileSessionStore(config.sessionsRoot)
  const skills = new SkillRegistry(config.skillsRoot, { logger })

  if (options.listTools) {
    printTools(tools)
    return
  }
  if (options.listSkills) {
    await skills.refresh()
    printSkills(skills, config.skillsRoot)
    return
  }
  if (options.listSessions) {
    await printSessions(store)
    return
  }
  if (options.listModels) {
    await listModels(config, backend, deps)
    return
  }

  const granted = parsePermissions([
    ...config.allow,
    ...options.allow.flatMap((value) => value.split(",")),
  ])
  const toolArgs = parseToolArgs(options.toolArg)
  if (options.tool) tools.require(options.tool)

  await skills.refresh()
  if (options.skill && !skills.has(options.skill)) {
    throw new SkillNotFoundError(options.skill)
  }

  const model = await resolveModel(config, backend, options.model, deps)
  const reasoner = (deps.createReasoner ?? defaultCreateReasoner)({
    backend,
    model,
    ...credentialsFor(config, backend),
  })
  const persona = await loadPersona(options.system ?? config.personaFile)

  const turnDeps: TurnDeps = {
    orchestrator: new Orchestrator(reasoner, { persona, logger }),
    gate: new Gate(granted, { logger }),
    router: new RuleRouter({ confidenceThreshold: config.routeThreshold, logger }),
    tools,
    skills,
    logger,
  }

  const sessionName = options.saveSession ?? options.resumeSession ?? null
  let session: Session | undefined
  if (options.resumeSession) {
    session = await store.load(options.resumeSession)
  } else if (options.saveSession || options.conversational) {
    session = createSession()
  }

  const turn = async (line: string, turnSession?: Session): Promise<void> => {
    const outcome = await runTurn(
      {
        prompt: line,
        route: options.route,
        toolName: options.tool,
        toolArgs,
        skillName: options.skill,
        session: turnSession,
        sessionName: turnSession ? sessionName : null,
        stream: options.stream && !options.json,
        onChunk: writeChunk,
      },
      turnDeps,
    )
    await report(outcome, options, logger)
    if (turnSession && sessionName) {
      await store.save(turnSession, sessionName)
    }
  }

  if (options.interactive) {
    await runRepl({
      input: deps.input ?? process.stdin,
      banner: `ore ${VERSION} (${reasoner.backendId}/${reasoner.modelId}). Type /exit to quit.`,
      onLine: (line) => turn(line),
    })
    return
  }
  if (options.conversational) {
    const memory = session ?? createSession()
    await runRepl({
      input: deps.input ?? process.stdin,
      banner: `ore ${VERSION} (${reasoner.backendId}/${reasoner.modelId}), conversational. Type /exit to quit.`,
      onLine: (line) => turn(line, memory),
    })
    return
  }
  if (prompt) {
    await turn(prompt, session)
  }
}

async function resolveModel(
  config: Config,
  backend: BackendId,
  flag: string | undefined,
  deps: CliDeps,
): Promise<string | undefined> {
  const explicit = flag ?? config.model
  if (explicit || backend !== "ollama") return explicit

  const available = await (deps.fetchModels ?? defaultFetchModels)({
    provider: "ollama",
    baseUrl: config.ollamaHost,
  })
  const chosen = chooseDefaultModel(available)
  if (!chosen) {
    throw new Error("No Ollama models found. Install one with e.g. `ollama pull llama3.2`.")
  }
  writeStderr(`Using model: ${chosen}`)
  return chosen
}

async function listModels(config: Config, backend: BackendId, deps: CliDeps): Promise<void> {
  if (backend === "anthropic") {
    throw new UsageError("--list-models is not supported for the anthropic backend")
  }
  const models = await (deps.fetchModels ?? defaultFetchModels)({
    provider: backend,
    ...credentialsFor(config, backend),
  })
  if (models.length === 0) {
    throw new Error(`No models found for the ${backend} backend.`)
  }
  writeStdout(`Available ${backend} models:`)
  for (const name of [...models].sort()) {
    writeStdout(`  ${name}`)
  }
}

async function report(outcome: TurnOutcome, options: CliOptions, logger: Logger): Promise<void> {
  const { artifact, response } = outcome

  if (options.verbose) {
    if (artifact.routing) {
      const decision = artifact.routing
      const target = isSelected(decision) ? `${decision.targetType} '${decision.target}'` : "fallback"
      writeStderr(`[route] ${target} (${decision.confidence.toFixed(2)}): ${decision.reasoning}`)
    }
    if (artifact.toolResult) {
      writeStderr(`[tool] ${artifact.toolResult.actionName}: ${artifact.toolResult.status}`)
    }
    if (artifact.skill) {
      writeStderr(`[skill] ${artifact.skill}`)
    }
  }

  if (options.json) {
    writeStdout(artifactToJson(artifact))
  } else if (options.stream) {
    writeChunk("\n")
  } else {
    writeStdout(response.content)
  }

  if (options.artifact) {
    await writeFile(options.artifact, artifactToJson(artifact) + "\n", "utf-8")
    logger.info("artifact written", { path: options.artifact })
  }
}

/**
 * Parse `argv` (user arguments only) and run. Returns the exit code; every
 * error is reported on stderr as `error: <message>`.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const program = buildProgram(deps)
  try {
    await program.parseAsync([...argv], { from: "user" })
    return 0
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander has already printed its own message
      return err.exitCode
    }
    writeStderr(`error: ${err instanceof Error ? err.message : String(err)}`)
    return 1
  } finally {
    await shutdownTracing()
  }
}
