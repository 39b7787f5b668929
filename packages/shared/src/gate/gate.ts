/**
 * Gate: default-deny authorization around action execution.
 *
 * An action runs only when its required permissions are a subset of the
 * granted set. Denial is the only thing the Gate raises; failures inside an
 * action come back as an ActionResult with `status: "error"`.
 *
 * The Gate also instruments each run: `metadata.executionTimeMs` and
 * `metadata.checkedPermissions` are added unless the action already set them.
 */

import { performance } from "node:perf_hooks"

import { ALL_PERMISSIONS, type Permission, sortPermissions } from "../permissions/index.js"
import { OreAttributes, setSpanAttributes } from "../tracing/spans.js"
import { type Logger, silentLogger } from "../tracing/logger.js"
import {
  type ActionArgs,
  type ActionResult,
  createActionResult,
  type RoutableAction,
} from "../tools/types.js"
import { PermissionDeniedError } from "./errors.js"

export interface GateOptions {
  logger?: Logger
}

export class Gate {
  private readonly granted: ReadonlySet<Permission>
  private readonly logger: Logger

  constructor(granted: Iterable<Permission>, options: GateOptions = {}) {
    this.granted = new Set(granted)
    this.logger = options.logger ?? silentLogger
  }

  /** Gate granting every known permission. For tests and trusted embedding only. */
  static permissive(options: GateOptions = {}): Gate {
    return new Gate(ALL_PERMISSIONS, options)
  }

  /** Sorted copy of the granted set. */
  get grantedPermissions(): Permission[] {
    return sortPermissions(this.granted)
  }

  isGranted(permission: Permission): boolean {
    return this.granted.has(permission)
  }

  /** Throws PermissionDeniedError naming every missing permission. */
  check(action: RoutableAction): void {
    const missing = [...action.requiredPermissions].filter((p) => !this.granted.has(p))
    if (missing.length === 0) return

    const error = new PermissionDeniedError(action.name, missing)
    this.logger.warn("action denied", {
      action: action.name,
      missing: error.missing,
    })
    setSpanAttributes({ [OreAttributes.PERMISSIONS_DENIED]: [...error.missing] })
    throw error
  }

  async run(action: RoutableAction, args: ActionArgs): Promise<ActionResult> {
    this.check(action)

    const checkedPermissions = sortPermissions(action.requiredPermissions)
    const start = performance.now()
    let result: ActionResult
    try {
      result = await action.run(args)
    } catch (err) {
      result = createActionResult({
        actionName: action.name,
        output: "",
        status: "error",
        metadata: { errorMessage: err instanceof Error ? err.message : String(err) },
      })
    }
    const executionTimeMs = performance.now() - start

    this.logger.debug("action finished", {
      action: action.name,
      status: result.status,
      executionTimeMs,
    })
    setSpanAttributes({
      [OreAttributes.ACTION_NAME]: action.name,
      [OreAttributes.ACTION_STATUS]: result.status,
      [OreAttributes.PERMISSIONS_CHECKED]: checkedPermissions,
      [OreAttributes.EXECUTION_DURATION_MS]: executionTimeMs,
    })

    // Action-supplied values for the same keys win.
    return createActionResult({
      actionName: result.actionName,
      output: result.output,
      status: result.status,
      id: result.id,
      timestamp: result.timestamp,
      metadata: { executionTimeMs, checkedPermissions, ...result.metadata },
    })
  }
}
