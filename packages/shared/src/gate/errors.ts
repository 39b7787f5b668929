import { type Permission, sortPermissions } from "../permissions/index.js"

/**
 * Raised by the Gate when an action requires permissions that were not
 * granted. The only failure the Gate introduces; fatal to that invocation.
 */
export class PermissionDeniedError extends Error {
  readonly actionName: string
  /** Every missing permission, sorted. */
  readonly missing: readonly Permission[]

  constructor(actionName: string, missing: Iterable<Permission>) {
    const sorted = sortPermissions(missing)
    super(`Action '${actionName}' denied: missing permissions: ${sorted.join(", ")}`)
    this.name = "PermissionDeniedError"
    this.actionName = actionName
    this.missing = sorted
  }
}
