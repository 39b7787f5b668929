/**
 * Permissions: the closed set of capabilities an action may require.
 *
 * Granted permissions are chosen once per process (CLI flags or ORE_ALLOW)
 * and never widened afterwards. Strings only become permissions here, at the
 * boundary; everything past this module works with the `Permission` union.
 */

export const ALL_PERMISSIONS = [
  "filesystem-read",
  "filesystem-write",
  "network",
  "shell",
] as const

export type Permission = (typeof ALL_PERMISSIONS)[number]

export class InvalidPermissionError extends Error {
  readonly invalid: readonly string[]

  constructor(invalid: readonly string[]) {
    super(
      `Unknown permission${invalid.length === 1 ? "" : "s"}: ${invalid.join(", ")}. ` +
        `Valid permissions: ${ALL_PERMISSIONS.join(", ")}`,
    )
    this.name = "InvalidPermissionError"
    this.invalid = invalid
  }
}

export function isPermission(value: string): value is Permission {
  return (ALL_PERMISSIONS as readonly string[]).includes(value)
}

/** Deterministic (lexicographic) ordering used in error messages and metadata. */
export function sortPermissions(permissions: Iterable<Permission>): Permission[] {
  return [...new Set(permissions)].sort()
}

/**
 * Parse raw permission strings into a granted set.
 *
 * Values are trimmed; blanks are ignored. Every unknown value is reported in
 * a single InvalidPermissionError so the operator can fix them all at once.
 */
export function parsePermissions(values: Iterable<string>): ReadonlySet<Permission> {
  const granted = new Set<Permission>()
  const invalid: string[] = []

  for (const raw of values) {
    const value = raw.trim()
    if (!value) continue
    if (isPermission(value)) {
      granted.add(value)
    } else if (!invalid.includes(value)) {
      invalid.push(value)
    }
  }

  if (invalid.length > 0) {
    throw new InvalidPermissionError(invalid)
  }

  return granted
}

/** Split a comma-separated list (e.g. `ORE_ALLOW=filesystem-read,network`) and parse it. */
export function parsePermissionList(value: string | undefined): ReadonlySet<Permission> {
  if (!value) return new Set()
  return parsePermissions(value.split(","))
}
