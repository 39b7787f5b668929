/** `executionTimeMs` → `execution_time_ms` */
export function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`)
}

/** `execution_time_ms` → `executionTimeMs` */
export function toCamelCase(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase())
}

/** Rename top-level keys only; values are copied as they are. */
export function mapKeys(
  record: Readonly<Record<string, unknown>>,
  rename: (key: string) => string,
): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(record)) {
    out[rename(key)] = value
  }
  return out
}
