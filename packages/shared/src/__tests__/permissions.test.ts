import { describe, expect, it } from "vitest"

import {
  ALL_PERMISSIONS,
  InvalidPermissionError,
  isPermission,
  parsePermissionList,
  parsePermissions,
  sortPermissions,
} from "../permissions/index.js"

describe("ALL_PERMISSIONS", () => {
  it("is the closed, sorted set of capabilities", () => {
    expect(ALL_PERMISSIONS).toEqual(["filesystem-read", "filesystem-write", "network", "shell"])
  })
})

describe("isPermission", () => {
  it("accepts exact names only", () => {
    expect(isPermission("shell")).toBe(true)
    expect(isPermission("Shell")).toBe(false)
    expect(isPermission("filesystem")).toBe(false)
  })
})

describe("sortPermissions", () => {
  it("sorts and removes duplicates", () => {
    expect(sortPermissions(["shell", "filesystem-read", "shell"])).toEqual([
      "filesystem-read",
      "shell",
    ])
  })
})

describe("parsePermissions", () => {
  it("trims values and ignores blanks", () => {
    const granted = parsePermissions([" network ", "", "  ", "filesystem-read"])
    expect(sortPermissions(granted)).toEqual(["filesystem-read", "network"])
  })

  it("rejects a single unknown value", () => {
    expect(() => parsePermissions(["network", "root"])).toThrow(
      "Unknown permission: root. Valid permissions: filesystem-read, filesystem-write, network, shell",
    )
  })

  it("reports every unknown value once", () => {
    try {
      parsePermissions(["sudo", "network", "root", "sudo"])
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidPermissionError)
      if (err instanceof InvalidPermissionError) {
        expect(err.invalid).toEqual(["sudo", "root"])
        expect(err.message).toBe(
          "Unknown permissions: sudo, root. Valid permissions: filesystem-read, filesystem-write, network, shell",
        )
      }
    }
  })
})

describe("parsePermissionList", () => {
  it("splits a comma-separated list", () => {
    expect(sortPermissions(parsePermissionList("shell,filesystem-write"))).toEqual([
      "filesystem-write",
      "shell",
    ])
  })

  it("treats undefined and empty as no grants", () => {
    expect(parsePermissionList(undefined).size).toBe(0)
    expect(parsePermissionList("").size).toBe(0)
  })
})
