import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest"

import { writeChunk, writeStderr, writeStdout } from "../terminal.js"

describe("terminal output", () => {
  let stdoutSpy: MockInstance<typeof process.stdout.write>
  let stderrSpy: MockInstance<typeof process.stderr.write>

  beforeEach(() => {
    stdoutSpy = vi.spyOn(process.stdout, "write").mockImplementation(() => true)
    stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true)
  })

  afterEach(() => {
    stdoutSpy.mockRestore()
    stderrSpy.mockRestore()
  })

  it("writes lines to stdout and stderr", () => {
    writeStdout("reply")
    writeStderr("warning")
    expect(stdoutSpy.mock.calls.map((call) => call[0])).toEqual(["reply\n"])
    expect(stderrSpy.mock.calls.map((call) => call[0])).toEqual(["warning\n"])
  })

  it("writes chunks to stdout without a newline", () => {
    writeChunk("Hel")
    writeChunk("lo")
    expect(stdoutSpy.mock.calls.map((call) => call[0])).toEqual(["Hel", "lo"])
    expect(stderrSpy).not.toHaveBeenCalled()
  })
})
