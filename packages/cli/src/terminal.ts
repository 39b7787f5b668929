export function writeStdout(message: string): void {
  process.stdout.write(`${message}\n`)
}

export function writeStderr(message: string): void {
  process.stderr.write(`${message}\n`)
}

/** Streamed reply text, written as it arrives without a trailing newline. */
export function writeChunk(text: string): void {
  process.stdout.write(text)
}
