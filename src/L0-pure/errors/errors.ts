import type { IdentityConflict } from '../types/index.js'

/** An external tool exited non-zero or could not be started. */
export class ToolError extends Error {
  readonly command: string
  readonly args: readonly string[]
  readonly exitCode: number | null
  readonly stdout: string
  readonly stderr: string

  constructor(
    command: string,
    args: readonly string[],
    exitCode: number | null,
    stdout: string,
    stderr: string,
    message?: string,
  ) {
    super(message ?? `Command "${command} ${args.join(' ')}" failed with exit code ${exitCode ?? 'unknown'}`)
    this.name = 'ToolError'
    this.command = command
    this.args = [...args]
    this.exitCode = exitCode
    this.stdout = stdout
    this.stderr = stderr
  }
}

/** An external tool ran past the configured timeout and was killed. */
export class ToolTimeoutError extends ToolError {
  readonly timeoutMs: number

  constructor(command: string, args: readonly string[], timeoutMs: number, stdout: string, stderr: string) {
    super(command, args, null, stdout, stderr, `Command "${command}" timed out after ${timeoutMs}ms`)
    this.name = 'ToolTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

/** The run was interrupted and the tool was stopped before it finished. */
export class ToolInterruptedError extends ToolError {
  constructor(command: string, args: readonly string[], stdout: string, stderr: string) {
    super(command, args, null, stdout, stderr, `Command "${command}" was stopped by an interrupt`)
    this.name = 'ToolInterruptedError'
  }
}

/** The working directory belongs to another job and discard was not authorised. */
export class JobConflictError extends Error {
  readonly conflict: IdentityConflict

  constructor(conflict: IdentityConflict) {
    super(
      conflict.reason === 'corrupt'
        ? `Identity record ${conflict.recordPath} is unreadable; refusing to reuse the working directory`
        : `Working directory belongs to a different job (${conflict.recordPath}); refusing to mix chunks`,
    )
    this.name = 'JobConflictError'
    this.conflict = conflict
  }
}

/** The super-resolution tool left zero or several candidate outputs. */
export class AmbiguousOutputError extends Error {
  readonly candidates: string[]

  constructor(directory: string, candidates: string[], found: string[]) {
    super(
      candidates.length === 0
        ? `No enhanced output produced in ${directory}. Found files: ${found.join(', ') || '(none)'}`
        : `Expected 1 enhanced output in ${directory}, found ${candidates.length}: ${candidates.join(', ')}`,
    )
    this.name = 'AmbiguousOutputError'
    this.candidates = candidates
  }
}

export class InterpolationVerificationError extends Error {
  readonly inputFrames: number
  readonly outputFrames: number

  constructor(inputFrames: number, outputFrames: number) {
    super(`Interpolation failed to double frames! Input: ${inputFrames} frames, Output: ${outputFrames} frames.`)
    this.name = 'InterpolationVerificationError'
    this.inputFrames = inputFrames
    this.outputFrames = outputFrames
  }
}

export class NothingToAssembleError extends Error {
  constructor(directory: string) {
    super(`No finished chunks found in ${directory}; nothing to assemble`)
    this.name = 'NothingToAssembleError'
  }
}

export class WorkDirLockedError extends Error {
  readonly lockPath: string
  readonly ownerPid: number

  constructor(lockPath: string, ownerPid: number) {
    super(`Working directory is in use by process ${ownerPid} (lock: ${lockPath})`)
    this.name = 'WorkDirLockedError'
    this.lockPath = lockPath
    this.ownerPid = ownerPid
  }
}

export class ProbeError extends Error {
  constructor(filePath: string, detail: string) {
    super(`Could not probe ${filePath}: ${detail}`)
    this.name = 'ProbeError'
  }
}

/** Extract a printable message from any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
