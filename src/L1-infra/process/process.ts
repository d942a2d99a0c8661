import { execFile as nodeExecFile, spawnSync as nodeSpawnSync } from 'child_process'
import type { ChildProcess, ExecFileException, ExecFileOptions, SpawnSyncReturns, SpawnSyncOptions } from 'child_process'
import { createRequire } from 'module'
import { ToolError, ToolInterruptedError, ToolTimeoutError } from '../../L0-pure/errors/errors.js'

export type { ExecFileOptions }

export interface ExecResult {
  stdout: string
  stderr: string
}

export interface ExecOptions {
  cwd?: string
  /** Kill the process after this many milliseconds. 0 or undefined waits forever. */
  timeoutMs?: number
  maxBuffer?: number
}

/** Enhancement tools print a progress bar per frame; leave room for long chunks. */
const DEFAULT_MAX_BUFFER = 64 * 1024 * 1024

/** How long a stopped tool gets to exit after SIGTERM before it is sent SIGKILL. */
const KILL_GRACE_MS = 10_000

const MAX_BUFFER_CODE = 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER'

interface RunningTool {
  controller: AbortController
  child?: ChildProcess
  /** Resolves once the child has exited and its callback ran. */
  settled: Promise<void>
}

const runningTools = new Set<RunningTool>()

function describeFailure(cmd: string, error: ExecFileException, maxBuffer: number): string | undefined {
  if (error.code === MAX_BUFFER_CODE) {
    return `"${cmd}" printed more than ${maxBuffer} bytes and was stopped: ${error.message}`
  }
  if (typeof error.code === 'string') return `Could not start "${cmd}": ${error.message}`
  return undefined
}

/**
 * Execute a command asynchronously via execFile, capturing both streams.
 * Rejects with {@link ToolError} on a non-zero exit or spawn failure, with
 * {@link ToolTimeoutError} when `timeoutMs` elapses first, and with
 * {@link ToolInterruptedError} when {@link terminateRunningTools} stops it.
 */
export function execCommand(cmd: string, args: string[], opts: ExecOptions = {}): Promise<ExecResult> {
  const timeout = opts.timeoutMs && opts.timeoutMs > 0 ? opts.timeoutMs : 0
  const maxBuffer = opts.maxBuffer ?? DEFAULT_MAX_BUFFER
  const controller = new AbortController()
  let markSettled: () => void = () => {}
  const running: RunningTool = {
    controller,
    settled: new Promise<void>((resolve) => { markSettled = resolve }),
  }
  runningTools.add(running)

  return new Promise((resolve, reject) => {
    running.child = nodeExecFile(
      cmd,
      args,
      { cwd: opts.cwd, timeout, maxBuffer, encoding: 'utf8', signal: controller.signal },
      (error, stdout, stderr) => {
        runningTools.delete(running)
        markSettled()
        const out = String(stdout ?? '')
        const err = String(stderr ?? '')
        if (!error) {
          resolve({ stdout: out, stderr: err })
          return
        }
        if (controller.signal.aborted) {
          reject(new ToolInterruptedError(cmd, args, out, err))
          return
        }
        if (timeout > 0 && error.killed && error.signal) {
          reject(new ToolTimeoutError(cmd, args, timeout, out, err))
          return
        }
        const exitCode = typeof error.code === 'number' ? error.code : null
        reject(new ToolError(cmd, args, exitCode, out, err, describeFailure(cmd, error, maxBuffer)))
      },
    )
  })
}

/**
 * Stop every tool started by {@link execCommand} that is still running and
 * wait until each has exited. Tools get SIGTERM first and SIGKILL once
 * `graceMs` has passed. Resolves to the number of tools stopped.
 */
export async function terminateRunningTools(graceMs: number = KILL_GRACE_MS): Promise<number> {
  const running = [...runningTools]
  if (running.length === 0) return 0
  for (const tool of running) tool.controller.abort()

  const allExited = Promise.all(running.map((tool) => tool.settled))
  let timer: NodeJS.Timeout | undefined
  const graceOver = new Promise<'grace-over'>((resolve) => {
    timer = setTimeout(() => resolve('grace-over'), graceMs)
  })
  const first = await Promise.race([allExited.then(() => 'exited' as const), graceOver])
  clearTimeout(timer)

  if (first === 'grace-over') {
    for (const tool of running) {
      if (runningTools.has(tool)) tool.child?.kill('SIGKILL')
    }
    await allExited
  }
  return running.length
}

/**
 * Spawn a command synchronously. Returns full result including status.
 */
export function spawnCommand(
  cmd: string,
  args: string[],
  opts?: SpawnSyncOptions,
): SpawnSyncReturns<string> {
  return nodeSpawnSync(cmd, args, { ...opts, encoding: 'utf-8' })
}

/** True when a process with this pid exists (signal 0 probes without killing). */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (err: unknown) {
    // EPERM: the process exists but belongs to someone else
    return err instanceof Error && 'code' in err && err.code === 'EPERM'
  }
}

/**
 * Create a require function for ESM modules to use CommonJS require().
 * Usage: const require = createModuleRequire(import.meta.url)
 */
export function createModuleRequire(metaUrl: string): NodeRequire {
  return createRequire(metaUrl)
}
