import { describe, it, expect, vi, beforeEach } from 'vitest'

const { mockExecFile } = vi.hoisted(() => ({
  mockExecFile: vi.fn(),
}))

vi.mock('child_process', async (importOriginal) => {
  const orig = await importOriginal<typeof import('child_process')>()
  return { ...orig, execFile: mockExecFile }
})

import { execCommand, isProcessAlive, terminateRunningTools } from '../../../L1-infra/process/process.js'
import { ToolError, ToolInterruptedError, ToolTimeoutError } from '../../../L0-pure/errors/errors.js'

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void

function respondWith(error: Error | null, stdout: string, stderr: string): void {
  mockExecFile.mockImplementation((_cmd: string, _args: string[], _opts: unknown, cb: ExecCallback) => {
    cb(error, stdout, stderr)
  })
}

describe('execCommand', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('resolves with both streams on success', async () => {
    respondWith(null, 'out', 'err')
    await expect(execCommand('ffmpeg', ['-version'])).resolves.toEqual({ stdout: 'out', stderr: 'err' })
    expect(mockExecFile).toHaveBeenCalledWith(
      'ffmpeg',
      ['-version'],
      expect.objectContaining({ timeout: 0, maxBuffer: 64 * 1024 * 1024, encoding: 'utf8' }),
      expect.any(Function),
    )
  })

  it('rejects with ToolError carrying the exit code and captured output', async () => {
    respondWith(Object.assign(new Error('Command failed'), { code: 1 }), 'partial', 'CUDA out of memory')
    const err = await execCommand('python3', ['script.py']).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(ToolError)
    expect(err).not.toBeInstanceOf(ToolTimeoutError)
    expect(err).toMatchObject({
      exitCode: 1,
      stdout: 'partial',
      stderr: 'CUDA out of memory',
      message: 'Command "python3 script.py" failed with exit code 1',
    })
  })

  it('reports a spawn failure', async () => {
    respondWith(Object.assign(new Error('spawn rife ENOENT'), { code: 'ENOENT' }), '', '')
    const err = await execCommand('rife', []).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(ToolError)
    expect(err).toMatchObject({ exitCode: null, message: 'Could not start "rife": spawn rife ENOENT' })
  })

  it('reports output beyond the buffer limit instead of a start failure', async () => {
    respondWith(
      Object.assign(new Error('stdout maxBuffer length exceeded'), { code: 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER' }),
      'frame 1',
      '',
    )
    const err = await execCommand('rife', ['-i', 'in'], { maxBuffer: 1024 }).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(ToolError)
    expect(err).toMatchObject({
      exitCode: null,
      stdout: 'frame 1',
      message: '"rife" printed more than 1024 bytes and was stopped: stdout maxBuffer length exceeded',
    })
  })

  it('rejects with ToolTimeoutError when killed after the timeout', async () => {
    respondWith(Object.assign(new Error('killed'), { killed: true, signal: 'SIGTERM' }), 'so far', '')
    const err = await execCommand('rife', ['-i', 'in'], { timeoutMs: 5000 }).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(ToolTimeoutError)
    expect(err).toMatchObject({ timeoutMs: 5000, stdout: 'so far', message: 'Command "rife" timed out after 5000ms' })
  })
})

describe('terminateRunningTools', () => {
  const abortError = (): Error =>
    Object.assign(new Error('The operation was aborted'), { name: 'AbortError', code: 'ABORT_ERR' })

  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('resolves to 0 when nothing is running', async () => {
    await expect(terminateRunningTools()).resolves.toBe(0)
  })

  it('aborts the running tool and waits for it to exit', async () => {
    let exited = false
    const kill = vi.fn()
    mockExecFile.mockImplementation((_cmd: string, _args: string[], opts: { signal: AbortSignal }, cb: ExecCallback) => {
      opts.signal.addEventListener('abort', () => {
        setTimeout(() => {
          exited = true
          cb(abortError(), 'frame 12', '')
        }, 5)
      })
      return { kill }
    })

    const pending = execCommand('rife', ['-i', 'in']).catch((e: unknown) => e)
    await expect(terminateRunningTools()).resolves.toBe(1)

    expect(exited).toBe(true)
    expect(kill).not.toHaveBeenCalled()
    const err = await pending
    expect(err).toBeInstanceOf(ToolInterruptedError)
    expect(err).toMatchObject({ command: 'rife', stdout: 'frame 12', message: 'Command "rife" was stopped by an interrupt' })
    await expect(terminateRunningTools()).resolves.toBe(0)
  })

  it('sends SIGKILL to a tool that ignores the abort', async () => {
    let callback: ExecCallback | undefined
    const kill = vi.fn((signal: string) => {
      if (signal === 'SIGKILL') callback?.(abortError(), '', '')
    })
    mockExecFile.mockImplementation((_cmd: string, _args: string[], _opts: unknown, cb: ExecCallback) => {
      callback = cb
      return { kill }
    })

    const pending = execCommand('ffmpeg', ['-i', 'in.mp4']).catch((e: unknown) => e)
    await expect(terminateRunningTools(10)).resolves.toBe(1)

    expect(kill).toHaveBeenCalledWith('SIGKILL')
    expect(await pending).toBeInstanceOf(ToolInterruptedError)
  })
})

describe('isProcessAlive', () => {
  beforeEach(() => {
    vi.restoreAllMocks()
  })

  it('is true for the current process', () => {
    expect(isProcessAlive(process.pid)).toBe(true)
  })

  it('is false when the pid does not exist', () => {
    vi.spyOn(process, 'kill').mockImplementation(() => {
      throw Object.assign(new Error('kill ESRCH'), { code: 'ESRCH' })
    })
    expect(isProcessAlive(999_999)).toBe(false)
  })

  it('is true when the process belongs to someone else', () => {
    vi.spyOn(process, 'kill').mockImplementation(() => {
      throw Object.assign(new Error('kill EPERM'), { code: 'EPERM' })
    })
    expect(isProcessAlive(1)).toBe(true)
  })
})
