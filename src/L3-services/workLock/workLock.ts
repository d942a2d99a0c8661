import {
  writeFileRaw,
  readJsonFile,
  removeFile,
  removeFileSync,
  ensureDirectory,
  isAlreadyExists,
} from '../../L1-infra/fileSystem/fileSystem.js'
import { dirname } from '../../L1-infra/paths/paths.js'
import { isProcessAlive } from '../../L1-infra/process/process.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { lockPath } from '../../L0-pure/chunks/layout.js'
import { WorkDirLockedError } from '../../L0-pure/errors/errors.js'

interface LockRecord {
  pid: number
  startedAt: string
}

export interface WorkLock {
  path: string
  release(): Promise<void>
  /** Synchronous release for `process.on('exit')`. */
  releaseSync(): void
}

async function readOwnerPid(path: string): Promise<number | undefined> {
  try {
    const record = await readJsonFile<unknown>(path)
    if (typeof record === 'object' && record !== null && 'pid' in record && typeof record.pid === 'number') {
      return record.pid
    }
    return undefined
  } catch {
    return undefined
  }
}

async function tryCreate(path: string): Promise<boolean> {
  const record: LockRecord = { pid: process.pid, startedAt: new Date().toISOString() }
  try {
    await writeFileRaw(path, JSON.stringify(record), { encoding: 'utf-8', flag: 'wx', mode: 0o600 })
    return true
  } catch (err: unknown) {
    if (isAlreadyExists(err)) return false
    throw err
  }
}

/**
 * Take the single-writer lock for `workDir` (`<workDir>.lock`, created
 * exclusively). A lock left by a process that no longer exists is replaced;
 * a live owner yields {@link WorkDirLockedError}.
 */
export async function acquireWorkLock(workDir: string): Promise<WorkLock> {
  const path = lockPath(workDir)
  await ensureDirectory(dirname(path))

  if (!(await tryCreate(path))) {
    const owner = await readOwnerPid(path)
    if (owner !== undefined && owner !== process.pid && isProcessAlive(owner)) {
      throw new WorkDirLockedError(path, owner)
    }
    logger.warn(`[WorkLock] Replacing stale lock ${path}${owner !== undefined ? ` (pid ${owner})` : ''}`)
    await removeFile(path)
    if (!(await tryCreate(path))) {
      throw new WorkDirLockedError(path, (await readOwnerPid(path)) ?? -1)
    }
  }

  let held = true
  return {
    path,
    async release(): Promise<void> {
      if (!held) return
      held = false
      await removeFile(path)
    },
    releaseSync(): void {
      if (!held) return
      held = false
      try {
        removeFileSync(path)
      } catch (err: unknown) {
        logger.debug(`[WorkLock] Could not remove ${path} on exit: ${String(err)}`)
      }
    },
  }
}
