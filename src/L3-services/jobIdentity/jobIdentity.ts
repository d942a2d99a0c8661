import {
  readJsonFile,
  writeJsonFile,
  fileExists,
  removeDirectory,
  ensureDirectory,
} from '../../L1-infra/fileSystem/fileSystem.js'
import { join } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { IDENTITY_FILE } from '../../L0-pure/chunks/layout.js'
import { JobConflictError, errorMessage } from '../../L0-pure/errors/errors.js'
import { isScaleFactor } from '../../L0-pure/types/index.js'
import type {
  ConflictPolicy,
  ConfirmDiscard,
  IdentityConflict,
  IdentityOutcome,
  JobIdentity,
} from '../../L0-pure/types/index.js'

export interface IdentityGuardOptions {
  policy: ConflictPolicy
  /** Consulted under the `prompt` policy; without it a prompt behaves like `abort`. */
  confirmDiscard?: ConfirmDiscard
}

export function identityRecordPath(workDir: string): string {
  return join(workDir, IDENTITY_FILE)
}

export function isJobIdentity(value: unknown): value is JobIdentity {
  return typeof value === 'object' && value !== null &&
    'sourcePath' in value && typeof value.sourcePath === 'string' &&
    'scaleFactor' in value && typeof value.scaleFactor === 'number' && isScaleFactor(value.scaleFactor)
}

export function sameIdentity(a: JobIdentity, b: JobIdentity): boolean {
  return a.sourcePath === b.sourcePath && a.scaleFactor === b.scaleFactor
}

export type StoredIdentity =
  | { kind: 'absent' }
  | { kind: 'valid'; identity: JobIdentity }
  | { kind: 'corrupt'; raw?: unknown; error: string }

export async function readStoredIdentity(workDir: string): Promise<StoredIdentity> {
  const recordPath = identityRecordPath(workDir)
  if (!(await fileExists(recordPath))) return { kind: 'absent' }
  let raw: unknown
  try {
    raw = await readJsonFile<unknown>(recordPath)
  } catch (err: unknown) {
    return { kind: 'corrupt', error: errorMessage(err) }
  }
  if (!isJobIdentity(raw)) return { kind: 'corrupt', raw, error: 'record does not describe a job' }
  return { kind: 'valid', identity: { sourcePath: raw.sourcePath, scaleFactor: raw.scaleFactor } }
}

async function writeIdentity(workDir: string, identity: JobIdentity): Promise<void> {
  await writeJsonFile(identityRecordPath(workDir), identity)
}

async function resolveConflict(conflict: IdentityConflict, options: IdentityGuardOptions): Promise<boolean> {
  switch (options.policy) {
    case 'discard':
      return true
    case 'abort':
      return false
    case 'prompt':
      return options.confirmDiscard ? options.confirmDiscard(conflict) : false
  }
}

/**
 * Make sure `workDir` belongs to `current` before any chunk in it is touched.
 *
 * - no record: the identity is written and the run proceeds (`created`)
 * - equal record: nothing changes (`matched`)
 * - different or unreadable record: a conflict, settled by the policy. On
 *   discard the whole working directory is deleted and the identity rewritten
 *   (`discarded`); otherwise {@link JobConflictError} is thrown and the
 *   directory is left exactly as found.
 */
export async function ensureJobIdentity(
  workDir: string,
  current: JobIdentity,
  options: IdentityGuardOptions,
): Promise<IdentityOutcome> {
  const stored = await readStoredIdentity(workDir)

  if (stored.kind === 'absent') {
    await ensureDirectory(workDir)
    await writeIdentity(workDir, current)
    logger.info(`[JobIdentity] New working directory for ${current.sourcePath} (x${current.scaleFactor})`)
    return 'created'
  }

  if (stored.kind === 'valid' && sameIdentity(stored.identity, current)) {
    logger.info('[JobIdentity] Working directory matches this job; resuming')
    return 'matched'
  }

  const conflict: IdentityConflict = stored.kind === 'valid'
    ? { reason: 'mismatch', current, previous: stored.identity, recordPath: identityRecordPath(workDir) }
    : { reason: 'corrupt', current, previous: stored.raw, recordPath: identityRecordPath(workDir) }

  if (stored.kind === 'corrupt') {
    logger.warn(`[JobIdentity] Could not read ${conflict.recordPath}: ${stored.error}`)
  } else {
    logger.warn(
      `[JobIdentity] Working directory contains data from a different job:\n` +
      `  Old: ${JSON.stringify(stored.identity)}\n  New: ${JSON.stringify(current)}`,
    )
  }

  if (!(await resolveConflict(conflict, options))) {
    throw new JobConflictError(conflict)
  }

  logger.info(`[JobIdentity] Discarding previous state in ${workDir}`)
  await removeDirectory(workDir, { recursive: true, force: true })
  await ensureDirectory(workDir)
  await writeIdentity(workDir, current)
  return 'discarded'
}
