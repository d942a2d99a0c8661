import { InvalidArgumentError } from '../L1-infra/cli/cli.js'
import { isScaleFactor, SCALE_FACTORS } from '../L0-pure/types/index.js'
import type { ChunkFailureMode, ConflictPolicy, ScaleFactor } from '../L0-pure/types/index.js'

// commander argument parsers: throw InvalidArgumentError so the message reaches the user.

export function parseScale(value: string): ScaleFactor {
  const n = Number(value)
  if (!isScaleFactor(n)) {
    throw new InvalidArgumentError(`Scale must be one of ${SCALE_FACTORS.join(', ')}.`)
  }
  return n
}

export function parsePositiveInt(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return n
}

export function parseMinutes(value: string): number {
  const n = Number(value)
  if (!Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError('Must be a number of minutes (0 disables the timeout).')
  }
  return n
}

export function parseFailureMode(value: string): ChunkFailureMode {
  if (value !== 'abort' && value !== 'skip') {
    throw new InvalidArgumentError('Must be "abort" or "skip".')
  }
  return value
}

/**
 * `--force` discards without asking. Otherwise an interactive terminal is
 * asked, and a non-interactive run refuses to discard anything.
 */
export function selectConflictPolicy(force: boolean, interactive: boolean): ConflictPolicy {
  if (force) return 'discard'
  return interactive ? 'prompt' : 'abort'
}
