export const MIN_CHUNK_SECONDS = 10
export const MAX_CHUNK_SECONDS = 120

/** Fraction of free space the intermediates may use; the rest is headroom. */
export const DISK_SAFETY_MARGIN = 0.5
/** Estimated PNG size relative to raw RGB. */
export const PNG_COMPRESSION_RATIO = 0.4
export const BYTES_PER_PIXEL = 3
/** Input and interpolated frame sets coexist on disk during interpolation. */
export const FRAMES_PER_INPUT_FRAME = 2

export interface DiskBudgetInput {
  width: number
  height: number
  scaleFactor: number
  fps: number
  freeBytes: number
}

export interface DiskBudgetEstimate {
  /** Clamped chunk duration in whole seconds. */
  chunkSeconds: number
  /** Unclamped duration the free space allows, when it could be computed. */
  rawSeconds?: number
  frameBytes?: number
  bytesPerSecond?: number
  /** Set when the estimate fell back to {@link MIN_CHUNK_SECONDS}. */
  fallbackReason?: string
}

export function clampChunkSeconds(seconds: number): number {
  return Math.floor(Math.max(MIN_CHUNK_SECONDS, Math.min(seconds, MAX_CHUNK_SECONDS)))
}

function fallback(reason: string): DiskBudgetEstimate {
  return { chunkSeconds: MIN_CHUNK_SECONDS, fallbackReason: reason }
}

/**
 * Size chunks so that one chunk's extracted and interpolated frames fit in
 * half of the free space. Never throws; degenerate input yields the minimum.
 */
export function computeChunkSeconds(input: DiskBudgetInput): DiskBudgetEstimate {
  const { width, height, scaleFactor, fps, freeBytes } = input
  if (![width, height, scaleFactor, fps, freeBytes].every(Number.isFinite)) {
    return fallback('non-numeric video or disk measurement')
  }
  if (width <= 0 || height <= 0 || scaleFactor <= 0) {
    return fallback(`invalid frame size ${width}x${height} at x${scaleFactor}`)
  }
  if (fps <= 0) return fallback(`invalid frame rate ${fps}`)

  const pixels = width * scaleFactor * (height * scaleFactor)
  const frameBytes = pixels * BYTES_PER_PIXEL * PNG_COMPRESSION_RATIO
  const bytesPerSecond = fps * FRAMES_PER_INPUT_FRAME * frameBytes
  if (!(bytesPerSecond > 0) || !Number.isFinite(bytesPerSecond)) {
    return fallback('zero temp-storage burn rate')
  }

  const usable = Math.max(0, freeBytes) * DISK_SAFETY_MARGIN
  const rawSeconds = usable / bytesPerSecond
  return {
    chunkSeconds: clampChunkSeconds(rawSeconds),
    rawSeconds,
    frameBytes,
    bytesPerSecond,
  }
}

/** Number of chunks a source of `duration` seconds splits into. */
export function countChunks(duration: number, chunkSeconds: number): number {
  if (!(duration > 0) || !(chunkSeconds > 0)) return 0
  return Math.ceil(duration / chunkSeconds)
}
