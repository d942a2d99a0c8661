/**
 * Type definitions for the reelforge chunked upscaling pipeline.
 *
 * ### Time convention
 * Durations and offsets are in **seconds** (floating-point). Chunk indices are
 * zero-based; chunk `i` starts at `i × chunkSeconds` in the source video.
 */

// ============================================================================
// JOB
// ============================================================================

/** Supported super-resolution scale factors. */
export const SCALE_FACTORS = [2, 4] as const

export type ScaleFactor = (typeof SCALE_FACTORS)[number]

export function isScaleFactor(value: number): value is ScaleFactor {
  return SCALE_FACTORS.some((factor) => factor === value)
}

/**
 * Fingerprint persisted in the working directory. A working directory may only
 * be resumed by a job with the same source path and scale factor.
 */
export interface JobIdentity {
  sourcePath: string
  scaleFactor: ScaleFactor
}

/** The top-level unit of work, built once from CLI input. */
export interface Job extends JobIdentity {
  /** Root of all resumable chunk state. */
  workDir: string
  /** Directory receiving the final assembled video. */
  outputDir: string
}

// ============================================================================
// PROBING
// ============================================================================

/** Source video properties needed by the orchestrator. */
export interface VideoInfo {
  /** Container duration in seconds. */
  duration: number
  /** Frame rate as a number, e.g. 29.97. */
  fps: number
  /** Frame rate formatted to three decimals, as handed to external tools. */
  fpsText: string
  width: number
  height: number
  pixelFormat?: string
  codecName?: string
  hasAudio: boolean
}

// ============================================================================
// IDENTITY CONFLICTS
// ============================================================================

/** What to do when the working directory belongs to a different job. */
export type ConflictPolicy = 'discard' | 'prompt' | 'abort'

export type ConflictReason = 'mismatch' | 'corrupt'

export interface IdentityConflict {
  reason: ConflictReason
  current: JobIdentity
  /** The stored identity; absent when the record could not be read. */
  previous?: unknown
  recordPath: string
}

/** Asked under the `prompt` policy. Resolves `true` to discard prior state. */
export type ConfirmDiscard = (conflict: IdentityConflict) => Promise<boolean>

export type IdentityOutcome = 'created' | 'matched' | 'discarded'

// ============================================================================
// CHUNKS
// ============================================================================

/** Every on-disk artifact of one chunk. All paths derive from the index alone. */
export interface ChunkPaths {
  index: number
  name: string
  inputSegment: string
  scratchDir: string
  prefiltered: string
  enhanced: string
  framesIn: string
  framesOut: string
  final: string
}

/** Stages whose output is recorded in the chunk ledger. */
export type ChunkStage = 'enhance' | 'final'

export type ChunkFailureMode = 'abort' | 'skip'

export type ChunkOutcome = 'processed' | 'cached' | 'missing-input' | 'failed'

export interface ChunkResult {
  index: number
  outcome: ChunkOutcome
  /** Wall-clock milliseconds spent on this chunk. */
  duration: number
  error?: string
}

/** The chunk layout committed to disk when the source was split. */
export interface SplitPlan {
  chunkSeconds: number
  totalChunks: number
}

// ============================================================================
// PIPELINE
// ============================================================================

export interface PipelineOptions {
  conflictPolicy: ConflictPolicy
  confirmDiscard?: ConfirmDiscard
  /** Fixed chunk duration; skips the disk budget estimate. */
  chunkSeconds?: number
  /** Only process the first N chunks. */
  maxChunks?: number
  onChunkFailure: ChunkFailureMode
  deinterlace: boolean
}

export interface AssemblyResult {
  outputPath: string
  listPath: string
  /** Final chunk videos in concatenation order. */
  chunkPaths: string[]
  totalChunks: number
  /** Index of the first chunk that had no final output, when short of `totalChunks`. */
  missingFrom?: number
  /** The existing output already matched these chunks; nothing was re-muxed. */
  reused: boolean
}

export interface PipelineResult {
  job: Job
  plan: SplitPlan
  chunks: ChunkResult[]
  assembly: AssemblyResult
  totalDuration: number
}
