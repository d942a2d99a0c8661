import logger from '../L1-infra/logger/configLogger.js'
import { isNonEmptyFile } from '../L1-infra/fileSystem/fileSystem.js'
import { enhanceChunk } from '../L3-services/enhancement/enhancement.js'
import { interpolateChunk } from '../L3-services/interpolation/interpolation.js'
import { cleanupChunkIntermediates } from '../L3-services/chunkCleaner/chunkCleaner.js'
import { isStageComplete, recordStage } from '../L3-services/chunkLedger/chunkLedger.js'
import type { ChunkOutcome, ChunkPaths, Job, VideoInfo } from '../L0-pure/types/index.js'

export interface ChunkContext {
  job: Job
  video: VideoInfo
  paths: ChunkPaths
  deinterlace: boolean
}

/**
 * Bring one chunk to a finished final video, skipping every stage whose
 * output is already on disk.
 *
 * ### Stage flow
 * 1. Final output present → remove stray intermediates, `cached`.
 * 2. Input segment absent → warn, `missing-input` (the chunk is left alone).
 * 3. Enhanced video absent → pre-filter + super-resolution.
 * 4. Pre-filter output in hand → frame extraction, interpolation,
 *    frame-count check, encode at twice the frame rate.
 * 5. Intermediates removed, `processed`.
 *
 * Any tool or verification failure propagates; the caller decides whether it
 * ends the job.
 */
export async function processChunk(ctx: ChunkContext): Promise<ChunkOutcome> {
  const { job, video, paths } = ctx

  if (await isStageComplete(job.workDir, paths.index, 'final', paths.final)) {
    logger.info(`Skipping ${paths.name} (final output exists).`)
    await cleanupChunkIntermediates(paths)
    return 'cached'
  }

  if (!(await isNonEmptyFile(paths.inputSegment))) {
    logger.warn(`Input chunk ${paths.inputSegment} not found. Skipping.`)
    return 'missing-input'
  }

  if (await isStageComplete(job.workDir, paths.index, 'enhance', paths.enhanced)) {
    logger.info(`  > Enhanced video already exists: ${paths.enhanced}`)
  } else {
    await enhanceChunk({ paths, scaleFactor: job.scaleFactor, video, deinterlace: ctx.deinterlace })
    await recordStage(job.workDir, paths.index, 'enhance', paths.enhanced)
  }

  await interpolateChunk(paths, video)
  await recordStage(job.workDir, paths.index, 'final', paths.final)

  await cleanupChunkIntermediates(paths)
  return 'processed'
}
