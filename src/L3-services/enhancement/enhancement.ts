import { prefilterSegment } from '../../L2-clients/ffmpeg/prefilter.js'
import { runSuperResolution } from '../../L2-clients/realesrgan/realesrgan.js'
import {
  listDirectory,
  moveFile,
  removeDirectory,
  resetDirectory,
} from '../../L1-infra/fileSystem/fileSystem.js'
import { basename, join } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { enhancedOutputCandidates } from '../../L0-pure/chunks/layout.js'
import { AmbiguousOutputError } from '../../L0-pure/errors/errors.js'
import type { ChunkPaths, ScaleFactor, VideoInfo } from '../../L0-pure/types/index.js'

export interface EnhancementRequest {
  paths: ChunkPaths
  scaleFactor: ScaleFactor
  video: Pick<VideoInfo, 'fpsText'>
  deinterlace: boolean
}

/**
 * Find the single super-resolution output in `scratchDir`. Zero or several
 * candidates is an error; the choice is never guessed.
 */
export async function locateEnhancedOutput(scratchDir: string, prefilteredPath: string): Promise<string> {
  const entries = await listDirectory(scratchDir)
  const candidates = enhancedOutputCandidates(entries, basename(prefilteredPath))
  if (candidates.length !== 1) {
    throw new AmbiguousOutputError(scratchDir, candidates, entries)
  }
  return join(scratchDir, candidates[0])
}

/**
 * Pre-filter the input segment, upscale it, and move the result to the
 * chunk's enhanced-video path. The scratch directory is wiped before and
 * removed after, so a rerun never sees leftovers from an interrupted attempt.
 */
export async function enhanceChunk(req: EnhancementRequest): Promise<string> {
  const { paths } = req
  await resetDirectory(paths.scratchDir)

  logger.info('  > Pre-filtering (denoise, deblock, sharpen)...')
  await prefilterSegment(paths.inputSegment, paths.prefiltered, { deinterlace: req.deinterlace })

  logger.info('  > Running Real-ESRGAN...')
  await runSuperResolution({
    inputPath: paths.prefiltered,
    outputDir: paths.scratchDir,
    scaleFactor: req.scaleFactor,
    fpsText: req.video.fpsText,
  })

  const output = await locateEnhancedOutput(paths.scratchDir, paths.prefiltered)
  await moveFile(output, paths.enhanced)
  await removeDirectory(paths.scratchDir, { recursive: true, force: true })
  logger.info(`  > Real-ESRGAN complete: ${paths.enhanced}`)
  return paths.enhanced
}
