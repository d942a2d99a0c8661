import { extractAllFrames, encodeFrameSequence } from '../../L2-clients/ffmpeg/frameCapture.js'
import { runInterpolation } from '../../L2-clients/rife/rife.js'
import { listDirectoryOrEmpty } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { countFrames, isInterpolationComplete } from '../../L0-pure/verification/frameCount.js'
import { InterpolationVerificationError } from '../../L0-pure/errors/errors.js'
import type { ChunkPaths, VideoInfo } from '../../L0-pure/types/index.js'

export interface FrameCounts {
  input: number
  output: number
}

/**
 * Check that interpolation roughly doubled the frame count
 * (`output ≥ 2·input − 2`). Throws {@link InterpolationVerificationError}.
 */
export async function verifyInterpolatedFrames(framesIn: string, framesOut: string): Promise<FrameCounts> {
  const input = countFrames(await listDirectoryOrEmpty(framesIn))
  const output = countFrames(await listDirectoryOrEmpty(framesOut))
  if (!isInterpolationComplete(input, output)) {
    throw new InterpolationVerificationError(input, output)
  }
  logger.info(`  > RIFE check passed (Input: ${input}, Output: ${output}).`)
  return { input, output }
}

/**
 * Explode the enhanced video into frames, double them with RIFE, verify the
 * count, and encode the result at twice the source frame rate into the
 * chunk's final video.
 */
export async function interpolateChunk(paths: ChunkPaths, video: Pick<VideoInfo, 'fps'>): Promise<FrameCounts> {
  logger.info('  > Extracting frames for RIFE...')
  await extractAllFrames(paths.enhanced, paths.framesIn)

  logger.info('  > Running RIFE (directory mode)...')
  await runInterpolation({ inputDir: paths.framesIn, outputDir: paths.framesOut })

  logger.info('  > Verifying RIFE frame count...')
  const counts = await verifyInterpolatedFrames(paths.framesIn, paths.framesOut)

  logger.info('  > Encoding RIFE frames to video...')
  await encodeFrameSequence(paths.framesOut, paths.final, video.fps * 2)
  logger.info(`  > RIFE complete: ${paths.final}`)
  return counts
}
