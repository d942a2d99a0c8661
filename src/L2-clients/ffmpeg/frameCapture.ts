import { runFFmpeg, runFFmpegAtomic } from './ffmpeg.js'
import { resetDirectory, ensureDirectory } from '../../L1-infra/fileSystem/fileSystem.js'
import { dirname, join } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'

/** Pattern of frames written by {@link extractAllFrames}. */
export const EXTRACTED_FRAME_PATTERN = 'frame_%08d.png'
/** Pattern of frames written by the interpolation tool. */
export const INTERPOLATED_FRAME_PATTERN = '%08d.png'

/** libx264 quality for the final chunk encode, which is stream-copied into the output. */
const FINAL_CRF = '17'

/**
 * Decode every frame of `videoPath` into numbered PNGs in `framesDir`.
 * The directory is emptied first so frames from an interrupted run never mix in.
 */
export async function extractAllFrames(videoPath: string, framesDir: string): Promise<void> {
  await resetDirectory(framesDir)
  logger.info(`Extracting frames: ${videoPath} → ${framesDir}`)
  await runFFmpeg('FFmpeg frame extraction', [
    '-y',
    '-i', videoPath,
    join(framesDir, EXTRACTED_FRAME_PATTERN),
  ])
}

/** Encode a numbered PNG sequence into an H.264 video at `fps`. */
export async function encodeFrameSequence(framesDir: string, outputPath: string, fps: number): Promise<void> {
  await ensureDirectory(dirname(outputPath))
  logger.info(`Encoding frames at ${fps.toFixed(3)} FPS: ${framesDir} → ${outputPath}`)
  await runFFmpegAtomic('FFmpeg frame encoding', outputPath, (staging) => [
    '-framerate', fps.toFixed(3),
    '-i', join(framesDir, INTERPOLATED_FRAME_PATTERN),
    '-c:v', 'libx264',
    '-pix_fmt', 'yuv420p',
    '-crf', FINAL_CRF,
    '-preset', 'slower',
    staging,
  ])
}
