import { runFFmpegAtomic } from './ffmpeg.js'
import { ensureDirectory } from '../../L1-infra/fileSystem/fileSystem.js'
import { dirname } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'

/**
 * Copy the source's audio track, without re-encoding, to `outputPath`.
 * The container should accept any codec (Matroska audio does).
 */
export async function extractAudioTrack(videoPath: string, outputPath: string): Promise<string> {
  await ensureDirectory(dirname(outputPath))
  logger.info(`Extracting original audio: ${videoPath} → ${outputPath}`)
  await runFFmpegAtomic('FFmpeg audio extraction', outputPath, (staging) => [
    '-i', videoPath,
    '-vn', '-acodec', 'copy',
    staging,
  ])
  logger.info(`Audio extraction complete: ${outputPath}`)
  return outputPath
}
