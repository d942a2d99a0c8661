import { probeVideo } from '../../L2-clients/ffmpeg/probe.js'
import logger from '../../L1-infra/logger/configLogger.js'
import type { VideoInfo } from '../../L0-pure/types/index.js'

/** Probe the source and log what the run will work with. */
export async function probeSource(sourcePath: string): Promise<VideoInfo> {
  const video = await probeVideo(sourcePath)
  logger.info(
    `Source: ${video.width}x${video.height} @ ${video.fpsText} fps, ` +
    `${video.duration.toFixed(2)}s${video.hasAudio ? '' : ', no audio'}`,
  )
  return video
}
