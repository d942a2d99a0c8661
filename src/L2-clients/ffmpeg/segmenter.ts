import { runFFmpeg } from './ffmpeg.js'
import { ensureDirectory } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { segmentPattern } from '../../L0-pure/chunks/layout.js'

/**
 * Cut the video stream of `videoPath` into `chunkSeconds`-long segments in
 * `outputDir`, stream-copied (no re-encode, no audio). Segments are named
 * `chunk_000<ext>`, `chunk_001<ext>`, … and each restarts its timestamps at 0.
 */
export async function splitVideo(
  videoPath: string,
  outputDir: string,
  chunkSeconds: number,
  ext: string,
): Promise<void> {
  await ensureDirectory(outputDir)
  logger.info(`Splitting ${videoPath} into ${chunkSeconds}s segments (video only, ${ext})`)
  await runFFmpeg('FFmpeg split', [
    '-y',
    '-i', videoPath,
    '-an', '-c:v', 'copy', '-map', '0:v:0',
    '-segment_time', String(chunkSeconds),
    '-f', 'segment', '-reset_timestamps', '1',
    segmentPattern(outputDir, ext),
  ])
}
