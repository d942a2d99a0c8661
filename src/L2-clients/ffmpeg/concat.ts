import { runFFmpegAtomic } from './ffmpeg.js'
import { ensureDirectory } from '../../L1-infra/fileSystem/fileSystem.js'
import { dirname } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'

/**
 * Stream-copy the videos named in a concat list into `outputPath` and mux the
 * original audio back in, cut to the shorter of the two streams.
 * Without `audioPath` the video is written on its own.
 */
export async function concatWithAudio(
  listPath: string,
  audioPath: string | undefined,
  outputPath: string,
): Promise<void> {
  await ensureDirectory(dirname(outputPath))
  logger.info(`Concatenating ${listPath}${audioPath ? ` with audio ${audioPath}` : ' (no audio)'} → ${outputPath}`)
  await runFFmpegAtomic('FFmpeg final concatenation', outputPath, (staging) => {
    const args = ['-f', 'concat', '-safe', '0', '-i', listPath]
    if (audioPath) {
      args.push('-i', audioPath, '-map', '0:v', '-map', '1:a', '-c:v', 'copy', '-c:a', 'copy', '-shortest')
    } else {
      args.push('-map', '0:v', '-c:v', 'copy')
    }
    args.push(staging)
    return args
  })
}
