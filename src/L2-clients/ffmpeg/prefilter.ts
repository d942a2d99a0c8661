import { runFFmpeg } from './ffmpeg.js'
import { ensureDirectory } from '../../L1-infra/fileSystem/fileSystem.js'
import { dirname } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'

/** Denoise, deblock, sharpen. */
export const BASE_FILTER_CHAIN = ['hqdn3d=3:3:6:6', 'pp=ac', 'unsharp=3:3:0.6']
/** Adaptive deinterlace, one frame per frame, auto-detected field order. */
export const DEINTERLACE_FILTER = 'bwdif=0:-1:0'

export interface PrefilterOptions {
  deinterlace?: boolean
}

export function buildFilterChain(options: PrefilterOptions = {}): string {
  const filters = options.deinterlace ? [DEINTERLACE_FILTER, ...BASE_FILTER_CHAIN] : BASE_FILTER_CHAIN
  return filters.join(',')
}

/**
 * Clean up a segment before super-resolution, encoding at master fidelity
 * (crf 16, preset slower) so the model sees as little compression noise as possible.
 */
export async function prefilterSegment(
  inputPath: string,
  outputPath: string,
  options: PrefilterOptions = {},
): Promise<void> {
  await ensureDirectory(dirname(outputPath))
  logger.info(`Pre-filtering ${inputPath}${options.deinterlace ? ' (deinterlace)' : ''}`)
  await runFFmpeg('FFmpeg pre-filtering', [
    '-y',
    '-i', inputPath,
    '-vf', buildFilterChain(options),
    '-c:v', 'libx264', '-crf', '16',
    '-preset', 'slower',
    '-pix_fmt', 'yuv420p',
    outputPath,
  ])
}
