import { fluentFfmpeg } from '../../L1-infra/ffmpeg/ffmpeg.js'
import type { FfprobeData } from '../../L1-infra/ffmpeg/ffmpeg.js'
import { createModuleRequire } from '../../L1-infra/process/process.js'
import { fileExistsSync, moveFile, removeFile } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import { partialPath } from '../../L0-pure/chunks/layout.js'
import { runTool } from '../toolRunner/toolRunner.js'

const require = createModuleRequire(import.meta.url)

/** Get the resolved path to the FFmpeg binary. */
export function getFFmpegPath(): string {
  const config = getConfig()
  if (config.FFMPEG_PATH && config.FFMPEG_PATH !== 'ffmpeg') {
    logger.debug(`FFmpeg: using FFMPEG_PATH config: ${config.FFMPEG_PATH}`)
    return config.FFMPEG_PATH
  }
  logger.debug('FFmpeg: using system PATH')
  return 'ffmpeg'
}

function isInstallerModule(value: unknown): value is { path: string } {
  return typeof value === 'object' && value !== null && 'path' in value && typeof value.path === 'string'
}

/** Get the resolved path to the FFprobe binary. */
export function getFFprobePath(): string {
  const config = getConfig()
  if (config.FFPROBE_PATH && config.FFPROBE_PATH !== 'ffprobe') {
    logger.debug(`FFprobe: using FFPROBE_PATH config: ${config.FFPROBE_PATH}`)
    return config.FFPROBE_PATH
  }
  try {
    const installer: unknown = require('@ffprobe-installer/ffprobe')
    if (isInstallerModule(installer) && fileExistsSync(installer.path)) {
      logger.debug(`FFprobe: using @ffprobe-installer/ffprobe: ${installer.path}`)
      return installer.path
    }
  } catch { /* @ffprobe-installer/ffprobe not available for this platform */ }
  logger.debug('FFprobe: falling back to system PATH')
  return 'ffprobe'
}

/** Promisified ffprobe. */
export function ffprobe(filePath: string): Promise<FfprobeData> {
  return new Promise((resolve, reject) => {
    fluentFfmpeg.setFfprobePath(getFFprobePath())
    fluentFfmpeg.ffprobe(filePath, (err: Error | null, data) => {
      if (err) reject(err)
      else resolve(data)
    })
  })
}

/** Run ffmpeg with `args`; stdout/stderr are surfaced on failure. */
export async function runFFmpeg(label: string, args: string[]): Promise<void> {
  await runTool(label, getFFmpegPath(), ['-hide_banner', ...args])
}

/**
 * Run ffmpeg writing to a staging name beside `outputPath`, then rename it into
 * place. `buildArgs` receives the staging path to use as the output argument.
 * An interrupted encode therefore never leaves a file under the final name.
 */
export async function runFFmpegAtomic(
  label: string,
  outputPath: string,
  buildArgs: (stagingPath: string) => string[],
): Promise<void> {
  const staging = partialPath(outputPath)
  await removeFile(staging)
  try {
    await runFFmpeg(label, ['-y', ...buildArgs(staging)])
  } catch (err: unknown) {
    await removeFile(staging)
    throw err
  }
  await moveFile(staging, outputPath)
}
