/**
 * Where each external tool will be taken from, for the doctor command.
 * FFmpeg/FFprobe resolution is delegated to the L2 resolvers the pipeline uses.
 */
import { getFFmpegPath, getFFprobePath } from '../../L2-clients/ffmpeg/ffmpeg.js'
import { getConfig } from '../../L1-infra/config/environment.js'

export interface ToolLocation {
  command: string
  source: string
}

export interface ToolLocations {
  ffmpeg: ToolLocation
  ffprobe: ToolLocation
  /** Launcher plus the script it runs. */
  superResolution: ToolLocation & { script: string }
  interpolation: ToolLocation
}

function sourceOf(envValue: string | undefined, envName: string): string {
  return envValue ? `${envName} config` : 'default'
}

export function resolveToolLocations(): ToolLocations {
  const config = getConfig()
  const ffmpeg = getFFmpegPath()
  const ffprobe = getFFprobePath()
  return {
    ffmpeg: { command: ffmpeg, source: ffmpeg === 'ffmpeg' ? 'system PATH' : 'FFMPEG_PATH config' },
    ffprobe: {
      command: ffprobe,
      source: ffprobe === 'ffprobe'
        ? 'system PATH'
        : ffprobe === config.FFPROBE_PATH ? 'FFPROBE_PATH config' : '@ffprobe-installer/ffprobe',
    },
    superResolution: {
      command: config.REALESRGAN_COMMAND,
      script: config.REALESRGAN_SCRIPT,
      source: sourceOf(process.env.REALESRGAN_SCRIPT, 'REALESRGAN_SCRIPT'),
    },
    interpolation: { command: config.RIFE_PATH, source: sourceOf(process.env.RIFE_PATH, 'RIFE_PATH') },
  }
}
