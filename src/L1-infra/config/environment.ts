import dotenv from 'dotenv'
import { join } from '../paths/paths.js'
import { fileExistsSync } from '../fileSystem/fileSystem.js'

// Load .env file from the directory the CLI runs in
const envPath = join(process.cwd(), '.env')
if (fileExistsSync(envPath)) {
  dotenv.config({ path: envPath })
}

export interface AppEnvironment {
  FFMPEG_PATH: string
  FFPROBE_PATH: string
  /** Interpreter or launcher for the super-resolution script. */
  REALESRGAN_COMMAND: string
  REALESRGAN_SCRIPT: string
  RIFE_PATH: string
  WORK_DIR: string
  OUTPUT_DIR: string
  /** Per-invocation timeout for external tools; 0 disables it. */
  TOOL_TIMEOUT_MS: number
  VERBOSE: boolean
}

export interface CLIOptions {
  workDir?: string
  outputDir?: string
  toolTimeoutMinutes?: number
  verbose?: boolean
}

let config: AppEnvironment | null = null

/** Parse a non-negative minute count into milliseconds; anything else disables the timeout. */
export function parseTimeoutMinutes(raw: string | number | undefined): number {
  if (raw === undefined || raw === '') return 0
  const minutes = typeof raw === 'number' ? raw : Number.parseFloat(raw)
  if (!Number.isFinite(minutes) || minutes <= 0) return 0
  return Math.round(minutes * 60_000)
}

/** Merge CLI options → env vars → defaults. Call before getConfig(). */
export function initConfig(cli: CLIOptions = {}): AppEnvironment {
  const cwd = process.cwd()

  config = {
    FFMPEG_PATH: process.env.FFMPEG_PATH || 'ffmpeg',
    FFPROBE_PATH: process.env.FFPROBE_PATH || 'ffprobe',
    REALESRGAN_COMMAND: process.env.REALESRGAN_COMMAND || 'python3',
    REALESRGAN_SCRIPT: process.env.REALESRGAN_SCRIPT || 'inference_realesrgan_video.py',
    RIFE_PATH: process.env.RIFE_PATH || './rife-ncnn-vulkan/rife-ncnn-vulkan',
    WORK_DIR: cli.workDir || process.env.WORK_DIR || join(cwd, 'processing_chunks'),
    OUTPUT_DIR: cli.outputDir || process.env.OUTPUT_DIR || join(cwd, 'outputs'),
    TOOL_TIMEOUT_MS: parseTimeoutMinutes(cli.toolTimeoutMinutes ?? process.env.TOOL_TIMEOUT_MINUTES),
    VERBOSE: cli.verbose ?? process.env.VERBOSE === 'true',
  }

  return config
}

export function getConfig(): AppEnvironment {
  if (config) {
    return config
  }

  // Fallback: init with no CLI options (pure env-var mode)
  return initConfig()
}
