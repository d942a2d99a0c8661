import { runTool } from '../toolRunner/toolRunner.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import { ensureDirectory } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { ENHANCED_OUTPUT_SUFFIX } from '../../L0-pure/chunks/layout.js'
import type { ScaleFactor } from '../../L0-pure/types/index.js'

/** Model shipped for each scale factor. */
export const MODEL_FOR_SCALE: Record<ScaleFactor, string> = {
  2: 'RealESRGAN_x2plus',
  4: 'realesr-general-x4v3',
}

export interface SuperResolutionRequest {
  inputPath: string
  outputDir: string
  scaleFactor: ScaleFactor
  /** Frame rate the tool writes its output at, e.g. "29.970". */
  fpsText: string
}

export function buildSuperResolutionArgs(script: string, req: SuperResolutionRequest): string[] {
  return [
    script,
    '-i', req.inputPath,
    '-n', MODEL_FOR_SCALE[req.scaleFactor],
    '-o', req.outputDir,
    '-s', String(req.scaleFactor),
    '--suffix', ENHANCED_OUTPUT_SUFFIX,
    '--fps', req.fpsText,
  ]
}

/**
 * Upscale one video with Real-ESRGAN. The tool writes `<input stem>_out.mp4`
 * into `outputDir`; locating it is left to the caller.
 */
export async function runSuperResolution(req: SuperResolutionRequest): Promise<void> {
  const { REALESRGAN_COMMAND, REALESRGAN_SCRIPT } = getConfig()
  await ensureDirectory(req.outputDir)
  logger.info(`Running Real-ESRGAN (${MODEL_FOR_SCALE[req.scaleFactor]}, x${req.scaleFactor}) on ${req.inputPath}`)
  await runTool('Real-ESRGAN', REALESRGAN_COMMAND, buildSuperResolutionArgs(REALESRGAN_SCRIPT, req))
}
