import { runTool } from '../toolRunner/toolRunner.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import { resetDirectory } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'

/** A time step of 0.5 inserts one frame between each pair: double the frame count. */
export const DOUBLE_FRAME_TIME_STEP = 0.5

export interface InterpolationRequest {
  inputDir: string
  outputDir: string
  timeStep?: number
}

/**
 * Run RIFE in directory mode over numbered PNG frames. The output directory is
 * emptied first; RIFE writes `%08d.png` frames into it.
 */
export async function runInterpolation(req: InterpolationRequest): Promise<void> {
  const { RIFE_PATH } = getConfig()
  const timeStep = req.timeStep ?? DOUBLE_FRAME_TIME_STEP
  await resetDirectory(req.outputDir)
  logger.info(`Running RIFE (directory mode, time step ${timeStep}) on ${req.inputDir}`)
  await runTool('RIFE', RIFE_PATH, ['-i', req.inputDir, '-o', req.outputDir, '-s', String(timeStep)])
}
