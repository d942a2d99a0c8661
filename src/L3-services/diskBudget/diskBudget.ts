import { getFreeDiskBytes } from '../../L1-infra/fileSystem/fileSystem.js'
import { nearestExistingDir } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'
import {
  computeChunkSeconds,
  MIN_CHUNK_SECONDS,
  MAX_CHUNK_SECONDS,
  DISK_SAFETY_MARGIN,
} from '../../L0-pure/diskBudget/diskBudget.js'
import type { DiskBudgetEstimate } from '../../L0-pure/diskBudget/diskBudget.js'
import { errorMessage } from '../../L0-pure/errors/errors.js'
import type { VideoInfo } from '../../L0-pure/types/index.js'

const MB = 1024 ** 2
const GB = 1024 ** 3

/**
 * Auto-tune the chunk duration from the free space where `workDir` lives and
 * the upscaled frame size. Advisory only: every failure falls back to
 * {@link MIN_CHUNK_SECONDS} and the job carries on.
 */
export async function estimateChunkSeconds(
  video: Pick<VideoInfo, 'width' | 'height' | 'fps'>,
  scaleFactor: number,
  workDir: string,
): Promise<DiskBudgetEstimate> {
  logger.info('--- Auto-Tuning Chunk Size ---')
  let freeBytes: number
  try {
    const mount = nearestExistingDir(workDir)
    freeBytes = await getFreeDiskBytes(mount)
    logger.info(`Disk Check: ${(freeBytes / GB).toFixed(2)} GB free at ${mount}`)
  } catch (err: unknown) {
    logger.warn(`Auto-tuning failed (${errorMessage(err)}). Falling back to ${MIN_CHUNK_SECONDS}s chunks.`)
    return { chunkSeconds: MIN_CHUNK_SECONDS, fallbackReason: `disk stats unavailable: ${errorMessage(err)}` }
  }

  const estimate = computeChunkSeconds({ ...video, scaleFactor, freeBytes })
  if (estimate.fallbackReason) {
    logger.warn(`Auto-tuning failed (${estimate.fallbackReason}). Falling back to ${MIN_CHUNK_SECONDS}s chunks.`)
    return estimate
  }

  logger.info(
    `Upscaled res: ${video.width * scaleFactor}x${video.height * scaleFactor}, ` +
    `estimated PNG frame size: ${((estimate.frameBytes ?? 0) / MB).toFixed(2)} MB`,
  )
  logger.info(`Estimated temp disk usage per sec: ${((estimate.bytesPerSecond ?? 0) / MB).toFixed(2)} MB/s`)
  logger.info(
    `Reserving ${((freeBytes * DISK_SAFETY_MARGIN) / GB).toFixed(2)} GB (${DISK_SAFETY_MARGIN * 100}%) for temp files; ` +
    `disk allows ${(estimate.rawSeconds ?? 0).toFixed(0)}s chunks`,
  )
  logger.info(`Clamped to ${estimate.chunkSeconds}s (Min: ${MIN_CHUNK_SECONDS}s, Max: ${MAX_CHUNK_SECONDS}s)`)
  return estimate
}
