import { splitVideo } from '../../L2-clients/ffmpeg/segmenter.js'
import { extractAudioTrack } from '../../L2-clients/ffmpeg/audioExtraction.js'
import {
  isNonEmptyFile,
  listDirectoryOrEmpty,
  removeDirectory,
  renameDirectory,
  resetDirectory,
} from '../../L1-infra/fileSystem/fileSystem.js'
import { extname } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { chunkPaths, chunkName, inputChunksDir, originalAudioPath, PARTIAL_MARKER } from '../../L0-pure/chunks/layout.js'
import { countChunks } from '../../L0-pure/diskBudget/diskBudget.js'
import { getPlan, isStageComplete, recordPlan } from '../chunkLedger/chunkLedger.js'
import type { Job, SplitPlan, VideoInfo } from '../../L0-pure/types/index.js'

/**
 * Indices in `[0, plan.totalChunks)` that have neither an input segment nor a
 * finished chunk video. Finished chunks have had their segment cleaned up, so
 * either artifact proves the split reached that index. A final video whose
 * size disagrees with the ledger does not count as finished.
 */
export async function findMissingSegments(workDir: string, plan: SplitPlan, ext: string): Promise<number[]> {
  const missing: number[] = []
  for (let i = 0; i < plan.totalChunks; i++) {
    const paths = chunkPaths(workDir, i, ext)
    if (await isNonEmptyFile(paths.inputSegment)) continue
    if (await isStageComplete(workDir, i, 'final', paths.final)) continue
    missing.push(i)
  }
  return missing
}

async function countSegments(dir: string, ext: string): Promise<number> {
  const entries = await listDirectoryOrEmpty(dir)
  return entries.filter((f) => f.startsWith('chunk_') && f.endsWith(ext)).length
}

/**
 * Cut the source into input segments unless every expected segment is already
 * accounted for. A previously recorded plan wins over the fresh `chunkSeconds`
 * estimate, since finished chunks were cut to the recorded duration.
 *
 * The split runs into a staging directory that replaces the segment directory
 * only once ffmpeg succeeds. Returns the plan the segments on disk follow.
 */
export async function ensureSplit(job: Job, video: VideoInfo, chunkSeconds: number): Promise<SplitPlan> {
  const ext = extname(job.sourcePath)
  const recorded = await getPlan(job.workDir)
  if (recorded && recorded.chunkSeconds !== chunkSeconds) {
    logger.info(`Keeping recorded ${recorded.chunkSeconds}s chunks (estimate this run: ${chunkSeconds}s)`)
  }
  const plan: SplitPlan = recorded
    ? { chunkSeconds: recorded.chunkSeconds, totalChunks: recorded.totalChunks }
    : { chunkSeconds, totalChunks: countChunks(video.duration, chunkSeconds) }

  if (plan.totalChunks > 0) {
    const missing = await findMissingSegments(job.workDir, plan, ext)
    if (missing.length === 0) {
      logger.info(`All ${plan.totalChunks} chunks already split, skipping split.`)
      if (!recorded) await recordPlan(job.workDir, plan)
      return plan
    }
    if (missing.length < plan.totalChunks) {
      logger.warn(`Split incomplete (missing ${missing.map(chunkName).join(', ')}); splitting again`)
    }
  }

  const targetDir = inputChunksDir(job.workDir)
  const stagingDir = `${targetDir}${PARTIAL_MARKER}`
  await resetDirectory(stagingDir)
  await splitVideo(job.sourcePath, stagingDir, plan.chunkSeconds, ext)

  const produced = await countSegments(stagingDir, ext)
  if (produced === 0) {
    throw new Error(`Splitting ${job.sourcePath} produced no segments`)
  }
  if (produced !== plan.totalChunks) {
    logger.warn(`Expected ${plan.totalChunks} segments but the split produced ${produced} (keyframe placement); using ${produced}`)
  }

  await removeDirectory(targetDir, { recursive: true, force: true })
  await renameDirectory(stagingDir, targetDir)

  const committed: SplitPlan = { chunkSeconds: plan.chunkSeconds, totalChunks: produced }
  await recordPlan(job.workDir, committed)
  return committed
}

/**
 * Extract the original audio once. Returns the audio path, or `undefined` when
 * the source has no audio stream.
 */
export async function ensureOriginalAudio(job: Job, video: VideoInfo): Promise<string | undefined> {
  const audioPath = originalAudioPath(job.workDir, job.sourcePath)
  if (!video.hasAudio) {
    logger.warn(`${job.sourcePath} has no audio stream; the output will be silent`)
    return undefined
  }
  if (await isNonEmptyFile(audioPath)) {
    logger.info(`Original audio already exists: ${audioPath}`)
    return audioPath
  }
  await extractAudioTrack(job.sourcePath, audioPath)
  if (!(await isNonEmptyFile(audioPath))) {
    throw new Error(`Audio extraction failed to produce a valid file: ${audioPath}`)
  }
  return audioPath
}
