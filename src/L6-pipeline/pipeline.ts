import { extname } from '../L1-infra/paths/paths.js'
import { ensureDirectory } from '../L1-infra/fileSystem/fileSystem.js'
import logger, { pushPipe, popPipe } from '../L1-infra/logger/configLogger.js'
import { probeSource } from '../L3-services/videoProbe/videoProbe.js'
import { acquireWorkLock } from '../L3-services/workLock/workLock.js'
import { ensureJobIdentity } from '../L3-services/jobIdentity/jobIdentity.js'
import { estimateChunkSeconds } from '../L3-services/diskBudget/diskBudget.js'
import { ensureOriginalAudio, ensureSplit } from '../L3-services/chunkSplitter/chunkSplitter.js'
import { recordFailure } from '../L3-services/chunkLedger/chunkLedger.js'
import { reassemble } from '../L3-services/reassembler/reassembler.js'
import { chunkPaths } from '../L0-pure/chunks/layout.js'
import { clampChunkSeconds } from '../L0-pure/diskBudget/diskBudget.js'
import { errorMessage, ToolInterruptedError } from '../L0-pure/errors/errors.js'
import { processChunk } from './stageRunner.js'
import type {
  ChunkResult,
  Job,
  PipelineOptions,
  PipelineResult,
  SplitPlan,
  VideoInfo,
} from '../L0-pure/types/index.js'

async function resolveChunkSeconds(job: Job, video: VideoInfo, options: PipelineOptions): Promise<number> {
  if (options.chunkSeconds !== undefined) {
    const seconds = clampChunkSeconds(options.chunkSeconds)
    logger.info(`Using fixed ${seconds}s chunks`)
    return seconds
  }
  const estimate = await estimateChunkSeconds(video, job.scaleFactor, job.workDir)
  return estimate.chunkSeconds
}

/**
 * Run every chunk in index order. A chunk failure is recorded in the ledger
 * and either ends the job (`abort`) or is logged and passed over (`skip`).
 * An interrupt always ends the job and is not recorded as a failure.
 */
export async function runChunks(
  job: Job,
  video: VideoInfo,
  plan: SplitPlan,
  options: PipelineOptions,
): Promise<ChunkResult[]> {
  const ext = extname(job.sourcePath)
  const limit = options.maxChunks !== undefined
    ? Math.min(options.maxChunks, plan.totalChunks)
    : plan.totalChunks
  if (limit < plan.totalChunks) {
    logger.info(`Processing only the first ${limit} of ${plan.totalChunks} chunks`)
  }

  const results: ChunkResult[] = []
  for (let i = 0; i < limit; i++) {
    const paths = chunkPaths(job.workDir, i, ext)
    logger.info(`--- Processing chunk ${i + 1} / ${plan.totalChunks} (${paths.name}) ---`)
    const start = Date.now()
    try {
      const outcome = await processChunk({ job, video, paths, deinterlace: options.deinterlace })
      const duration = Date.now() - start
      results.push({ index: i, outcome, duration })
      if (outcome === 'processed') logger.info(`Chunk ${paths.name} completed in ${duration}ms`)
    } catch (err: unknown) {
      const duration = Date.now() - start
      if (err instanceof ToolInterruptedError) {
        logger.warn(`Chunk ${paths.name} interrupted after ${duration}ms`)
        throw err
      }
      const message = errorMessage(err)
      await recordFailure(job.workDir, i, message)
      logger.error(`Chunk ${paths.name} failed after ${duration}ms: ${message}`)
      if (options.onChunkFailure === 'abort') throw err
      results.push({ index: i, outcome: 'failed', duration, error: message })
    }
  }
  return results
}

/**
 * Upscale and interpolate `job.sourcePath` chunk by chunk, then reassemble.
 *
 * ### Resume
 * Every step checks the working directory before doing anything, so a rerun
 * after an interruption continues with the first unfinished artifact. A rerun
 * after success only probes the source; chunks and the final mux are reused.
 *
 * ### Order
 * The lock is taken before the identity check, and the log pipe is attached
 * only after it: a discard deletes the working directory, log file included.
 */
export async function processJob(job: Job, options: PipelineOptions): Promise<PipelineResult> {
  const pipelineStart = Date.now()
  const lock = await acquireWorkLock(job.workDir)
  const releaseOnExit = (): void => lock.releaseSync()
  process.once('exit', releaseOnExit)

  try {
    await ensureJobIdentity(job.workDir, job, {
      policy: options.conflictPolicy,
      confirmDiscard: options.confirmDiscard,
    })

    pushPipe(job.workDir)
    try {
      logger.info(`Processing ${job.sourcePath} at x${job.scaleFactor}`)
      const video = await probeSource(job.sourcePath)

      const chunkSeconds = await resolveChunkSeconds(job, video, options)
      await ensureDirectory(job.outputDir)
      const audioPath = await ensureOriginalAudio(job, video)
      const plan = await ensureSplit(job, video, chunkSeconds)
      logger.info(`Plan: ${plan.totalChunks} chunks of ${plan.chunkSeconds}s`)

      const chunks = await runChunks(job, video, plan, options)

      logger.info('--- All chunks processed. Reassembling. ---')
      const assembly = await reassemble(job, plan.totalChunks, audioPath)

      const totalDuration = Date.now() - pipelineStart
      logger.info(`Pipeline completed in ${totalDuration}ms: ${assembly.outputPath}`)
      return { job, plan, chunks, assembly, totalDuration }
    } finally {
      popPipe()
    }
  } finally {
    process.removeListener('exit', releaseOnExit)
    await lock.release()
  }
}
