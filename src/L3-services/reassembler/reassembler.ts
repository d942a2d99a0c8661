import { concatWithAudio } from '../../L2-clients/ffmpeg/concat.js'
import { writeTextFile } from '../../L1-infra/fileSystem/fileSystem.js'
import { join, resolve, extname } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'
import {
  CONCAT_LIST_FILE,
  INTERPOLATED_CHUNKS_DIR,
  buildConcatList,
  chunkPaths,
  finalVideoPath,
} from '../../L0-pure/chunks/layout.js'
import { NothingToAssembleError } from '../../L0-pure/errors/errors.js'
import { isAssemblyCurrent, isStageComplete, recordAssembly } from '../chunkLedger/chunkLedger.js'
import type { AssemblyResult, Job } from '../../L0-pure/types/index.js'

export interface ChunkPrefix {
  /** Final chunk videos 0..k-1, all present and matching their ledger records. */
  chunkPaths: string[]
  /** First index without a final video, when short of `totalChunks`. */
  missingFrom?: number
}

/**
 * Collect finished chunk videos strictly by index from 0, stopping at the first
 * gap. Chunks past the gap are left out even if they exist, and a final video
 * the ledger no longer vouches for is a gap.
 */
export async function collectFinishedPrefix(job: Job, totalChunks: number): Promise<ChunkPrefix> {
  const ext = extname(job.sourcePath)
  const found: string[] = []
  for (let i = 0; i < totalChunks; i++) {
    const { final, name } = chunkPaths(job.workDir, i, ext)
    if (!(await isStageComplete(job.workDir, i, 'final', final))) {
      logger.warn(`Missing chunk ${name} (${final}). Assuming this is the end.`)
      return { chunkPaths: found, missingFrom: i }
    }
    found.push(resolve(final))
  }
  return { chunkPaths: found }
}

/**
 * Rebuild the concatenation list from the contiguous prefix of finished chunks
 * and stream-copy them, with the original audio, into the final output.
 * A concat failure is fatal; there is no re-encode fallback.
 *
 * When the ledger shows the output was already assembled from these exact
 * chunk videos and it is still intact, ffmpeg is not run again.
 */
export async function reassemble(job: Job, totalChunks: number, audioPath: string | undefined): Promise<AssemblyResult> {
  const prefix = await collectFinishedPrefix(job, totalChunks)
  if (prefix.chunkPaths.length === 0) {
    throw new NothingToAssembleError(join(job.workDir, INTERPOLATED_CHUNKS_DIR))
  }
  logger.info(`Found ${prefix.chunkPaths.length} of ${totalChunks} processed chunks to concatenate.`)

  const listPath = join(job.workDir, CONCAT_LIST_FILE)
  await writeTextFile(listPath, buildConcatList(prefix.chunkPaths))
  logger.info(`Concatenation list created: ${listPath}`)

  const outputPath = finalVideoPath(job.outputDir, job.sourcePath, job.scaleFactor)
  const result: AssemblyResult = {
    outputPath,
    listPath,
    chunkPaths: prefix.chunkPaths,
    totalChunks,
    missingFrom: prefix.missingFrom,
    reused: false,
  }
  if (await isAssemblyCurrent(job.workDir, outputPath, prefix.chunkPaths)) {
    logger.info(`Final video is up to date: ${outputPath}`)
    return { ...result, reused: true }
  }

  try {
    await concatWithAudio(listPath, audioPath, outputPath)
  } catch (err: unknown) {
    logger.error('If this is a "non-monotonic DTS" error, the chunk timestamps are incompatible for stream copy; re-encode the chunks before concatenating.')
    throw err
  }

  await recordAssembly(job.workDir, outputPath, prefix.chunkPaths)
  logger.info(`Final video written: ${outputPath}`)
  return result
}
