import { fileExists, removeFile, removeDirectory } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { partialPath } from '../../L0-pure/chunks/layout.js'
import type { ChunkPaths } from '../../L0-pure/types/index.js'

/**
 * Delete every intermediate of a finished chunk: input segment, enhanced
 * video, both frame directories and the enhancement scratch directory. The
 * final chunk video is kept for reassembly. Returns the paths that existed.
 */
export async function cleanupChunkIntermediates(paths: ChunkPaths): Promise<string[]> {
  const files = [paths.inputSegment, paths.enhanced, partialPath(paths.enhanced), partialPath(paths.final)]
  const dirs = [paths.framesIn, paths.framesOut, paths.scratchDir]
  const removed: string[] = []

  for (const file of files) {
    if (!(await fileExists(file))) continue
    logger.info(`  > Cleaning up ${file}`)
    await removeFile(file)
    removed.push(file)
  }
  for (const dir of dirs) {
    if (!(await fileExists(dir))) continue
    logger.info(`  > Cleaning up ${dir}`)
    await removeDirectory(dir, { recursive: true, force: true })
    removed.push(dir)
  }
  return removed
}
