import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { promises as fsp } from 'fs'
import os from 'os'
import { join } from 'path'
import { cleanupChunkIntermediates } from '../../../L3-services/chunkCleaner/chunkCleaner.js'
import { chunkPaths, partialPath } from '../../../L0-pure/chunks/layout.js'

let workDir: string

beforeEach(async () => {
  workDir = await fsp.mkdtemp(join(os.tmpdir(), 'reelforge-clean-test-'))
})

afterEach(async () => {
  await fsp.rm(workDir, { recursive: true, force: true })
})

async function touch(file: string): Promise<void> {
  await fsp.mkdir(join(file, '..'), { recursive: true })
  await fsp.writeFile(file, 'x')
}

describe('cleanupChunkIntermediates', () => {
  it('removes every intermediate and keeps the final video', async () => {
    const p = chunkPaths(workDir, 0, '.mp4')
    await touch(p.inputSegment)
    await touch(p.enhanced)
    await touch(join(p.framesIn, 'frame_00000001.png'))
    await touch(join(p.framesOut, '00000001.png'))
    await touch(p.prefiltered)
    await touch(partialPath(p.final))
    await touch(p.final)

    const removed = await cleanupChunkIntermediates(p)

    expect(removed).toEqual([p.inputSegment, p.enhanced, partialPath(p.final), p.framesIn, p.framesOut, p.scratchDir])
    expect(await fsp.readdir(join(workDir, '2_interpolated_chunks'))).toEqual(['chunk_000_final.mp4'])
    expect(await fsp.readdir(join(workDir, '1_enhanced_chunks'))).toEqual([])
    expect(await fsp.readdir(join(workDir, '0_input_chunks'))).toEqual([])
  })

  it('does nothing when there is nothing to clean', async () => {
    expect(await cleanupChunkIntermediates(chunkPaths(workDir, 3, '.mp4'))).toEqual([])
  })

  it('leaves other chunks alone', async () => {
    const other = chunkPaths(workDir, 1, '.mp4')
    await touch(other.inputSegment)
    await cleanupChunkIntermediates(chunkPaths(workDir, 0, '.mp4'))
    expect(await fsp.readdir(join(workDir, '0_input_chunks'))).toEqual(['chunk_001.mp4'])
  })
})
