import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { promises as fsp } from 'fs'
import os from 'os'
import { join } from 'path'

const { mockSplitVideo, mockExtractAudio } = vi.hoisted(() => ({
  mockSplitVideo: vi.fn(),
  mockExtractAudio: vi.fn(),
}))

vi.mock('../../../L2-clients/ffmpeg/segmenter.js', () => ({ splitVideo: mockSplitVideo }))
vi.mock('../../../L2-clients/ffmpeg/audioExtraction.js', () => ({ extractAudioTrack: mockExtractAudio }))

import { ensureSplit, ensureOriginalAudio, findMissingSegments } from '../../../L3-services/chunkSplitter/chunkSplitter.js'
import { getPlan, recordPlan } from '../../../L3-services/chunkLedger/chunkLedger.js'
import { chunkPaths } from '../../../L0-pure/chunks/layout.js'
import type { Job, VideoInfo } from '../../../L0-pure/types/index.js'

let root: string
let job: Job

const video: VideoInfo = {
  duration: 25,
  fps: 30,
  fpsText: '30.000',
  width: 720,
  height: 480,
  hasAudio: true,
}

/** Fake segment muxer: writes `count` segments into the requested directory. */
function splitInto(count: number): void {
  mockSplitVideo.mockImplementation(async (_src: string, outDir: string, _secs: number, ext: string) => {
    await fsp.mkdir(outDir, { recursive: true })
    for (let i = 0; i < count; i++) {
      await fsp.writeFile(join(outDir, `chunk_${String(i).padStart(3, '0')}${ext}`), `segment ${i}`)
    }
  })
}

beforeEach(async () => {
  vi.clearAllMocks()
  root = await fsp.mkdtemp(join(os.tmpdir(), 'reelforge-split-test-'))
  job = { sourcePath: join(root, 'trip.mp4'), scaleFactor: 2, workDir: join(root, 'work'), outputDir: join(root, 'out') }
  await fsp.mkdir(job.workDir, { recursive: true })
})

afterEach(async () => {
  await fsp.rm(root, { recursive: true, force: true })
})

describe('ensureSplit', () => {
  it('splits 25s into three 10s chunks and records the plan', async () => {
    splitInto(3)
    const plan = await ensureSplit(job, video, 10)
    expect(plan).toEqual({ chunkSeconds: 10, totalChunks: 3 })
    expect(mockSplitVideo).toHaveBeenCalledWith(job.sourcePath, join(job.workDir, '0_input_chunks.partial'), 10, '.mp4')
    expect((await fsp.readdir(join(job.workDir, '0_input_chunks'))).sort()).toEqual(['chunk_000.mp4', 'chunk_001.mp4', 'chunk_002.mp4'])
    expect(await getPlan(job.workDir)).toMatchObject({ chunkSeconds: 10, totalChunks: 3 })
  })

  it('skips the split when every segment is accounted for', async () => {
    splitInto(3)
    await ensureSplit(job, video, 10)
    // chunk 0 finished and cleaned: only its final video remains
    const p0 = chunkPaths(job.workDir, 0, '.mp4')
    await fsp.rm(p0.inputSegment)
    await fsp.mkdir(join(p0.final, '..'), { recursive: true })
    await fsp.writeFile(p0.final, 'final')

    mockSplitVideo.mockClear()
    await expect(ensureSplit(job, video, 10)).resolves.toEqual({ chunkSeconds: 10, totalChunks: 3 })
    expect(mockSplitVideo).not.toHaveBeenCalled()
  })

  it('splits again when a segment went missing', async () => {
    splitInto(3)
    await ensureSplit(job, video, 10)
    await fsp.rm(chunkPaths(job.workDir, 2, '.mp4').inputSegment)
    await ensureSplit(job, video, 10)
    expect(mockSplitVideo).toHaveBeenCalledTimes(2)
    expect(await findMissingSegments(job.workDir, { chunkSeconds: 10, totalChunks: 3 }, '.mp4')).toEqual([])
  })

  it('keeps the recorded chunk duration over a new estimate', async () => {
    await recordPlan(job.workDir, { chunkSeconds: 20, totalChunks: 2 })
    splitInto(2)
    const plan = await ensureSplit(job, video, 53)
    expect(plan).toEqual({ chunkSeconds: 20, totalChunks: 2 })
    expect(mockSplitVideo).toHaveBeenCalledWith(job.sourcePath, expect.any(String), 20, '.mp4')
  })

  it('records the number of segments actually produced', async () => {
    splitInto(4)
    await expect(ensureSplit(job, video, 10)).resolves.toEqual({ chunkSeconds: 10, totalChunks: 4 })
  })

  it('fails when the split produced nothing', async () => {
    splitInto(0)
    await expect(ensureSplit(job, video, 10)).rejects.toThrow(`Splitting ${job.sourcePath} produced no segments`)
    expect(await getPlan(job.workDir)).toBeUndefined()
  })
})

describe('ensureOriginalAudio', () => {
  it('extracts once and reuses the file afterwards', async () => {
    const audio = join(job.workDir, 'trip_original.mka')
    mockExtractAudio.mockImplementation(async (_src: string, out: string) => {
      await fsp.writeFile(out, 'audio')
      return out
    })
    await expect(ensureOriginalAudio(job, video)).resolves.toBe(audio)
    await expect(ensureOriginalAudio(job, video)).resolves.toBe(audio)
    expect(mockExtractAudio).toHaveBeenCalledTimes(1)
  })

  it('skips extraction for a silent source', async () => {
    await expect(ensureOriginalAudio(job, { ...video, hasAudio: false })).resolves.toBeUndefined()
    expect(mockExtractAudio).not.toHaveBeenCalled()
  })

  it('fails when extraction leaves no audio', async () => {
    mockExtractAudio.mockResolvedValue(join(job.workDir, 'trip_original.mka'))
    await expect(ensureOriginalAudio(job, video))
      .rejects.toThrow(`Audio extraction failed to produce a valid file: ${join(job.workDir, 'trip_original.mka')}`)
  })
})
