import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { promises as fsp } from 'fs'
import os from 'os'
import { basename, join } from 'path'

// ── Fake external tools: each writes the files the real tool would ─────────

const tools = vi.hoisted(() => ({
  probeVideo: vi.fn(),
  splitVideo: vi.fn(),
  extractAudioTrack: vi.fn(),
  prefilterSegment: vi.fn(),
  runSuperResolution: vi.fn(),
  extractAllFrames: vi.fn(),
  runInterpolation: vi.fn(),
  encodeFrameSequence: vi.fn(),
  concatWithAudio: vi.fn(),
}))

vi.mock('../../../L2-clients/ffmpeg/probe.js', () => ({ probeVideo: tools.probeVideo }))
vi.mock('../../../L2-clients/ffmpeg/segmenter.js', () => ({ splitVideo: tools.splitVideo }))
vi.mock('../../../L2-clients/ffmpeg/audioExtraction.js', () => ({ extractAudioTrack: tools.extractAudioTrack }))
vi.mock('../../../L2-clients/ffmpeg/prefilter.js', () => ({ prefilterSegment: tools.prefilterSegment }))
vi.mock('../../../L2-clients/realesrgan/realesrgan.js', () => ({ runSuperResolution: tools.runSuperResolution }))
vi.mock('../../../L2-clients/rife/rife.js', () => ({ runInterpolation: tools.runInterpolation }))
vi.mock('../../../L2-clients/ffmpeg/frameCapture.js', () => ({
  extractAllFrames: tools.extractAllFrames,
  encodeFrameSequence: tools.encodeFrameSequence,
}))
vi.mock('../../../L2-clients/ffmpeg/concat.js', () => ({ concatWithAudio: tools.concatWithAudio }))

import { processJob } from '../../../L6-pipeline/pipeline.js'
import { chunkPaths } from '../../../L0-pure/chunks/layout.js'
import { JobConflictError, ToolError, ToolInterruptedError } from '../../../L0-pure/errors/errors.js'
import { getChunkRecord } from '../../../L3-services/chunkLedger/chunkLedger.js'
import type { Job, PipelineOptions, ScaleFactor, VideoInfo } from '../../../L0-pure/types/index.js'

const SOURCE: VideoInfo = {
  duration: 25,
  fps: 25,
  fpsText: '25.000',
  width: 320,
  height: 240,
  hasAudio: true,
}
const FRAMES_PER_CHUNK = 5

let root: string

async function writeFile(file: string, content: string): Promise<void> {
  await fsp.mkdir(join(file, '..'), { recursive: true })
  await fsp.writeFile(file, content)
}

async function writeFrames(dir: string, count: number, name: (i: number) => string): Promise<void> {
  await fsp.mkdir(dir, { recursive: true })
  for (let i = 1; i <= count; i++) await fsp.writeFile(join(dir, name(i)), 'png')
}

function installFakeTools(): void {
  tools.probeVideo.mockResolvedValue(SOURCE)
  tools.splitVideo.mockImplementation(async (_src: string, outDir: string, seconds: number, ext: string) => {
    const count = Math.ceil(SOURCE.duration / seconds)
    for (let i = 0; i < count; i++) {
      await writeFile(join(outDir, `chunk_${String(i).padStart(3, '0')}${ext}`), `segment ${i}`)
    }
  })
  tools.extractAudioTrack.mockImplementation(async (_src: string, out: string) => {
    await writeFile(out, 'audio')
    return out
  })
  tools.prefilterSegment.mockImplementation(async (_in: string, out: string) => {
    await writeFile(out, 'prefiltered')
  })
  tools.runSuperResolution.mockImplementation(async (req: { inputPath: string; outputDir: string }) => {
    await writeFile(join(req.outputDir, `${basename(req.inputPath, '.mp4')}_out.mp4`), 'upscaled')
  })
  tools.extractAllFrames.mockImplementation(async (_video: string, dir: string) => {
    await writeFrames(dir, FRAMES_PER_CHUNK, (i) => `frame_${String(i).padStart(8, '0')}.png`)
  })
  tools.runInterpolation.mockImplementation(async (req: { outputDir: string }) => {
    await writeFrames(req.outputDir, FRAMES_PER_CHUNK * 2, (i) => `${String(i).padStart(8, '0')}.png`)
  })
  tools.encodeFrameSequence.mockImplementation(async (_dir: string, out: string) => {
    await writeFile(out, `final ${basename(out)}`)
  })
  tools.concatWithAudio.mockImplementation(async (_list: string, _audio: string | undefined, out: string) => {
    await writeFile(out, 'assembled')
  })
}

function failInterpolationFor(chunk: string): void {
  tools.runInterpolation.mockImplementation(async (req: { inputDir: string; outputDir: string }) => {
    if (req.inputDir.includes(chunk)) {
      throw new ToolError('rife', ['-i', req.inputDir], 255, '', 'vkCreateDevice failed')
    }
    await writeFrames(req.outputDir, FRAMES_PER_CHUNK * 2, (i) => `${String(i).padStart(8, '0')}.png`)
  })
}

function makeJob(scaleFactor: ScaleFactor = 2): Job {
  return {
    sourcePath: join(root, 'videos', 'trip.mp4'),
    scaleFactor,
    workDir: join(root, 'work'),
    outputDir: join(root, 'out'),
  }
}

function options(overrides: Partial<PipelineOptions> = {}): PipelineOptions {
  return { conflictPolicy: 'abort', chunkSeconds: 10, onChunkFailure: 'abort', deinterlace: false, ...overrides }
}

function totalToolCalls(): number {
  return Object.entries(tools)
    .filter(([name]) => name !== 'probeVideo')
    .reduce((sum, [, fn]) => sum + fn.mock.calls.length, 0)
}

async function listOrEmpty(dir: string): Promise<string[]> {
  return fsp.readdir(dir).catch(() => [])
}

beforeEach(async () => {
  vi.clearAllMocks()
  installFakeTools()
  root = await fsp.mkdtemp(join(os.tmpdir(), 'reelforge-pipeline-test-'))
})

afterEach(async () => {
  await fsp.rm(root, { recursive: true, force: true })
})

describe('processJob', () => {
  it('splits 25s into three 10s chunks, processes each and assembles them', async () => {
    const job = makeJob()
    const result = await processJob(job, options())

    expect(result.plan).toEqual({ chunkSeconds: 10, totalChunks: 3 })
    expect(result.chunks.map((c) => c.outcome)).toEqual(['processed', 'processed', 'processed'])
    expect(result.assembly.chunkPaths).toEqual([0, 1, 2].map((i) => chunkPaths(job.workDir, i, '.mp4').final))
    expect(result.assembly.missingFrom).toBeUndefined()
    expect(result.assembly.outputPath).toBe(join(root, 'out', 'trip_x2_FINAL.mkv'))
    expect(tools.concatWithAudio).toHaveBeenCalledWith(
      join(job.workDir, 'concat_list.txt'),
      join(job.workDir, 'trip_original.mka'),
      result.assembly.outputPath,
    )
    expect(tools.encodeFrameSequence).toHaveBeenCalledWith(
      chunkPaths(job.workDir, 0, '.mp4').framesOut,
      chunkPaths(job.workDir, 0, '.mp4').final,
      50,
    )
  })

  it('removes every intermediate and releases the lock', async () => {
    const job = makeJob()
    await processJob(job, options())
    expect(await listOrEmpty(join(job.workDir, '0_input_chunks'))).toEqual([])
    expect(await listOrEmpty(join(job.workDir, '1_enhanced_chunks'))).toEqual([])
    expect((await listOrEmpty(join(job.workDir, '2_interpolated_chunks'))).sort())
      .toEqual(['chunk_000_final.mp4', 'chunk_001_final.mp4', 'chunk_002_final.mp4'])
    await expect(fsp.stat(join(root, 'work.lock'))).rejects.toMatchObject({ code: 'ENOENT' })
  })

  it('invokes no processing tool when run again on a completed job', async () => {
    const job = makeJob()
    await processJob(job, options())
    vi.clearAllMocks()

    const second = await processJob(job, options())

    expect(totalToolCalls()).toBe(0)
    expect(second.chunks.map((c) => c.outcome)).toEqual(['cached', 'cached', 'cached'])
    expect(second.assembly.reused).toBe(true)
  })

  it('keeps the recorded plan when a later run estimates differently', async () => {
    const job = makeJob()
    await processJob(job, options({ chunkSeconds: 10 }))
    const second = await processJob(job, options({ chunkSeconds: 30 }))
    expect(second.plan).toEqual({ chunkSeconds: 10, totalChunks: 3 })
  })

  it('never reprocesses a finished chunk and clears its stray intermediates', async () => {
    const job = makeJob()
    const p0 = chunkPaths(job.workDir, 0, '.mp4')
    await writeFile(p0.final, 'finished earlier')
    await writeFile(p0.enhanced, 'stray')
    await writeFrames(p0.framesOut, 3, (i) => `${i}.png`)

    const result = await processJob(job, options())

    expect(result.chunks.map((c) => c.outcome)).toEqual(['cached', 'processed', 'processed'])
    expect(tools.runSuperResolution).toHaveBeenCalledTimes(2)
    expect(await fsp.readFile(p0.final, 'utf-8')).toBe('finished earlier')
    await expect(fsp.stat(p0.enhanced)).rejects.toMatchObject({ code: 'ENOENT' })
    await expect(fsp.stat(p0.framesOut)).rejects.toMatchObject({ code: 'ENOENT' })
  })

  it('redoes a finished chunk whose final video no longer matches the ledger', async () => {
    const job = makeJob()
    await processJob(job, options())
    const p1 = chunkPaths(job.workDir, 1, '.mp4')
    await fsp.writeFile(p1.final, 'trunc')
    vi.clearAllMocks()

    const second = await processJob(job, options())

    expect(tools.splitVideo).toHaveBeenCalledTimes(1)
    expect(second.chunks.map((c) => c.outcome)).toEqual(['cached', 'processed', 'cached'])
    expect(tools.runSuperResolution).toHaveBeenCalledTimes(1)
    expect(await fsp.readFile(p1.final, 'utf-8')).toBe('final chunk_001_final.mp4')
    expect(second.assembly.chunkPaths).toEqual([0, 1, 2].map((i) => chunkPaths(job.workDir, i, '.mp4').final))
    expect(second.assembly.reused).toBe(false)
    expect(tools.concatWithAudio).toHaveBeenCalledTimes(1)
  })

  it('leaves a rejected final video out of the assembly when it cannot be redone', async () => {
    const job = makeJob()
    await processJob(job, options())
    await fsp.writeFile(chunkPaths(job.workDir, 1, '.mp4').final, 'trunc')
    failInterpolationFor('chunk_001')

    const second = await processJob(job, options({ onChunkFailure: 'skip' }))

    expect(second.chunks.map((c) => c.outcome)).toEqual(['cached', 'failed', 'cached'])
    expect(second.assembly.chunkPaths).toEqual([chunkPaths(job.workDir, 0, '.mp4').final])
    expect(second.assembly.missingFrom).toBe(1)
  })

  it('resumes at interpolation when only the enhanced video survived', async () => {
    const job = makeJob()
    failInterpolationFor('chunk_001')
    await expect(processJob(job, options())).rejects.toBeInstanceOf(ToolError)

    vi.clearAllMocks()
    installFakeTools()
    const result = await processJob(job, options())

    expect(result.chunks.map((c) => c.outcome)).toEqual(['cached', 'processed', 'processed'])
    // chunk_001 reuses its enhanced video; only chunk_002 is upscaled
    expect(tools.runSuperResolution).toHaveBeenCalledTimes(1)
    expect(tools.runInterpolation).toHaveBeenCalledTimes(2)
  })

  it('aborts the job on a chunk failure by default', async () => {
    const job = makeJob()
    failInterpolationFor('chunk_001')

    await expect(processJob(job, options())).rejects.toThrow('failed with exit code 255')

    expect(tools.concatWithAudio).not.toHaveBeenCalled()
    expect(await getChunkRecord(job.workDir, 1)).toMatchObject({ error: expect.stringContaining('exit code 255') })
    await expect(fsp.stat(join(root, 'work.lock'))).rejects.toMatchObject({ code: 'ENOENT' })
  })

  it('assembles the contiguous prefix when a failed chunk is skipped', async () => {
    const job = makeJob()
    failInterpolationFor('chunk_002')

    const result = await processJob(job, options({ onChunkFailure: 'skip' }))

    expect(result.chunks.map((c) => c.outcome)).toEqual(['processed', 'processed', 'failed'])
    expect(result.assembly.chunkPaths).toHaveLength(2)
    expect(result.assembly.missingFrom).toBe(2)
    const list = await fsp.readFile(join(job.workDir, 'concat_list.txt'), 'utf-8')
    expect(list).toBe(
      `file '${chunkPaths(job.workDir, 0, '.mp4').final}'\nfile '${chunkPaths(job.workDir, 1, '.mp4').final}'\n`,
    )
  })

  it('stops at an interrupted tool even when failures are skipped', async () => {
    const job = makeJob()
    tools.runInterpolation.mockRejectedValueOnce(new ToolInterruptedError('rife', ['-i', 'in'], '', ''))

    await expect(processJob(job, options({ onChunkFailure: 'skip' }))).rejects.toBeInstanceOf(ToolInterruptedError)

    expect(tools.runSuperResolution).toHaveBeenCalledTimes(1)
    expect(tools.concatWithAudio).not.toHaveBeenCalled()
    expect(await getChunkRecord(job.workDir, 0)).not.toHaveProperty('error')
    await expect(fsp.stat(join(root, 'work.lock'))).rejects.toMatchObject({ code: 'ENOENT' })
  })

  it('processes only the first chunks with maxChunks', async () => {
    const result = await processJob(makeJob(), options({ maxChunks: 1 }))
    expect(result.chunks).toHaveLength(1)
    expect(result.assembly.chunkPaths).toHaveLength(1)
    expect(result.assembly.missingFrom).toBe(1)
  })

  it('clamps a fixed chunk duration to the supported range', async () => {
    const result = await processJob(makeJob(), options({ chunkSeconds: 4 }))
    expect(result.plan).toEqual({ chunkSeconds: 10, totalChunks: 3 })
  })

  it('skips audio for a silent source', async () => {
    tools.probeVideo.mockResolvedValue({ ...SOURCE, hasAudio: false })
    const result = await processJob(makeJob(), options())
    expect(tools.extractAudioTrack).not.toHaveBeenCalled()
    expect(tools.concatWithAudio).toHaveBeenCalledWith(expect.any(String), undefined, result.assembly.outputPath)
  })
})

describe('processJob identity guard', () => {
  it('refuses a different scale factor without touching existing chunks', async () => {
    await processJob(makeJob(2), options())
    const finals = [0, 1, 2].map((i) => chunkPaths(join(root, 'work'), i, '.mp4').final)
    vi.clearAllMocks()

    await expect(processJob(makeJob(4), options())).rejects.toBeInstanceOf(JobConflictError)

    expect(tools.probeVideo).not.toHaveBeenCalled()
    expect(totalToolCalls()).toBe(0)
    for (const f of finals) {
      expect(await fsp.readFile(f, 'utf-8')).toBe(`final ${basename(f)}`)
    }
    await expect(fsp.stat(join(root, 'work.lock'))).rejects.toMatchObject({ code: 'ENOENT' })
  })

  it('starts over after a confirmed discard', async () => {
    await processJob(makeJob(2), options())
    vi.clearAllMocks()
    const confirmDiscard = vi.fn().mockResolvedValue(true)

    const result = await processJob(makeJob(4), options({ conflictPolicy: 'prompt', confirmDiscard }))

    expect(confirmDiscard).toHaveBeenCalledTimes(1)
    expect(result.chunks.map((c) => c.outcome)).toEqual(['processed', 'processed', 'processed'])
    expect(result.assembly.outputPath).toBe(join(root, 'out', 'trip_x4_FINAL.mkv'))
  })
})
