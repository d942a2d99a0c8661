import { join, basename, extname } from 'path'
import type { ChunkPaths, ScaleFactor } from '../types/index.js'

// ── Working-directory layout ─────────────────────────────────────────────────

export const INPUT_CHUNKS_DIR = '0_input_chunks'
export const ENHANCED_CHUNKS_DIR = '1_enhanced_chunks'
export const INTERPOLATED_CHUNKS_DIR = '2_interpolated_chunks'
export const IDENTITY_FILE = 'job.json'
export const LEDGER_FILE = 'chunk-ledger.json'
export const CONCAT_LIST_FILE = 'concat_list.txt'

/** Marker inserted before the extension of files still being written. */
export const PARTIAL_MARKER = '.partial'

/** Minimum digits in a chunk's sequence number (`chunk_007`). */
export const CHUNK_INDEX_WIDTH = 3

export const ENHANCED_OUTPUT_SUFFIX = 'out'

export function chunkName(index: number): string {
  return `chunk_${String(index).padStart(CHUNK_INDEX_WIDTH, '0')}`
}

/** ffmpeg segment muxer pattern producing the same names as {@link chunkName}. */
export function segmentPattern(dir: string, ext: string): string {
  return join(dir, `chunk_%0${CHUNK_INDEX_WIDTH}d${ext}`)
}

export function inputChunksDir(workDir: string): string {
  return join(workDir, INPUT_CHUNKS_DIR)
}

export function chunkPaths(workDir: string, index: number, sourceExt: string): ChunkPaths {
  const name = chunkName(index)
  const enhancedDir = join(workDir, ENHANCED_CHUNKS_DIR)
  const interpolatedDir = join(workDir, INTERPOLATED_CHUNKS_DIR)
  const scratchDir = join(enhancedDir, `${name}_work`)
  return {
    index,
    name,
    inputSegment: join(inputChunksDir(workDir), `${name}${sourceExt}`),
    scratchDir,
    prefiltered: join(scratchDir, `${name}_prefiltered.mp4`),
    enhanced: join(enhancedDir, `${name}_enhanced.mp4`),
    framesIn: join(enhancedDir, `${name}_frames_in`),
    framesOut: join(interpolatedDir, `${name}_frames_out`),
    final: join(interpolatedDir, `${name}_final.mp4`),
  }
}

/** `/a/b/clip.mp4` → `/a/b/clip.partial.mp4`; keeps the extension ffmpeg keys its muxer on. */
export function partialPath(filePath: string): string {
  const ext = extname(filePath)
  return `${filePath.slice(0, filePath.length - ext.length)}${PARTIAL_MARKER}${ext}`
}

export function sourceStem(sourcePath: string): string {
  return basename(sourcePath, extname(sourcePath))
}

/** Matroska audio accepts any source codec under stream copy. */
export function originalAudioPath(workDir: string, sourcePath: string): string {
  return join(workDir, `${sourceStem(sourcePath)}_original.mka`)
}

export function finalVideoPath(outputDir: string, sourcePath: string, scaleFactor: ScaleFactor): string {
  return join(outputDir, `${sourceStem(sourcePath)}_x${scaleFactor}_FINAL.mkv`)
}

export function lockPath(workDir: string): string {
  return `${workDir.replace(/[\\/]+$/, '')}.lock`
}

// ── Concatenation list ───────────────────────────────────────────────────────

/** Quote a path for the ffmpeg concat demuxer. */
export function quoteConcatPath(filePath: string): string {
  return `'${filePath.replace(/'/g, `'\\''`)}'`
}

export function buildConcatList(chunkFiles: readonly string[]): string {
  return chunkFiles.map((f) => `file ${quoteConcatPath(f)}\n`).join('')
}

// ── Enhancement output discovery ─────────────────────────────────────────────

/**
 * Pick the super-resolution output among the scratch directory's files.
 * Files named `*_out.mp4` win; otherwise every `.mp4` except the pre-filtered
 * input is a candidate. Returns all candidates; the caller requires exactly one.
 */
export function enhancedOutputCandidates(entries: readonly string[], prefilteredName: string): string[] {
  const videos = entries.filter((f) => f.toLowerCase().endsWith('.mp4') && !f.includes(PARTIAL_MARKER))
  const suffixed = videos.filter((f) => f.toLowerCase().endsWith(`_${ENHANCED_OUTPUT_SUFFIX}.mp4`))
  if (suffixed.length > 0) return suffixed
  return videos.filter((f) => f !== prefilteredName)
}
