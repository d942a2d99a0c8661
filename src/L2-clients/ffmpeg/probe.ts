import { ffprobe } from './ffmpeg.js'
import type { FfprobeData } from '../../L1-infra/ffmpeg/ffmpeg.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { ProbeError, errorMessage } from '../../L0-pure/errors/errors.js'
import type { VideoInfo } from '../../L0-pure/types/index.js'

/**
 * Parse an ffprobe frame rate: a rational (`30000/1001`) or a decimal (`25`).
 * Returns `undefined` for `0/0`, empty, zero or otherwise unusable values.
 */
export function parseFrameRate(raw: string | undefined): number | undefined {
  if (!raw) return undefined
  const text = raw.trim()
  let value: number
  if (text.includes('/')) {
    const [num, den] = text.split('/').map(Number)
    if (!Number.isFinite(num) || !Number.isFinite(den) || den === 0) return undefined
    value = num / den
  } else {
    value = Number(text)
  }
  return Number.isFinite(value) && value > 0 ? value : undefined
}

function parseDuration(raw: unknown): number | undefined {
  const value = typeof raw === 'number' ? raw : typeof raw === 'string' ? Number.parseFloat(raw) : Number.NaN
  return Number.isFinite(value) && value > 0 ? value : undefined
}

/** Reduce raw ffprobe output to the properties the pipeline needs. */
export function toVideoInfo(filePath: string, data: FfprobeData): VideoInfo {
  const video = data.streams.find((s) => s.codec_type === 'video')
  if (!video) throw new ProbeError(filePath, 'no video stream')

  let fps = parseFrameRate(video.r_frame_rate)
  if (fps === undefined) {
    logger.warn(`Could not detect r_frame_rate for ${filePath}, falling back to avg_frame_rate`)
    fps = parseFrameRate(video.avg_frame_rate)
  }
  if (fps === undefined) throw new ProbeError(filePath, 'no usable frame rate')

  const duration = parseDuration(data.format.duration) ?? parseDuration(video.duration)
  if (duration === undefined) throw new ProbeError(filePath, 'no usable duration')

  const { width, height } = video
  if (!width || !height) throw new ProbeError(filePath, 'missing frame dimensions')

  return {
    duration,
    fps,
    fpsText: fps.toFixed(3),
    width,
    height,
    pixelFormat: video.pix_fmt,
    codecName: video.codec_name,
    hasAudio: data.streams.some((s) => s.codec_type === 'audio'),
  }
}

/** Probe a video file for duration, frame rate, dimensions and audio presence. */
export async function probeVideo(filePath: string): Promise<VideoInfo> {
  let data: FfprobeData
  try {
    data = await ffprobe(filePath)
  } catch (err: unknown) {
    throw new ProbeError(filePath, errorMessage(err))
  }
  const info = toVideoInfo(filePath, data)
  logger.info(
    `Probed ${filePath}: ${info.duration.toFixed(2)}s, ${info.fpsText} FPS, ${info.width}x${info.height}` +
    `${info.hasAudio ? '' : ' (no audio)'}`,
  )
  return info
}
