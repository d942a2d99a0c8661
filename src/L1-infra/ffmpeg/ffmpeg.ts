import fluentFfmpeg from 'fluent-ffmpeg'

export { fluentFfmpeg }
export type { FfprobeData, FfprobeStream } from 'fluent-ffmpeg'
