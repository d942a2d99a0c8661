#!/usr/bin/env node
import { Command, Option } from '../L1-infra/cli/cli.js'
import { initConfig, getConfig } from '../L1-infra/config/environment.js'
import logger, { setVerbose, sanitizeForLog } from '../L1-infra/logger/configLogger.js'
import { readTextFileSync, fileExistsSync } from '../L1-infra/fileSystem/fileSystem.js'
import { askYesNo } from '../L1-infra/readline/readline.js'
import { projectRoot, join, resolve } from '../L1-infra/paths/paths.js'
import { processJob } from '../L6-pipeline/pipeline.js'
import { errorMessage, JobConflictError } from '../L0-pure/errors/errors.js'
import { runDoctor } from './commands/doctor.js'
import { runStatus } from './commands/status.js'
import { installInterruptHandlers } from './interrupt.js'
import {
  parseScale,
  parsePositiveInt,
  parseMinutes,
  parseFailureMode,
  selectConflictPolicy,
} from './options.js'
import type { ChunkFailureMode, ConfirmDiscard, Job, ScaleFactor } from '../L0-pure/types/index.js'

function readVersion(): string {
  const pkg: unknown = JSON.parse(readTextFileSync(join(projectRoot(), 'package.json')))
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0'
}

interface ProcessCommandOptions {
  scale: ScaleFactor
  force?: boolean
  workDir?: string
  outputDir?: string
  chunkSeconds?: number
  maxChunks?: number
  toolTimeout?: number
  deinterlace?: boolean
  onChunkFailure: ChunkFailureMode
  verbose?: boolean
}

interface WorkDirCommandOptions {
  workDir?: string
}

const confirmDiscard: ConfirmDiscard = (conflict) => {
  const what = conflict.reason === 'corrupt' ? 'an unreadable job record' : 'data from a different job'
  return askYesNo(`The working directory contains ${what}. Discard it and start over?`)
}

async function runProcess(input: string, opts: ProcessCommandOptions): Promise<void> {
  initConfig({
    workDir: opts.workDir,
    outputDir: opts.outputDir,
    toolTimeoutMinutes: opts.toolTimeout,
    verbose: opts.verbose,
  })
  const config = getConfig()
  if (config.VERBOSE) setVerbose()

  const sourcePath = resolve(input)
  if (!fileExistsSync(sourcePath)) {
    logger.error(`Input video not found: ${sanitizeForLog(sourcePath)}`)
    process.exitCode = 1
    return
  }

  const job: Job = {
    sourcePath,
    scaleFactor: opts.scale,
    workDir: resolve(config.WORK_DIR),
    outputDir: resolve(config.OUTPUT_DIR),
  }

  installInterruptHandlers()
  try {
    const result = await processJob(job, {
      conflictPolicy: selectConflictPolicy(opts.force ?? false, process.stdin.isTTY === true),
      confirmDiscard,
      chunkSeconds: opts.chunkSeconds,
      maxChunks: opts.maxChunks,
      onChunkFailure: opts.onChunkFailure,
      deinterlace: opts.deinterlace ?? false,
    })
    const { assembly } = result
    console.log(`\n--- SUCCESS! ---\nFinal video saved to: ${assembly.outputPath}`)
    if (assembly.missingFrom !== undefined) {
      console.log(`Note: ${assembly.chunkPaths.length} of ${assembly.totalChunks} chunks included; rerun to finish the rest.`)
    }
  } catch (err: unknown) {
    if (err instanceof JobConflictError) {
      logger.error(`${err.message}. Use --force to discard, or choose another --work-dir.`)
    } else {
      logger.error(`Pipeline failed: ${errorMessage(err)}`)
    }
    process.exitCode = 1
  }
}

const program = new Command()

program
  .name('reelforge')
  .description('Chunked, resumable video upscaling (Real-ESRGAN) and frame interpolation (RIFE)')
  .version(readVersion(), '-V, --version')

program
  .command('process <input-video>', { isDefault: true })
  .description('Upscale and interpolate a video, resuming any previous run in the working directory')
  .addOption(new Option('-s, --scale <factor>', 'upscale factor').choices(['2', '4']).default(2).argParser(parseScale))
  .option('-f, --force', 'discard a working directory that belongs to a different job without asking')
  .option('--work-dir <path>', 'working directory for chunk state (env WORK_DIR, default ./processing_chunks)')
  .option('--output-dir <path>', 'directory for the final video (env OUTPUT_DIR, default ./outputs)')
  .option('--chunk-seconds <n>', 'fixed chunk duration instead of the disk-based estimate', parsePositiveInt)
  .option('--max-chunks <n>', 'only process the first n chunks', parsePositiveInt)
  .option('--tool-timeout <minutes>', 'per-invocation timeout for external tools (0 = none)', parseMinutes)
  .option('--deinterlace', 'deinterlace (bwdif) before denoising')
  .addOption(
    new Option('--on-chunk-failure <mode>', 'abort the job or skip the chunk when a chunk fails')
      .choices(['abort', 'skip'])
      .default('abort')
      .argParser(parseFailureMode),
  )
  .option('-v, --verbose', 'debug logging')
  .action(async (input: string, opts: ProcessCommandOptions) => {
    await runProcess(input, opts)
  })

program
  .command('status')
  .description('Show the job, split plan and per-chunk progress of a working directory')
  .option('--work-dir <path>', 'working directory (env WORK_DIR, default ./processing_chunks)')
  .action(async (opts: WorkDirCommandOptions) => {
    const config = initConfig({ workDir: opts.workDir })
    await runStatus(resolve(config.WORK_DIR))
  })

program
  .command('doctor')
  .description('Check that ffmpeg, ffprobe, Real-ESRGAN and RIFE can be found')
  .action(() => {
    initConfig()
    process.exitCode = runDoctor()
  })

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.error(errorMessage(err))
  process.exitCode = 1
})
