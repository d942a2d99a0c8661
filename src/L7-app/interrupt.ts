import logger from '../L1-infra/logger/configLogger.js'
import { terminateRunningTools } from '../L1-infra/process/process.js'
import { errorMessage } from '../L0-pure/errors/errors.js'

export const EXIT_INTERRUPTED = 130

/**
 * Stop the running tool, wait for it to exit, then exit with 130. The work
 * lock is released by the pipeline's `exit` listener, so no tool outlives it.
 */
export async function handleInterrupt(
  signal: NodeJS.Signals,
  exit: (code: number) => void = (code) => process.exit(code),
): Promise<void> {
  logger.warn(`\n${signal} received. Stopping; finished chunks are kept and the next run resumes from them.`)
  try {
    const stopped = await terminateRunningTools()
    if (stopped > 0) logger.info(`Stopped ${stopped} running tool${stopped === 1 ? '' : 's'}`)
  } catch (err: unknown) {
    logger.error(`Could not stop running tools: ${errorMessage(err)}`)
  }
  exit(EXIT_INTERRUPTED)
}

export function installInterruptHandlers(): void {
  const onSignal = (signal: NodeJS.Signals): void => {
    handleInterrupt(signal).catch((err: unknown) => {
      logger.error(`Interrupt handling failed: ${errorMessage(err)}`)
      process.exit(EXIT_INTERRUPTED)
    })
  }
  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)
}
