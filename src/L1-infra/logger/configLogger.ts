import winston from 'winston'
import { join } from '../paths/paths.js'

/**
 * Sanitize user input for logging to prevent log injection.
 * Escapes newlines, carriage returns and tabs.
 */
export function sanitizeForLog(value: unknown): string {
  if (value === null || value === undefined) return String(value)
  const str = String(value)
  return str.replace(/[\r\n\t]/g, (c) => {
    switch (c) {
      case '\r': return '\\r'
      case '\n': return '\\n'
      case '\t': return '\\t'
      default: return c
    }
  })
}

const LOG_FORMAT = winston.format.combine(
  winston.format.timestamp(),
  winston.format.printf(({ timestamp, level, message }) => {
    return `${String(timestamp)} [${level.toUpperCase()}]: ${String(message)}`
  })
)

const consoleTransport = new winston.transports.Console()

const logger = winston.createLogger({
  level: 'info',
  format: LOG_FORMAT,
  transports: [consoleTransport],
})

export function setVerbose(): void {
  logger.level = 'debug'
}

// ── Pipe stack ───────────────────────────────────────────────────────────────

const PIPE_LOG_FILE = 'pipeline.log'

const pipeStack: winston.transports.FileTransportInstance[] = []

/**
 * Push a file transport that mirrors all log output to `{folder}/pipeline.log`.
 * Supports nesting: each pushPipe adds a new file, popPipe removes the most recent.
 */
export function pushPipe(folder: string): void {
  const transport = new winston.transports.File({
    filename: join(folder, PIPE_LOG_FILE),
    format: LOG_FORMAT,
  })
  pipeStack.push(transport)
  logger.add(transport)
}

/** Remove the most recently pushed file transport. */
export function popPipe(): void {
  const transport = pipeStack.pop()
  if (transport) {
    logger.remove(transport)
  }
}

export default logger
