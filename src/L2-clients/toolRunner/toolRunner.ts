import { execCommand } from '../../L1-infra/process/process.js'
import type { ExecResult } from '../../L1-infra/process/process.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { ToolError, ToolInterruptedError } from '../../L0-pure/errors/errors.js'

/**
 * Run an external tool with the configured timeout.
 *
 * On failure the tool's captured stdout and stderr are logged verbatim before
 * the {@link ToolError} propagates. GPU and model failures leave no other
 * diagnostic.
 */
export async function runTool(label: string, cmd: string, args: string[], cwd?: string): Promise<ExecResult> {
  const { TOOL_TIMEOUT_MS } = getConfig()
  logger.debug(`[${label}] ${cmd} ${args.join(' ')}`)
  try {
    return await execCommand(cmd, args, { cwd, timeoutMs: TOOL_TIMEOUT_MS })
  } catch (err: unknown) {
    if (err instanceof ToolError && !(err instanceof ToolInterruptedError)) {
      logger.error(`--- ERROR: ${label} failed ---\n${err.message}\nSTDOUT: ${err.stdout}\nSTDERR: ${err.stderr}`)
    }
    throw err
  }
}
