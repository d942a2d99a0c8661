import { createInterface, type Interface } from 'node:readline'

export interface PromptInterfaceOptions {
  input?: NodeJS.ReadableStream
  output?: NodeJS.WritableStream
}

/**
 * Creates a readline interface for one-off operator prompts.
 * Uses `terminal: false` to prevent double-echo on Windows.
 */
export function createPromptInterface(options?: PromptInterfaceOptions): Interface {
  return createInterface({
    input: options?.input ?? process.stdin,
    output: options?.output ?? process.stdout,
    terminal: false,
  })
}

/** Ask a y/n question. Only "y" or "yes" counts as yes; EOF counts as no. */
export function askYesNo(question: string, options?: PromptInterfaceOptions): Promise<boolean> {
  const rl = createPromptInterface(options)
  return new Promise((resolve) => {
    let answered = false
    rl.on('close', () => {
      if (!answered) resolve(false)
    })
    rl.question(`${question} (y/n): `, (answer) => {
      answered = true
      rl.close()
      resolve(['y', 'yes'].includes(answer.trim().toLowerCase()))
    })
  })
}
