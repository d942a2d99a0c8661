import { fileExists } from '../../L1-infra/fileSystem/fileSystem.js'
import { extname } from '../../L1-infra/paths/paths.js'
import { readStoredIdentity } from '../../L3-services/jobIdentity/jobIdentity.js'
import { isStageComplete, readLedger } from '../../L3-services/chunkLedger/chunkLedger.js'
import { chunkName, chunkPaths } from '../../L0-pure/chunks/layout.js'

const DONE = '✓'
const PENDING = '·'

/** Describe the state of `workDir` line by line. Reads only; nothing is written. */
export async function describeStatus(workDir: string): Promise<string[]> {
  const lines = [`Working directory: ${workDir}`]
  if (!(await fileExists(workDir))) {
    lines.push('  (does not exist)')
    return lines
  }

  const stored = await readStoredIdentity(workDir)
  if (stored.kind === 'absent') {
    lines.push('Job: none recorded')
    return lines
  }
  if (stored.kind === 'corrupt') {
    lines.push(`Job: record unreadable (${stored.error})`)
    return lines
  }
  const { identity } = stored
  lines.push(`Job: ${identity.sourcePath} (x${identity.scaleFactor})`)

  const ledger = await readLedger(workDir)
  if (!ledger.plan) {
    lines.push('Plan: not split yet')
    return lines
  }
  const { plan } = ledger
  lines.push(`Plan: ${plan.totalChunks} chunks of ${plan.chunkSeconds}s (split ${plan.splitAt})`)

  const ext = extname(identity.sourcePath)
  let finished = 0
  for (let i = 0; i < plan.totalChunks; i++) {
    const name = chunkName(i)
    const record = ledger.chunks[name]
    const finalDone = await isStageComplete(workDir, i, 'final', chunkPaths(workDir, i, ext).final)
    if (finalDone) finished++
    const enhanced = record?.stages.enhance ? DONE : PENDING
    const final = finalDone ? DONE : PENDING
    const failure = !finalDone && record?.error ? `  failed: ${record.error}` : ''
    lines.push(`  ${name}  enhance ${enhanced}  final ${final}${failure}`)
  }
  lines.push(`Finished: ${finished} / ${plan.totalChunks}`)
  return lines
}

export async function runStatus(workDir: string): Promise<void> {
  for (const line of await describeStatus(workDir)) {
    console.log(line)
  }
}
