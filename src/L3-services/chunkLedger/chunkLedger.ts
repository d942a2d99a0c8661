import { readJsonFile, writeJsonFile, getFileSize } from '../../L1-infra/fileSystem/fileSystem.js'
import { join } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { LEDGER_FILE, chunkName } from '../../L0-pure/chunks/layout.js'
import { errorMessage } from '../../L0-pure/errors/errors.js'
import type { ChunkStage, SplitPlan } from '../../L0-pure/types/index.js'

// ── Types ────────────────────────────────────────────────────────────────────

export interface StageRecord {
  completedAt: string
  /** Size of the stage's output when it was recorded. */
  bytes: number
}

export interface ChunkRecord {
  stages: Partial<Record<ChunkStage, StageRecord>>
  failedAt?: string
  error?: string
}

export interface RecordedPlan extends SplitPlan {
  splitAt: string
}

export interface AssemblyRecord {
  outputPath: string
  bytes: number
  /** Sizes of the chunk videos concatenated, in order. */
  chunkBytes: number[]
  completedAt: string
}

export interface ChunkLedgerData {
  plan?: RecordedPlan
  chunks: Record<string, ChunkRecord>
  assembly?: AssemblyRecord
}

// ── Read / Write ─────────────────────────────────────────────────────────────

function ledgerPath(workDir: string): string {
  return join(workDir, LEDGER_FILE)
}

function emptyLedger(): ChunkLedgerData {
  return { chunks: {} }
}

function isLedgerData(value: unknown): value is ChunkLedgerData {
  return typeof value === 'object' && value !== null && 'chunks' in value &&
    typeof value.chunks === 'object' && value.chunks !== null
}

/**
 * Read the ledger. A missing or unreadable ledger reads as empty: the artifacts
 * on disk remain the source of truth and are re-checked without it.
 */
export async function readLedger(workDir: string): Promise<ChunkLedgerData> {
  let raw: unknown
  try {
    raw = await readJsonFile<unknown>(ledgerPath(workDir), emptyLedger())
  } catch (err: unknown) {
    logger.warn(`[ChunkLedger] Ignoring unreadable ledger: ${errorMessage(err)}`)
    return emptyLedger()
  }
  if (!isLedgerData(raw)) {
    logger.warn(`[ChunkLedger] Ignoring malformed ledger at ${ledgerPath(workDir)}`)
    return emptyLedger()
  }
  return raw
}

async function writeLedger(workDir: string, ledger: ChunkLedgerData): Promise<void> {
  await writeJsonFile(ledgerPath(workDir), ledger)
}

async function updateChunk(workDir: string, index: number, fn: (record: ChunkRecord) => ChunkRecord): Promise<void> {
  const ledger = await readLedger(workDir)
  const key = chunkName(index)
  ledger.chunks[key] = fn(ledger.chunks[key] ?? { stages: {} })
  await writeLedger(workDir, ledger)
}

// ── Public API ───────────────────────────────────────────────────────────────

/** The split plan recorded when the source was last cut into segments. */
export async function getPlan(workDir: string): Promise<RecordedPlan | undefined> {
  const { plan } = await readLedger(workDir)
  return plan
}

export async function recordPlan(workDir: string, plan: SplitPlan): Promise<void> {
  const ledger = await readLedger(workDir)
  ledger.plan = { ...plan, splitAt: new Date().toISOString() }
  await writeLedger(workDir, ledger)
  logger.info(`[ChunkLedger] Recorded split plan: ${plan.totalChunks} × ${plan.chunkSeconds}s`)
}

export async function getChunkRecord(workDir: string, index: number): Promise<ChunkRecord | undefined> {
  const ledger = await readLedger(workDir)
  return ledger.chunks[chunkName(index)]
}

/**
 * Record that `stage` of chunk `index` produced `filePath`. A new final video
 * invalidates the assembly record, since the output no longer holds it.
 */
export async function recordStage(workDir: string, index: number, stage: ChunkStage, filePath: string): Promise<void> {
  const bytes = await getFileSize(filePath)
  if (bytes === undefined) throw new Error(`Cannot record ${stage} for ${chunkName(index)}: ${filePath} is missing`)
  const ledger = await readLedger(workDir)
  const key = chunkName(index)
  const record = ledger.chunks[key] ?? { stages: {} }
  ledger.chunks[key] = {
    stages: { ...record.stages, [stage]: { completedAt: new Date().toISOString(), bytes } },
  }
  if (stage === 'final') delete ledger.assembly
  await writeLedger(workDir, ledger)
  logger.debug(`[ChunkLedger] ${chunkName(index)} ${stage} complete (${bytes} bytes)`)
}

export async function recordFailure(workDir: string, index: number, error: string): Promise<void> {
  await updateChunk(workDir, index, (record) => ({
    ...record,
    failedAt: new Date().toISOString(),
    error,
  }))
  logger.info(`[ChunkLedger] Marked failed: ${chunkName(index)}: ${error}`)
}

/**
 * A stage is complete when its output exists and is non-empty. If the ledger
 * holds a record for it, the size must also still match that record.
 */
export async function isStageComplete(
  workDir: string,
  index: number,
  stage: ChunkStage,
  filePath: string,
): Promise<boolean> {
  const size = await getFileSize(filePath)
  if (size === undefined || size === 0) return false
  const record = (await getChunkRecord(workDir, index))?.stages[stage]
  if (record && record.bytes !== size) {
    logger.warn(
      `[ChunkLedger] ${chunkName(index)} ${stage} output is ${size} bytes but ${record.bytes} were recorded; treating it as unfinished`,
    )
    return false
  }
  return true
}

export async function recordAssembly(workDir: string, outputPath: string, chunkFiles: readonly string[]): Promise<void> {
  const bytes = await getFileSize(outputPath)
  if (bytes === undefined) throw new Error(`Cannot record assembly: ${outputPath} is missing`)
  const chunkBytes: number[] = []
  for (const file of chunkFiles) chunkBytes.push((await getFileSize(file)) ?? 0)
  const ledger = await readLedger(workDir)
  ledger.assembly = { outputPath, bytes, chunkBytes, completedAt: new Date().toISOString() }
  await writeLedger(workDir, ledger)
}

/**
 * True when `outputPath` is the recorded assembly of exactly these chunk
 * videos: same output size, same chunk count and chunk sizes.
 */
export async function isAssemblyCurrent(
  workDir: string,
  outputPath: string,
  chunkFiles: readonly string[],
): Promise<boolean> {
  const { assembly } = await readLedger(workDir)
  if (!assembly || assembly.outputPath !== outputPath) return false
  if ((await getFileSize(outputPath)) !== assembly.bytes) return false
  if (assembly.chunkBytes.length !== chunkFiles.length) return false
  for (let i = 0; i < chunkFiles.length; i++) {
    if ((await getFileSize(chunkFiles[i])) !== assembly.chunkBytes[i]) return false
  }
  return true
}
