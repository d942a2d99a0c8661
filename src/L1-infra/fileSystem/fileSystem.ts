import { promises as fsp, existsSync, readFileSync, unlinkSync } from 'fs'
import type { Stats } from 'fs'
import { dirname, basename, join } from '../paths/paths.js'

export type { Stats }

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code
}

export function isNotFound(err: unknown): boolean {
  return isErrnoCode(err, 'ENOENT')
}

export function isAlreadyExists(err: unknown): boolean {
  return isErrnoCode(err, 'EEXIST')
}

// ── Reads ──────────────────────────────────────────────────────

/** Read and parse a JSON file. Throws descriptive error on ENOENT or parse failure. */
export async function readJsonFile<T>(filePath: string, defaultValue?: T): Promise<T> {
  let raw: string
  try {
    raw = await fsp.readFile(filePath, 'utf-8')
  } catch (err: unknown) {
    if (isNotFound(err)) {
      if (defaultValue !== undefined) return defaultValue
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
  try {
    return JSON.parse(raw)
  } catch (err: unknown) {
    throw new Error(`Failed to parse JSON at ${filePath}: ${err instanceof Error ? err.message : String(err)}`)
  }
}

/** Read a UTF-8 text file synchronously, for startup paths such as reading package.json. */
export function readTextFileSync(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8')
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

/** List directory contents. Throws "Directory not found: <path>" on ENOENT. */
export async function listDirectory(dirPath: string): Promise<string[]> {
  try {
    return await fsp.readdir(dirPath)
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`Directory not found: ${dirPath}`)
    }
    throw err
  }
}

/** List directory contents; a missing directory lists as empty. */
export async function listDirectoryOrEmpty(dirPath: string): Promise<string[]> {
  try {
    return await fsp.readdir(dirPath)
  } catch (err: unknown) {
    if (isNotFound(err)) return []
    throw err
  }
}

/** Check if file/dir exists (async, using stat). */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsp.stat(filePath)
    return true
  } catch {
    return false
  }
}

/** Check if file/dir exists (sync). */
export function fileExistsSync(filePath: string): boolean {
  return existsSync(filePath)
}

/** Size in bytes of a regular file, or `undefined` when there is no such file. */
export async function getFileSize(filePath: string): Promise<number | undefined> {
  try {
    const stats = await fsp.stat(filePath)
    return stats.isFile() ? stats.size : undefined
  } catch (err: unknown) {
    if (isNotFound(err)) return undefined
    throw err
  }
}

/** True when `filePath` is a regular file with at least one byte. */
export async function isNonEmptyFile(filePath: string): Promise<boolean> {
  const size = await getFileSize(filePath)
  return size !== undefined && size > 0
}

/** Free bytes available to this user on the filesystem holding `dirPath`. */
export async function getFreeDiskBytes(dirPath: string): Promise<number> {
  const stats = await fsp.statfs(dirPath)
  return stats.bavail * stats.bsize
}

// ── Writes ─────────────────────────────────────────────────────

/**
 * Write data as JSON. Creates parent dirs. The file is written under a
 * sibling temp name and renamed into place, so readers never see half a record.
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  const dir = dirname(filePath)
  await fsp.mkdir(dir, { recursive: true })
  const tempPath = join(dir, `.${basename(filePath)}.${process.pid}.tmp`)
  await fsp.writeFile(tempPath, JSON.stringify(data, null, 2), { encoding: 'utf-8', mode: 0o600 })
  await fsp.rename(tempPath, filePath)
}

/** Write text file. Creates parent dirs. */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await fsp.mkdir(dirname(filePath), { recursive: true })
  await fsp.writeFile(filePath, content.replace(/\0/g, ''), { encoding: 'utf-8', mode: 0o600 })
}

/** Write file with raw options (flag, mode, etc.), e.g. `wx` for exclusive creation. */
export async function writeFileRaw(
  filePath: string,
  data: string,
  opts: { encoding?: BufferEncoding; flag?: string; mode?: number },
): Promise<void> {
  await fsp.writeFile(filePath, data, opts)
}

/** Ensure directory exists (recursive). */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsp.mkdir(dirPath, { recursive: true })
}

/** Remove a directory's contents by recreating it empty. */
export async function resetDirectory(dirPath: string): Promise<void> {
  await removeDirectory(dirPath, { recursive: true, force: true })
  await fsp.mkdir(dirPath, { recursive: true })
}

/** Copy file. Ensures destination parent dir exists. */
async function copyFile(src: string, dest: string): Promise<void> {
  await fsp.mkdir(dirname(dest), { recursive: true })
  await fsp.copyFile(src, dest)
}

/** Move/rename file. Falls back to copy+delete on EXDEV. */
export async function moveFile(src: string, dest: string): Promise<void> {
  await fsp.mkdir(dirname(dest), { recursive: true })
  try {
    await fsp.rename(src, dest)
  } catch (err: unknown) {
    if (isErrnoCode(err, 'EXDEV')) {
      await copyFile(src, dest)
      await removeFile(src)
      return
    }
    throw err
  }
}

/** Rename a directory in place (same filesystem). Replaces nothing: `dest` must not exist. */
export async function renameDirectory(src: string, dest: string): Promise<void> {
  await fsp.rename(src, dest)
}

/** Remove file (ignores ENOENT). */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fsp.unlink(filePath)
  } catch (err: unknown) {
    if (isNotFound(err)) return
    throw err
  }
}

/** Sync variant of removeFile, for exit handlers. */
export function removeFileSync(filePath: string): void {
  try {
    unlinkSync(filePath)
  } catch (err: unknown) {
    if (isNotFound(err)) return
    throw err
  }
}

/** Remove directory. */
export async function removeDirectory(
  dirPath: string,
  opts?: { recursive?: boolean; force?: boolean },
): Promise<void> {
  try {
    await fsp.rm(dirPath, { recursive: opts?.recursive ?? false, force: opts?.force ?? false })
  } catch (err: unknown) {
    if (isNotFound(err)) return
    throw err
  }
}
