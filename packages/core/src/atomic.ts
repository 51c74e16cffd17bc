/**
 * Atomic file and directory publishing
 *
 * WHY: Outputs, cache entries and distribution trees are shared between
 * concurrent targets and later runs. Everything is written beside its final
 * location first and renamed into place, so readers see either the previous
 * tree or the complete new one and a cancelled step leaves nothing behind.
 */

import * as crypto from 'node:crypto'
import * as fs from 'node:fs'
import * as path from 'node:path'

export interface AtomicWriteOptions {
  /** File mode (default: 0o644) */
  mode?: number | undefined
  /** Whether to fsync before rename (default: true) */
  fsync?: boolean | undefined
}

/**
 * Sibling path used for staging `target`, hidden and unique per call.
 */
export function stagingPath(target: string, suffix = '.tmp'): string {
  const rand = crypto.randomBytes(6).toString('hex')
  return path.join(path.dirname(target), `.${path.basename(target)}.${rand}${suffix}`)
}

/**
 * Write content to a file atomically
 *
 * @param filePath - Target file path
 * @param content - Content to write (string or Buffer)
 */
export async function atomicWrite(
  filePath: string,
  content: string | Buffer,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const mode = options.mode ?? 0o644
  const fsync = options.fsync ?? true

  await fs.promises.mkdir(path.dirname(filePath), { recursive: true })
  const tmpPath = stagingPath(filePath)

  try {
    await fs.promises.writeFile(tmpPath, content, { mode })
    if (fsync) {
      const fd = await fs.promises.open(tmpPath, 'r')
      try {
        await fd.sync()
      } finally {
        await fd.close()
      }
    }
    await fs.promises.rename(tmpPath, filePath)
  } catch (err) {
    await fs.promises.rm(tmpPath, { force: true })
    throw err
  }
}

/**
 * Write JSON content to a file atomically (pretty-printed)
 */
export async function atomicWriteJson(
  filePath: string,
  data: unknown,
  options: AtomicWriteOptions = {}
): Promise<void> {
  await atomicWrite(filePath, `${JSON.stringify(data, null, 2)}\n`, options)
}

// ============================================================================
// Atomic directory operations
// ============================================================================

/**
 * Build a directory in a staging sibling and rename it over `targetDir`.
 *
 * The staging directory is removed when `createFn` throws; an existing
 * `targetDir` is only replaced once `createFn` has completed.
 *
 * @param targetDir - Final directory path
 * @param createFn - Populates the staging directory
 */
export async function atomicDir<T>(
  targetDir: string,
  createFn: (stagingDir: string) => Promise<T>
): Promise<T> {
  const tmpDir = stagingPath(targetDir)
  await fs.promises.mkdir(tmpDir, { recursive: true })

  try {
    const result = await createFn(tmpDir)
    await publishDir(tmpDir, targetDir)
    return result
  } catch (err) {
    await fs.promises.rm(tmpDir, { recursive: true, force: true })
    throw err
  }
}

/**
 * Move a fully written directory into place, replacing what was there.
 *
 * The previous tree is renamed aside, never deleted in place, and is put back
 * when the new tree cannot be moved in.
 */
export async function publishDir(sourceDir: string, targetDir: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(targetDir), { recursive: true })
  const previous = stagingPath(targetDir, '.old')
  let replaced = true
  try {
    await fs.promises.rename(targetDir, previous)
  } catch (err) {
    if ((err as NodeJS.ErrnoException | undefined)?.code !== 'ENOENT') throw err
    replaced = false
  }

  try {
    await fs.promises.rename(sourceDir, targetDir)
  } catch (err) {
    if (replaced) await fs.promises.rename(previous, targetDir)
    throw err
  }
  if (replaced) await fs.promises.rm(previous, { recursive: true, force: true })
}

// ============================================================================
// Copy utilities
// ============================================================================

/**
 * Copy a file, preserving mode and creating parent directories
 */
export async function copyFile(src: string, dest: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(dest), { recursive: true })
  await fs.promises.copyFile(src, dest)
  const srcStat = await fs.promises.stat(src)
  await fs.promises.chmod(dest, srcStat.mode)
}

/**
 * Recursively copy a directory, optionally skipping top-level entries
 *
 * @param src - Source directory path
 * @param dest - Destination directory path
 * @param options.exclude - Names skipped at the top level of `src`
 */
export async function copyDir(
  src: string,
  dest: string,
  options: { exclude?: readonly string[] | undefined } = {}
): Promise<void> {
  await fs.promises.mkdir(dest, { recursive: true })
  const exclude = new Set(options.exclude ?? [])

  for (const entry of await fs.promises.readdir(src, { withFileTypes: true })) {
    if (exclude.has(entry.name)) continue
    const srcPath = path.join(src, entry.name)
    const destPath = path.join(dest, entry.name)

    if (entry.isDirectory()) {
      await copyDir(srcPath, destPath)
    } else if (entry.isFile()) {
      await copyFile(srcPath, destPath)
    } else if (entry.isSymbolicLink()) {
      await fs.promises.symlink(await fs.promises.readlink(srcPath), destPath)
    }
  }
}

/**
 * Whether a path exists (file, directory or link)
 */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.promises.lstat(target)
    return true
  } catch {
    return false
  }
}
