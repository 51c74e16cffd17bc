/**
 * Content hashing for source trees, output trees and cache entries.
 *
 * WHY: Cache keys and distribution manifests must be identical for identical
 * content on every machine, so files are listed with `/` separators, sorted
 * in code-unit order, and hashed without timestamps.
 */

import { createHash } from 'node:crypto'
import { type Dirent, createReadStream } from 'node:fs'
import { readdir, readlink } from 'node:fs/promises'
import { join } from 'node:path'

/** Names never hashed or listed, at any depth */
export const IGNORED_NAMES: readonly string[] = ['.git', '.svn', '.DS_Store']

export type Sha256Integrity = `sha256:${string}`

export interface TreeFile {
  /** Path relative to the tree root, `/`-separated */
  path: string
  /** Absolute path on disk */
  absolutePath: string
  kind: 'file' | 'symlink'
}

export interface ListTreeOptions {
  /** Relative paths (files or directories) left out */
  exclude?: readonly string[] | undefined
}

function byPath(a: { path: string }, b: { path: string }): number {
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0
}

/**
 * List every file and symlink below `root`, sorted by relative path.
 * A missing root yields an empty list.
 */
export async function listTreeFiles(root: string, options: ListTreeOptions = {}): Promise<TreeFile[]> {
  const exclude = new Set(options.exclude ?? [])
  const files: TreeFile[] = []

  const walk = async (dir: string, prefix: string): Promise<void> => {
    let entries: Dirent[]
    try {
      entries = await readdir(dir, { withFileTypes: true })
    } catch (err) {
      if (prefix === '' && (err as NodeJS.ErrnoException | undefined)?.code === 'ENOENT') return
      throw err
    }
    for (const entry of entries) {
      if (IGNORED_NAMES.includes(entry.name)) continue
      const rel = prefix === '' ? entry.name : `${prefix}/${entry.name}`
      if (exclude.has(rel)) continue
      const abs = join(dir, entry.name)
      if (entry.isDirectory()) {
        await walk(abs, rel)
      } else if (entry.isSymbolicLink()) {
        files.push({ path: rel, absolutePath: abs, kind: 'symlink' })
      } else if (entry.isFile()) {
        files.push({ path: rel, absolutePath: abs, kind: 'file' })
      }
    }
  }

  await walk(root, '')
  return files.sort(byPath)
}

/**
 * sha256 of a file's content, hex encoded.
 */
export function hashFile(path: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('sha256')
    createReadStream(path)
      .on('error', reject)
      .on('data', (chunk) => hash.update(chunk))
      .on('end', () => resolve(hash.digest('hex')))
  })
}

/**
 * sha256 of a tree file: content for files, target path for symlinks.
 */
export async function hashTreeFile(file: TreeFile): Promise<string> {
  if (file.kind === 'symlink') {
    return createHash('sha256').update(`symlink\0${await readlink(file.absolutePath)}`).digest('hex')
  }
  return hashFile(file.absolutePath)
}

export interface FileHash {
  path: string
  sha256: string
}

/**
 * Per-file hashes of a tree, sorted by path.
 */
export async function hashTreeFiles(root: string, options: ListTreeOptions = {}): Promise<FileHash[]> {
  const out: FileHash[] = []
  for (const file of await listTreeFiles(root, options)) {
    out.push({ path: file.path, sha256: await hashTreeFile(file) })
  }
  return out
}

/**
 * Combine file hashes into one integrity value.
 *
 * Formula:
 * sha256("tree-v1\0" + for each file (sorted by path): path + "\0" + sha256 + "\n")
 */
export function combineFileHashes(files: readonly FileHash[]): Sha256Integrity {
  const hash = createHash('sha256')
  hash.update('tree-v1\0')
  for (const file of [...files].sort(byPath)) {
    hash.update(`${file.path}\0${file.sha256}\n`)
  }
  return `sha256:${hash.digest('hex')}`
}

/**
 * Integrity of a whole directory tree.
 */
export async function computeTreeHash(
  root: string,
  options: ListTreeOptions = {}
): Promise<Sha256Integrity> {
  return combineFileHashes(await hashTreeFiles(root, options))
}

/**
 * Integrity of several trees, each under its own prefix.
 */
export async function computeTreesHash(
  trees: ReadonlyArray<{ prefix: string; root: string }>
): Promise<Sha256Integrity> {
  const files: FileHash[] = []
  for (const tree of trees) {
    for (const file of await hashTreeFiles(tree.root)) {
      files.push({ path: `${tree.prefix}/${file.path}`, sha256: file.sha256 })
    }
  }
  return combineFileHashes(files)
}
