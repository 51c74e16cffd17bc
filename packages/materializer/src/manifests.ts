/**
 * Reproducible distribution manifests.
 *
 * WHY: Downstream consumers and the build cache compare distributions byte
 * for byte. Both manifests list the tree in code-unit order of `/`-separated
 * paths and carry nothing but paths and content hashes:
 *
 *   sha256: `<hex>  <path>` per line
 *   files:  `<path>` per line
 *
 * The manifests themselves are never listed.
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { Platform } from '@suitecraft/core'
import { atomicWrite } from '@suitecraft/core'
import { type FileHash, hashTreeFiles } from '@suitecraft/store'

export const DEFAULT_HASH_ENTRY = 'sha256'
export const DEFAULT_FILE_LIST_ENTRY = 'files'

export interface ManifestPaths {
  /** Hash manifest path relative to the distribution root */
  hashEntry: string
  /** File-list manifest path relative to the distribution root */
  fileListEntry: string
}

export interface TreeManifest {
  files: FileHash[]
  /** Content of the hash manifest */
  sha256: string
  /** Content of the file-list manifest */
  fileList: string
}

/**
 * Replace `<os>` and `<arch>` and drop a leading `./`.
 */
export function substitutePlatform(pattern: string, platform: Platform): string {
  const substituted = pattern.replace(/<os>/g, platform.os).replace(/<arch>/g, platform.arch)
  return substituted.startsWith('./') ? substituted.slice(2) : substituted
}

/**
 * Manifest locations for a distribution on a platform.
 */
export function manifestPaths(
  entries: { hashEntry?: string | undefined; fileListEntry?: string | undefined },
  platform: Platform
): ManifestPaths {
  return {
    hashEntry: substitutePlatform(entries.hashEntry ?? DEFAULT_HASH_ENTRY, platform),
    fileListEntry: substitutePlatform(entries.fileListEntry ?? DEFAULT_FILE_LIST_ENTRY, platform),
  }
}

export function formatHashManifest(files: readonly FileHash[]): string {
  return files.map((f) => `${f.sha256}  ${f.path}\n`).join('')
}

export function formatFileList(files: readonly FileHash[]): string {
  return files.map((f) => `${f.path}\n`).join('')
}

/**
 * Hash a distribution tree, leaving its manifests out.
 */
export async function computeTreeManifest(
  dir: string,
  paths?: ManifestPaths | undefined
): Promise<TreeManifest> {
  const exclude = paths ? [paths.hashEntry, paths.fileListEntry] : []
  const files = await hashTreeFiles(dir, { exclude })
  return { files, sha256: formatHashManifest(files), fileList: formatFileList(files) }
}

/**
 * Compute and write both manifests into a distribution tree.
 */
export async function writeManifests(dir: string, paths: ManifestPaths): Promise<TreeManifest> {
  const manifest = await computeTreeManifest(dir, paths)
  await atomicWrite(join(dir, paths.hashEntry), manifest.sha256, { fsync: false })
  await atomicWrite(join(dir, paths.fileListEntry), manifest.fileList, { fsync: false })
  return manifest
}

/**
 * Parse `<hex>  <path>` lines.
 *
 * @throws Error on a malformed line
 */
export function parseHashManifest(content: string): FileHash[] {
  const out: FileHash[] = []
  for (const [i, line] of content.split('\n').entries()) {
    if (line === '') continue
    const match = /^([0-9a-f]{64}) {2}(.+)$/.exec(line)
    if (!match) throw new Error(`Malformed hash manifest line ${i + 1}: "${line}"`)
    out.push({ sha256: match[1] ?? '', path: match[2] ?? '' })
  }
  return out
}

export interface VerifyResult {
  ok: boolean
  added: string[]
  removed: string[]
  changed: string[]
  /** The file list still matches the tree */
  fileListMatches: boolean
}

/**
 * Recompute a distribution's manifests and compare them with the stored ones.
 */
export async function verifyDistribution(dir: string, paths: ManifestPaths): Promise<VerifyResult> {
  const recorded = parseHashManifest(await readFile(join(dir, paths.hashEntry), 'utf-8'))
  const recordedFiles = await readFile(join(dir, paths.fileListEntry), 'utf-8')
  const actual = await computeTreeManifest(dir, paths)

  const expected = new Map(recorded.map((f) => [f.path, f.sha256]))
  const current = new Map(actual.files.map((f) => [f.path, f.sha256]))

  const added = actual.files.filter((f) => !expected.has(f.path)).map((f) => f.path)
  const removed = recorded.filter((f) => !current.has(f.path)).map((f) => f.path)
  const changed = actual.files
    .filter((f) => expected.has(f.path) && expected.get(f.path) !== f.sha256)
    .map((f) => f.path)
  const fileListMatches = recordedFiles === actual.fileList

  return {
    ok: added.length === 0 && removed.length === 0 && changed.length === 0 && fileListMatches,
    added,
    removed,
    changed,
    fileListMatches,
  }
}
