/**
 * Layout materialization.
 *
 * WHY: Layout tokens were parsed into tagged entries at load time; here each
 * entry is checked against the distribution's declared dependency closure and
 * the outputs built for the current platform, then copied into the tree.
 * Nothing outside the closure is reachable, so a layout cannot pick up an
 * artifact the build order does not guarantee to exist.
 */

import { lstat, mkdir, writeFile } from 'node:fs/promises'
import { basename, dirname, join, relative, resolve, sep } from 'node:path'
import type {
  Distribution,
  Layout,
  LayoutEntry,
  LayoutRule,
  NodeId,
  Platform,
} from '@suitecraft/core'
import {
  LayoutTokenError,
  copyDir,
  copyFile,
  formatPlatform,
  libraryFileName,
  pathExists,
} from '@suitecraft/core'
import type { BuildGraph } from '@suitecraft/resolver'
import { dependencyClosure, primaryArtifactName } from '@suitecraft/resolver'
import { listTreeFiles } from '@suitecraft/store'

import { globToRegExp } from './glob.js'
import { type ManifestPaths, type TreeManifest, manifestPaths, substitutePlatform, writeManifests } from './manifests.js'

export interface MaterializeContext {
  platform: Platform
  graph: BuildGraph
  /** Layout selected for the platform */
  layout: Layout
  /**
   * Published output directory of a node for this platform, or undefined when
   * the node was not built (ignored, failed or not yet run).
   */
  outputOf: (id: NodeId) => string | undefined
}

export interface DistributionManifest {
  /** Manifest locations, for platform-dependent distributions */
  paths?: ManifestPaths | undefined
  /** Hashes of every file in the tree (manifests excluded) */
  manifest: TreeManifest | undefined
}

interface Destination {
  /** Absolute path */
  path: string
  isDirectory: boolean
}

function resolveDestination(
  distribution: Distribution,
  rule: LayoutRule,
  platform: Platform,
  outputDir: string
): Destination {
  const isDirectory = rule.destination.endsWith('/')
  const rel = substitutePlatform(rule.destination, platform)
  const path = resolve(outputDir, rel)
  const inside = relative(outputDir, path)
  if (inside.startsWith('..') || inside.split(sep).includes('..')) {
    throw new LayoutTokenError(distribution.id, rule.destination, 'destination escapes the distribution root')
  }
  return { path, isDirectory }
}

class LayoutExpander {
  private readonly closure: Set<NodeId>

  constructor(
    private readonly distribution: Distribution,
    private readonly context: MaterializeContext
  ) {
    this.closure = dependencyClosure(context.graph, distribution.id)
  }

  private fail(entry: LayoutEntry, reason: string): never {
    throw new LayoutTokenError(this.distribution.id, entry.token, reason)
  }

  /**
   * Output directory of the node a dependency entry names.
   */
  private dependencyOutput(entry: Exclude<LayoutEntry, { kind: 'literal' | 'inline' }>): {
    id: NodeId
    dir: string
  } {
    const node = this.context.graph.registry.resolve(entry.ref, this.distribution.suite)
    if (!node) this.fail(entry, 'unknown project or distribution')
    if (!this.closure.has(node.id)) {
      this.fail(entry, `"${node.id}" is not in the declared dependency closure`)
    }
    const dir = this.context.outputOf(node.id)
    if (dir === undefined) {
      this.fail(entry, `"${node.id}" was not built for ${formatPlatform(this.context.platform)}`)
    }
    return { id: node.id, dir }
  }

  async expand(entry: LayoutEntry, dest: Destination): Promise<void> {
    switch (entry.kind) {
      case 'literal':
        return this.copyLiteral(entry, dest)
      case 'inline':
        return this.writeInline(entry, dest)
      case 'dependency':
        return this.copyArtifact(entry, dest)
      case 'dependency-glob':
        return this.copyMatches(entry, dest)
      case 'library':
        return this.copyLibrary(entry, dest)
    }
  }

  private async copyPath(source: string, dest: Destination, name: string): Promise<void> {
    const target = dest.isDirectory ? join(dest.path, name) : dest.path
    const stats = await lstat(source)
    if (stats.isDirectory()) {
      await copyDir(source, target)
    } else {
      await copyFile(source, target)
    }
  }

  private async copyLiteral(entry: Extract<LayoutEntry, { kind: 'literal' }>, dest: Destination) {
    const root = this.context.graph.registry.suites.get(this.distribution.suite)?.root ?? '.'
    const source = join(root, entry.path)
    if (!(await pathExists(source))) this.fail(entry, 'file not found')
    await this.copyPath(source, dest, basename(entry.path))
  }

  private async writeInline(entry: Extract<LayoutEntry, { kind: 'inline' }>, dest: Destination) {
    if (dest.isDirectory) this.fail(entry, 'inline content needs a file destination')
    await mkdir(dirname(dest.path), { recursive: true })
    await writeFile(dest.path, entry.content)
  }

  private async copyArtifact(entry: Extract<LayoutEntry, { kind: 'dependency' }>, dest: Destination) {
    const { id, dir } = this.dependencyOutput(entry)
    const node = this.context.graph.registry.get(id)
    const artifact = node && primaryArtifactName(node, this.context.platform)
    if (artifact === undefined) {
      // the whole output tree is the artifact
      await copyDir(dir, dest.path)
      return
    }
    const source = join(dir, artifact)
    if (!(await pathExists(source))) this.fail(entry, `artifact "${artifact}" was not produced`)
    await this.copyPath(source, dest, artifact)
  }

  private async copyMatches(
    entry: Extract<LayoutEntry, { kind: 'dependency-glob' }>,
    dest: Destination
  ) {
    const { dir } = this.dependencyOutput(entry)
    if (entry.pattern === '*') {
      await copyDir(dir, dest.path)
      return
    }
    const pattern = globToRegExp(entry.pattern)
    const matches = (await listTreeFiles(dir)).filter((f) => pattern.test(f.path))
    if (matches.length === 0) this.fail(entry, 'selector matches no file')
    if (!dest.isDirectory && matches.length > 1) {
      this.fail(entry, `selector matches ${matches.length} files but the destination is a file`)
    }
    for (const file of matches) {
      await this.copyPath(file.absolutePath, dest, basename(file.path))
    }
  }

  private async copyLibrary(entry: Extract<LayoutEntry, { kind: 'library' }>, dest: Destination) {
    const { dir } = this.dependencyOutput(entry)
    const fileName = libraryFileName(entry.library, this.context.platform.os)
    const candidates = (await listTreeFiles(dir)).filter((f) => basename(f.path) === fileName)
    // a library at the root of the output wins over nested copies
    const file = candidates.find((f) => f.path === fileName) ?? candidates[0]
    if (!file) this.fail(entry, `library "${fileName}" was not built`)
    await this.copyPath(file.absolutePath, dest, fileName)
  }
}

/**
 * Assemble a distribution tree in `outputDir` and write its manifests.
 *
 * @param outputDir - Distribution root, normally a staging directory
 * @throws LayoutTokenError when an entry cannot be expanded
 */
export async function materialize(
  distribution: Distribution,
  context: MaterializeContext,
  outputDir: string
): Promise<DistributionManifest> {
  await mkdir(outputDir, { recursive: true })
  const expander = new LayoutExpander(distribution, context)

  for (const rule of context.layout) {
    const dest = resolveDestination(distribution, rule, context.platform, outputDir)
    if (dest.isDirectory) await mkdir(dest.path, { recursive: true })
    for (const entry of rule.entries) {
      await expander.expand(entry, dest)
    }
  }

  if (!distribution.platformDependent) {
    return { manifest: undefined }
  }
  const paths = manifestPaths(distribution, context.platform)
  const manifest = await writeManifests(outputDir, paths)
  return { paths, manifest }
}
