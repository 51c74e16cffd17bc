/**
 * Suite loading with transitive imports.
 *
 * WHY: References between suites stay symbolic until every suite reachable
 * through `imports.suites` is in memory. Suite imports may be circular, so
 * loading is a worklist keyed by suite name rather than a recursive descent.
 */

import { dirname, join } from 'node:path'
import semver from 'semver'

import { SchemaError } from '../errors.js'
import type { Suite, SuiteSet } from '../types/suite.js'
import { ENGINE_VERSION } from '../version.js'
import { findSuiteFile, readSuiteFile } from './suite-file.js'

export interface LoadSuitesOptions {
  /** Directories searched for imports that are not `subdir` siblings */
  searchPaths?: readonly string[] | undefined
  /** Engine version checked against each suite's `engineVersion` range */
  engineVersion?: string | undefined
}

function checkEngineVersion(suite: Suite, engineVersion: string): void {
  if (suite.engineVersion === undefined) return
  if (!semver.satisfies(engineVersion, suite.engineVersion, { includePrerelease: true })) {
    throw new SchemaError(suite.source, [
      {
        path: 'engineVersion',
        message: `requires engine ${suite.engineVersion}, running ${engineVersion}`,
      },
    ])
  }
}

async function locateImport(
  importer: Suite,
  name: string,
  subdir: boolean,
  searchPaths: readonly string[]
): Promise<string | null> {
  const candidates = subdir
    ? [join(dirname(importer.root), name)]
    : searchPaths.map((dir) => join(dir, name))
  for (const dir of candidates) {
    const file = await findSuiteFile(dir)
    if (file) return file
  }
  return null
}

/**
 * Load the suite in `rootDir` and every suite it imports.
 *
 * @throws SchemaError for malformed manifests, missing imports, name
 *   mismatches and engine version conflicts
 */
export async function loadSuites(rootDir: string, options: LoadSuitesOptions = {}): Promise<SuiteSet> {
  const searchPaths = options.searchPaths ?? []
  const engineVersion = options.engineVersion ?? ENGINE_VERSION

  const primaryFile = await findSuiteFile(rootDir)
  if (!primaryFile) {
    throw new SchemaError(rootDir, [{ path: '/', message: 'No suite.toml or suite.json found' }])
  }
  const primary = await readSuiteFile(primaryFile)
  checkEngineVersion(primary, engineVersion)

  const suites = new Map<string, Suite>([[primary.name, primary]])
  const queue: Suite[] = [primary]

  for (let suite = queue.shift(); suite; suite = queue.shift()) {
    for (const [i, imp] of suite.imports.entries()) {
      if (suites.has(imp.name)) continue
      const path = `imports.suites[${i}]`

      const file = await locateImport(suite, imp.name, imp.subdir, searchPaths)
      if (!file) {
        const where = imp.subdir ? `beside ${suite.root}` : 'in the suite search path'
        throw new SchemaError(suite.source, [
          { path, message: `imported suite "${imp.name}" not found ${where}` },
        ])
      }

      const imported = await readSuiteFile(file)
      if (imported.name !== imp.name) {
        throw new SchemaError(suite.source, [
          { path, message: `"${file}" declares suite "${imported.name}", expected "${imp.name}"` },
        ])
      }
      checkEngineVersion(imported, engineVersion)
      suites.set(imported.name, imported)
      queue.push(imported)
    }
  }

  return { primary, suites }
}
