/**
 * Suite manifest (suite.toml / suite.json) reader
 */

import { access, readFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import TOML from '@iarna/toml'

import { SchemaError } from '../errors.js'
import type { Suite } from '../types/suite.js'
import { parseSuite } from './parse.js'

/** Manifest filenames, in lookup order */
export const SUITE_FILENAMES = ['suite.toml', 'suite.json'] as const

/**
 * Parse suite.toml content into a validated Suite
 *
 * @param content - Raw TOML string content
 * @param filePath - Path to the file (for error messages and the suite root)
 * @throws SchemaError if TOML parsing or validation fails
 */
export function parseSuiteToml(content: string, filePath = 'suite.toml'): Suite {
  let parsed: unknown
  try {
    parsed = TOML.parse(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new SchemaError(filePath, [{ path: '/', message: `Failed to parse TOML: ${message}` }])
  }
  return parseSuite(parsed, { source: filePath, root: dirname(filePath) })
}

/**
 * Parse suite.json content into a validated Suite
 */
export function parseSuiteJson(content: string, filePath = 'suite.json'): Suite {
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new SchemaError(filePath, [{ path: '/', message: `Failed to parse JSON: ${message}` }])
  }
  return parseSuite(parsed, { source: filePath, root: dirname(filePath) })
}

/**
 * Read and parse a suite manifest file from disk
 */
export async function readSuiteFile(filePath: string): Promise<Suite> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (err) {
    if ((err as NodeJS.ErrnoException | undefined)?.code === 'ENOENT') {
      throw new SchemaError(filePath, [{ path: '/', message: 'File not found' }])
    }
    const message = err instanceof Error ? err.message : String(err)
    throw new SchemaError(filePath, [{ path: '/', message: `Failed to read file: ${message}` }])
  }
  return filePath.endsWith('.json')
    ? parseSuiteJson(content, filePath)
    : parseSuiteToml(content, filePath)
}

/**
 * Find the manifest file in a suite directory.
 *
 * @returns The manifest path, or null when the directory holds none
 */
export async function findSuiteFile(dir: string): Promise<string | null> {
  for (const filename of SUITE_FILENAMES) {
    const candidate = join(dir, filename)
    try {
      await access(candidate)
      return candidate
    } catch {
      // try the next name
    }
  }
  return null
}
