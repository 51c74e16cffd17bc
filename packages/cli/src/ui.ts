/**
 * Terminal output for the suitecraft CLI.
 *
 * Build output is a tree per target: one line per node, led by its status
 * glyph. Color marks status only; everything else is muted.
 */

import type { NodeStatus } from '@suitecraft/engine'
import chalk from 'chalk'
import figures from 'figures'
import ora, { type Ora } from 'ora'

// ═══════════════════════════════════════════════════════════════════════════
// Palette
// ═══════════════════════════════════════════════════════════════════════════

export const colors = {
  success: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
  muted: chalk.gray,
  dim: chalk.dim,
  emphasis: chalk.bold,
}

// ═══════════════════════════════════════════════════════════════════════════
// Glyphs
// ═══════════════════════════════════════════════════════════════════════════

export const symbols = {
  success: colors.success(figures.tick),
  error: colors.error(figures.cross),
  warning: colors.warn(figures.warning),
  bullet: colors.muted(figures.bullet),
  branch: colors.dim('├─'),
  lastBranch: colors.dim('└─'),
}

const STATUS_SYMBOLS: Record<NodeStatus, string> = {
  built: symbols.success,
  ignored: symbols.bullet,
  failed: symbols.error,
  blocked: colors.warn(figures.arrowRight),
  cancelled: symbols.warning,
  aborted: colors.error(figures.circleCross),
}

export function statusSymbol(status: NodeStatus): string {
  return STATUS_SYMBOLS[status]
}

/**
 * Spinner on stderr; ora leaves it silent when stderr is not a terminal.
 */
export function createSpinner(text: string): Ora {
  return ora({ text: colors.muted(text), spinner: 'dots', color: 'gray' })
}

// ═══════════════════════════════════════════════════════════════════════════
// Lines
// ═══════════════════════════════════════════════════════════════════════════

export function header(text: string): void {
  console.log()
  console.log(colors.emphasis(text))
}

export function success(text: string): void {
  console.log(`${symbols.success} ${text}`)
}

/** Errors go to stderr */
export function error(text: string): void {
  console.error(`${symbols.error} ${colors.error(text)}`)
}

export function warning(text: string): void {
  console.log(`${symbols.warning} ${colors.warn(text)}`)
}

export function treeItem(text: string, last = false): void {
  console.log(`  ${last ? symbols.lastBranch : symbols.branch} ${text}`)
}

/**
 * Aligned label/value rows, after a blank line.
 */
export function summaryBlock(rows: Array<{ label: string; value: string }>): void {
  console.log()
  const width = Math.max(...rows.map((row) => row.label.length)) + 2
  for (const row of rows) {
    console.log(`  ${colors.muted(row.label.padEnd(width))}${row.value}`)
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Formatting
// ═══════════════════════════════════════════════════════════════════════════

/** `~` for the home directory */
export function formatPath(filePath: string): string {
  const home = process.env['HOME']
  return home ? filePath.replaceAll(home, '~') : filePath
}

export function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`
}
