/**
 * CLI UI utilities - TTY-aware output
 *
 * - TTY (interactive): progress and colors on stderr, bordered tables
 * - Pipe: clean output, data only to stdout
 */

import { Table, renderToString, stripAnsi } from 'tuiuiu.js'
import type { RunLogger } from '../types.js'

// Detect if running in interactive terminal
export const isTTY = process.stdout.isTTY ?? false

/**
 * Output data to stdout (for pipes)
 * This is the ONLY function that should write to stdout for data
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Log message to stderr (doesn't interfere with pipes)
 */
export function log(message: string): void {
  if (isTTY) {
    console.error(message)
  }
}

/**
 * Log verbose message (only with verbose flag)
 */
export function verbose(message: string, enabled: boolean): void {
  if (enabled) {
    console.error(`[dvalm] ${message}`)
  }
}

/**
 * Log success message (only in TTY mode)
 */
export function success(message: string): void {
  if (isTTY) {
    console.error(`✓ ${message}`)
  }
}

/**
 * Log warning message (always shown)
 */
export function warn(message: string): void {
  console.error(`Warning: ${message}`)
}

/**
 * Format rows as a table using tuiuiu.js (tab-separated rows when piped)
 */
export function formatSimpleTable(headers: string[], rows: string[][]): string {
  if (!isTTY) {
    // Pipes get plain text even under FORCE_COLOR
    return rows.map(row => row.map(cell => stripAnsi(cell)).join('\t')).join('\n')
  }

  const table = Table({
    columns: headers.map((header, i) => ({ key: `col${i}`, header })),
    data: rows.map(row => Object.fromEntries(row.map((cell, i) => [`col${i}`, cell]))),
    borderStyle: 'round',
    showHeader: true
  })

  return renderToString(table)
}

/**
 * Progress sink for domain operations.
 * --quiet keeps warnings only; --verbose adds detail lines.
 */
export function createRunLogger(options: { verbose?: boolean; quiet?: boolean }): RunLogger {
  return {
    info: (message) => {
      if (!options.quiet) log(message)
    },
    warn,
    verbose: (message) => verbose(message, options.verbose === true && !options.quiet)
  }
}
