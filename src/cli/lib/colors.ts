/**
 * dvalm CLI - Colors
 *
 * tuiuiu.js text utils for styles and status colors, ANSI 256 for the palette.
 * Supports NO_COLOR and FORCE_COLOR.
 */

import { colorize, style, styles as tuiStyles } from 'tuiuiu.js'
import type { Formatter } from 'cli-args-parser'
import type { ImportAction } from '../../domain/import-strategy.js'

// Check if colors should be enabled
const isColorEnabled = (): boolean => {
  // Respect NO_COLOR standard
  if (process.env.NO_COLOR !== undefined) return false
  if (process.env.FORCE_COLOR !== undefined) return true
  return process.stdout.isTTY ?? false
}

const enabled = isColorEnabled()

// Wrappers that respect NO_COLOR
const color = (text: string, col: string): string => {
  if (!enabled) return text
  return colorize(text, col)
}

const styled = (text: string, ...styleNames: (keyof typeof tuiStyles)[]): string => {
  if (!enabled) return text
  return style(text, ...styleNames)
}

/**
 * Palette (ANSI 256):
 * - 30:  Teal: primary, commands
 * - 43:  Aqua: highlights
 * - 67:  Slate blue: secondary, options
 * - 110: Pale steel: defaults
 * - 252: Light gray: text
 * - 245: Medium gray: muted text
 */
const ansi = {
  bold: (s: string) => styled(s, 'bold'),
  dim: (s: string) => styled(s, 'dim'),

  teal: (s: string) => enabled ? `\x1b[38;5;30m${s}\x1b[39m` : s,
  aqua: (s: string) => enabled ? `\x1b[38;5;43m${s}\x1b[39m` : s,
  slate: (s: string) => enabled ? `\x1b[38;5;67m${s}\x1b[39m` : s,
  paleSteel: (s: string) => enabled ? `\x1b[38;5;110m${s}\x1b[39m` : s,

  // Neutrals
  white: (s: string) => color(s, 'whiteBright'),
  gray: (s: string) => enabled ? `\x1b[38;5;245m${s}\x1b[39m` : s,
  lightGray: (s: string) => enabled ? `\x1b[38;5;252m${s}\x1b[39m` : s,

  // Semantic
  red: (s: string) => color(s, 'redBright'),
  green: (s: string) => color(s, 'greenBright'),
  yellow: (s: string) => color(s, 'yellowBright'),
}

/**
 * Help/version formatter for cli-args-parser
 */
export const almFormatter: Formatter = {
  'section-header': s => ansi.bold(ansi.white(s)),

  'program-name': s => ansi.bold(ansi.teal(s)),
  'version': s => ansi.aqua(s),
  'description': s => ansi.lightGray(s),

  'command-name': s => ansi.teal(s),
  'command-alias': s => ansi.gray(s),
  'command-description': s => ansi.lightGray(s),

  'option-flag': s => ansi.aqua(s),
  'option-type': s => ansi.slate(s),
  'option-default': s => ansi.dim(ansi.paleSteel(s)),
  'option-description': s => ansi.lightGray(s),

  'positional-name': s => ansi.slate(s),

  'error-header': s => ansi.bold(ansi.red(s)),
  'error-message': s => ansi.red(s),
  'error-option': s => ansi.teal(s),
}

export const c = {
  command: (text: string) => ansi.bold(ansi.teal(text)),
  solution: (text: string) => ansi.bold(ansi.aqua(text)),
  version: (text: string) => ansi.paleSteel(text),

  envDev: (text: string) => ansi.green(text),
  envTest: (text: string) => ansi.yellow(text),
  envProd: (text: string) => ansi.bold(ansi.red(text)),

  success: (text: string) => ansi.green(text),
  error: (text: string) => ansi.red(text),
  warning: (text: string) => ansi.yellow(text),

  header: (text: string) => ansi.bold(ansi.white(text)),
  label: (text: string) => ansi.gray(text),
  muted: (text: string) => ansi.dim(text),
}

// Production-like names stand out
export function colorEnv(env: string): string {
  if (!enabled) return env
  if (env === 'prd' || env === 'prod' || env === 'production') {
    return c.envProd(env)
  }
  if (env === 'test' || env === 'uat' || env === 'staging') {
    return c.envTest(env)
  }
  return c.envDev(env)
}

export function colorAction(action: ImportAction): string {
  switch (action) {
    case 'install':
      return ansi.green(action)
    case 'update':
      return ansi.aqua(action)
    case 'upgrade':
      return ansi.yellow(action)
    case 'skip':
      return ansi.gray(action)
  }
}

export const symbols = {
  success: enabled ? ansi.green('✓') : '[OK]',
  error: enabled ? ansi.red('✗') : '[ERROR]',
  warning: enabled ? ansi.yellow('⚠') : '[WARN]',
  bullet: enabled ? ansi.slate('•') : '*',
  arrow: enabled ? ansi.teal('→') : '->',
}

export const print = {
  success: (msg: string) => console.error(`${symbols.success} ${c.success(msg)}`),
  error: (msg: string) => console.error(`${symbols.error} ${c.error(msg)}`),
  warning: (msg: string) => console.error(`${symbols.warning} ${c.warning(msg)}`),
}
