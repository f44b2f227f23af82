/**
 * Terminal UI utilities for the binstash CLI.
 *
 * Progress and status go to stderr so that stdout carries only results
 * (paths, digests) for use in scripts.
 */

import chalk from 'chalk'
import figures from 'figures'
import ora, { type Ora } from 'ora'

import type { CacheEvent, CacheEventHandler } from '@binstash/store'

// ═══════════════════════════════════════════════════════════════════════════
// Color Palette
// ═══════════════════════════════════════════════════════════════════════════

export const colors = {
  success: chalk.hex('#10b981'), // emerald
  info: chalk.hex('#6366f1'), // indigo
  warn: chalk.hex('#f59e0b'), // amber
  error: chalk.hex('#ef4444'), // red
  muted: chalk.hex('#6b7280'), // gray-500
  emphasis: chalk.hex('#f3f4f6'), // gray-100
  code: chalk.hex('#a78bfa'), // violet-400
}

// ═══════════════════════════════════════════════════════════════════════════
// Symbols
// ═══════════════════════════════════════════════════════════════════════════

export const symbols = {
  success: colors.success(figures.tick),
  error: colors.error(figures.cross),
  warning: colors.warn(figures.warning),
  info: colors.info(figures.info),
  bullet: colors.muted(figures.bullet),
  circle: colors.muted(figures.circle),
}

// ═══════════════════════════════════════════════════════════════════════════
// Spinner
// ═══════════════════════════════════════════════════════════════════════════

export function createSpinner(text: string): Ora {
  return ora({
    text: colors.muted(text),
    spinner: 'dots',
    color: 'gray',
  })
}

/**
 * A cache event handler that drives a spinner, plus a way to stop it.
 */
export interface ProgressReporter {
  onEvent: CacheEventHandler
  stop(): void
}

function describeEvent(event: CacheEvent): string | undefined {
  switch (event.type) {
    case 'download':
      return `Downloading ${event.name} (${event.attempt}/${event.total}) ${formatPath(event.url)}`
    case 'verify':
      return `Verifying ${event.name}`
    case 'extract':
      return `Extracting ${event.name} (${event.kind})`
    default:
      return undefined
  }
}

/**
 * Render artifact cache events with a spinner.
 * Nothing is shown when the artifact is already cached.
 */
export function createProgressReporter(): ProgressReporter {
  const spinner = createSpinner('')

  return {
    onEvent: (event) => {
      if (event.type === 'source-failed') {
        spinner.warn(colors.warn(event.error.message))
        return
      }
      if (event.type === 'ready') {
        if (event.fetched) {
          spinner.succeed(`Fetched ${event.name}`)
        }
        return
      }
      const text = describeEvent(event)
      if (text !== undefined) {
        spinner.text = colors.muted(text)
        if (!spinner.isSpinning) {
          spinner.start()
        }
      }
    },
    stop: () => {
      if (spinner.isSpinning) {
        spinner.stop()
      }
    },
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Messages
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Print a success message with checkmark
 */
export function success(text: string): void {
  console.error(`${symbols.success} ${text}`)
}

/**
 * Print a warning message
 */
export function warning(text: string): void {
  console.error(`${symbols.warning} ${colors.warn(text)}`)
}

/**
 * Print a labelled value
 */
export function info(label: string, value: string): void {
  console.error(`  ${colors.muted(label.padEnd(10))} ${value}`)
}

// ═══════════════════════════════════════════════════════════════════════════
// Utilities
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Format a file path for display (shorten home dir)
 */
export function formatPath(filePath: string): string {
  const home = process.env['HOME'] ?? ''
  if (home) {
    return filePath.replaceAll(home, '~')
  }
  return filePath
}
