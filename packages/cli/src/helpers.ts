/**
 * Shared CLI helper utilities: common options, manifest discovery and
 * error formatting.
 */

import { resolve } from 'node:path'
import chalk from 'chalk'
import { type Command, InvalidArgumentError } from 'commander'

import { findManifest, isBinstashError } from '@binstash/core'
import { type EngineContext, createContext } from '@binstash/engine'
import { COMPRESSIONS, type Compression } from '@binstash/store'

/**
 * Options every artifact command accepts.
 */
export interface CommonOptions {
  manifest?: string | undefined
  cacheRoot?: string | undefined
}

/**
 * Error thrown when no manifest is given or found.
 */
export class ManifestNotFoundError extends Error {
  constructor(startDir: string) {
    super(`No Artifacts.toml found in ${startDir} or its parents`)
    this.name = 'ManifestNotFoundError'
  }
}

/**
 * Add --manifest and --cache-root to a command.
 */
export function withCommonOptions(command: Command): Command {
  return command
    .option('--manifest <path>', 'Manifest file (default: nearest Artifacts.toml)')
    .option('--cache-root <path>', 'Cache root (default: BINSTASH_HOME or ~/.binstash)')
}

/**
 * The manifest path from --manifest, else the nearest one above cwd.
 *
 * @param mustExist - when false, a missing manifest defaults to ./Artifacts.toml
 */
export async function resolveManifestPath(options: CommonOptions, mustExist = true): Promise<string> {
  if (options.manifest) {
    return resolve(options.manifest)
  }
  const found = await findManifest(process.cwd())
  if (found) {
    return found
  }
  if (!mustExist) {
    return resolve('Artifacts.toml')
  }
  throw new ManifestNotFoundError(process.cwd())
}

/**
 * Build an engine context from command options.
 */
export function contextFromOptions(options: CommonOptions): EngineContext {
  return createContext({ cacheRoot: options.cacheRoot })
}

/**
 * Commander argument parser for --compression.
 */
export function parseCompression(value: string): Compression {
  const match = COMPRESSIONS.find((compression) => compression === value)
  if (!match) {
    throw new InvalidArgumentError(`Expected one of: ${COMPRESSIONS.join(', ')}`)
  }
  return match
}

/**
 * Format an error for display, following its cause chain.
 */
export function formatError(error: unknown): string {
  if (error instanceof ManifestNotFoundError) {
    return [
      chalk.red(`Error: ${error.message}`),
      chalk.gray('  Run this command below a directory with Artifacts.toml or use --manifest'),
    ].join('\n')
  }

  if (error instanceof Error) {
    const lines: string[] = [chalk.red(`Error: ${error.message}`)]
    let cause: unknown = isBinstashError(error) ? error.cause : undefined
    while (cause instanceof Error) {
      lines.push(chalk.gray(`  Cause: ${cause.message}`))
      cause = cause.cause
    }
    return lines.join('\n')
  }

  return chalk.red(`Error: ${String(error)}`)
}
