/**
 * Exists command - Check whether an artifact is cached, without downloading.
 *
 * Exits 0 when cached, 1 otherwise.
 */

import type { Command } from 'commander'

import { artifactExists } from '@binstash/engine'

import { type CommonOptions, contextFromOptions, resolveManifestPath, withCommonOptions } from '../helpers.js'

/**
 * Register the exists command.
 */
export function registerExistsCommand(program: Command): void {
  withCommonOptions(
    program
      .command('exists')
      .description('Check whether an artifact is cached (never downloads)')
      .argument('<name>', 'Artifact name')
  ).action(async (name: string, options: CommonOptions) => {
    const manifestPath = await resolveManifestPath(options)
    const exists = await artifactExists(contextFromOptions(options), manifestPath, name)
    console.log(exists ? 'true' : 'false')
    if (!exists) {
      process.exitCode = 1
    }
  })
}
