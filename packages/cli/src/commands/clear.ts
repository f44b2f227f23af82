/**
 * Clear command - Delete cached artifact directories.
 */

import type { Command } from 'commander'

import { clearArtifacts } from '@binstash/engine'

import { type CommonOptions, contextFromOptions, resolveManifestPath, withCommonOptions } from '../helpers.js'
import { colors, success } from '../ui.js'

/**
 * Register the clear command.
 */
export function registerClearCommand(program: Command): void {
  withCommonOptions(
    program
      .command('clear')
      .description('Delete the cache directory of one artifact, or of every artifact in the manifest')
      .argument('[name]', 'Artifact name (default: all)')
  ).action(async (name: string | undefined, options: CommonOptions) => {
    const manifestPath = await resolveManifestPath(options)
    const cleared = await clearArtifacts(contextFromOptions(options), manifestPath, name)

    if (cleared.length === 0) {
      console.error(colors.muted('Nothing to clear'))
      return
    }
    success(`Cleared ${cleared.join(', ')}`)
  })
}
