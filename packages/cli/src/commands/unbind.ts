/**
 * Unbind command - Remove a manifest entry.
 */

import type { Command } from 'commander'

import { unbindEntry } from '@binstash/engine'

import { type CommonOptions, contextFromOptions, resolveManifestPath, withCommonOptions } from '../helpers.js'
import { success, warning } from '../ui.js'

/**
 * Register the unbind command.
 */
export function registerUnbindCommand(program: Command): void {
  withCommonOptions(
    program
      .command('unbind')
      .description('Remove an artifact entry from the manifest')
      .argument('<name>', 'Artifact name')
  ).action(async (name: string, options: CommonOptions) => {
    const manifestPath = await resolveManifestPath(options, false)
    const removed = await unbindEntry(contextFromOptions(options), manifestPath, name)
    if (removed) {
      success(`Removed ${name} from ${manifestPath}`)
    } else {
      warning(`${name} is not bound in ${manifestPath}`)
    }
  })
}
