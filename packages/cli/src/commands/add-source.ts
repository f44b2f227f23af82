/**
 * Add-source command - Append a download source to an entry.
 */

import type { Command } from 'commander'

import { addDownloadSource } from '@binstash/engine'

import { type CommonOptions, contextFromOptions, resolveManifestPath, withCommonOptions } from '../helpers.js'
import { success } from '../ui.js'

interface AddSourceOptions extends CommonOptions {
  sha256: string
}

/**
 * Register the add-source command.
 */
export function registerAddSourceCommand(program: Command): void {
  withCommonOptions(
    program
      .command('add-source')
      .description('Append a download source to an existing artifact entry')
      .argument('<name>', 'Artifact name')
      .argument('<url>', 'Download URL')
      .option('--sha256 <hex>', 'sha256 of the archive at <url>', '')
  ).action(async (name: string, url: string, options: AddSourceOptions) => {
    const manifestPath = await resolveManifestPath(options)
    await addDownloadSource(contextFromOptions(options), manifestPath, name, url, options.sha256)
    success(`Added source to ${name}`)
  })
}
