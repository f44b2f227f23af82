/**
 * Path command - Resolve an artifact to its cache directory.
 *
 * Prints only the path on stdout, so `cd "$(binstash path Data)"` works.
 */

import type { Command } from 'commander'

import { getPath } from '@binstash/engine'

import { type CommonOptions, contextFromOptions, resolveManifestPath, withCommonOptions } from '../helpers.js'
import { createProgressReporter } from '../ui.js'

interface PathOptions extends CommonOptions {
  fetch: boolean
}

/**
 * Register the path command.
 */
export function registerPathCommand(program: Command): void {
  withCommonOptions(
    program
      .command('path')
      .description('Print the cache directory of an artifact, downloading it if needed')
      .argument('<name>', 'Artifact name')
      .option('--no-fetch', 'Fail instead of downloading when not cached')
  ).action(async (name: string, options: PathOptions) => {
    const manifestPath = await resolveManifestPath(options)
    const ctx = contextFromOptions(options)
    const progress = createProgressReporter()

    try {
      const path = await getPath(ctx, manifestPath, name, {
        allowFetch: options.fetch,
        onEvent: progress.onEvent,
      })
      console.log(path)
    } finally {
      progress.stop()
    }
  })
}
