/**
 * Add command - Download a URL, hash it and bind it to a name.
 */

import type { Command } from 'commander'

import { addArtifactFromURL } from '@binstash/engine'

import { type CommonOptions, contextFromOptions, resolveManifestPath, withCommonOptions } from '../helpers.js'
import { createSpinner, info, success, warning } from '../ui.js'

interface AddOptions extends CommonOptions {
  lazy?: boolean | undefined
  force?: boolean | undefined
}

/**
 * Register the add command.
 */
export function registerAddCommand(program: Command): void {
  withCommonOptions(
    program
      .command('add')
      .description('Download an archive and add it to the manifest with its hashes')
      .argument('<name>', 'Artifact name')
      .argument('<url>', 'Download URL')
      .option('--lazy', 'Mark the artifact as lazy')
      .option('-f, --force', 'Replace an existing entry')
  ).action(async (name: string, url: string, options: AddOptions) => {
    const manifestPath = await resolveManifestPath(options, false)
    const spinner = createSpinner(`Downloading ${url}`).start()

    let result: Awaited<ReturnType<typeof addArtifactFromURL>>
    try {
      result = await addArtifactFromURL(contextFromOptions(options), manifestPath, name, url, {
        lazy: options.lazy,
        force: options.force,
      })
    } finally {
      spinner.stop()
    }

    for (const message of result.warnings) {
      warning(message)
    }
    success(`Added ${name} to ${manifestPath}`)
    if (result.treeDigest) {
      info('tree hash', result.treeDigest)
    }
    info('sha256', result.sha256)
  })
}
