/**
 * Bind command - Write a manifest entry with one download source.
 */

import type { Command } from 'commander'

import { bindEntry } from '@binstash/engine'

import { type CommonOptions, contextFromOptions, resolveManifestPath, withCommonOptions } from '../helpers.js'
import { success } from '../ui.js'

interface BindOptions extends CommonOptions {
  sha256: string
  lazy?: boolean | undefined
  force?: boolean | undefined
}

/**
 * Register the bind command.
 */
export function registerBindCommand(program: Command): void {
  withCommonOptions(
    program
      .command('bind')
      .description('Add an artifact entry to the manifest')
      .argument('<name>', 'Artifact name')
      .argument('<tree-hash>', 'Tree hash of the artifact contents')
      .argument('<url>', 'Download URL')
      .option('--sha256 <hex>', 'sha256 of the archive at <url>', '')
      .option('--lazy', 'Mark the artifact as lazy')
      .option('-f, --force', 'Replace an existing entry')
  ).action(async (name: string, treeHash: string, url: string, options: BindOptions) => {
    const manifestPath = await resolveManifestPath(options, false)
    await bindEntry(contextFromOptions(options), manifestPath, name, {
      treeDigest: treeHash,
      url,
      sha256: options.sha256,
      lazy: options.lazy,
      force: options.force,
    })
    success(`Bound ${name} in ${manifestPath}`)
  })
}
