/**
 * List command - Show every artifact in the manifest and its cache state.
 */

import chalk from 'chalk'
import type { Command } from 'commander'

import { listArtifacts } from '@binstash/engine'

import { type CommonOptions, contextFromOptions, resolveManifestPath, withCommonOptions } from '../helpers.js'
import { colors, formatPath, symbols } from '../ui.js'

interface ListOptions extends CommonOptions {
  json?: boolean | undefined
}

/**
 * Register the list command.
 */
export function registerListCommand(program: Command): void {
  withCommonOptions(
    program
      .command('list')
      .description('List artifacts in the manifest and whether they are cached')
      .option('--json', 'Output as JSON')
  ).action(async (options: ListOptions) => {
    const manifestPath = await resolveManifestPath(options)
    const statuses = await listArtifacts(contextFromOptions(options), manifestPath)

    if (options.json) {
      const output = statuses.map(({ entry, path, cached }) => ({
        name: entry.name,
        contentHash: entry.contentHash,
        lazy: entry.lazy,
        sources: entry.sources.length,
        cached,
        path,
      }))
      console.log(JSON.stringify(output, null, 2))
      return
    }

    if (statuses.length === 0) {
      console.log(colors.muted(`No artifacts in ${formatPath(manifestPath)}`))
      return
    }
    for (const { entry, path, cached } of statuses) {
      const marker = cached ? symbols.success : symbols.circle
      const lazy = entry.lazy ? colors.muted(' (lazy)') : ''
      console.log(`${marker} ${chalk.bold(entry.name)}${lazy}`)
      console.log(`  ${colors.muted(cached ? formatPath(path) : `${entry.sources.length} source(s)`)}`)
    }
  })
}
