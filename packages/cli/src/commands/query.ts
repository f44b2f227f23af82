/**
 * Query command - Download a URL and print its hashes without touching
 * any manifest.
 */

import type { Command } from 'commander'

import { queryRemoteInfo } from '@binstash/engine'

import { contextFromOptions } from '../helpers.js'
import { createSpinner, warning } from '../ui.js'

interface QueryOptions {
  treeHash: boolean
  json?: boolean | undefined
}

/**
 * Register the query command.
 */
export function registerQueryCommand(program: Command): void {
  program
    .command('query')
    .description('Download a URL and print its sha256 and tree hash')
    .argument('<url>', 'Download URL')
    .option('--no-tree-hash', 'Skip extracting the archive to compute its tree hash')
    .option('--json', 'Output as JSON')
    .action(async (url: string, options: QueryOptions) => {
      const spinner = createSpinner(`Downloading ${url}`).start()
      let result: Awaited<ReturnType<typeof queryRemoteInfo>>
      try {
        result = await queryRemoteInfo(contextFromOptions({}), url, {
          computeTreeHash: options.treeHash,
        })
      } finally {
        spinner.stop()
      }

      if (options.json) {
        console.log(JSON.stringify(result, null, 2))
        return
      }
      for (const message of result.warnings) {
        warning(message)
      }
      console.log(`sha256 = "${result.sha256}"`)
      if (result.treeDigest) {
        console.log(`git-tree-sha1 = "${result.treeDigest}"`)
      }
    })
}
