/**
 * Create command - Archive a directory and report its digests.
 */

import type { Command } from 'commander'

import { createArchive } from '@binstash/engine'
import type { Compression } from '@binstash/store'

import { contextFromOptions, parseCompression } from '../helpers.js'
import { formatPath, info, success } from '../ui.js'

interface CreateOptions {
  compression: Compression
  output?: string | undefined
  json?: boolean | undefined
}

/**
 * Register the create command.
 */
export function registerCreateCommand(program: Command): void {
  program
    .command('create')
    .description('Create an archive of a directory and print its tree hash and sha256')
    .argument('<dir>', 'Directory to archive')
    .option('--compression <kind>', 'none, gz, bz2 or xz', parseCompression, 'gz')
    .option('-o, --output <path>', 'Archive path (default: beside the directory)')
    .option('--json', 'Output as JSON')
    .action(async (dir: string, options: CreateOptions) => {
      const result = await createArchive(contextFromOptions({}), dir, {
        compression: options.compression,
        output: options.output,
      })

      if (options.json) {
        console.log(JSON.stringify(result, null, 2))
        return
      }
      success(`Created ${formatPath(result.archivePath)}`)
      info('tree hash', result.treeDigest)
      info('sha256', result.archiveDigest)
    })
}
