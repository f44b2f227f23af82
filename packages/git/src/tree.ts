/**
 * Canonical tree ids computed by git.
 *
 * Git hashes a directory as a tree object: the sorted (mode, name, object id)
 * tuples of its entries, recursively. The id depends only on relative paths,
 * file contents and the executable bit; empty directories do not appear.
 */

import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join, resolve } from 'node:path'

import { gitExec, gitExecStdout } from './exec.js'

/** Options for tree id computation */
export interface TreeIdOptions {
  /** Directory for the scratch repository (default: os.tmpdir()) */
  tempDir?: string | undefined
  /** Timeout per git invocation in milliseconds */
  timeout?: number | undefined
}

/**
 * Compute the git tree id (40 hex characters) of a directory's contents.
 *
 * Stages every file of `directory` into the index of a scratch repository,
 * ignoring .gitignore rules, and writes the tree. The directory itself is
 * not modified.
 *
 * @throws GitError if git is missing or a command fails
 */
export async function computeTreeId(directory: string, options: TreeIdOptions = {}): Promise<string> {
  const scratch = await mkdtemp(join(options.tempDir ?? tmpdir(), 'binstash-tree-'))
  const repoDir = join(scratch, 'repo')
  const gitDir = join(repoDir, '.git')
  const env = {
    GIT_DIR: gitDir,
    GIT_WORK_TREE: resolve(directory),
    GIT_CONFIG_NOSYSTEM: '1',
    GIT_CONFIG_GLOBAL: join(scratch, 'gitconfig'),
  }
  const exec = { env, timeout: options.timeout }

  try {
    await gitExec(['init', '--quiet', repoDir], { timeout: options.timeout })
    await gitExec(
      ['-c', 'core.autocrlf=false', '-c', 'core.fileMode=true', 'add', '--all', '--force', '.'],
      { ...exec, cwd: resolve(directory) }
    )
    return await gitExecStdout(['write-tree'], exec)
  } finally {
    await rm(scratch, { recursive: true, force: true })
  }
}
