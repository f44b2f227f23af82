/**
 * Content hashing: whole-file sha256 digests and directory tree digests.
 *
 * A tree digest identifies a directory by its (relative path, content)
 * pairs only. It is computed by git's tree hashing when git is on PATH,
 * and by a sorted sha256 stream otherwise.
 */

import { createHash, type Hash } from 'node:crypto'
import { createReadStream } from 'node:fs'
import { readdir, stat } from 'node:fs/promises'
import { join } from 'node:path'

import { IOError, NotADirectoryError } from '@binstash/core'
import { computeTreeId, isGitAvailable } from '@binstash/git'

/** Read size for streamed hashing */
const CHUNK_SIZE = 64 * 1024

/** Width of a tree digest in hex characters */
export const TREE_DIGEST_LENGTH = 40

/**
 * Stream a file's bytes into a hash.
 */
function hashFileInto(hash: Hash, path: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const stream = createReadStream(path, { highWaterMark: CHUNK_SIZE })
    stream.on('data', (chunk: string | Buffer) => hash.update(chunk))
    stream.on('error', (err) => reject(new IOError(path, err.message, { cause: err })))
    stream.on('end', () => resolve())
  })
}

/**
 * Compute the sha256 hex digest of a file's bytes.
 *
 * @throws IOError if the file cannot be read
 */
export async function fileDigest(path: string): Promise<string> {
  const hash = createHash('sha256')
  await hashFileInto(hash, path)
  return hash.digest('hex')
}

/**
 * Collect the relative POSIX paths of every regular file under a directory.
 */
async function collectFiles(root: string, prefix = ''): Promise<string[]> {
  const files: string[] = []
  const entries = await readdir(prefix ? join(root, prefix) : root, { withFileTypes: true })
  for (const entry of entries) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name
    if (entry.isDirectory()) {
      files.push(...(await collectFiles(root, relative)))
    } else if (entry.isFile()) {
      files.push(relative)
    }
  }
  return files
}

/**
 * Tree digest without git: regular files sorted byte-wise by relative path,
 * each streamed as path bytes then content bytes through one sha256,
 * truncated to the width of a git tree id. Empty directories contribute
 * nothing.
 */
export async function fallbackTreeDigest(directory: string): Promise<string> {
  const files = await collectFiles(directory)
  files.sort((a, b) => Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8')))

  const hash = createHash('sha256')
  for (const relative of files) {
    hash.update(Buffer.from(relative, 'utf8'))
    await hashFileInto(hash, join(directory, ...relative.split('/')))
  }
  return hash.digest('hex').slice(0, TREE_DIGEST_LENGTH)
}

/** How a tree digest is computed */
export type TreeDigestMethod = 'auto' | 'git' | 'fallback'

export interface TreeDigestOptions {
  /** 'auto' (default) uses git when available, else the fallback */
  method?: TreeDigestMethod | undefined
}

let gitAvailable: Promise<boolean> | undefined

/**
 * Compute a location-independent digest of a directory's contents.
 *
 * @throws NotADirectoryError if the path is not a directory
 * @throws GitError if git is selected and fails
 */
export async function treeDigest(directory: string, options: TreeDigestOptions = {}): Promise<string> {
  const { method = 'auto' } = options

  let isDirectory = false
  try {
    isDirectory = (await stat(directory)).isDirectory()
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw err
    }
  }
  if (!isDirectory) {
    throw new NotADirectoryError(directory)
  }

  if (method === 'fallback') {
    return fallbackTreeDigest(directory)
  }
  if (method === 'auto') {
    gitAvailable ??= isGitAvailable()
    if (!(await gitAvailable)) {
      return fallbackTreeDigest(directory)
    }
  }
  return computeTreeId(directory)
}
