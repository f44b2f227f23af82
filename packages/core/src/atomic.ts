/**
 * Atomic file and directory operations for binstash
 *
 * Files are written to a temporary sibling and renamed into place, so the
 * target is never observed half written. Directories are published with a
 * single rename when source and target share a filesystem.
 */

import * as crypto from 'node:crypto'
import * as fs from 'node:fs'
import * as path from 'node:path'

/** Options for atomic write operations */
export interface AtomicWriteOptions {
  /** File mode (default: 0o644) */
  mode?: number
  /** Temporary file suffix (default: .tmp) */
  tmpSuffix?: string
  /** Whether to fsync before rename (default: true for durability) */
  fsync?: boolean
}

const DEFAULT_OPTIONS: Required<AtomicWriteOptions> = {
  mode: 0o644,
  tmpSuffix: '.tmp',
  fsync: true,
}

/**
 * Generate a unique temporary path next to the target
 */
function getTmpPath(targetPath: string, suffix: string): string {
  const dir = path.dirname(targetPath)
  const base = path.basename(targetPath)
  const rand = crypto.randomBytes(6).toString('hex')
  return path.join(dir, `.${base}.${rand}${suffix}`)
}

/**
 * Write content to a file atomically
 *
 * @param filePath - Target file path
 * @param content - Content to write (string or Buffer)
 * @param options - Write options
 */
export async function atomicWrite(
  filePath: string,
  content: string | Buffer,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const opts = { ...DEFAULT_OPTIONS, ...options }

  await fs.promises.mkdir(path.dirname(filePath), { recursive: true })

  const tmpPath = getTmpPath(filePath, opts.tmpSuffix)

  try {
    await fs.promises.writeFile(tmpPath, content, { mode: opts.mode })

    if (opts.fsync) {
      const fd = await fs.promises.open(tmpPath, 'r')
      try {
        await fd.sync()
      } finally {
        await fd.close()
      }
    }

    await fs.promises.rename(tmpPath, filePath)
  } catch (err) {
    await fs.promises.rm(tmpPath, { force: true })
    throw err
  }
}

// ============================================================================
// Directory operations
// ============================================================================

/** Options for copying a directory tree */
export interface CopyDirOptions {
  /** Names to skip at the top level of the source */
  exclude?: readonly string[] | undefined
}

/**
 * Copy a file, preserving mode and creating parent directories
 */
export async function copyFile(src: string, dest: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(dest), { recursive: true })
  await fs.promises.copyFile(src, dest)
  const srcStat = await fs.promises.stat(src)
  await fs.promises.chmod(dest, srcStat.mode)
}

/**
 * Recursively copy a directory (files, directories and symlinks)
 */
export async function copyDir(src: string, dest: string, options: CopyDirOptions = {}): Promise<void> {
  const exclude = new Set(options.exclude ?? [])
  await fs.promises.mkdir(dest, { recursive: true })

  const entries = await fs.promises.readdir(src, { withFileTypes: true })

  for (const entry of entries) {
    if (exclude.has(entry.name)) {
      continue
    }
    const srcPath = path.join(src, entry.name)
    const destPath = path.join(dest, entry.name)

    if (entry.isDirectory()) {
      await copyDir(srcPath, destPath)
    } else if (entry.isFile()) {
      await copyFile(srcPath, destPath)
    } else if (entry.isSymbolicLink()) {
      const target = await fs.promises.readlink(srcPath)
      await fs.promises.symlink(target, destPath)
    }
  }
}

/**
 * Move a directory into place, replacing whatever is at the target.
 *
 * Renames when possible. Across filesystems (EXDEV) the tree is copied,
 * skipping `exclude`, and the source is removed.
 *
 * @returns 'rename' if the move was a single rename, 'copy' otherwise
 */
export async function moveDir(
  src: string,
  dest: string,
  options: CopyDirOptions = {}
): Promise<'rename' | 'copy'> {
  await fs.promises.mkdir(path.dirname(dest), { recursive: true })
  await fs.promises.rm(dest, { recursive: true, force: true })

  try {
    await fs.promises.rename(src, dest)
    return 'rename'
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'EXDEV') {
      throw err
    }
  }

  await copyDir(src, dest, options)
  await fs.promises.rm(src, { recursive: true, force: true })
  return 'copy'
}
