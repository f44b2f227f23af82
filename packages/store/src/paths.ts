/**
 * Path management for the artifact cache.
 *
 * Layout under the cache root:
 *
 * ~/.binstash/
 * ├── <contentHash>/         # artifact keyed by its tree digest
 * │   ├── .binstash-complete # zero-byte completion marker
 * │   └── ...
 * ├── <name>/                # artifact without a content hash, keyed by name
 * ├── .tmp/                  # staging directories during fetches
 * └── .locks/                # per-artifact lock files
 */

import { mkdir } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join, resolve } from 'node:path'

import type { ArtifactEntry } from '@binstash/core'

/**
 * Default cache root location.
 */
export const DEFAULT_CACHE_HOME = join(homedir(), '.binstash')

/** Name of the marker file that makes a cache directory valid */
export const MARKER_FILENAME = '.binstash-complete'

/**
 * Get the global default cache root.
 * Uses BINSTASH_HOME if set, otherwise ~/.binstash
 */
export function getCacheHome(): string {
  const fromEnv = process.env['BINSTASH_HOME']
  return fromEnv ? resolve(fromEnv) : DEFAULT_CACHE_HOME
}

/**
 * Cache key of an entry: its content hash if present, else its name.
 */
export function cacheKey(entry: Pick<ArtifactEntry, 'name' | 'contentHash'>): string {
  return entry.contentHash ?? entry.name
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true })
}

/**
 * Options for path resolution.
 */
export interface PathOptions {
  /** Override the cache root (default: getCacheHome()) */
  cacheRoot?: string | undefined
}

/**
 * Path resolver for one cache root.
 */
export class PathResolver {
  readonly cacheRoot: string

  constructor(options: PathOptions = {}) {
    this.cacheRoot = resolve(options.cacheRoot ?? getCacheHome())
  }

  get temp(): string {
    return join(this.cacheRoot, '.tmp')
  }

  get locks(): string {
    return join(this.cacheRoot, '.locks')
  }

  /** Cache directory of an entry */
  artifactDir(entry: Pick<ArtifactEntry, 'name' | 'contentHash'>): string {
    return join(this.cacheRoot, cacheKey(entry))
  }

  /** Completion marker of an entry's cache directory */
  marker(entry: Pick<ArtifactEntry, 'name' | 'contentHash'>): string {
    return join(this.artifactDir(entry), MARKER_FILENAME)
  }

  /** Lock file guarding an entry's cache directory */
  lockFile(entry: Pick<ArtifactEntry, 'name' | 'contentHash'>): string {
    return join(this.locks, `${cacheKey(entry)}.lock`)
  }

  async ensureAll(): Promise<void> {
    await Promise.all([ensureDir(this.cacheRoot), ensureDir(this.temp), ensureDir(this.locks)])
  }
}
