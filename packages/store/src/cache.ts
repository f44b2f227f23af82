/**
 * Artifact cache: resolves manifest entries to valid local directories.
 *
 * A cache directory is valid iff it exists and holds the completion
 * marker. Fetches try each download source in order: download into a
 * private staging directory, verify the sha256, extract, normalize a
 * single top-level directory away, then publish with one rename. Every
 * fetch and clear runs under a per-entry file lock.
 */

import { mkdtemp, readdir, rm, stat, writeFile } from 'node:fs/promises'
import { join } from 'node:path'

import {
  AllSourcesFailedError,
  type ArtifactEntry,
  ChecksumMismatchError,
  type DownloadSource,
  DownloadError,
  ExtractionError,
  type LockOptions,
  NoSourcesError,
  NotCachedError,
  type SourceError,
  isSourceError,
  moveDir,
  withLock,
} from '@binstash/core'

import { type ArchiveCodec, type ArchiveKind, archiveKindFromUrl } from './archive.js'
import type { DownloadFetcher } from './fetcher.js'
import { fileDigest } from './hash.js'
import { MARKER_FILENAME, type PathResolver, cacheKey } from './paths.js'

// ============================================================================
// Events and outcomes
// ============================================================================

/** Progress events reported while resolving an entry */
export type CacheEvent =
  | { type: 'download'; name: string; url: string; attempt: number; total: number }
  | { type: 'verify'; name: string; url: string; expected: string }
  | { type: 'extract'; name: string; url: string; kind: ArchiveKind }
  | { type: 'source-failed'; name: string; url: string; kind: SourceFailureKind; error: SourceError }
  | { type: 'ready'; name: string; path: string; fetched: boolean }

export type CacheEventHandler = (event: CacheEvent) => void

/** Why a single download source was abandoned */
export type SourceFailureKind = 'download' | 'checksum' | 'extraction'

/** Result of trying one download source */
export type SourceOutcome =
  | { ok: true; path: string }
  | { ok: false; kind: SourceFailureKind; error: SourceError }

export interface ResolveOptions {
  /** Run the fetch pipeline when the cache is not valid (default: true) */
  allowFetch?: boolean | undefined
  onEvent?: CacheEventHandler | undefined
}

export interface ArtifactCacheOptions {
  paths: PathResolver
  fetcher: DownloadFetcher
  codec: ArchiveCodec
  /** Options for the per-entry lock */
  lock?: LockOptions | undefined
}

type CacheKeyed = Pick<ArtifactEntry, 'name' | 'contentHash'>

function fail(kind: SourceFailureKind, error: SourceError): SourceOutcome {
  return { ok: false, kind, error }
}

function asDownloadError(url: string, err: unknown): SourceError {
  if (isSourceError(err)) {
    return err
  }
  return new DownloadError(url, err instanceof Error ? err.message : String(err), { cause: err })
}

/**
 * Pick the artifact root of an extraction: the only top-level entry when
 * it is a directory, else the extraction directory itself.
 */
export async function normalizeRoot(extracted: string): Promise<string> {
  const entries = await readdir(extracted, { withFileTypes: true })
  const only = entries.length === 1 ? entries[0] : undefined
  return only?.isDirectory() ? join(extracted, only.name) : extracted
}

// ============================================================================
// Cache
// ============================================================================

export class ArtifactCache {
  readonly paths: PathResolver
  private readonly fetcher: DownloadFetcher
  private readonly codec: ArchiveCodec
  private readonly lockOptions: LockOptions

  constructor(options: ArtifactCacheOptions) {
    this.paths = options.paths
    this.fetcher = options.fetcher
    this.codec = options.codec
    this.lockOptions = options.lock ?? {}
  }

  /** Cache directory of an entry, valid or not */
  pathFor(entry: CacheKeyed): string {
    return this.paths.artifactDir(entry)
  }

  /**
   * Whether the entry's cache directory exists and is marked complete.
   * Never touches the network.
   */
  async exists(entry: CacheKeyed): Promise<boolean> {
    try {
      const [dir, marker] = await Promise.all([
        stat(this.pathFor(entry)),
        stat(this.paths.marker(entry)),
      ])
      return dir.isDirectory() && marker.isFile()
    } catch (err) {
      const code = (err as NodeJS.ErrnoException).code
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return false
      }
      throw err
    }
  }

  /**
   * Resolve an entry to its cache directory, fetching it when needed.
   *
   * @throws NotCachedError if the cache is not valid and fetching is disabled
   * @throws NoSourcesError if a fetch is needed and the entry has no sources
   * @throws AllSourcesFailedError if every source failed
   */
  async resolve(entry: ArtifactEntry, options: ResolveOptions = {}): Promise<string> {
    const { allowFetch = true, onEvent } = options
    const emit: CacheEventHandler = onEvent ?? (() => {})
    const dir = this.pathFor(entry)

    if (await this.exists(entry)) {
      emit({ type: 'ready', name: entry.name, path: dir, fetched: false })
      return dir
    }
    if (!allowFetch) {
      throw new NotCachedError(entry.name, dir)
    }
    if (entry.sources.length === 0) {
      throw new NoSourcesError(entry.name)
    }

    await this.paths.ensureAll()
    return withLock(
      this.paths.lockFile(entry),
      async () => {
        // Another process may have published while we waited
        if (await this.exists(entry)) {
          emit({ type: 'ready', name: entry.name, path: dir, fetched: false })
          return dir
        }
        return this.fetch(entry, emit)
      },
      this.lockOptions
    )
  }

  /**
   * Delete an entry's cache directory. Missing directories are a no-op.
   */
  async clear(entry: CacheKeyed): Promise<void> {
    await withLock(
      this.paths.lockFile(entry),
      () => rm(this.pathFor(entry), { recursive: true, force: true }),
      this.lockOptions
    )
  }

  private async fetch(entry: ArtifactEntry, emit: CacheEventHandler): Promise<string> {
    const total = entry.sources.length
    let lastFailure: SourceError | undefined

    for (const [index, source] of entry.sources.entries()) {
      emit({ type: 'download', name: entry.name, url: source.url, attempt: index + 1, total })
      const outcome = await this.trySource(entry, source, emit)
      if (outcome.ok) {
        emit({ type: 'ready', name: entry.name, path: outcome.path, fetched: true })
        return outcome.path
      }
      emit({
        type: 'source-failed',
        name: entry.name,
        url: source.url,
        kind: outcome.kind,
        error: outcome.error,
      })
      lastFailure = outcome.error
    }

    if (!lastFailure) {
      throw new NoSourcesError(entry.name)
    }
    throw new AllSourcesFailedError(entry.name, total, lastFailure)
  }

  /**
   * Download, verify, extract and publish one source.
   * The staging directory (download included) is removed on every path.
   */
  private async trySource(
    entry: ArtifactEntry,
    source: DownloadSource,
    emit: CacheEventHandler
  ): Promise<SourceOutcome> {
    const staging = await mkdtemp(join(this.paths.temp, `${cacheKey(entry)}-`))
    const download = join(staging, 'download')
    const extracted = join(staging, 'extracted')

    try {
      try {
        await this.fetcher.fetch(source.url, download)
      } catch (err) {
        return fail('download', asDownloadError(source.url, err))
      }

      if (source.expectedDigest !== '') {
        emit({ type: 'verify', name: entry.name, url: source.url, expected: source.expectedDigest })
        let actual: string
        try {
          actual = await fileDigest(download)
        } catch (err) {
          return fail('download', asDownloadError(source.url, err))
        }
        if (actual.toLowerCase() !== source.expectedDigest.toLowerCase()) {
          return fail('checksum', new ChecksumMismatchError(source.url, source.expectedDigest, actual))
        }
      }

      const kind = archiveKindFromUrl(source.url)
      emit({ type: 'extract', name: entry.name, url: source.url, kind })
      try {
        await this.codec.extract(download, extracted, kind)
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err)
        return fail('extraction', new ExtractionError(source.url, detail, { cause: err }))
      }
      await rm(download, { force: true })

      return { ok: true, path: await this.publish(entry, await normalizeRoot(extracted)) }
    } finally {
      await rm(staging, { recursive: true, force: true })
    }
  }

  /**
   * Move a staged root into the entry's cache directory, replacing any
   * stale directory. The marker goes in before a rename, or last after a
   * cross-device copy.
   */
  private async publish(entry: ArtifactEntry, root: string): Promise<string> {
    const dir = this.pathFor(entry)
    await writeFile(join(root, MARKER_FILENAME), '')
    const method = await moveDir(root, dir, { exclude: [MARKER_FILENAME] })
    if (method === 'copy') {
      await writeFile(this.paths.marker(entry), '')
    }
    return dir
  }
}
