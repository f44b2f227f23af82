/**
 * Artifact builder: creates archives from directories and writes manifest
 * entries (bind, unbind, add-source, add-from-url).
 *
 * Manifest rewrites go through the parsed TOML document, so keys this
 * module does not know about are written back unchanged.
 */

import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { basename, dirname, join, resolve } from 'node:path'

import {
  AlreadyExistsError,
  ENTRY_KEYS,
  NotFoundError,
  type TomlTable,
  emptyTable,
  isTable,
  ownValue,
  readManifestDocument,
  readManifestDocumentIfExists,
  selectEntryTable,
  setOwn,
  tablesOf,
  writeManifestDocument,
} from '@binstash/core'
import {
  type Compression,
  archiveExtension,
  archiveKindFromUrl,
  fileDigest,
  normalizeRoot,
  treeDigest,
} from '@binstash/store'

import type { EngineContext } from './context.js'

// ============================================================================
// create-archive
// ============================================================================

export interface CreateArchiveOptions {
  /** Compression (default: gz) */
  compression?: Compression | undefined
  /** Archive path (default: beside the directory, named after it) */
  output?: string | undefined
}

export interface CreateArchiveResult {
  /** Digest of the directory contents; the artifact's stable identity */
  treeDigest: string
  /** sha256 of the archive bytes */
  archiveDigest: string
  archivePath: string
}

/**
 * Archive a directory as a single top-level entry named after it.
 *
 * @throws NotADirectoryError if `directory` is not a directory
 */
export async function createArchive(
  ctx: EngineContext,
  directory: string,
  options: CreateArchiveOptions = {}
): Promise<CreateArchiveResult> {
  const { compression = 'gz' } = options
  const source = resolve(directory)

  const digest = await treeDigest(source, { method: ctx.treeDigestMethod })

  const archivePath = resolve(
    options.output ?? join(dirname(source), `${basename(source)}${archiveExtension(compression)}`)
  )
  await ctx.codec.create(source, archivePath, compression)

  return {
    treeDigest: digest,
    archiveDigest: await fileDigest(archivePath),
    archivePath,
  }
}

// ============================================================================
// Manifest rewrites
// ============================================================================

export interface BindOptions {
  /** Tree digest of the artifact contents; omitted from the entry when undefined */
  treeDigest: string | undefined
  url: string
  /** sha256 of the archive at `url`; '' writes no digest */
  sha256: string
  /** Written as `lazy = true` only when set */
  lazy?: boolean | undefined
  /** Replace an existing entry of the same name */
  force?: boolean | undefined
}

function downloadTable(url: string, sha256: string): TomlTable {
  return sha256 === '' ? { url } : { url, sha256 }
}

/**
 * Insert an entry with a single download source.
 *
 * With `force`, an existing table keeps its other keys and has its hash,
 * `lazy` flag and sources replaced; a variant array is replaced whole.
 *
 * @throws AlreadyExistsError if the name is bound and `force` is not set
 * @throws ManifestParseError (and writes nothing) if the result would not be
 * a valid manifest
 */
export async function bindEntry(
  ctx: EngineContext,
  manifestPath: string,
  name: string,
  options: BindOptions
): Promise<void> {
  const document = (await readManifestDocumentIfExists(manifestPath)) ?? emptyTable()
  const existing = ownValue(document, name)

  if (existing !== undefined && !options.force) {
    throw new AlreadyExistsError(name, resolve(manifestPath))
  }

  const table = emptyTable()
  if (isTable(existing)) {
    for (const [key, value] of Object.entries(existing)) {
      if (
        key !== ENTRY_KEYS.CONTENT_HASH &&
        key !== ENTRY_KEYS.CONTENT_HASH_ALIAS &&
        key !== ENTRY_KEYS.LAZY &&
        key !== ENTRY_KEYS.DOWNLOAD
      ) {
        setOwn(table, key, value)
      }
    }
  }
  if (options.treeDigest !== undefined) {
    table[ENTRY_KEYS.CONTENT_HASH] = options.treeDigest
  }
  if (options.lazy) {
    table[ENTRY_KEYS.LAZY] = true
  }
  table[ENTRY_KEYS.DOWNLOAD] = [downloadTable(options.url, options.sha256)]

  setOwn(document, name, table)
  await writeManifestDocument(manifestPath, document)
  ctx.manifests.forget(manifestPath)
}

/**
 * Remove an entry.
 *
 * @returns false when the manifest file or the name does not exist
 */
export async function unbindEntry(ctx: EngineContext, manifestPath: string, name: string): Promise<boolean> {
  const document = await readManifestDocumentIfExists(manifestPath)
  if (document === null || !Object.hasOwn(document, name)) {
    return false
  }

  delete document[name]
  await writeManifestDocument(manifestPath, document)
  ctx.manifests.forget(manifestPath)
  return true
}

/**
 * Append a download source to an existing entry. For a variant array the
 * source goes to the variant selected for the context's platform.
 *
 * @throws NoManifestError if the manifest file does not exist
 * @throws NotFoundError if the name is not bound
 * @throws ManifestParseError (and writes nothing) if `sha256` is not a hex digest
 */
export async function addDownloadSource(
  ctx: EngineContext,
  manifestPath: string,
  name: string,
  url: string,
  sha256: string
): Promise<void> {
  const document = await readManifestDocument(manifestPath)
  const table = selectEntryTable(ownValue(document, name), ctx.manifests.platform)
  if (!table) {
    throw new NotFoundError(name, resolve(manifestPath), Object.keys(document).sort())
  }

  table[ENTRY_KEYS.DOWNLOAD] = [...tablesOf(table[ENTRY_KEYS.DOWNLOAD]), downloadTable(url, sha256)]
  await writeManifestDocument(manifestPath, document)
  ctx.manifests.forget(manifestPath)
}

// ============================================================================
// Remote sources
// ============================================================================

export interface QueryOptions {
  /** Also extract the download to compute its tree digest */
  computeTreeHash?: boolean | undefined
}

export interface RemoteInfo {
  url: string
  /** sha256 of the downloaded bytes */
  sha256: string
  /** Present when requested and the download could be extracted */
  treeDigest?: string | undefined
  /** Problems that did not fail the query */
  warnings: string[]
}

/**
 * Download a URL to scratch space and describe it.
 * Extraction failures only add a warning and leave `treeDigest` unset.
 *
 * @throws DownloadError if the URL cannot be downloaded
 */
export async function queryRemoteInfo(
  ctx: EngineContext,
  url: string,
  options: QueryOptions = {}
): Promise<RemoteInfo> {
  const scratch = await mkdtemp(join(tmpdir(), 'binstash-query-'))
  try {
    const download = join(scratch, 'download')
    await ctx.fetcher.fetch(url, download)
    const info: RemoteInfo = { url, sha256: await fileDigest(download), warnings: [] }

    if (options.computeTreeHash) {
      const extracted = join(scratch, 'extracted')
      try {
        await ctx.codec.extract(download, extracted, archiveKindFromUrl(url))
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err)
        info.warnings.push(`Could not extract ${url} to compute its tree hash: ${detail}`)
        return info
      }
      info.treeDigest = await treeDigest(await normalizeRoot(extracted), { method: ctx.treeDigestMethod })
    }
    return info
  } finally {
    await rm(scratch, { recursive: true, force: true })
  }
}

export interface AddFromUrlOptions {
  lazy?: boolean | undefined
  force?: boolean | undefined
}

/**
 * Download a URL, hash it and bind it under `name`.
 *
 * An existing name is rejected before anything is downloaded; bindEntry
 * repeats the check against the file as it is when writing.
 *
 * @throws AlreadyExistsError if the name is bound and `force` is not set
 */
export async function addArtifactFromURL(
  ctx: EngineContext,
  manifestPath: string,
  name: string,
  url: string,
  options: AddFromUrlOptions = {}
): Promise<RemoteInfo> {
  if (!options.force) {
    const current = await readManifestDocumentIfExists(manifestPath)
    if (current !== null && Object.hasOwn(current, name)) {
      throw new AlreadyExistsError(name, resolve(manifestPath))
    }
  }

  const info = await queryRemoteInfo(ctx, url, { computeTreeHash: true })
  await bindEntry(ctx, manifestPath, name, {
    treeDigest: info.treeDigest,
    url,
    sha256: info.sha256,
    lazy: options.lazy,
    force: options.force,
  })
  return info
}
