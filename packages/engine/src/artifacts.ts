/**
 * Read-side boundary operations: get-path, exists, clear and list.
 */

import { type ArtifactEntry, type Manifest, NotFoundError } from '@binstash/core'
import type { CacheEventHandler } from '@binstash/store'

import type { EngineContext } from './context.js'

/**
 * Options for resolving an artifact path.
 */
export interface GetPathOptions {
  /** Fetch when the cache is not valid (default: true) */
  allowFetch?: boolean | undefined
  /** Re-read the manifest instead of using the registry's copy */
  fresh?: boolean | undefined
  onEvent?: CacheEventHandler | undefined
}

/**
 * An entry together with where it lives in the cache.
 */
export interface ArtifactStatus {
  entry: ArtifactEntry
  path: string
  cached: boolean
}

/**
 * Look up an entry by name.
 *
 * @throws NotFoundError listing the available names
 */
export function findEntry(manifest: Manifest, name: string): ArtifactEntry {
  const entry = manifest.entries.get(name)
  if (!entry) {
    throw new NotFoundError(name, manifest.path, [...manifest.entries.keys()].sort())
  }
  return entry
}

/**
 * Load a manifest through the context's registry and look up an entry.
 */
export async function loadEntry(
  ctx: EngineContext,
  manifestPath: string,
  name: string,
  options: { fresh?: boolean | undefined } = {}
): Promise<ArtifactEntry> {
  const manifest = await ctx.manifests.load(manifestPath, { fresh: options.fresh })
  return findEntry(manifest, name)
}

/**
 * Resolve an artifact to a valid cache directory, fetching it if needed.
 *
 * @throws NotFoundError for an unknown name
 * @throws NotCachedError when `allowFetch` is false and nothing is cached
 * @throws AllSourcesFailedError when every source failed
 */
export async function getPath(
  ctx: EngineContext,
  manifestPath: string,
  name: string,
  options: GetPathOptions = {}
): Promise<string> {
  const entry = await loadEntry(ctx, manifestPath, name, options)
  return ctx.cache.resolve(entry, { allowFetch: options.allowFetch, onEvent: options.onEvent })
}

/**
 * The cache directory an artifact would occupy, without checking it.
 */
export async function artifactPath(ctx: EngineContext, manifestPath: string, name: string): Promise<string> {
  const entry = await loadEntry(ctx, manifestPath, name)
  return ctx.cache.pathFor(entry)
}

/**
 * Whether an artifact is cached and complete. Unknown names are not cached.
 */
export async function artifactExists(ctx: EngineContext, manifestPath: string, name: string): Promise<boolean> {
  const manifest = await ctx.manifests.load(manifestPath)
  const entry = manifest.entries.get(name)
  return entry ? ctx.cache.exists(entry) : false
}

/**
 * Delete the cache directory of one artifact, or of every artifact in the
 * manifest when no name is given.
 *
 * @returns Names whose directories were cleared
 */
export async function clearArtifacts(
  ctx: EngineContext,
  manifestPath: string,
  name?: string
): Promise<string[]> {
  const manifest = await ctx.manifests.load(manifestPath)
  const entries = name === undefined ? [...manifest.entries.values()] : [findEntry(manifest, name)]

  for (const entry of entries) {
    await ctx.cache.clear(entry)
  }
  return entries.map((entry) => entry.name)
}

/**
 * Every entry of a manifest with its cache path and state.
 */
export async function listArtifacts(ctx: EngineContext, manifestPath: string): Promise<ArtifactStatus[]> {
  const manifest = await ctx.manifests.load(manifestPath)
  const statuses: ArtifactStatus[] = []
  for (const entry of manifest.entries.values()) {
    statuses.push({ entry, path: ctx.cache.pathFor(entry), cached: await ctx.cache.exists(entry) })
  }
  return statuses
}
