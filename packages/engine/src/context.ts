/**
 * Engine context: the configuration every boundary operation receives.
 *
 * Holds the cache root, the manifest registry and the collaborators used
 * to fetch and unpack artifacts. Nothing is process-global; two contexts
 * may point at different cache roots in one process.
 */

import { type LockOptions, ManifestRegistry, type Platform } from '@binstash/core'
import {
  type ArchiveCodec,
  ArtifactCache,
  DefaultArchiveCodec,
  DefaultDownloadFetcher,
  type DownloadFetcher,
  type FetcherOptions,
  PathResolver,
  type TreeDigestMethod,
} from '@binstash/store'

export interface EngineContext {
  paths: PathResolver
  manifests: ManifestRegistry
  fetcher: DownloadFetcher
  codec: ArchiveCodec
  cache: ArtifactCache
  /** How builder operations compute tree digests */
  treeDigestMethod: TreeDigestMethod
}

/**
 * Options for creating a context. Every field has a default.
 */
export interface ContextOptions {
  /** Override the cache root (default: BINSTASH_HOME or ~/.binstash) */
  cacheRoot?: string | undefined
  /** Platform used for variant selection (default: current process) */
  platform?: Platform | undefined
  /** Share a registry between contexts */
  manifests?: ManifestRegistry | undefined
  fetcher?: DownloadFetcher | undefined
  /** Options for the default fetcher; ignored when `fetcher` is given */
  fetch?: FetcherOptions | undefined
  codec?: ArchiveCodec | undefined
  lock?: LockOptions | undefined
  treeDigestMethod?: TreeDigestMethod | undefined
}

/**
 * Build a context, filling in defaults.
 */
export function createContext(options: ContextOptions = {}): EngineContext {
  const paths = new PathResolver({ cacheRoot: options.cacheRoot })
  const manifests = options.manifests ?? new ManifestRegistry({ platform: options.platform })
  const fetcher = options.fetcher ?? new DefaultDownloadFetcher(options.fetch)
  const codec = options.codec ?? new DefaultArchiveCodec()

  return {
    paths,
    manifests,
    fetcher,
    codec,
    cache: new ArtifactCache({ paths, fetcher, codec, lock: options.lock }),
    treeDigestMethod: options.treeDigestMethod ?? 'auto',
  }
}
