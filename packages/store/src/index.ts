/**
 * @binstash/store
 *
 * Cache paths, content hashing, the archive codec, the download fetcher
 * and the artifact cache.
 */

export {
  DEFAULT_CACHE_HOME,
  MARKER_FILENAME,
  PathResolver,
  cacheKey,
  ensureDir,
  getCacheHome,
  type PathOptions,
} from './paths.js'

export {
  TREE_DIGEST_LENGTH,
  fallbackTreeDigest,
  fileDigest,
  treeDigest,
  type TreeDigestMethod,
  type TreeDigestOptions,
} from './hash.js'

export {
  COMPRESSIONS,
  DEFAULT_ARCHIVE_KIND,
  DefaultArchiveCodec,
  archiveExtension,
  archiveKindFromUrl,
  type ArchiveCodec,
  type ArchiveKind,
  type Compression,
} from './archive.js'

export {
  DEFAULT_FETCH_TIMEOUT,
  DefaultDownloadFetcher,
  type DownloadFetcher,
  type FetcherOptions,
} from './fetcher.js'

export {
  ArtifactCache,
  normalizeRoot,
  type ArtifactCacheOptions,
  type CacheEvent,
  type CacheEventHandler,
  type ResolveOptions,
  type SourceFailureKind,
  type SourceOutcome,
} from './cache.js'
