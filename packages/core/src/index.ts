/**
 * @binstash/core
 *
 * Types, errors, the manifest store, file locks and atomic writes.
 */

// Types
export {
  ENTRY_KEYS,
  MANIFEST_FILENAMES,
  type ArtifactEntry,
  type DownloadSource,
  type Manifest,
  type Platform,
  type PlatformArch,
  type PlatformOs,
  type TomlTable,
  type TomlValue,
} from './types.js'

// Schemas
export { validateManifest } from './schemas/index.js'
export type { ValidationError, ValidationResult } from './schemas/index.js'

// Manifest store
export {
  currentPlatform,
  deepEqual,
  emptyTable,
  entryFromTable,
  findManifest,
  isTable,
  isTableArray,
  ManifestRegistry,
  manifestFromDocument,
  matchesPlatform,
  ownValue,
  parseManifestToml,
  readManifest,
  readManifestDocument,
  readManifestDocumentIfExists,
  rewriteManifestSource,
  selectEntryTable,
  selectVariant,
  serializeManifestToml,
  setOwn,
  tablesOf,
  toPlatform,
  writeManifestDocument,
} from './manifest/index.js'
export type { ManifestLoadOptions } from './manifest/index.js'

// Errors
export {
  AllSourcesFailedError,
  AlreadyExistsError,
  BinstashError,
  CacheError,
  ChecksumMismatchError,
  DownloadError,
  ExtractionError,
  GitError,
  IOError,
  isBinstashError,
  isCacheError,
  isManifestError,
  isSourceError,
  LockError,
  LockTimeoutError,
  ManifestError,
  ManifestParseError,
  NoManifestError,
  NoSourcesError,
  NotADirectoryError,
  NotCachedError,
  NotFoundError,
  SourceError,
} from './errors.js'

// Locks
export { acquireLock, isLocked, withLock } from './locks.js'
export type { LockHandle, LockOptions, ReleaseFn } from './locks.js'

// Atomic file operations
export { atomicWrite, copyDir, copyFile, moveDir } from './atomic.js'
export type { AtomicWriteOptions, CopyDirOptions } from './atomic.js'
