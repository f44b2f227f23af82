/**
 * Typed error classes for binstash
 *
 * Error hierarchy:
 * - BinstashError (base)
 *   - ManifestError (manifest file issues)
 *     - ManifestParseError (TOML parse or schema failures)
 *     - NoManifestError (manifest file missing)
 *     - NotFoundError (unknown artifact name)
 *     - AlreadyExistsError (name already bound)
 *   - CacheError (cache resolution)
 *     - NotCachedError (fetch disallowed, no valid cache)
 *     - NoSourcesError (entry lists no download sources)
 *     - AllSourcesFailedError (every source failed)
 *   - SourceError (a single download source, recovered by fallback)
 *     - DownloadError
 *     - ChecksumMismatchError
 *     - ExtractionError
 *   - IOError / NotADirectoryError (filesystem)
 *   - LockError (file locking)
 *   - GitError (git operations)
 */

import type { ValidationError } from './schemas/index.js'

/** Base error class for all binstash errors */
export class BinstashError extends Error {
  readonly code: string

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'BinstashError'
    this.code = code
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor)
  }
}

// ============================================================================
// Manifest errors
// ============================================================================

/** Base class for manifest-related errors */
export class ManifestError extends BinstashError {
  readonly manifestPath: string

  constructor(message: string, code: string, manifestPath: string) {
    super(message, code)
    this.name = 'ManifestError'
    this.manifestPath = manifestPath
  }
}

/** Error thrown when TOML parsing or schema validation fails */
export class ManifestParseError extends ManifestError {
  readonly validationErrors: ValidationError[]

  constructor(message: string, manifestPath: string, validationErrors: ValidationError[] = []) {
    const details = validationErrors.map((e) => `\n  ${e.path}: ${e.message}`).join('')
    super(`${message} (${manifestPath})${details}`, 'MANIFEST_PARSE_ERROR', manifestPath)
    this.name = 'ManifestParseError'
    this.validationErrors = validationErrors
  }
}

/** Error thrown when an operation needs a manifest file that does not exist */
export class NoManifestError extends ManifestError {
  constructor(manifestPath: string) {
    super(`Manifest not found: ${manifestPath}`, 'NO_MANIFEST', manifestPath)
    this.name = 'NoManifestError'
  }
}

/** Error thrown when an artifact name is not defined in the manifest */
export class NotFoundError extends ManifestError {
  readonly artifactName: string
  readonly available: string[]

  constructor(artifactName: string, manifestPath: string, available: string[] = []) {
    const listing = available.length > 0 ? ` Available: ${available.join(', ')}` : ''
    super(
      `Artifact "${artifactName}" not found in ${manifestPath}.${listing}`,
      'NOT_FOUND',
      manifestPath
    )
    this.name = 'NotFoundError'
    this.artifactName = artifactName
    this.available = available
  }
}

/** Error thrown when binding a name that is already present without force */
export class AlreadyExistsError extends ManifestError {
  readonly artifactName: string

  constructor(artifactName: string, manifestPath: string) {
    super(
      `Artifact "${artifactName}" already exists in ${manifestPath}. Use force to overwrite.`,
      'ALREADY_EXISTS',
      manifestPath
    )
    this.name = 'AlreadyExistsError'
    this.artifactName = artifactName
  }
}

// ============================================================================
// Cache errors
// ============================================================================

/** Base class for cache resolution errors */
export class CacheError extends BinstashError {
  readonly artifactName: string

  constructor(message: string, code: string, artifactName: string, options?: { cause?: unknown }) {
    super(message, code, options)
    this.name = 'CacheError'
    this.artifactName = artifactName
  }
}

/** Error thrown when fetching is disallowed and no valid cache directory exists */
export class NotCachedError extends CacheError {
  readonly path: string

  constructor(artifactName: string, path: string) {
    super(`Artifact "${artifactName}" is not cached at ${path} and fetching is disabled`, 'NOT_CACHED', artifactName)
    this.name = 'NotCachedError'
    this.path = path
  }
}

/** Error thrown when an entry has no download sources to fetch from */
export class NoSourcesError extends CacheError {
  constructor(artifactName: string) {
    super(`Artifact "${artifactName}" has no download sources defined`, 'NO_SOURCES', artifactName)
    this.name = 'NoSourcesError'
  }
}

/** Error thrown when every download source of an entry failed */
export class AllSourcesFailedError extends CacheError {
  readonly attempts: number
  readonly lastCause: SourceError

  constructor(artifactName: string, attempts: number, lastCause: SourceError) {
    super(
      `Failed to fetch artifact "${artifactName}" from ${attempts} source${attempts === 1 ? '' : 's'}. Last error: ${lastCause.message}`,
      'ALL_SOURCES_FAILED',
      artifactName,
      { cause: lastCause }
    )
    this.name = 'AllSourcesFailedError'
    this.attempts = attempts
    this.lastCause = lastCause
  }
}

// ============================================================================
// Per-source errors
// ============================================================================

/** Base class for failures of a single download source */
export class SourceError extends BinstashError {
  readonly url: string

  constructor(message: string, code: string, url: string, options?: { cause?: unknown }) {
    super(message, code, options)
    this.name = 'SourceError'
    this.url = url
  }
}

/** Error thrown when the bytes of a source cannot be retrieved */
export class DownloadError extends SourceError {
  constructor(url: string, detail: string, options?: { cause?: unknown }) {
    super(`Download failed from ${url}: ${detail}`, 'DOWNLOAD_ERROR', url, options)
    this.name = 'DownloadError'
  }
}

/** Error thrown when a downloaded file does not match its expected sha256 */
export class ChecksumMismatchError extends SourceError {
  readonly expected: string
  readonly actual: string

  constructor(url: string, expected: string, actual: string) {
    super(`Checksum mismatch for ${url}: expected ${expected}, got ${actual}`, 'CHECKSUM_MISMATCH', url)
    this.name = 'ChecksumMismatchError'
    this.expected = expected
    this.actual = actual
  }
}

/** Error thrown when a downloaded archive cannot be extracted */
export class ExtractionError extends SourceError {
  constructor(url: string, detail: string, options?: { cause?: unknown }) {
    super(`Extraction failed for ${url}: ${detail}`, 'EXTRACTION_ERROR', url, options)
    this.name = 'ExtractionError'
  }
}

// ============================================================================
// Filesystem errors
// ============================================================================

/** Error thrown when a file cannot be read */
export class IOError extends BinstashError {
  readonly path: string

  constructor(path: string, detail: string, options?: { cause?: unknown }) {
    super(`Cannot read "${path}": ${detail}`, 'IO_ERROR', options)
    this.name = 'IOError'
    this.path = path
  }
}

/** Error thrown when a directory was expected */
export class NotADirectoryError extends BinstashError {
  readonly path: string

  constructor(path: string) {
    super(`Not a directory: ${path}`, 'NOT_A_DIRECTORY')
    this.name = 'NotADirectoryError'
    this.path = path
  }
}

// ============================================================================
// Lock errors
// ============================================================================

/** Error thrown during file locking operations */
export class LockError extends BinstashError {
  readonly lockPath: string

  constructor(message: string, lockPath: string) {
    super(`Lock error for "${lockPath}": ${message}`, 'LOCK_ERROR')
    this.name = 'LockError'
    this.lockPath = lockPath
  }
}

/** Error thrown when lock acquisition times out */
export class LockTimeoutError extends LockError {
  readonly timeout: number

  constructor(lockPath: string, timeout: number) {
    super(`Timed out after ${timeout}ms`, lockPath)
    this.name = 'LockTimeoutError'
    this.timeout = timeout
  }
}

// ============================================================================
// Git errors
// ============================================================================

/** Error thrown during git operations */
export class GitError extends BinstashError {
  readonly command: string
  readonly exitCode: number
  readonly stderr: string

  constructor(command: string, exitCode: number, stderr: string) {
    super(`Git command failed (exit ${exitCode}): ${command}\n${stderr}`, 'GIT_ERROR')
    this.name = 'GitError'
    this.command = command
    this.exitCode = exitCode
    this.stderr = stderr
  }
}

// ============================================================================
// Type guards
// ============================================================================

export function isBinstashError(error: unknown): error is BinstashError {
  return error instanceof BinstashError
}

export function isManifestError(error: unknown): error is ManifestError {
  return error instanceof ManifestError
}

export function isCacheError(error: unknown): error is CacheError {
  return error instanceof CacheError
}

export function isSourceError(error: unknown): error is SourceError {
  return error instanceof SourceError
}
