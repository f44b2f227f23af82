/**
 * Core type definitions for binstash
 */

import type TOML from '@iarna/toml'

/** A parsed TOML table, as produced by the TOML parser */
export type TomlTable = ReturnType<typeof TOML.parse>

/** Any value that can appear in a TOML table */
export type TomlValue = TomlTable[string]

// ============================================================================
// Manifest entries
// ============================================================================

/** One `(url, expected digest)` pair; an empty digest disables verification */
export interface DownloadSource {
  url: string
  /** sha256 hex digest of the downloaded bytes, or '' */
  expectedDigest: string
}

/** Operating system names used by manifest `os` selectors */
export type PlatformOs = 'linux' | 'macos' | 'windows' | 'freebsd' | (string & {})

/** CPU architecture names used by manifest `arch` selectors */
export type PlatformArch = 'x86_64' | 'aarch64' | 'i686' | 'armv7l' | 'powerpc64le' | (string & {})

/** Platform a manifest variant is selected for */
export interface Platform {
  os: PlatformOs
  arch: PlatformArch
}

/**
 * A named artifact loaded from a manifest.
 * Immutable once loaded.
 */
export interface ArtifactEntry {
  /** Unique key within the manifest */
  readonly name: string
  /** Hex tree digest identifying the artifact content */
  readonly contentHash?: string | undefined
  /** Advisory only; fetch timing does not depend on it */
  readonly lazy: boolean
  /** Download sources in priority order */
  readonly sources: readonly DownloadSource[]
  readonly os?: string | undefined
  readonly arch?: string | undefined
  /** Unrecognized fields, preserved verbatim */
  readonly metadata: Readonly<TomlTable>
}

/** A loaded manifest: entries by name plus where they came from */
export interface Manifest {
  /** Absolute path of the manifest file */
  readonly path: string
  readonly entries: ReadonlyMap<string, ArtifactEntry>
}

// ============================================================================
// Manifest keys
// ============================================================================

/** Keys of an entry table that map onto ArtifactEntry fields */
export const ENTRY_KEYS = {
  CONTENT_HASH: 'git-tree-sha1',
  CONTENT_HASH_ALIAS: 'content-hash',
  LAZY: 'lazy',
  DOWNLOAD: 'download',
  OS: 'os',
  ARCH: 'arch',
} as const

/** Manifest file names searched for, in order */
export const MANIFEST_FILENAMES = ['Artifacts.toml', 'JuliaArtifacts.toml'] as const
