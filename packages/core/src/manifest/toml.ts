/**
 * Manifest store: Artifacts.toml parsing, entry mapping and rewriting
 */

import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import TOML from '@iarna/toml'

import { atomicWrite } from '../atomic.js'
import { ManifestParseError, NoManifestError } from '../errors.js'
import { validateManifest } from '../schemas/index.js'
import {
  type ArtifactEntry,
  type DownloadSource,
  ENTRY_KEYS,
  type Manifest,
  type Platform,
  type TomlTable,
  type TomlValue,
} from '../types.js'
import { rewriteManifestSource } from './edit.js'
import { currentPlatform, selectVariant } from './platform.js'
import { isTable, setOwn, tablesOf } from './values.js'

export { isTable, tablesOf } from './values.js'

const KNOWN_KEYS = new Set<string>(Object.values(ENTRY_KEYS))

/**
 * Parse Artifacts.toml content into a validated document
 *
 * @param content - Raw TOML string content
 * @param filePath - Path to the file (for error messages)
 * @throws ManifestParseError if TOML parsing or schema validation fails
 */
export function parseManifestToml(content: string, filePath = 'Artifacts.toml'): TomlTable {
  let parsed: TomlTable
  try {
    parsed = TOML.parse(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ManifestParseError(`Failed to parse TOML: ${message}`, filePath)
  }

  const result = validateManifest(parsed)
  if (!result.valid) {
    throw new ManifestParseError('Invalid manifest', filePath, result.errors)
  }

  return result.data
}

/**
 * Serialize a manifest document to TOML
 */
export function serializeManifestToml(document: TomlTable): string {
  return TOML.stringify(document)
}

async function readSourceIfExists(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8')
  } catch (err) {
    if ((err as NodeJS.ErrnoException | undefined)?.code === 'ENOENT') {
      return null
    }
    const message = err instanceof Error ? err.message : String(err)
    throw new ManifestParseError(`Failed to read file: ${message}`, filePath)
  }
}

/**
 * Read a manifest document, or null when the file does not exist.
 *
 * @throws ManifestParseError if the file exists but cannot be read or parsed
 */
export async function readManifestDocumentIfExists(filePath: string): Promise<TomlTable | null> {
  const content = await readSourceIfExists(filePath)
  return content === null ? null : parseManifestToml(content, filePath)
}

/**
 * Read a manifest document that must exist.
 *
 * @throws NoManifestError if the file does not exist
 */
export async function readManifestDocument(filePath: string): Promise<TomlTable> {
  const document = await readManifestDocumentIfExists(filePath)
  if (document === null) {
    throw new NoManifestError(filePath)
  }
  return document
}

/**
 * Write a manifest document atomically, creating parent directories.
 *
 * An existing file keeps the text of every entry the document leaves
 * unchanged. Nothing is written if the document is not a valid manifest.
 *
 * @throws ManifestParseError if the document fails schema validation
 */
export async function writeManifestDocument(filePath: string, document: TomlTable): Promise<void> {
  const result = validateManifest(document)
  if (!result.valid) {
    throw new ManifestParseError('Refusing to write an invalid manifest', filePath, result.errors)
  }

  const previous = await readSourceIfExists(filePath)
  const content =
    previous === null ? serializeManifestToml(document) : rewriteManifestSource(previous, document)
  await atomicWrite(filePath, content)
}

/**
 * Build an ArtifactEntry from a single (already selected) entry table.
 */
export function entryFromTable(name: string, table: TomlTable): ArtifactEntry {
  const contentHash = table[ENTRY_KEYS.CONTENT_HASH] ?? table[ENTRY_KEYS.CONTENT_HASH_ALIAS]
  const lazy = table[ENTRY_KEYS.LAZY]
  const os = table[ENTRY_KEYS.OS]
  const arch = table[ENTRY_KEYS.ARCH]

  const sources: DownloadSource[] = tablesOf(table[ENTRY_KEYS.DOWNLOAD]).map((download) => {
    const url = download['url']
    const sha256 = download['sha256']
    return {
      url: typeof url === 'string' ? url : '',
      expectedDigest: typeof sha256 === 'string' ? sha256 : '',
    }
  })

  const metadata: TomlTable = {}
  for (const [key, value] of Object.entries(table)) {
    if (!KNOWN_KEYS.has(key)) {
      setOwn(metadata, key, value)
    }
  }

  return {
    name,
    contentHash: typeof contentHash === 'string' && contentHash !== '' ? contentHash : undefined,
    lazy: lazy === true,
    sources,
    os: typeof os === 'string' ? os : undefined,
    arch: typeof arch === 'string' ? arch : undefined,
    metadata,
  }
}

/**
 * Select the table for a name: the table itself, or the platform variant
 * of an array of tables.
 */
export function selectEntryTable(
  value: TomlValue | undefined,
  platform: Platform = currentPlatform()
): TomlTable | undefined {
  if (isTable(value)) {
    return value
  }
  return selectVariant(tablesOf(value), platform)
}

/**
 * Map a validated manifest document to its entries.
 */
export function manifestFromDocument(
  document: TomlTable,
  filePath: string,
  platform: Platform = currentPlatform()
): Manifest {
  const entries = new Map<string, ArtifactEntry>()
  for (const [name, value] of Object.entries(document)) {
    const table = selectEntryTable(value, platform)
    if (table) {
      entries.set(name, entryFromTable(name, table))
    }
  }
  return { path: resolve(filePath), entries }
}

/**
 * Read and parse a manifest file from disk
 *
 * @throws NoManifestError if the file does not exist
 * @throws ManifestParseError if it cannot be parsed
 */
export async function readManifest(
  filePath: string,
  platform: Platform = currentPlatform()
): Promise<Manifest> {
  const document = await readManifestDocument(filePath)
  return manifestFromDocument(document, filePath, platform)
}
