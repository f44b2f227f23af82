/**
 * Tests for the artifact builder.
 */

import { createHash } from 'node:crypto'
import { existsSync } from 'node:fs'
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { pathToFileURL } from 'node:url'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import {
  AlreadyExistsError,
  DownloadError,
  ManifestParseError,
  ManifestRegistry,
  NoManifestError,
  NotADirectoryError,
  NotFoundError,
  type TomlTable,
  isTable,
  readManifestDocument,
} from '@binstash/core'
import { DefaultArchiveCodec, DefaultDownloadFetcher, type DownloadFetcher } from '@binstash/store'

import {
  addArtifactFromURL,
  addDownloadSource,
  bindEntry,
  createArchive,
  queryRemoteInfo,
  unbindEntry,
} from './builder.js'
import { type EngineContext, createContext } from './context.js'

class CountingFetcher implements DownloadFetcher {
  readonly calls: string[] = []
  private readonly inner = new DefaultDownloadFetcher()

  async fetch(url: string, destPath: string): Promise<void> {
    this.calls.push(url)
    await this.inner.fetch(url, destPath)
  }
}

const HASH = 'a'.repeat(40)
const SHA = 'b'.repeat(64)

/** Digest of a tree holding only a.txt = "x", as computed without git */
const A_TXT_TREE = createHash('sha256').update('a.txtx').digest('hex').slice(0, 40)

function sha256(bytes: Buffer | string): string {
  return createHash('sha256').update(bytes).digest('hex')
}

async function readTable(manifestPath: string, name: string): Promise<TomlTable> {
  const table = (await readManifestDocument(manifestPath))[name]
  if (!isTable(table)) {
    throw new Error(`${name} is not a table`)
  }
  return table
}

describe('artifact builder', () => {
  let tempDir: string
  let manifestPath: string
  let fetcher: CountingFetcher
  let ctx: EngineContext

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'binstash-builder-'))
    manifestPath = join(tempDir, 'Artifacts.toml')
    fetcher = new CountingFetcher()
    ctx = createContext({
      cacheRoot: join(tempDir, 'cache'),
      fetcher,
      treeDigestMethod: 'fallback',
      manifests: new ManifestRegistry({ platform: { os: 'linux', arch: 'aarch64' } }),
    })
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  async function makePayload(): Promise<string> {
    const payload = join(tempDir, 'payload')
    await mkdir(payload, { recursive: true })
    await writeFile(join(payload, 'a.txt'), 'x')
    return payload
  }

  describe('createArchive', () => {
    test('archives beside the directory and reports both digests', async () => {
      const payload = await makePayload()

      const result = await createArchive(ctx, payload)

      expect(result.archivePath).toBe(join(tempDir, 'payload.tar.gz'))
      expect(result.treeDigest).toBe(A_TXT_TREE)
      expect(result.archiveDigest).toBe(sha256(await readFile(result.archivePath)))
    })

    test('round-trips the directory contents', async () => {
      const payload = await makePayload()
      await mkdir(join(payload, 'sub'))
      await writeFile(join(payload, 'sub', 'b.bin'), Buffer.from([7, 8, 9]))
      const output = join(tempDir, 'out', 'payload.tar')

      const result = await createArchive(ctx, payload, { compression: 'none', output })
      const extracted = join(tempDir, 'extracted')
      await new DefaultArchiveCodec().extract(result.archivePath, extracted, 'tar')

      expect(result.archivePath).toBe(output)
      expect(await readFile(join(extracted, 'payload', 'a.txt'), 'utf8')).toBe('x')
      expect(await readFile(join(extracted, 'payload', 'sub', 'b.bin'))).toEqual(Buffer.from([7, 8, 9]))
    })

    test('rejects a file', async () => {
      const file = join(tempDir, 'file.txt')
      await writeFile(file, 'x')

      await expect(createArchive(ctx, file)).rejects.toBeInstanceOf(NotADirectoryError)
    })
  })

  describe('bindEntry', () => {
    test('creates the manifest and omits lazy = false', async () => {
      await bindEntry(ctx, manifestPath, 'Data', {
        treeDigest: HASH,
        url: 'https://example.com/data.tar.gz',
        sha256: SHA,
      })

      expect(await readTable(manifestPath, 'Data')).toEqual({
        'git-tree-sha1': HASH,
        download: [{ url: 'https://example.com/data.tar.gz', sha256: SHA }],
      })
    })

    test('writes lazy = true explicitly', async () => {
      await bindEntry(ctx, manifestPath, 'Data', {
        treeDigest: HASH,
        url: 'https://example.com/data.tar.gz',
        sha256: SHA,
        lazy: true,
      })

      expect((await readTable(manifestPath, 'Data'))['lazy']).toBe(true)
    })

    test('leaves the manifest byte-identical when the name exists', async () => {
      await writeFile(
        manifestPath,
        `# keep me\n[Data]\ngit-tree-sha1 = "${HASH}"\n\n  [[Data.download]]\n  url = "https://example.com/a.tar.gz"\n`
      )
      const before = await readFile(manifestPath)

      await expect(
        bindEntry(ctx, manifestPath, 'Data', { treeDigest: 'c'.repeat(40), url: 'https://x/b.tar.gz', sha256: '' })
      ).rejects.toBeInstanceOf(AlreadyExistsError)

      expect(await readFile(manifestPath)).toEqual(before)
    })

    test('force replaces only the hash and sources of that entry', async () => {
      await writeFile(
        manifestPath,
        [
          '[Data]',
          `git-tree-sha1 = "${HASH}"`,
          'lazy = true',
          'description = "kept"',
          '',
          '  [[Data.download]]',
          '  url = "https://example.com/old.tar.gz"',
          '',
          '[Other]',
          'git-tree-sha1 = "d00d"',
          '',
        ].join('\n')
      )

      await bindEntry(ctx, manifestPath, 'Data', {
        treeDigest: 'c'.repeat(40),
        url: 'https://example.com/new.tar.gz',
        sha256: '',
        force: true,
      })

      const document = await readManifestDocument(manifestPath)
      expect(document['Data']).toEqual({
        description: 'kept',
        'git-tree-sha1': 'c'.repeat(40),
        download: [{ url: 'https://example.com/new.tar.gz' }],
      })
      expect(document['Other']).toEqual({ 'git-tree-sha1': 'd00d' })
    })

    test('keeps the text of other entries, comments and floats included', async () => {
      const source = [
        '# Tools used in CI',
        '[Tools]',
        'git-tree-sha1 = "d00d"',
        'ratio = 1.0 # tuned',
        '',
        '  [[Tools.download]]',
        '  url = "https://example.com/tools.tar.gz"',
        '',
      ].join('\n')
      await writeFile(manifestPath, source)

      await bindEntry(ctx, manifestPath, 'Data', {
        treeDigest: HASH,
        url: 'https://example.com/data.tar.gz',
        sha256: SHA,
      })

      expect(await readFile(manifestPath, 'utf8')).toBe(
        [
          source,
          '[Data]',
          `git-tree-sha1 = "${HASH}"`,
          '',
          '[[Data.download]]',
          'url = "https://example.com/data.tar.gz"',
          `sha256 = "${SHA}"`,
          '',
        ].join('\n')
      )
    })

    test('force keeps the unchanged lines of the rebound entry', async () => {
      await writeFile(
        manifestPath,
        [
          '# Tools used in CI',
          '[Tools]',
          'git-tree-sha1 = "d00d"',
          'ratio = 1.0 # tuned',
          '',
          '  [[Tools.download]]',
          '  url = "https://example.com/tools.tar.gz"',
          '',
        ].join('\n')
      )

      await bindEntry(ctx, manifestPath, 'Tools', {
        treeDigest: 'c'.repeat(40),
        url: 'https://example.com/tools2.tar.gz',
        sha256: SHA,
        force: true,
      })

      expect(await readFile(manifestPath, 'utf8')).toBe(
        [
          '# Tools used in CI',
          '[Tools]',
          'ratio = 1.0 # tuned',
          `git-tree-sha1 = "${'c'.repeat(40)}"`,
          '',
          '[[Tools.download]]',
          'url = "https://example.com/tools2.tar.gz"',
          `sha256 = "${SHA}"`,
          '',
        ].join('\n')
      )
    })

    test('rejects a malformed sha256 without touching the manifest', async () => {
      await bindEntry(ctx, manifestPath, 'Keep', { treeDigest: HASH, url: 'https://x/k.tar.gz', sha256: SHA })
      const before = await readFile(manifestPath)

      await expect(
        bindEntry(ctx, manifestPath, 'Data', { treeDigest: HASH, url: 'https://x/d.tar.gz', sha256: 'nothex' })
      ).rejects.toBeInstanceOf(ManifestParseError)

      expect(await readFile(manifestPath)).toEqual(before)
      expect([...(await ctx.manifests.load(manifestPath)).entries.keys()]).toEqual(['Keep'])
    })

    test('rejects names and digests the manifest cannot hold', async () => {
      await expect(
        bindEntry(ctx, manifestPath, '.hidden', { treeDigest: HASH, url: 'https://x/h.tar.gz', sha256: '' })
      ).rejects.toBeInstanceOf(ManifestParseError)
      await expect(
        bindEntry(ctx, manifestPath, 'Data', { treeDigest: 'not/a/hash', url: 'https://x/d.tar.gz', sha256: '' })
      ).rejects.toBeInstanceOf(ManifestParseError)

      expect(existsSync(manifestPath)).toBe(false)
    })

    test('binds names that are also object properties', async () => {
      await bindEntry(ctx, manifestPath, 'constructor', { treeDigest: HASH, url: 'https://x/c.tar.gz', sha256: '' })

      expect(await readTable(manifestPath, 'constructor')).toEqual({
        'git-tree-sha1': HASH,
        download: [{ url: 'https://x/c.tar.gz' }],
      })
    })

    test('invalidates the memoized manifest', async () => {
      await bindEntry(ctx, manifestPath, 'First', { treeDigest: HASH, url: 'https://x/1.tar.gz', sha256: '' })
      expect([...(await ctx.manifests.load(manifestPath)).entries.keys()]).toEqual(['First'])

      await bindEntry(ctx, manifestPath, 'Second', { treeDigest: HASH, url: 'https://x/2.tar.gz', sha256: '' })
      expect([...(await ctx.manifests.load(manifestPath)).entries.keys()]).toEqual(['First', 'Second'])
    })
  })

  describe('unbindEntry', () => {
    test('returns false for a missing manifest', async () => {
      expect(await unbindEntry(ctx, manifestPath, 'Data')).toBe(false)
    })

    test('removes a bound name and reports unknown ones', async () => {
      await bindEntry(ctx, manifestPath, 'Data', { treeDigest: HASH, url: 'https://x/d.tar.gz', sha256: '' })
      await bindEntry(ctx, manifestPath, 'Keep', { treeDigest: HASH, url: 'https://x/k.tar.gz', sha256: '' })

      expect(await unbindEntry(ctx, manifestPath, 'Data')).toBe(true)
      expect(await unbindEntry(ctx, manifestPath, 'Data')).toBe(false)
      expect(Object.keys(await readManifestDocument(manifestPath))).toEqual(['Keep'])
    })
    test('does not mistake object properties for bound names', async () => {
      await bindEntry(ctx, manifestPath, 'Data', { treeDigest: HASH, url: 'https://x/d.tar.gz', sha256: '' })
      const before = await readFile(manifestPath)

      expect(await unbindEntry(ctx, manifestPath, 'toString')).toBe(false)
      expect(await readFile(manifestPath)).toEqual(before)
    })

    test('keeps the comments of the remaining entries', async () => {
      await writeFile(
        manifestPath,
        [
          '# Tools used in CI',
          '[Tools]',
          'git-tree-sha1 = "d00d"',
          'ratio = 1.0 # tuned',
          '',
          '# Data set',
          '[Data]',
          'git-tree-sha1 = "beef"',
          '',
        ].join('\n')
      )

      expect(await unbindEntry(ctx, manifestPath, 'Data')).toBe(true)

      expect(await readFile(manifestPath, 'utf8')).toBe(
        '# Tools used in CI\n[Tools]\ngit-tree-sha1 = "d00d"\nratio = 1.0 # tuned\n'
      )
    })
  })

  describe('addDownloadSource', () => {
    test('appends a source', async () => {
      await bindEntry(ctx, manifestPath, 'Data', { treeDigest: HASH, url: 'https://x/one.tar.gz', sha256: SHA })

      await addDownloadSource(ctx, manifestPath, 'Data', 'https://mirror/two.tar.gz', '')

      expect((await readTable(manifestPath, 'Data'))['download']).toEqual([
        { url: 'https://x/one.tar.gz', sha256: SHA },
        { url: 'https://mirror/two.tar.gz' },
      ])
    })

    test('appends to the variant selected for the platform', async () => {
      await writeFile(
        manifestPath,
        [
          '[[Tool]]',
          'arch = "x86_64"',
          'git-tree-sha1 = "aaaa"',
          '',
          '[[Tool]]',
          'arch = "aarch64"',
          'git-tree-sha1 = "bbbb"',
          '',
        ].join('\n')
      )

      await addDownloadSource(ctx, manifestPath, 'Tool', 'https://x/arm.tar.gz', '')

      expect((await readManifestDocument(manifestPath))['Tool']).toEqual([
        { arch: 'x86_64', 'git-tree-sha1': 'aaaa' },
        { arch: 'aarch64', 'git-tree-sha1': 'bbbb', download: [{ url: 'https://x/arm.tar.gz' }] },
      ])
    })

    test('rejects a malformed sha256 without touching the manifest', async () => {
      await bindEntry(ctx, manifestPath, 'Data', { treeDigest: HASH, url: 'https://x/one.tar.gz', sha256: SHA })
      const before = await readFile(manifestPath)

      await expect(
        addDownloadSource(ctx, manifestPath, 'Data', 'https://mirror/two.tar.gz', 'zz')
      ).rejects.toBeInstanceOf(ManifestParseError)

      expect(await readFile(manifestPath)).toEqual(before)
    })

    test('throws NotFoundError for an unknown name', async () => {
      await bindEntry(ctx, manifestPath, 'Data', { treeDigest: HASH, url: 'https://x/d.tar.gz', sha256: '' })

      await expect(addDownloadSource(ctx, manifestPath, 'Nope', 'https://x/n.tar.gz', '')).rejects.toBeInstanceOf(
        NotFoundError
      )
    })

    test('throws NoManifestError for a missing manifest', async () => {
      await expect(addDownloadSource(ctx, manifestPath, 'Data', 'https://x/d.tar.gz', '')).rejects.toBeInstanceOf(
        NoManifestError
      )
    })
  })

  describe('queryRemoteInfo', () => {
    test('hashes the download and its extracted tree', async () => {
      const { archivePath } = await createArchive(ctx, await makePayload())
      const url = pathToFileURL(archivePath).href

      const info = await queryRemoteInfo(ctx, url, { computeTreeHash: true })

      expect(info).toEqual({
        url,
        sha256: sha256(await readFile(archivePath)),
        treeDigest: A_TXT_TREE,
        warnings: [],
      })
    })

    test('skips the tree digest unless asked', async () => {
      const { archivePath } = await createArchive(ctx, await makePayload())

      const info = await queryRemoteInfo(ctx, pathToFileURL(archivePath).href)

      expect(info.treeDigest).toBeUndefined()
      expect(info.warnings).toEqual([])
    })

    test('downgrades extraction failures to a warning', async () => {
      const blob = join(tempDir, 'blob.bin')
      await writeFile(blob, 'not an archive')
      const url = pathToFileURL(blob).href

      const info = await queryRemoteInfo(ctx, url, { computeTreeHash: true })

      expect(info.sha256).toBe(sha256('not an archive'))
      expect(info.treeDigest).toBeUndefined()
      expect(info.warnings).toHaveLength(1)
      expect(info.warnings[0]).toMatch(/^Could not extract .* to compute its tree hash: /)
    })

    test('fails when the download fails', async () => {
      const url = pathToFileURL(join(tempDir, 'missing.tar.gz')).href

      await expect(queryRemoteInfo(ctx, url)).rejects.toBeInstanceOf(DownloadError)
    })
  })

  describe('addArtifactFromURL', () => {
    test('binds the queried hashes', async () => {
      const { archivePath } = await createArchive(ctx, await makePayload())
      const url = pathToFileURL(archivePath).href

      await addArtifactFromURL(ctx, manifestPath, 'Data', url, { lazy: true })

      expect(await readTable(manifestPath, 'Data')).toEqual({
        'git-tree-sha1': A_TXT_TREE,
        lazy: true,
        download: [{ url, sha256: sha256(await readFile(archivePath)) }],
      })
    })

    test('rejects an existing name before downloading', async () => {
      await bindEntry(ctx, manifestPath, 'Data', { treeDigest: HASH, url: 'https://x/d.tar.gz', sha256: '' })

      await expect(
        addArtifactFromURL(ctx, manifestPath, 'Data', 'https://example.com/other.tar.gz')
      ).rejects.toBeInstanceOf(AlreadyExistsError)
      expect(fetcher.calls).toEqual([])
    })
  })
})
