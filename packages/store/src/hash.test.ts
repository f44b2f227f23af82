/**
 * Tests for content hashing.
 */

import { createHash } from 'node:crypto'
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { IOError, NotADirectoryError } from '@binstash/core'
import { isGitAvailable } from '@binstash/git'

import { TREE_DIGEST_LENGTH, fallbackTreeDigest, fileDigest, treeDigest } from './hash.js'

const hasGit = await isGitAvailable()

function sha256(content: string): string {
  return createHash('sha256').update(content).digest('hex')
}

async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const target = join(root, ...relative.split('/'))
    await mkdir(join(target, '..'), { recursive: true })
    await writeFile(target, content)
  }
}

describe('fileDigest', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'binstash-hash-'))
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  test('returns the sha256 of the file bytes', async () => {
    await writeFile(join(tempDir, 'a.bin'), 'hello')
    expect(await fileDigest(join(tempDir, 'a.bin'))).toBe(sha256('hello'))
  })

  test('depends only on content', async () => {
    await writeFile(join(tempDir, 'one'), 'same bytes')
    await writeFile(join(tempDir, 'two'), 'same bytes')
    await writeFile(join(tempDir, 'three'), 'same bytez')

    const one = await fileDigest(join(tempDir, 'one'))
    expect(await fileDigest(join(tempDir, 'two'))).toBe(one)
    expect(await fileDigest(join(tempDir, 'three'))).not.toBe(one)
  })

  test('hashes files larger than one read chunk', async () => {
    const content = 'z'.repeat(200 * 1024)
    await writeFile(join(tempDir, 'big'), content)
    expect(await fileDigest(join(tempDir, 'big'))).toBe(sha256(content))
  })

  test('throws IOError for a missing file', async () => {
    await expect(fileDigest(join(tempDir, 'missing'))).rejects.toBeInstanceOf(IOError)
  })
})

describe('fallbackTreeDigest', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'binstash-tree-'))
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  test('streams path then content bytes', async () => {
    await writeTree(tempDir, { 'a.txt': 'x' })
    const digest = await fallbackTreeDigest(tempDir)
    expect(digest).toBe(sha256('a.txtx').slice(0, 40))
    expect(digest).toHaveLength(TREE_DIGEST_LENGTH)
  })

  test('orders files byte-wise by relative path', async () => {
    await writeTree(tempDir, { 'b.txt': '2', 'B.txt': '1', 'a/c.txt': '3' })
    // 'B' (0x42) < 'a' (0x61) < 'b' (0x62)
    expect(await fallbackTreeDigest(tempDir)).toBe(sha256('B.txt1a/c.txt3b.txt2').slice(0, 40))
  })

  test('ignores location and empty directories', async () => {
    const left = join(tempDir, 'left')
    const right = join(tempDir, 'nested', 'right')
    await writeTree(left, { 'x/y.txt': 'data', 'z.txt': 'more' })
    await writeTree(right, { 'z.txt': 'more', 'x/y.txt': 'data' })
    await mkdir(join(right, 'empty'), { recursive: true })

    expect(await fallbackTreeDigest(left)).toBe(await fallbackTreeDigest(right))
  })

  test('changes when a name or a byte changes', async () => {
    const base = join(tempDir, 'base')
    const renamed = join(tempDir, 'renamed')
    const edited = join(tempDir, 'edited')
    await writeTree(base, { 'f.txt': 'content' })
    await writeTree(renamed, { 'g.txt': 'content' })
    await writeTree(edited, { 'f.txt': 'contenT' })

    const digest = await fallbackTreeDigest(base)
    expect(await fallbackTreeDigest(renamed)).not.toBe(digest)
    expect(await fallbackTreeDigest(edited)).not.toBe(digest)
  })
})

describe('treeDigest', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'binstash-tree-'))
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  test('throws NotADirectoryError for a file', async () => {
    await writeFile(join(tempDir, 'file'), 'x')
    await expect(treeDigest(join(tempDir, 'file'))).rejects.toBeInstanceOf(NotADirectoryError)
  })

  test('throws NotADirectoryError for a missing path', async () => {
    await expect(treeDigest(join(tempDir, 'missing'))).rejects.toBeInstanceOf(NotADirectoryError)
  })

  test('uses the fallback when asked', async () => {
    await writeTree(tempDir, { 'a.txt': 'x' })
    expect(await treeDigest(tempDir, { method: 'fallback' })).toBe(sha256('a.txtx').slice(0, 40))
  })

  test.skipIf(!hasGit)('matches the git tree id of identical trees', async () => {
    const left = join(tempDir, 'left')
    const right = join(tempDir, 'right')
    await writeTree(left, { 'a.txt': 'x', 'sub/b.txt': 'y' })
    await writeTree(right, { 'sub/b.txt': 'y', 'a.txt': 'x' })

    const digest = await treeDigest(left, { method: 'git' })
    expect(digest).toMatch(/^[0-9a-f]{40}$/)
    expect(await treeDigest(right)).toBe(digest)
  })
})
