/**
 * Tests for context creation.
 */

import { afterEach, describe, expect, test } from 'vitest'

import { ManifestRegistry } from '@binstash/core'
import { DefaultArchiveCodec, DefaultDownloadFetcher } from '@binstash/store'

import { createContext } from './context.js'

describe('createContext', () => {
  const originalEnv = process.env['BINSTASH_HOME']

  afterEach(() => {
    if (originalEnv !== undefined) {
      process.env['BINSTASH_HOME'] = originalEnv
    } else {
      delete process.env['BINSTASH_HOME']
    }
  })

  test('fills in defaults', () => {
    process.env['BINSTASH_HOME'] = '/env/cache'
    const ctx = createContext()

    expect(ctx.paths.cacheRoot).toBe('/env/cache')
    expect(ctx.cache.paths).toBe(ctx.paths)
    expect(ctx.fetcher).toBeInstanceOf(DefaultDownloadFetcher)
    expect(ctx.codec).toBeInstanceOf(DefaultArchiveCodec)
    expect(ctx.treeDigestMethod).toBe('auto')
  })

  test('honors overrides', () => {
    const manifests = new ManifestRegistry({ platform: { os: 'linux', arch: 'aarch64' } })
    const ctx = createContext({ cacheRoot: '/explicit', manifests, treeDigestMethod: 'fallback' })

    expect(ctx.paths.cacheRoot).toBe('/explicit')
    expect(ctx.manifests).toBe(manifests)
    expect(ctx.treeDigestMethod).toBe('fallback')
  })

  test('keeps contexts independent', () => {
    const first = createContext({ cacheRoot: '/one' })
    const second = createContext({ cacheRoot: '/two' })

    expect(first.manifests).not.toBe(second.manifests)
    expect(first.cache.pathFor({ name: 'A', contentHash: undefined })).toBe('/one/A')
    expect(second.cache.pathFor({ name: 'A', contentHash: undefined })).toBe('/two/A')
  })
})
