import { describe, expect, test } from 'vitest'

import { matchesPlatform, selectVariant, toPlatform } from './platform.js'

describe('toPlatform', () => {
  test('maps Node identifiers to manifest names', () => {
    expect(toPlatform('darwin', 'arm64')).toEqual({ os: 'macos', arch: 'aarch64' })
    expect(toPlatform('linux', 'x64')).toEqual({ os: 'linux', arch: 'x86_64' })
    expect(toPlatform('win32', 'ia32')).toEqual({ os: 'windows', arch: 'i686' })
  })

  test('passes unknown identifiers through', () => {
    expect(toPlatform('aix', 's390x')).toEqual({ os: 'aix', arch: 's390x' })
  })
})

describe('selectVariant', () => {
  const linux = { os: 'linux', arch: 'x86_64', id: 'linux' }
  const mac = { os: 'macos', id: 'mac' }
  const any = { id: 'any' }

  test('returns the first variant matching os and arch', () => {
    expect(selectVariant([linux, mac, any], { os: 'macos', arch: 'aarch64' })).toBe(mac)
  })

  test('treats absent selectors as wildcards', () => {
    expect(matchesPlatform(any, { os: 'freebsd', arch: 'x86_64' })).toBe(true)
    expect(selectVariant([linux, any], { os: 'freebsd', arch: 'x86_64' })).toBe(any)
  })

  test('falls back to the first variant', () => {
    expect(selectVariant([linux, mac], { os: 'windows', arch: 'x86_64' })).toBe(linux)
  })

  test('returns undefined for no variants', () => {
    expect(selectVariant([], { os: 'linux', arch: 'x86_64' })).toBeUndefined()
  })
})
