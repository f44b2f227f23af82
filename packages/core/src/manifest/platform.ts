/**
 * Platform variant selection.
 *
 * A manifest name may map to several variant tables, each with `os` and
 * `arch` selectors. The first variant matching the current platform wins;
 * when none match, the first variant is used.
 */

import type { Platform, TomlTable } from '../types.js'

const OS_NAMES: Readonly<Record<string, string>> = {
  linux: 'linux',
  darwin: 'macos',
  win32: 'windows',
  freebsd: 'freebsd',
}

const ARCH_NAMES: Readonly<Record<string, string>> = {
  x64: 'x86_64',
  arm64: 'aarch64',
  ia32: 'i686',
  arm: 'armv7l',
  ppc64: 'powerpc64le',
}

/**
 * Map Node's platform identifiers onto manifest selector names.
 * Unknown identifiers pass through unchanged.
 */
export function toPlatform(nodePlatform: string, nodeArch: string): Platform {
  return {
    os: OS_NAMES[nodePlatform] ?? nodePlatform,
    arch: ARCH_NAMES[nodeArch] ?? nodeArch,
  }
}

/** The platform of the running process */
export function currentPlatform(): Platform {
  return toPlatform(process.platform, process.arch)
}

/**
 * Check whether a variant's selectors accept a platform.
 * Absent selectors match anything.
 */
export function matchesPlatform(variant: TomlTable, platform: Platform): boolean {
  const { os, arch } = variant
  if (typeof os === 'string' && os !== platform.os) {
    return false
  }
  if (typeof arch === 'string' && arch !== platform.arch) {
    return false
  }
  return true
}

/**
 * Select the variant for a platform: first match, else first variant.
 *
 * @returns The selected variant, or undefined for an empty list
 */
export function selectVariant<T extends TomlTable>(
  variants: readonly T[],
  platform: Platform = currentPlatform()
): T | undefined {
  return variants.find((variant) => matchesPlatform(variant, platform)) ?? variants[0]
}
