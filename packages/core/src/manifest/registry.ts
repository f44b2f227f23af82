/**
 * Process-local manifest memoization.
 *
 * Loaded manifests are shared by absolute path for the lifetime of the
 * registry. On-disk changes are not observed; pass `fresh` or call
 * `forget()` to re-read.
 */

import { resolve } from 'node:path'

import type { Manifest, Platform } from '../types.js'
import { currentPlatform } from './platform.js'
import { readManifest } from './toml.js'

/** Options for loading through the registry */
export interface ManifestLoadOptions {
  /** Bypass the memo and re-read the file (the new result replaces the memo) */
  fresh?: boolean | undefined
}

export class ManifestRegistry {
  readonly platform: Platform
  private readonly loaded = new Map<string, Promise<Manifest>>()

  constructor(options: { platform?: Platform | undefined } = {}) {
    this.platform = options.platform ?? currentPlatform()
  }

  /**
   * Load a manifest, sharing one instance per absolute path.
   * A failed load is not memoized.
   */
  load(filePath: string, options: ManifestLoadOptions = {}): Promise<Manifest> {
    const key = resolve(filePath)
    const existing = this.loaded.get(key)
    if (existing && !options.fresh) {
      return existing
    }

    const pending: Promise<Manifest> = readManifest(key, this.platform).catch((err: unknown) => {
      if (this.loaded.get(key) === pending) {
        this.loaded.delete(key)
      }
      throw err
    })
    this.loaded.set(key, pending)
    return pending
  }

  /** Whether a manifest is memoized for this path */
  has(filePath: string): boolean {
    return this.loaded.has(resolve(filePath))
  }

  /** Drop the memoized manifest for one path */
  forget(filePath: string): void {
    this.loaded.delete(resolve(filePath))
  }

  /** Drop every memoized manifest */
  clear(): void {
    this.loaded.clear()
  }
}
