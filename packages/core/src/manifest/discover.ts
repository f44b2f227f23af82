/**
 * Manifest discovery by walking up from a start directory.
 */

import { stat } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'

import { MANIFEST_FILENAMES } from '../types.js'

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile()
  } catch {
    return false
  }
}

/**
 * Find the nearest manifest, checking `Artifacts.toml` then
 * `JuliaArtifacts.toml` in each directory from `startDir` up to the root.
 *
 * @returns Absolute path of the manifest, or null if none exists
 */
export async function findManifest(startDir: string = process.cwd()): Promise<string | null> {
  let dir = resolve(startDir)

  while (true) {
    for (const filename of MANIFEST_FILENAMES) {
      const candidate = join(dir, filename)
      if (await isFile(candidate)) {
        return candidate
      }
    }
    const parent = dirname(dir)
    if (parent === dir) {
      return null
    }
    dir = parent
  }
}
