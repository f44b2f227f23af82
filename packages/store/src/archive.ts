/**
 * Archive codec: extraction and creation of tar and zip archives.
 *
 * tar kinds run the system `tar` program with argv arrays (no shell).
 * gzip framing is done in process with zlib so that only `tar` itself is
 * required for .tar.gz; bzip2 and xz are delegated to tar's -j / -J.
 * zip archives are read in process with JSZip.
 */

import { spawn } from 'node:child_process'
import { createReadStream, createWriteStream } from 'node:fs'
import { chmod, mkdir, readFile, writeFile } from 'node:fs/promises'
import { basename, dirname, resolve, sep } from 'node:path'
import type { Readable, Writable } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import { createGunzip, createGzip } from 'node:zlib'
import JSZip from 'jszip'

// ============================================================================
// Kinds
// ============================================================================

/** Archive container kinds recognized from download URLs */
export type ArchiveKind = 'tar' | 'tar.gz' | 'tar.bz2' | 'tar.xz' | 'zip'

/** Compression applied when creating a tar archive */
export type Compression = 'none' | 'gz' | 'bz2' | 'xz'

export const COMPRESSIONS: readonly Compression[] = ['none', 'gz', 'bz2', 'xz']

/** Kind assumed when a URL has no recognized suffix */
export const DEFAULT_ARCHIVE_KIND: ArchiveKind = 'tar.gz'

const SUFFIXES: ReadonlyArray<readonly [string, ArchiveKind]> = [
  ['.tar.xz', 'tar.xz'],
  ['.tar.gz', 'tar.gz'],
  ['.tgz', 'tar.gz'],
  ['.tar.bz2', 'tar.bz2'],
  ['.tar', 'tar'],
  ['.zip', 'zip'],
]

/**
 * Determine the archive kind from a URL's path suffix.
 * The query string and fragment are ignored; the longest matching suffix
 * wins; unknown suffixes default to tar.gz.
 */
export function archiveKindFromUrl(url: string): ArchiveKind {
  const path = (url.split(/[?#]/, 1)[0] ?? url).toLowerCase()
  let best: readonly [string, ArchiveKind] | undefined
  for (const candidate of SUFFIXES) {
    if (path.endsWith(candidate[0]) && (!best || candidate[0].length > best[0].length)) {
      best = candidate
    }
  }
  return best ? best[1] : DEFAULT_ARCHIVE_KIND
}

/** File extension written for a compression */
export function archiveExtension(compression: Compression): string {
  return compression === 'none' ? '.tar' : `.tar.${compression}`
}

// ============================================================================
// Codec
// ============================================================================

/**
 * Extracts and creates archives of a recognized kind.
 */
export interface ArchiveCodec {
  /** Extract `archivePath` into `destDir` (created if needed) */
  extract(archivePath: string, destDir: string, kind: ArchiveKind): Promise<void>
  /**
   * Archive `sourceDir` as a single top-level entry named after it.
   */
  create(sourceDir: string, archivePath: string, compression: Compression): Promise<void>
}

interface TarStreams {
  /** Feed tar's stdin */
  stdin?: ((sink: Writable) => Promise<void>) | undefined
  /** Drain tar's stdout */
  stdout?: ((source: Readable) => Promise<void>) | undefined
}

/**
 * Run the system tar with optional stdin/stdout plumbing.
 *
 * @throws Error with tar's stderr if tar exits non-zero
 */
async function runTar(args: string[], streams: TarStreams = {}): Promise<void> {
  const command = ['tar', ...args].join(' ')
  const proc = spawn('tar', args, { stdio: ['pipe', 'pipe', 'pipe'] })

  const stderrChunks: Buffer[] = []
  proc.stderr.on('data', (data: Buffer) => stderrChunks.push(data))

  const exited = new Promise<number>((resolve, reject) => {
    proc.on('error', reject)
    proc.on('close', (code) => resolve(typeof code === 'number' ? code : -1))
  })

  const plumbing: Promise<void>[] = []
  if (streams.stdin) {
    plumbing.push(streams.stdin(proc.stdin))
  } else {
    proc.stdin.end()
  }
  if (streams.stdout) {
    plumbing.push(streams.stdout(proc.stdout))
  } else {
    proc.stdout.resume()
  }

  const piped = Promise.allSettled(plumbing)
  let exitCode: number
  try {
    exitCode = await exited
  } catch (err) {
    await piped
    throw new Error(`Failed to run ${command}`, { cause: err })
  }

  const pipeFailure = (await piped).find(
    (result): result is PromiseRejectedResult => result.status === 'rejected'
  )
  if (exitCode !== 0) {
    const stderr = Buffer.concat(stderrChunks).toString('utf8').trim()
    throw new Error(`${command} exited with code ${exitCode}: ${stderr}`, {
      cause: pipeFailure?.reason,
    })
  }
  if (pipeFailure) {
    throw pipeFailure.reason
  }
}

/**
 * Extract a zip archive, rejecting entries that would land outside destDir.
 */
async function extractZip(archivePath: string, destDir: string): Promise<void> {
  const root = resolve(destDir)
  const zip = await JSZip.loadAsync(await readFile(archivePath))

  for (const entry of Object.values(zip.files)) {
    const target = resolve(root, entry.name)
    if (target !== root && !target.startsWith(root + sep)) {
      throw new Error(`Zip entry escapes the destination: ${entry.name}`)
    }
    if (entry.dir) {
      await mkdir(target, { recursive: true })
      continue
    }
    await mkdir(dirname(target), { recursive: true })
    await writeFile(target, await entry.async('nodebuffer'))
    if (typeof entry.unixPermissions === 'number') {
      await chmod(target, entry.unixPermissions & 0o777)
    }
  }
}

/**
 * Default codec: system tar for tar kinds, JSZip for zip.
 */
export class DefaultArchiveCodec implements ArchiveCodec {
  async extract(archivePath: string, destDir: string, kind: ArchiveKind): Promise<void> {
    await mkdir(destDir, { recursive: true })

    switch (kind) {
      case 'zip':
        return extractZip(archivePath, destDir)
      case 'tar.gz':
        return runTar(['-x', '--no-same-owner', '-f', '-', '-C', destDir], {
          stdin: (sink) => pipeline(createReadStream(archivePath), createGunzip(), sink),
        })
      case 'tar.bz2':
        return runTar(['-x', '-j', '--no-same-owner', '-f', archivePath, '-C', destDir])
      case 'tar.xz':
        return runTar(['-x', '-J', '--no-same-owner', '-f', archivePath, '-C', destDir])
      case 'tar':
        return runTar(['-x', '--no-same-owner', '-f', archivePath, '-C', destDir])
    }
  }

  async create(sourceDir: string, archivePath: string, compression: Compression): Promise<void> {
    const source = resolve(sourceDir)
    const target = resolve(archivePath)
    await mkdir(dirname(target), { recursive: true })

    const members = ['-C', dirname(source), basename(source)]
    switch (compression) {
      case 'gz':
        return runTar(['-c', '-f', '-', ...members], {
          stdout: (output) => pipeline(output, createGzip(), createWriteStream(target)),
        })
      case 'bz2':
        return runTar(['-c', '-j', '-f', target, ...members])
      case 'xz':
        return runTar(['-c', '-J', '-f', target, ...members])
      case 'none':
        return runTar(['-c', '-f', target, ...members])
    }
  }
}
