/**
 * Download fetcher: retrieves a URL's bytes into a local file.
 *
 * http(s) URLs are fetched with node-fetch; file:// URLs and plain paths
 * are copied from the local filesystem.
 */

import { createWriteStream } from 'node:fs'
import { copyFile, mkdir, rm } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { pipeline } from 'node:stream/promises'
import { fileURLToPath } from 'node:url'
import fetch from 'node-fetch'

import { DownloadError, isSourceError } from '@binstash/core'

/**
 * Retrieves the bytes of one URL.
 */
export interface DownloadFetcher {
  /**
   * Write the bytes at `url` to `destPath`.
   *
   * @throws DownloadError when the bytes cannot be retrieved
   */
  fetch(url: string, destPath: string): Promise<void>
}

export interface FetcherOptions {
  /** Request timeout in milliseconds (default: 5 minutes) */
  timeout?: number | undefined
  /** Extra request headers */
  headers?: Record<string, string> | undefined
}

export const DEFAULT_FETCH_TIMEOUT = 5 * 60 * 1000

const USER_AGENT = 'binstash/0.1.0'

/** Matches a URL scheme such as `https:` (but not a drive letter) */
const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]+:/i

/**
 * Fetcher for http(s), file:// and local paths.
 */
export class DefaultDownloadFetcher implements DownloadFetcher {
  private readonly timeout: number
  private readonly headers: Record<string, string>

  constructor(options: FetcherOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_FETCH_TIMEOUT
    this.headers = { 'user-agent': USER_AGENT, ...options.headers }
  }

  async fetch(url: string, destPath: string): Promise<void> {
    await mkdir(dirname(destPath), { recursive: true })
    try {
      if (url.startsWith('file:')) {
        await copyFile(fileURLToPath(url), destPath)
      } else if (/^https?:/i.test(url)) {
        await this.fetchHttp(url, destPath)
      } else if (SCHEME_PATTERN.test(url)) {
        throw new DownloadError(url, `unsupported URL scheme "${url.split(':', 1)[0]}"`)
      } else {
        await copyFile(resolve(url), destPath)
      }
    } catch (err) {
      await rm(destPath, { force: true })
      if (isSourceError(err)) {
        throw err
      }
      throw new DownloadError(url, err instanceof Error ? err.message : String(err), { cause: err })
    }
  }

  private async fetchHttp(url: string, destPath: string): Promise<void> {
    const response = await fetch(url, {
      headers: this.headers,
      redirect: 'follow',
      signal: AbortSignal.timeout(this.timeout),
    })
    if (!response.ok) {
      throw new DownloadError(url, `HTTP ${response.status} ${response.statusText}`.trim())
    }
    if (!response.body) {
      throw new DownloadError(url, 'empty response body')
    }
    await pipeline(response.body, createWriteStream(destPath))
  }
}
