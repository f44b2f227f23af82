/**
 * Safe git command execution using argv arrays (no shell interpolation).
 */

import { spawn } from 'node:child_process'

import { GitError } from '@binstash/core'

/**
 * Result of a git command execution.
 */
export interface GitExecResult {
  /** Exit code from the git process */
  exitCode: number
  /** Standard output from the command */
  stdout: string
  /** Standard error from the command */
  stderr: string
}

/**
 * Options for git command execution.
 */
export interface GitExecOptions {
  /** Working directory for the command (defaults to cwd) */
  cwd?: string | undefined
  /** Environment variables added to the process environment */
  env?: Record<string, string> | undefined
  /** Timeout in milliseconds (default: 60000ms = 1 minute) */
  timeout?: number | undefined
  /** If true, don't throw on non-zero exit code */
  ignoreExitCode?: boolean | undefined
}

/**
 * Execute a git command safely using argv array (no shell).
 *
 * @param args - Array of arguments to pass to git (not including 'git' itself)
 * @returns Result containing exitCode, stdout, and stderr
 * @throws GitError if the command fails (unless ignoreExitCode is true)
 *
 * @example
 * ```typescript
 * const { stdout } = await gitExec(['write-tree'], { env: { GIT_DIR: gitDir } })
 * ```
 */
export async function gitExec(args: string[], options: GitExecOptions = {}): Promise<GitExecResult> {
  const { cwd, env, timeout = 60000, ignoreExitCode = false } = options
  const command = ['git', ...args].join(' ')

  const result = await new Promise<GitExecResult>((resolve, reject) => {
    const proc = spawn('git', args, {
      cwd,
      env: env === undefined ? process.env : { ...process.env, ...env },
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    const stdoutChunks: Buffer[] = []
    const stderrChunks: Buffer[] = []
    proc.stdout.on('data', (data: Buffer) => stdoutChunks.push(data))
    proc.stderr.on('data', (data: Buffer) => stderrChunks.push(data))

    const timeoutId = setTimeout(() => {
      proc.kill()
      reject(new GitError(command, -1, `Timeout exceeded (${timeout}ms)`))
    }, timeout)

    proc.on('error', (err) => {
      clearTimeout(timeoutId)
      reject(new GitError(command, -1, err.message))
    })

    proc.on('close', (code) => {
      clearTimeout(timeoutId)
      resolve({
        exitCode: typeof code === 'number' ? code : -1,
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
      })
    })
  })

  if (result.exitCode !== 0 && !ignoreExitCode) {
    throw new GitError(command, result.exitCode, result.stderr || result.stdout)
  }

  return result
}

/**
 * Execute a git command and return stdout, trimming trailing whitespace.
 *
 * @throws GitError if the command fails
 */
export async function gitExecStdout(args: string[], options: GitExecOptions = {}): Promise<string> {
  const result = await gitExec(args, options)
  return result.stdout.trim()
}

/**
 * Check whether a usable git executable is on PATH.
 */
export async function isGitAvailable(): Promise<boolean> {
  try {
    await gitExec(['--version'], { timeout: 10000 })
    return true
  } catch {
    return false
  }
}
