/**
 * @binstash/git
 *
 * Git process execution and canonical tree ids.
 */

export {
  gitExec,
  gitExecStdout,
  isGitAvailable,
  type GitExecOptions,
  type GitExecResult,
} from './exec.js'

export { computeTreeId, type TreeIdOptions } from './tree.js'
