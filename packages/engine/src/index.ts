/**
 * @binstash/engine
 *
 * Boundary operations over an explicit context:
 * - Reading (get-path, exists, clear, list)
 * - Building (create-archive, bind, unbind, add-source, query, add-from-url)
 */

// Context
export { createContext, type ContextOptions, type EngineContext } from './context.js'

// Reading
export {
  artifactExists,
  artifactPath,
  clearArtifacts,
  findEntry,
  getPath,
  listArtifacts,
  loadEntry,
  type ArtifactStatus,
  type GetPathOptions,
} from './artifacts.js'

// Building
export {
  addArtifactFromURL,
  addDownloadSource,
  bindEntry,
  createArchive,
  queryRemoteInfo,
  unbindEntry,
  type AddFromUrlOptions,
  type BindOptions,
  type CreateArchiveOptions,
  type CreateArchiveResult,
  type QueryOptions,
  type RemoteInfo,
} from './builder.js'
