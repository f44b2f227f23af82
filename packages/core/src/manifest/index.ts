export { findManifest } from './discover.js'
export { currentPlatform, matchesPlatform, selectVariant, toPlatform } from './platform.js'
export { ManifestRegistry, type ManifestLoadOptions } from './registry.js'
export { rewriteManifestSource } from './edit.js'
export { deepEqual, emptyTable, isTableArray, ownValue, setOwn } from './values.js'
export {
  entryFromTable,
  isTable,
  manifestFromDocument,
  parseManifestToml,
  readManifest,
  readManifestDocument,
  readManifestDocumentIfExists,
  selectEntryTable,
  serializeManifestToml,
  tablesOf,
  writeManifestDocument,
} from './toml.js'
