/**
 * JSON Schema validation for artifact manifests
 */

import { createRequire } from 'node:module'
import Ajv from 'ajv'

import type { TomlTable } from '../types.js'

const require = createRequire(import.meta.url)
const manifestSchema = require('./manifest.schema.json')

// ============================================================================
// Ajv instance setup
// ============================================================================

const ajv = new Ajv({
  strict: true,
  allErrors: true,
  verbose: true,
})

const validateManifestSchema = ajv.compile<TomlTable>(manifestSchema)

// ============================================================================
// Validation result types
// ============================================================================

export interface ValidationError {
  path: string
  message: string
  keyword: string
  params: Record<string, unknown>
}

export type ValidationResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: ValidationError[] }

// ============================================================================
// Validation functions
// ============================================================================

type AjvErrors = NonNullable<typeof validateManifestSchema.errors>

/**
 * Provide a more helpful error message for known validation patterns.
 */
function friendlyMessage(err: AjvErrors[number]): string {
  const defaultMsg = err.message || 'Unknown error'

  if (err.keyword === 'propertyNames') {
    return `artifact name "${String(err.params['propertyName'])}" must not start with "." or contain path separators`
  }

  if (err.keyword === 'pattern' && err.instancePath.endsWith('/sha256')) {
    return `"${String(err.data)}" is not a sha256 hex digest`
  }

  if (err.keyword === 'pattern') {
    return `"${String(err.data)}" must contain only letters, digits, "_" or "-"`
  }

  return defaultMsg
}

function formatErrors(errors: typeof validateManifestSchema.errors): ValidationError[] {
  if (!errors) return []

  // A bad artifact name is reported by its propertyNames error alone
  const badNames = errors.some((err) => err.keyword === 'propertyNames')
  const reported = badNames
    ? errors.filter((err) => !(err.keyword === 'pattern' && err.instancePath === ''))
    : errors

  return reported.map((err) => ({
    path: err.instancePath || '/',
    message: friendlyMessage(err),
    keyword: err.keyword,
    params: err.params,
  }))
}

/**
 * Validate a parsed manifest document (Artifacts.toml parsed to object)
 */
export function validateManifest(data: unknown): ValidationResult<TomlTable> {
  if (validateManifestSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateManifestSchema.errors) }
}
