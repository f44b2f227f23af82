/**
 * Helpers over parsed TOML values
 */

import type { TomlTable, TomlValue } from '../types.js'

/**
 * Check whether a TOML value is a table (not an array, date or scalar).
 */
export function isTable(value: unknown): value is TomlTable {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  )
}

/**
 * Check whether a value is a non-empty array holding only tables.
 */
export function isTableArray(value: unknown): value is TomlTable[] {
  return Array.isArray(value) && value.length > 0 && value.every((item) => isTable(item))
}

/**
 * Return the tables held in a TOML array value, or [] for anything else.
 */
export function tablesOf(value: TomlValue | undefined): TomlTable[] {
  if (!Array.isArray(value)) {
    return []
  }
  const tables: TomlTable[] = []
  for (const item of value) {
    if (isTable(item)) {
      tables.push(item)
    }
  }
  return tables
}

/**
 * A table with no prototype, so names like `constructor` are never found
 * on it unless a manifest defines them.
 */
export function emptyTable(): TomlTable {
  return Object.create(null)
}

/**
 * Read a key the table itself defines; inherited properties read as undefined.
 */
export function ownValue(table: TomlTable, key: string): TomlValue | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined
}

/**
 * Define a key on the table itself, including `__proto__`.
 */
export function setOwn(table: TomlTable, key: string, value: TomlValue): void {
  Object.defineProperty(table, key, { value, enumerable: true, writable: true, configurable: true })
}

/**
 * Structural equality of parsed TOML values. Dates compare by instant.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && Object.is(a.getTime(), b.getTime())
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
      return false
    }
    return a.every((item, index) => deepEqual(item, b[index]))
  }
  if (isTable(a) || isTable(b)) {
    if (!isTable(a) || !isTable(b)) {
      return false
    }
    const keys = Object.keys(a)
    return (
      keys.length === Object.keys(b).length &&
      keys.every((key) => Object.hasOwn(b, key) && deepEqual(a[key], b[key]))
    )
  }
  return Object.is(a, b)
}
