/**
 * Format-preserving manifest rewrites
 *
 * The previous file text is split into statements and table blocks. Entries
 * whose value did not change keep their text as written, comments and float
 * literals included. A changed table entry is edited key by key inside its
 * own blocks; any other changed entry is removed and rendered at the end.
 */

import TOML from '@iarna/toml'

import type { TomlTable, TomlValue } from '../types.js'
import { deepEqual, isTable, isTableArray, ownValue } from './values.js'

const BARE_KEY = /^[A-Za-z0-9_-]+$/

type Line = { kind: 'trivia'; text: string } | { kind: 'pair'; text: string; key: string }

interface Block {
  /** Comment lines directly above the header */
  lead: string[]
  /** Header line; null for the statements before the first header */
  header: string | null
  /** Key path named by the header */
  path: string[]
  array: boolean
  body: Line[]
}

function tryParse(text: string): TomlTable | null {
  try {
    return TOML.parse(text)
  } catch {
    return null
  }
}

function formatKey(key: string): string {
  return BARE_KEY.test(key) ? key : JSON.stringify(key)
}

// ============================================================================
// Splitting
// ============================================================================

/**
 * Follow the single-key chain of a parsed header line: `[a.b]` and
 * `[[a.b]]` both give ['a', 'b'].
 */
function headerPath(parsed: TomlTable): string[] {
  const path: string[] = []
  let current: unknown = parsed
  while (isTable(current)) {
    const keys = Object.keys(current)
    const key = keys[0]
    if (keys.length !== 1 || key === undefined) {
      break
    }
    path.push(key)
    const value = current[key]
    current = Array.isArray(value) ? value.at(-1) : value
  }
  return path
}

/** Detach the comment lines that end a body; they describe the next header */
function takeLeadingComments(body: Line[]): string[] {
  let start = body.length
  while (start > 0) {
    const line = body[start - 1]
    if (line === undefined || line.kind !== 'trivia' || !line.text.trim().startsWith('#')) {
      break
    }
    start--
  }
  return body.splice(start).map((line) => line.text)
}

/**
 * Split manifest text into blocks, or null if a statement cannot be
 * isolated. A key/value statement spans lines until it parses on its own.
 */
function splitBlocks(lines: string[]): Block[] | null {
  let current: Block = { lead: [], header: null, path: [], array: false, body: [] }
  const blocks = [current]

  let index = 0
  while (index < lines.length) {
    const line = lines[index] ?? ''
    const trimmed = line.trim()

    if (trimmed === '' || trimmed.startsWith('#')) {
      current.body.push({ kind: 'trivia', text: line })
      index++
      continue
    }

    if (trimmed.startsWith('[')) {
      const parsed = tryParse(line)
      if (!parsed) {
        return null
      }
      current = {
        lead: takeLeadingComments(current.body),
        header: line,
        path: headerPath(parsed),
        array: trimmed.startsWith('[['),
        body: [],
      }
      blocks.push(current)
      index++
      continue
    }

    let end = index
    let parsed: TomlTable | null = null
    while (end < lines.length && !parsed) {
      parsed = tryParse(lines.slice(index, end + 1).join('\n'))
      end++
    }
    const key = parsed ? Object.keys(parsed)[0] : undefined
    if (key === undefined) {
      return null
    }
    current.body.push({ kind: 'pair', text: lines.slice(index, end).join('\n'), key })
    index = end
  }

  return blocks
}

function renderBlocks(blocks: Block[]): string[] {
  const lines: string[] = []
  for (const block of blocks) {
    lines.push(...block.lead)
    if (block.header !== null) {
      lines.push(block.header)
    }
    lines.push(...block.body.map((line) => line.text))
  }
  return lines
}

// ============================================================================
// Rendering
// ============================================================================

function renderPair(key: string, value: TomlValue): string {
  return TOML.stringify({ [key]: value }).trimEnd()
}

/**
 * Render a table under a header, its plain values first and nested tables
 * as further headers.
 */
function renderTable(prefix: string, table: TomlTable, array: boolean): string[] {
  const lines = [array ? `[[${prefix}]]` : `[${prefix}]`]
  const nested: string[] = []
  for (const [key, value] of Object.entries(table)) {
    const path = `${prefix}.${formatKey(key)}`
    if (isTable(value)) {
      nested.push('', ...renderTable(path, value, false))
    } else if (isTableArray(value)) {
      for (const item of value) {
        nested.push('', ...renderTable(path, item, true))
      }
    } else {
      lines.push(renderPair(key, value))
    }
  }
  return [...lines, ...nested]
}

function renderEntry(name: string, value: TomlValue): string[] | null {
  if (isTable(value)) {
    return renderTable(formatKey(name), value, false)
  }
  if (isTableArray(value)) {
    return value.flatMap((item, index) => [
      ...(index > 0 ? [''] : []),
      ...renderTable(formatKey(name), item, true),
    ])
  }
  return null
}

// ============================================================================
// Editing
// ============================================================================

function ownsBlock(block: Block, name: string): boolean {
  return block.header !== null && block.path[0] === name
}

function removeEntry(blocks: Block[], name: string): Block[] {
  const [preamble] = blocks
  if (preamble) {
    preamble.body = preamble.body.filter((line) => line.kind !== 'pair' || line.key !== name)
  }
  return blocks.filter((block) => !ownsBlock(block, name))
}

/** Index just past the last line of a body that is not blank */
function endOfContent(body: Line[]): number {
  let end = body.length
  while (end > 0 && body[end - 1]?.text.trim() === '') {
    end--
  }
  return end
}

/**
 * Rewrite the changed keys of a table entry inside its own blocks.
 *
 * @returns the edited blocks, or null (nothing touched) when the entry is
 * not written as a single `[name]` header block
 */
function editTable(blocks: Block[], name: string, before: TomlTable, after: TomlTable): Block[] | null {
  const [preamble] = blocks
  if (preamble?.body.some((line) => line.kind === 'pair' && line.key === name)) {
    return null
  }
  const mains = blocks.filter((block) => ownsBlock(block, name) && block.path.length === 1)
  const main = mains[0]
  if (main === undefined || mains.length > 1 || main.array) {
    return null
  }

  const changed = new Set(
    [...Object.keys(before), ...Object.keys(after)].filter(
      (key) => !deepEqual(ownValue(before, key), ownValue(after, key))
    )
  )

  main.body = main.body.filter((line) => line.kind !== 'pair' || !changed.has(line.key))
  const edited = blocks.filter((block) => {
    const key = block.path[1]
    return !(ownsBlock(block, name) && key !== undefined && changed.has(key))
  })

  const pairs: Line[] = []
  const nested: string[] = []
  for (const key of changed) {
    const value = ownValue(after, key)
    if (value === undefined) {
      continue
    }
    const prefix = `${formatKey(name)}.${formatKey(key)}`
    if (isTable(value)) {
      nested.push('', ...renderTable(prefix, value, false))
    } else if (isTableArray(value)) {
      for (const item of value) {
        nested.push('', ...renderTable(prefix, item, true))
      }
    } else {
      pairs.push({ kind: 'pair', text: renderPair(key, value), key })
    }
  }

  let lastPair = -1
  main.body.forEach((line, index) => {
    if (line.kind === 'pair') {
      lastPair = index
    }
  })
  main.body.splice(lastPair + 1, 0, ...pairs)

  const last = edited.filter((block) => ownsBlock(block, name)).at(-1)
  if (last && nested.length > 0) {
    last.body.splice(
      endOfContent(last.body),
      0,
      ...nested.map((text): Line => ({ kind: 'trivia', text }))
    )
  }
  return edited
}

/**
 * Render `document` as manifest text, keeping the text of `source` for
 * everything that did not change. Falls back to a plain serialization when
 * the edited text would not read back as `document`.
 */
export function rewriteManifestSource(source: string, document: TomlTable): string {
  const fallback = TOML.stringify(document)
  const previous = tryParse(source)
  let blocks = previous ? splitBlocks(source.split(/\r?\n/)) : null
  if (!previous || !blocks) {
    return fallback
  }

  const appended: string[][] = []
  const names = new Set([...Object.keys(previous), ...Object.keys(document)])
  for (const name of names) {
    const before = ownValue(previous, name)
    const after = ownValue(document, name)
    if (deepEqual(before, after)) {
      continue
    }

    const edited: Block[] | null = isTable(before) && isTable(after) ? editTable(blocks, name, before, after) : null
    if (edited) {
      blocks = edited
      continue
    }

    blocks = removeEntry(blocks, name)
    if (after !== undefined) {
      const rendered = renderEntry(name, after)
      if (!rendered) {
        return fallback
      }
      appended.push(rendered)
    }
  }

  const eol = source.includes('\r\n') ? '\r\n' : '\n'
  let text = renderBlocks(blocks).join(eol).trim()
  for (const lines of appended) {
    text = text === '' ? lines.join(eol) : `${text}${eol}${eol}${lines.join(eol)}`
  }
  text = text === '' ? '' : `${text}${eol}`

  const reparsed = tryParse(text)
  return reparsed && deepEqual(reparsed, document) ? text : fallback
}
