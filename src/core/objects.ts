/**
 * @fileoverview Object Codec
 *
 * Deterministic, lossless byte encoding for every object kind, plus the
 * hashing rules built on top of it.
 *
 * Every encoded object starts with a header `"<kind> <size>\0"` where size is
 * the byte length of the body that follows.
 *
 * Tree body, one line per record in name order:
 * ```
 * <mode> <name>\0<hash>\n
 * ```
 * with mode `100644` for blobs and `040000` for subtrees.
 *
 * Commit body:
 * ```
 * tree <hash>
 * parent <hash>        (zero or more, in order)
 * author <author>
 * timestamp <seconds>
 *
 * <message>
 * ```
 *
 * A blob body is the raw file content. The content address of a blob is the
 * hash of that raw content; trees and commits are addressed by the hash of
 * their full encoding.
 *
 * @module core/objects
 */

import { CorruptObjectError } from './errors'
import type { Hasher } from '../utils/hash'
import { isValidHash } from '../utils/hash'
import {
  createTree,
  type Commit,
  type ObjectKind,
  type RecordKind,
  type StoredObject,
  type Tree,
  type TreeRecord,
} from '../types/objects'

// =============================================================================
// Constants
// =============================================================================

const encoder = new TextEncoder()
const decoder = new TextDecoder('utf-8', { fatal: true })

const MODE_BY_KIND: Record<RecordKind, string> = {
  blob: '100644',
  tree: '040000',
}

const KIND_BY_MODE: Record<string, RecordKind | undefined> = {
  '100644': 'blob',
  '040000': 'tree',
}

const OBJECT_KINDS: readonly ObjectKind[] = ['blob', 'tree', 'commit']

/**
 * Shape of a valid content address, used while decoding.
 */
export interface HashFormat {
  hashLength: number
  hashCharset: string
}

// =============================================================================
// Header
// =============================================================================

function withHeader(kind: ObjectKind, body: Uint8Array): Uint8Array {
  const header = encoder.encode(`${kind} ${body.length}\0`)
  const result = new Uint8Array(header.length + body.length)
  result.set(header, 0)
  result.set(body, header.length)
  return result
}

/**
 * Split an encoded object into its kind and body.
 *
 * @throws CorruptObjectError if the header is malformed or the size is wrong
 */
export function parseHeader(data: Uint8Array): { kind: ObjectKind; body: Uint8Array } {
  const nullIndex = data.indexOf(0)
  if (nullIndex === -1) {
    throw new CorruptObjectError('Invalid object: missing null byte in header')
  }

  const header = decodeText(data.subarray(0, nullIndex))
  const spaceIndex = header.indexOf(' ')
  if (spaceIndex === -1) {
    throw new CorruptObjectError('Invalid object header: missing space')
  }

  const kindName = header.slice(0, spaceIndex)
  const kind = OBJECT_KINDS.find((candidate) => candidate === kindName)
  if (!kind) {
    throw new CorruptObjectError(`Invalid object kind: ${kindName}`)
  }

  const sizeText = header.slice(spaceIndex + 1)
  const size = Number.parseInt(sizeText, 10)
  if (Number.isNaN(size) || size < 0 || sizeText !== String(size)) {
    throw new CorruptObjectError(`Invalid object size: ${sizeText}`, { objectKind: kind })
  }

  const body = data.subarray(nullIndex + 1)
  if (body.length !== size) {
    throw new CorruptObjectError(
      `Object size mismatch: header says ${size}, body has ${body.length}`,
      { objectKind: kind }
    )
  }

  return { kind, body }
}

function decodeText(bytes: Uint8Array): string {
  try {
    return decoder.decode(bytes)
  } catch (err) {
    throw new CorruptObjectError('Invalid object: body is not valid UTF-8', {}, { cause: err })
  }
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Encode blob content.
 */
export function encodeBlob(content: Uint8Array): Uint8Array {
  return withHeader('blob', content)
}

/**
 * Encode a tree. Records are written in name order whatever order the map
 * was built in.
 */
export function encodeTree(tree: Tree): Uint8Array {
  const canonical = createTree(tree.records.values())
  let body = ''
  for (const record of canonical.records.values()) {
    body += `${MODE_BY_KIND[record.kind]} ${record.name}\0${record.hash}\n`
  }
  return withHeader('tree', encoder.encode(body))
}

/**
 * Encode a commit.
 */
export function encodeCommit(commit: Commit): Uint8Array {
  const lines = [`tree ${commit.treeHash}`]
  for (const parent of commit.parents) {
    lines.push(`parent ${parent}`)
  }
  lines.push(`author ${commit.author}`)
  lines.push(`timestamp ${commit.timestamp}`)
  const body = `${lines.join('\n')}\n\n${commit.message}`
  return withHeader('commit', encoder.encode(body))
}

/**
 * Encode any stored object.
 */
export function encodeObject(object: StoredObject): Uint8Array {
  switch (object.kind) {
    case 'blob':
      return encodeBlob(object.value)
    case 'tree':
      return encodeTree(object.value)
    case 'commit':
      return encodeCommit(object.value)
  }
}

// =============================================================================
// Decoding
// =============================================================================

function requireHash(value: string, format: HashFormat, what: string, kind: ObjectKind): string {
  if (!isValidHash(value, format.hashLength, format.hashCharset)) {
    throw new CorruptObjectError(`Invalid ${what} hash: "${value}"`, { objectKind: kind })
  }
  return value
}

/**
 * Decode a tree body.
 *
 * @throws CorruptObjectError on malformed entries, unknown modes, bad hashes
 * or duplicate names
 */
export function decodeTreeBody(body: Uint8Array, format: HashFormat): Tree {
  const text = decodeText(body)
  const records: TreeRecord[] = []
  let offset = 0

  while (offset < text.length) {
    const spaceIndex = text.indexOf(' ', offset)
    const nullIndex = text.indexOf('\0', offset)
    const newlineIndex = nullIndex === -1 ? -1 : text.indexOf('\n', nullIndex)
    if (spaceIndex === -1 || nullIndex === -1 || newlineIndex === -1 || spaceIndex > nullIndex) {
      throw new CorruptObjectError(`Invalid tree entry at offset ${offset}`, { objectKind: 'tree' })
    }

    const mode = text.slice(offset, spaceIndex)
    const kind = KIND_BY_MODE[mode]
    if (!kind) {
      throw new CorruptObjectError(`Invalid tree entry mode: ${mode}`, { objectKind: 'tree' })
    }

    const name = text.slice(spaceIndex + 1, nullIndex)
    if (!name || name.includes('/')) {
      throw new CorruptObjectError(`Invalid tree entry name: "${name}"`, { objectKind: 'tree' })
    }

    const hash = requireHash(text.slice(nullIndex + 1, newlineIndex), format, 'tree entry', 'tree')
    records.push({ kind, hash, name })
    offset = newlineIndex + 1
  }

  try {
    return createTree(records)
  } catch (err) {
    throw new CorruptObjectError('Invalid tree: duplicate entry names', { objectKind: 'tree' }, { cause: err })
  }
}

/**
 * Decode a commit body.
 *
 * @throws CorruptObjectError on missing or malformed fields
 */
export function decodeCommitBody(body: Uint8Array, format: HashFormat): Commit {
  const text = decodeText(body)
  const separator = text.indexOf('\n\n')
  if (separator === -1) {
    throw new CorruptObjectError('Invalid commit: missing message separator', { objectKind: 'commit' })
  }

  let treeHash: string | undefined
  let author: string | undefined
  let timestamp: number | undefined
  const parents: string[] = []

  for (const line of text.slice(0, separator).split('\n')) {
    const spaceIndex = line.indexOf(' ')
    if (spaceIndex === -1) {
      throw new CorruptObjectError(`Invalid commit header line: "${line}"`, { objectKind: 'commit' })
    }
    const field = line.slice(0, spaceIndex)
    const value = line.slice(spaceIndex + 1)

    switch (field) {
      case 'tree':
        treeHash = requireHash(value, format, 'tree', 'commit')
        break
      case 'parent':
        parents.push(requireHash(value, format, 'parent', 'commit'))
        break
      case 'author':
        author = value
        break
      case 'timestamp': {
        const parsed = Number.parseInt(value, 10)
        if (Number.isNaN(parsed) || String(parsed) !== value) {
          throw new CorruptObjectError(`Invalid commit timestamp: "${value}"`, { objectKind: 'commit' })
        }
        timestamp = parsed
        break
      }
      default:
        throw new CorruptObjectError(`Unknown commit header: ${field}`, { objectKind: 'commit' })
    }
  }

  if (treeHash === undefined || author === undefined || timestamp === undefined) {
    throw new CorruptObjectError('Invalid commit: missing tree, author or timestamp', { objectKind: 'commit' })
  }

  return {
    treeHash,
    author,
    message: text.slice(separator + 2),
    timestamp,
    parents,
  }
}

/**
 * Decode an encoded object, checking that it is of the expected kind.
 *
 * @throws CorruptObjectError if the bytes do not decode as `expected`
 */
export function decodeObject(data: Uint8Array, expected: ObjectKind, format: HashFormat): StoredObject {
  const { kind, body } = parseHeader(data)
  if (kind !== expected) {
    throw new CorruptObjectError(`Expected ${expected} object, found ${kind}`, { objectKind: kind })
  }

  switch (kind) {
    case 'blob':
      return { kind, value: body }
    case 'tree':
      return { kind, value: decodeTreeBody(body, format) }
    case 'commit':
      return { kind, value: decodeCommitBody(body, format) }
  }
}

// =============================================================================
// Hashing
// =============================================================================

/**
 * Content address of a tree.
 */
export function hashTree(tree: Tree, hasher: Hasher): string {
  return hasher.hash(encodeTree(tree))
}

/**
 * Content address of a commit.
 */
export function hashCommit(commit: Commit, hasher: Hasher): string {
  return hasher.hash(encodeCommit(commit))
}

/**
 * Content address of any stored object. Blobs hash their raw content.
 */
export function hashObject(object: StoredObject, hasher: Hasher): string {
  switch (object.kind) {
    case 'blob':
      return hasher.hash(object.value)
    case 'tree':
      return hashTree(object.value, hasher)
    case 'commit':
      return hashCommit(object.value, hasher)
  }
}
