import { createHash, randomUUID } from 'crypto'
import { userInfo } from 'os'
import { Kwargs } from './historyInterfaces'

export function newId(): string {
  return randomUUID().replace(/-/g, '')
}

// Canonical JSON: object keys sorted at every depth, so structurally equal
// values always serialize to the same string.
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value))
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys)
  if (isPlainObject(value)) {
    const sorted: { [key: string]: unknown } = {}
    for (const key of Object.keys(value).sort()) {
      if (value[key] !== undefined) sorted[key] = sortKeys(value[key])
    }
    return sorted
  }
  return value
}

export function isPlainObject(
  value: unknown
): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Deterministic id derived from content, used for get-or-create entities. */
export function contentId(...parts: unknown[]): string {
  return createHash('sha256')
    .update(stableStringify(parts))
    .digest('hex')
    .slice(0, 32)
}

// getField({ kwargs: { a: 1 } }, 'kwargs.a') => 1
export function getField(record: unknown, path: string): unknown {
  let current: unknown = record
  for (const key of path.split('.')) {
    if (!isPlainObject(current) || !(key in current)) return undefined
    current = current[key]
  }
  return current
}

export function formatKwargs(kwargs: Kwargs): string[] {
  return Object.entries(kwargs).map(([key, value]) => `--${key} ${value}`)
}

export function currentUser(): string {
  try {
    return userInfo().username
  } catch (error) {
    // userInfo throws when the uid has no passwd entry, e.g. in containers
    return process.env.USER ?? process.env.USERNAME ?? 'unknown'
  }
}
