import { HistoryError, errorMessage } from '../../lib/api/errors'
import { HistoryConfig } from '../config'
import { FileStorage, expandHome } from './fileStorage'
import { FirestoreStorage } from './firestoreStorage'
import { Storage } from './interfaces'
import { MemoryStorage } from './memoryStorage'
import { NullStorage } from './nullStorage'

export type ConnectionTarget =
  | { kind: 'firestore'; projectId: string; databaseId?: string }
  | { kind: 'file'; path: string }
  | { kind: 'memory' }
  | { kind: 'null' }

/**
 * e.g. `firestore://my-project`, `firestore://my-project/history`,
 * `file://~/history.json`, `memory://`, `null://`
 */
export function parseConnectionString(url: string): ConnectionTarget {
  const match = /^([a-z]+):\/\/(.*)$/.exec(url.trim())
  if (match === null) {
    throw new HistoryError(`invalid connection string '${url}'`)
  }
  const [, scheme, rest] = match
  switch (scheme) {
    case 'firestore': {
      const [projectId, databaseId, ...extra] = rest.split('/')
      if (!projectId || extra.length > 0) {
        throw new HistoryError(
          `expected firestore://<project>[/<database>], got '${url}'`
        )
      }
      return { kind: 'firestore', projectId, databaseId: databaseId || undefined }
    }
    case 'file':
      if (rest === '') throw new HistoryError(`missing file path in '${url}'`)
      return { kind: 'file', path: rest }
    case 'memory':
      return { kind: 'memory' }
    case 'null':
      return { kind: 'null' }
    default:
      throw new HistoryError(`unsupported storage scheme '${scheme}' in '${url}'`)
  }
}

export function describeTarget(target: ConnectionTarget): string {
  switch (target.kind) {
    case 'firestore':
      return `Firestore project ${target.projectId}` +
        (target.databaseId ? ` (database ${target.databaseId})` : '')
    case 'file':
      return `history file ${target.path}`
    case 'memory':
      return 'in-memory history'
    case 'null':
      return 'null history'
  }
}

function sameTarget(a: ConnectionTarget, b: ConnectionTarget): boolean {
  if (a.kind === 'file' && b.kind === 'file') {
    return expandHome(a.path) === expandHome(b.path)
  }
  return a.kind === b.kind && a.kind !== 'firestore'
}

/** configured store, then the local history file, then memory */
export function fallbackChain(config: HistoryConfig): ConnectionTarget[] {
  const configured = parseConnectionString(config.dbUrl)
  if (config.strict) return [configured]

  const chain: ConnectionTarget[] = [configured]
  const candidates: ConnectionTarget[] = [
    { kind: 'file', path: config.fallbackFile },
    { kind: 'memory' },
  ]
  // the null and memory stores never fail, nothing follows them
  if (configured.kind === 'null' || configured.kind === 'memory') return chain
  for (const candidate of candidates) {
    if (!chain.some((target) => sameTarget(target, candidate))) {
      chain.push(candidate)
    }
  }
  return chain
}

export async function openTarget(
  target: ConnectionTarget,
  config: HistoryConfig
): Promise<Storage> {
  switch (target.kind) {
    case 'firestore':
      return FirestoreStorage.open({
        projectId: target.projectId,
        databaseId: target.databaseId,
        accessToken: config.accessToken,
        retry: config.retry,
        user: config.user,
      })
    case 'file':
      return FileStorage.open(target.path, config.user)
    case 'memory':
      return new MemoryStorage(config.user)
    case 'null':
      return new NullStorage(config.user)
  }
}

/**
 * Opens the configured store. Unless `strict` is set, a store that cannot
 * be opened is skipped with a warning and the next one in
 * {@link fallbackChain} is tried.
 */
export async function openStorage(config: HistoryConfig): Promise<Storage> {
  const chain = fallbackChain(config)
  let lastError: unknown
  for (const [index, target] of chain.entries()) {
    try {
      return await openTarget(target, config)
    } catch (error) {
      lastError = error
      const next = chain[index + 1]
      if (next === undefined) break
      console.warn(
        `Unable to open ${describeTarget(target)}: ${errorMessage(error)}. ` +
          `Falling back to ${describeTarget(next)}.`
      )
    }
  }
  throw new HistoryError(
    `Unable to open any history store: ${errorMessage(lastError)}`
  )
}
