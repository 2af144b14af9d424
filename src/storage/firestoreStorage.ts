import { DEFAULT_RETRY_POLICY, RetryPolicy, retryOrThrow } from '../../lib/api/retry'
import { JsonObject } from '../helpers/historyInterfaces'
import {
  FirestoreAPI,
  FirestoreConfig,
  FirestoreOperator,
  FirestoreWrite,
  StructuredQuery,
  encodeFields,
  encodeValue,
  quoteFieldPath,
} from '../services/firestore'
import { Clause, QueryOp } from './clause'
import { DocumentStorage, DocumentStore } from './documentStorage'
import { CollectionName, Direction, StorageKind } from './interfaces'
import { QueryPlan, filterRecords, sortRecords } from './query'

const OPERATORS: Record<QueryOp, FirestoreOperator> = {
  [QueryOp.LT]: 'LESS_THAN',
  [QueryOp.LE]: 'LESS_THAN_OR_EQUAL',
  [QueryOp.GT]: 'GREATER_THAN',
  [QueryOp.GE]: 'GREATER_THAN_OR_EQUAL',
  [QueryOp.EQ]: 'EQUAL',
  [QueryOp.IN]: 'IN',
}

// Firestore rejects `in` filters over more values than this
export const MAX_IN_VALUES = 30

function inValues(clause: Clause): number | undefined {
  if (clause.op !== QueryOp.IN) return undefined
  return Array.isArray(clause.value) ? clause.value.length : 0
}

function indexable(clause: Clause): boolean {
  const values = inValues(clause)
  return values === undefined || values <= MAX_IN_VALUES
}

function documentKey(collection: CollectionName, id: string): string {
  return `${collection}/${id}`
}

/**
 * Remote store on Firestore. Only the first clause of a query is sent to the
 * index; the rest are applied to the returned documents, and ordering and
 * limit follow them locally. An `in` clause over more than
 * {@link MAX_IN_VALUES} values is always applied locally.
 *
 * Writes inside a transaction are buffered and sent as one atomic commit.
 * Buffered writes are visible to `get` but not to queries.
 */
export class FirestoreDocumentStore implements DocumentStore {
  readonly kind: StorageKind = 'firestore'
  readonly api: FirestoreAPI
  private readonly retry: RetryPolicy
  private depth = 0
  private writes: FirestoreWrite[] = []
  // documents created in the open transaction
  private staged = new Map<string, JsonObject>()
  // field overlays for remote documents updated in the open transaction
  private overlays = new Map<string, JsonObject>()

  constructor(api: FirestoreAPI, retry: RetryPolicy = DEFAULT_RETRY_POLICY) {
    this.api = api
    this.retry = retry
  }

  /** Fails with a ConnectError when the database cannot be read. */
  async probe(): Promise<void> {
    await this.call('probe Firestore', () =>
      this.api.runQuery({ from: [{ collectionId: 'xgroups' }], limit: 1 })
    )
  }

  async get(collection: CollectionName, id: string): Promise<unknown> {
    const key = documentKey(collection, id)
    const staged = this.staged.get(key)
    if (staged !== undefined) return structuredClone(staged)

    const remote = await this.call(`get ${key}`, () =>
      this.api.getDocument(collection, id)
    )
    const overlay = this.overlays.get(key)
    if (remote === undefined || overlay === undefined) return remote
    return { ...remote, ...structuredClone(overlay) }
  }

  async create(
    collection: CollectionName,
    id: string,
    record: JsonObject
  ): Promise<void> {
    if (this.depth === 0) {
      await this.call(`create ${documentKey(collection, id)}`, () =>
        this.api.createDocument(collection, id, record)
      )
      return
    }

    const key = documentKey(collection, id)
    if (this.staged.has(key)) {
      throw new Error(`document ${key} already exists`)
    }
    this.staged.set(key, structuredClone(record))
    this.writes.push({
      update: {
        name: this.api.documentName(collection, id),
        fields: encodeFields(record),
      },
      currentDocument: { exists: false },
    })
  }

  async update(
    collection: CollectionName,
    id: string,
    fields: JsonObject
  ): Promise<void> {
    if (this.depth === 0) {
      await this.call(`update ${documentKey(collection, id)}`, () =>
        this.api.updateDocument(collection, id, fields)
      )
      return
    }

    const key = documentKey(collection, id)
    const staged = this.staged.get(key)
    if (staged !== undefined) {
      this.staged.set(key, { ...staged, ...structuredClone(fields) })
    } else {
      this.overlays.set(key, { ...this.overlays.get(key), ...structuredClone(fields) })
    }
    this.writes.push({
      update: {
        name: this.api.documentName(collection, id),
        fields: encodeFields(fields),
      },
      updateMask: { fieldPaths: Object.keys(fields).map(quoteFieldPath) },
      currentDocument: { exists: true },
    })
  }

  async query(
    collection: CollectionName,
    plan: QueryPlan
  ): Promise<Iterable<unknown>> {
    if (plan.limit === 0) return []
    if (plan.clauses.some((clause) => inValues(clause) === 0)) return []

    const remote = plan.clauses.findIndex(indexable)
    const first: Clause | undefined = plan.clauses[remote]
    const rest = plan.clauses.filter((_, index) => index !== remote)
    const structured: StructuredQuery = { from: [{ collectionId: collection }] }
    if (first !== undefined) {
      structured.where = {
        fieldFilter: {
          field: { fieldPath: quoteFieldPath(first.field) },
          op: OPERATORS[first.op],
          value: encodeValue(first.value),
        },
      }
    }
    if (rest.length === 0) {
      if (plan.order !== undefined) {
        structured.orderBy = [
          {
            field: { fieldPath: quoteFieldPath(plan.order.field) },
            direction:
              plan.order.direction === Direction.ASCENDING
                ? 'ASCENDING'
                : 'DESCENDING',
          },
        ]
      }
      structured.limit = plan.limit
    }

    const documents = await this.call(`query ${collection}`, () =>
      this.api.runQuery(structured)
    )
    if (rest.length === 0) return documents

    const matched = [...filterRecords(documents, rest)]
    const ordered = plan.order ? sortRecords(matched, plan.order) : matched
    return filterRecords(ordered, [], plan.limit)
  }

  async transaction<T>(scope: () => Promise<T>): Promise<T> {
    if (this.depth > 0) return scope()

    this.depth += 1
    try {
      const result = await scope()
      const writes = this.writes
      this.reset()
      if (writes.length > 0) {
        await this.call(`commit ${writes.length} writes`, () =>
          this.api.commit(writes)
        )
      }
      return result
    } finally {
      this.reset()
    }
  }

  async close(): Promise<void> {
    this.reset()
  }

  private reset(): void {
    this.depth = 0
    this.writes = []
    this.staged = new Map()
    this.overlays = new Map()
  }

  private async call<T>(description: string, operation: () => Promise<T>): Promise<T> {
    return retryOrThrow(description, operation, this.retry)
  }
}

export interface FirestoreStorageOptions extends FirestoreConfig {
  retry?: RetryPolicy
  user?: string
}

export class FirestoreStorage extends DocumentStorage {
  /** Connects and probes the database; rejects with a ConnectError. */
  static async open(options: FirestoreStorageOptions): Promise<FirestoreStorage> {
    const store = new FirestoreDocumentStore(new FirestoreAPI(options), options.retry)
    await store.probe()
    return new FirestoreStorage(store, options.user)
  }
}
