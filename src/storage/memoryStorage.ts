import { QueryError } from '../../lib/api/errors'
import { JsonObject } from '../helpers/historyInterfaces'
import { DocumentStorage, DocumentStore } from './documentStorage'
import { COLLECTION_NAMES, CollectionName, StorageKind } from './interfaces'
import { QueryPlan, filterRecords } from './query'

export type MemoryCollections = Map<CollectionName, Map<string, JsonObject>>

export function emptyCollections(): MemoryCollections {
  return new Map(COLLECTION_NAMES.map((name) => [name, new Map()]))
}

/**
 * One map of dictionary records per collection. Queries scan the whole
 * collection; ordering is not supported.
 */
export class MemoryDocumentStore implements DocumentStore {
  readonly kind: StorageKind = 'memory'
  protected collections: MemoryCollections
  private depth = 0

  constructor(collections: MemoryCollections = emptyCollections()) {
    this.collections = collections
  }

  async get(collection: CollectionName, id: string): Promise<unknown> {
    const record = this.documents(collection).get(id)
    return record === undefined ? undefined : structuredClone(record)
  }

  async create(
    collection: CollectionName,
    id: string,
    record: JsonObject
  ): Promise<void> {
    const documents = this.documents(collection)
    if (documents.has(id)) {
      throw new Error(`document ${collection}/${id} already exists`)
    }
    documents.set(id, structuredClone(record))
    await this.written()
  }

  async update(
    collection: CollectionName,
    id: string,
    fields: JsonObject
  ): Promise<void> {
    const documents = this.documents(collection)
    const record = documents.get(id)
    if (record === undefined) {
      throw new Error(`document ${collection}/${id} not found`)
    }
    documents.set(id, { ...record, ...structuredClone(fields) })
    await this.written()
  }

  async query(
    collection: CollectionName,
    plan: QueryPlan
  ): Promise<Iterable<unknown>> {
    if (plan.order !== undefined) {
      throw new QueryError(`ordering is not supported by the ${this.kind} store`)
    }
    // snapshot, so that writes while iterating do not affect the result
    const records = [...this.documents(collection).values()]
    return filterRecords(records, plan.clauses, plan.limit)
  }

  /** Restores every collection when `scope` throws. Nested scopes join. */
  async transaction<T>(scope: () => Promise<T>): Promise<T> {
    if (this.depth > 0) return scope()

    const snapshot = structuredClone(this.collections)
    this.depth += 1
    try {
      const result = await scope()
      this.depth -= 1
      await this.written()
      return result
    } catch (error) {
      this.depth -= 1
      this.collections = snapshot
      throw error
    }
  }

  async close(): Promise<void> {
    this.collections = emptyCollections()
  }

  protected get inTransaction(): boolean {
    return this.depth > 0
  }

  // Called after every write and after each outermost transaction.
  protected async written(): Promise<void> {}

  private documents(collection: CollectionName): Map<string, JsonObject> {
    let documents = this.collections.get(collection)
    if (documents === undefined) {
      documents = new Map()
      this.collections.set(collection, documents)
    }
    return documents
  }
}

/** Single-process store for dry runs and tests. Nothing outlives the process. */
export class MemoryStorage extends DocumentStorage {
  constructor(user?: string) {
    super(new MemoryDocumentStore(), user)
  }
}
