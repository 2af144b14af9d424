import axios, { AxiosInstance } from 'axios'
import { handleApiError, isNotFound } from '../../lib/api/errors'
import { isPlainObject } from '../helpers/helperFunctions'
import { JsonObject, JsonValue } from '../helpers/historyInterfaces'

export const FIRESTORE_BASE_URL = 'https://firestore.googleapis.com/v1/'
export const DEFAULT_DATABASE = '(default)'

// https://cloud.google.com/firestore/docs/reference/rest/Shared.Types/Value
export type FirestoreValue =
  | { nullValue: null }
  | { booleanValue: boolean }
  | { integerValue: string }
  | { doubleValue: number }
  | { stringValue: string }
  | { timestampValue: string }
  | { arrayValue: { values?: FirestoreValue[] } }
  | { mapValue: { fields?: FirestoreFields } }

export type FirestoreFields = { [key: string]: FirestoreValue }

export type FirestoreOperator =
  | 'LESS_THAN'
  | 'LESS_THAN_OR_EQUAL'
  | 'GREATER_THAN'
  | 'GREATER_THAN_OR_EQUAL'
  | 'EQUAL'
  | 'IN'

export interface FieldReference {
  fieldPath: string
}

export interface StructuredQuery {
  from: Array<{ collectionId: string }>
  where?: {
    fieldFilter: {
      field: FieldReference
      op: FirestoreOperator
      value: FirestoreValue
    }
  }
  orderBy?: Array<{
    field: FieldReference
    direction: 'ASCENDING' | 'DESCENDING'
  }>
  limit?: number
}

export interface FirestoreWrite {
  update: { name: string; fields: FirestoreFields }
  updateMask?: { fieldPaths: string[] }
  currentDocument?: { exists: boolean }
}

export interface FirestoreConfig {
  projectId: string
  databaseId?: string
  baseURL?: string
  accessToken?: string
}

export function encodeValue(value: JsonValue): FirestoreValue {
  if (value === null) return { nullValue: null }
  if (typeof value === 'boolean') return { booleanValue: value }
  if (typeof value === 'number') {
    return Number.isInteger(value)
      ? { integerValue: value.toString() }
      : { doubleValue: value }
  }
  if (typeof value === 'string') return { stringValue: value }
  if (Array.isArray(value)) {
    return { arrayValue: { values: value.map(encodeValue) } }
  }
  return { mapValue: { fields: encodeFields(value) } }
}

export function encodeFields(record: JsonObject): FirestoreFields {
  const fields: FirestoreFields = {}
  for (const [key, value] of Object.entries(record)) {
    fields[key] = encodeValue(value)
  }
  return fields
}

export function decodeValue(value: unknown): JsonValue {
  if (!isPlainObject(value)) {
    throw new Error(`invalid Firestore value: ${JSON.stringify(value)}`)
  }
  if ('nullValue' in value) return null
  if (typeof value.booleanValue === 'boolean') return value.booleanValue
  // int64 values arrive as strings
  if (typeof value.integerValue === 'string' || typeof value.integerValue === 'number') {
    return Number(value.integerValue)
  }
  if (typeof value.doubleValue === 'number' || typeof value.doubleValue === 'string') {
    return Number(value.doubleValue)
  }
  if (typeof value.stringValue === 'string') return value.stringValue
  if (typeof value.timestampValue === 'string') return value.timestampValue
  if ('arrayValue' in value) {
    const values = isPlainObject(value.arrayValue) ? value.arrayValue.values : undefined
    return Array.isArray(values) ? values.map(decodeValue) : []
  }
  if ('mapValue' in value) {
    return decodeFields(isPlainObject(value.mapValue) ? value.mapValue.fields : undefined)
  }
  throw new Error(`unsupported Firestore value: ${JSON.stringify(value)}`)
}

export function decodeFields(fields: unknown): JsonObject {
  const record: JsonObject = {}
  if (!isPlainObject(fields)) return record
  for (const [key, value] of Object.entries(fields)) {
    record[key] = decodeValue(value)
  }
  return record
}

// Segments that are not plain identifiers must be quoted with backticks.
export function quoteFieldPath(path: string): string {
  return path
    .split('.')
    .map((segment) =>
      /^[A-Za-z_][A-Za-z_0-9]*$/.test(segment)
        ? segment
        : '`' + segment.replace(/\\/g, '\\\\').replace(/`/g, '\\`') + '`'
    )
    .join('.')
}

/** Thin client of the Firestore REST API. */
export class FirestoreAPI {
  apiClient: AxiosInstance
  readonly projectId: string
  readonly databaseId: string

  constructor(config: FirestoreConfig) {
    this.projectId = config.projectId
    this.databaseId = config.databaseId ?? DEFAULT_DATABASE
    this.apiClient = axios.create({
      baseURL: config.baseURL ?? FIRESTORE_BASE_URL,
      headers: {
        'Content-Type': 'application/json',
        ...(config.accessToken
          ? { Authorization: `Bearer ${config.accessToken}` }
          : {}),
      },
    })
  }

  get databasePath(): string {
    return `projects/${this.projectId}/databases/${this.databaseId}`
  }

  documentName(collection: string, id: string): string {
    return `${this.databasePath}/documents/${collection}/${id}`
  }

  /** Resolves to `undefined` when the document does not exist. */
  async getDocument(collection: string, id: string): Promise<JsonObject | undefined> {
    try {
      const response = await this.apiClient.get<unknown>(
        this.documentName(collection, id)
      )
      const data = response.data
      return decodeFields(isPlainObject(data) ? data.fields : undefined)
    } catch (error) {
      if (isNotFound(handleApiError(error))) return undefined
      console.error(
        `An error occurred while fetching document ${collection}/${id}:`,
        error
      )
      throw error
    }
  }

  async createDocument(
    collection: string,
    id: string,
    record: JsonObject
  ): Promise<void> {
    try {
      await this.apiClient.post(
        `${this.databasePath}/documents/${collection}`,
        { fields: encodeFields(record) },
        { params: { documentId: id } }
      )
    } catch (error) {
      console.error(
        `An error occurred while creating document ${collection}/${id}:`,
        error
      )
      throw error
    }
  }

  /** Overwrites the given top-level fields of an existing document. */
  async updateDocument(
    collection: string,
    id: string,
    fields: JsonObject
  ): Promise<void> {
    try {
      await this.apiClient.patch(
        this.documentName(collection, id),
        { fields: encodeFields(fields) },
        {
          params: {
            'updateMask.fieldPaths': Object.keys(fields).map(quoteFieldPath),
            'currentDocument.exists': true,
          },
          // repeated query parameters, not updateMask.fieldPaths[]
          paramsSerializer: { indexes: null },
        }
      )
    } catch (error) {
      console.error(
        `An error occurred while updating document ${collection}/${id}:`,
        error
      )
      throw error
    }
  }

  async runQuery(query: StructuredQuery): Promise<JsonObject[]> {
    try {
      const response = await this.apiClient.post<unknown>(
        `${this.databasePath}/documents:runQuery`,
        { structuredQuery: query }
      )
      const rows = Array.isArray(response.data) ? response.data : []
      const documents: JsonObject[] = []
      for (const row of rows) {
        // rows without a document only report progress
        if (isPlainObject(row) && isPlainObject(row.document)) {
          documents.push(decodeFields(row.document.fields))
        }
      }
      return documents
    } catch (error) {
      console.error('An error occurred while running a query:', error)
      throw error
    }
  }

  /** Applies every write atomically, or none of them. */
  async commit(writes: FirestoreWrite[]): Promise<void> {
    try {
      await this.apiClient.post(`${this.databasePath}/documents:commit`, {
        writes,
      })
    } catch (error) {
      console.error(
        `An error occurred while committing ${writes.length} writes:`,
        error
      )
      throw error
    }
  }
}
