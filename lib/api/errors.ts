import { AxiosError } from 'axios'

export interface ApiError {
  status: number
  message: string
  code?: string
}

export type Result<T, E = ApiError> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

export class HistoryError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** The store or a compute platform could not be reached. */
export class ConnectError extends HistoryError {
  readonly apiError?: ApiError

  constructor(message: string, apiError?: ApiError) {
    super(apiError ? `${message}: ${apiError.message}` : message)
    this.apiError = apiError
  }
}

/** A query that can never be answered, as opposed to one with no results. */
export class QueryError extends HistoryError {}

export class SubmissionError extends HistoryError {}

// Google APIs wrap failures as { error: { code, message, status } }.
interface GoogleErrorBody {
  error?: {
    code?: number
    message?: string
    status?: string
  }
}

function isGoogleErrorBody(data: unknown): data is GoogleErrorBody {
  return typeof data === 'object' && data !== null && 'error' in data
}

const TRANSIENT_CODES = [
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ECONNABORTED',
  'ERR_NETWORK',
  'UNAVAILABLE',
  'RESOURCE_EXHAUSTED',
  'DEADLINE_EXCEEDED',
]

// Errors thrown by Node's own modules can fail `instanceof Error` under
// a test runner's sandbox.
function isErrorObject(error: unknown): error is Error {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string' &&
    'name' in error &&
    typeof error.name === 'string'
  )
}

// e.g. the Kubernetes client's HttpError
function hasStatusCode(error: Error): error is Error & { statusCode: number } {
  return 'statusCode' in error && typeof error.statusCode === 'number'
}

// Node's code for a failed socket, e.g. 'ECONNREFUSED'
function networkErrorCode(error: Error): string | undefined {
  if (!('code' in error) || typeof error.code !== 'string') return undefined
  return TRANSIENT_CODES.includes(error.code) ? error.code : undefined
}

// Marks errors raised in-process rather than reported by a remote server.
export const INTERNAL_ERROR_CODE = 'INTERNAL'

export function handleApiError(error: unknown): ApiError {
  if (error instanceof ConnectError && error.apiError) {
    return error.apiError
  }

  if (error instanceof AxiosError) {
    const data: unknown = error.response?.data
    if (isGoogleErrorBody(data) && data.error) {
      return {
        status: error.response?.status ?? data.error.code ?? 500,
        message: data.error.message || error.message,
        code: data.error.status,
      }
    }
    return {
      // no response at all means the request never reached the server
      status: error.response?.status ?? 0,
      message: error.message,
      code: error.code,
    }
  }

  if (isErrorObject(error) && hasStatusCode(error)) {
    return { status: error.statusCode, message: error.message }
  }

  if (isErrorObject(error)) {
    const code = networkErrorCode(error)
    if (code !== undefined) return { status: 0, message: error.message, code }
    return {
      status: 500,
      message: error.message,
      code: INTERNAL_ERROR_CODE,
    }
  }

  return {
    status: 500,
    message: 'An unexpected error occurred: ' + String(error),
    code: INTERNAL_ERROR_CODE,
  }
}

export function isNotFound(error: ApiError): boolean {
  return error.status === 404 || error.code === 'NOT_FOUND'
}

export function isConflict(error: ApiError): boolean {
  return error.status === 409 || error.code === 'ALREADY_EXISTS'
}

export function isTransient(error: ApiError): boolean {
  if (error.code === INTERNAL_ERROR_CODE) return false
  if (error.status === 0 || error.status === 429 || error.status >= 500) {
    return true
  }
  return error.code !== undefined && TRANSIENT_CODES.includes(error.code)
}

export function errorMessage(error: unknown): string {
  return handleApiError(error).message
}
