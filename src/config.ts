import { RetryPolicy } from '../lib/api/retry'
import { currentUser } from './helpers/helperFunctions'
import { DEFAULT_HISTORY_FILE } from './storage/fileStorage'

export type HistoryConfig = {
  readonly dbUrl: string
  // true disables falling back to the local stores
  readonly strict: boolean
  readonly fallbackFile: string
  readonly user: string
  readonly accessToken?: string
  readonly retry: RetryPolicy
  readonly statusMaxJobs: number
}

export type Environment = { [name: string]: string | undefined }

export const getHistoryConfig = (
  env: Environment = process.env
): HistoryConfig => {
  const fallbackFile = ensureString(
    env,
    'JOB_HISTORY_FALLBACK_FILE',
    DEFAULT_HISTORY_FILE
  )
  return {
    dbUrl: ensureString(env, 'JOB_HISTORY_DB_URL', `file://${fallbackFile}`),
    strict: ensureBool(env, 'JOB_HISTORY_STRICT', false),
    fallbackFile,
    user: ensureString(env, 'JOB_HISTORY_USER', currentUser()),
    accessToken: env.JOB_HISTORY_ACCESS_TOKEN || undefined,
    retry: {
      attempts: ensureInt(env, 'JOB_HISTORY_RETRIES', 3, 1),
      delayMs: ensureInt(env, 'JOB_HISTORY_RETRY_DELAY_MS', 500, 0),
    },
    statusMaxJobs: ensureInt(env, 'JOB_HISTORY_STATUS_MAX_JOBS', 8, 1),
  }
}

// An unset variable takes the default; a set one must be valid.
function ensureString(env: Environment, key: string, defaultValue: string): string {
  const value = env[key]
  if (value === undefined) return defaultValue
  if (value.trim().length === 0) {
    throw new Error(`${key} is set but empty`)
  }
  return value.trim()
}

function ensureBool(env: Environment, key: string, defaultValue: boolean): boolean {
  const value = env[key]
  if (value === undefined) return defaultValue
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true
    case 'false':
    case '0':
    case 'no':
      return false
    default:
      throw new Error(`${key} must be true or false, got '${value}'`)
  }
}

function ensureInt(
  env: Environment,
  key: string,
  defaultValue: number,
  min: number
): number {
  const value = env[key]
  if (value === undefined) return defaultValue
  const parsed = Number(value.trim())
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < min) {
    throw new Error(`${key} must be an integer of at least ${min}, got '${value}'`)
  }
  return parsed
}
