export function normalizeTimestamp(timestamp: number): number {
  // Timestamp is too small, must be in seconds, convert to milliseconds
  if (timestamp < 1e12) {
    return timestamp * 1e3
  }
  // Timestamp is in nanoseconds, convert to milliseconds
  if (timestamp > 1e15) {
    return Math.floor(timestamp / 1e6)
  }
  return timestamp
}

export function parseTimestamp(value: string | number | Date): Date {
  if (value instanceof Date) return new Date(value.getTime())
  if (typeof value === 'number') return new Date(normalizeTimestamp(value))
  return new Date(value)
}

// Stored form of every entity timestamp. ISO strings order the same way
// in every backend, including when compared as plain strings.
export function toIsoTimestamp(date: Date): string {
  return date.toISOString()
}

export function formatTimestamp(
  timestamp: Date | number | undefined,
  includeSeconds: boolean = false
): string {
  if (timestamp === undefined) return 'N/A'

  const date =
    timestamp instanceof Date ? timestamp : new Date(normalizeTimestamp(timestamp))
  if (Number.isNaN(date.getTime())) return 'N/A'

  const year = date.getFullYear()
  const month = (date.getMonth() + 1).toString().padStart(2, '0')
  const day = date.getDate().toString().padStart(2, '0')
  const hours = date.getHours().toString().padStart(2, '0')
  const minutes = date.getMinutes().toString().padStart(2, '0')

  let formattedDate = `${year}-${month}-${day} ${hours}:${minutes}`

  if (includeSeconds) {
    const seconds = date.getSeconds().toString().padStart(2, '0')
    formattedDate += `:${seconds}`
  }

  return formattedDate
}

// e.g. compactTimestamp(2020-05-01T09:04:03) => '2020-05-01-09-04-03'
export function compactTimestamp(date: Date): string {
  return formatTimestamp(date, true).replace(/[ :]/g, '-')
}

export function formatDuration(durationMs: number): string {
  const ms = durationMs % 1000
  const seconds = Math.floor(durationMs / 1000) % 60
  const minutes = Math.floor(durationMs / (1000 * 60)) % 60
  const hours = Math.floor(durationMs / (1000 * 60 * 60)) % 24
  const days = Math.floor(durationMs / (1000 * 60 * 60 * 24))

  if (days > 0) {
    return `${days}d ${hours}h`
  } else if (hours > 0) {
    return `${hours}h ${minutes}m`
  } else if (minutes > 0) {
    return `${minutes}m ${seconds}s`
  } else if (seconds > 0) {
    return `${seconds}s ${ms}ms`
  } else {
    return `${ms}ms`
  }
}
