import { CaipJobState, JobStatus, Platform } from './status'

function enumValue<T extends string>(
  values: readonly T[],
  raw: string | undefined
): T | undefined {
  if (raw === undefined) return undefined
  const key = raw.toUpperCase()
  return values.find((v) => v === key)
}

export function getJobStatus(status: string | undefined): JobStatus | undefined {
  return enumValue(Object.values(JobStatus), status)
}

export function getPlatform(platform: string | undefined): Platform | undefined {
  return enumValue(Object.values(Platform), platform)
}

export function getCaipJobState(
  state: string | undefined
): CaipJobState | undefined {
  return enumValue(Object.values(CaipJobState), state)
}

export function getJobStatusLabel(status: JobStatus | undefined): string {
  switch (status) {
    case JobStatus.SUBMITTED:
      return 'Submitted'
    case JobStatus.RUNNING:
      return 'Running'
    case JobStatus.SUCCEEDED:
      return 'Succeeded'
    case JobStatus.FAILED:
      return 'Failed'
    case JobStatus.STOPPED:
      return 'Stopped'
    default:
      return 'Unknown'
  }
}

// UNKNOWN only means the last poll could not confirm a state, so it is
// polled again rather than cached.
export function isTerminalJobStatus(status: JobStatus | undefined): boolean {
  return (
    status === JobStatus.SUCCEEDED ||
    status === JobStatus.FAILED ||
    status === JobStatus.STOPPED
  )
}

export function isActiveJobStatus(status: JobStatus | undefined): boolean {
  return status === JobStatus.SUBMITTED || status === JobStatus.RUNNING
}

// returns short entity ids.
// e.g. shortID('3514ff75c6f643808dc688f31ce7a1b3') => '3514ff75'
export function shortID(id: string | undefined): string {
  if (!id) return 'N/A'
  return id.slice(0, 8)
}
