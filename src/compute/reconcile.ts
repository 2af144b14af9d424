import { SubmissionError, errorMessage } from '../../lib/api/errors'
import { isActiveJobStatus, isTerminalJobStatus } from '../../lib/api/utils'
import { JsonObject } from '../helpers/historyInterfaces'
import { Job } from '../models/job'
import { Run } from '../models/run'
import { JobStatus, Platform } from '../models/status'
import { Storage } from '../storage/interfaces'
import { PlatformRegistry } from './computePlatform'

/**
 * Current status of `run`. Terminal statuses are returned without asking the
 * platform. Otherwise the platform is polled and a changed status is stored;
 * when polling fails the result is UNKNOWN and the stored status is kept.
 */
export async function updateJobStatus(
  run: Run,
  platforms: PlatformRegistry
): Promise<JobStatus> {
  if (isTerminalJobStatus(run.status)) return run.status

  const compute = platforms.get(run.platform)
  if (compute === undefined) {
    console.error(`No compute platform registered for ${run.platform}, run ${run.id}`)
    return JobStatus.UNKNOWN
  }

  let status: JobStatus
  try {
    status = await compute.status(run)
  } catch (error) {
    console.error(`An error occurred while fetching the status of run ${run.id}:`, error)
    return JobStatus.UNKNOWN
  }
  if (status === JobStatus.UNKNOWN) return status

  try {
    await run.updateStatus(status)
  } catch (error) {
    // stored again on the next poll
    console.error(`An error occurred while saving the status of run ${run.id}:`, error)
  }
  return status
}

/**
 * Status used to decide whether `run` is still active: the polled status, or
 * the stored one when the poll could not confirm a state.
 */
export async function liveJobStatus(
  run: Run,
  platforms: PlatformRegistry
): Promise<JobStatus> {
  const polled = await updateJobStatus(run, platforms)
  // an unconfirmed run may still be running
  return polled === JobStatus.UNKNOWN ? run.status : polled
}

/**
 * Stops `run` when it is still submitted or running. Resolves to true when
 * nothing is left running.
 */
export async function stopJob(run: Run, platforms: PlatformRegistry): Promise<boolean> {
  if (!isActiveJobStatus(await liveJobStatus(run, platforms))) return true
  return stopRun(run, platforms)
}

/** Asks the platform of `run` to stop it, without polling it first. */
export async function stopRun(run: Run, platforms: PlatformRegistry): Promise<boolean> {
  const compute = platforms.get(run.platform)
  if (compute === undefined) return false
  try {
    return await compute.stop(run)
  } catch (error) {
    console.error(`An error occurred while stopping run ${run.id}:`, error)
    return false
  }
}

function failure(run: Run | undefined): string | undefined {
  if (run === undefined) return 'nothing was submitted'
  if (run.status !== JobStatus.FAILED) return undefined
  const error = run.details.error
  return typeof error === 'string' ? error : 'submission failed'
}

export interface SubmissionRequest {
  job: Job
  // resubmitted payload; undefined lets the platform build one
  spec?: JsonObject
}

export interface SubmissionOutcome {
  request: SubmissionRequest
  run?: Run
  error?: string
}

export type SubmissionCallback = (
  outcome: SubmissionOutcome,
  index: number,
  total: number
) => void

export interface BatchSummary {
  submitted: number
  failed: number
  outcomes: SubmissionOutcome[]
}

/**
 * Submits each request to the platform of `platform`, one at a time, inside
 * one storage transaction. A run recorded as FAILED counts as a failure.
 * When recording a submission throws, the batch stops there: what was
 * already recorded is committed and the rest are reported as failed.
 */
export async function submitJobSpecs(
  storage: Storage,
  requests: SubmissionRequest[],
  platforms: PlatformRegistry,
  platform: Platform,
  callback?: SubmissionCallback
): Promise<BatchSummary> {
  const compute = platforms.get(platform)
  if (compute === undefined) {
    throw new SubmissionError(`No compute platform registered for ${platform}`)
  }

  return storage.transaction(async () => {
    const outcomes: SubmissionOutcome[] = []
    for (const [index, request] of requests.entries()) {
      let outcome: SubmissionOutcome
      let interrupted = false
      try {
        const run = await request.job.submit(compute, request.spec)
        outcome = { request, run, error: failure(run) }
      } catch (error) {
        console.error(`Submission of job ${request.job.id} to ${platform} failed:`, error)
        outcome = { request, error: errorMessage(error) }
        interrupted = true
      }
      outcomes.push(outcome)
      callback?.(outcome, index, requests.length)
      if (interrupted) {
        for (const skipped of requests.slice(index + 1)) {
          outcomes.push({ request: skipped, error: 'not submitted after an earlier error' })
        }
        break
      }
    }
    return {
      submitted: outcomes.filter((outcome) => outcome.error === undefined).length,
      failed: outcomes.filter((outcome) => outcome.error !== undefined).length,
      outcomes,
    }
  })
}
