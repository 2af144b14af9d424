import { JsonObject } from '../helpers/historyInterfaces'
import { Job } from '../models/job'
import { Run } from '../models/run'
import { JobStatus, Platform } from '../models/status'

/** What a platform reports back for one submission. */
export interface SubmissionStatus {
  // the payload actually submitted, stored as the run's JobSpec; absent
  // when the submission failed before the platform built one
  spec?: JsonObject
  status: JobStatus
  // platform bookkeeping, e.g. { jobName } used to poll and stop the job
  details: JsonObject
}

export interface ComputePlatform {
  readonly name: string
  readonly platform: Platform

  /**
   * Submits `job`, built from `spec` when given (a resubmission) or from the
   * job itself. Resolves to `undefined` when nothing was submitted.
   */
  submit(job: Job, spec?: JsonObject): Promise<SubmissionStatus | undefined>
  /** Live status of `run`. Throws when the platform cannot be reached. */
  status(run: Run): Promise<JobStatus>
  /** Resolves to whether the platform accepted the stop request. */
  stop(run: Run): Promise<boolean>
}

export type PlatformRegistry = ReadonlyMap<Platform, ComputePlatform>

export function createPlatformRegistry(
  ...platforms: ComputePlatform[]
): PlatformRegistry {
  return new Map(platforms.map((compute) => [compute.platform, compute]))
}
