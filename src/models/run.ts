import { SubmissionError } from '../../lib/api/errors'
import { parseTimestamp, toIsoTimestamp } from '../../lib/time'
import { newId } from '../helpers/helperFunctions'
import { JsonObject, RunRecord } from '../helpers/historyInterfaces'
import { ComputePlatform } from '../compute/computePlatform'
import { HistoryContext } from '../storage/interfaces'
import { Job } from './job'
import { JobSpec } from './jobSpec'
import { JobStatus, Platform } from './status'

export type RunParams = Omit<RunRecord, 'id' | 'timestamp'>

/**
 * One execution attempt of a job on a platform. Runs are append-only;
 * only the cached status is ever rewritten.
 */
export class Run {
  readonly id: string
  readonly jobId: string
  readonly jobSpecId: string
  readonly user: string
  readonly platform: Platform
  readonly timestamp: Date
  readonly details: JsonObject
  private cachedStatus: JobStatus
  private readonly context: HistoryContext

  constructor(record: RunRecord, context: HistoryContext) {
    this.context = context
    this.id = record.id
    this.jobId = record.job
    this.jobSpecId = record.jobSpec
    this.user = record.user
    this.platform = record.platform
    this.timestamp = parseTimestamp(record.timestamp)
    this.details = record.details
    this.cachedStatus = record.status
  }

  /** Last known status; see `updateJobStatus` for the live one. */
  get status(): JobStatus {
    return this.cachedStatus
  }

  async updateStatus(status: JobStatus): Promise<void> {
    if (status === this.cachedStatus) return
    const previous = this.cachedStatus
    this.cachedStatus = status
    try {
      await this.context.saveRunStatus(this.id, status)
    } catch (error) {
      this.cachedStatus = previous
      throw error
    }
  }

  job(): Promise<Job | undefined> {
    return this.context.fetch('jobs', this.jobId)
  }

  jobSpec(): Promise<JobSpec | undefined> {
    return this.context.fetch('jobSpecs', this.jobSpecId)
  }

  // Name of the job on its platform, recorded at submission.
  platformJobName(): string | undefined {
    const name = this.details.jobName
    return typeof name === 'string' ? name : undefined
  }

  /**
   * Submits the same job spec again and records it as a new run of the
   * same job. This run is left untouched.
   */
  async clone(compute: ComputePlatform): Promise<Run | undefined> {
    if (compute.platform !== this.platform) {
      throw new SubmissionError(
        `run ${this.id} ran on ${this.platform}, cannot clone it to ${compute.platform}`
      )
    }
    const job = await this.job()
    if (job === undefined) {
      throw new SubmissionError(`job ${this.jobId} of run ${this.id} not found`)
    }
    const jobSpec = await this.jobSpec()
    return job.submit(compute, jobSpec?.payload())
  }

  toDict(): RunRecord {
    return {
      id: this.id,
      job: this.jobId,
      jobSpec: this.jobSpecId,
      user: this.user,
      platform: this.platform,
      timestamp: toIsoTimestamp(this.timestamp),
      status: this.cachedStatus,
      details: this.details,
    }
  }

  static createRecord(params: RunParams, now: Date = new Date()): RunRecord {
    return {
      id: newId(),
      ...params,
      timestamp: toIsoTimestamp(now),
    }
  }
}
