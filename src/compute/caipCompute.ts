import { SubmissionError } from '../../lib/api/errors'
import { DEFAULT_RETRY_POLICY, RetryPolicy, retryOrThrow } from '../../lib/api/retry'
import { getCaipJobState } from '../../lib/api/utils'
import { compactTimestamp } from '../../lib/time'
import { newId } from '../helpers/helperFunctions'
import { JsonObject } from '../helpers/historyInterfaces'
import { Job } from '../models/job'
import { Run } from '../models/run'
import { CaipJobState, JobStatus, Platform } from '../models/status'
import { CaipAPI } from '../services/caip'
import { ComputePlatform, SubmissionStatus } from './computePlatform'

const CAIP_TO_JOB_STATUS: Record<CaipJobState, JobStatus> = {
  [CaipJobState.STATE_UNSPECIFIED]: JobStatus.UNKNOWN,
  [CaipJobState.QUEUED]: JobStatus.SUBMITTED,
  [CaipJobState.PREPARING]: JobStatus.SUBMITTED,
  [CaipJobState.RUNNING]: JobStatus.RUNNING,
  [CaipJobState.SUCCEEDED]: JobStatus.SUCCEEDED,
  [CaipJobState.FAILED]: JobStatus.FAILED,
  [CaipJobState.CANCELLING]: JobStatus.RUNNING,
  [CaipJobState.CANCELLED]: JobStatus.STOPPED,
}

export function caipStateToStatus(state: string | undefined): JobStatus {
  const caipState = getCaipJobState(state)
  return caipState === undefined ? JobStatus.UNKNOWN : CAIP_TO_JOB_STATUS[caipState]
}

// Job ids take letters, digits and underscores, and start with a letter.
// e.g. caipJobId('mnist-0', date) => 'mnist_0_20200501_090403_1a2b3c'
export function caipJobId(name: string, date: Date = new Date()): string {
  const base = name.replace(/[^A-Za-z0-9_]/g, '_')
  const prefix = /^[A-Za-z]/.test(base) ? base : `job_${base}`
  const stamp = compactTimestamp(date).replace(/-/g, '').replace(/^(\d{8})/, '$1_')
  return `${prefix.slice(0, 100)}_${stamp}_${newId().slice(0, 6)}`
}

export interface CaipComputeOptions {
  projectId: string
  api?: CaipAPI
  // request body for jobs submitted without a spec
  buildSpec?: (job: Job) => JsonObject
  retry?: RetryPolicy
}

/** Training jobs on Cloud AI Platform. */
export class CaipCompute implements ComputePlatform {
  readonly name = 'CAIP'
  readonly platform = Platform.CAIP
  readonly projectId: string
  private readonly api: CaipAPI
  private readonly buildSpec?: (job: Job) => JsonObject
  private readonly retry: RetryPolicy

  constructor(options: CaipComputeOptions) {
    this.projectId = options.projectId
    this.api = options.api ?? new CaipAPI()
    this.buildSpec = options.buildSpec
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY
  }

  async submit(job: Job, spec?: JsonObject): Promise<SubmissionStatus> {
    const body = spec ?? this.buildSpec?.(job)
    if (body === undefined) {
      throw new SubmissionError(`no training job request for job ${job.id}`)
    }
    // every submission needs a fresh job id, resubmissions included
    const jobId = caipJobId(job.name)
    const request: JsonObject = { ...body, jobId }
    // a retried request reuses its job id, so it is never created twice
    const created = await retryOrThrow(
      `create training job ${jobId}`,
      () => this.api.createJob(this.projectId, request),
      this.retry
    )
    return {
      spec: request,
      status: created.state === undefined ? JobStatus.SUBMITTED : caipStateToStatus(created.state),
      details: { jobName: created.jobId, projectId: this.projectId },
    }
  }

  async status(run: Run): Promise<JobStatus> {
    const { projectId, jobName } = this.locate(run)
    const job = await retryOrThrow(
      `get training job ${jobName}`,
      () => this.api.getJob(projectId, jobName),
      this.retry
    )
    return caipStateToStatus(job.state)
  }

  async stop(run: Run): Promise<boolean> {
    const { projectId, jobName } = this.locate(run)
    await this.api.cancelJob(projectId, jobName)
    return true
  }

  private locate(run: Run): { projectId: string; jobName: string } {
    const jobName = run.platformJobName()
    if (jobName === undefined) {
      throw new SubmissionError(`run ${run.id} has no CAIP job id`)
    }
    const projectId = run.details.projectId
    return {
      projectId: typeof projectId === 'string' ? projectId : this.projectId,
      jobName,
    }
  }
}
