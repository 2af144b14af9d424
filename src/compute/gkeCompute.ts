import { V1Job } from '@kubernetes/client-node'
import { SubmissionError } from '../../lib/api/errors'
import { DEFAULT_RETRY_POLICY, RetryPolicy, retryOrThrow } from '../../lib/api/retry'
import { JsonObject } from '../helpers/historyInterfaces'
import { Job } from '../models/job'
import { Run } from '../models/run'
import { GkeJobState, JobStatus, Platform } from '../models/status'
import { KubeJobClient, toV1Job } from '../services/gke'
import { ComputePlatform, SubmissionStatus } from './computePlatform'

export const DEFAULT_NAMESPACE = 'default'
export const JOB_ID_LABEL = 'job-history/job'

const GKE_TO_JOB_STATUS: Record<GkeJobState, JobStatus> = {
  [GkeJobState.STATE_UNSPECIFIED]: JobStatus.SUBMITTED,
  [GkeJobState.PENDING]: JobStatus.SUBMITTED,
  [GkeJobState.RUNNING]: JobStatus.RUNNING,
  [GkeJobState.FAILED]: JobStatus.FAILED,
  [GkeJobState.SUCCEEDED]: JobStatus.SUCCEEDED,
  [GkeJobState.UNAVAILABLE]: JobStatus.UNKNOWN,
}

/** Derives a job's state from its status block; `undefined` is a job not found. */
export function gkeJobState(job: V1Job | undefined): GkeJobState {
  if (job === undefined) return GkeJobState.UNAVAILABLE
  const status = job.status
  if (status === undefined) return GkeJobState.STATE_UNSPECIFIED

  if (status.completionTime !== undefined && status.succeeded !== undefined) {
    return status.succeeded > 0 ? GkeJobState.SUCCEEDED : GkeJobState.FAILED
  }
  // jobs past their backoff limit never complete, they carry a Failed condition
  const failed = status.conditions?.some(
    (condition) => condition.type === 'Failed' && condition.status === 'True'
  )
  if (failed) return GkeJobState.FAILED
  if (status.active !== undefined) {
    return status.active > 0 ? GkeJobState.RUNNING : GkeJobState.PENDING
  }
  return GkeJobState.STATE_UNSPECIFIED
}

export function gkeStateToStatus(state: GkeJobState): JobStatus {
  return GKE_TO_JOB_STATUS[state]
}

// Kubernetes names are lowercase DNS labels.
export function kubeName(name: string): string {
  const label = name
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, '-')
    .replace(/^-+/, '')
    .slice(0, 50)
    .replace(/-+$/, '')
  return label === '' ? 'job' : label
}

export interface GkeComputeOptions {
  client: KubeJobClient
  cluster: string
  namespace?: string
  // batch/v1 JobSpec for jobs submitted without a spec
  buildSpec?: (job: Job) => JsonObject
  retry?: RetryPolicy
}

/**
 * Kubernetes Jobs on a GKE cluster. The stored spec is the Job's `spec`
 * block; metadata is generated for each submission.
 */
export class GkeCompute implements ComputePlatform {
  readonly name = 'GKE'
  readonly platform = Platform.GKE
  readonly cluster: string
  readonly namespace: string
  private readonly client: KubeJobClient
  private readonly buildSpec?: (job: Job) => JsonObject
  private readonly retry: RetryPolicy

  constructor(options: GkeComputeOptions) {
    this.client = options.client
    this.cluster = options.cluster
    this.namespace = options.namespace ?? DEFAULT_NAMESPACE
    this.buildSpec = options.buildSpec
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY
  }

  async submit(job: Job, spec?: JsonObject): Promise<SubmissionStatus> {
    const jobSpec = spec ?? this.buildSpec?.(job)
    if (jobSpec === undefined) {
      throw new SubmissionError(`no Kubernetes job spec for job ${job.id}`)
    }
    const manifest: JsonObject = {
      apiVersion: 'batch/v1',
      kind: 'Job',
      metadata: {
        generateName: `${kubeName(job.name)}-`,
        namespace: this.namespace,
        labels: { [JOB_ID_LABEL]: job.id },
      },
      spec: jobSpec,
    }
    const created = await retryOrThrow(
      `create job in ${this.cluster}/${this.namespace}`,
      () => this.client.createJob(this.namespace, toV1Job(manifest)),
      this.retry
    )
    const jobName = created.metadata?.name
    if (jobName === undefined) {
      throw new SubmissionError(`cluster ${this.cluster} returned a job without a name`)
    }
    return {
      spec: jobSpec,
      status: JobStatus.SUBMITTED,
      details: { jobName, namespace: this.namespace, cluster: this.cluster },
    }
  }

  async status(run: Run): Promise<JobStatus> {
    const { jobName, namespace } = this.locate(run)
    const job = await retryOrThrow(
      `read job ${namespace}/${jobName}`,
      () => this.client.readJob(jobName, namespace),
      this.retry
    )
    return gkeStateToStatus(gkeJobState(job))
  }

  /**
   * Deletes the Job. A deleted job cannot be polled afterwards, so the run
   * is marked STOPPED here.
   */
  async stop(run: Run): Promise<boolean> {
    const { jobName, namespace } = this.locate(run)
    const deleted = await this.client.deleteJob(jobName, namespace)
    if (deleted) await run.updateStatus(JobStatus.STOPPED)
    return deleted
  }

  private locate(run: Run): { jobName: string; namespace: string } {
    const jobName = run.platformJobName()
    if (jobName === undefined) {
      throw new SubmissionError(`run ${run.id} has no Kubernetes job name`)
    }
    const namespace = run.details.namespace
    return {
      jobName,
      namespace: typeof namespace === 'string' ? namespace : this.namespace,
    }
  }
}
