import { JsonObject } from '../helpers/historyInterfaces'
import { Job } from '../models/job'
import { Run } from '../models/run'
import { JobStatus, Platform } from '../models/status'
import { ComputePlatform, SubmissionStatus } from './computePlatform'

const TEST_STATUSES: readonly JobStatus[] = [
  JobStatus.SUBMITTED,
  JobStatus.RUNNING,
  JobStatus.SUCCEEDED,
  JobStatus.FAILED,
  JobStatus.STOPPED,
]

/**
 * Compute platform that runs nothing. Each status poll returns a random
 * status, so a run reaches a terminal one after a few polls and is then
 * never polled again.
 */
export class NullCompute implements ComputePlatform {
  readonly name = 'TEST'
  readonly platform = Platform.TEST
  // uniform in [0, 1)
  private readonly random: () => number

  constructor(random: () => number = Math.random) {
    this.random = random
  }

  async submit(job: Job, spec?: JsonObject): Promise<SubmissionStatus> {
    return {
      spec: spec ?? {},
      status: JobStatus.SUBMITTED,
      details: { jobName: `test-${job.name}` },
    }
  }

  async status(): Promise<JobStatus> {
    const index = Math.floor(this.random() * TEST_STATUSES.length)
    return TEST_STATUSES[Math.min(index, TEST_STATUSES.length - 1)]
  }

  async stop(run: Run): Promise<boolean> {
    await run.updateStatus(JobStatus.STOPPED)
    return true
  }
}
