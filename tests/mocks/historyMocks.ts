import { JsonObject, Kwargs } from '../../src/helpers/historyInterfaces'
import { ComputePlatform, SubmissionStatus } from '../../src/compute/computePlatform'
import { Job } from '../../src/models/job'
import { Run } from '../../src/models/run'
import { JobStatus, Platform } from '../../src/models/status'
import { Storage } from '../../src/storage/interfaces'

export const TEST_USER = 'test-user'

// NullCompute random source that always polls the given status
export function fixedRandom(status: JobStatus): () => number {
  const order = [
    JobStatus.SUBMITTED,
    JobStatus.RUNNING,
    JobStatus.SUCCEEDED,
    JobStatus.FAILED,
    JobStatus.STOPPED,
  ]
  const index = order.indexOf(status)
  return () => (index + 0.5) / order.length
}

export function sweep(values: number[]): Kwargs[] {
  return values.map((a) => ({ a, b: `run-${a}` }))
}

export async function createSweep(
  storage: Storage,
  values: number[] = [0, 1, 2, 3],
  xgroup: string = 'sweep-group'
) {
  const containerSpec = await storage.getOrCreateContainerSpec({
    buildPath: '/work/project',
    accelerator: { kind: 'gpu', type: 'P100', count: 1 },
  })
  const experiment = await storage.createExperiment({
    name: 'mnist',
    container: containerSpec.id,
    command: 'python train.py',
    configs: sweep(values),
    args: ['--epochs', '2'],
    xgroup,
  })
  return { containerSpec, experiment, jobs: await experiment.jobs() }
}

/** Compute platform that records calls and answers from a script. */
export class ScriptedCompute implements ComputePlatform {
  readonly name: string
  readonly platform: Platform
  readonly submitted: Array<{ job: Job; spec?: JsonObject }> = []
  readonly polled: Run[] = []
  readonly stopped: Run[] = []
  nextStatus: JobStatus = JobStatus.RUNNING
  submitError?: Error
  statusError?: Error

  constructor(platform: Platform = Platform.TEST) {
    this.platform = platform
    this.name = `scripted-${platform}`
  }

  async submit(job: Job, spec?: JsonObject): Promise<SubmissionStatus> {
    this.submitted.push({ job, spec })
    if (this.submitError) throw this.submitError
    return {
      spec: spec ?? { job: job.name },
      status: JobStatus.SUBMITTED,
      details: { jobName: `scripted-${job.name}` },
    }
  }

  async status(run: Run): Promise<JobStatus> {
    this.polled.push(run)
    if (this.statusError) throw this.statusError
    return this.nextStatus
  }

  async stop(run: Run): Promise<boolean> {
    this.stopped.push(run)
    return true
  }
}
