import { errorMessage } from '../../lib/api/errors'
import { parseTimestamp, toIsoTimestamp } from '../../lib/time'
import { formatKwargs } from '../helpers/helperFunctions'
import { JobRecord, JsonObject, Kwargs } from '../helpers/historyInterfaces'
import { ComputePlatform, SubmissionStatus } from '../compute/computePlatform'
import { HistoryContext } from '../storage/interfaces'
import { Experiment } from './experiment'
import { JobSpec } from './jobSpec'
import { Run } from './run'
import { JobStatus } from './status'

/** One point of an experiment's parameter sweep. */
export class Job {
  readonly id: string
  readonly name: string
  readonly experimentId: string
  readonly user: string
  readonly timestamp: Date
  readonly args: string[]
  readonly kwargs: Kwargs
  private readonly context: HistoryContext

  constructor(record: JobRecord, context: HistoryContext) {
    this.context = context
    this.id = record.id
    this.name = record.name
    this.experimentId = record.experiment
    this.user = record.user
    this.timestamp = parseTimestamp(record.timestamp)
    this.args = record.args
    this.kwargs = record.kwargs
  }

  experiment(): Promise<Experiment | undefined> {
    return this.context.fetch('experiments', this.experimentId)
  }

  /** Every run of this job, oldest first. */
  async runs(): Promise<Run[]> {
    const runs = await this.context.runsOf(this.id)
    return runs.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
  }

  async latestRun(): Promise<Run | undefined> {
    const runs = await this.runs()
    return runs[runs.length - 1]
  }

  // e.g. ['train', '--lr', '0.1'] for args ['train'] and kwargs { lr: 0.1 }
  argv(): string[] {
    return [
      ...this.args,
      ...Object.entries(this.kwargs).flatMap(([key, value]) => [
        `--${key}`,
        String(value),
      ]),
    ]
  }

  // e.g. 'train --lr 0.1'
  describe(): string {
    return [...this.args, ...formatKwargs(this.kwargs)].join(' ')
  }

  /**
   * Submits this job to `compute` and records the outcome as a new Run.
   * A submission that throws is recorded as a FAILED run carrying the error,
   * so that it can be found and resubmitted later. Resolves to `undefined`
   * only when the platform declined the job without submitting anything.
   */
  async submit(
    compute: ComputePlatform,
    spec?: JsonObject
  ): Promise<Run | undefined> {
    let submission: SubmissionStatus | undefined
    try {
      submission = await compute.submit(this, spec)
    } catch (error) {
      console.error(
        `An error occurred while submitting job ${this.id} to ${compute.name}:`,
        error
      )
      submission = {
        spec,
        status: JobStatus.FAILED,
        details: { error: errorMessage(error) },
      }
    }
    if (submission === undefined) return undefined

    const jobSpec = await this.context.getOrCreateJobSpec(
      JobSpec.createRecord(this.id, compute.platform, submission.spec ?? {})
    )
    return this.context.addRun(
      Run.createRecord({
        job: this.id,
        jobSpec: jobSpec.id,
        user: this.user,
        platform: compute.platform,
        status: submission.status,
        details: submission.details,
      })
    )
  }

  toDict(): JobRecord {
    return {
      id: this.id,
      name: this.name,
      experiment: this.experimentId,
      user: this.user,
      timestamp: toIsoTimestamp(this.timestamp),
      args: this.args,
      kwargs: this.kwargs,
    }
  }
}
