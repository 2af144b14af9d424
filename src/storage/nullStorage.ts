import { HistoryError } from '../../lib/api/errors'
import { JobSpecRecord, RunRecord } from '../helpers/historyInterfaces'
import { currentUser } from '../helpers/helperFunctions'
import { ContainerBuildParams, ContainerSpec } from '../models/containerSpec'
import { Experiment } from '../models/experiment'
import { ExperimentGroup } from '../models/experimentGroup'
import { Job } from '../models/job'
import { JobSpec } from '../models/jobSpec'
import { Run } from '../models/run'
import { JobStatus } from '../models/status'
import {
  CollectionEntities,
  CollectionName,
  CreateExperimentOptions,
  HistoryContext,
  Storage,
  StorageKind,
} from './interfaces'

/**
 * Keeps entities as a plain object graph: jobs under their experiment, runs
 * and job specs under their job. Nothing can be queried and nothing is
 * persisted, which suits dry runs.
 */
export class NullStorage implements Storage, HistoryContext {
  readonly kind: StorageKind = 'null'
  readonly user: string

  private readonly xgroups = new Map<string, ExperimentGroup>()
  private readonly containerSpecs = new Map<string, ContainerSpec>()
  private readonly experiments = new Map<string, Experiment>()
  private readonly experimentsByGroup = new Map<string, Experiment[]>()
  private readonly jobs = new Map<string, Job>()
  private readonly jobsByExperiment = new Map<string, Job[]>()
  private readonly jobSpecs = new Map<string, JobSpec>()
  private readonly runs = new Map<string, Run>()
  private readonly runsByJob = new Map<string, Run[]>()

  constructor(user: string = currentUser()) {
    this.user = user
  }

  collection(): undefined {
    return undefined
  }

  async createExperiment(options: CreateExperimentOptions): Promise<Experiment> {
    const user = options.user ?? this.user
    const xgroup = await this.getOrCreateExperimentGroup(options.xgroup, user)
    const record = Experiment.createRecord({
      name: options.name,
      xgroup: xgroup.id,
      container: options.container,
      command: options.command ?? null,
      args: options.args ?? [],
      configs: options.configs ?? [],
      user,
    })

    const existing = this.experiments.get(record.id)
    if (existing !== undefined) return existing

    const experiment = new Experiment(record, this)
    this.experiments.set(experiment.id, experiment)
    append(this.experimentsByGroup, xgroup.id, experiment)
    for (const jobRecord of Experiment.jobRecords(record)) {
      const job = new Job(jobRecord, this)
      this.jobs.set(job.id, job)
      append(this.jobsByExperiment, experiment.id, job)
    }
    return experiment
  }

  async getOrCreateExperimentGroup(
    name?: string,
    user: string = this.user
  ): Promise<ExperimentGroup> {
    const record = ExperimentGroup.createRecord(name, user)
    return getOrAdd(this.xgroups, record.id, () => new ExperimentGroup(record, this))
  }

  async getOrCreateContainerSpec(
    params: ContainerBuildParams,
    user: string = this.user
  ): Promise<ContainerSpec> {
    const record = ContainerSpec.createRecord(params, user)
    return getOrAdd(this.containerSpecs, record.id, () => new ContainerSpec(record))
  }

  async getOrCreateJobSpec(record: JobSpecRecord): Promise<JobSpec> {
    return getOrAdd(this.jobSpecs, record.id, () => new JobSpec(record))
  }

  async addRun(record: RunRecord): Promise<Run> {
    const run = new Run(record, this)
    this.runs.set(run.id, run)
    append(this.runsByJob, run.jobId, run)
    return run
  }

  // The run object already carries its status.
  async saveRunStatus(runId: string): Promise<void> {
    if (!this.runs.has(runId)) {
      throw new HistoryError(`run ${runId} does not belong to this storage`)
    }
  }

  async fetch<K extends CollectionName>(
    name: K,
    id: string
  ): Promise<CollectionEntities[K] | undefined> {
    const graph: { [C in CollectionName]: Map<string, CollectionEntities[C]> } = {
      xgroups: this.xgroups,
      containerSpecs: this.containerSpecs,
      experiments: this.experiments,
      jobs: this.jobs,
      jobSpecs: this.jobSpecs,
      runs: this.runs,
    }
    return graph[name].get(id)
  }

  async experimentsOf(xgroupId: string): Promise<Experiment[]> {
    return [...(this.experimentsByGroup.get(xgroupId) ?? [])]
  }

  async jobsOf(experimentId: string): Promise<Job[]> {
    return [...(this.jobsByExperiment.get(experimentId) ?? [])]
  }

  async runsOf(jobId: string): Promise<Run[]> {
    return [...(this.runsByJob.get(jobId) ?? [])]
  }

  transaction<T>(scope: () => Promise<T>): Promise<T> {
    return scope()
  }

  async close(): Promise<void> {
    for (const map of [
      this.xgroups,
      this.containerSpecs,
      this.experiments,
      this.experimentsByGroup,
      this.jobs,
      this.jobsByExperiment,
      this.jobSpecs,
      this.runs,
      this.runsByJob,
    ]) {
      map.clear()
    }
  }
}

function append<V>(map: Map<string, V[]>, key: string, value: V): void {
  const values = map.get(key)
  if (values === undefined) map.set(key, [value])
  else values.push(value)
}

function getOrAdd<V>(map: Map<string, V>, key: string, create: () => V): V {
  const existing = map.get(key)
  if (existing !== undefined) return existing
  const value = create()
  map.set(key, value)
  return value
}
