import {
  ContainerSpecRecord,
  ExperimentGroupRecord,
  ExperimentRecord,
  JobRecord,
  JobSpecRecord,
  Kwargs,
  RunRecord,
} from '../helpers/historyInterfaces'
import { ContainerBuildParams, ContainerSpec } from '../models/containerSpec'
import { Experiment } from '../models/experiment'
import { ExperimentGroup } from '../models/experimentGroup'
import { Job } from '../models/job'
import { JobSpec } from '../models/jobSpec'
import { Run } from '../models/run'
import { JobStatus } from '../models/status'
import { ClauseValue, QueryOp } from './clause'

export enum Direction {
  ASCENDING = 'ASCENDING',
  DESCENDING = 'DESCENDING',
}

export interface Queryable<T> {
  /**
   * Filters on a dot-separated field path, e.g.
   * `jobs.where('kwargs.learning_rate', QueryOp.LT, 0.1)`.
   */
  where(field: string, op: QueryOp, value: ClauseValue): Query<T>
}

/**
 * Immutable query builder. Every builder call returns a new query, so one
 * base query can be branched into several.
 */
export interface Query<T> extends Queryable<T> {
  orderBy(field: string, direction?: Direction): Query<T>
  limit(count: number): Query<T>
  /**
   * Runs the query. The returned iterator is lazy and single-pass; call
   * `execute()` again to re-run the query.
   */
  execute(): Promise<IterableIterator<T>>
}

export interface Collection<T> extends Queryable<T> {
  get(id: string): Promise<T | undefined>
}

export interface CollectionEntities {
  experiments: Experiment
  jobs: Job
  runs: Run
  xgroups: ExperimentGroup
  containerSpecs: ContainerSpec
  jobSpecs: JobSpec
}

export type CollectionName = keyof CollectionEntities

export interface CollectionRecords {
  experiments: ExperimentRecord
  jobs: JobRecord
  runs: RunRecord
  xgroups: ExperimentGroupRecord
  containerSpecs: ContainerSpecRecord
  jobSpecs: JobSpecRecord
}

export const COLLECTION_NAMES: readonly CollectionName[] = [
  'xgroups',
  'containerSpecs',
  'experiments',
  'jobs',
  'jobSpecs',
  'runs',
]

/**
 * What entities need from the storage that owns them to walk their
 * relationships and append history.
 */
export interface HistoryContext {
  fetch<K extends CollectionName>(
    name: K,
    id: string
  ): Promise<CollectionEntities[K] | undefined>
  experimentsOf(xgroupId: string): Promise<Experiment[]>
  jobsOf(experimentId: string): Promise<Job[]>
  runsOf(jobId: string): Promise<Run[]>
  getOrCreateJobSpec(record: JobSpecRecord): Promise<JobSpec>
  addRun(record: RunRecord): Promise<Run>
  saveRunStatus(runId: string, status: JobStatus): Promise<void>
}

export interface CreateExperimentOptions {
  name: string
  // ContainerSpec id, or an image id for prebuilt containers
  container: string
  // undefined or null runs the container's default entrypoint
  command?: string | null
  // one job per config; no configs means a single job without kwargs
  configs?: Kwargs[]
  // positional args shared by every job
  args?: string[]
  user?: string
  // experiment group name, generated when absent
  xgroup?: string
}

export type StorageKind = 'null' | 'memory' | 'file' | 'firestore'

/**
 * History store. Stores experiment groups, container specs, experiments,
 * jobs, job specs and runs so that past submissions can be reviewed,
 * queried, stopped and resubmitted.
 */
export interface Storage {
  readonly kind: StorageKind
  readonly user: string

  createExperiment(options: CreateExperimentOptions): Promise<Experiment>
  getOrCreateExperimentGroup(
    name?: string,
    user?: string
  ): Promise<ExperimentGroup>
  getOrCreateContainerSpec(
    params: ContainerBuildParams,
    user?: string
  ): Promise<ContainerSpec>

  /** `undefined` when the backend cannot be queried. */
  collection<K extends CollectionName>(
    name: K
  ): Collection<CollectionEntities[K]> | undefined

  /**
   * Runs `scope` as one unit of work: its writes are committed when it
   * resolves and discarded when it throws. Nested scopes join the outer one.
   */
  transaction<T>(scope: () => Promise<T>): Promise<T>

  close(): Promise<void>
}
