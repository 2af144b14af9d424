import { z } from 'zod'
import { handleApiError, isConflict } from '../../lib/api/errors'
import { JsonObject, JobSpecRecord, RunRecord } from '../helpers/historyInterfaces'
import {
  containerSpecRecordSchema,
  experimentGroupRecordSchema,
  experimentRecordSchema,
  jobRecordSchema,
  jobSpecRecordSchema,
  parseRecord,
  runRecordSchema,
} from '../helpers/historySchemas'
import { currentUser } from '../helpers/helperFunctions'
import { ContainerBuildParams, ContainerSpec } from '../models/containerSpec'
import { Experiment } from '../models/experiment'
import { ExperimentGroup } from '../models/experimentGroup'
import { Job } from '../models/job'
import { JobSpec } from '../models/jobSpec'
import { Run } from '../models/run'
import { JobStatus } from '../models/status'
import { Clause, QueryOp } from './clause'
import {
  Collection,
  CollectionEntities,
  CollectionName,
  CollectionRecords,
  CreateExperimentOptions,
  HistoryContext,
  Storage,
  StorageKind,
} from './interfaces'
import { EntityCollection, QueryPlan } from './query'

/**
 * Schemaless document backend. Records go in and come out in their
 * dictionary form; validation and entity mapping happen above it.
 */
export interface DocumentStore {
  readonly kind: StorageKind
  get(collection: CollectionName, id: string): Promise<unknown>
  /** Fails when a document with the same id already exists. */
  create(collection: CollectionName, id: string, record: JsonObject): Promise<void>
  update(collection: CollectionName, id: string, fields: JsonObject): Promise<void>
  query(collection: CollectionName, plan: QueryPlan): Promise<Iterable<unknown>>
  transaction<T>(scope: () => Promise<T>): Promise<T>
  close(): Promise<void>
}

interface CollectionBinding<R, E> {
  schema: z.ZodType<R>
  toEntity(record: R): E
}

type CollectionBindings = {
  [K in CollectionName]: CollectionBinding<CollectionRecords[K], CollectionEntities[K]>
}

/** Storage over any {@link DocumentStore}. */
export class DocumentStorage implements Storage, HistoryContext {
  readonly kind: StorageKind
  readonly user: string
  protected readonly store: DocumentStore
  private readonly bindings: CollectionBindings

  constructor(store: DocumentStore, user: string = currentUser()) {
    this.store = store
    this.kind = store.kind
    this.user = user
    this.bindings = {
      xgroups: {
        schema: experimentGroupRecordSchema,
        toEntity: (record) => new ExperimentGroup(record, this),
      },
      containerSpecs: {
        schema: containerSpecRecordSchema,
        toEntity: (record) => new ContainerSpec(record),
      },
      experiments: {
        schema: experimentRecordSchema,
        toEntity: (record) => new Experiment(record, this),
      },
      jobs: {
        schema: jobRecordSchema,
        toEntity: (record) => new Job(record, this),
      },
      jobSpecs: {
        schema: jobSpecRecordSchema,
        toEntity: (record) => new JobSpec(record),
      },
      runs: {
        schema: runRecordSchema,
        toEntity: (record) => new Run(record, this),
      },
    }
  }

  collection<K extends CollectionName>(name: K): Collection<CollectionEntities[K]> {
    return new EntityCollection(
      (id) => this.fetch(name, id),
      async (plan) => this.toEntities(name, await this.store.query(name, plan))
    )
  }

  async fetch<K extends CollectionName>(
    name: K,
    id: string
  ): Promise<CollectionEntities[K] | undefined> {
    const data = await this.store.get(name, id)
    if (data === undefined) return undefined
    const binding = this.bindings[name]
    const record = parseRecord(binding.schema, name, data)
    return record === undefined ? undefined : binding.toEntity(record)
  }

  async createExperiment(options: CreateExperimentOptions): Promise<Experiment> {
    return this.transaction(async () => {
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

      const existing = await this.fetch('experiments', record.id)
      if (existing !== undefined) return existing

      await this.store.create('experiments', record.id, record)
      for (const job of Experiment.jobRecords(record)) {
        await this.store.create('jobs', job.id, job)
      }
      return new Experiment(record, this)
    })
  }

  getOrCreateExperimentGroup(
    name?: string,
    user: string = this.user
  ): Promise<ExperimentGroup> {
    return this.getOrCreate('xgroups', ExperimentGroup.createRecord(name, user))
  }

  getOrCreateContainerSpec(
    params: ContainerBuildParams,
    user: string = this.user
  ): Promise<ContainerSpec> {
    return this.getOrCreate(
      'containerSpecs',
      ContainerSpec.createRecord(params, user)
    )
  }

  getOrCreateJobSpec(record: JobSpecRecord): Promise<JobSpec> {
    return this.getOrCreate('jobSpecs', record)
  }

  async addRun(record: RunRecord): Promise<Run> {
    await this.store.create('runs', record.id, record)
    return new Run(record, this)
  }

  saveRunStatus(runId: string, status: JobStatus): Promise<void> {
    return this.store.update('runs', runId, { status })
  }

  experimentsOf(xgroupId: string): Promise<Experiment[]> {
    return this.children('experiments', 'xgroup', xgroupId)
  }

  jobsOf(experimentId: string): Promise<Job[]> {
    return this.children('jobs', 'experiment', experimentId)
  }

  runsOf(jobId: string): Promise<Run[]> {
    return this.children('runs', 'job', jobId)
  }

  transaction<T>(scope: () => Promise<T>): Promise<T> {
    return this.store.transaction(scope)
  }

  close(): Promise<void> {
    return this.store.close()
  }

  private async children<K extends CollectionName>(
    name: K,
    field: string,
    parentId: string
  ): Promise<Array<CollectionEntities[K]>> {
    const rows = await this.store.query(name, {
      clauses: [new Clause(field, QueryOp.EQ, parentId)],
    })
    return [...this.toEntities(name, rows)]
  }

  // Dedup-keyed creation: the record id is derived from its content.
  private async getOrCreate<K extends CollectionName>(
    name: K,
    record: CollectionRecords[K]
  ): Promise<CollectionEntities[K]> {
    const existing = await this.fetch(name, record.id)
    if (existing !== undefined) return existing
    try {
      await this.store.create(name, record.id, record)
    } catch (error) {
      // created concurrently by another writer
      if (!isConflict(handleApiError(error))) throw error
      const created = await this.fetch(name, record.id)
      if (created === undefined) throw error
      return created
    }
    return this.bindings[name].toEntity(record)
  }

  private *toEntities<K extends CollectionName>(
    name: K,
    rows: Iterable<unknown>
  ): IterableIterator<CollectionEntities[K]> {
    const binding = this.bindings[name]
    for (const row of rows) {
      const record = parseRecord(binding.schema, name, row)
      if (record !== undefined) yield binding.toEntity(record)
    }
  }
}
