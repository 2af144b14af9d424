import { HistoryError, QueryError } from '../../lib/api/errors'
import { ExperimentGroup } from '../models/experimentGroup'
import { Job } from '../models/job'
import { Run } from '../models/run'
import { QueryOp } from './clause'
import { Collection, CollectionEntities, CollectionName, Storage } from './interfaces'

function newestFirst<T extends { timestamp: Date }>(entities: T[]): T[] {
  return [...entities].sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
}

function requireCollection<K extends CollectionName>(
  storage: Storage,
  name: K
): Collection<CollectionEntities[K]> {
  const collection = storage.collection(name)
  if (collection === undefined) {
    throw new QueryError(`the ${storage.kind} store cannot be queried`)
  }
  return collection
}

/** The group named `name` of `user`. Throws when there is none. */
export async function findExperimentGroup(
  storage: Storage,
  name: string,
  user: string = storage.user
): Promise<ExperimentGroup> {
  const groups = await requireCollection(storage, 'xgroups')
    .where('name', QueryOp.EQ, name)
    .where('user', QueryOp.EQ, user)
    .execute()
  const [group] = [...groups]
  if (group === undefined) {
    throw new HistoryError(`experiment group '${name}' of user ${user} not found`)
  }
  return group
}

export async function groupJobs(group: ExperimentGroup): Promise<Job[]> {
  const jobs: Job[] = []
  for (const experiment of await group.experiments()) {
    jobs.push(...(await experiment.jobs()))
  }
  return jobs
}

/**
 * The `count` most recent jobs of `user`, newest first. Sorted here rather
 * than by the store, which not every backend supports.
 */
export async function recentJobs(
  storage: Storage,
  count: number,
  user: string = storage.user
): Promise<Job[]> {
  const jobs = await requireCollection(storage, 'jobs')
    .where('user', QueryOp.EQ, user)
    .execute()
  return newestFirst([...jobs]).slice(0, count)
}

/** The `count` most recent runs of `job`, newest first. */
export async function latestRuns(job: Job, count: number): Promise<Run[]> {
  const runs = await job.runs()
  return newestFirst(runs).slice(0, count)
}

export const DEFAULT_MAX_JOBS = 8

export interface JobSelection {
  // experiment group name; without one the user's most recent jobs are used
  xgroup?: string
  user?: string
  maxJobs?: number
}

/** Every job of the named group, or the user's `maxJobs` most recent jobs. */
export async function selectJobs(
  storage: Storage,
  selection: JobSelection
): Promise<Job[]> {
  const user = selection.user ?? storage.user
  if (selection.xgroup !== undefined) {
    return groupJobs(await findExperimentGroup(storage, selection.xgroup, user))
  }
  return recentJobs(storage, selection.maxJobs ?? DEFAULT_MAX_JOBS, user)
}
