import { shortID } from '../../lib/api/utils'
import { formatDuration, formatTimestamp } from '../../lib/time'
import { updateJobStatus } from '../compute/reconcile'
import { ContainerSpec } from '../models/containerSpec'
import { Experiment } from '../models/experiment'
import { ExperimentGroup } from '../models/experimentGroup'
import { Job } from '../models/job'
import { Run } from '../models/run'
import { JobStatus } from '../models/status'
import { latestRuns, selectJobs } from '../storage/history'
import { CommandContext } from './context'

export interface StatusOptions {
  xgroup?: string
  // jobs without a group, runs per job with one
  maxJobs?: number
  user?: string
  now?: Date
}

interface ExperimentNode {
  experiment: Experiment
  jobs: Job[]
}

interface ContainerNode {
  containerId: string
  containerSpec?: ContainerSpec
  experiments: Map<string, ExperimentNode>
}

interface GroupNode {
  xgroup?: ExperimentGroup
  xgroupId: string
  containers: Map<string, ContainerNode>
}

function getOrSet<V>(map: Map<string, V>, key: string, create: () => V): V {
  let value = map.get(key)
  if (value === undefined) {
    value = create()
    map.set(key, value)
  }
  return value
}

// group => container spec => experiment => jobs, in the order jobs came in
async function buildTree(jobs: Job[]): Promise<Map<string, GroupNode>> {
  const groups = new Map<string, GroupNode>()
  const experiments = new Map<string, Experiment | undefined>()
  for (const job of jobs) {
    if (!experiments.has(job.experimentId)) {
      experiments.set(job.experimentId, await job.experiment())
    }
    const experiment = experiments.get(job.experimentId)
    if (experiment === undefined) continue

    const group = groups.get(experiment.xgroupId) ?? {
      xgroupId: experiment.xgroupId,
      xgroup: await experiment.xgroup(),
      containers: new Map<string, ContainerNode>(),
    }
    groups.set(experiment.xgroupId, group)

    let container = group.containers.get(experiment.containerId)
    if (container === undefined) {
      container = {
        containerId: experiment.containerId,
        containerSpec: await experiment.containerSpec(),
        experiments: new Map(),
      }
      group.containers.set(experiment.containerId, container)
    }
    getOrSet(container.experiments, experiment.id, () => ({ experiment, jobs: [] })).jobs.push(job)
  }
  return groups
}

export function formatRun(run: Run, status: JobStatus, now: Date): string {
  const age = formatDuration(Math.max(0, now.getTime() - run.timestamp.getTime()))
  return [
    shortID(run.id),
    status.padEnd(9),
    run.platform.padEnd(5),
    formatTimestamp(run.timestamp, true),
    `(${age} ago)`,
    run.platformJobName() ?? 'N/A',
  ].join(' ')
}

function describeContainer(node: ContainerNode): string {
  if (node.containerSpec === undefined) return `image ${node.containerId}`
  return `container ${node.containerSpec.describe()}`
}

function describeExperiment(experiment: Experiment): string {
  const command = experiment.command ?? '<default entrypoint>'
  return `experiment ${shortID(experiment.id)} ${experiment.name}: ${[command, ...experiment.args].join(' ')}`
}

/**
 * Status lines for the selected jobs, reconciling each shown run with its
 * platform. Without a group the latest run of each of the user's most recent
 * jobs is shown; with one, the latest `maxJobs` runs of every job.
 */
export async function statusLines(
  context: CommandContext,
  options: StatusOptions = {}
): Promise<string[]> {
  const now = options.now ?? new Date()
  const maxJobs = options.maxJobs ?? context.config.statusMaxJobs
  const jobs = await selectJobs(context.storage, {
    xgroup: options.xgroup,
    user: options.user,
    maxJobs,
  })
  const runsPerJob = options.xgroup === undefined ? 1 : options.maxJobs ?? 1

  const lines: string[] = []
  for (const group of (await buildTree(jobs)).values()) {
    lines.push(`xgroup ${group.xgroup?.name ?? group.xgroupId}:`)
    for (const container of group.containers.values()) {
      lines.push(`  ${describeContainer(container)}`)
      for (const { experiment, jobs: experimentJobs } of container.experiments.values()) {
        lines.push(`    ${describeExperiment(experiment)}`)
        for (const job of experimentJobs) {
          lines.push(`      job ${shortID(job.id)} ${job.name}: ${job.describe()}`)
          const runs = await latestRuns(job, runsPerJob)
          if (runs.length === 0) lines.push('        no runs')
          for (const run of runs) {
            const status = await updateJobStatus(run, context.platforms)
            lines.push(`        ${formatRun(run, status, now)}`)
          }
        }
      }
    }
  }
  return lines
}

export async function statusCommand(
  context: CommandContext,
  options: StatusOptions = {}
): Promise<void> {
  const lines = await statusLines(context, options)
  if (lines.length === 0) {
    context.print('No jobs found.')
    return
  }
  for (const line of lines) context.print(line)
}
