import { isActiveJobStatus } from '../../lib/api/utils'
import { liveJobStatus, stopRun } from '../compute/reconcile'
import { Run } from '../models/run'
import { selectJobs } from '../storage/history'
import { CommandContext } from './context'

export interface StopOptions {
  xgroup?: string
  maxJobs?: number
  user?: string
  // only list what would be stopped
  dryRun?: boolean
}

export interface StopSummary {
  stopped: number
  total: number
}

/**
 * Stops the latest run of every selected job that is still active. A run
 * whose platform cannot be reached counts as active when its stored status
 * is.
 */
export async function stopCommand(
  context: CommandContext,
  options: StopOptions = {}
): Promise<StopSummary> {
  const jobs = await selectJobs(context.storage, {
    xgroup: options.xgroup,
    user: options.user,
    maxJobs: options.maxJobs ?? context.config.statusMaxJobs,
  })

  const active: Run[] = []
  for (const job of jobs) {
    const run = await job.latestRun()
    if (run === undefined) continue
    if (isActiveJobStatus(await liveJobStatus(run, context.platforms))) {
      active.push(run)
    }
  }

  if (options.dryRun) {
    for (const run of active) {
      context.print(`would stop run ${run.id} on ${run.platform}`)
    }
    return { stopped: 0, total: active.length }
  }

  let stopped = 0
  for (const run of active) {
    if (await stopRun(run, context.platforms)) stopped += 1
    else context.print(`unable to stop run ${run.id} on ${run.platform}`)
  }
  context.print(`stopped ${stopped} of ${active.length} jobs`)
  return { stopped, total: active.length }
}
